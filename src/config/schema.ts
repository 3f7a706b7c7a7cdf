import { z } from 'zod';

const logLevelSchema = z.enum(['debug', 'info', 'warn', 'error', 'silent']);

export const configSchema = z.object({
    /** Directory whose subdirectories are plugins */
    pluginsDir: z.string().min(1).optional(),
    /** Shell used to run external_command templates */
    shell: z.string().min(1).default('/bin/sh'),
    /** Wall-clock limit for external commands (per-action timeout_ms overrides) */
    commandTimeoutMs: z.number().int().positive().default(30_000),
    /** Wall-clock limit for javascript scripts */
    scriptTimeoutMs: z.number().int().positive().default(5_000),
    watch: z.object({
        debounceMs: z.number().int().nonnegative().default(300),
    }).default({}),
    log: z.object({
        level: logLevelSchema.default('info'),
        file: z.string().min(1).optional(),
    }).default({}),
}).strict();

export type ConfigFile = z.input<typeof configSchema>;

export type EngineConfig = Omit<z.output<typeof configSchema>, 'pluginsDir'> & {
    pluginsDir: string;
};
