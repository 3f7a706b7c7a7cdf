import { z } from 'zod';

/**
 * On-disk plugin definition schema. JSON and YAML definitions share it.
 * Field names follow the file format (snake_case); the loader maps them
 * onto the camelCase runtime types.
 */

const nonEmpty = z.string().trim().min(1);

export const IDENTIFIER_PATTERN = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

export const contextFilterSchema = z.object({
    languages: z.array(nonEmpty).optional(),
    file_patterns: z.array(nonEmpty).optional(),
}).strict();

export const triggerSchema = z.object({
    id: nonEmpty,
    type: z.enum(['command', 'shortcut', 'on_save', 'on_open']),
    action_id: nonEmpty,
    command_name: nonEmpty.optional(),
    shortcut: nonEmpty.optional(),
    context: contextFilterSchema.optional(),
}).strict();

const externalCommandSchema = z.object({
    type: z.literal('external_command'),
    command: nonEmpty,
    input: z.enum(['file', 'selection', 'none']).default('none'),
    output: z.enum(['replace_file', 'replace_selection', 'discard', 'notify']).default('discard'),
    timeout_ms: z.number().int().positive().optional(),
    trim_output: z.boolean().default(false),
}).strict();

const snippetSchema = z.object({
    type: z.literal('snippet'),
    template: z.string(),
}).strict();

const notifySchema = z.object({
    type: z.literal('notify'),
    message: z.string(),
    title: z.string().optional(),
}).strict();

const transformSchema = z.object({
    type: z.literal('transform'),
    operation: z.enum([
        'uppercase',
        'lowercase',
        'title_case',
        'reverse',
        'trim',
        'trim_lines',
        'sort_lines',
        'reverse_lines',
        'unique_lines',
    ]),
}).strict();

const chainSchema = z.object({
    type: z.literal('chain'),
    actions: z.array(nonEmpty).min(1, 'a chain needs at least one member'),
}).strict();

const scriptSchema = z.object({
    type: z.literal('script'),
    engine: z.enum(['lua', 'javascript']),
    file: nonEmpty.optional(),
    code: z.string().optional(),
    entry: z.string().regex(IDENTIFIER_PATTERN, 'entry must be a plain identifier').default('main'),
}).strict();

export const actionSchema = z.discriminatedUnion('type', [
    externalCommandSchema,
    snippetSchema,
    notifySchema,
    transformSchema,
    chainSchema,
    scriptSchema,
]);

export const pluginDefinitionSchema = z.object({
    name: nonEmpty,
    // YAML reads `version: 1.0` as a number
    version: z.union([nonEmpty, z.number()]).transform((v) => String(v)),
    description: z.string().default(''),
    author: z.string().default(''),
    triggers: z.array(triggerSchema).default([]),
    actions: z.record(nonEmpty, actionSchema).default({}),
});

export type PluginDefinition = z.infer<typeof pluginDefinitionSchema>;
export type PluginDefinitionInput = z.input<typeof pluginDefinitionSchema>;
export type TriggerDefinition = z.infer<typeof triggerSchema>;
export type ActionDefinition = z.infer<typeof actionSchema>;

/**
 * Flatten zod issues into "path: message" strings
 */
export function formatIssues(error: z.ZodError): string[] {
    return error.issues.map((issue) => {
        const where = issue.path.length > 0 ? issue.path.join('.') : '(root)';
        return `${where}: ${issue.message}`;
    });
}
