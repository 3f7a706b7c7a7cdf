import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { configSchema, type EngineConfig } from './schema.js';
import { formatIssues } from '../plugins/schema.js';
import { LOG_LEVELS, type LogLevel } from '../logging/logger.js';
import { ConfigError, describeError } from '../errors.js';
import { getConfigPath } from '../utils/paths.js';

/**
 * Config Loader — reads config.yaml, applies defaults and environment overrides
 *
 * A missing file means "all defaults". A file that exists but does not
 * parse or validate is an error: silently ignoring it would run plugins
 * under settings the user did not choose.
 */
export class ConfigLoader {
    constructor(
        private configPath: string = getConfigPath(),
        private env: NodeJS.ProcessEnv = process.env,
    ) { }

    async load(): Promise<EngineConfig> {
        const raw = await this.readRaw();
        const parsed = configSchema.safeParse(raw ?? {});
        if (!parsed.success) {
            throw new ConfigError(this.configPath, formatIssues(parsed.error));
        }

        const config = parsed.data;
        const baseDir = path.dirname(this.configPath);
        const pluginsDir = this.env['EDPLUG_PLUGINS_DIR']
            ?? path.resolve(baseDir, config.pluginsDir ?? 'plugins');

        const envLevel = this.env['EDPLUG_LOG_LEVEL'];
        const level = envLevel && isLogLevel(envLevel) ? envLevel : config.log.level;

        return {
            ...config,
            pluginsDir,
            log: {
                level,
                file: config.log.file ? path.resolve(baseDir, config.log.file) : undefined,
            },
        };
    }

    private async readRaw(): Promise<unknown> {
        let content: string;
        try {
            content = await readFile(this.configPath, 'utf-8');
        } catch (err) {
            if (typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT') {
                return null;
            }
            throw new ConfigError(this.configPath, [describeError(err)]);
        }

        try {
            return parseYaml(content) ?? null;
        } catch (err) {
            throw new ConfigError(this.configPath, [describeError(err)]);
        }
    }
}

function isLogLevel(value: string): value is LogLevel {
    return LOG_LEVELS.some(level => level === value);
}
