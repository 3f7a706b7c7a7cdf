import { appendFileSync, mkdirSync } from 'node:fs';
import path from 'node:path';
import chalk from 'chalk';

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export const LOG_LEVELS: readonly LogLevel[] = ['debug', 'info', 'warn', 'error', 'silent'];

const RANK: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40, silent: 100 };

const COLOR: Record<Exclude<LogLevel, 'silent'>, (text: string) => string> = {
    debug: chalk.dim,
    info: chalk.cyan,
    warn: chalk.yellow,
    error: chalk.red,
};

export interface LoggerOptions {
    level?: LogLevel;
    /** Append every emitted line to this file as well */
    file?: string;
    scope?: string;
    /** Where console output goes (defaults to stderr, keeping stdout for results) */
    write?: (line: string) => void;
}

/**
 * Logger — timestamped console lines, optionally mirrored to a log file
 *
 * Writes are synchronous: an action can log from inside a sandboxed script
 * callback, where nothing may be awaited.
 */
export class Logger {
    private level: LogLevel;
    private file?: string;
    private scope?: string;
    private write: (line: string) => void;
    private fileReady = false;

    constructor(options: LoggerOptions = {}) {
        this.level = options.level ?? 'info';
        this.file = options.file;
        this.scope = options.scope;
        this.write = options.write ?? ((line) => process.stderr.write(line + '\n'));
    }

    /**
     * Logger that shares level and destination but prefixes a scope
     */
    child(scope: string): Logger {
        return new Logger({
            level: this.level,
            file: this.file,
            scope: this.scope ? `${this.scope}:${scope}` : scope,
            write: this.write,
        });
    }

    debug(message: string): void {
        this.log('debug', message);
    }

    info(message: string): void {
        this.log('info', message);
    }

    warn(message: string): void {
        this.log('warn', message);
    }

    error(message: string): void {
        this.log('error', message);
    }

    isEnabled(level: LogLevel): boolean {
        return level !== 'silent' && RANK[level] >= RANK[this.level];
    }

    private log(level: Exclude<LogLevel, 'silent'>, message: string): void {
        if (!this.isEnabled(level)) return;

        const timestamp = new Date().toISOString();
        const scope = this.scope ? `[${this.scope}] ` : '';
        const tag = level.toUpperCase().padEnd(5);

        this.write(`${chalk.dim(timestamp.slice(11, 19))} ${COLOR[level](tag)} ${scope}${message}`);

        if (this.file) {
            this.appendToFile(`[${timestamp}] ${tag} ${scope}${message}\n`);
        }
    }

    private appendToFile(line: string): void {
        if (!this.file) return;
        try {
            if (!this.fileReady) {
                mkdirSync(path.dirname(this.file), { recursive: true });
                this.fileReady = true;
            }
            appendFileSync(this.file, line, 'utf-8');
        } catch (err) {
            // Losing the file must not take logging down with it
            this.file = undefined;
            this.write(chalk.red(`Log file disabled: ${err instanceof Error ? err.message : String(err)}`));
        }
    }
}

/**
 * Logger that drops everything (tests, embedding hosts with their own logging)
 */
export function createSilentLogger(): Logger {
    return new Logger({ level: 'silent' });
}
