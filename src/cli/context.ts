import { readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import chalk from 'chalk';
import { TextDocument, type Notification } from '../bridge/document.js';
import { ConfigLoader } from '../config/loader.js';
import type { EngineConfig } from '../config/schema.js';
import { Logger } from '../logging/logger.js';

export interface CliRuntime {
    config: EngineConfig;
    logger: Logger;
}

/**
 * Configuration plus a console logger honouring its level and log file
 */
export async function loadRuntime(): Promise<CliRuntime> {
    const config = await new ConfigLoader().load();
    const logger = new Logger({ level: config.log.level, file: config.log.file });
    return { config, logger };
}

/**
 * Parse `start:end` character offsets
 */
export function parseSelection(spec: string): { start: number; end: number } {
    const match = /^(\d+):(\d+)$/.exec(spec.trim());
    if (!match) {
        throw new Error(`Invalid selection "${spec}": expected <start>:<end> offsets`);
    }
    return { start: Number(match[1]), end: Number(match[2]) };
}

export async function openDocument(file: string, selection?: string): Promise<TextDocument> {
    const filePath = path.resolve(file);
    const text = await readFile(filePath, 'utf-8');
    const doc = new TextDocument({ text, filePath });
    if (selection) {
        const { start, end } = parseSelection(selection);
        doc.select(start, end);
    }
    return doc;
}

/**
 * Write the document back to disk, or print it to stdout
 */
export async function emitDocument(doc: TextDocument, write: boolean): Promise<void> {
    if (write && doc.filePath) {
        await writeFile(doc.filePath, doc.text, 'utf-8');
        console.error(chalk.green(`✓ Wrote ${path.relative(process.cwd(), doc.filePath) || doc.filePath}`));
        return;
    }
    process.stdout.write(doc.text);
}

export function printNotification(notification: Notification): void {
    console.error(`${chalk.magenta.bold(`◆ ${notification.title}`)} ${notification.message}`);
}
