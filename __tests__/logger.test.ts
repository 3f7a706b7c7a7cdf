import { describe, it, expect, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { Logger, createSilentLogger } from '../src/logging/logger.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('Logger', () => {
    let dir: string | undefined;

    afterEach(async () => {
        if (dir) await removeDir(dir);
        dir = undefined;
    });

    it('drops lines below the configured level', () => {
        const lines: string[] = [];
        const logger = new Logger({ level: 'warn', write: (line) => lines.push(line) });

        logger.info('hidden');
        logger.warn('shown');
        logger.error('also shown');

        expect(lines).toHaveLength(2);
        expect(lines[0]).toContain('shown');
        expect(logger.isEnabled('debug')).toBe(false);
        expect(logger.isEnabled('error')).toBe(true);
    });

    it('prefixes nested scopes', () => {
        const lines: string[] = [];
        const logger = new Logger({ level: 'debug', write: (line) => lines.push(line) });

        logger.child('host').child('alpha').debug('ran');
        expect(lines[0]).toContain('[host:alpha] ran');
    });

    it('mirrors lines to a log file', async () => {
        dir = await makeTempDir();
        const file = path.join(dir, 'logs', 'engine.log');
        const logger = new Logger({ level: 'info', file, write: () => undefined });

        logger.child('registry').info('loaded 2 plugins');

        const content = await readFile(file, 'utf-8');
        expect(content).toMatch(/^\[\d{4}-\d{2}-\d{2}T[\d:.]+Z\] INFO  \[registry\] loaded 2 plugins\n$/);
    });

    it('stays quiet when silent', () => {
        const logger = createSilentLogger();
        expect(logger.isEnabled('error')).toBe(false);
    });
});
