import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readFile } from 'node:fs/promises';
import path from 'node:path';
import { DocumentBridge, TextDocument, type Notification } from '../src/bridge/document.js';
import { PluginHost } from '../src/host/host.js';
import { PluginLoader } from '../src/plugins/loader.js';
import { scaffoldPlugin } from '../src/plugins/scaffold.js';
import { makeTempDir, removeDir } from './helpers.js';

describe('scaffoldPlugin', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('writes a plugin that loads cleanly', async () => {
        const dir = await scaffoldPlugin(root, 'starter');

        expect(dir).toBe(path.join(root, 'starter'));
        expect(await readFile(path.join(dir, 'scripts', 'stamp.lua'), 'utf-8')).toContain('function main()');

        const snapshot = await new PluginLoader().load(root);
        expect(snapshot.errors).toEqual([]);
        expect(snapshot.plugins[0].name).toBe('starter');
        expect(snapshot.plugins[0].triggers.map(t => `${t.kind}:${t.id}`)).toEqual(['command:shout', 'shortcut:stamp']);
    });

    it('produces runnable triggers', async () => {
        await scaffoldPlugin(root, 'starter');
        const host = await PluginHost.create({
            pluginsDir: root,
            shell: '/bin/sh',
            commandTimeoutMs: 5_000,
            scriptTimeoutMs: 1_000,
            watch: { debounceMs: 300 },
            log: { level: 'silent' },
        });
        const notifications: Notification[] = [];
        const doc = new TextDocument({ text: 'body' });
        const bridge = new DocumentBridge(doc, (n) => notifications.push(n));

        doc.select(0, 4);
        expect((await host.runCommand('starter', 'shout', bridge)).success).toBe(true);
        expect(doc.text).toBe('BODY');

        doc.moveCursor(0);
        expect((await host.runCommand('starter', 'stamp', bridge)).success).toBe(true);
        expect(doc.text).toMatch(/^-- edited \d{4}-\d{2}-\d{2} \d{2}:\d{2}\nBODY$/);
        expect(notifications).toEqual([{ title: 'Sample plugin', message: 'Inserted a timestamp' }]);
    });

    it('refuses invalid names and existing directories', async () => {
        await expect(scaffoldPlugin(root, '../escape')).rejects.toThrow('Invalid plugin name');
        await scaffoldPlugin(root, 'starter');
        await expect(scaffoldPlugin(root, 'starter')).rejects.toThrow('already exists');
    });
});
