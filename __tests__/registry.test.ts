import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { rm, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { PluginRegistry } from '../src/plugins/registry.js';
import type { RegistrySnapshot } from '../src/plugins/types.js';
import { DiscoveryError } from '../src/errors.js';
import { makeTempDir, removeDir, writePlugin } from './helpers.js';

function definition(name: string): Record<string, unknown> {
    return {
        name,
        version: '1.0.0',
        triggers: [
            { id: 'shout', type: 'command', command_name: 'Shout', action_id: 'upper' },
            { id: 'tidy', type: 'on_save', action_id: 'trim', context: { file_patterns: ['*.md'] } },
        ],
        actions: {
            upper: { type: 'transform', operation: 'uppercase' },
            trim: { type: 'transform', operation: 'trim_lines' },
        },
    };
}

function describeSnapshot(snapshot: RegistrySnapshot): unknown {
    return snapshot.plugins.map(plugin => ({
        name: plugin.name,
        triggers: plugin.triggers,
        actions: Array.from(plugin.actions.entries()),
    }));
}

describe('PluginRegistry', () => {
    let root: string;

    beforeEach(async () => {
        root = await makeTempDir();
        await writePlugin(root, 'alpha', definition('alpha'));
    });

    afterEach(async () => {
        await removeDir(root);
    });

    it('reloads an unchanged tree into an equivalent snapshot', async () => {
        const registry = await PluginRegistry.load(root);
        const first = registry.snapshot;
        const second = await registry.reload();

        expect(first.generation).toBe(1);
        expect(second.generation).toBe(2);
        expect(second).not.toBe(first);
        expect(describeSnapshot(second)).toEqual(describeSnapshot(first));
    });

    it('leaves a snapshot taken before a reload untouched', async () => {
        const registry = await PluginRegistry.load(root);
        const before = registry.snapshot;

        await writePlugin(root, 'beta', definition('beta'));
        const after = await registry.reload();

        expect(before.plugins.map(p => p.name)).toEqual(['alpha']);
        expect(after.plugins.map(p => p.name)).toEqual(['alpha', 'beta']);
        expect(registry.snapshot).toBe(after);
    });

    it('notifies reload listeners until they unsubscribe', async () => {
        const registry = await PluginRegistry.load(root);
        const listener = vi.fn();
        const unsubscribe = registry.onReload(listener);

        const next = await registry.reload();
        unsubscribe();
        await registry.reload();

        expect(listener).toHaveBeenCalledTimes(1);
        expect(listener).toHaveBeenCalledWith(next);
    });

    it('keeps the previous snapshot when discovery fails', async () => {
        const registry = await PluginRegistry.load(root);
        const before = registry.snapshot;

        await rm(root, { recursive: true, force: true });
        await writeFile(root, 'now a file');

        await expect(registry.reload()).rejects.toBeInstanceOf(DiscoveryError);
        expect(registry.snapshot).toBe(before);

        await rm(root);
    });

    it('lists commands, filtered by the subject when given', async () => {
        const registry = await PluginRegistry.load(root);

        expect(registry.commands()).toEqual([{
            pluginName: 'alpha',
            commands: [{ pluginName: 'alpha', triggerId: 'shout', label: 'Shout', shortcut: undefined, kind: 'command' }],
        }]);
        expect(registry.commands({ filePath: '/tmp/a.md', language: 'markdown' })).toHaveLength(1);
    });

    it('reloads when the plugin tree changes under watch', async () => {
        const registry = await PluginRegistry.load(root);
        let resolveReload: (snapshot: RegistrySnapshot) => void = () => undefined;
        const reloaded = new Promise<RegistrySnapshot>((resolve) => {
            resolveReload = resolve;
        });

        const watcher = registry.watch({
            debounceMs: 50,
            onReload: (snapshot) => {
                // the directory can show up before its definition file does
                if (snapshot.plugins.some(p => p.name === 'gamma')) resolveReload(snapshot);
            },
        });
        try {
            await watcher.ready();
            await writePlugin(root, 'gamma', definition('gamma'));
            const snapshot = await reloaded;
            expect(snapshot.plugins.map(p => p.name)).toEqual(['alpha', 'gamma']);
        } finally {
            await watcher.close();
        }
    });

    it('resolves the root to an absolute path', async () => {
        const registry = await PluginRegistry.load(path.relative(process.cwd(), root));
        expect(registry.root).toBe(root);
    });
});
