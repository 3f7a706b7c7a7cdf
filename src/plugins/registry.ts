import path from 'node:path';
import { watch, type FSWatcher } from 'chokidar';
import { PluginLoader } from './loader.js';
import type { RegistrySnapshot } from './types.js';
import { describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { listCommands, type CommandGroup, type FilterSubject } from '../triggers/matcher.js';
import { createSilentLogger } from '../logging/logger.js';

export type ReloadListener = (snapshot: RegistrySnapshot) => void;

export interface WatchOptions {
    debounceMs?: number;
    onReload?: ReloadListener;
    onError?: (err: unknown) => void;
}

/**
 * Plugin Registry — owns the current snapshot and swaps it on reload
 *
 * Snapshots are immutable. `reload()` builds a complete new snapshot and
 * replaces the reference in one assignment, so an invocation holding the
 * previous snapshot keeps a consistent view until it finishes.
 */
export class PluginRegistry {
    private current: RegistrySnapshot | null = null;
    private generation = 0;
    private loader: PluginLoader;
    private logger: Logger;
    private listeners = new Set<ReloadListener>();

    private constructor(private rootDir: string, logger?: Logger) {
        this.logger = logger ?? createSilentLogger();
        this.loader = new PluginLoader(this.logger);
    }

    /**
     * Discover plugins under `rootDir`. Throws DiscoveryError when the directory cannot be read.
     */
    static async load(rootDir: string, logger?: Logger): Promise<PluginRegistry> {
        const registry = new PluginRegistry(path.resolve(rootDir), logger);
        await registry.reload();
        return registry;
    }

    /**
     * The newest snapshot. New invocations must resolve against this.
     */
    get snapshot(): RegistrySnapshot {
        if (!this.current) {
            throw new Error('Plugin registry has not been loaded');
        }
        return this.current;
    }

    get root(): string {
        return this.rootDir;
    }

    /**
     * Re-scan the plugin root and atomically replace the snapshot.
     * On discovery failure the previous snapshot stays in place and the error is rethrown.
     */
    async reload(): Promise<RegistrySnapshot> {
        const next = await this.loader.load(this.rootDir, this.generation + 1);
        this.generation = next.generation;
        this.current = next;

        this.logger.info(
            `Plugin registry generation ${next.generation}: ` +
            `${next.plugins.length} loaded, ${next.errors.length} rejected`
        );

        for (const listener of Array.from(this.listeners)) {
            listener(next);
        }
        return next;
    }

    /**
     * Manual commands of the current snapshot, optionally only those offered for `subject`
     */
    commands(subject?: FilterSubject): CommandGroup[] {
        return listCommands(this.snapshot, subject);
    }

    /**
     * Subscribe to snapshot swaps. Returns an unsubscribe function.
     */
    onReload(listener: ReloadListener): () => void {
        this.listeners.add(listener);
        return () => {
            this.listeners.delete(listener);
        };
    }

    /**
     * Reload whenever something below the plugin root changes
     */
    watch(options: WatchOptions = {}): RegistryWatcher {
        return new RegistryWatcher(this, this.logger, options);
    }
}

/**
 * Debounced file watcher driving `PluginRegistry.reload()`
 */
export class RegistryWatcher {
    private watcher: FSWatcher;
    private timer: ReturnType<typeof setTimeout> | null = null;
    private pending: Promise<void> = Promise.resolve();
    private readyPromise: Promise<void>;

    constructor(
        private registry: PluginRegistry,
        private logger: Logger,
        private options: WatchOptions,
    ) {
        this.watcher = watch(registry.root, {
            ignoreInitial: true,
            // Plugins are one level deep; scripts may sit a couple of levels further down
            depth: 4,
        });
        this.readyPromise = new Promise((resolve) => {
            this.watcher.once('ready', () => resolve());
        });
        this.watcher.on('all', (_event, changedPath) => this.schedule(changedPath));
        this.watcher.on('error', (err) => this.fail(err));
    }

    /**
     * Resolves once the initial scan is done and changes are being reported
     */
    ready(): Promise<void> {
        return this.readyPromise;
    }

    private schedule(changedPath: string): void {
        if (this.timer) clearTimeout(this.timer);
        this.timer = setTimeout(() => {
            this.timer = null;
            this.logger.debug(`Change detected at ${changedPath}, reloading plugins`);
            this.pending = this.pending.then(() => this.reloadOnce());
        }, this.options.debounceMs ?? 300);
    }

    private async reloadOnce(): Promise<void> {
        try {
            const snapshot = await this.registry.reload();
            this.options.onReload?.(snapshot);
        } catch (err) {
            this.fail(err);
        }
    }

    private fail(err: unknown): void {
        this.logger.error(`Plugin reload failed: ${describeError(err)}`);
        this.options.onError?.(err);
    }

    async close(): Promise<void> {
        if (this.timer) clearTimeout(this.timer);
        await this.watcher.close();
        await this.pending;
    }
}
