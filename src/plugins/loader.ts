import { readFile, readdir, access } from 'node:fs/promises';
import path from 'node:path';
import { parse as parseYaml } from 'yaml';
import { pluginDefinitionSchema, formatIssues } from './schema.js';
import type { ActionDefinition, PluginDefinition, TriggerDefinition } from './schema.js';
import { validateDefinition } from './validation.js';
import type { Action, Plugin, RegistrySnapshot, Trigger } from './types.js';
import { DiscoveryError, ValidationError, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';

/** Definition file names, in lookup order */
export const DEFINITION_FILES = ['plugin.json', 'plugin.yaml', 'plugin.yml'] as const;

export type LoadOutcome =
    | { status: 'loaded'; plugin: Plugin }
    | { status: 'rejected'; error: ValidationError }
    | { status: 'absent' };

/**
 * Plugin Loader — discovers, validates and freezes plugin definitions
 *
 * Every immediate subdirectory of the plugin root holding a definition file
 * is one candidate plugin. Candidates are validated independently: a broken
 * plugin is rejected wholesale and recorded, its siblings still load.
 */
export class PluginLoader {
    constructor(private logger?: Logger) { }

    /**
     * Run one discovery pass over `rootDir`
     */
    async load(rootDir: string, generation = 1): Promise<RegistrySnapshot> {
        const root = path.resolve(rootDir);
        const plugins: Plugin[] = [];
        const errors: ValidationError[] = [];

        let entries: string[];
        try {
            const dirents = await readdir(root, { withFileTypes: true });
            entries = dirents
                .filter(entry => entry.isDirectory())
                .map(entry => entry.name)
                .sort();
        } catch (err) {
            if (isMissing(err)) {
                this.logger?.warn(`Plugin directory ${root} does not exist, no plugins loaded`);
                return freezeSnapshot({ generation, rootDir: root, loadedAt: new Date(), plugins, errors });
            }
            throw new DiscoveryError(root, err);
        }

        const names = new Set<string>();
        for (const entry of entries) {
            const outcome = await this.loadPlugin(path.join(root, entry));
            if (outcome.status === 'absent') continue;

            if (outcome.status === 'rejected') {
                errors.push(outcome.error);
                this.logger?.error(outcome.error.message);
                continue;
            }

            const { plugin } = outcome;
            if (names.has(plugin.name)) {
                const error = new ValidationError(plugin.dir, [
                    `a plugin named "${plugin.name}" is already loaded`,
                ], plugin.name);
                errors.push(error);
                this.logger?.error(error.message);
                continue;
            }

            names.add(plugin.name);
            plugins.push(plugin);
            this.logger?.debug(
                `Loaded plugin ${plugin.name} v${plugin.version} ` +
                `(${plugin.triggers.length} triggers, ${plugin.actions.size} actions)`
            );
        }

        return freezeSnapshot({ generation, rootDir: root, loadedAt: new Date(), plugins, errors });
    }

    /**
     * Load a single plugin directory
     */
    async loadPlugin(pluginDir: string): Promise<LoadOutcome> {
        const definitionPath = await findDefinitionFile(pluginDir);
        if (!definitionPath) return { status: 'absent' };

        let raw: unknown;
        try {
            const content = await readFile(definitionPath, 'utf-8');
            raw = definitionPath.endsWith('.json') ? JSON.parse(content) : parseYaml(content);
        } catch (err) {
            return reject(pluginDir, [`cannot parse ${path.basename(definitionPath)}: ${describeError(err)}`]);
        }

        const parsed = pluginDefinitionSchema.safeParse(raw);
        if (!parsed.success) {
            return reject(pluginDir, formatIssues(parsed.error), nameOf(raw));
        }

        const issues = validateDefinition(parsed.data, pluginDir);
        if (issues.length > 0) {
            return reject(pluginDir, issues, parsed.data.name);
        }

        return { status: 'loaded', plugin: toPlugin(parsed.data, pluginDir, definitionPath) };
    }
}

async function findDefinitionFile(pluginDir: string): Promise<string | null> {
    for (const file of DEFINITION_FILES) {
        const candidate = path.join(pluginDir, file);
        const exists = await access(candidate).then(() => true, () => false);
        if (exists) return candidate;
    }
    return null;
}

function reject(pluginDir: string, issues: string[], name?: string): LoadOutcome {
    return { status: 'rejected', error: new ValidationError(pluginDir, issues, name) };
}

function nameOf(raw: unknown): string | undefined {
    if (typeof raw === 'object' && raw !== null && 'name' in raw && typeof raw.name === 'string') {
        return raw.name;
    }
    return undefined;
}

function isMissing(err: unknown): boolean {
    return typeof err === 'object' && err !== null && 'code' in err && err.code === 'ENOENT';
}

function toPlugin(def: PluginDefinition, pluginDir: string, definitionPath: string): Plugin {
    const actions = new Map<string, Action>();
    for (const [id, action] of Object.entries(def.actions)) {
        actions.set(id, Object.freeze(toAction(action)));
    }

    return Object.freeze({
        name: def.name,
        version: def.version,
        description: def.description,
        author: def.author,
        dir: path.resolve(pluginDir),
        definitionPath,
        triggers: Object.freeze(def.triggers.map(t => Object.freeze(toTrigger(t)))),
        actions: new ReadonlyActionMap(actions),
    });
}

function toTrigger(def: TriggerDefinition): Trigger {
    const trigger: Trigger = {
        id: def.id,
        kind: def.type,
        actionId: def.action_id,
    };
    if (def.type === 'command') trigger.commandName = def.command_name ?? def.id;
    else if (def.command_name) trigger.commandName = def.command_name;
    if (def.shortcut) trigger.shortcut = def.shortcut;
    if (def.context) {
        trigger.context = Object.freeze({
            languages: def.context.languages ? Object.freeze([...def.context.languages]) : undefined,
            filePatterns: def.context.file_patterns ? Object.freeze([...def.context.file_patterns]) : undefined,
        });
    }
    return trigger;
}

function toAction(def: ActionDefinition): Action {
    switch (def.type) {
        case 'external_command':
            return {
                type: 'external_command',
                command: def.command,
                input: def.input,
                output: def.output,
                timeoutMs: def.timeout_ms,
                trimOutput: def.trim_output,
            };
        case 'snippet':
            return { type: 'snippet', template: def.template };
        case 'notify':
            return { type: 'notify', message: def.message, title: def.title };
        case 'transform':
            return { type: 'transform', operation: def.operation };
        case 'chain':
            return { type: 'chain', actions: Object.freeze([...def.actions]) };
        case 'script':
            return {
                type: 'script',
                engine: def.engine,
                // validation guarantees exactly one of file / code
                source: def.file !== undefined
                    ? { kind: 'file', path: def.file }
                    : { kind: 'inline', code: def.code ?? '' },
                entry: def.entry,
            };
    }
}

/**
 * Map whose mutators throw, so a loaded plugin's actions stay fixed
 */
class ReadonlyActionMap extends Map<string, Action> {
    private sealed = false;

    constructor(entries: Map<string, Action>) {
        super(entries);
        this.sealed = true;
    }

    override set(key: string, value: Action): this {
        if (this.sealed) throw new TypeError('Plugin actions are read-only');
        return super.set(key, value);
    }

    override delete(): boolean {
        throw new TypeError('Plugin actions are read-only');
    }

    override clear(): void {
        throw new TypeError('Plugin actions are read-only');
    }
}

function freezeSnapshot(snapshot: RegistrySnapshot): RegistrySnapshot {
    return Object.freeze({
        ...snapshot,
        plugins: Object.freeze([...snapshot.plugins]),
        errors: Object.freeze([...snapshot.errors]),
    });
}
