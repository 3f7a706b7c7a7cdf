/**
 * Plugin System — Types
 *
 * A plugin is a directory holding a definition file (`plugin.json`,
 * `plugin.yaml` or `plugin.yml`) that declares triggers (when something
 * happens) and actions (what happens). Loaded plugins are frozen and
 * never mutated; a reload replaces them wholesale.
 */

import type { EngineId, ValidationError } from '../errors.js';

// ─── Triggers ───

export type TriggerKind = 'command' | 'shortcut' | 'on_save' | 'on_open';

export const TRIGGER_KINDS: readonly TriggerKind[] = ['command', 'shortcut', 'on_save', 'on_open'];

/** Trigger kinds that are offered to the user through menus or keymaps */
export const MANUAL_TRIGGER_KINDS: readonly TriggerKind[] = ['command', 'shortcut'];

export interface ContextFilter {
    /** Allowed language identifiers; absent or empty allows every language */
    languages?: readonly string[];
    /** Allowed filename globs; absent or empty allows every file */
    filePatterns?: readonly string[];
}

export interface Trigger {
    id: string;
    kind: TriggerKind;
    actionId: string;
    /** Menu label (command triggers) */
    commandName?: string;
    /** Key combination, e.g. "Ctrl+Shift+U" */
    shortcut?: string;
    context?: ContextFilter;
}

// ─── Actions ───

export type ActionType = 'external_command' | 'snippet' | 'notify' | 'transform' | 'chain' | 'script';

export const ACTION_TYPES: readonly ActionType[] = [
    'external_command', 'snippet', 'notify', 'transform', 'chain', 'script',
];

export type CommandInput = 'file' | 'selection' | 'none';
export type CommandOutput = 'replace_file' | 'replace_selection' | 'discard' | 'notify';

export type TransformOperation =
    | 'uppercase'
    | 'lowercase'
    | 'title_case'
    | 'reverse'
    | 'trim'
    | 'trim_lines'
    | 'sort_lines'
    | 'reverse_lines'
    | 'unique_lines';

export interface ExternalCommandAction {
    type: 'external_command';
    command: string;
    input: CommandInput;
    output: CommandOutput;
    timeoutMs?: number;
    trimOutput: boolean;
}

export interface SnippetAction {
    type: 'snippet';
    template: string;
}

export interface NotifyAction {
    type: 'notify';
    message: string;
    title?: string;
}

export interface TransformAction {
    type: 'transform';
    operation: TransformOperation;
}

export interface ChainAction {
    type: 'chain';
    actions: readonly string[];
}

export type ScriptSource =
    | { kind: 'file'; path: string }
    | { kind: 'inline'; code: string };

export interface ScriptAction {
    type: 'script';
    engine: EngineId;
    source: ScriptSource;
    entry: string;
}

export type Action =
    | ExternalCommandAction
    | SnippetAction
    | NotifyAction
    | TransformAction
    | ChainAction
    | ScriptAction;

// ─── Plugins ───

export interface PluginInfo {
    name: string;
    version: string;
    description: string;
    author: string;
}

export interface Plugin extends PluginInfo {
    /** Absolute path to the plugin directory */
    dir: string;
    /** Absolute path to the definition file it was loaded from */
    definitionPath: string;
    /** Triggers in declaration order */
    triggers: readonly Trigger[];
    actions: ReadonlyMap<string, Action>;
}

/**
 * Immutable view of every plugin found in one discovery pass
 */
export interface RegistrySnapshot {
    generation: number;
    rootDir: string;
    loadedAt: Date;
    /** Accepted plugins, in plugin directory name order */
    plugins: readonly Plugin[];
    /** One entry per rejected plugin */
    errors: readonly ValidationError[];
}
