import type { ExecutionContext } from '../bridge/types.js';
import type { ContextFilter, Plugin, RegistrySnapshot, Trigger, TriggerKind } from '../plugins/types.js';
import { MANUAL_TRIGGER_KINDS } from '../plugins/types.js';
import { matchesGlob } from './glob.js';

export interface TriggerMatch {
    plugin: Plugin;
    trigger: Trigger;
}

/** Context fields a filter looks at */
export type FilterSubject = Pick<ExecutionContext, 'filePath' | 'language'>;

/**
 * A filter matches when (no languages OR language listed) AND
 * (no patterns OR the file matches at least one). No filter matches everything.
 * An unsaved buffer never satisfies a pattern list.
 */
export function matchesContext(filter: ContextFilter | undefined, subject: FilterSubject): boolean {
    if (!filter) return true;

    const { languages, filePatterns } = filter;
    if (languages && languages.length > 0) {
        const language = subject.language.toLowerCase();
        if (!languages.some(l => l.toLowerCase() === language)) return false;
    }

    if (filePatterns && filePatterns.length > 0) {
        const filePath = subject.filePath;
        if (!filePath) return false;
        if (!filePatterns.some(pattern => matchesGlob(filePath, pattern))) return false;
    }

    return true;
}

/**
 * Triggers of `kind` whose filter matches, in registry order then declaration order
 */
export function triggersFor(
    snapshot: RegistrySnapshot,
    kind: TriggerKind,
    subject: FilterSubject,
): TriggerMatch[] {
    const matches: TriggerMatch[] = [];
    for (const plugin of snapshot.plugins) {
        for (const trigger of plugin.triggers) {
            if (trigger.kind === kind && matchesContext(trigger.context, subject)) {
                matches.push({ plugin, trigger });
            }
        }
    }
    return matches;
}

export interface CommandEntry {
    pluginName: string;
    triggerId: string;
    label: string;
    shortcut?: string;
    kind: TriggerKind;
}

export interface CommandGroup {
    pluginName: string;
    commands: CommandEntry[];
}

/**
 * Manual commands for menus and keymaps, grouped per plugin in registry order.
 * Commands sharing a label across plugins are all listed.
 * With a subject, only commands whose filter matches it are included.
 */
export function listCommands(snapshot: RegistrySnapshot, subject?: FilterSubject): CommandGroup[] {
    const groups: CommandGroup[] = [];
    for (const plugin of snapshot.plugins) {
        const commands: CommandEntry[] = [];
        for (const trigger of plugin.triggers) {
            if (!MANUAL_TRIGGER_KINDS.includes(trigger.kind)) continue;
            if (subject && !matchesContext(trigger.context, subject)) continue;
            commands.push({
                pluginName: plugin.name,
                triggerId: trigger.id,
                label: trigger.commandName ?? trigger.id,
                shortcut: trigger.shortcut,
                kind: trigger.kind,
            });
        }
        if (commands.length > 0) {
            groups.push({ pluginName: plugin.name, commands });
        }
    }
    return groups;
}

export function findTrigger(
    snapshot: RegistrySnapshot,
    pluginName: string,
    triggerId: string,
): TriggerMatch | undefined {
    const plugin = snapshot.plugins.find(p => p.name === pluginName);
    const trigger = plugin?.triggers.find(t => t.id === triggerId);
    return plugin && trigger ? { plugin, trigger } : undefined;
}
