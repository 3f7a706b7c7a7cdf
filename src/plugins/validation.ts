import path from 'node:path';
import { invalidGlobClasses } from '../triggers/glob.js';
import type { PluginDefinition } from './schema.js';

/**
 * Semantic checks that the schema alone cannot express. Each returns a
 * list of issue strings; an empty list means the definition is coherent.
 */
export function validateDefinition(def: PluginDefinition, pluginDir: string): string[] {
    return [
        ...checkTriggers(def),
        ...checkScriptSources(def, pluginDir),
        ...checkChains(def),
    ];
}

function checkTriggers(def: PluginDefinition): string[] {
    const issues: string[] = [];
    const seen = new Set<string>();

    def.triggers.forEach((trigger, index) => {
        const where = `triggers.${index} ("${trigger.id}")`;
        if (seen.has(trigger.id)) {
            issues.push(`${where}: duplicate trigger id`);
        }
        seen.add(trigger.id);

        if (!Object.hasOwn(def.actions, trigger.action_id)) {
            issues.push(`${where}: action "${trigger.action_id}" is not defined`);
        }
        if (trigger.type === 'shortcut' && !trigger.shortcut) {
            issues.push(`${where}: shortcut triggers need a "shortcut" key combination`);
        }
        for (const pattern of trigger.context?.file_patterns ?? []) {
            for (const bad of invalidGlobClasses(pattern)) {
                issues.push(`${where}: file pattern "${pattern}" has an invalid character class ${bad}`);
            }
        }
    });

    return issues;
}

function checkScriptSources(def: PluginDefinition, pluginDir: string): string[] {
    const issues: string[] = [];

    for (const [id, action] of Object.entries(def.actions)) {
        if (action.type !== 'script') continue;

        const hasFile = action.file !== undefined;
        const hasCode = action.code !== undefined;
        if (hasFile === hasCode) {
            issues.push(`actions.${id}: script actions need exactly one of "file" or "code"`);
            continue;
        }
        if (action.file !== undefined && !isInside(path.resolve(pluginDir, action.file), pluginDir)) {
            issues.push(`actions.${id}: script file "${action.file}" escapes the plugin directory`);
        }
    }

    return issues;
}

/**
 * Every chain member must exist in the same plugin, and no chain may reach
 * itself through any path of nested chains.
 */
function checkChains(def: PluginDefinition): string[] {
    const issues: string[] = [];
    const reported = new Set<string>();
    // chains whose whole member closure has been walked
    const done = new Set<string>();

    for (const [id, action] of Object.entries(def.actions)) {
        if (action.type !== 'chain') continue;
        for (const member of action.actions) {
            if (!Object.hasOwn(def.actions, member)) {
                issues.push(`actions.${id}: chain member "${member}" is not defined`);
            }
        }
    }

    const visit = (id: string, trail: string[]): void => {
        const action = def.actions[id];
        if (!action || action.type !== 'chain' || done.has(id)) return;

        for (const member of action.actions) {
            const loopStart = trail.indexOf(member);
            if (loopStart !== -1) {
                const cycle = [...trail.slice(loopStart), member];
                const key = [...cycle].slice(0, -1).sort().join('|');
                if (!reported.has(key)) {
                    reported.add(key);
                    issues.push(`actions.${id}: chain cycle ${cycle.join(' -> ')}`);
                }
                continue;
            }
            visit(member, [...trail, member]);
        }
        done.add(id);
    };

    for (const [id, action] of Object.entries(def.actions)) {
        if (action.type === 'chain') visit(id, [id]);
    }

    return issues;
}

/**
 * True when `target` is `root` or lies below it
 */
export function isInside(target: string, root: string): boolean {
    const resolvedTarget = path.resolve(target);
    const resolvedRoot = path.resolve(root);
    return resolvedTarget === resolvedRoot || resolvedTarget.startsWith(resolvedRoot + path.sep);
}

/**
 * Throws when `target` escapes `root`
 */
export function assertInside(target: string, root: string): void {
    if (!isInside(target, root)) {
        throw new Error(`Path traversal detected: "${target}" escapes "${root}"`);
    }
}
