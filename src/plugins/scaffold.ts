import { mkdir, writeFile, access } from 'node:fs/promises';
import path from 'node:path';
import { stringify } from 'yaml';
import type { PluginDefinitionInput } from './schema.js';

const PLUGIN_NAME = /^[A-Za-z0-9][A-Za-z0-9._-]*$/;

const SAMPLE_SCRIPT = `-- Called with no arguments; talk to the editor through the editor table.
function main()
    local stamp = os.date('%Y-%m-%d %H:%M')
    editor.insert_text('-- edited ' .. stamp .. '\\n')
    editor.notify('Inserted a timestamp', 'Sample plugin')
end
`;

function sampleDefinition(name: string): PluginDefinitionInput {
    return {
        name,
        version: '0.1.0',
        description: 'Sample plugin',
        author: '',
        triggers: [
            { id: 'shout', type: 'command', command_name: 'Uppercase selection', action_id: 'uppercase' },
            { id: 'stamp', type: 'shortcut', shortcut: 'Ctrl+Alt+T', action_id: 'timestamp' },
        ],
        actions: {
            uppercase: { type: 'transform', operation: 'uppercase' },
            timestamp: { type: 'script', engine: 'lua', file: 'scripts/stamp.lua' },
        },
    };
}

/**
 * Write a sample plugin (YAML definition plus a Lua script) to `<rootDir>/<name>`.
 * Refuses to touch an existing directory.
 */
export async function scaffoldPlugin(rootDir: string, name: string): Promise<string> {
    if (!PLUGIN_NAME.test(name)) {
        throw new Error(`Invalid plugin name "${name}": use letters, digits, ".", "_" or "-"`);
    }

    const dir = path.join(rootDir, name);
    const exists = await access(dir).then(() => true, () => false);
    if (exists) {
        throw new Error(`${dir} already exists`);
    }

    await mkdir(path.join(dir, 'scripts'), { recursive: true });
    await writeFile(path.join(dir, 'plugin.yaml'), stringify(sampleDefinition(name)), 'utf-8');
    await writeFile(path.join(dir, 'scripts', 'stamp.lua'), SAMPLE_SCRIPT, 'utf-8');
    return dir;
}
