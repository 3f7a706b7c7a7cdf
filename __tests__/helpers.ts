import { mkdtemp, mkdir, rm, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';
import { stringify } from 'yaml';

/**
 * Fresh temporary directory; pair with `removeDir` in afterEach
 */
export async function makeTempDir(prefix = 'edplug-test-'): Promise<string> {
    return mkdtemp(path.join(os.tmpdir(), prefix));
}

export async function removeDir(dir: string): Promise<void> {
    await rm(dir, { recursive: true, force: true });
}

/**
 * Write `definition` as `<root>/<dirName>/plugin.json` (or plugin.yaml) and return the plugin directory
 */
export async function writePlugin(
    root: string,
    dirName: string,
    definition: unknown,
    format: 'json' | 'yaml' = 'json',
): Promise<string> {
    const dir = path.join(root, dirName);
    await mkdir(dir, { recursive: true });
    const file = format === 'json' ? 'plugin.json' : 'plugin.yaml';
    const content = format === 'json' ? JSON.stringify(definition, null, 2) : stringify(definition);
    await writeFile(path.join(dir, file), content, 'utf-8');
    return dir;
}

export async function writeFileIn(dir: string, relative: string, content: string): Promise<string> {
    const file = path.join(dir, relative);
    await mkdir(path.dirname(file), { recursive: true });
    await writeFile(file, content, 'utf-8');
    return file;
}
