import os from 'node:os';
import path from 'node:path';

/**
 * Application config directory: $EDPLUG_HOME, else ~/.config/edplug
 */
export function getConfigDir(): string {
    return process.env['EDPLUG_HOME'] ?? path.join(os.homedir(), '.config', 'edplug');
}

export function getConfigPath(): string {
    return path.join(getConfigDir(), 'config.yaml');
}
