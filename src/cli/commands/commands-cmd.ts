import { Command } from 'commander';
import path from 'node:path';
import { PluginRegistry } from '../../plugins/registry.js';
import { languageForPath } from '../../utils/language.js';
import { loadRuntime } from '../context.js';
import { renderCommands } from '../ui/render.js';

export function createCommandsCommand(): Command {
    return new Command('commands')
        .description('List the commands and shortcuts plugins offer')
        .option('-f, --file <path>', 'Only commands whose context matches this file')
        .action(async (options: { file?: string }) => {
            const { config, logger } = await loadRuntime();
            const registry = await PluginRegistry.load(config.pluginsDir, logger.child('registry'));

            const subject = options.file
                ? { filePath: path.resolve(options.file), language: languageForPath(options.file) }
                : undefined;
            renderCommands(registry.commands(subject));
        });
}
