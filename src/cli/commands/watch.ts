import { Command } from 'commander';
import chalk from 'chalk';
import { PluginRegistry } from '../../plugins/registry.js';
import type { RegistrySnapshot } from '../../plugins/types.js';
import { loadRuntime } from '../context.js';

function summarize(snapshot: RegistrySnapshot): string {
    const rejected = snapshot.errors.length > 0 ? chalk.red(`, ${snapshot.errors.length} rejected`) : '';
    return `generation ${snapshot.generation}: ${snapshot.plugins.length} plugin(s)${rejected}`;
}

export function createWatchCommand(): Command {
    return new Command('watch')
        .description('Reload plugins whenever the plugin directory changes')
        .action(async () => {
            const { config, logger } = await loadRuntime();
            const registry = await PluginRegistry.load(config.pluginsDir, logger.child('registry'));

            console.log(chalk.bold(`\n👀 Watching ${registry.root}`));
            console.log(chalk.dim(`  ${summarize(registry.snapshot)}`));
            console.log(chalk.dim('  Press Ctrl+C to stop.\n'));

            const watcher = registry.watch({
                debounceMs: config.watch.debounceMs,
                onReload: (snapshot) => {
                    console.log(`${chalk.cyan('↻')} ${summarize(snapshot)}`);
                    for (const error of snapshot.errors) {
                        console.log(chalk.dim(`    ${error.message}`));
                    }
                },
            });

            await new Promise<void>((resolve) => {
                process.once('SIGINT', () => resolve());
                process.once('SIGTERM', () => resolve());
            });
            await watcher.close();
        });
}
