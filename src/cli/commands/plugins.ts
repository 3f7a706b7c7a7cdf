import { Command } from 'commander';
import chalk from 'chalk';
import path from 'node:path';
import { PluginLoader } from '../../plugins/loader.js';
import { scaffoldPlugin } from '../../plugins/scaffold.js';
import { loadRuntime } from '../context.js';
import { renderSnapshot } from '../ui/render.js';
import { Spinner } from '../ui/spinner.js';

export function createPluginsCommand(): Command {
    const cmd = new Command('plugins')
        .description('Inspect and create plugins');

    // ─── List plugins ───
    cmd.command('list')
        .description('List plugins, their triggers and any validation errors')
        .action(async () => {
            const { config, logger } = await loadRuntime();
            const snapshot = await new PluginLoader(logger.child('registry')).load(config.pluginsDir);
            renderSnapshot(snapshot);
        });

    // ─── Validate a plugin directory ───
    cmd.command('validate')
        .description('Validate every plugin under a directory (exit status 1 on any rejection)')
        .argument('[dir]', 'Plugin root (defaults to the configured plugin directory)')
        .action(async (dir: string | undefined) => {
            const { config } = await loadRuntime();
            const root = dir ? path.resolve(dir) : config.pluginsDir;

            const spinner = new Spinner();
            spinner.start(`Validating plugins in ${root}`);
            const snapshot = await new PluginLoader().load(root);

            if (snapshot.errors.length === 0) {
                spinner.success(`${snapshot.plugins.length} plugin(s) valid`);
                return;
            }

            spinner.fail(`${snapshot.errors.length} plugin(s) rejected, ${snapshot.plugins.length} valid`);
            for (const error of snapshot.errors) {
                console.log(`  ${chalk.red(error.pluginName ?? path.basename(error.pluginDir))}`);
                for (const issue of error.issues) {
                    console.log(chalk.dim(`    - ${issue}`));
                }
            }
            process.exitCode = 1;
        });

    // ─── Scaffold a plugin ───
    cmd.command('init')
        .description('Create a sample plugin in the plugin directory')
        .argument('<name>', 'Plugin name (also its directory name)')
        .action(async (name: string) => {
            const { config } = await loadRuntime();
            const dir = await scaffoldPlugin(config.pluginsDir, name);
            console.log(chalk.green(`✓ Created ${dir}`));
            console.log(chalk.dim(`  Try it: ${chalk.white(`edplug run ${name} shout --file <file> --select 0:5`)}`));
        });

    // ─── Plugin directory ───
    cmd.command('path')
        .description('Print the plugin directory')
        .action(async () => {
            const { config } = await loadRuntime();
            console.log(config.pluginsDir);
        });

    return cmd;
}
