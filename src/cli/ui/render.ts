import chalk from 'chalk';
import type { InvocationReport } from '../../host/host.js';
import type { RegistrySnapshot } from '../../plugins/types.js';
import type { CommandGroup } from '../../triggers/matcher.js';

/**
 * Render a section separator
 */
export function renderSeparator(): void {
    console.log(chalk.dim('  ' + '─'.repeat(56)));
}

/**
 * Render plugins with their triggers, then every rejected plugin
 */
export function renderSnapshot(snapshot: RegistrySnapshot): void {
    if (snapshot.plugins.length === 0 && snapshot.errors.length === 0) {
        console.log(chalk.dim(`\nNo plugins in ${snapshot.rootDir}.`));
        console.log(chalk.dim(`Create one with:\n  ${chalk.white('edplug plugins init <name>')}\n`));
        return;
    }

    console.log(chalk.bold(`\n🔌 Plugins (${snapshot.plugins.length})\n`));

    for (const plugin of snapshot.plugins) {
        const author = plugin.author ? chalk.dim(` by ${plugin.author}`) : '';
        console.log(`  ${chalk.cyan.bold(plugin.name)} ${chalk.dim(`v${plugin.version}`)}${author}`);
        if (plugin.description) {
            console.log(`    ${plugin.description}`);
        }
        for (const trigger of plugin.triggers) {
            const action = plugin.actions.get(trigger.actionId);
            const label = trigger.kind === 'command' ? ` "${trigger.commandName ?? trigger.id}"` : '';
            const key = trigger.shortcut ? chalk.yellow(` [${trigger.shortcut}]`) : '';
            console.log(chalk.dim(`    ${trigger.kind.padEnd(8)} ${trigger.id}${label}${key} → ${trigger.actionId} (${action?.type ?? '?'})`));
        }
        console.log();
    }

    if (snapshot.errors.length > 0) {
        renderSeparator();
        console.log(chalk.red.bold(`  ✗ Rejected (${snapshot.errors.length})\n`));
        for (const error of snapshot.errors) {
            console.log(`  ${chalk.red(error.pluginName ?? error.pluginDir)}`);
            for (const issue of error.issues) {
                console.log(chalk.dim(`    - ${issue}`));
            }
        }
        console.log();
    }
}

export function renderCommands(groups: CommandGroup[]): void {
    if (groups.length === 0) {
        console.log(chalk.dim('\nNo commands available.\n'));
        return;
    }

    console.log();
    for (const group of groups) {
        console.log(chalk.cyan.bold(`  ${group.pluginName}`));
        for (const command of group.commands) {
            const key = command.shortcut ? chalk.yellow(`  ${command.shortcut}`) : '';
            console.log(`    ${command.label}${key} ${chalk.dim(`(${group.pluginName} ${command.triggerId})`)}`);
        }
    }
    console.log();
}

/**
 * One line per invocation; errors are printed in full
 */
export function renderReports(reports: InvocationReport[]): void {
    for (const report of reports) {
        const name = `${report.pluginName}/${report.triggerId}`;
        if (report.success) {
            console.error(chalk.green(`  ✓ ${name}`) + chalk.dim(` (${report.durationMs}ms)`));
        } else {
            console.error(chalk.red(`  ✗ ${name}: ${report.error?.message ?? 'failed'}`));
        }
    }
}
