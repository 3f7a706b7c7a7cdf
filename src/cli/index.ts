import { Command } from 'commander';
import { createPluginsCommand } from './commands/plugins.js';
import { createCommandsCommand } from './commands/commands-cmd.js';
import { createFireCommand, createRunCommand } from './commands/run.js';
import { createWatchCommand } from './commands/watch.js';

export const VERSION = '0.1.0';

export function createCLI(): Command {
    const program = new Command('edplug')
        .description('Run editor plugins (triggers, actions and sandboxed scripts) from the terminal')
        .version(VERSION);

    program.addCommand(createPluginsCommand());
    program.addCommand(createCommandsCommand());
    program.addCommand(createRunCommand());
    program.addCommand(createFireCommand());
    program.addCommand(createWatchCommand());

    return program;
}
