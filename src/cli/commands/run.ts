import { Command } from 'commander';
import { DocumentBridge } from '../../bridge/document.js';
import { PluginHost, type EventKind } from '../../host/host.js';
import { emitDocument, loadRuntime, openDocument, printNotification } from '../context.js';
import { renderReports } from '../ui/render.js';

interface RunOptions {
    file: string;
    select?: string;
    write?: boolean;
}

export function createRunCommand(): Command {
    return new Command('run')
        .description('Run a command or shortcut trigger against a file')
        .argument('<plugin>', 'Plugin name')
        .argument('<trigger>', 'Trigger id')
        .requiredOption('-f, --file <path>', 'File to load into the buffer')
        .option('-s, --select <start:end>', 'Select a character range before running')
        .option('-w, --write', 'Write the result back instead of printing it')
        .action(async (pluginName: string, triggerId: string, options: RunOptions) => {
            const { config, logger } = await loadRuntime();
            const host = await PluginHost.create(config, logger);
            const doc = await openDocument(options.file, options.select);

            const report = await host.runCommand(pluginName, triggerId, new DocumentBridge(doc, printNotification));
            renderReports([report]);
            if (!report.success) {
                process.exitCode = 1;
                return;
            }
            await emitDocument(doc, options.write === true);
        });
}

const EVENTS: readonly EventKind[] = ['on_save', 'on_open'];

function isEventKind(value: string): value is EventKind {
    return EVENTS.some(event => event === value);
}

export function createFireCommand(): Command {
    return new Command('fire')
        .description('Run every on_save or on_open trigger matching a file')
        .argument('<event>', 'on_save | on_open')
        .argument('<file>', 'File the event is for')
        .option('-w, --write', 'Write the result back instead of printing it')
        .action(async (event: string, file: string, options: { write?: boolean }) => {
            if (!isEventKind(event)) {
                throw new Error(`Unknown event "${event}": expected ${EVENTS.join(' or ')}`);
            }

            const { config, logger } = await loadRuntime();
            const host = await PluginHost.create(config, logger);
            const doc = await openDocument(file);

            const reports = await host.fire(event, new DocumentBridge(doc, printNotification));
            renderReports(reports);
            if (reports.some(report => !report.success)) {
                process.exitCode = 1;
            }
            await emitDocument(doc, options.write === true);
        });
}
