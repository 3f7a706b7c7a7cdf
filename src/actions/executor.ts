import { readFile, realpath } from 'node:fs/promises';
import path from 'node:path';
import type { CapabilityBridge, ExecutionContext } from '../bridge/types.js';
import { ActionError, ChainError, ScriptError, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import type {
    ActionType,
    ChainAction,
    ExternalCommandAction,
    NotifyAction,
    Plugin,
    ScriptAction,
    SnippetAction,
    TransformAction,
} from '../plugins/types.js';
import { assertInside } from '../plugins/validation.js';
import type { ScriptEngines } from '../scripting/index.js';
import { runCommand, type CommandResult } from './command-runner.js';
import { interpolate, shellQuote, templateVariables } from './template.js';
import { applyTransform } from './transforms.js';

export interface ActionExecutorOptions {
    engines: ScriptEngines;
    /** Shell handed external_command templates */
    shell?: string;
    commandTimeoutMs?: number;
    logger?: Logger;
    /** Clock for snippet dates */
    now?: () => Date;
}

export interface ExecutionRequest {
    bridge: CapabilityBridge;
    /** Captured when the invocation started; file identity for templates */
    context: ExecutionContext;
}

export interface ActionResult {
    pluginName: string;
    actionId: string;
    type: ActionType;
    durationMs: number;
}

/**
 * Action Executor — interprets one action against the live buffer
 *
 * Built-in variants go straight to the capability bridge, `script` goes
 * through the engine registered for its engine id. Failures surface as
 * ActionError (ChainError for chains), ScriptError or BridgeError.
 */
export class ActionExecutor {
    private engines: ScriptEngines;
    private shell: string;
    private commandTimeoutMs: number;
    private logger: Logger;
    private now: () => Date;

    constructor(options: ActionExecutorOptions) {
        this.engines = options.engines;
        this.shell = options.shell ?? '/bin/sh';
        this.commandTimeoutMs = options.commandTimeoutMs ?? 30_000;
        this.logger = options.logger ?? createSilentLogger();
        this.now = options.now ?? (() => new Date());
    }

    async execute(plugin: Plugin, actionId: string, request: ExecutionRequest): Promise<ActionResult> {
        const action = plugin.actions.get(actionId);
        if (!action) {
            throw new ActionError(plugin.name, actionId, 'action is not defined');
        }

        const start = Date.now();
        this.logger.debug(`${plugin.name}: running ${action.type} action "${actionId}"`);

        switch (action.type) {
            case 'transform':
                this.transform(action, request.bridge);
                break;
            case 'snippet':
                this.snippet(action, request);
                break;
            case 'notify':
                this.notify(plugin, action, request);
                break;
            case 'external_command':
                await this.externalCommand(plugin, actionId, action, request);
                break;
            case 'chain':
                await this.chain(plugin, actionId, action, request);
                break;
            case 'script':
                await this.script(plugin, actionId, action, request.bridge);
                break;
        }

        return { pluginName: plugin.name, actionId, type: action.type, durationMs: Date.now() - start };
    }

    // ─── Built-in actions ───

    /**
     * The selection when there is one, otherwise the whole buffer
     */
    private transform(action: TransformAction, bridge: CapabilityBridge): void {
        const selected = bridge.getSelection();
        if (selected.length > 0) {
            bridge.replaceSelection(applyTransform(action.operation, selected));
        } else {
            bridge.setText(applyTransform(action.operation, bridge.getText()));
        }
    }

    private snippet(action: SnippetAction, { bridge, context }: ExecutionRequest): void {
        bridge.insertText(interpolate(action.template, templateVariables(context, this.now())));
    }

    private notify(plugin: Plugin, action: NotifyAction, { bridge, context }: ExecutionRequest): void {
        const vars = templateVariables(context, this.now());
        bridge.notify(interpolate(action.message, vars), action.title ?? plugin.name);
    }

    /**
     * Pipe buffer text through a shell command. Output is applied only after
     * a zero exit; every failure leaves the buffer as it was.
     */
    private async externalCommand(
        plugin: Plugin,
        actionId: string,
        action: ExternalCommandAction,
        { bridge, context }: ExecutionRequest,
    ): Promise<void> {
        let input: string | null = null;
        if (action.input === 'file') {
            input = bridge.getText();
        } else if (action.input === 'selection') {
            input = bridge.getSelection();
            if (input.length === 0) {
                throw new ActionError(plugin.name, actionId, 'input "selection" needs a non-empty selection');
            }
        }

        const command = interpolate(action.command, templateVariables(context, this.now()), shellQuote);
        const timeoutMs = action.timeoutMs ?? this.commandTimeoutMs;

        let result: CommandResult;
        try {
            result = await runCommand({
                command,
                input,
                cwd: context.filePath ? path.dirname(context.filePath) : plugin.dir,
                env: {
                    EDPLUG_PLUGIN: plugin.name,
                    EDPLUG_PLUGIN_DIR: plugin.dir,
                    EDPLUG_FILE_PATH: context.filePath ?? '',
                    EDPLUG_LANGUAGE: context.language,
                },
                timeoutMs,
                shell: this.shell,
            });
        } catch (err) {
            throw new ActionError(plugin.name, actionId, `cannot run command: ${describeError(err)}`, { cause: err });
        }

        if (result.timedOut) {
            throw new ActionError(plugin.name, actionId, `command timed out after ${timeoutMs}ms`, {
                stderr: result.stderr,
            });
        }
        if (result.exitCode !== 0) {
            const status = result.exitCode === null ? `killed by ${result.signal ?? 'signal'}` : `exited with status ${result.exitCode}`;
            const detail = result.stderr.trim();
            throw new ActionError(plugin.name, actionId, detail ? `command ${status}: ${detail}` : `command ${status}`, {
                exitCode: result.exitCode,
                stderr: result.stderr,
            });
        }

        const output = action.trimOutput ? result.stdout.replace(/[\r\n]+$/, '') : result.stdout;
        this.logger.debug(`${plugin.name}: "${actionId}" finished in ${result.durationMs}ms`);

        switch (action.output) {
            case 'replace_file':
                bridge.setText(output);
                break;
            case 'replace_selection':
                bridge.replaceSelection(output);
                break;
            case 'notify':
                bridge.notify(output, plugin.name);
                break;
            case 'discard':
                break;
        }
    }

    /**
     * Members run in order on the live buffer; the first failure stops the chain
     */
    private async chain(plugin: Plugin, chainId: string, action: ChainAction, request: ExecutionRequest): Promise<void> {
        for (const [index, memberId] of action.actions.entries()) {
            try {
                await this.execute(plugin, memberId, request);
            } catch (err) {
                throw new ChainError(plugin.name, chainId, memberId, index, err);
            }
        }
    }

    // ─── Scripts ───

    private async script(plugin: Plugin, actionId: string, action: ScriptAction, bridge: CapabilityBridge): Promise<void> {
        const engine = this.engines.get(action.engine);
        if (!engine) {
            throw new ActionError(plugin.name, actionId, `script engine "${action.engine}" is not available`);
        }

        let source: string;
        let chunkName: string;
        if (action.source.kind === 'inline') {
            source = action.source.code;
            chunkName = `${plugin.name}/${actionId}`;
        } else {
            const file = await this.resolveScriptFile(plugin, actionId, action, action.source.path);
            try {
                source = await readFile(file, 'utf-8');
            } catch (err) {
                throw new ScriptError(action.engine, `cannot read ${action.source.path}: ${describeError(err)}`, err);
            }
            chunkName = action.source.path;
        }

        await engine.run(source, action.entry, bridge, {
            chunkName,
            logger: this.logger.child(plugin.name),
        });
    }

    /**
     * Resolve a script path against the plugin directory, rejecting any
     * path that leaves it, before or after following symlinks.
     */
    private async resolveScriptFile(plugin: Plugin, actionId: string, action: ScriptAction, relative: string): Promise<string> {
        const file = path.resolve(plugin.dir, relative);
        const reject = (err: unknown): ActionError =>
            new ActionError(plugin.name, actionId, `script file rejected: ${describeError(err)}`, { cause: err });

        try {
            assertInside(file, plugin.dir);
        } catch (err) {
            throw reject(err);
        }

        let realFile: string;
        let realDir: string;
        try {
            [realFile, realDir] = await Promise.all([realpath(file), realpath(plugin.dir)]);
        } catch (err) {
            throw new ScriptError(action.engine, `cannot read ${relative}: ${describeError(err)}`, err);
        }

        try {
            assertInside(realFile, realDir);
        } catch (err) {
            throw reject(err);
        }
        return realFile;
    }
}
