import { ActionExecutor } from '../actions/executor.js';
import type { CapabilityBridge, ExecutionContext } from '../bridge/types.js';
import { captureContext } from '../bridge/types.js';
import type { EngineConfig } from '../config/schema.js';
import { ActionError, PluginEngineError, describeError } from '../errors.js';
import type { Logger } from '../logging/logger.js';
import { createSilentLogger } from '../logging/logger.js';
import { PluginRegistry } from '../plugins/registry.js';
import type { RegistrySnapshot } from '../plugins/types.js';
import { createScriptEngines, type ScriptEngines } from '../scripting/index.js';
import { findTrigger, triggersFor, type TriggerMatch } from '../triggers/matcher.js';

export interface InvocationReport {
    pluginName: string;
    triggerId: string;
    actionId: string;
    success: boolean;
    error?: Error;
    durationMs: number;
}

export interface PluginHostOptions {
    registry: PluginRegistry;
    executor: ActionExecutor;
    logger?: Logger;
}

export type EventKind = 'on_save' | 'on_open';

/**
 * Plugin Host — the facade an editor talks to
 *
 * Every invocation captures its context from the bridge, resolves against
 * the snapshot current when it starts, and runs behind every invocation
 * queued before it. Failures are reported to the user through the bridge
 * and returned in the reports; they are never thrown.
 */
export class PluginHost {
    readonly registry: PluginRegistry;
    private executor: ActionExecutor;
    private logger: Logger;
    private queue: Promise<unknown> = Promise.resolve();

    constructor(options: PluginHostOptions) {
        this.registry = options.registry;
        this.executor = options.executor;
        this.logger = options.logger ?? createSilentLogger();
    }

    /**
     * Load the registry and build the standard engines from configuration
     */
    static async create(config: EngineConfig, logger: Logger = createSilentLogger(), engines?: ScriptEngines): Promise<PluginHost> {
        const registry = await PluginRegistry.load(config.pluginsDir, logger.child('registry'));
        const executor = new ActionExecutor({
            engines: engines ?? createScriptEngines({ scriptTimeoutMs: config.scriptTimeoutMs }),
            shell: config.shell,
            commandTimeoutMs: config.commandTimeoutMs,
            logger: logger.child('actions'),
        });
        return new PluginHost({ registry, executor, logger });
    }

    /**
     * Run the action bound to a command or shortcut trigger
     */
    runCommand(pluginName: string, triggerId: string, bridge: CapabilityBridge): Promise<InvocationReport> {
        return this.enqueue(async () => {
            const start = Date.now();
            const match = findTrigger(this.registry.snapshot, pluginName, triggerId);
            if (!match) {
                const error = new PluginEngineError(
                    'UNKNOWN_TRIGGER',
                    `Plugin "${pluginName}" has no trigger "${triggerId}"`,
                );
                this.report(bridge, pluginName, error);
                return { pluginName, triggerId, actionId: '', success: false, error, durationMs: Date.now() - start };
            }

            let context: ExecutionContext;
            try {
                context = captureContext(bridge);
            } catch (err) {
                const error = toError(err);
                this.report(bridge, pluginName, error);
                return {
                    pluginName,
                    triggerId,
                    actionId: match.trigger.actionId,
                    success: false,
                    error,
                    durationMs: Date.now() - start,
                };
            }

            return this.invoke(match, bridge, context);
        });
    }

    fileSaved(bridge: CapabilityBridge): Promise<InvocationReport[]> {
        return this.fire('on_save', bridge);
    }

    fileOpened(bridge: CapabilityBridge): Promise<InvocationReport[]> {
        return this.fire('on_open', bridge);
    }

    /**
     * Every matching trigger of `kind` runs, in registry order; a failure
     * only ends its own trigger.
     */
    fire(kind: EventKind, bridge: CapabilityBridge): Promise<InvocationReport[]> {
        return this.enqueue(async () => {
            let context: ExecutionContext;
            try {
                context = captureContext(bridge);
            } catch (err) {
                this.logger.warn(`Ignoring ${kind} event: ${describeError(err)}`);
                return [];
            }

            const snapshot: RegistrySnapshot = this.registry.snapshot;
            const matches = triggersFor(snapshot, kind, context);
            this.logger.debug(`${kind}: ${matches.length} trigger(s) for ${context.filePath ?? 'unsaved buffer'}`);

            const reports: InvocationReport[] = [];
            for (const match of matches) {
                reports.push(await this.invoke(match, bridge, context));
            }
            return reports;
        });
    }

    /**
     * Resolves once everything queued so far has finished
     */
    async idle(): Promise<void> {
        await this.queue;
    }

    private async invoke(match: TriggerMatch, bridge: CapabilityBridge, context: ExecutionContext): Promise<InvocationReport> {
        const { plugin, trigger } = match;
        const start = Date.now();
        try {
            await this.executor.execute(plugin, trigger.actionId, { bridge, context });
            this.logger.debug(`${plugin.name}/${trigger.id} completed`);
            return {
                pluginName: plugin.name,
                triggerId: trigger.id,
                actionId: trigger.actionId,
                success: true,
                durationMs: Date.now() - start,
            };
        } catch (err) {
            const error = toError(err);
            this.report(bridge, plugin.name, error, trigger.actionId);
            return {
                pluginName: plugin.name,
                triggerId: trigger.id,
                actionId: trigger.actionId,
                success: false,
                error,
                durationMs: Date.now() - start,
            };
        }
    }

    private report(bridge: CapabilityBridge, pluginName: string, error: Error, actionId?: string): void {
        const message = actionId && !(error instanceof ActionError)
            ? `Action "${actionId}" failed: ${error.message}`
            : error.message;
        this.logger.error(`${pluginName}: ${message}`);
        try {
            bridge.notify(message, `Plugin error: ${pluginName}`);
        } catch (notifyErr) {
            this.logger.error(`Could not notify about ${pluginName}: ${describeError(notifyErr)}`);
        }
    }

    private enqueue<T>(task: () => Promise<T>): Promise<T> {
        const run = this.queue.then(task);
        // keep the queue alive after a failed task; callers still see the rejection
        this.queue = run.catch((err: unknown) => {
            this.logger.error(`Plugin invocation crashed: ${describeError(err)}`);
        });
        return run;
    }
}

function toError(err: unknown): Error {
    return err instanceof Error ? err : new Error(describeError(err));
}
