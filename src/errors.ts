/**
 * Error taxonomy for the plugin engine.
 *
 * Every failure the engine raises extends PluginEngineError and carries a
 * stable `code`, so hosts can branch on the class or on the code alone.
 */

export type ErrorCode =
    | 'DISCOVERY_FAILED'
    | 'VALIDATION_FAILED'
    | 'ACTION_FAILED'
    | 'CHAIN_FAILED'
    | 'SCRIPT_FAILED'
    | 'BRIDGE_UNAVAILABLE'
    | 'UNKNOWN_TRIGGER'
    | 'CONFIG_INVALID';

export class PluginEngineError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'PluginEngineError';
        this.code = code;
    }
}

/**
 * The plugin root itself could not be read.
 */
export class DiscoveryError extends PluginEngineError {
    constructor(readonly rootDir: string, cause?: unknown) {
        super('DISCOVERY_FAILED', `Cannot read plugin directory "${rootDir}": ${describeError(cause)}`, { cause });
        this.name = 'DiscoveryError';
    }
}

/**
 * A plugin definition is malformed or self-inconsistent. The whole plugin is rejected.
 */
export class ValidationError extends PluginEngineError {
    constructor(
        readonly pluginDir: string,
        readonly issues: string[],
        readonly pluginName?: string,
    ) {
        const label = pluginName ? `"${pluginName}" (${pluginDir})` : pluginDir;
        super('VALIDATION_FAILED', `Invalid plugin ${label}: ${issues.join('; ')}`);
        this.name = 'ValidationError';
    }
}

export interface ActionErrorDetails {
    exitCode?: number | null;
    stderr?: string;
    cause?: unknown;
}

export class ActionError extends PluginEngineError {
    readonly exitCode: number | null;
    readonly stderr: string;

    constructor(
        readonly pluginName: string,
        readonly actionId: string,
        message: string,
        details: ActionErrorDetails = {},
        code: ErrorCode = 'ACTION_FAILED',
    ) {
        super(code, `Action "${actionId}" of plugin "${pluginName}" failed: ${message}`, { cause: details.cause });
        this.name = 'ActionError';
        this.exitCode = details.exitCode ?? null;
        this.stderr = details.stderr ?? '';
    }
}

/**
 * A chain stopped at its first failing member. Earlier members are not rolled back.
 */
export class ChainError extends ActionError {
    constructor(
        pluginName: string,
        chainId: string,
        readonly memberId: string,
        readonly memberIndex: number,
        cause: unknown,
    ) {
        super(
            pluginName,
            chainId,
            `step ${memberIndex + 1} ("${memberId}") failed: ${describeError(cause)}`,
            { cause },
            'CHAIN_FAILED',
        );
        this.name = 'ChainError';
    }
}

export type EngineId = 'lua' | 'javascript';

/**
 * Load failure, missing entry point, or an unhandled fault inside a sandboxed interpreter.
 */
export class ScriptError extends PluginEngineError {
    readonly engineMessage: string;

    constructor(readonly engine: EngineId, message: string, cause?: unknown) {
        super('SCRIPT_FAILED', `[${engine}] ${message}`, { cause });
        this.name = 'ScriptError';
        this.engineMessage = message;
    }
}

/**
 * A capability was used while no editor document is active.
 */
export class BridgeError extends PluginEngineError {
    constructor(readonly operation: string, message = 'no active editor document') {
        super('BRIDGE_UNAVAILABLE', `Cannot ${operation}: ${message}`);
        this.name = 'BridgeError';
    }
}

export class ConfigError extends PluginEngineError {
    constructor(readonly configPath: string, readonly issues: string[]) {
        super('CONFIG_INVALID', `Invalid configuration in ${configPath}: ${issues.join('; ')}`);
        this.name = 'ConfigError';
    }
}

/**
 * One-line description of any thrown value
 */
export function describeError(err: unknown): string {
    if (err instanceof Error) return err.message;
    if (typeof err === 'string') return err;
    // errors thrown inside a vm context are not instances of this realm's Error
    if (typeof err === 'object' && err !== null && 'message' in err && typeof err.message === 'string') {
        return 'name' in err && typeof err.name === 'string' && err.name !== 'Error'
            ? `${err.name}: ${err.message}`
            : err.message;
    }
    if (err === undefined || err === null) return 'unknown error';
    try {
        return JSON.stringify(err);
    } catch {
        return String(err);
    }
}
