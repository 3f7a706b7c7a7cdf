/**
 * Script Engines — Types
 *
 * Each engine runs plugin-supplied source with the capability bridge as
 * its only way out. The bridge is injected as the global `editor`; the
 * entry point is called with no arguments and its return value ignored.
 */

import type { CapabilityBridge } from '../bridge/types.js';
import type { EngineId } from '../errors.js';
import type { Logger } from '../logging/logger.js';

export type { EngineId };

export interface ScriptRunOptions {
    /** Name used in interpreter error messages, e.g. the script's path */
    chunkName?: string;
    /** Receives the script's print / console output */
    logger?: Logger;
}

export interface ScriptEngine {
    readonly id: EngineId;
    /**
     * Load `source`, then call `entryPoint`. Every failure surfaces as ScriptError.
     */
    run(source: string, entryPoint: string, bridge: CapabilityBridge, options?: ScriptRunOptions): Promise<void>;
}

/** Bridge operations scripts may call, by name */
export type BridgeOperation =
    | 'getText'
    | 'setText'
    | 'getSelection'
    | 'replaceSelection'
    | 'insertText'
    | 'getCursor'
    | 'setCursor'
    | 'getFilePath'
    | 'getLanguage'
    | 'notify';
