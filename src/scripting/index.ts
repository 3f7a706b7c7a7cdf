import type { EngineId } from '../errors.js';
import { JavaScriptEngine } from './javascript-engine.js';
import { LuaScriptEngine } from './lua-engine.js';
import type { ScriptEngine } from './types.js';

export type ScriptEngines = ReadonlyMap<EngineId, ScriptEngine>;

export interface EngineSetOptions {
    scriptTimeoutMs?: number;
}

/**
 * The standard engine set. Adding an engine means adding an entry here;
 * the executor only ever looks engines up by id.
 */
export function createScriptEngines(options: EngineSetOptions = {}): ScriptEngines {
    const engines: ScriptEngine[] = [
        new LuaScriptEngine(),
        new JavaScriptEngine({ timeoutMs: options.scriptTimeoutMs }),
    ];
    return new Map(engines.map(engine => [engine.id, engine]));
}

export { JavaScriptEngine } from './javascript-engine.js';
export { LuaScriptEngine } from './lua-engine.js';
export type { ScriptEngine, ScriptRunOptions } from './types.js';
