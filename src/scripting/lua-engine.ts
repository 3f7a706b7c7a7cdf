import { LuaFactory, type LuaEngine } from 'wasmoon';
import type { CapabilityBridge } from '../bridge/types.js';
import { ScriptError, describeError } from '../errors.js';
import { invokeBridge } from './capabilities.js';
import type { ScriptEngine, ScriptRunOptions } from './types.js';

/**
 * Runs before any plugin code. Leaves the base, string, table, math, utf8
 * and coroutine libraries plus a clock-only `os`; everything that loads
 * code or touches files and processes is gone, including the copies kept
 * in `package.loaded`.
 */
const SANDBOX_PRELUDE = `
local clock, date, time, difftime = os.clock, os.date, os.time, os.difftime
for _, name in ipairs({ 'io', 'os', 'debug', 'package' }) do
    package.loaded[name] = nil
end
io, debug, package, require = nil, nil, nil, nil
dofile, loadfile, load, loadstring, collectgarbage = nil, nil, nil, nil, nil
string.dump = nil
os = { clock = clock, date = date, time = time, difftime = difftime }
`;

let sharedFactory: LuaFactory | null = null;

function getFactory(): LuaFactory {
    sharedFactory ??= new LuaFactory();
    return sharedFactory;
}

/**
 * Lua Engine — a Lua interpreter (wasmoon, Lua compiled to WebAssembly)
 *
 * Every run gets a fresh interpreter state that is closed afterwards, so
 * nothing a script defines survives into the next run. Scripts reach the
 * editor through the `editor` table; functions use dot calls
 * (`editor.get_text()`).
 */
export class LuaScriptEngine implements ScriptEngine {
    readonly id = 'lua' as const;

    async run(source: string, entryPoint: string, bridge: CapabilityBridge, options: ScriptRunOptions = {}): Promise<void> {
        let lua: LuaEngine;
        try {
            // proxies would let scripts index into host objects; tables are plain copies
            lua = await getFactory().createEngine({ enableProxy: false, injectObjects: false });
        } catch (err) {
            throw new ScriptError('lua', `cannot start interpreter: ${describeError(err)}`, err);
        }

        try {
            await lua.doString(SANDBOX_PRELUDE);

            const log = options.logger;
            lua.global.set('print', (...args: unknown[]) => {
                log?.info(args.map(value => (value === undefined || value === null ? 'nil' : String(value))).join('\t'));
            });
            lua.global.set('editor', createLuaApi(bridge));

            try {
                await lua.doString(source);
            } catch (err) {
                throw new ScriptError('lua', `failed to load ${options.chunkName ?? 'script'}: ${describeError(err)}`, err);
            }

            const entry: unknown = lua.global.get(entryPoint);
            if (typeof entry !== 'function') {
                throw new ScriptError('lua', `entry point "${entryPoint}" is not a function`);
            }

            try {
                entry();
            } catch (err) {
                throw new ScriptError('lua', `${entryPoint}() raised: ${describeError(err)}`, err);
            }
        } catch (err) {
            if (err instanceof ScriptError) throw err;
            throw new ScriptError('lua', describeError(err), err);
        } finally {
            lua.global.close();
        }
    }
}

/**
 * The `editor` table, snake_case in keeping with Lua naming
 */
function createLuaApi(bridge: CapabilityBridge): Record<string, (...args: unknown[]) => unknown> {
    return {
        get_text: () => invokeBridge(bridge, 'getText', []),
        set_text: (...args) => invokeBridge(bridge, 'setText', args),
        get_selection: () => invokeBridge(bridge, 'getSelection', []),
        replace_selection: (...args) => invokeBridge(bridge, 'replaceSelection', args),
        insert_text: (...args) => invokeBridge(bridge, 'insertText', args),
        get_cursor: () => invokeBridge(bridge, 'getCursor', []),
        set_cursor: (...args) => invokeBridge(bridge, 'setCursor', args),
        get_file_path: () => invokeBridge(bridge, 'getFilePath', []),
        get_language: () => invokeBridge(bridge, 'getLanguage', []),
        notify: (...args) => invokeBridge(bridge, 'notify', args),
    };
}
