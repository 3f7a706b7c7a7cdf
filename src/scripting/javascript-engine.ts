import vm from 'node:vm';
import type { CapabilityBridge } from '../bridge/types.js';
import { ScriptError, describeError } from '../errors.js';
import { invokeBridge, isBridgeOperation } from './capabilities.js';
import { findImportUse } from './source-scan.js';
import type { ScriptEngine, ScriptRunOptions } from './types.js';

export interface JavaScriptEngineOptions {
    /** Wall-clock limit for loading the source and for the entry call, each */
    timeoutMs?: number;
}

/**
 * Evaluated inside the sandbox. Builds the frozen `editor` and `console`
 * globals over two host callbacks that only exchange JSON strings, so no
 * host-realm object (and through it no host `Function`) reaches the script,
 * and strips what is left of the code-loading globals.
 *
 * `__sandbox` calls the entry point, tracks a returned promise and turns a
 * fault into a plain string, all inside the context and so under its
 * timeout. The returned function hands a fault the host caught back in.
 */
const BOOTSTRAP = `(function (invoke, log) {
    'use strict';
    const stringify = JSON.stringify;
    const toText = String;
    const apply = Reflect.apply;
    const then = Promise.prototype.then;
    let fault;
    let state = 'idle';
    const describe = (value) => {
        try {
            if (typeof value === 'string') return value;
            if (value === undefined || value === null) return 'unknown error';
            if (typeof value === 'object' || typeof value === 'function') {
                const message = value.message;
                if (typeof message === 'string') {
                    const name = value.name;
                    return typeof name === 'string' && name !== 'Error' ? name + ': ' + message : message;
                }
            }
            const text = stringify(value);
            return typeof text === 'string' ? text : toText(value);
        } catch (err) {
            return 'unprintable error';
        }
    };
    const sandbox = Object.freeze({
        call: (entry) => {
            let returned;
            try {
                returned = entry();
            } catch (err) {
                fault = err;
                return 'threw';
            }
            state = 'pending';
            try {
                apply(then, returned, [() => { state = 'done'; }, (err) => { fault = err; state = 'rejected'; }]);
            } catch (err) {
                // only a real promise is awaited, any other value is ignored
                state = 'done';
            }
            return state;
        },
        state: () => state,
        fault: () => describe(fault),
    });
    const call = (op, args) => {
        const reply = JSON.parse(invoke(op, JSON.stringify(args)));
        if (reply.error !== undefined) throw new Error(reply.error);
        return reply.value;
    };
    const editor = Object.freeze({
        getText: () => call('getText', []),
        setText: (text) => call('setText', [text]),
        getSelection: () => call('getSelection', []),
        replaceSelection: (text) => call('replaceSelection', [text]),
        insertText: (text) => call('insertText', [text]),
        getCursor: () => call('getCursor', []),
        setCursor: (line, column) => call('setCursor', [line, column]),
        getFilePath: () => call('getFilePath', []),
        getLanguage: () => call('getLanguage', []),
        notify: (message, title) => call('notify', [message, title]),
    });
    const format = (args) => args.map((value) => typeof value === 'string' ? value : JSON.stringify(value)).join(' ');
    const console = Object.freeze({
        log: (...args) => log('info', format(args)),
        info: (...args) => log('info', format(args)),
        warn: (...args) => log('warn', format(args)),
        error: (...args) => log('error', format(args)),
    });
    for (const name of ['eval', 'Function', 'WebAssembly', 'SharedArrayBuffer', 'Atomics']) {
        if (!delete globalThis[name]) globalThis[name] = undefined;
    }
    Object.defineProperty(globalThis, 'editor', { value: editor, enumerable: true });
    Object.defineProperty(globalThis, 'console', { value: console, enumerable: true });
    Object.defineProperty(globalThis, '__sandbox', { value: sandbox });
    return (value) => { fault = value; };
})`;

const ENTRY_NAME = /^[A-Za-z_$][A-Za-z0-9_$]*$/;

/**
 * JavaScript Engine — JavaScript in a fresh `node:vm` context
 *
 * The context has ECMAScript built-ins only (no `require`, `process`,
 * timers or `Buffer`), string and WebAssembly code generation are
 * disabled, and source using `import` is refused before it runs.
 * Microtasks drain inside each evaluation, so an async entry point runs
 * under the same timeout as a synchronous one.
 *
 * This is an in-process namespace restriction, not an isolation boundary.
 */
export class JavaScriptEngine implements ScriptEngine {
    readonly id = 'javascript' as const;
    private timeoutMs: number;

    constructor(options: JavaScriptEngineOptions = {}) {
        this.timeoutMs = options.timeoutMs ?? 5_000;
    }

    async run(source: string, entryPoint: string, bridge: CapabilityBridge, options: ScriptRunOptions = {}): Promise<void> {
        if (!ENTRY_NAME.test(entryPoint)) {
            throw new ScriptError('javascript', `invalid entry point name "${entryPoint}"`);
        }

        const filename = options.chunkName ?? 'plugin-script.js';
        const importLine = findImportUse(source);
        if (importLine !== null) {
            throw new ScriptError('javascript', `${filename}:${importLine}: module loading is not available to scripts`);
        }

        const context = vm.createContext(Object.create(null), {
            name: `plugin:${filename}`,
            codeGeneration: { strings: false, wasm: false },
            microtaskMode: 'afterEvaluate',
        });
        const evaluate = (code: string, name: string): unknown =>
            vm.runInContext(code, context, { filename: name, timeout: this.timeoutMs });

        const install: unknown = vm.runInContext(BOOTSTRAP, context, { filename: 'sandbox-bootstrap.js' });
        if (typeof install !== 'function') {
            throw new ScriptError('javascript', 'sandbox bootstrap failed');
        }
        const hold: unknown = install(
            (op: unknown, payload: unknown) => this.dispatch(bridge, op, payload),
            (level: unknown, message: unknown) => {
                const text = typeof message === 'string' ? message : '';
                if (level === 'warn') options.logger?.warn(text);
                else if (level === 'error') options.logger?.error(text);
                else options.logger?.info(text);
            },
        );
        if (typeof hold !== 'function') {
            throw new ScriptError('javascript', 'sandbox bootstrap failed');
        }

        // the held fault is only ever read back inside the context
        const fault = (stage: string): ScriptError => {
            let detail = 'unprintable error';
            try {
                const described = evaluate('__sandbox.fault()', 'sandbox-fault.js');
                if (typeof described === 'string') detail = described;
            } catch {
                options.logger?.debug('a script fault could not be described within the time limit');
            }
            return new ScriptError('javascript', `${stage}: ${detail}`);
        };
        const fail = (stage: string, err: unknown): ScriptError => {
            hold(err);
            return fault(stage);
        };

        try {
            new vm.Script(source, { filename }).runInContext(context, { timeout: this.timeoutMs });
        } catch (err) {
            throw fail(`failed to load ${filename}`, err);
        }

        let kind: unknown;
        try {
            kind = evaluate(`typeof ${entryPoint}`, filename);
        } catch (err) {
            throw fail('entry point lookup failed', err);
        }
        if (kind !== 'function') {
            throw new ScriptError('javascript', `entry point "${entryPoint}" is not a function`);
        }

        let outcome: unknown;
        try {
            const called = evaluate(`__sandbox.call(() => ${entryPoint}())`, `${filename}#${entryPoint}`);
            // reactions to a returned promise ran while the call drained its microtasks
            outcome = called === 'pending' ? evaluate('__sandbox.state()', `${filename}#${entryPoint}`) : called;
        } catch (err) {
            throw fail(`${entryPoint}() threw`, err);
        }

        switch (outcome) {
            case 'threw':
                throw fault(`${entryPoint}() threw`);
            case 'rejected':
                throw fault(`${entryPoint}() rejected`);
            case 'pending':
                // nothing outside the context can settle it later
                throw new ScriptError('javascript', `${entryPoint}() returned a promise that never settles`);
        }
    }

    /**
     * Host side of the bridge: JSON string in, JSON string out, never throws
     */
    private dispatch(bridge: CapabilityBridge, op: unknown, payload: unknown): string {
        try {
            if (!isBridgeOperation(op)) {
                return JSON.stringify({ error: `unknown editor operation ${String(op)}` });
            }
            const parsed: unknown = typeof payload === 'string' ? JSON.parse(payload) : [];
            const args = Array.isArray(parsed) ? parsed : [];
            const value = invokeBridge(bridge, op, args);
            return JSON.stringify({ value: value === undefined ? null : value });
        } catch (err) {
            return JSON.stringify({ error: describeError(err) });
        }
    }
}
