import { describe, it, expect, beforeEach } from 'vitest';
import { DocumentBridge, TextDocument, type Notification } from '../src/bridge/document.js';
import { ScriptError } from '../src/errors.js';
import { Logger } from '../src/logging/logger.js';
import { JavaScriptEngine } from '../src/scripting/javascript-engine.js';

async function failure(promise: Promise<void>): Promise<ScriptError> {
    const error = await promise.then(() => undefined, (err: unknown) => err);
    if (!(error instanceof ScriptError)) {
        throw new Error(`expected a ScriptError, got ${String(error)}`);
    }
    return error;
}

describe('JavaScriptEngine', () => {
    const engine = new JavaScriptEngine({ timeoutMs: 500 });
    let doc: TextDocument;
    let notifications: Notification[];
    let bridge: DocumentBridge;

    beforeEach(() => {
        doc = new TextDocument({ text: 'hello js', filePath: '/work/app.ts' });
        notifications = [];
        bridge = new DocumentBridge(doc, (n) => notifications.push(n));
    });

    it('calls the entry point with a frozen editor global', async () => {
        const source = `
            function main() {
                editor.setText(editor.getText().toUpperCase());
                editor.notify(String(Object.isFrozen(editor)), 'js');
            }
        `;
        await engine.run(source, 'main', bridge);

        expect(doc.text).toBe('HELLO JS');
        expect(notifications).toEqual([{ title: 'js', message: 'true' }]);
    });

    it('passes structured values across the bridge', async () => {
        const source = `
            const main = () => {
                editor.setCursor(1, 7);
                const { line, column } = editor.getCursor();
                editor.insertText('[' + line + ':' + column + ' ' + editor.getLanguage() + ' ' + editor.getFilePath() + ']');
            };
        `;
        await engine.run(source, 'main', bridge);
        expect(doc.text).toBe('hello [1:7 typescript /work/app.ts]js');
    });

    it('replaces the selection', async () => {
        doc.select(6, 8);
        await engine.run('function main() { editor.replaceSelection(editor.getSelection().split("").reverse().join("")); }', 'main', bridge);
        expect(doc.text).toBe('hello sj');
    });

    it('awaits an entry point that returns a promise', async () => {
        await engine.run('async function main() { await null; editor.setText("later"); }', 'main', bridge);
        expect(doc.text).toBe('later');
    });

    it('turns bridge failures into exceptions the script can catch', async () => {
        const detached = new DocumentBridge(null, (n) => notifications.push(n));
        await engine.run('function main() { try { editor.getText(); } catch (e) { editor.notify(e.message); } }', 'main', detached);
        expect(notifications).toEqual([{ title: 'Plugin', message: 'Cannot read the buffer: no active editor document' }]);
    });

    it('routes console output to the logger', async () => {
        const lines: string[] = [];
        const logger = new Logger({ level: 'info', write: (line) => lines.push(line) });

        await engine.run('function main() { console.log("count", { n: 2 }); }', 'main', bridge, { logger });

        expect(lines).toHaveLength(1);
        expect(lines[0]).toContain('count {"n":2}');
    });

    it('offers no host globals', async () => {
        const source = `
            function main() {
                editor.setText([typeof require, typeof process, typeof setTimeout, typeof Buffer, typeof eval, typeof Function].join(','));
            }
        `;
        await engine.run(source, 'main', bridge);
        expect(doc.text).toBe('undefined,undefined,undefined,undefined,undefined,undefined');
    });

    describe('sandbox escapes', () => {
        it('rejects eval', async () => {
            const error = await failure(engine.run('function main() { eval("1 + 1"); }', 'main', bridge));
            expect(error.message).toBe('[javascript] main() threw: ReferenceError: eval is not defined');
        });

        it('rejects code generation through a function constructor', async () => {
            const source = 'function main() { const F = (function () {}).constructor; F("return process")(); }';
            const error = await failure(engine.run(source, 'main', bridge));
            expect(error.message.startsWith('[javascript] main() threw: EvalError: ')).toBe(true);
        });

        it('rejects reaching the realm through the global constructor chain', async () => {
            await failure(engine.run('function main() { this.constructor.constructor("return process")(); }', 'main', bridge));
        });

        it('rejects dynamic import before running anything', async () => {
            const source = 'editor.setText("partial");\nfunction main() { return import("node:fs"); }';
            const error = await failure(engine.run(source, 'main', bridge, { chunkName: 'evil.js' }));

            expect(error.message).toBe('[javascript] evil.js:2: module loading is not available to scripts');
            expect(doc.text).toBe('hello js');
        });

        it('interrupts scripts that run past the timeout', async () => {
            const error = await failure(new JavaScriptEngine({ timeoutMs: 50 }).run('function main() { for (;;) {} }', 'main', bridge));
            expect(error.message).toContain('main() threw');
            expect(error.message).toContain('timed out');
        });

        it('bounds a thrown value whose getters never return', async () => {
            const source = 'function main() { throw { get message() { for (;;) {} } }; }';
            const started = Date.now();
            const error = await failure(new JavaScriptEngine({ timeoutMs: 100 }).run(source, 'main', bridge));

            expect(error.message).toBe('[javascript] main() threw: unprintable error');
            expect(Date.now() - started).toBeLessThan(2_000);
        });

        it('interrupts async continuations that run past the timeout', async () => {
            const source = 'async function main() { await null; for (;;) {} }';
            const error = await failure(new JavaScriptEngine({ timeoutMs: 100 }).run(source, 'main', bridge));
            expect(error.message.startsWith('[javascript] main() threw: ')).toBe(true);
            expect(error.message).toContain('timed out');
        });

        it('never calls into a returned thenable that is not a promise', async () => {
            const source = 'function main() { return { then() { for (;;) {} } }; }';
            await new JavaScriptEngine({ timeoutMs: 100 }).run(source, 'main', bridge);
            expect(doc.text).toBe('hello js');
        });
    });

    it('reports a missing entry point', async () => {
        const error = await failure(engine.run('const value = 1;', 'main', bridge));
        expect(error.message).toBe('[javascript] entry point "main" is not a function');
    });

    it('reports syntax errors as load failures', async () => {
        const error = await failure(engine.run('function main( {', 'main', bridge, { chunkName: 'bad.js' }));
        expect(error.message.startsWith('[javascript] failed to load bad.js: ')).toBe(true);
    });

    it('refuses entry names that are not identifiers', async () => {
        const error = await failure(engine.run('function main() {}', 'main(); editor.setText("x")', bridge));
        expect(error.message).toBe('[javascript] invalid entry point name "main(); editor.setText("x")"');
        expect(doc.text).toBe('hello js');
    });

    it('reports a rejected promise', async () => {
        const error = await failure(engine.run('async function main() { throw new TypeError("nope"); }', 'main', bridge));
        expect(error.message).toBe('[javascript] main() rejected: TypeError: nope');
    });
    it('reports a promise that can never settle', async () => {
        const error = await failure(engine.run('function main() { return new Promise(() => {}); }', 'main', bridge));
        expect(error.message).toBe('[javascript] main() returned a promise that never settles');
    });

    it('describes thrown strings and plain objects', async () => {
        const thrownString = await failure(engine.run('function main() { throw "plain"; }', 'main', bridge));
        const thrownObject = await failure(engine.run('function main() { throw { code: 7 }; }', 'main', bridge));

        expect(thrownString.message).toBe('[javascript] main() threw: plain');
        expect(thrownObject.message).toBe('[javascript] main() threw: {"code":7}');
    });
});
