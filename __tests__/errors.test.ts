import { describe, it, expect } from 'vitest';
import vm from 'node:vm';
import {
    ActionError,
    BridgeError,
    ChainError,
    DiscoveryError,
    PluginEngineError,
    ScriptError,
    ValidationError,
    describeError,
} from '../src/errors.js';

describe('error taxonomy', () => {
    it('gives every error a stable code', () => {
        const errors: PluginEngineError[] = [
            new DiscoveryError('/plugins', new Error('EACCES')),
            new ValidationError('/plugins/x', ['bad']),
            new ActionError('p', 'a', 'failed'),
            new ChainError('p', 'c', 'm', 0, new Error('inner')),
            new ScriptError('lua', 'oops'),
            new BridgeError('read the buffer'),
        ];
        expect(errors.map(e => e.code)).toEqual([
            'DISCOVERY_FAILED',
            'VALIDATION_FAILED',
            'ACTION_FAILED',
            'CHAIN_FAILED',
            'SCRIPT_FAILED',
            'BRIDGE_UNAVAILABLE',
        ]);
        expect(errors.every(e => e instanceof PluginEngineError)).toBe(true);
    });

    it('formats messages that identify the culprit', () => {
        expect(new DiscoveryError('/plugins', new Error('EACCES')).message).toBe('Cannot read plugin directory "/plugins": EACCES');
        expect(new ValidationError('/p/x', ['a', 'b'], 'x').message).toBe('Invalid plugin "x" (/p/x): a; b');
        expect(new ScriptError('javascript', 'boom').message).toBe('[javascript] boom');
        expect(new BridgeError('insert text').message).toBe('Cannot insert text: no active editor document');
    });

    it('keeps the failing chain member and its cause', () => {
        const cause = new ActionError('p', 'm', 'exit 1', { exitCode: 1, stderr: 'err' });
        const error = new ChainError('p', 'all', 'm', 2, cause);

        expect(error).toBeInstanceOf(ActionError);
        expect(error.cause).toBe(cause);
        expect(error.message).toBe('Action "all" of plugin "p" failed: step 3 ("m") failed: Action "m" of plugin "p" failed: exit 1');
        expect(cause.exitCode).toBe(1);
        expect(cause.stderr).toBe('err');
    });
});

describe('describeError', () => {
    it('describes errors, strings and other values', () => {
        expect(describeError(new Error('plain'))).toBe('plain');
        expect(describeError('text')).toBe('text');
        expect(describeError(undefined)).toBe('unknown error');
        expect(describeError({ code: 7 })).toBe('{"code":7}');
    });

    it('names errors from another realm', () => {
        const foreign: unknown = vm.runInNewContext('new RangeError("far away")');
        expect(foreign instanceof Error).toBe(false);
        expect(describeError(foreign)).toBe('RangeError: far away');
    });
});
