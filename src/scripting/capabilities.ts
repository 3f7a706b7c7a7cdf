import type { CapabilityBridge } from '../bridge/types.js';
import type { BridgeOperation } from './types.js';

/**
 * Dispatch a script's call to the bridge. Arguments arrive untyped from the
 * interpreter and are coerced here, so no script value reaches the host as-is.
 */
export function invokeBridge(bridge: CapabilityBridge, operation: BridgeOperation, args: readonly unknown[]): unknown {
    switch (operation) {
        case 'getText':
            return bridge.getText();
        case 'setText':
            bridge.setText(asText(args[0]));
            return undefined;
        case 'getSelection':
            return bridge.getSelection();
        case 'replaceSelection':
            bridge.replaceSelection(asText(args[0]));
            return undefined;
        case 'insertText':
            bridge.insertText(asText(args[0]));
            return undefined;
        case 'getCursor': {
            const { line, column } = bridge.getCursor();
            return { line, column };
        }
        case 'setCursor':
            bridge.setCursor({ line: asInteger(args[0], 'line'), column: asInteger(args[1], 'column') });
            return undefined;
        case 'getFilePath':
            return bridge.getFilePath();
        case 'getLanguage':
            return bridge.getLanguage();
        case 'notify':
            bridge.notify(asText(args[0]), args[1] === undefined || args[1] === null ? undefined : asText(args[1]));
            return undefined;
    }
}

export const BRIDGE_OPERATIONS: readonly BridgeOperation[] = [
    'getText', 'setText', 'getSelection', 'replaceSelection', 'insertText',
    'getCursor', 'setCursor', 'getFilePath', 'getLanguage', 'notify',
];

export function isBridgeOperation(value: unknown): value is BridgeOperation {
    return BRIDGE_OPERATIONS.some(op => op === value);
}

function asText(value: unknown): string {
    if (typeof value === 'string') return value;
    if (typeof value === 'number' || typeof value === 'boolean') return String(value);
    if (value === undefined || value === null) return '';
    throw new TypeError(`expected a string, got ${typeof value}`);
}

function asInteger(value: unknown, name: string): number {
    if (typeof value !== 'number' || !Number.isFinite(value)) {
        throw new TypeError(`${name} must be a number`);
    }
    return Math.trunc(value);
}
