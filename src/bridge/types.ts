/**
 * Capability Bridge — Types
 *
 * The bridge is the only channel through which actions and scripts see or
 * change editor state. Hosts implement it; the engine never holds a
 * reference to an editor's internal representation.
 */

/** One-based line and column */
export interface CursorPosition {
    line: number;
    column: number;
}

export interface SelectionRange {
    start: CursorPosition;
    end: CursorPosition;
}

export interface CapabilityBridge {
    getText(): string;
    setText(text: string): void;

    /** Selected text, empty when nothing is selected */
    getSelection(): string;
    getSelectionRange(): SelectionRange | null;
    /** Replace the selection (the new text stays selected), or insert at the cursor when nothing is selected */
    replaceSelection(text: string): void;
    /** Insert at the cursor (replacing any selection) and move the cursor past the inserted text */
    insertText(text: string): void;

    getCursor(): CursorPosition;
    setCursor(position: CursorPosition): void;

    /** Absolute path of the current file; null for an unsaved buffer */
    getFilePath(): string | null;
    getLanguage(): string;

    notify(message: string, title?: string): void;
}

/**
 * State read from the bridge when an invocation starts. Owned by that
 * invocation only; actions still mutate the live buffer through the bridge.
 */
export interface ExecutionContext {
    filePath: string | null;
    language: string;
    text: string;
    selection: {
        text: string;
        range: SelectionRange | null;
    };
    cursor: CursorPosition;
}

export function captureContext(bridge: CapabilityBridge): ExecutionContext {
    return {
        filePath: bridge.getFilePath(),
        language: bridge.getLanguage(),
        text: bridge.getText(),
        selection: {
            text: bridge.getSelection(),
            range: bridge.getSelectionRange(),
        },
        cursor: bridge.getCursor(),
    };
}
