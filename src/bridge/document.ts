import type { CapabilityBridge, CursorPosition, SelectionRange } from './types.js';
import { BridgeError } from '../errors.js';
import { languageForPath } from '../utils/language.js';

export interface TextDocumentInit {
    text?: string;
    filePath?: string | null;
    /** Defaults to the language inferred from the file extension */
    language?: string;
}

/**
 * In-memory text buffer with a single selection and a cursor.
 * Offsets are UTF-16 code unit indexes into `text`.
 */
export class TextDocument {
    private content: string;
    private selStart = 0;
    private selEnd = 0;
    private cursorOffset = 0;
    readonly filePath: string | null;
    readonly language: string;

    constructor(init: TextDocumentInit = {}) {
        this.content = init.text ?? '';
        this.filePath = init.filePath ?? null;
        this.language = init.language ?? languageForPath(this.filePath);
    }

    get text(): string {
        return this.content;
    }

    get cursor(): number {
        return this.cursorOffset;
    }

    get selection(): { start: number; end: number } {
        return { start: this.selStart, end: this.selEnd };
    }

    get selectedText(): string {
        return this.content.slice(this.selStart, this.selEnd);
    }

    setText(text: string): void {
        this.content = text;
        this.selStart = this.selEnd = 0;
        this.cursorOffset = Math.min(this.cursorOffset, text.length);
    }

    /**
     * Select [start, end) by offset. The cursor lands on `end`.
     */
    select(start: number, end: number): void {
        const a = this.clamp(start);
        const b = this.clamp(end);
        this.selStart = Math.min(a, b);
        this.selEnd = Math.max(a, b);
        this.cursorOffset = b;
    }

    clearSelection(): void {
        this.selStart = this.selEnd = this.cursorOffset;
    }

    moveCursor(offset: number): void {
        this.cursorOffset = this.clamp(offset);
        this.clearSelection();
    }

    /**
     * Replace the selected text, which stays selected. With no selection,
     * inserts at the cursor instead.
     */
    replaceSelection(text: string): void {
        if (this.selEnd > this.selStart) {
            const start = this.selStart;
            this.splice(start, this.selEnd, text);
            this.selStart = start;
            this.selEnd = start + text.length;
        } else {
            this.splice(this.cursorOffset, this.cursorOffset, text);
        }
    }

    /**
     * Insert at the cursor, overwriting any selection; nothing stays selected
     */
    insertAtCursor(text: string): void {
        if (this.selEnd > this.selStart) {
            this.splice(this.selStart, this.selEnd, text);
        } else {
            this.splice(this.cursorOffset, this.cursorOffset, text);
        }
    }

    positionAt(offset: number): CursorPosition {
        const clamped = this.clamp(offset);
        const before = this.content.slice(0, clamped);
        const lineStart = before.lastIndexOf('\n') + 1;
        const line = before.split('\n').length;
        return { line, column: clamped - lineStart + 1 };
    }

    /**
     * Offset of a one-based position. Out-of-range lines and columns are clamped.
     */
    offsetAt(position: CursorPosition): number {
        const lines = this.content.split('\n');
        const lineIndex = Math.min(Math.max(Math.trunc(position.line), 1), lines.length) - 1;
        let offset = 0;
        for (let i = 0; i < lineIndex; i++) {
            offset += lines[i].length + 1;
        }
        const lineLength = lines[lineIndex].length;
        const column = Math.min(Math.max(Math.trunc(position.column), 1), lineLength + 1);
        return offset + column - 1;
    }

    private splice(start: number, end: number, text: string): void {
        this.content = this.content.slice(0, start) + text + this.content.slice(end);
        this.cursorOffset = start + text.length;
        this.selStart = this.selEnd = this.cursorOffset;
    }

    private clamp(offset: number): number {
        return Math.min(Math.max(Math.trunc(offset), 0), this.content.length);
    }
}

export interface Notification {
    title: string;
    message: string;
}

export type NotificationSink = (notification: Notification) => void;

/**
 * CapabilityBridge over a TextDocument. With no document attached every
 * buffer operation throws BridgeError; notifications still go through.
 */
export class DocumentBridge implements CapabilityBridge {
    constructor(
        private document: TextDocument | null,
        private sink: NotificationSink = () => { },
        private defaultTitle = 'Plugin',
    ) { }

    attach(document: TextDocument | null): void {
        this.document = document;
    }

    getText(): string {
        return this.require('read the buffer').text;
    }

    setText(text: string): void {
        this.require('replace the buffer').setText(text);
    }

    getSelection(): string {
        return this.require('read the selection').selectedText;
    }

    getSelectionRange(): SelectionRange | null {
        const doc = this.require('read the selection');
        const { start, end } = doc.selection;
        if (end <= start) return null;
        return { start: doc.positionAt(start), end: doc.positionAt(end) };
    }

    replaceSelection(text: string): void {
        this.require('replace the selection').replaceSelection(text);
    }

    insertText(text: string): void {
        this.require('insert text').insertAtCursor(text);
    }

    getCursor(): CursorPosition {
        const doc = this.require('read the cursor');
        return doc.positionAt(doc.cursor);
    }

    setCursor(position: CursorPosition): void {
        const doc = this.require('move the cursor');
        doc.moveCursor(doc.offsetAt(position));
    }

    getFilePath(): string | null {
        return this.require('read the file path').filePath;
    }

    getLanguage(): string {
        return this.require('read the language').language;
    }

    notify(message: string, title?: string): void {
        this.sink({ title: title ?? this.defaultTitle, message });
    }

    private require(operation: string): TextDocument {
        if (!this.document) {
            throw new BridgeError(operation);
        }
        return this.document;
    }
}
