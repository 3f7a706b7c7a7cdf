import type { TransformOperation } from '../plugins/types.js';

type TextTransform = (text: string) => string;

/**
 * Apply `fn` to the lines of `text`, keeping a trailing newline out of the line list
 */
function mapLines(text: string, fn: (lines: string[]) => string[]): string {
    const hasTrailingNewline = text.endsWith('\n');
    const body = hasTrailingNewline ? text.slice(0, -1) : text;
    if (body.length === 0) return text;
    const result = fn(body.split('\n')).join('\n');
    return hasTrailingNewline ? result + '\n' : result;
}

/**
 * Pure text operations available to `transform` actions.
 * All are total: any string in, a string out.
 */
export const TRANSFORMS: Readonly<Record<TransformOperation, TextTransform>> = Object.freeze({
    uppercase: (text) => text.toUpperCase(),
    lowercase: (text) => text.toLowerCase(),
    title_case: (text) =>
        text.toLowerCase().replace(/(^|[^\p{L}\p{N}'’])(\p{L})/gu, (_m, before: string, first: string) => before + first.toUpperCase()),
    // by code point, so surrogate pairs survive a double reverse
    reverse: (text) => Array.from(text).reverse().join(''),
    trim: (text) => text.trim(),
    trim_lines: (text) => mapLines(text, lines => lines.map(line => line.trimEnd())),
    sort_lines: (text) => mapLines(text, lines => [...lines].sort()),
    reverse_lines: (text) => mapLines(text, lines => [...lines].reverse()),
    unique_lines: (text) => mapLines(text, lines => Array.from(new Set(lines))),
});

export function applyTransform(operation: TransformOperation, text: string): string {
    return TRANSFORMS[operation](text);
}
