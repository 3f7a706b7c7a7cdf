import path from 'node:path';
import type { ExecutionContext } from '../bridge/types.js';

/** File name substituted for buffers that were never saved */
export const UNSAVED_PLACEHOLDER = 'untitled';

export type TemplateVariables = Record<string, string>;

/**
 * Variables available to snippet and command templates.
 * Date and time are read at call time, in local time.
 */
export function templateVariables(ctx: Pick<ExecutionContext, 'filePath' | 'language'>, now: Date = new Date()): TemplateVariables {
    const date = `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
    const time = `${pad(now.getHours())}:${pad(now.getMinutes())}:${pad(now.getSeconds())}`;

    return {
        file_name: ctx.filePath ? path.basename(ctx.filePath) : UNSAVED_PLACEHOLDER,
        file_path: ctx.filePath ?? UNSAVED_PLACEHOLDER,
        file_dir: ctx.filePath ? path.dirname(ctx.filePath) : '',
        language: ctx.language,
        date,
        time,
        datetime: `${date} ${time}`,
    };
}

/**
 * Replace `{{name}}` placeholders. Unknown names are left as written.
 */
export function interpolate(
    template: string,
    variables: TemplateVariables,
    encode: (value: string) => string = (value) => value,
): string {
    return template.replace(/\{\{\s*([a-z_]+)\s*\}\}/g, (match, name: string) =>
        Object.hasOwn(variables, name) ? encode(variables[name]) : match
    );
}

/**
 * Quote a value for POSIX sh
 */
export function shellQuote(value: string): string {
    if (/^[A-Za-z0-9_\/.,:@%+=-]+$/.test(value)) return value;
    return `'${value.replace(/'/g, `'\\''`)}'`;
}

function pad(n: number): string {
    return String(n).padStart(2, '0');
}
