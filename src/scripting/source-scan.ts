/**
 * Find a use of the `import` keyword outside comments and quoted strings.
 *
 * In classic scripts the keyword can only appear as `import(...)` or
 * `import.meta`; the sandbox offers no module loader, so any use fails the
 * run before the script starts. Template literal text is scanned as code,
 * which errs on the side of rejecting.
 *
 * Returns the 1-based line of the first occurrence, or null.
 */
export function findImportUse(source: string): number | null {
    let line = 1;
    let i = 0;

    while (i < source.length) {
        const char = source[i];
        const next = source[i + 1];

        if (char === '\n') {
            line++;
            i++;
            continue;
        }

        if (char === '/' && next === '/') {
            while (i < source.length && source[i] !== '\n') i++;
            continue;
        }

        if (char === '/' && next === '*') {
            const end = source.indexOf('*/', i + 2);
            const stop = end === -1 ? source.length : end + 2;
            line += countNewlines(source, i, stop);
            i = stop;
            continue;
        }

        if (char === '"' || char === "'") {
            i++;
            while (i < source.length && source[i] !== char && source[i] !== '\n') {
                i += source[i] === '\\' ? 2 : 1;
            }
            i++;
            continue;
        }

        if (char === 'i' && source.startsWith('import', i) && !isIdentChar(source[i - 1]) && !isIdentChar(source[i + 6])) {
            // `obj.import` is a property name, not the keyword
            if (previousSignificant(source, i) !== '.') return line;
        }

        i++;
    }

    return null;
}

function isIdentChar(char: string | undefined): boolean {
    return char !== undefined && /[A-Za-z0-9_$]/.test(char);
}

function previousSignificant(source: string, index: number): string | undefined {
    let j = index - 1;
    while (j >= 0 && /\s/.test(source[j])) j--;
    return j >= 0 ? source[j] : undefined;
}

function countNewlines(source: string, from: number, to: number): number {
    let count = 0;
    for (let k = from; k < to; k++) {
        if (source[k] === '\n') count++;
    }
    return count;
}
