import path from 'node:path';

const cache = new Map<string, RegExp>();

/**
 * Match a file against a glob. Patterns without a slash are tested against
 * the base name (`*.md`); relative patterns with one match at any depth
 * of the path (`docs/*.md`), absolute ones from the root.
 *
 * `*` spans any run of characters except `/`, `**` spans anything, `?` is
 * one character, `[abc]` a character class, `{a,b}` alternatives.
 */
export function matchesGlob(filePath: string, pattern: string): boolean {
    const normalizedPath = filePath.replace(/\\/g, '/');
    const normalizedPattern = pattern.replace(/\\/g, '/');

    if (!normalizedPattern.includes('/')) {
        return globToRegExp(normalizedPattern).test(path.posix.basename(normalizedPath));
    }

    const regex = globToRegExp(normalizedPattern.startsWith('/') ? normalizedPattern : `**/${normalizedPattern}`);
    return regex.test(normalizedPath);
}

export function globToRegExp(pattern: string): RegExp {
    const cached = cache.get(pattern);
    if (cached) return cached;

    const compiled = new RegExp(translate(pattern, []));
    cache.set(pattern, compiled);
    return compiled;
}

/**
 * Character classes in `pattern` that do not compile, such as `[z-a]`.
 * They still match, as literal text, but a definition naming one is rejected.
 */
export function invalidGlobClasses(pattern: string): string[] {
    const invalid: string[] = [];
    translate(pattern.replace(/\\/g, '/'), invalid);
    return invalid;
}

function translate(pattern: string, invalidClasses: string[]): string {
    let regex = '^';
    let braceDepth = 0;
    let i = 0;

    while (i < pattern.length) {
        const char = pattern[i];

        if (char === '*') {
            if (pattern[i + 1] === '*') {
                // `**/` also matches zero directories
                if (pattern[i + 2] === '/') {
                    regex += '(?:.*/)?';
                    i += 3;
                } else {
                    regex += '.*';
                    i += 2;
                }
            } else {
                regex += '[^/]*';
                i += 1;
            }
            continue;
        }
        if (char === '?') {
            regex += '[^/]';
            i += 1;
            continue;
        }
        if (char === '[') {
            const close = pattern.indexOf(']', i + 1);
            if (close > i + 1) {
                const body = pattern.slice(i + 1, close).replace(/^!/, '^').replace(/\\/g, '\\\\');
                if (compiles(`[${body}]`)) {
                    regex += `[${body}]`;
                    i = close + 1;
                    continue;
                }
                // an unusable class falls through to a literal `[`
                invalidClasses.push(pattern.slice(i, close + 1));
            }
        }
        if (char === '{') {
            braceDepth++;
            regex += '(?:';
            i += 1;
            continue;
        }
        if (char === '}' && braceDepth > 0) {
            braceDepth--;
            regex += ')';
            i += 1;
            continue;
        }
        if (char === ',' && braceDepth > 0) {
            regex += '|';
            i += 1;
            continue;
        }

        regex += escapeRegex(char);
        i += 1;
    }

    // close any group an unbalanced `{` left open
    return regex + ')'.repeat(braceDepth) + '$';
}

function compiles(source: string): boolean {
    try {
        new RegExp(source);
        return true;
    } catch {
        return false;
    }
}

function escapeRegex(char: string): string {
    return char.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
}
