import { describe, it, expect } from 'vitest';
import { globToRegExp, invalidGlobClasses, matchesGlob } from '../src/triggers/glob.js';

describe('matchesGlob', () => {
    it('matches slash-free patterns against the base name', () => {
        expect(matchesGlob('/home/dev/notes/todo.md', '*.md')).toBe(true);
        expect(matchesGlob('/home/dev/notes/readme.txt', '*.md')).toBe(false);
    });

    it('matches relative patterns with a directory at any depth', () => {
        expect(matchesGlob('/work/project/docs/intro.md', 'docs/*.md')).toBe(true);
        expect(matchesGlob('/work/project/docs/deep/intro.md', 'docs/*.md')).toBe(false);
    });

    it('lets ** span directories, including none', () => {
        expect(matchesGlob('/a/b/c/unit.test.ts', '**/*.test.ts')).toBe(true);
        expect(matchesGlob('/src/app.ts', '/src/**/app.ts')).toBe(true);
        expect(matchesGlob('/src/x/y/app.ts', '/src/**/app.ts')).toBe(true);
    });

    it('anchors absolute patterns at the root', () => {
        expect(matchesGlob('/srv/site/index.html', '/srv/site/*.html')).toBe(true);
        expect(matchesGlob('/backup/srv/site/index.html', '/srv/site/*.html')).toBe(false);
    });

    it('supports ?, character classes and alternatives', () => {
        expect(matchesGlob('a.c', '?.c')).toBe(true);
        expect(matchesGlob('ab.c', '?.c')).toBe(false);
        expect(matchesGlob('b.js', '[!a]*.js')).toBe(true);
        expect(matchesGlob('a.js', '[!a]*.js')).toBe(false);
        expect(matchesGlob('main.ts', '*.{js,ts}')).toBe(true);
        expect(matchesGlob('main.rs', '*.{js,ts}')).toBe(false);
    });

    it('treats regex metacharacters in patterns literally', () => {
        expect(matchesGlob('notes(1).md', 'notes(1).md')).toBe(true);
        expect(matchesGlob('notesX1Xmd', 'notes(1).md')).toBe(false);
    });

    it('reads a class with a reversed range as literal text instead of throwing', () => {
        expect(matchesGlob('/work/z.txt', '[z-a].txt')).toBe(false);
        expect(matchesGlob('/work/[z-a].txt', '[z-a].txt')).toBe(true);
    });

    it('accepts backslash separators', () => {
        expect(matchesGlob('C:\\proj\\docs\\a.md', 'docs/*.md')).toBe(true);
    });
});

describe('globToRegExp', () => {
    it('returns the cached expression for a repeated pattern', () => {
        expect(globToRegExp('*.lua')).toBe(globToRegExp('*.lua'));
    });

    it('closes an unbalanced brace group', () => {
        expect(globToRegExp('{a,b').test('a')).toBe(true);
    });
});

describe('invalidGlobClasses', () => {
    it('lists classes that cannot compile', () => {
        expect(invalidGlobClasses('{[z-a],[b-a]}.txt')).toEqual(['[z-a]', '[b-a]']);
        expect(invalidGlobClasses('[a-z]*.txt')).toEqual([]);
    });
});
