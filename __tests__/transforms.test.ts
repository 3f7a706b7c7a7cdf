import { describe, it, expect } from 'vitest';
import { TRANSFORMS, applyTransform } from '../src/actions/transforms.js';
import type { TransformOperation } from '../src/plugins/types.js';

describe('transforms', () => {
    it('uppercase is idempotent', () => {
        const once = applyTransform('uppercase', 'Mixed case text');
        expect(once).toBe('MIXED CASE TEXT');
        expect(applyTransform('uppercase', once)).toBe(once);
    });

    it('reverse twice is the identity, surrogate pairs included', () => {
        const text = 'a😀b\ncd';
        expect(applyTransform('reverse', 'a😀b')).toBe('b😀a');
        expect(applyTransform('reverse', applyTransform('reverse', text))).toBe(text);
    });

    it('lowercases', () => {
        expect(applyTransform('lowercase', 'HeLLo')).toBe('hello');
    });

    it('title-cases words without splitting on apostrophes', () => {
        expect(applyTransform('title_case', "hello wORLD, it's foo-bar")).toBe("Hello World, It's Foo-Bar");
    });

    it('trims the whole text or each line end', () => {
        expect(applyTransform('trim', '  padded \n')).toBe('padded');
        expect(applyTransform('trim_lines', 'a  \nb \t\n')).toBe('a\nb\n');
    });

    it('sorts, reverses and deduplicates lines, keeping a trailing newline', () => {
        expect(applyTransform('sort_lines', 'pear\napple\nfig\n')).toBe('apple\nfig\npear\n');
        expect(applyTransform('reverse_lines', 'one\ntwo\nthree')).toBe('three\ntwo\none');
        expect(applyTransform('unique_lines', 'a\nb\na\nc\nb\n')).toBe('a\nb\nc\n');
    });

    it('is total over empty input', () => {
        const operations = Object.keys(TRANSFORMS).filter((op): op is TransformOperation => op in TRANSFORMS);
        for (const operation of operations) {
            expect(applyTransform(operation, '')).toBe('');
        }
        expect(applyTransform('sort_lines', '\n')).toBe('\n');
    });
});
