import { describe, it, expect } from 'vitest';
import { cleanDoc, isPlainObject } from '../../src/core/utils.js';
import { booleanToken } from '../../src/core/tokens.js';

describe('cleanDoc', () => {
    it('strips blank edges and common indentation', () => {
        expect(cleanDoc('\n    Single cat\n      identified by id\n')).toBe('Single cat\n  identified by id');
    });

    it('keeps a first line that follows the opening quote', () => {
        expect(cleanDoc('Summary\n    more detail')).toBe('Summary\nmore detail');
    });

    it('leaves one-liners alone', () => {
        expect(cleanDoc('List of cats')).toBe('List of cats');
    });
});

describe('isPlainObject', () => {
    it('accepts object literals and null-prototype records', () => {
        expect(isPlainObject({ a: 1 })).toBe(true);
        expect(isPlainObject(Object.create(null))).toBe(true);
    });

    it('rejects arrays, class instances and primitives', () => {
        expect(isPlainObject([1])).toBe(false);
        expect(isPlainObject(new Map())).toBe(false);
        expect(isPlainObject(null)).toBe(false);
        expect(isPlainObject('x')).toBe(false);
    });
});

describe('booleanToken', () => {
    it('reads tokens case-insensitively', () => {
        expect(['True', 'yes', 'Y', '1', 'on'].map(booleanToken)).toEqual([true, true, true, true, true]);
        expect(['FALSE', 'no', 'n', '0', 'off'].map(booleanToken)).toEqual([false, false, false, false, false]);
        expect(booleanToken('maybe')).toBeUndefined();
    });
});
