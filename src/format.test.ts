import { describe, it, expect } from 'vitest';
import { threadId } from 'node:worker_threads';
import {
    formatMessageLine,
    formatScopeLine,
    formatTimestamp,
    formatValue,
    hashThreadId,
    parseDepthSuffix,
    scopeLabel,
    threadTag,
} from './format';

describe('formatTimestamp', () => {
    it('formats local time with second resolution', () => {
        const ms = new Date(2024, 0, 2, 3, 4, 5, 678).getTime();
        expect(formatTimestamp(ms)).toBe('2024-01-02 03:04:05');
    });

    it('pads every field to fixed width', () => {
        const ms = new Date(2031, 10, 30, 23, 59, 9).getTime();
        expect(formatTimestamp(ms)).toBe('2031-11-30 23:59:09');
    });
});

describe('thread tags', () => {
    it('is a decimal unsigned integer', () => {
        expect(hashThreadId(0)).toMatch(/^\d+$/);
        expect(BigInt(hashThreadId(12))).toBeLessThan(2n ** 64n);
    });

    it('is stable for the same id and differs between ids', () => {
        expect(hashThreadId(3)).toBe(hashThreadId('3'));
        expect(hashThreadId(1)).not.toBe(hashThreadId(2));
    });

    it('tags the calling thread by its worker thread id', () => {
        expect(threadTag()).toBe(hashThreadId(threadId));
        expect(threadTag()).toBe(threadTag());
    });
});

describe('formatValue', () => {
    it('keeps strings and stringifies primitives', () => {
        expect(formatValue('value')).toBe('value');
        expect(formatValue(42)).toBe('42');
        expect(formatValue(1.5)).toBe('1.5');
        expect(formatValue(10n)).toBe('10');
        expect(formatValue(false)).toBe('false');
        expect(formatValue(null)).toBe('null');
        expect(formatValue(undefined)).toBe('undefined');
        expect(formatValue(Symbol('tag'))).toBe('Symbol(tag)');
    });

    it('formats errors, dates and functions', () => {
        expect(formatValue(new TypeError('bad input'))).toBe('TypeError: bad input');
        expect(formatValue(new Date(0))).toBe('1970-01-01T00:00:00.000Z');
        expect(formatValue(new Date(Number.NaN))).toBe('Invalid Date');
        function handler() {}
        expect(formatValue(handler)).toBe('[Function handler]');
    });

    it('serializes objects and arrays as JSON', () => {
        expect(formatValue({ a: 1, b: 'x' })).toBe('{"a":1,"b":"x"}');
        expect(formatValue([1, 'x', 2n])).toBe('[1,"x","2"]');
    });

    it('marks circular references', () => {
        const node: Record<string, unknown> = { id: 1 };
        node.self = node;
        expect(formatValue(node)).toBe('{"id":1,"self":"[Circular]"}');
    });
});

describe('line layouts', () => {
    it('builds a message line', () => {
        expect(formatMessageLine('2024-01-02 03:04:05', '99', 'hello world'))
            .toBe('[2024-01-02 03:04:05] tid=99 "hello world"');
    });

    it('builds a scope line', () => {
        expect(formatScopeLine('2024-01-02 03:04:05', 'f', 'start...', 'a.cpp', 1))
            .toBe('[2024-01-02 03:04:05] f:start... a.cpp |1');
    });

    it('joins function and custom name into a label', () => {
        expect(scopeLabel('load')).toBe('load');
        expect(scopeLabel('load', 'parse')).toBe('load:parse');
        expect(scopeLabel('load', '')).toBe('load');
    });
});

describe('parseDepthSuffix', () => {
    it('reads the integer after the rightmost bar', () => {
        expect(parseDepthSuffix('[2024-01-02 03:04:05] f:start... a.cpp |3')).toBe(3);
        expect(parseDepthSuffix('x |0')).toBe(0);
        expect(parseDepthSuffix('a|1 b |2')).toBe(2);
    });

    it('accepts leading blanks, a sign and trailing text', () => {
        expect(parseDepthSuffix('x | 7')).toBe(7);
        expect(parseDepthSuffix('x |-1')).toBe(-1);
        expect(parseDepthSuffix('x |4 trailing')).toBe(4);
    });

    it('rejects values outside the int32 range', () => {
        expect(parseDepthSuffix('x |2147483647')).toBe(2147483647);
        expect(parseDepthSuffix('x |-2147483648')).toBe(-2147483648);
        expect(parseDepthSuffix('x |3000000000')).toBeUndefined();
        expect(parseDepthSuffix('x |-2147483649')).toBeUndefined();
    });

    it('returns undefined without a bar or a number', () => {
        expect(parseDepthSuffix('## CRASH POINT ##')).toBeUndefined();
        expect(parseDepthSuffix('x |abc')).toBeUndefined();
        expect(parseDepthSuffix('x |')).toBeUndefined();
        expect(parseDepthSuffix('')).toBeUndefined();
    });
});
