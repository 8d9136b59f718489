import { describe, expect, it } from 'vitest';
import { LinearIndex, NamedSet, OrderedIndex, compareKeys, valueEquals } from '../src/index';

describe('compareKeys', () => {
    it('orders numbers numerically', () => {
        expect(compareKeys(1, 2)).toBeLessThan(0);
        expect(compareKeys(10, 2)).toBeGreaterThan(0);
        expect(compareKeys(3, 3)).toBe(0);
    });

    it('orders strings by code unit', () => {
        expect(compareKeys('a', 'b')).toBeLessThan(0);
        expect(compareKeys('b', 'a')).toBeGreaterThan(0);
        expect(compareKeys('x', 'x')).toBe(0);
    });

    it('puts numbers before strings', () => {
        expect(compareKeys(5, 'a')).toBeLessThan(0);
        expect(compareKeys('a', 5)).toBeGreaterThan(0);
    });

    it('treats NaN as one key ordered before other numbers', () => {
        expect(compareKeys(NaN, NaN)).toBe(0);
        expect(compareKeys(NaN, -Infinity)).toBeLessThan(0);
        expect(compareKeys(0, NaN)).toBeGreaterThan(0);
        expect(compareKeys(NaN, 'a')).toBeLessThan(0);
    });
});

describe('LinearIndex', () => {
    it('scans the live element list', () => {
        const elements: number[][] = [[1], [2, 3]];
        const index = new LinearIndex(elements, valueEquals);
        expect(index.has([2, 3])).toBe(true);
        expect(index.has([4])).toBe(false);
        elements.push([4]);
        expect(index.has([4])).toBe(true);
    });
});

describe('OrderedIndex', () => {
    const byLength = (s: string) => s.length;
    const same = (a: string, b: string) => a === b;

    it('resolves colliding keys with the equality relation', () => {
        const index = new OrderedIndex(byLength, same);
        index.add('ab');
        index.add('cd');
        index.add('x');
        expect(index.has('cd')).toBe(true);
        expect(index.has('ef')).toBe(false);
        expect(index.has('xyz')).toBe(false);
        expect(index.keyCount).toBe(2);
    });

    it('backs a keyed NamedSet without changing its order', () => {
        const s = NamedSet.from('K', ['apple', 'pear', 'fig', 'kiwi', 'pear'], { key: byLength });
        expect(s.elements()).toEqual(['apple', 'pear', 'fig', 'kiwi']);
        expect(s.contains('kiwi')).toBe(true);
        expect(s.contains('plum')).toBe(false);
        expect(s.clone().contains('fig')).toBe(true);
    });

    it('gives the same algebra results as the linear index', () => {
        const keyed = NamedSet.from('A', [5, 1, 4], { key: n => n });
        const plain = NamedSet.from('B', [4, 2]);
        expect(keyed.unionWith(plain).elements()).toEqual([5, 1, 4, 2]);
        expect(keyed.symmetricDifferenceWith(plain).elements()).toEqual([5, 1, 2]);
        expect(keyed.isEqualTo(NamedSet.from('C', [1, 4, 5]))).toBe(true);
    });

    it('stores a NaN key once', () => {
        const s = NamedSet.from('N', [NaN, 2, NaN, 1], { key: n => n });
        expect(s.size).toBe(3);
        expect(s.contains(NaN)).toBe(true);
        expect(s.contains(3)).toBe(false);
    });
});
