import { describe, expect, it } from 'vitest';
import { NamedSet, emptySet } from '../src/index';

describe('NamedSet element store', () => {
    it('starts empty with its name', () => {
        const s = new NamedSet<number>('A');
        expect(s.size).toBe(0);
        expect(s.isEmpty()).toBe(true);
        expect(s.name).toBe('A');
        expect(s.render()).toBe('A = {}');
    });

    it('keeps insertion order and ignores duplicates', () => {
        const s = new NamedSet<number>('A');
        s.insert(3).insert(1).insert(3).insert(2);
        expect(s.size).toBe(3);
        expect(s.elements()).toEqual([3, 1, 2]);
        expect(s.render()).toBe('A = {3, 1, 2}');
    });

    it('re-inserting an existing value leaves the size unchanged', () => {
        const s = NamedSet.from('A', [1, 2]);
        s.insert(2);
        expect(s.size).toBe(2);
    });

    it('contains reports membership', () => {
        const s = NamedSet.from('A', [1, 2]);
        expect(s.contains(2)).toBe(true);
        expect(s.contains(5)).toBe(false);
    });

    it('omits the name prefix when unnamed', () => {
        expect(NamedSet.from('', [1, 2]).render()).toBe('{1, 2}');
        expect(emptySet<number>().render()).toBe('{}');
    });

    it('returns a snapshot from elements()', () => {
        const s = NamedSet.from('A', [1, 2]);
        const snapshot = s.elements();
        snapshot.push(99);
        expect(s.elements()).toEqual([1, 2]);
        expect(s.contains(99)).toBe(false);
    });

    it('can be renamed without affecting equality', () => {
        const s = NamedSet.from('A', [1, 2]);
        s.name = 'B';
        expect(s.render()).toBe('B = {1, 2}');
        expect(s.isEqualTo(NamedSet.from('C', [2, 1]))).toBe(true);
    });

    it('clone is independent of the original', () => {
        const original = NamedSet.from('A', [1]);
        const copy = original.clone();
        copy.insert(2);
        expect(original.elements()).toEqual([1]);
        expect(copy.elements()).toEqual([1, 2]);
        expect(copy.name).toBe('A');
    });

    it('iterates in insertion order', () => {
        expect([...NamedSet.from('A', ['b', 'a', 'c'])]).toEqual(['b', 'a', 'c']);
    });
});

describe('NamedSet default equality', () => {
    it('treats NaN as a single value', () => {
        const s = NamedSet.from('N', [NaN, NaN]);
        expect(s.size).toBe(1);
        expect(s.contains(NaN)).toBe(true);
    });

    it('compares arrays by content', () => {
        const s = new NamedSet<number[]>('S');
        s.insert([1, 2]).insert([1, 2]);
        expect(s.size).toBe(1);
        expect(s.contains([1, 2])).toBe(true);
        expect(s.contains([2, 1])).toBe(false);
        expect(s.toString()).toBe('{[1, 2]}');
    });

    it('compares plain objects by reference', () => {
        const s = new NamedSet<{ a: number }>('S');
        const obj = { a: 1 };
        s.insert(obj).insert({ a: 1 }).insert(obj);
        expect(s.size).toBe(2);
    });

    it('deduplicates nested sets by content', () => {
        const outer = new NamedSet<NamedSet<number>>('outer');
        outer.insert(NamedSet.from('x', [1, 2]));
        outer.insert(NamedSet.from('y', [2, 1]));
        outer.insert(NamedSet.from('', [3]));
        expect(outer.size).toBe(2);
        expect(outer.render()).toBe('outer = {{1, 2}, {3}}');
    });

    it('equals() is false for anything but a set', () => {
        const s = NamedSet.from('A', [1]);
        expect(s.equals([1])).toBe(false);
        expect(s.equals(NamedSet.from('B', [1]))).toBe(true);
    });
});

describe('NamedSet custom equality', () => {
    const caseInsensitive = (a: string, b: string) => a.toLowerCase() === b.toLowerCase();

    it('uses the supplied relation for uniqueness', () => {
        const s = NamedSet.from('W', ['Apple', 'apple', 'PEAR'], { equals: caseInsensitive });
        expect(s.elements()).toEqual(['Apple', 'PEAR']);
        expect(s.contains('pear')).toBe(true);
    });

    it('is carried over to clones', () => {
        const s = NamedSet.from('W', ['a'], { equals: caseInsensitive }).clone();
        s.insert('A');
        expect(s.size).toBe(1);
    });
});

describe('NamedSet freezing', () => {
    it('freezes a set once it is stored as an element', () => {
        const inner = NamedSet.from('x', [1]);
        const outer = new NamedSet<NamedSet<number>>('outer').insert(inner);
        expect(inner.isFrozen).toBe(true);
        expect(outer.isFrozen).toBe(false);
        expect(() => inner.insert(2)).toThrow('InvalidOperation: Cannot insert into a frozen NamedSet.');
        expect(() => { inner.name = 'y'; }).toThrow('InvalidOperation: Cannot rename a frozen NamedSet.');
        expect(outer.render()).toBe('outer = {{1}}');
    });

    it('power set members cannot be mutated into duplicates', () => {
        const p = NamedSet.from('A', [1, 2]).powerSet();
        const [empty] = p.elements();
        expect(() => empty.insert(1)).toThrow('InvalidOperation: Cannot insert into a frozen NamedSet.');
        expect(p.elements().map(s => s.toString())).toEqual(['{}', '{1}', '{2}', '{1, 2}']);
        expect(p.contains(new NamedSet<number>())).toBe(true);
    });

    it('clone of a frozen set is mutable', () => {
        const frozen = NamedSet.from('x', [1]).freeze();
        const copy = frozen.clone();
        expect(copy.isFrozen).toBe(false);
        copy.insert(2);
        expect(copy.elements()).toEqual([1, 2]);
        expect(frozen.elements()).toEqual([1]);
    });
});
