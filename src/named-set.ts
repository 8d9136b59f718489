/**
 * @module named-set
 * @description
 * Order-preserving set of unique values carrying a display name.
 *
 * * Features:
 * - Insertion order is the enumeration and print order; nothing is sorted.
 * - Uniqueness needs only an equality relation (`SetOptions.equals`).
 * - Optional key projection switches membership to an ordered index.
 * - Algebra never mutates its operands: every result is a fresh set.
 *
 * * Contracts:
 * - Elements must not be mutated after insertion.
 * - A set stored as an element of another set is frozen; `clone()` thaws.
 * - The name is a label only; it never takes part in equality.
 */

import { createIndex, type ElementIndex } from './element-index';
import {
    Tuple,
    formatValue,
    valueEquals,
    type Equatable,
    type EqualityFn,
    type KeyFn,
} from './values';

export interface SetOptions<T> {
    /** Equality relation deciding uniqueness. Defaults to `valueEquals`. */
    equals?: EqualityFn<T>;
    /** Comparable projection for the ordered index. Equal elements must map to equal keys. */
    key?: KeyFn<T>;
}

/** Result label for a binary operation; unnamed operands give an unnamed result. */
function deriveName(a: string, infix: string, b: string): string {
    return a && b ? `${a}${infix}${b}` : '';
}

export class NamedSet<T> implements Equatable {
    #name: string;
    readonly #options: SetOptions<T>;
    readonly #equals: EqualityFn<T>;
    readonly #elements: T[] = [];
    readonly #index: ElementIndex<T>;
    #isFrozen = false;

    /**
     * Constructs an empty set.
     * @param name - Display label. Empty means "unnamed".
     */
    constructor(name: string = '', options: SetOptions<T> = {}) {
        this.#name = name;
        this.#options = options;
        this.#equals = options.equals ?? valueEquals;
        this.#index = createIndex(this.#elements, this.#equals, options.key);
    }

    /** Builds a set from `values`, keeping the first occurrence of each. */
    static from<U>(name: string, values: Iterable<U>, options?: SetOptions<U>): NamedSet<U> {
        const s = new NamedSet<U>(name, options);
        for (const v of values) s.insert(v);
        return s;
    }

    get name(): string { return this.#name; }
    set name(value: string) {
        this.#checkFrozen('rename');
        this.#name = value;
    }

    get isFrozen(): boolean { return this.#isFrozen; }

    /** Makes the set read-only. Irreversible; `clone()` returns a mutable copy. */
    freeze(): this {
        this.#isFrozen = true;
        return this;
    }

    #checkFrozen(op: string) {
        if (this.#isFrozen) throw new Error(`InvalidOperation: Cannot ${op} a frozen NamedSet.`);
    }

    get size(): number { return this.#elements.length; }
    isEmpty(): boolean { return this.#elements.length === 0; }

    // --- Element Store ---

    contains(value: T): boolean {
        return this.#index.has(value);
    }

    /** Appends `value` unless an equal element is already present. Throws if frozen. */
    insert(value: T): this {
        this.#checkFrozen('insert into');
        if (this.#index.has(value)) return this;
        this.#append(value);
        return this;
    }

    #append(value: T) {
        if (value instanceof NamedSet) value.freeze();
        this.#elements.push(value);
        this.#index.add(value);
    }

    /** Snapshot of the elements in insertion order. */
    elements(): T[] {
        return this.#elements.slice();
    }

    /** Independent, unfrozen copy: same name, same options, same order. Nested sets stay shared. */
    clone(): NamedSet<T> {
        return this.#derive(this.#name, this.#elements);
    }

    /**
     * New set sharing this set's options, filled with values known to be unique.
     * No membership check.
     */
    #derive(name: string, unique: readonly T[]): NamedSet<T> {
        const s = new NamedSet<T>(name, this.#options);
        for (const v of unique) s.#append(v);
        return s;
    }

    // --- Set Algebra ---

    /** A ∪ B: this set's elements, then the other's elements not yet present. */
    unionWith(other: NamedSet<T>): NamedSet<T> {
        const s = this.#derive(deriveName(this.#name, ' ∪ ', other.name), this.#elements);
        for (const v of other.#elements) s.insert(v);
        return s;
    }

    /** A ∩ B in this set's order. */
    intersectionWith(other: NamedSet<T>): NamedSet<T> {
        const res = this.#elements.filter(v => other.contains(v));
        return this.#derive(deriveName(this.#name, ' ∩ ', other.name), res);
    }

    /** A \ B in this set's order. */
    differenceWith(other: NamedSet<T>): NamedSet<T> {
        const res = this.#elements.filter(v => !other.contains(v));
        return this.#derive(deriveName(this.#name, '-', other.name), res);
    }

    /** A Δ B: (A \ B) in this set's order, then (B \ A) in the other's order. */
    symmetricDifferenceWith(other: NamedSet<T>): NamedSet<T> {
        const s = this.#derive(
            deriveName(this.#name, ' symmetric_difference ', other.name),
            this.#elements.filter(v => !other.contains(v))
        );
        for (const v of other.#elements) {
            if (!this.contains(v)) s.insert(v);
        }
        return s;
    }

    /** True iff every element of this set is a member of `other`. */
    isSubsetOf(other: NamedSet<T>): boolean {
        return this.#elements.every(v => other.contains(v));
    }

    isSupersetOf(other: NamedSet<T>): boolean { return other.isSubsetOf(this); }
    isProperSubsetOf(other: NamedSet<T>): boolean { return this.isSubsetOf(other) && !other.isSubsetOf(this); }

    /** Content equality by double inclusion. Complexity: O(N * M). */
    isEqualTo(other: NamedSet<T>): boolean {
        return this.isSubsetOf(other) && other.isSubsetOf(this);
    }

    /** Equality capability used when this set is itself an element. */
    equals(other: unknown): boolean {
        return other instanceof NamedSet && this.isEqualTo(other);
    }

    /**
     * Generates the power set P(S).
     * Subset k holds element i iff bit i of k is set, in ascending index order.
     * Subsets are frozen as they are stored. Members are indexed by cardinality, so each insert compares only
     * against subsets of the same size.
     * Warning: Exponential Complexity O(2^N).
     */
    powerSet(): NamedSet<NamedSet<T>> {
        const arr = this.#elements;
        const n = arr.length;
        const result = new NamedSet<NamedSet<T>>(this.#name ? `${this.#name} Power Set` : '', {
            key: subset => subset.size,
        });
        const total = 2 ** n;
        for (let k = 0; k < total; k++) {
            const subset: T[] = [];
            let bits = k;
            for (let i = 0; i < n && bits > 0; i++) {
                if (bits % 2 === 1) subset.push(arr[i]);
                bits = Math.floor(bits / 2);
            }
            result.insert(this.#derive('', subset));
        }
        return result;
    }

    /**
     * Cartesian Product (A × B). Outer loop over this set, inner over `other`.
     * Both operands are duplicate-free, so no pair repeats. Complexity: O(N * M).
     */
    cartesianProductWith<U>(other: NamedSet<U>): NamedSet<Tuple<[T, U]>> {
        const result = new NamedSet<Tuple<[T, U]>>(deriveName(this.#name, ' × ', other.name));
        for (const a of this.#elements) {
            for (const b of other.#elements) {
                result.#append(new Tuple<[T, U]>(a, b));
            }
        }
        return result;
    }

    // --- Output ---

    *[Symbol.iterator](): Iterator<T> { yield* this.#elements; }

    /** `{e1, e2, ...}` without the name. */
    toString(): string { return `{${this.#elements.map(formatValue).join(', ')}}`; }

    /** `name = {e1, e2, ...}`, or just the braces when unnamed. */
    render(): string {
        return this.#name ? `${this.#name} = ${this.toString()}` : this.toString();
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return this.render(); }
}

export function emptySet<T>(name: string = ''): NamedSet<T> { return new NamedSet<T>(name); }
