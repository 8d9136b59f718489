/**
 * @module values
 * @description
 * Value-level building blocks shared by every set: the equality capability,
 * the ordering used for index keys, the immutable Tuple and string formatting.
 *
 * * Contracts:
 * - Equality is the only requirement on elements. No hashing, no ordering.
 * - Objects opt into value semantics by implementing `Equatable`.
 * - Arrays are compared entry by entry; plain objects by reference.
 */

export type Primitive = number | string;

/** Decides whether two elements are the same member of a set. */
export type EqualityFn<T> = (a: T, b: T) => boolean;

/**
 * Projects an element onto a comparable key.
 * Must agree with the equality in use: equal elements, equal keys.
 */
export type KeyFn<T> = (value: T) => Primitive;

/**
 * Interface for objects that support Value Semantics.
 * `NamedSet` and `Tuple` implement it, which is how a set of sets compares
 * its members by content rather than by reference.
 */
export interface Equatable {
    equals(other: unknown): boolean;
}

export function isEquatable(v: unknown): v is Equatable {
    return typeof v === 'object' && v !== null && 'equals' in v && typeof v.equals === 'function';
}

// ============================================================================
// 1. EQUALITY
// ============================================================================

/**
 * Default equality relation.
 * - Identity / primitive equality first (`NaN` is equal to itself).
 * - `Equatable` objects decide for themselves.
 * - Arrays: same length and pairwise `valueEquals`.
 */
export function valueEquals(a: unknown, b: unknown): boolean {
    if (a === b) return true;
    if (typeof a === 'number' && typeof b === 'number') return Number.isNaN(a) && Number.isNaN(b);
    if (isEquatable(a)) return a.equals(b);
    if (Array.isArray(a) && Array.isArray(b)) return sequenceEquals(a, b);
    return false;
}

export function sequenceEquals(a: ReadonlyArray<unknown>, b: ReadonlyArray<unknown>): boolean {
    const len = a.length;
    if (len !== b.length) return false;
    for (let i = 0; i < len; i++) {
        if (!valueEquals(a[i], b[i])) return false;
    }
    return true;
}

// ============================================================================
// 2. KEY ORDERING
// ============================================================================

/**
 * Total order over index keys.
 * Numbers (ascending, NaN first) sort before strings (ascending by code unit).
 * @returns Negative if a < b, Positive if a > b, 0 if equal.
 */
export function compareKeys(a: Primitive, b: Primitive): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') {
        if (Number.isNaN(a)) return Number.isNaN(b) ? 0 : -1;
        if (Number.isNaN(b)) return 1;
        return a - b;
    }
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    return typeof a === 'number' ? -1 : 1;
}

// ============================================================================
// 3. FORMATTING
// ============================================================================

/** Renders one element. Sets and tuples format themselves through `toString`. */
export function formatValue(v: unknown): string {
    if (Array.isArray(v)) return `[${v.map(formatValue).join(', ')}]`;
    return String(v);
}

// ============================================================================
// 4. TUPLE
// ============================================================================

/**
 * Immutable wrapper for an ordered sequence of values.
 * Cartesian products yield `Tuple<[A, B]>` pairs.
 * @template T - Array type of the entries.
 */
export class Tuple<T extends unknown[]> implements Equatable {
    readonly #values: T;

    constructor(...values: T) {
        this.#values = values;
        Object.freeze(this.#values);
    }

    get raw(): Readonly<T> { return this.#values; }
    get length(): number { return this.#values.length; }

    get(i: number): T[number] { return this.#values[i]; }

    equals(other: unknown): boolean {
        return other instanceof Tuple && sequenceEquals(this.#values, other.#values);
    }

    *[Symbol.iterator](): Iterator<T[number]> {
        const len = this.#values.length;
        for (let i = 0; i < len; i++) yield this.#values[i];
    }

    toString(): string { return `(${this.#values.map(formatValue).join(', ')})`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
