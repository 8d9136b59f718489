import createRBTree from 'functional-red-black-tree';
import { compareKeys, type EqualityFn, type KeyFn, type Primitive } from './values';

/**
 * Membership lookup for a set's elements.
 * The set keeps insertion order in its own list; an index answers `has` only.
 */
export interface ElementIndex<T> {
    has(value: T): boolean;
    /** Registers a value already known to be absent. */
    add(value: T): void;
}

/**
 * Scans the set's live element list with the equality relation.
 * Complexity: O(N) per lookup.
 */
export class LinearIndex<T> implements ElementIndex<T> {
    constructor(
        private readonly elements: readonly T[],
        private readonly equals: EqualityFn<T>
    ) {}

    has(value: T): boolean {
        const arr = this.elements;
        const len = arr.length;
        for (let i = 0; i < len; i++) {
            if (this.equals(arr[i], value)) return true;
        }
        return false;
    }

    add(): void {
        // the element list is shared with the owning set
    }
}

type KeyTree<T> = ReturnType<typeof createRBTree<Primitive, T[]>>;

/**
 * Red-black tree from projected key to the bucket of elements with that key.
 * Buckets are resolved with the equality relation, so colliding keys stay correct.
 * Complexity: O(log K + bucket) per lookup.
 */
export class OrderedIndex<T> implements ElementIndex<T> {
    #tree: KeyTree<T> = createRBTree<Primitive, T[]>(compareKeys);

    constructor(
        private readonly key: KeyFn<T>,
        private readonly equals: EqualityFn<T>
    ) {}

    /** Number of distinct keys. */
    get keyCount(): number { return this.#tree.length; }

    has(value: T): boolean {
        const bucket = this.#tree.get(this.key(value));
        if (!bucket) return false;
        for (const el of bucket) {
            if (this.equals(el, value)) return true;
        }
        return false;
    }

    add(value: T): void {
        const k = this.key(value);
        const bucket = this.#tree.get(k);
        if (bucket) bucket.push(value);
        else this.#tree = this.#tree.insert(k, [value]);
    }
}

/** Picks the index strategy: ordered when a key projection is given, linear otherwise. */
export function createIndex<T>(elements: readonly T[], equals: EqualityFn<T>, key?: KeyFn<T>): ElementIndex<T> {
    return key ? new OrderedIndex(key, equals) : new LinearIndex(elements, equals);
}
