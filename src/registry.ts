import { InvalidOperationError, NotFoundError, UnsupportedOperationError } from './errors';
import { LOG } from './logger';
import type { NamedSet } from './named-set';
import type { Tuple } from './values';

export const BINARY_OPERATIONS = [
    'union',
    'intersection',
    'difference',
    'symmetric_difference',
] as const;

export const UNARY_OPERATIONS = ['powerset'] as const;

export type BinaryOperation = typeof BINARY_OPERATIONS[number];
export type UnaryOperation = typeof UNARY_OPERATIONS[number];

export function isBinaryOperation(token: string): token is BinaryOperation {
    return BINARY_OPERATIONS.some(o => o === token);
}

export function isUnaryOperation(token: string): token is UnaryOperation {
    return UNARY_OPERATIONS.some(o => o === token);
}

const log = LOG.registry;

/**
 * Name-indexed store of sets.
 *
 * - At most one set per name; `addSet` under an existing name overwrites it
 *   and keeps the name's original position in `setNames()`.
 * - Sets are held by value: `addSet` stores a copy, `getSet` returns one.
 */
export class SetRegistry<T> {
    readonly #sets = new Map<string, NamedSet<T>>();

    get size(): number { return this.#sets.size; }

    addSet(set: NamedSet<T>): void {
        if (this.#sets.has(set.name)) log.debug(`overwriting set '${set.name}'`);
        this.#sets.set(set.name, set.clone());
    }

    hasSet(name: string): boolean {
        return this.#sets.has(name);
    }

    /** @throws NotFoundError */
    getSet(name: string): NamedSet<T> {
        return this.#resolve(name, 'registry.getSet').clone();
    }

    /** @throws NotFoundError */
    insertInto(name: string, value: T): void {
        this.#resolve(name, 'registry.insertInto').insert(value);
    }

    setNames(): string[] {
        return [...this.#sets.keys()];
    }

    /**
     * Applies a binary operation to two named sets.
     * The result is labelled `(nameA op nameB)`.
     * @throws NotFoundError when either name is unknown (checked first).
     * @throws InvalidOperationError when `op` is not a binary operation.
     */
    operate(nameA: string, op: string, nameB: string): NamedSet<T> {
        const a = this.#resolve(nameA, 'registry.operate');
        const b = this.#resolve(nameB, 'registry.operate');
        if (!isBinaryOperation(op)) throw new InvalidOperationError(op, 'registry.operate');

        log.debug(`${op} ${nameA} ${nameB}`);
        const result = applyBinary(a, op, b);
        result.name = `(${nameA} ${op} ${nameB})`;
        return result;
    }

    /**
     * @throws NotFoundError
     * @throws UnsupportedOperationError for anything but `powerset`.
     */
    operateUnary(name: string, op: string): NamedSet<NamedSet<T>> {
        const a = this.#resolve(name, 'registry.operateUnary');
        if (!isUnaryOperation(op)) throw new UnsupportedOperationError(op, 'registry.operateUnary');

        log.debug(`${op} ${name}`);
        return a.powerSet();
    }

    /** @throws NotFoundError */
    cartesianProduct(nameA: string, nameB: string): NamedSet<Tuple<[T, T]>> {
        const a = this.#resolve(nameA, 'registry.cartesianProduct');
        const b = this.#resolve(nameB, 'registry.cartesianProduct');
        return a.cartesianProductWith(b);
    }

    #resolve(name: string, op: string): NamedSet<T> {
        const set = this.#sets.get(name);
        if (!set) throw new NotFoundError(name, op);
        return set;
    }
}

function applyBinary<T>(a: NamedSet<T>, op: BinaryOperation, b: NamedSet<T>): NamedSet<T> {
    switch (op) {
        case 'union': return a.unionWith(b);
        case 'intersection': return a.intersectionWith(b);
        case 'difference': return a.differenceWith(b);
        case 'symmetric_difference': return a.symmetricDifferenceWith(b);
    }
}
