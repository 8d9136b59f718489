export type SetRegistryErrorCode = 'NOT_FOUND' | 'INVALID_OPERATION' | 'UNSUPPORTED_OPERATION';

/**
 * Base class of every failure raised by the registry.
 * `op` names the registry method that raised it, e.g. `registry.getSet`.
 */
export class SetRegistryError extends Error {
    constructor(
        readonly code: SetRegistryErrorCode,
        readonly op: string,
        message: string
    ) {
        super(message);
        this.name = new.target.name;
    }
}

/** A referenced name is absent from the registry. */
export class NotFoundError extends SetRegistryError {
    constructor(readonly setName: string, op: string) {
        super('NOT_FOUND', op, `Set '${setName}' not found.`);
    }
}

/** A binary operation token is not one of the four algebra operations. */
export class InvalidOperationError extends SetRegistryError {
    constructor(readonly operation: string, op: string) {
        super('INVALID_OPERATION', op, `Invalid operation: '${operation}'`);
    }
}

export class UnsupportedOperationError extends SetRegistryError {
    constructor(readonly operation: string, op: string) {
        super('UNSUPPORTED_OPERATION', op, `Unsupported unary operation: '${operation}'`);
    }
}
