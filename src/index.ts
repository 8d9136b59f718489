/**
 * @module named-set-algebra
 * Order-preserving sets with value-semantics equality, set algebra,
 * and a registry that addresses sets by name.
 */

export { NamedSet, emptySet, type SetOptions } from './named-set';
export {
    Tuple,
    compareKeys,
    formatValue,
    isEquatable,
    valueEquals,
    type Equatable,
    type EqualityFn,
    type KeyFn,
    type Primitive,
} from './values';
export { LinearIndex, OrderedIndex, type ElementIndex } from './element-index';
export {
    SetRegistry,
    BINARY_OPERATIONS,
    UNARY_OPERATIONS,
    isBinaryOperation,
    isUnaryOperation,
    type BinaryOperation,
    type UnaryOperation,
} from './registry';
export {
    SetRegistryError,
    NotFoundError,
    InvalidOperationError,
    UnsupportedOperationError,
    type SetRegistryErrorCode,
} from './errors';
export { Logger, LOG, enableLoggers, type LogNamespace } from './logger';
export {
    ScriptInterpreter,
    consoleOutput,
    parseIntList,
    parseScript,
    runScript,
    type Script,
    type ScriptCommand,
    type ScriptOutput,
    type SetDefinition,
} from './script';
