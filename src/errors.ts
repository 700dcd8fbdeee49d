/**
 * @module errors
 * Error taxonomy shared by the hash map, the multiway tree and the currency helpers.
 *
 * Absent keys are NOT errors in the core structures: `search` returns `undefined`
 * and `delete` / `remove` return `false`. Everything below is thrown.
 */

export type ErrorCode =
    | 'invalid_capacity'
    | 'invalid_configuration'
    | 'invalid_prime_table'
    | 'exhausted_prime_table'
    | 'duplicate_key'
    | 'key_not_found'
    | 'empty_collection'
    | 'invalid_order'
    | 'invariant_violation'
    | 'invalid_currency_code'
    | 'invalid_amount'
    | 'unmakeable_change';

/** Base class of every error raised by this package. */
export class CurrencyIndexError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string) {
        super(message);
        this.code = code;
        this.name = new.target.name;
    }
}

// ============================================================================
// HASH MAP / PRIMES
// ============================================================================

export class InvalidCapacityError extends CurrencyIndexError {
    constructor(readonly capacity: number) {
        super('invalid_capacity', `Capacity must be an integer >= 2, got ${capacity}`);
    }
}

export class InvalidConfigurationError extends CurrencyIndexError {
    constructor(readonly option: string, message: string) {
        super('invalid_configuration', `${option}: ${message}`);
    }
}

export class InvalidPrimeTableError extends CurrencyIndexError {
    constructor(message: string) {
        super('invalid_prime_table', message);
    }
}

/** The prime table has no entry large enough for the requested size. */
export class ExhaustedPrimeTableError extends CurrencyIndexError {
    constructor(readonly requested: number, readonly largest: number) {
        super('exhausted_prime_table', `No prime >= ${requested} available (largest known prime is ${largest})`);
    }
}

// ============================================================================
// KEYED COLLECTIONS
// ============================================================================

export class DuplicateKeyError extends CurrencyIndexError {
    constructor(readonly key: unknown) {
        super('duplicate_key', `Key ${String(key)} is already present`);
    }
}

export class KeyNotFoundError extends CurrencyIndexError {
    constructor(readonly key: unknown) {
        super('key_not_found', `Key ${String(key)} is not present`);
    }
}

export class EmptyCollectionError extends CurrencyIndexError {
    constructor(what: string) {
        super('empty_collection', `${what} is empty`);
    }
}

export class InvalidOrderError extends CurrencyIndexError {
    constructor(readonly order: number) {
        super('invalid_order', `Tree order must be an integer >= 3, got ${order}`);
    }
}

/**
 * A structural guarantee was broken. Indicates a bug in the data structure,
 * never a caller mistake.
 */
export class InvariantViolationError extends CurrencyIndexError {
    constructor(message: string) {
        super('invariant_violation', message);
    }
}

// ============================================================================
// CURRENCY
// ============================================================================

export class InvalidCurrencyCodeError extends CurrencyIndexError {
    constructor(readonly currencyCode: string) {
        super('invalid_currency_code', `${currencyCode} is not a valid ISO-4217 code`);
    }
}

export class InvalidAmountError extends CurrencyIndexError {
    constructor(readonly amount: number, reason: string) {
        super('invalid_amount', `Invalid amount ${amount}: ${reason}`);
    }
}

export class UnmakeableChangeError extends CurrencyIndexError {
    constructor(readonly amount: number, readonly remainder: number) {
        super('unmakeable_change', `Cannot make change for ${amount}: ${remainder} left over`);
    }
}

/**
 * Asserts a structural condition, raising {@link InvariantViolationError} when it fails.
 */
export function invariant(condition: boolean, message: string): asserts condition {
    if (!condition) throw new InvariantViolationError(message);
}
