/**
 * @module currency
 * Immutable currency amount, identified by its ISO-4217 code.
 *
 * Equality, hashing and ordering all go through the code alone, so a
 * `Currency` works as a key of both the hash map and the multiway tree.
 */

import type { Comparable } from '../compare';
import { InvalidAmountError, InvalidCurrencyCodeError } from '../errors';
import { type Hashable, hashCode } from '../hashing';
import { isValidCurrencyCode } from './registry';

export class Currency implements Hashable, Comparable<Currency> {
    readonly code: string;
    readonly amount: number;
    readonly hashCode: number;

    /**
     * @throws {InvalidCurrencyCodeError} if `code` is not in the ISO-4217 registry.
     * @throws {InvalidAmountError} if `amount` is not finite.
     */
    constructor(code: string, amount: number = 0) {
        if (!isValidCurrencyCode(code)) throw new InvalidCurrencyCodeError(code);
        if (!Number.isFinite(amount)) throw new InvalidAmountError(amount, 'must be finite');
        this.code = code;
        this.amount = amount;
        this.hashCode = hashCode(code);
        Object.freeze(this);
    }

    /** Same code, new amount. */
    withAmount(amount: number): Currency {
        return new Currency(this.code, amount);
    }

    compareTo(other: Currency): number {
        return this.code < other.code ? -1 : this.code > other.code ? 1 : 0;
    }

    equals(other: unknown): boolean {
        return other instanceof Currency && other.code === this.code;
    }

    toString(): string { return `${this.amount.toFixed(2)} ${this.code}`; }
    [Symbol.for('nodejs.util.inspect.custom')]() { return this.toString(); }
}
