/**
 * @module exchange-rates
 * Conversion rates from one base currency to others, indexed by ISO-4217 code
 * in a double hashing hash map.
 */

import { DoubleHashingHashMap, type HashMapOptions } from '../double-hashing-hash-map';
import { DuplicateKeyError, InvalidAmountError, InvalidCurrencyCodeError, KeyNotFoundError } from '../errors';
import { Currency } from './currency';
import { isValidCurrencyCode } from './registry';

export class ExchangeRates implements Iterable<[string, number]> {
    readonly base: string;
    private rates: DoubleHashingHashMap<string, number>;

    constructor(base: string, options: HashMapOptions = {}) {
        if (!isValidCurrencyCode(base)) throw new InvalidCurrencyCodeError(base);
        this.base = base;
        this.rates = new DoubleHashingHashMap<string, number>(options);
    }

    /** Independent copy, keeping the table layout and its collision count. */
    copy(): ExchangeRates {
        const twin = new ExchangeRates(this.base);
        twin.rates = this.rates.copy();
        return twin;
    }

    private check(code: string, rate?: number): void {
        if (!isValidCurrencyCode(code)) throw new InvalidCurrencyCodeError(code);
        if (rate === undefined) return;
        if (!Number.isFinite(rate) || rate <= 0) throw new InvalidAmountError(rate, 'rates must be positive');
        if (code === this.base && rate !== 1) throw new InvalidAmountError(rate, `the rate of ${code} to itself is 1`);
    }

    get size(): number { return this.rates.size; }
    get collisions(): number { return this.rates.collisionCount(); }

    /** @throws {DuplicateKeyError} if a rate for `code` already exists. */
    add(code: string, rate: number): void {
        this.check(code, rate);
        if (this.rates.has(code)) throw new DuplicateKeyError(code);
        this.rates.insert(code, rate);
    }

    /** Inserts or replaces the rate for `code`. */
    update(code: string, rate: number): void {
        this.check(code, rate);
        this.rates.insert(code, rate);
    }

    /** @throws {KeyNotFoundError} if there is no rate for `code`. */
    remove(code: string): void {
        this.check(code);
        if (!this.rates.delete(code)) throw new KeyNotFoundError(code);
    }

    get(code: string): number | undefined {
        this.check(code);
        return this.rates.search(code);
    }

    has(code: string): boolean {
        return isValidCurrencyCode(code) && this.rates.has(code);
    }

    /**
     * Converts an amount of the base currency into `code`.
     * @throws {KeyNotFoundError} if there is no rate for `code`.
     */
    convert(amount: Currency, code: string): Currency {
        if (amount.code !== this.base) throw new InvalidCurrencyCodeError(amount.code);
        if (code === this.base) return amount;
        const rate = this.get(code);
        if (rate === undefined) throw new KeyNotFoundError(code);
        return new Currency(code, amount.amount * rate);
    }

    [Symbol.iterator](): Iterator<[string, number]> { return this.rates.entries(); }
}
