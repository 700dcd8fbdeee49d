/**
 * @module primes
 * Read-only access to a curated, increasing table of primes.
 * The hash map draws its capacities from here: double hashing only visits
 * every slot when the table size is prime.
 */

import bundledPrimes from './data/primes.json';
import { ExhaustedPrimeTableError, InvalidPrimeTableError } from './errors';

export class PrimeSource implements Iterable<number> {
    readonly #table: ReadonlyArray<number>;

    /**
     * @param table Strictly increasing primes. Defaults to the bundled table
     * (every prime below 65 536, then roughly doubling up to 2^31 - 1).
     */
    constructor(table: ReadonlyArray<number> = bundledPrimes) {
        if (table.length === 0) throw new InvalidPrimeTableError('Prime table is empty');
        for (let i = 0; i < table.length; i++) {
            const p = table[i];
            if (!Number.isInteger(p) || p < 2) {
                throw new InvalidPrimeTableError(`Entry ${i} (${p}) is not a prime`);
            }
            if (i > 0 && p <= table[i - 1]) {
                throw new InvalidPrimeTableError(`Table is not strictly increasing at index ${i}`);
            }
        }
        this.#table = Object.freeze(table.slice());
    }

    get size(): number { return this.#table.length; }
    get largest(): number { return this.#table[this.#table.length - 1]; }

    /**
     * Index of the first table entry >= n (table length when there is none).
     */
    private lowerBound(n: number): number {
        let lo = 0;
        let hi = this.#table.length;
        while (lo < hi) {
            const mid = (lo + hi) >>> 1;
            if (this.#table[mid] < n) lo = mid + 1;
            else hi = mid;
        }
        return lo;
    }

    /**
     * Smallest known prime >= n.
     * @throws {ExhaustedPrimeTableError} if n exceeds the largest prime in the table.
     */
    nextPrimeAtLeast(n: number): number {
        const idx = this.lowerBound(n);
        if (idx === this.#table.length) throw new ExhaustedPrimeTableError(n, this.largest);
        return this.#table[idx];
    }

    /** Largest known prime strictly below n, if any. */
    previousPrimeBelow(n: number): number | undefined {
        const idx = this.lowerBound(n);
        return idx === 0 ? undefined : this.#table[idx - 1];
    }

    has(n: number): boolean {
        const idx = this.lowerBound(n);
        return idx < this.#table.length && this.#table[idx] === n;
    }

    [Symbol.iterator](): Iterator<number> { return this.#table[Symbol.iterator](); }

    toString(): string { return `PrimeSource{${this.size} primes, max ${this.largest}}`; }
}

let shared: PrimeSource | null = null;

/** Lazily built source over the bundled table, shared by every map that does not bring its own. */
export function defaultPrimeSource(): PrimeSource {
    if (shared === null) shared = new PrimeSource();
    return shared;
}
