/**
 * Greedy change-making over a currency's denominations.
 */

import { InvalidAmountError, UnmakeableChangeError } from '../errors';
import { Denominations } from './denominations';

export interface Change {
    /** Denominations used, largest first. */
    coins: number[];
    count: number;
}

/**
 * Decomposes `amount` into denominations, taking the largest that still fits
 * at every step. Arithmetic runs on integer minor units (`decimals` places)
 * so values like 0.1 do not accumulate rounding error.
 *
 * @throws {InvalidAmountError} for negative or non-finite amounts.
 * @throws {UnmakeableChangeError} if a remainder is left that no denomination covers.
 */
export function makeChange(amount: number, denominations: Denominations, decimals: number = 2): Change {
    if (!Number.isFinite(amount) || amount < 0) throw new InvalidAmountError(amount, 'must be a non-negative number');
    const scale = 10 ** decimals;
    let remaining = Math.round(amount * scale);
    const coins: number[] = [];

    for (const d of denominations.descending()) {
        const unit = Math.round(d * scale);
        if (unit === 0) continue;
        while (remaining >= unit) {
            remaining -= unit;
            coins.push(d);
        }
    }

    if (remaining !== 0) throw new UnmakeableChangeError(amount, remaining / scale);
    return { coins, count: coins.length };
}
