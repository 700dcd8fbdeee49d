/**
 * Inserts a handful of currencies into a multiway search tree, prints them in
 * code order, then makes change for an amount in euro coins and notes.
 *
 * Usage: tsx src/demo/tree-listing.ts
 */

import { makeChange } from '../currency/change';
import { Currency } from '../currency/currency';
import { Denominations } from '../currency/denominations';
import { DuplicateKeyError } from '../errors';
import { MultiWaySearchTree } from '../multiway-search-tree';

export const EURO_DENOMINATIONS = [0.01, 0.02, 0.05, 0.1, 0.2, 0.5, 1, 2, 5, 10, 20, 50, 100, 200, 500];

/**
 * Indexes `currencies` by code and returns one listing line per currency,
 * ascending. A repeated code keeps its first amount.
 */
export function listCurrencies(currencies: Iterable<Currency>, order = 4): string[] {
    const tree = new MultiWaySearchTree<Currency, number>({ order });
    for (const c of currencies) {
        try {
            tree.insert(c, c.amount);
        } catch (e) {
            if (!(e instanceof DuplicateKeyError)) throw e;
        }
    }
    return [...tree.traverseInorder()].map(([c, amount]) => `${c.code} ${amount.toFixed(2)}`);
}

if (require.main === module) {
    const wallet = [
        new Currency('USD', 120.5),
        new Currency('EUR', 80),
        new Currency('JPY', 15000),
        new Currency('GBP', 42.25),
        new Currency('CHF', 10),
        new Currency('AUD', 64.1),
        new Currency('EUR', 1),
    ];

    console.log('--- Currencies (in order) ---');
    for (const line of listCurrencies(wallet)) console.log(line);

    console.log('\n--- Change for 12.85 EUR ---');
    const change = makeChange(12.85, new Denominations(EURO_DENOMINATIONS));
    console.log(`${change.count} pieces: ${change.coins.join(' + ')}`);
}
