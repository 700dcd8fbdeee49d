import { Currency } from '../src/currency/currency';
import { currencyCodes, isValidCurrencyCode } from '../src/currency/registry';
import { Denominations } from '../src/currency/denominations';
import { ExchangeRates } from '../src/currency/exchange-rates';
import { makeChange } from '../src/currency/change';
import { EURO_DENOMINATIONS, listCurrencies } from '../src/demo/tree-listing';
import { runCollisionExperiment } from '../src/demo/collisions';
import {
    CurrencyIndexError,
    DuplicateKeyError,
    EmptyCollectionError,
    InvalidAmountError,
    InvalidCurrencyCodeError,
    KeyNotFoundError,
    UnmakeableChangeError,
} from '../src/errors';

// --- Simple Test Runner ---
let passed = 0;
let failed = 0;

function test(name: string, fn: () => void) {
    try {
        process.stdout.write(`Testing: ${name.padEnd(55)} `);
        fn();
        console.log("✅ PASS");
        passed++;
    } catch (e: unknown) {
        console.log("❌ FAIL");
        console.error("   Error:", e instanceof Error ? e.message : String(e));
        failed++;
    }
}

function assert(condition: boolean, msg: string) {
    if (!condition) throw new Error(msg);
}

function assertEq<T>(actual: T, expected: T, msg: string) {
    if (actual !== expected) throw new Error(`${msg} | expected ${String(expected)}, got ${String(actual)}`);
}

function assertThrows(fn: () => unknown, type: new (...args: never[]) => Error, msg: string) {
    try {
        fn();
    } catch (e) {
        if (e instanceof type) return;
        throw new Error(`${msg} | threw ${String(e)}`);
    }
    throw new Error(`${msg} | nothing thrown`);
}

console.log("=== Currency helpers ===\n");

// ============================================================================
// Currency & registry
// ============================================================================

test("Registry lists the bundled codes in order", () => {
    const codes = currencyCodes();
    assertEq(codes.length, 178, "code count");
    assertEq(codes[0], 'AED', "first code");
    assert(codes.every((c, i) => i === 0 || codes[i - 1] < c), "ascending");
    assert(isValidCurrencyCode('EUR') && !isValidCurrencyCode('eur') && !isValidCurrencyCode('XYZ'), "membership");
});

test("Currency validates and formats", () => {
    const c = new Currency('EUR', 12.5);
    assertEq(c.toString(), '12.50 EUR', "toString");
    assertEq(c.withAmount(3).toString(), '3.00 EUR', "withAmount");
    assertEq(c.amount, 12.5, "source value unchanged");
    assertThrows(() => new Currency('XYZ', 1), InvalidCurrencyCodeError, "unknown code");
    assertThrows(() => new Currency('EUR', Number.NaN), InvalidAmountError, "NaN amount");
    assertThrows(() => new Currency('EUR', Infinity), CurrencyIndexError, "errors share a base class");
});

test("Currency identity is its code", () => {
    const a = new Currency('USD', 1);
    const b = new Currency('USD', 2);
    assert(a.equals(b) && a.hashCode === b.hashCode, "same code, same identity");
    assert(!a.equals(new Currency('EUR', 1)), "different code");
    assert(a.compareTo(new Currency('EUR')) > 0 && new Currency('CHF').compareTo(a) < 0, "ordered by code");
    assertEq(a.compareTo(b), 0, "amount does not order");
});

// ============================================================================
// Denominations
// ============================================================================

test("Denominations keep values ordered", () => {
    const d = new Denominations([0.5, 0.01, 2, 0.2]);
    assertEq(d.toString(), '{0.01, 0.2, 0.5, 2}', "ascending");
    assertEq([...d.descending()].join(','), '2,0.5,0.2,0.01', "descending");
    assertEq(d.min(), 0.01, "min");
    assertEq(d.max(), 2, "max");
    assertEq(d.next(0.2), 0.5, "next");
    assertEq(d.previous(0.01), undefined, "nothing before the smallest");
    assertEq(d.smallestAbove(0.3), 0.5, "smallestAbove an arbitrary value");
    assertEq(d.largestBelow(0.3), 0.2, "largestBelow an arbitrary value");
});

test("Denominations reject bad input", () => {
    const d = new Denominations([0.5, 1]);
    assertThrows(() => d.add(0), InvalidAmountError, "zero");
    assertThrows(() => d.add(-1), InvalidAmountError, "negative");
    assertThrows(() => d.add(0.5), DuplicateKeyError, "duplicate");
    assertThrows(() => d.remove(7), KeyNotFoundError, "absent removal");
    assertThrows(() => d.next(0.3), KeyNotFoundError, "next of a non-denomination");
    d.remove(0.5);
    d.remove(1);
    assert(d.isEmpty(), "emptied");
    assertThrows(() => d.min(), EmptyCollectionError, "min of nothing");
});

// ============================================================================
// Change
// ============================================================================

test("Change for 12.85 EUR uses six pieces", () => {
    const change = makeChange(12.85, new Denominations(EURO_DENOMINATIONS));
    assertEq(change.coins.join(','), '10,2,0.5,0.2,0.1,0.05', "coins");
    assertEq(change.count, 6, "count");
});

test("Change edge cases", () => {
    const euro = new Denominations(EURO_DENOMINATIONS);
    assertEq(makeChange(0, euro).count, 0, "nothing to change");
    assertEq(makeChange(0.3, euro).coins.join(','), '0.2,0.1', "no float drift on 0.3");
    assertThrows(() => makeChange(-1, euro), InvalidAmountError, "negative amount");
    assertThrows(() => makeChange(0.03, new Denominations([0.02])), UnmakeableChangeError, "remainder left");
});

// ============================================================================
// Exchange rates
// ============================================================================

test("ExchangeRates stores and converts", () => {
    const rates = new ExchangeRates('EUR');
    rates.add('USD', 1.25);
    rates.add('GBP', 0.5);
    rates.add('EUR', 1);
    assertEq(rates.size, 3, "size");
    assertEq(rates.get('USD'), 1.25, "get");
    assertEq(rates.convert(new Currency('EUR', 8), 'USD').toString(), '10.00 USD', "convert");
    assertEq(rates.convert(new Currency('EUR', 8), 'EUR').toString(), '8.00 EUR', "identity");

    rates.update('USD', 2);
    assertEq(rates.get('USD'), 2, "update overwrites");
    rates.remove('GBP');
    assert(!rates.has('GBP'), "removed");
    assertEq([...rates].map(([code]) => code).sort().join(','), 'EUR,USD', "iteration");
    assert(rates.collisions >= 0, "collision counter exposed");
});

test("ExchangeRates rejects bad input", () => {
    const rates = new ExchangeRates('EUR');
    rates.add('USD', 1.25);
    assertThrows(() => new ExchangeRates('XYZ'), InvalidCurrencyCodeError, "bad base");
    assertThrows(() => rates.add('USD', 1.3), DuplicateKeyError, "duplicate");
    assertThrows(() => rates.add('JPY', 0), InvalidAmountError, "zero rate");
    assertThrows(() => rates.add('EUR', 2), InvalidAmountError, "base rate other than 1");
    assertThrows(() => rates.get('XYZ'), InvalidCurrencyCodeError, "bad code");
    assertThrows(() => rates.remove('GBP'), KeyNotFoundError, "absent removal");
    assertThrows(() => rates.convert(new Currency('USD', 1), 'EUR'), InvalidCurrencyCodeError, "wrong source currency");
    assertThrows(() => rates.convert(new Currency('EUR', 1), 'GBP'), KeyNotFoundError, "no rate");
    assert(!rates.has('XYZ'), "has() of a bad code is false");
});

test("Copies are independent of their source", () => {
    const coins = new Denominations([0.5, 1, 2], 3);
    const coinsCopy = coins.copy();
    coinsCopy.add(5);
    coins.remove(0.5);
    assertEq(coins.toString(), '{1, 2}', "source");
    assertEq(coinsCopy.toString(), '{0.5, 1, 2, 5}', "copy");

    const rates = new ExchangeRates('EUR');
    rates.add('USD', 1.25);
    rates.add('GBP', 0.5);
    const ratesCopy = rates.copy();
    assertEq(ratesCopy.base, 'EUR', "base");
    assertEq(ratesCopy.collisions, rates.collisions, "collision count carried over");
    ratesCopy.update('USD', 2);
    rates.remove('GBP');
    assertEq(rates.get('USD'), 1.25, "source rate unchanged");
    assertEq(ratesCopy.get('GBP'), 0.5, "copy keeps removed rate");
    assertEq(ratesCopy.get('USD'), 2, "copy updated");
});

// ============================================================================
// Demos
// ============================================================================

test("listCurrencies orders by code and keeps the first amount", () => {
    const wallet = [
        new Currency('USD', 120.5),
        new Currency('EUR', 80),
        new Currency('JPY', 15000),
        new Currency('GBP', 42.25),
        new Currency('CHF', 10),
        new Currency('AUD', 64.1),
        new Currency('EUR', 1),
    ];
    const lines = listCurrencies(wallet);
    assertEq(lines.join('|'), 'AUD 64.10|CHF 10.00|EUR 80.00|GBP 42.25|JPY 15000.00|USD 120.50', "listing");
    assertEq(listCurrencies(wallet, 3).join('|'), lines.join('|'), "order does not change the listing");
});

test("Collision experiment is deterministic per seed", () => {
    const options = { trials: 25, inserts: 70, deletes: 30, base: 92821, seed: 7 };
    const first = runCollisionExperiment(options);
    const second = runCollisionExperiment(options);
    assertEq(first.meanCollisions, second.meanCollisions, "same mean");
    assertEq(first.maxCollisions, second.maxCollisions, "same worst case");
    assert(first.maxCollisions >= first.meanCollisions, "worst >= mean");
    assertEq(runCollisionExperiment({ ...options, trials: 0 }).meanCollisions, 0, "no trials");
});

console.log(`\n-----------------------------------------`);
console.log(`Tests: ${passed + failed}`);
console.log(`Passed: ${passed}`);
console.log(`Failed: ${failed}`);
process.exit(failed === 0 ? 0 : 1);
