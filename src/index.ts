/**
 * @module currency-index
 * Double hashing hash map and multiway search tree, with currency helpers built on them.
 */

export { PrimeSource, defaultPrimeSource } from './primes';
export { hashCode, secondaryHashCode, keysEqual, DEFAULT_SECONDARY_BASE } from './hashing';
export type { Hashable, HashKey } from './hashing';
export { primaryIndex, probeStep, probeIndex, probeSequence } from './probing';
export {
    DoubleHashingHashMap,
    DEFAULT_CAPACITY,
    DEFAULT_LOAD_FACTOR,
    DEFAULT_GROWTH_FACTOR,
} from './double-hashing-hash-map';
export type { HashMapOptions } from './double-hashing-hash-map';

export { naturalCompare } from './compare';
export type { Comparable, Comparator, OrderedKey } from './compare';
export { MultiWayNode } from './multiway-node';
export { MultiWaySearchTree, DEFAULT_ORDER } from './multiway-search-tree';
export type { TreeOptions } from './multiway-search-tree';

export { Currency } from './currency/currency';
export { isValidCurrencyCode, currencyCodes } from './currency/registry';
export { Denominations } from './currency/denominations';
export { ExchangeRates } from './currency/exchange-rates';
export { makeChange } from './currency/change';
export type { Change } from './currency/change';

export * from './errors';
