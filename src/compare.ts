/**
 * @module compare
 * Total ordering for tree keys.
 */

export interface Comparable<T = unknown> {
    /** Negative if this < other, positive if this > other, 0 if equal. */
    compareTo(other: T): number;
}

export type OrderedKey = number | string | Comparable;

export type Comparator<K> = (a: K, b: K) => number;

const typeScore = (v: OrderedKey): number => typeof v === 'number' ? 1 : typeof v === 'string' ? 2 : 3;

/**
 * Natural order: numbers < strings < Comparable objects, each group ordered
 * by value (objects through `compareTo`).
 * Contract: no NaN keys.
 */
export function naturalCompare(a: OrderedKey, b: OrderedKey): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : a > b ? 1 : 0;
    if (typeof a === 'object' && typeof b === 'object') return a.compareTo(b);
    return typeScore(a) - typeScore(b);
}
