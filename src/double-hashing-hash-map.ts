/**
 * @module double-hashing-hash-map
 * @description
 * Open-addressing hash map resolving collisions by double hashing.
 *
 * Architecture:
 * - Capacity is always prime (drawn from a {@link PrimeSource}), so every probe
 *   step in [1, capacity - 1] is coprime with it and the probe sequence visits
 *   every slot exactly once.
 * - Slots hold an entry, nothing (EMPTY) or the TOMBSTONE sentinel left by a
 *   deletion. Primary and secondary hashes are cached in parallel `Uint32Array`s
 *   so resizing never rehashes a key.
 * - The collision counter accumulates over the whole lifetime of the instance.
 *
 * Not synchronised: callers sharing an instance must serialise access.
 */

import {
    EmptyCollectionError,
    InvalidCapacityError,
    InvalidConfigurationError,
    invariant,
} from './errors';
import { DEFAULT_SECONDARY_BASE, type HashKey, hashCode, keysEqual, secondaryHashCode } from './hashing';
import { PrimeSource, defaultPrimeSource } from './primes';
import { primaryIndex, probeStep } from './probing';

// ============================================================================
// 1. TYPE DEFINITIONS
// ============================================================================

export interface HashMapOptions {
    /** Initial capacity, rounded up to the next prime. Default 17. */
    capacity?: number;
    /** Maximum `size / capacity` tolerated after an insert, in (0, 1]. Default 0.75. */
    loadFactor?: number;
    /** A resize grows to the next prime >= capacity * growthFactor. Must be > 1. Default 2. */
    growthFactor?: number;
    /** Base `z` of the polynomial secondary hash. Default 92821. */
    secondaryBase?: number;
    primes?: PrimeSource;
}

interface Entry<K, V> {
    readonly key: K;
    value: V;
}

const TOMBSTONE: unique symbol = Symbol('tombstone');

type Slot<K, V> = Entry<K, V> | typeof TOMBSTONE | undefined;

/**
 * Outcome of walking a key's probe sequence.
 * On a miss, `index` is the first reusable slot (tombstone or empty), or -1
 * if the sequence held neither; `reachedEmpty` tells whether the walk ended on
 * an EMPTY slot. `steps` counts the probes made after the first one.
 */
type Probe<K, V> =
    | { found: true; index: number; entry: Entry<K, V>; steps: number }
    | { found: false; index: number; reachedEmpty: boolean; steps: number };

export const DEFAULT_CAPACITY = 17;
export const DEFAULT_LOAD_FACTOR = 0.75;
export const DEFAULT_GROWTH_FACTOR = 2;

// ============================================================================
// 2. DOUBLE HASHING HASH MAP
// ============================================================================

export class DoubleHashingHashMap<K extends HashKey, V> implements Iterable<[K, V]> {
    readonly loadFactor: number;
    readonly growthFactor: number;
    readonly secondaryBase: number;
    readonly primes: PrimeSource;

    private _slots: Slot<K, V>[];
    private _hashes: Uint32Array;
    private _hashes2: Uint32Array;
    private _capacity: number;
    private _size = 0;
    private _tombstones = 0;
    private _collisions = 0;
    private _resizes = 0;

    constructor(options: HashMapOptions = {}) {
        const {
            capacity = DEFAULT_CAPACITY,
            loadFactor = DEFAULT_LOAD_FACTOR,
            growthFactor = DEFAULT_GROWTH_FACTOR,
            secondaryBase = DEFAULT_SECONDARY_BASE,
            primes = defaultPrimeSource(),
        } = options;

        if (!Number.isInteger(capacity) || capacity < 2) throw new InvalidCapacityError(capacity);
        if (!(loadFactor > 0 && loadFactor <= 1)) {
            throw new InvalidConfigurationError('loadFactor', `must lie in (0, 1], got ${loadFactor}`);
        }
        if (!(growthFactor > 1) || !Number.isFinite(growthFactor)) {
            throw new InvalidConfigurationError('growthFactor', `must be a finite number > 1, got ${growthFactor}`);
        }
        if (!Number.isInteger(secondaryBase) || secondaryBase < 2) {
            throw new InvalidConfigurationError('secondaryBase', `must be an integer >= 2, got ${secondaryBase}`);
        }

        this.loadFactor = loadFactor;
        this.growthFactor = growthFactor;
        this.secondaryBase = secondaryBase;
        this.primes = primes;

        this._capacity = primes.nextPrimeAtLeast(capacity);
        this._slots = new Array<Slot<K, V>>(this._capacity).fill(undefined);
        this._hashes = new Uint32Array(this._capacity);
        this._hashes2 = new Uint32Array(this._capacity);
    }

    get size(): number { return this._size; }
    get capacity(): number { return this._capacity; }
    /** Current `size / capacity`. */
    get load(): number { return this._size / this._capacity; }
    get tombstones(): number { return this._tombstones; }
    get resizeCount(): number { return this._resizes; }
    isEmpty(): boolean { return this._size === 0; }

    /** Probe steps beyond the first attempt taken by every insertion so far. */
    collisionCount(): number { return this._collisions; }

    // ------------------------------------------------------------------------
    // Probing
    // ------------------------------------------------------------------------

    private probe(key: K, h: number, h2: number): Probe<K, V> {
        const cap = this._capacity;
        const step = probeStep(h2, cap);
        let idx = primaryIndex(h, cap);
        let firstFree = -1;

        for (let attempt = 0; attempt < cap; attempt++) {
            const slot = this._slots[idx];

            if (slot === undefined) {
                return { found: false, index: firstFree === -1 ? idx : firstFree, reachedEmpty: true, steps: attempt };
            }
            if (slot === TOMBSTONE) {
                if (firstFree === -1) firstFree = idx;
            } else if (this._hashes[idx] === h && keysEqual(slot.key, key)) {
                return { found: true, index: idx, entry: slot, steps: attempt };
            }

            idx += step;
            if (idx >= cap) idx -= cap;
        }
        return { found: false, index: firstFree, reachedEmpty: false, steps: cap - 1 };
    }

    private find(key: K): Probe<K, V> {
        return this.probe(key, hashCode(key), secondaryHashCode(key, this.secondaryBase));
    }

    // ------------------------------------------------------------------------
    // Resizing
    // ------------------------------------------------------------------------

    /**
     * Smallest capacity reached by repeated growth that keeps `size` within the load factor.
     * Throws ExhaustedPrimeTableError before anything is mutated.
     */
    private grownCapacity(size: number): number {
        let cap = this._capacity;
        do {
            cap = this.primes.nextPrimeAtLeast(Math.ceil(cap * this.growthFactor));
        } while (size / cap > this.loadFactor);
        return cap;
    }

    /**
     * Rebuilds the table at `capacity`, re-inserting live entries along fresh
     * probe sequences. Tombstones are dropped; the collision counter keeps counting.
     * Only a change of capacity counts as a resize.
     */
    private rebuild(capacity: number): void {
        const oldSlots = this._slots;
        const oldHashes = this._hashes;
        const oldHashes2 = this._hashes2;

        this._capacity = capacity;
        this._slots = new Array<Slot<K, V>>(capacity).fill(undefined);
        this._hashes = new Uint32Array(capacity);
        this._hashes2 = new Uint32Array(capacity);
        this._tombstones = 0;
        if (capacity !== oldSlots.length) this._resizes++;

        for (let i = 0; i < oldSlots.length; i++) {
            const slot = oldSlots[i];
            if (slot === undefined || slot === TOMBSTONE) continue;
            const h = oldHashes[i];
            const h2 = oldHashes2[i];
            const res = this.probe(slot.key, h, h2);
            invariant(!res.found && res.index >= 0, `rehash of ${String(slot.key)} found no free slot`);
            this._collisions += res.steps;
            this.place(res.index, slot, h, h2);
        }
    }

    private place(index: number, entry: Entry<K, V>, h: number, h2: number): void {
        if (this._slots[index] === TOMBSTONE) this._tombstones--;
        this._slots[index] = entry;
        this._hashes[index] = h;
        this._hashes2[index] = h2;
    }

    // ------------------------------------------------------------------------
    // Core operations
    // ------------------------------------------------------------------------

    /**
     * Associates `value` with `key`, overwriting the value of an existing equal key.
     * @complexity Expected O(1) for load factors bounded away from 1.
     */
    insert(key: K, value: V): void {
        const h = hashCode(key);
        const h2 = secondaryHashCode(key, this.secondaryBase);

        // Probe steps are committed to the counter only once nothing can throw.
        let res = this.probe(key, h, h2);
        let steps = res.steps;
        if (res.found) {
            this._collisions += steps;
            res.entry.value = value;
            return;
        }

        const target = (this._size + 1) / this._capacity > this.loadFactor
            ? this.grownCapacity(this._size + 1)
            : this._capacity;

        if (!res.reachedEmpty) {
            // Whole sequence without an EMPTY slot: purge tombstones, growing if needed.
            this.rebuild(target);
            res = this.probe(key, h, h2);
            invariant(!res.found && res.reachedEmpty, `rebuild left no empty slot for ${String(key)}`);
            steps += res.steps;
            this._collisions += steps;
            this.place(res.index, { key, value }, h, h2);
            this._size++;
            return;
        }

        this._collisions += steps;
        this.place(res.index, { key, value }, h, h2);
        this._size++;

        if (target !== this._capacity) this.rebuild(target);
    }

    /** Value stored under `key`, or `undefined` if absent. */
    search(key: K): V | undefined {
        const res = this.find(key);
        return res.found ? res.entry.value : undefined;
    }

    has(key: K): boolean {
        return this.find(key).found;
    }

    /**
     * Removes `key`, leaving a tombstone in its slot.
     * @returns false if the key was not present.
     */
    delete(key: K): boolean {
        const res = this.find(key);
        if (!res.found) return false;
        this._slots[res.index] = TOMBSTONE;
        this._size--;
        this._tombstones++;
        return true;
    }

    // ------------------------------------------------------------------------
    // Convenience
    // ------------------------------------------------------------------------

    getOrDefault<D>(key: K, fallback: D): V | D {
        const res = this.find(key);
        return res.found ? res.entry.value : fallback;
    }

    /** Returns the stored value, inserting `value` first when the key is absent. */
    setDefault(key: K, value: V): V {
        const res = this.find(key);
        if (res.found) return res.entry.value;
        this.insert(key, value);
        return value;
    }

    /** Removes `key` and returns its value (or `fallback` when absent). */
    pop(key: K): V | undefined;
    pop<D>(key: K, fallback: D): V | D;
    pop<D>(key: K, fallback?: D): V | D | undefined {
        const res = this.find(key);
        if (!res.found) return fallback;
        this._slots[res.index] = TOMBSTONE;
        this._size--;
        this._tombstones++;
        return res.entry.value;
    }

    /**
     * Removes and returns the entry in the lowest occupied slot.
     * @throws {EmptyCollectionError} on an empty map.
     */
    popItem(): [K, V] {
        for (let i = 0; i < this._capacity; i++) {
            const slot = this._slots[i];
            if (slot === undefined || slot === TOMBSTONE) continue;
            this._slots[i] = TOMBSTONE;
            this._size--;
            this._tombstones++;
            return [slot.key, slot.value];
        }
        throw new EmptyCollectionError('DoubleHashingHashMap');
    }

    /** Inserts every entry of `other`, overwriting on equal keys. */
    update(other: Iterable<readonly [K, V]>): void {
        for (const [k, v] of other) this.insert(k, v);
    }

    /** Empties the table. Capacity and the collision counter are kept. */
    clear(): void {
        this._slots.fill(undefined);
        this._hashes.fill(0);
        this._hashes2.fill(0);
        this._size = 0;
        this._tombstones = 0;
    }

    /**
     * Independent copy: same options, capacity, slot layout (tombstones included)
     * and counters. Keys and values themselves are shared.
     */
    copy(): DoubleHashingHashMap<K, V> {
        const twin = new DoubleHashingHashMap<K, V>({
            capacity: this._capacity,
            loadFactor: this.loadFactor,
            growthFactor: this.growthFactor,
            secondaryBase: this.secondaryBase,
            primes: this.primes,
        });
        twin._slots = this._slots.map(slot => slot === undefined || slot === TOMBSTONE ? slot : { key: slot.key, value: slot.value });
        twin._hashes = this._hashes.slice();
        twin._hashes2 = this._hashes2.slice();
        twin._size = this._size;
        twin._tombstones = this._tombstones;
        twin._collisions = this._collisions;
        twin._resizes = this._resizes;
        return twin;
    }

    // ------------------------------------------------------------------------
    // Iteration & comparison
    // ------------------------------------------------------------------------

    *entries(): IterableIterator<[K, V]> {
        for (const slot of this._slots) {
            if (slot !== undefined && slot !== TOMBSTONE) yield [slot.key, slot.value];
        }
    }

    *keys(): IterableIterator<K> {
        for (const [k] of this.entries()) yield k;
    }

    *values(): IterableIterator<V> {
        for (const [, v] of this.entries()) yield v;
    }

    [Symbol.iterator](): Iterator<[K, V]> { return this.entries(); }

    /** True if both maps hold the same keys mapped to identical (`Object.is`) values. */
    equals(other: unknown): boolean {
        if (this === other) return true;
        if (!(other instanceof DoubleHashingHashMap)) return false;
        if (this._size !== other.size) return false;
        for (const [k, v] of this.entries()) {
            if (!other.has(k) || !Object.is(other.search(k), v)) return false;
        }
        return true;
    }

    toString(): string {
        const body = [...this.entries()].map(([k, v]) => `${String(k)}: ${String(v)}`).join(', ');
        return `{${body}}`;
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return `DoubleHashingHashMap(${this._size}/${this._capacity}) ${this.toString()}`; }
}
