/**
 * @module denominations
 * The coin and note values of a currency, kept ordered in a multiway search tree.
 */

import { EmptyCollectionError, InvalidAmountError, KeyNotFoundError } from '../errors';
import { DEFAULT_ORDER, MultiWaySearchTree } from '../multiway-search-tree';

export class Denominations implements Iterable<number> {
    private readonly tree: MultiWaySearchTree<number, number>;

    constructor(values: Iterable<number> = [], order: number = DEFAULT_ORDER) {
        this.tree = new MultiWaySearchTree<number, number>({ order });
        for (const v of values) this.add(v);
    }

    get size(): number { return this.tree.size; }
    isEmpty(): boolean { return this.tree.isEmpty(); }
    has(value: number): boolean { return this.tree.has(value); }

    /**
     * @throws {InvalidAmountError} for non-positive or non-finite values.
     * @throws {DuplicateKeyError} if the denomination already exists.
     */
    add(value: number): void {
        if (!Number.isFinite(value) || value <= 0) throw new InvalidAmountError(value, 'denominations must be positive');
        this.tree.insert(value, value);
    }

    /** @throws {KeyNotFoundError} if `value` is not a denomination. */
    remove(value: number): void {
        if (!this.tree.remove(value)) throw new KeyNotFoundError(value);
    }

    /** @throws {EmptyCollectionError} when there are no denominations. */
    min(): number {
        const entry = this.tree.min();
        if (entry === undefined) throw new EmptyCollectionError('Denominations');
        return entry[0];
    }

    /** @throws {EmptyCollectionError} when there are no denominations. */
    max(): number {
        const entry = this.tree.max();
        if (entry === undefined) throw new EmptyCollectionError('Denominations');
        return entry[0];
    }

    /** Smallest denomination strictly greater than `value`. */
    smallestAbove(value: number): number | undefined {
        return this.tree.findGreater(value)?.[0];
    }

    /** Largest denomination strictly less than `value`. */
    largestBelow(value: number): number | undefined {
        return this.tree.findLess(value)?.[0];
    }

    /**
     * Denomination following `value`, or undefined if `value` is the largest.
     * @throws {KeyNotFoundError} if `value` is not a denomination.
     */
    next(value: number): number | undefined {
        if (!this.tree.has(value)) throw new KeyNotFoundError(value);
        return this.smallestAbove(value);
    }

    /**
     * Denomination preceding `value`, or undefined if `value` is the smallest.
     * @throws {KeyNotFoundError} if `value` is not a denomination.
     */
    previous(value: number): number | undefined {
        if (!this.tree.has(value)) throw new KeyNotFoundError(value);
        return this.largestBelow(value);
    }

    clear(): void { this.tree.clear(); }

    /** Independent copy with the same values and tree order. */
    copy(): Denominations {
        return new Denominations(this.ascending(), this.tree.order);
    }

    *ascending(): IterableIterator<number> {
        for (const [v] of this.tree.traverseInorder()) yield v;
    }

    *descending(): IterableIterator<number> {
        for (const [v] of this.tree.traverseReverse()) yield v;
    }

    [Symbol.iterator](): Iterator<number> { return this.ascending(); }

    toString(): string { return `{${[...this.ascending()].join(', ')}}`; }
}
