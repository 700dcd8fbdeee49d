/**
 * @module multiway-node
 * Node of a multiway search tree.
 *
 * Entries live in two parallel arrays (`keys`, `values`) kept sorted and
 * duplicate-free; an internal node owns exactly `keys.length + 1` children.
 * Every entry mutation checks the ordering against its neighbours.
 */

import type { Comparator } from './compare';
import { invariant } from './errors';

export interface Located {
    /** True if the key is stored in this node. */
    found: boolean;
    /** Position of the key if found, otherwise the insertion point (= child to descend into). */
    index: number;
}

export interface Split<K, V> {
    key: K;
    value: V;
    right: MultiWayNode<K, V>;
}

export class MultiWayNode<K, V> {
    keys: K[];
    values: V[];
    children: MultiWayNode<K, V>[];

    constructor(keys: K[] = [], values: V[] = [], children: MultiWayNode<K, V>[] = []) {
        invariant(keys.length === values.length, 'keys and values differ in length');
        invariant(children.length === 0 || children.length === keys.length + 1,
            `node with ${keys.length} entries cannot own ${children.length} children`);
        this.keys = keys;
        this.values = values;
        this.children = children;
    }

    get isLeaf(): boolean { return this.children.length === 0; }
    get entryCount(): number { return this.keys.length; }

    entry(index: number): [K, V] {
        return [this.keys[index], this.values[index]];
    }

    /**
     * Binary search over the sorted keys.
     */
    locate(key: K, compare: Comparator<K>): Located {
        let lo = 0;
        let hi = this.keys.length - 1;
        while (lo <= hi) {
            const mid = (lo + hi) >>> 1;
            const cmp = compare(key, this.keys[mid]);
            if (cmp === 0) return { found: true, index: mid };
            if (cmp < 0) hi = mid - 1;
            else lo = mid + 1;
        }
        return { found: false, index: lo };
    }

    private checkSlot(index: number, key: K, compare: Comparator<K>, replacing: boolean): void {
        const before = index - 1;
        const after = replacing ? index + 1 : index;
        invariant(before < 0 || compare(this.keys[before], key) < 0,
            `key ${String(key)} is not greater than its left neighbour`);
        invariant(after >= this.keys.length || compare(key, this.keys[after]) < 0,
            `key ${String(key)} is not less than its right neighbour`);
    }

    /** Inserts an entry at `index` of a leaf. */
    insertEntry(index: number, key: K, value: V, compare: Comparator<K>): void {
        invariant(this.isLeaf, 'entries are only inserted directly into leaves');
        this.checkSlot(index, key, compare, false);
        this.keys.splice(index, 0, key);
        this.values.splice(index, 0, value);
    }

    /** Overwrites the entry at `index` in place (used when swapping in a predecessor). */
    setEntry(index: number, key: K, value: V, compare: Comparator<K>): void {
        this.checkSlot(index, key, compare, true);
        this.keys[index] = key;
        this.values[index] = value;
    }

    removeEntry(index: number): [K, V] {
        invariant(this.isLeaf, 'entries are only removed directly from leaves');
        return [this.keys.splice(index, 1)[0], this.values.splice(index, 1)[0]];
    }

    // ------------------------------------------------------------------------
    // Overflow
    // ------------------------------------------------------------------------

    /**
     * Splits an overflowing node around its median entry.
     * This node keeps the lower half; the upper half moves to the returned `right` node.
     */
    split(): Split<K, V> {
        const mid = this.keys.length >>> 1;
        const rightKeys = this.keys.splice(mid + 1);
        const rightValues = this.values.splice(mid + 1);
        const rightChildren = this.isLeaf ? [] : this.children.splice(mid + 1);
        const key = this.keys.splice(mid, 1)[0];
        const value = this.values.splice(mid, 1)[0];
        return { key, value, right: new MultiWayNode(rightKeys, rightValues, rightChildren) };
    }

    /**
     * Receives the result of splitting `children[index]`: the median becomes
     * entry `index` and the new right half child `index + 1`.
     */
    adoptSplit(index: number, split: Split<K, V>, compare: Comparator<K>): void {
        this.checkSlot(index, split.key, compare, false);
        this.keys.splice(index, 0, split.key);
        this.values.splice(index, 0, split.value);
        this.children.splice(index + 1, 0, split.right);
    }

    // ------------------------------------------------------------------------
    // Underflow (called on the parent of the deficient child)
    // ------------------------------------------------------------------------

    /** Rotates the separator down into `children[index]` and the left sibling's last entry up. */
    borrowFromLeft(index: number): void {
        const child = this.children[index];
        const sibling = this.children[index - 1];
        const last = sibling.keys.length - 1;

        child.keys.unshift(this.keys[index - 1]);
        child.values.unshift(this.values[index - 1]);
        this.keys[index - 1] = sibling.keys[last];
        this.values[index - 1] = sibling.values[last];
        sibling.keys.length = last;
        sibling.values.length = last;

        if (!sibling.isLeaf) child.children.unshift(sibling.children.splice(last + 1, 1)[0]);
    }

    /** Rotates the separator down into `children[index]` and the right sibling's first entry up. */
    borrowFromRight(index: number): void {
        const child = this.children[index];
        const sibling = this.children[index + 1];

        child.keys.push(this.keys[index]);
        child.values.push(this.values[index]);
        this.keys[index] = sibling.keys.splice(0, 1)[0];
        this.values[index] = sibling.values.splice(0, 1)[0];

        if (!sibling.isLeaf) child.children.push(sibling.children.splice(0, 1)[0]);
    }

    /**
     * Merges `children[index + 1]` and separator entry `index` into `children[index]`.
     * The right child is discarded.
     */
    mergeChildren(index: number): void {
        const left = this.children[index];
        const right = this.children[index + 1];

        left.keys.push(this.keys[index], ...right.keys);
        left.values.push(this.values[index], ...right.values);
        left.children.push(...right.children);

        this.keys.splice(index, 1);
        this.values.splice(index, 1);
        this.children.splice(index + 1, 1);
    }
}
