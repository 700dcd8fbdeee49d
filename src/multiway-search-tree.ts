/**
 * @module multiway-search-tree
 * @description
 * Balanced multiway search tree of configurable order `m` (a B-tree):
 * - every node holds at most `m - 1` sorted, unique entries;
 * - every node except the root holds at least `ceil(m / 2) - 1` entries;
 * - all leaves sit at the same depth.
 *
 * Insertion splits overflowing nodes bottom-up; deletion repairs underflow by
 * borrowing through the parent or merging with a sibling. Each public
 * operation restores every invariant before it returns.
 *
 * Not synchronised: callers sharing an instance must serialise access.
 */

import { type Comparator, type OrderedKey, naturalCompare } from './compare';
import { DuplicateKeyError, InvalidOrderError, invariant } from './errors';
import { MultiWayNode } from './multiway-node';

export interface TreeOptions<K> {
    /** Maximum number of children per node. Integer >= 3, default 4 (a 2-3-4 tree). */
    order?: number;
    compare?: Comparator<K>;
}

/** One step of a root-to-node descent: the node and the child index taken. */
interface PathStep<K, V> {
    node: MultiWayNode<K, V>;
    index: number;
}

export const DEFAULT_ORDER = 4;

export class MultiWaySearchTree<K extends OrderedKey, V> implements Iterable<[K, V]> {
    readonly order: number;
    readonly minEntries: number;
    private readonly compare: Comparator<K>;

    private _root: MultiWayNode<K, V> | null = null;
    private _size = 0;

    constructor(options: TreeOptions<K> = {}) {
        const { order = DEFAULT_ORDER, compare = naturalCompare } = options;
        if (!Number.isInteger(order) || order < 3) throw new InvalidOrderError(order);
        this.order = order;
        this.minEntries = Math.ceil(order / 2) - 1;
        this.compare = compare;
    }

    get size(): number { return this._size; }
    isEmpty(): boolean { return this._size === 0; }

    /** Number of levels (0 for an empty tree). */
    get height(): number {
        let h = 0;
        for (let node = this._root; node !== null; node = node.isLeaf ? null : node.children[0]) h++;
        return h;
    }

    // ------------------------------------------------------------------------
    // Search
    // ------------------------------------------------------------------------

    /**
     * Value stored under `key`, or `undefined` if absent.
     * @complexity O(log_m(n) * log(m))
     */
    search(key: K): V | undefined {
        let node = this._root;
        while (node !== null) {
            const { found, index } = node.locate(key, this.compare);
            if (found) return node.values[index];
            node = node.isLeaf ? null : node.children[index];
        }
        return undefined;
    }

    has(key: K): boolean {
        let node = this._root;
        while (node !== null) {
            const { found, index } = node.locate(key, this.compare);
            if (found) return true;
            node = node.isLeaf ? null : node.children[index];
        }
        return false;
    }

    // ------------------------------------------------------------------------
    // Insertion
    // ------------------------------------------------------------------------

    /**
     * Inserts a new entry.
     * @throws {DuplicateKeyError} if an equal key is already stored. The tree is left untouched.
     */
    insert(key: K, value: V): void {
        if (this._root === null) {
            this._root = new MultiWayNode([key], [value]);
            this._size = 1;
            return;
        }

        const path: PathStep<K, V>[] = [];
        let node = this._root;
        while (true) {
            const { found, index } = node.locate(key, this.compare);
            if (found) throw new DuplicateKeyError(key);
            if (node.isLeaf) {
                node.insertEntry(index, key, value, this.compare);
                break;
            }
            path.push({ node, index });
            node = node.children[index];
        }
        this._size++;

        // Split upwards while a node overflows.
        while (node.entryCount > this.order - 1) {
            const split = node.split();
            const parent = path.pop();
            if (parent === undefined) {
                this._root = new MultiWayNode([split.key], [split.value], [node, split.right]);
                return;
            }
            parent.node.adoptSplit(parent.index, split, this.compare);
            node = parent.node;
        }
    }

    // ------------------------------------------------------------------------
    // Deletion
    // ------------------------------------------------------------------------

    /**
     * Removes `key`.
     * @returns false if the key was not present.
     */
    remove(key: K): boolean {
        if (this._root === null) return false;

        const path: PathStep<K, V>[] = [];
        let node = this._root;
        let index: number;
        while (true) {
            const located = node.locate(key, this.compare);
            if (located.found) {
                index = located.index;
                break;
            }
            if (node.isLeaf) return false;
            path.push({ node, index: located.index });
            node = node.children[located.index];
        }

        if (node.isLeaf) {
            node.removeEntry(index);
        } else {
            // Replace with the in-order predecessor: rightmost entry of the left subtree.
            const holder = node;
            path.push({ node: holder, index });
            let leaf = holder.children[index];
            while (!leaf.isLeaf) {
                const last = leaf.children.length - 1;
                path.push({ node: leaf, index: last });
                leaf = leaf.children[last];
            }
            const [predKey, predValue] = leaf.removeEntry(leaf.entryCount - 1);
            holder.setEntry(index, predKey, predValue, this.compare);
            node = leaf;
        }
        this._size--;

        this.rebalance(node, path);
        return true;
    }

    /**
     * Restores minimum occupancy from `node` upwards.
     * Prefers borrowing from the left sibling, then the right one, and merges otherwise.
     */
    private rebalance(node: MultiWayNode<K, V>, path: PathStep<K, V>[]): void {
        let current = node;
        while (current.entryCount < this.minEntries) {
            const step = path.pop();
            if (step === undefined) break;
            const { node: parent, index } = step;

            const left = index > 0 ? parent.children[index - 1] : undefined;
            const right = index < parent.children.length - 1 ? parent.children[index + 1] : undefined;

            if (left !== undefined && left.entryCount > this.minEntries) {
                parent.borrowFromLeft(index);
                return;
            }
            if (right !== undefined && right.entryCount > this.minEntries) {
                parent.borrowFromRight(index);
                return;
            }
            if (left !== undefined) parent.mergeChildren(index - 1);
            else parent.mergeChildren(index);
            current = parent;
        }

        const root = this._root;
        if (root !== null && root.entryCount === 0) {
            this._root = root.isLeaf ? null : root.children[0];
        }
    }

    clear(): void {
        this._root = null;
        this._size = 0;
    }

    // ------------------------------------------------------------------------
    // Ordered queries
    // ------------------------------------------------------------------------

    min(): [K, V] | undefined {
        let node = this._root;
        if (node === null) return undefined;
        while (!node.isLeaf) node = node.children[0];
        return node.entry(0);
    }

    max(): [K, V] | undefined {
        let node = this._root;
        if (node === null) return undefined;
        while (!node.isLeaf) node = node.children[node.children.length - 1];
        return node.entry(node.entryCount - 1);
    }

    /** Entry with the smallest key strictly greater than `key` (which need not be stored). */
    findGreater(key: K): [K, V] | undefined {
        let best: [K, V] | undefined;
        let node = this._root;
        while (node !== null) {
            const { found, index } = node.locate(key, this.compare);
            const i = found ? index + 1 : index;
            if (i < node.entryCount) best = node.entry(i);
            node = node.isLeaf ? null : node.children[i];
        }
        return best;
    }

    /** Entry with the largest key strictly less than `key` (which need not be stored). */
    findLess(key: K): [K, V] | undefined {
        let best: [K, V] | undefined;
        let node = this._root;
        while (node !== null) {
            const { index } = node.locate(key, this.compare);
            if (index > 0) best = node.entry(index - 1);
            node = node.isLeaf ? null : node.children[index];
        }
        return best;
    }

    // ------------------------------------------------------------------------
    // Traversal
    // ------------------------------------------------------------------------

    private *walk(node: MultiWayNode<K, V>, reverse: boolean): Generator<[K, V], void, undefined> {
        const n = node.entryCount;
        for (let j = 0; j < n; j++) {
            const i = reverse ? n - 1 - j : j;
            if (!node.isLeaf) yield* this.walk(node.children[reverse ? i + 1 : i], reverse);
            yield node.entry(i);
        }
        if (!node.isLeaf) yield* this.walk(node.children[reverse ? 0 : n], reverse);
    }

    /**
     * Entries in ascending key order. Lazy, and restartable: every `for..of`
     * starts a fresh walk. The tree must not be modified during a walk.
     */
    traverseInorder(): Iterable<[K, V]> {
        return { [Symbol.iterator]: () => this.entriesFrom(false) };
    }

    /** Entries in descending key order; same contract as {@link traverseInorder}. */
    traverseReverse(): Iterable<[K, V]> {
        return { [Symbol.iterator]: () => this.entriesFrom(true) };
    }

    private *entriesFrom(reverse: boolean): Generator<[K, V], void, undefined> {
        if (this._root !== null) yield* this.walk(this._root, reverse);
    }

    *keys(): IterableIterator<K> {
        for (const [k] of this.entriesFrom(false)) yield k;
    }

    *values(): IterableIterator<V> {
        for (const [, v] of this.entriesFrom(false)) yield v;
    }

    [Symbol.iterator](): Iterator<[K, V]> { return this.entriesFrom(false); }

    // ------------------------------------------------------------------------
    // Diagnostics
    // ------------------------------------------------------------------------

    /**
     * Checks ordering, occupancy, child counts, uniform leaf depth and size.
     * @throws {InvariantViolationError} describing the first violation found.
     */
    validate(): void {
        if (this._root === null) {
            invariant(this._size === 0, `empty tree reports size ${this._size}`);
            return;
        }
        let leafDepth = -1;
        let counted = 0;

        const visit = (node: MultiWayNode<K, V>, depth: number, lower: K | undefined, upper: K | undefined): void => {
            const n = node.entryCount;
            counted += n;
            invariant(n <= this.order - 1, `node holds ${n} entries, more than ${this.order - 1}`);
            invariant(node === this._root ? n >= 1 : n >= this.minEntries,
                `node holds ${n} entries, fewer than ${this.minEntries}`);
            invariant(node.values.length === n, 'keys and values differ in length');

            for (let i = 0; i < n; i++) {
                const k = node.keys[i];
                invariant(i === 0 || this.compare(node.keys[i - 1], k) < 0, `keys out of order at ${String(k)}`);
                invariant(lower === undefined || this.compare(lower, k) < 0, `${String(k)} escapes its lower bound`);
                invariant(upper === undefined || this.compare(k, upper) < 0, `${String(k)} escapes its upper bound`);
            }

            if (node.isLeaf) {
                if (leafDepth === -1) leafDepth = depth;
                invariant(leafDepth === depth, `leaf at depth ${depth}, expected ${leafDepth}`);
                return;
            }
            invariant(node.children.length === n + 1, `${n} entries but ${node.children.length} children`);
            for (let i = 0; i <= n; i++) {
                visit(node.children[i], depth + 1, i === 0 ? lower : node.keys[i - 1], i === n ? upper : node.keys[i]);
            }
        };

        visit(this._root, 0, undefined, undefined);
        invariant(counted === this._size, `tree holds ${counted} entries but reports size ${this._size}`);
    }

    /** Bracketed shape, e.g. `[[5 6 7] 10 [12 17] 20 [30]]`. */
    toString(): string {
        const show = (node: MultiWayNode<K, V>): string => {
            const parts: string[] = [];
            for (let i = 0; i < node.entryCount; i++) {
                if (!node.isLeaf) parts.push(show(node.children[i]));
                parts.push(String(node.keys[i]));
            }
            if (!node.isLeaf) parts.push(show(node.children[node.entryCount]));
            return `[${parts.join(' ')}]`;
        };
        return this._root === null ? '[]' : show(this._root);
    }
    [Symbol.for('nodejs.util.inspect.custom')]() { return `MultiWaySearchTree(order ${this.order}) ${this.toString()}`; }
}
