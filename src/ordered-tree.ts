/**
 * @module ordered-tree
 * @description
 * Mutable, unbalanced binary search tree keyed directly on element order.
 *
 * * Features:
 * - Insert / remove / contains in O(h), where h is the current height.
 * - Explicit `balance()` rebuilds a minimum-height tree on demand.
 * - Four traversal orders, as arrays or `[a, b, c]` strings.
 *
 * * Contracts:
 * - No null / undefined elements, no NaN (throws `OrderedTreeError`).
 * - Elements share one kind of order: a single primitive type, or objects
 *   implementing `Comparable`. Mixed unions do not compile.
 * - No duplicates: equality is `compare(a, b) === 0`, never identity.
 * - Elements must not be mutated in a way that changes their order while stored.
 * - Not self-balancing: ascending inserts produce a list-shaped tree until
 *   `balance()` is called.
 */

import type { Absent, Orderable } from './compare';
import { checkElement, checkInsertable, compareElements, isAbsent, isUnordered } from './compare';
import { ErrorKind, OrderedTreeError } from './errors';
import { TreeNode, buildBalanced, leftmost, measureHeight, rightmost } from './node';
import type { TraversalOrder } from './traversal';
import { collect, render } from './traversal';

/**
 * Anything a tree can be filled from. Array-likes without `Symbol.iterator`
 * are read by index; absent entries (including holes) are skipped.
 */
export type ElementSource<E> = Iterable<E | Absent> | ArrayLike<E | Absent>;

function isIterable<T>(source: Iterable<T> | ArrayLike<T>): source is Iterable<T> {
    return Symbol.iterator in Object(source);
}

export class OrderedTree<E extends Orderable<E>> implements Iterable<E> {
    #root: TreeNode<E> | null = null;
    #size: number = 0;

    /**
     * Creates an empty tree, or one filled from `elements` in source order.
     * Duplicates and absent entries in the source are skipped.
     *
     * @throws OrderedTreeError (MissingArgument) if a source is passed but is
     * null or undefined. Calling with no argument at all gives an empty tree.
     * @throws OrderedTreeError (InvalidElement) if the source contains NaN.
     */
    constructor();
    constructor(elements: ElementSource<E>);
    constructor(...args: [] | [ElementSource<E> | Absent]) {
        if (args.length === 0) return;
        const [elements] = args;
        if (isAbsent(elements)) {
            throw new OrderedTreeError(ErrorKind.MissingArgument, 'OrderedTree: source collection must not be null or undefined');
        }
        this.#addAll(elements);
    }

    /** Builds a tree from a collection; same contract as the constructor with a source. */
    static from<U extends Orderable<U>>(elements: ElementSource<U>): OrderedTree<U> {
        if (isAbsent(elements)) {
            throw new OrderedTreeError(ErrorKind.MissingArgument, 'OrderedTree.from: source collection must not be null or undefined');
        }
        return new OrderedTree<U>(elements);
    }

    #addAll(elements: ElementSource<E>): void {
        if (isIterable(elements)) {
            for (const element of elements) {
                if (!isAbsent(element)) this.add(element);
            }
            return;
        }
        const len = elements.length;
        for (let i = 0; i < len; i++) {
            const element = elements[i];
            if (!isAbsent(element)) this.add(element);
        }
    }

    // ========================================================================
    // QUERIES
    // ========================================================================

    get size(): number {
        return this.#size;
    }

    isEmpty(): boolean {
        return this.#size === 0;
    }

    /** NaN is never stored, so looking it up is a plain miss. */
    contains(element: E): boolean {
        checkElement(element, 'contains');
        if (isUnordered(element)) return false;
        let current = this.#root;
        while (current) {
            const cmp = compareElements(element, current.value);
            if (cmp === 0) return true;
            current = cmp < 0 ? current.left : current.right;
        }
        return false;
    }

    /** Least element, or `undefined` when empty. */
    getMin(): E | undefined {
        return this.#root ? leftmost(this.#root).value : undefined;
    }

    /** Greatest element, or `undefined` when empty. */
    getMax(): E | undefined {
        return this.#root ? rightmost(this.#root).value : undefined;
    }

    /** Nodes on the longest root-to-leaf path; 0 when empty. */
    height(): number {
        return measureHeight(this.#root);
    }

    // ========================================================================
    // MUTATION
    // ========================================================================

    /**
     * Inserts `element` as a new leaf.
     * @returns false (and leaves the tree untouched) if an equal element exists.
     */
    add(element: E): boolean {
        checkInsertable(element, 'add');

        let parent: TreeNode<E> | null = null;
        let current = this.#root;
        let cmp = 0;
        while (current) {
            cmp = compareElements(element, current.value);
            if (cmp === 0) return false;
            parent = current;
            current = cmp < 0 ? current.left : current.right;
        }

        const node = new TreeNode(element);
        if (!parent) this.#root = node;
        else if (cmp < 0) parent.left = node;
        else parent.right = node;

        this.#size++;
        return true;
    }

    /**
     * Removes the element equal to `element`.
     *
     * A node without a left child is spliced out and replaced by its right
     * subtree. Otherwise the node stays in place and takes over the value of
     * its in-order predecessor (rightmost node of the left subtree), which is
     * unlinked instead.
     *
     * @returns false if no equal element was found (always for NaN); the tree
     * is then unchanged.
     */
    remove(element: E): boolean {
        checkElement(element, 'remove');
        if (isUnordered(element)) return false;

        let parent: TreeNode<E> | null = null;
        let current = this.#root;
        let cmp = 0;
        while (current) {
            const c = compareElements(element, current.value);
            if (c === 0) break;
            parent = current;
            cmp = c;
            current = c < 0 ? current.left : current.right;
        }
        if (!current) return false;

        if (!current.left) {
            if (!parent) this.#root = current.right;
            else if (cmp < 0) parent.left = current.right;
            else parent.right = current.right;
        } else {
            let predParent = current;
            let pred = current.left;
            while (pred.right) {
                predParent = pred;
                pred = pred.right;
            }

            current.value = pred.value;
            if (predParent === current) current.left = pred.left;
            else predParent.right = pred.left;
        }

        this.#size--;
        return true;
    }

    /** Drops every element. */
    clear(): void {
        this.#root = null;
        this.#size = 0;
    }

    /**
     * Rebuilds the node graph at minimum height, floor(log2(n)) + 1.
     * Trees of two or fewer elements are left as they are.
     */
    balance(): void {
        if (this.#size <= 2) return;
        const sorted = collect(this.#root, 'inorder');
        this.#root = buildBalanced(sorted, 0, sorted.length - 1);
    }

    // ========================================================================
    // TRAVERSALS
    // ========================================================================

    toArray(order: TraversalOrder = 'inorder'): E[] {
        return collect(this.#root, order);
    }

    toArrayInorder(): E[] { return collect(this.#root, 'inorder'); }
    toArrayPreorder(): E[] { return collect(this.#root, 'preorder'); }
    toArrayPostorder(): E[] { return collect(this.#root, 'postorder'); }
    toArrayBreadthFirst(): E[] { return collect(this.#root, 'breadth-first'); }

    toStringInorder(): string { return render(this.#root, 'inorder'); }
    toStringPreorder(): string { return render(this.#root, 'preorder'); }
    toStringPostorder(): string { return render(this.#root, 'postorder'); }
    toStringBreadthFirst(): string { return render(this.#root, 'breadth-first'); }

    /** Iterates an in-order snapshot taken when iteration starts. */
    *[Symbol.iterator](): Iterator<E> {
        yield* collect(this.#root, 'inorder');
    }

    toString(): string {
        return this.toStringInorder();
    }

    [Symbol.for('nodejs.util.inspect.custom')]() { return `OrderedTree ${this.toString()}`; }
}
