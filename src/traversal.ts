/**
 * @module traversal
 * @description
 * Visit orders over a node graph.
 *
 * All depth-first walks keep their own stack instead of recursing, so a
 * list-shaped tree (e.g. after thousands of ascending inserts) is walked in
 * O(n) without touching the call-stack limit. The visit order is exactly that
 * of the textbook recursive definitions.
 */

import type { TreeNode } from './node';

export type TraversalOrder = 'inorder' | 'preorder' | 'postorder' | 'breadth-first';

export const TRAVERSAL_ORDERS: readonly TraversalOrder[] = ['inorder', 'preorder', 'postorder', 'breadth-first'];

type Visitor<E> = (value: E) => void;

// ============================================================================
// 1. WALKS
// ============================================================================

/** left, node, right */
function walkInorder<E>(root: TreeNode<E> | null, visit: Visitor<E>): void {
    const stack: TreeNode<E>[] = [];
    let current = root;
    while (current || stack.length > 0) {
        while (current) {
            stack.push(current);
            current = current.left;
        }
        const node = stack.pop();
        if (!node) break;
        visit(node.value);
        current = node.right;
    }
}

/** node, left, right */
function walkPreorder<E>(root: TreeNode<E> | null, visit: Visitor<E>): void {
    const stack: TreeNode<E>[] = root ? [root] : [];
    let node: TreeNode<E> | undefined;
    while ((node = stack.pop())) {
        visit(node.value);
        // Right goes in first so that left comes out first.
        if (node.right) stack.push(node.right);
        if (node.left) stack.push(node.left);
    }
}

/**
 * left, right, node
 * Runs node-right-left and replays it backwards.
 */
function walkPostorder<E>(root: TreeNode<E> | null, visit: Visitor<E>): void {
    const stack: TreeNode<E>[] = root ? [root] : [];
    const reversed: E[] = [];
    let node: TreeNode<E> | undefined;
    while ((node = stack.pop())) {
        reversed.push(node.value);
        if (node.left) stack.push(node.left);
        if (node.right) stack.push(node.right);
    }
    for (let i = reversed.length - 1; i >= 0; i--) visit(reversed[i]);
}

/**
 * Level by level, left to right. Each level is derived from the non-null
 * children of the previous one.
 */
function walkBreadthFirst<E>(root: TreeNode<E> | null, visit: Visitor<E>): void {
    let level: TreeNode<E>[] = root ? [root] : [];
    while (level.length > 0) {
        const next: TreeNode<E>[] = [];
        for (const node of level) {
            visit(node.value);
            if (node.left) next.push(node.left);
            if (node.right) next.push(node.right);
        }
        level = next;
    }
}

export function walk<E>(root: TreeNode<E> | null, order: TraversalOrder, visit: Visitor<E>): void {
    switch (order) {
        case 'inorder': return walkInorder(root, visit);
        case 'preorder': return walkPreorder(root, visit);
        case 'postorder': return walkPostorder(root, visit);
        case 'breadth-first': return walkBreadthFirst(root, visit);
    }
}

// ============================================================================
// 2. SNAPSHOTS
// ============================================================================

/** Fresh array of the values in the given order; later mutation does not affect it. */
export function collect<E>(root: TreeNode<E> | null, order: TraversalOrder): E[] {
    const out: E[] = [];
    walk(root, order, v => { out.push(v); });
    return out;
}

/**
 * Bracketed rendering: `[a, b, c]`, or `[]` when empty.
 * Elements are rendered with `String(value)`.
 */
export function render<E>(root: TreeNode<E> | null, order: TraversalOrder): string {
    const parts: string[] = [];
    walk(root, order, v => { parts.push(String(v)); });
    return `[${parts.join(', ')}]`;
}
