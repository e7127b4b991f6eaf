/**
 * @module node
 * Node graph of the unbalanced search tree and the structural helpers that
 * walk it without knowing about ordering.
 */

// ============================================================================
// 1. NODE
// ============================================================================

/**
 * A single tree node.
 *
 * `value` is mutable: two-child removal overwrites it with the in-order
 * predecessor's value instead of relinking the node.
 * Each node is owned by exactly one parent slot (or the tree root).
 */
export class TreeNode<E> {
    constructor(
        public value: E,
        public left: TreeNode<E> | null = null,
        public right: TreeNode<E> | null = null
    ) {}
}

// ============================================================================
// 2. STRUCTURAL QUERIES
// ============================================================================

/** Leftmost (least) node of the subtree. */
export function leftmost<E>(node: TreeNode<E>): TreeNode<E> {
    let current = node;
    while (current.left) current = current.left;
    return current;
}

/** Rightmost (greatest) node of the subtree. */
export function rightmost<E>(node: TreeNode<E>): TreeNode<E> {
    let current = node;
    while (current.right) current = current.right;
    return current;
}

/**
 * Number of nodes on the longest root-to-leaf path.
 * Counted level by level so degenerate (list-shaped) trees do not recurse.
 *
 * @returns 0 for an empty tree, 1 for a single node.
 */
export function measureHeight<E>(root: TreeNode<E> | null): number {
    let level: TreeNode<E>[] = root ? [root] : [];
    let height = 0;
    while (level.length > 0) {
        height++;
        const next: TreeNode<E>[] = [];
        for (const node of level) {
            if (node.left) next.push(node.left);
            if (node.right) next.push(node.right);
        }
        level = next;
    }
    return height;
}

// ============================================================================
// 3. BALANCED BUILD
// ============================================================================

/**
 * Builds a minimum-height subtree from `sorted[low..high]` (inclusive).
 * The subtree root is the lower midpoint, so even-length ranges put the extra
 * element in the right half.
 *
 * Recursion depth is the height of the result, i.e. ceil(log2(n + 1)).
 *
 * @param sorted - Ascending, duplicate-free elements.
 */
export function buildBalanced<E>(sorted: readonly E[], low: number, high: number): TreeNode<E> | null {
    if (low > high) return null;
    const mid = low + Math.floor((high - low) / 2);
    return new TreeNode(
        sorted[mid],
        buildBalanced(sorted, low, mid - 1),
        buildBalanced(sorted, mid + 1, high)
    );
}
