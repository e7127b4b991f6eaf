/**
 * @file Public entry point
 * @description
 * Generic ordered container backed by an unbalanced binary search tree with
 * on-demand rebalancing.
 */

import type { Orderable } from './compare';
import { OrderedTree } from './ordered-tree';

export { OrderedTree } from './ordered-tree';
export type { ElementSource } from './ordered-tree';
export { compareElements } from './compare';
export type { Absent, Comparable, Orderable, Primitive } from './compare';
export { ErrorKind, OrderedTreeError } from './errors';
export { TRAVERSAL_ORDERS } from './traversal';
export type { TraversalOrder } from './traversal';

export function emptyTree<E extends Orderable<E>>() { return new OrderedTree<E>(); }
export function treeOf<E extends Orderable<E>>(...elements: E[]) { return new OrderedTree<E>(elements); }
