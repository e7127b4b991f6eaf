/**
 * @module compare
 * @description
 * Ordering contract for tree elements.
 *
 * Contracts:
 * - Primitives (number, string, bigint) use their natural order.
 * - Objects provide `compareTo`, returning negative / zero / positive.
 * - NaN is not ordered: inserting it throws, looking it up finds nothing.
 */

import { ErrorKind, OrderedTreeError } from './errors';

export type Primitive = number | string | bigint;

/**
 * Three-way comparison capability for object elements.
 * Two elements with `compareTo(...) === 0` are the same element as far as the
 * tree is concerned, whatever their identity.
 */
export interface Comparable<T> {
    compareTo(other: T): number;
}

/**
 * Types that can be stored in an `OrderedTree<E>`: exactly one primitive kind,
 * or objects comparable with each other.
 * Used as an F-bound (`E extends Orderable<E>`). The check is wrapped in a
 * tuple so it does not distribute: `number | string` resolves to
 * `Comparable<number | string>` and is rejected at compile time.
 */
export type Orderable<E> =
    [E] extends [number] ? number :
    [E] extends [string] ? string :
    [E] extends [bigint] ? bigint :
    Comparable<E>;

/** Absent values (`null` / `undefined`) are never stored. */
export type Absent = null | undefined;

export function isAbsent(v: unknown): v is Absent {
    return v === null || v === undefined;
}

function isComparable<T>(v: unknown): v is Comparable<T> {
    return typeof v === 'object' && v !== null && 'compareTo' in v && typeof v.compareTo === 'function';
}

/** NaN has no place in a total order; it can never be stored. */
export function isUnordered(v: unknown): boolean {
    return typeof v === 'number' && Number.isNaN(v);
}

// ============================================================================
// COMPARATOR
// ============================================================================

/**
 * Compares two elements of the same tree.
 * Primitive fast path first, then the `compareTo` of the left operand.
 *
 * @returns Negative if a < b, positive if a > b, 0 if equal.
 */
export function compareElements<E extends Orderable<E>>(a: E, b: E): number {
    if (a === b) return 0;
    if (typeof a === 'number' && typeof b === 'number') return a < b ? -1 : 1;
    if (typeof a === 'string' && typeof b === 'string') return a < b ? -1 : 1;
    if (typeof a === 'bigint' && typeof b === 'bigint') return a < b ? -1 : 1;
    if (isComparable<E>(a) && isComparable<E>(b)) return a.compareTo(b);

    throw new OrderedTreeError(
        ErrorKind.InvalidElement,
        `Cannot compare ${typeof a} with ${typeof b}`
    );
}

/**
 * Validates an element argument: absent values are contract violations.
 * @param op - Name of the calling operation, used in the message.
 */
export function checkElement<E>(element: E | Absent, op: string): asserts element is E {
    if (isAbsent(element)) {
        throw new OrderedTreeError(ErrorKind.MissingArgument, `${op}: element must not be null or undefined`);
    }
}

/** `checkElement`, plus rejection of NaN for values about to be stored. */
export function checkInsertable<E>(element: E | Absent, op: string): asserts element is E {
    checkElement(element, op);
    if (isUnordered(element)) {
        throw new OrderedTreeError(ErrorKind.InvalidElement, `${op}: NaN is not supported`);
    }
}
