/**
 * Error raised by `OrderedTree` on a contract violation. The `kind` property
 * identifies the violation and doubles as the error `name`:
 *
 *       try {
 *         tree.add(input);
 *       } catch (e) {
 *         if (e instanceof OrderedTreeError && e.kind === ErrorKind.MissingArgument) {
 *           // caller passed null / undefined
 *         }
 *       }
 *
 * Data-dependent outcomes (duplicate on add, miss on remove, empty min/max)
 * are reported through return values and never throw.
 */
export class OrderedTreeError extends Error {
    constructor(readonly kind: ErrorKind, msg: string) {
        super(msg);
        this.name = kind;
    }
}

export enum ErrorKind {
    /** A required element or source collection was null / undefined. */
    MissingArgument = 'MissingArgument',
    /** The element cannot take part in a total order (NaN, mismatched types). */
    InvalidElement = 'InvalidElement',
}
