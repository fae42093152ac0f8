export const variants = ["shared", "mutable", "immutable", "read-only"] as const

/**
 * Ownership discipline of a byte sequence.
 *
 * - `shared`: the buffer may be aliased; transforms run in place when they can.
 * - `mutable`: like `shared`, and additionally allows direct writes.
 * - `immutable`: reads hand out copies; transforms always copy.
 * - `read-only`: the buffer is never handed out; transforms always copy.
 */
export type Variant = (typeof variants)[number]
