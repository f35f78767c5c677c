/**
 * Container kinds as type-level functions
 *
 * A pipeline stage carries two type parameters: the element type `A` and the
 * container kind `F`. `F` is not a concrete type but a type-level function,
 * so that "the same kind of container, holding something else" can be named
 * without knowing the container up front:
 *
 * ```typescript
 * type Numbers = Apply<ArrayF, number>;  // number[]
 * type Labels  = Apply<SetF, string>;    // Set<string>
 * ```
 *
 * ## How it works
 *
 * A type-level function is an interface whose `_` member mentions
 * `this["__kind__"]`. Intersecting it with `{ readonly __kind__: A }` fixes
 * `this["__kind__"]` to `A`, and indexing `_` reads off the result. Nothing
 * here exists at run time.
 *
 * ## Adding a kind
 *
 * ```typescript
 * interface ListF extends TypeFunction {
 *   readonly __kind__: unknown;
 *   readonly _: List<this["__kind__"]>;
 * }
 * ```
 */

/**
 * Base interface for type-level functions.
 */
export interface TypeFunction {
  readonly __kind__: unknown;
  readonly _: unknown;
}

/**
 * Apply a type-level function to an element type, giving the concrete
 * container type.
 */
export type Apply<F extends TypeFunction, A> = (F & { readonly __kind__: A })["_"];

/**
 * Type-level function for `Array<A>`: the sequence kind.
 */
export interface ArrayF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Array<this["__kind__"]>;
}

/**
 * Type-level function for the native `Set<A>`: the hash-set kind.
 */
export interface SetF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: Set<this["__kind__"]>;
}
