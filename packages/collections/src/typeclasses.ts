/**
 * Container Adapter Typeclass
 *
 * A dictionary of operations for one container kind `F`, parameterised over
 * the element type so a single adapter serves `Apply<F, number>`,
 * `Apply<F, string>` and so on. This is the only seam a pipeline needs:
 *
 *   - `create<A>()` names "the same kind of container, holding A"
 *   - `insert` appends (sequence kinds) or inserts-if-absent (set kinds)
 *   - `elements` exposes the contents as an indexable, read-only view
 *
 * Supporting a new container kind means writing a `TypeFunction` for it and
 * one `ContainerAdapter` value; nothing else changes.
 */

import type { Apply, TypeFunction } from "@rangeline/core";

/**
 * The capability set for a container kind.
 */
export interface ContainerAdapter<F extends TypeFunction> {
  /** Human-readable kind name, e.g. "sequence" */
  readonly name: string;

  /** A fresh, empty container of this kind. */
  create<A>(): Apply<F, A>;

  /** Add `value`; set kinds skip values already present. */
  insert<A>(container: Apply<F, A>, value: A): void;

  /**
   * Read-only, indexable view of the elements in iteration order. Where the
   * container already keeps its elements in an array, this is that array,
   * not a copy.
   */
  elements<A>(container: Apply<F, A>): ArrayLike<A>;

  size<A>(container: Apply<F, A>): number;
}
