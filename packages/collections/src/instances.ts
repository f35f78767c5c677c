/**
 * Container adapter instances for arrays, native sets and sorted sets.
 */

import type { ArrayF, SetF } from "@rangeline/core";
import type { ContainerAdapter } from "./typeclasses.js";
import { SortedSet, type SortedSetF } from "./sorted-set.js";

// ============================================================================
// Array → sequence
// ============================================================================

export const sequence: ContainerAdapter<ArrayF> = {
  name: "sequence",
  create: <A>(): A[] => [],
  insert: <A>(c: A[], value: A) => {
    c.push(value);
  },
  elements: <A>(c: A[]): ArrayLike<A> => c,
  size: <A>(c: A[]) => c.length,
};

// ============================================================================
// Native Set → hash-set
// ============================================================================

/**
 * Native `Set` as the hash-set kind: SameValueZero equality, insertion order.
 * `Set` has no positional access, so `elements` takes a snapshot.
 */
export const hashSet: ContainerAdapter<SetF> = {
  name: "hash-set",
  create: <A>() => new Set<A>(),
  insert: <A>(s: Set<A>, value: A) => {
    s.add(value);
  },
  elements: <A>(s: Set<A>): ArrayLike<A> => Array.from(s),
  size: <A>(s: Set<A>) => s.size,
};

// ============================================================================
// SortedSet → ordered-set
// ============================================================================

/**
 * `SortedSet` under natural order as the ordered-set kind. `elements` is the
 * set's own backing array.
 */
export const orderedSet: ContainerAdapter<SortedSetF> = {
  name: "ordered-set",
  create: <A>() => new SortedSet<A>(),
  insert: <A>(s: SortedSet<A>, value: A) => {
    s.add(value);
  },
  elements: <A>(s: SortedSet<A>): ArrayLike<A> => s.view(),
  size: <A>(s: SortedSet<A>) => s.size,
};
