/**
 * Transforming stages: map and filter.
 *
 * Both run to completion before returning: create the destination through
 * the adapter, walk the input range once, insert, then take a range over the
 * finished container. The container is handed back alongside its range so
 * the stage that keeps the range also keeps the storage; nothing inserts
 * into it afterwards.
 */

import type { Apply, TypeFunction } from "@rangeline/core";
import type { ContainerAdapter } from "@rangeline/collections";
import { rangeOver, type Range } from "../range.js";

/** A container together with the range over its elements. */
export interface OwnedRange<F extends TypeFunction, A> {
  readonly container: Apply<F, A>;
  readonly range: Range<A>;
}

function seal<F extends TypeFunction, A>(
  adapter: ContainerAdapter<F>,
  container: Apply<F, A>,
): OwnedRange<F, A> {
  return {
    container,
    range: rangeOver(adapter.elements<A>(container), adapter.size<A>(container)),
  };
}

/**
 * Apply `mapper` to every element of `input`, in order, into a new container
 * of the same kind. Set kinds drop mapped duplicates on insert.
 */
export function mapRange<F extends TypeFunction, A, R>(
  adapter: ContainerAdapter<F>,
  input: Range<A>,
  mapper: (value: A) => R,
): OwnedRange<F, R> {
  const container = adapter.create<R>();
  const { storage, start, end } = input;
  for (let i = start; i < end; i++) {
    adapter.insert<R>(container, mapper(storage[i]));
  }
  return seal<F, R>(adapter, container);
}

/**
 * Copy the elements of `input` that satisfy `predicate`, in order, into a new
 * container of the same kind.
 */
export function filterRange<F extends TypeFunction, A>(
  adapter: ContainerAdapter<F>,
  input: Range<A>,
  predicate: (value: A) => boolean,
): OwnedRange<F, A> {
  const container = adapter.create<A>();
  const { storage, start, end } = input;
  for (let i = start; i < end; i++) {
    const value = storage[i];
    if (predicate(value)) adapter.insert<A>(container, value);
  }
  return seal<F, A>(adapter, container);
}
