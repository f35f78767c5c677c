/**
 * Entry points for creating streams.
 *
 * `fromArray`, `fromSet` and `fromSortedSet` wrap the three built-in
 * container kinds; `fromContainer` wraps any kind that has an adapter.
 * `range()` builds a finite numeric sequence.
 */

import { InvalidStepError, type Apply, type ArrayF, type SetF, type TypeFunction } from "@rangeline/core";
import {
  hashSet,
  orderedSet,
  sequence,
  type ContainerAdapter,
  type SortedSet,
  type SortedSetF,
} from "@rangeline/collections";
import { rangeOver } from "./range.js";
import { Stream } from "./stream.js";

/**
 * Wrap a container of any kind. The stream reads the adapter's element view
 * of `source` and never writes to it.
 */
export function fromContainer<F extends TypeFunction, A>(
  adapter: ContainerAdapter<F>,
  source: Apply<F, A>,
): Stream<F, A> {
  return new Stream<F, A>(adapter, rangeOver(adapter.elements<A>(source), adapter.size<A>(source)));
}

/** Wrap an array. The stream reads the array in place. */
export function fromArray<A>(source: readonly A[]): Stream<ArrayF, A> {
  return new Stream<ArrayF, A>(sequence, rangeOver(source));
}

/** Wrap a native Set, reading a snapshot of its elements in insertion order. */
export function fromSet<A>(source: ReadonlySet<A>): Stream<SetF, A> {
  return new Stream<SetF, A>(hashSet, rangeOver(Array.from(source)));
}

/** Wrap a SortedSet. The stream reads the set's backing array in place. */
export function fromSortedSet<A>(source: SortedSet<A>): Stream<SortedSetF, A> {
  return fromContainer<SortedSetF, A>(orderedSet, source);
}

/**
 * A stream over the numbers `start, start + step, …` up to (excluding)
 * `end`. Both bounds must be finite and `step` non-zero.
 */
export function range(start: number, end: number, step: number = 1): Stream<ArrayF, number> {
  if (!Number.isFinite(start) || !Number.isFinite(end)) {
    throw new InvalidStepError(`range() bounds must be finite, got ${start} and ${end}`);
  }
  if (step === 0 || !Number.isFinite(step)) {
    throw new InvalidStepError(`range() step must be a finite non-zero number, got ${step}`);
  }

  // Values come from their index, never from a running sum
  const length = Math.max(0, Math.ceil((end - start) / step));
  const values: number[] = [];
  for (let k = 0; k < length; k++) values.push(start + k * step);
  return new Stream<ArrayF, number>(sequence, rangeOver(values), values);
}
