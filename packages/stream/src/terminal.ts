/**
 * Terminal operations. Each consumes a range front to back and returns a
 * plain value.
 */

import { EmptyReduceError, type Apply, type TypeFunction } from "@rangeline/core";
import type { ContainerAdapter } from "@rangeline/collections";
import type { Range } from "./range.js";

export function forEachOf<A>(range: Range<A>, consumer: (value: A) => void): void {
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) consumer(storage[i]);
}

export function forEachIndexedOf<A>(
  range: Range<A>,
  consumer: (index: number, value: A) => void,
): void {
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) consumer(i - start, storage[i]);
}

/** Fold starting from the first element; throws EmptyReduceError if there is none. */
export function reduceOf<A>(range: Range<A>, reducer: (acc: A, value: A) => A): A {
  const { storage, start, end } = range;
  if (start >= end) throw new EmptyReduceError();
  let acc = storage[start];
  for (let i = start + 1; i < end; i++) acc = reducer(acc, storage[i]);
  return acc;
}

export function foldOf<A, R>(range: Range<A>, seed: R, reducer: (acc: R, value: A) => R): R {
  const { storage, start, end } = range;
  let acc = seed;
  for (let i = start; i < end; i++) acc = reducer(acc, storage[i]);
  return acc;
}

export function anyOf<A>(range: Range<A>, predicate: (value: A) => boolean): boolean {
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) {
    if (predicate(storage[i])) return true;
  }
  return false;
}

export function allOf<A>(range: Range<A>, predicate: (value: A) => boolean): boolean {
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) {
    if (!predicate(storage[i])) return false;
  }
  return true;
}

export function findOf<A>(range: Range<A>, predicate: (value: A) => boolean): A | undefined {
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) {
    const value = storage[i];
    if (predicate(value)) return value;
  }
  return undefined;
}

/** Insert every element, in order, into a fresh container of the adapter's kind. */
export function collectOf<G extends TypeFunction, A>(
  adapter: ContainerAdapter<G>,
  range: Range<A>,
): Apply<G, A> {
  const result = adapter.create<A>();
  const { storage, start, end } = range;
  for (let i = start; i < end; i++) adapter.insert<A>(result, storage[i]);
  return result;
}
