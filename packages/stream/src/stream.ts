/**
 * Stream: one stage of a collection pipeline.
 *
 * Every stage, the source wrapper included, is a `Stream<F, A>`: a range of
 * `A`s plus the adapter for container kind `F`. Intermediate operations
 * return a new stage and never change this one; terminal operations read the
 * range and return a plain value.
 *
 * - `take`, `skip`, `takeWhile`, `skipWhile` narrow the range and share the
 *   input's storage.
 * - `map` and `filter` build a new container of kind `F` up front and own
 *   it; `map` changes `A`, never `F`.
 *
 * @example
 * ```typescript
 * const halves = fromArray([1, 2, 3, 4, 5, 6])
 *   .filter(x => x % 2 !== 0)
 *   .map(x => x / 2)
 *   .collect(orderedSet); // SortedSet { 0.5, 1.5, 2.5 }
 * ```
 */

import { traceStage, type Apply, type StorageMode, type TypeFunction } from "@rangeline/core";
import { sequence, type ContainerAdapter } from "@rangeline/collections";
import { rangeLength, type Range } from "./range.js";
import { skipRange, skipWhileRange, takeRange, takeWhileRange } from "./stages/narrowing.js";
import { filterRange, mapRange } from "./stages/transforming.js";
import {
  allOf,
  anyOf,
  collectOf,
  findOf,
  foldOf,
  forEachIndexedOf,
  forEachOf,
  reduceOf,
} from "./terminal.js";

export class Stream<F extends TypeFunction, A> implements Iterable<A> {
  private readonly adapter: ContainerAdapter<F>;
  private readonly range: Range<A>;
  /** Storage this stage built itself; `range` points into it. */
  private readonly owned: Apply<F, A> | undefined;

  constructor(adapter: ContainerAdapter<F>, range: Range<A>, owned?: Apply<F, A>) {
    this.adapter = adapter;
    this.range = range;
    this.owned = owned;
  }

  /** Name of the container kind backing this stage. */
  get kind(): string {
    return this.adapter.name;
  }

  /** Whether this stage's range points into storage it built. */
  get ownsStorage(): boolean {
    return this.owned !== undefined;
  }

  private next<R>(operation: string, stage: Stream<F, R>, storage: StorageMode): Stream<F, R> {
    traceStage({
      operation,
      inputLength: rangeLength(this.range),
      outputLength: rangeLength(stage.range),
      storage,
    });
    return stage;
  }

  private narrowed(operation: string, range: Range<A>): Stream<F, A> {
    return this.next(operation, new Stream<F, A>(this.adapter, range), "borrowed");
  }

  // ---------------------------------------------------------------------------
  // Intermediate operations
  // ---------------------------------------------------------------------------

  /** Transform each element into a new container of the same kind */
  map<R>(mapper: (value: A) => R): Stream<F, R> {
    const { container, range } = mapRange(this.adapter, this.range, mapper);
    return this.next("map", new Stream<F, R>(this.adapter, range, container), "owned");
  }

  /** Keep only elements that satisfy the predicate */
  filter(predicate: (value: A) => boolean): Stream<F, A> {
    const { container, range } = filterRange(this.adapter, this.range, predicate);
    return this.next("filter", new Stream<F, A>(this.adapter, range, container), "owned");
  }

  /** At most the first `count` elements */
  take(count: number): Stream<F, A> {
    return this.narrowed("take", takeRange(this.range, count));
  }

  /** Elements up to, not including, the first one failing the predicate */
  takeWhile(predicate: (value: A) => boolean): Stream<F, A> {
    return this.narrowed("takeWhile", takeWhileRange(this.range, predicate));
  }

  /** Everything after the first `count` elements */
  skip(count: number): Stream<F, A> {
    return this.narrowed("skip", skipRange(this.range, count));
  }

  /** Everything from the first element failing the predicate onwards */
  skipWhile(predicate: (value: A) => boolean): Stream<F, A> {
    return this.narrowed("skipWhile", skipWhileRange(this.range, predicate));
  }

  // ---------------------------------------------------------------------------
  // Terminal operations
  // ---------------------------------------------------------------------------

  /** Execute a side effect for each element */
  forEach(consumer: (value: A) => void): void {
    forEachOf(this.range, consumer);
  }

  /** Execute a side effect for each element with its position, from 0 */
  forEachIndexed(consumer: (index: number, value: A) => void): void {
    forEachIndexedOf(this.range, consumer);
  }

  /**
   * Fold elements left-to-right.
   *
   * Without a seed the first element seeds the fold, and an empty stream
   * throws EmptyReduceError.
   */
  reduce(reducer: (acc: A, value: A) => A): A;
  reduce<R>(seed: R, reducer: (acc: R, value: A) => R): R;
  reduce<R>(...args: [(acc: A, value: A) => A] | [R, (acc: R, value: A) => R]): A | R {
    if (args.length === 1) return reduceOf(this.range, args[0]);
    return foldOf(this.range, args[0], args[1]);
  }

  /** True if any element satisfies the predicate */
  any(predicate: (value: A) => boolean): boolean {
    return anyOf(this.range, predicate);
  }

  /** True if all elements satisfy the predicate */
  all(predicate: (value: A) => boolean): boolean {
    return allOf(this.range, predicate);
  }

  /** Collect into a fresh container of the given kind */
  collect<G extends TypeFunction>(adapter: ContainerAdapter<G>): Apply<G, A> {
    return collectOf(adapter, this.range);
  }

  /** Collect into an array */
  toArray(): A[] {
    return collectOf(sequence, this.range);
  }

  /** First element matching the predicate, or undefined */
  find(predicate: (value: A) => boolean): A | undefined {
    return findOf(this.range, predicate);
  }

  /** Number of elements */
  count(): number {
    return rangeLength(this.range);
  }

  /** First element, or undefined if empty */
  first(): A | undefined {
    const { storage, start, end } = this.range;
    return start < end ? storage[start] : undefined;
  }

  /** Last element, or undefined if empty */
  last(): A | undefined {
    const { storage, start, end } = this.range;
    return start < end ? storage[end - 1] : undefined;
  }

  *[Symbol.iterator](): Iterator<A> {
    const { storage, start, end } = this.range;
    for (let i = start; i < end; i++) yield storage[i];
  }
}
