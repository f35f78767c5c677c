/**
 * @rangeline/stream: typed collection pipelines
 *
 * A chain of map/filter/take/skip stages over an array, a set or a sorted
 * set, ended by a terminal operation. The container kind travels through the
 * chain in the type: mapping a `Stream<SortedSetF, number>` gives a
 * `Stream<SortedSetF, R>`, and `collect(adapter)` picks the result kind.
 *
 * Narrowing stages (take, skip, takeWhile, skipWhile) share their input's
 * storage; map and filter build and own a new container.
 *
 * @example
 * ```typescript
 * import { range, orderedSet } from "@rangeline/stream";
 *
 * const result = range(0, 80)
 *   .filter(x => x % 2 !== 0)
 *   .map(x => x / 2)
 *   .take(10)
 *   .takeWhile(x => x < 8)
 *   .collect(orderedSet); // SortedSet { 0.5, 1.5, …, 7.5 }
 * ```
 */

export { Stream } from "./stream.js";
export { fromArray, fromSet, fromSortedSet, fromContainer, range } from "./sources.js";
export { rangeOver, rangeLength, type Range } from "./range.js";

// Re-exports a pipeline user needs alongside the stream itself
export {
  sequence,
  hashSet,
  orderedSet,
  SortedSet,
  type ContainerAdapter,
  type SortedSetF,
} from "@rangeline/collections";
export {
  config,
  setTraceWriter,
  PipelineError,
  PreconditionError,
  EmptyReduceError,
  InvalidCountError,
  InvalidStepError,
  type Apply,
  type ArrayF,
  type SetF,
  type TypeFunction,
} from "@rangeline/core";
