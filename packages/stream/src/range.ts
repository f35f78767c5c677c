/**
 * Range: read positions [start, end) into some indexable storage.
 *
 * A range never copies or owns what it points into. Whoever built the
 * storage (the caller, for a source; a transforming stage, for its output)
 * keeps it alive and unmodified for as long as the range is read.
 */
export interface Range<A> {
  readonly storage: ArrayLike<A>;
  readonly start: number;
  readonly end: number;
}

/** A range over the whole of `storage`. */
export function rangeOver<A>(storage: ArrayLike<A>, end: number = storage.length): Range<A> {
  return { storage, start: 0, end };
}

/** Number of positions the range covers. */
export function rangeLength<A>(range: Range<A>): number {
  return range.end - range.start;
}
