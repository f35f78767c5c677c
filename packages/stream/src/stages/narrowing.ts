/**
 * Narrowing stages: take, skip, takeWhile, skipWhile.
 *
 * Each computes one new bound and returns a range over the *same* storage.
 * `take`/`takeWhile` keep `start` and move `end` back; `skip`/`skipWhile`
 * keep `end` and move `start` forward. Neither bound ever leaves the input
 * range.
 */

import { config, InvalidCountError } from "@rangeline/core";
import { rangeLength, type Range } from "../range.js";

/**
 * Validate a take/skip count. Under `preconditions: "none"` a bad count is
 * normalised instead: NaN and negatives become 0, fractions are floored.
 */
export function checkCount(operation: string, count: number): number {
  const valid = count >= 0 && (Number.isInteger(count) || count === Infinity);
  if (valid) return count;
  if (config.get("preconditions") === "full") {
    throw new InvalidCountError(operation, count);
  }
  return Number.isNaN(count) || count < 0 ? 0 : Math.floor(count);
}

export function takeRange<A>(input: Range<A>, count: number): Range<A> {
  const n = Math.min(checkCount("take", count), rangeLength(input));
  return { storage: input.storage, start: input.start, end: input.start + n };
}

export function skipRange<A>(input: Range<A>, count: number): Range<A> {
  const n = Math.min(checkCount("skip", count), rangeLength(input));
  return { storage: input.storage, start: input.start + n, end: input.end };
}

export function takeWhileRange<A>(input: Range<A>, predicate: (value: A) => boolean): Range<A> {
  const { storage, start, end } = input;
  let i = start;
  while (i < end && predicate(storage[i])) i++;
  return { storage, start, end: i };
}

export function skipWhileRange<A>(input: Range<A>, predicate: (value: A) => boolean): Range<A> {
  const { storage, start, end } = input;
  let i = start;
  while (i < end && predicate(storage[i])) i++;
  return { storage, start: i, end };
}
