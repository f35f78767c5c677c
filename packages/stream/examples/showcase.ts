/**
 * @rangeline/stream Showcase
 *
 * Self-documenting examples of container-aware pipelines. Every assertion
 * below holds; the type annotations show the container kind travelling
 * through each chain.
 */

import assert from "node:assert/strict";

import {
  fromArray, fromSet, fromSortedSet, range,
  sequence, hashSet, orderedSet, SortedSet,
  EmptyReduceError,
  type Stream, type ArrayF, type SetF, type SortedSetF,
} from "../src/index.js";

// ============================================================================
// 1. CHAINS: narrow without copying, transform into owned storage
// ============================================================================

const halves: Stream<ArrayF, number> = range(0, 80)
  .filter(x => x % 2 !== 0)   // owns [1, 3, …, 79]
  .map(x => x / 2)            // owns [0.5, 1.5, …, 39.5]
  .take(10);                  // borrows the first ten of those

assert.deepEqual(halves.takeWhile(x => x < 8).collect(orderedSet).toArray(),
  [0.5, 1.5, 2.5, 3.5, 4.5, 5.5, 6.5, 7.5]);

// ============================================================================
// 2. CONTAINER KINDS: map keeps the kind, changes the element type
// ============================================================================

// A set stays a set: mapped duplicates collapse on insert
const parities: Stream<SetF, string> = fromSet(new Set([1, 2, 3, 4]))
  .map(x => (x % 2 === 0 ? "even" : "odd"));
assert.deepEqual(parities.toArray(), ["odd", "even"]);

// An ordered set re-sorts under the new element type
const words = new SortedSet<string>(undefined, ["pear", "fig", "banana"]);
const lengths: Stream<SortedSetF, number> = fromSortedSet(words).map(w => w.length);
assert.deepEqual(lengths.toArray(), [3, 4, 6]);

// collect() picks any kind for the result
assert.deepEqual(fromArray([3, 1, 3, 2]).collect(hashSet), new Set([3, 1, 2]));
assert.deepEqual(fromArray([3, 1, 3, 2]).collect(sequence), [3, 1, 3, 2]);

// ============================================================================
// 3. TERMINALS
// ============================================================================

assert.equal(fromArray([1, 2, 3, 4]).reduce(0, (acc, x) => acc + x), 10);
assert.equal(fromArray([5]).reduce((acc, x) => acc + x), 5);
assert.throws(() => fromArray<number>([]).reduce((a, b) => a + b), EmptyReduceError);

assert.equal(fromArray<number>([]).any(() => true), false);
assert.equal(fromArray<number>([]).all(() => false), true);

const indexed: string[] = [];
fromArray(["a", "b"]).forEachIndexed((i, x) => indexed.push(`${i}:${x}`));
assert.deepEqual(indexed, ["0:a", "1:b"]);
