import { describe, it, expect, afterEach } from "vitest";
import { config, InvalidCountError } from "@rangeline/core";
import { sequence, orderedSet, SortedSet } from "@rangeline/collections";
import { rangeOver, type Range } from "../range.js";
import {
  checkCount,
  skipRange,
  skipWhileRange,
  takeRange,
  takeWhileRange,
} from "../stages/narrowing.js";
import { filterRange, mapRange } from "../stages/transforming.js";

function contents<A>(range: Range<A>): A[] {
  return Array.from(range.storage).slice(range.start, range.end);
}

// ===========================================================================
// Narrowing
// ===========================================================================

describe("narrowing stages", () => {
  const storage = [10, 20, 30, 40, 50];
  const whole = rangeOver(storage);
  const middle: Range<number> = { storage, start: 1, end: 4 };

  it("take keeps start and moves end", () => {
    expect(takeRange(middle, 2)).toEqual({ storage, start: 1, end: 3 });
  });

  it("take clamps to the available elements", () => {
    expect(takeRange(middle, 99)).toEqual({ storage, start: 1, end: 4 });
    expect(takeRange(middle, Infinity)).toEqual({ storage, start: 1, end: 4 });
  });

  it("take 0 is empty", () => {
    expect(takeRange(whole, 0)).toEqual({ storage, start: 0, end: 0 });
  });

  it("skip keeps end and moves start", () => {
    expect(skipRange(middle, 2)).toEqual({ storage, start: 3, end: 4 });
  });

  it("skip past the end is empty at the end", () => {
    expect(skipRange(middle, 10)).toEqual({ storage, start: 4, end: 4 });
  });

  it("takeWhile stops at the first failing element", () => {
    expect(takeWhileRange(whole, (x) => x < 35)).toEqual({ storage, start: 0, end: 3 });
  });

  it("takeWhile failing on the first element is empty", () => {
    expect(takeWhileRange(middle, (x) => x > 100)).toEqual({ storage, start: 1, end: 1 });
  });

  it("takeWhile holding throughout keeps the whole range", () => {
    expect(takeWhileRange(middle, () => true)).toEqual(middle);
  });

  it("skipWhile starts at the first failing element", () => {
    expect(skipWhileRange(whole, (x) => x < 35)).toEqual({ storage, start: 3, end: 5 });
  });

  it("skipWhile holding throughout is empty at the end", () => {
    expect(skipWhileRange(middle, () => true)).toEqual({ storage, start: 4, end: 4 });
  });

  it("takeWhile and skipWhile do not look outside the range", () => {
    const seen: number[] = [];
    takeWhileRange(middle, (x) => {
      seen.push(x);
      return true;
    });
    expect(seen).toEqual([20, 30, 40]);
  });

  it("every narrowing result shares the input storage", () => {
    expect(takeRange(whole, 2).storage).toBe(storage);
    expect(skipRange(whole, 2).storage).toBe(storage);
    expect(takeWhileRange(whole, () => true).storage).toBe(storage);
    expect(skipWhileRange(whole, () => false).storage).toBe(storage);
  });
});

describe("count preconditions", () => {
  afterEach(() => {
    config.reset();
  });

  it("accepts non-negative integers and Infinity", () => {
    config.set({ preconditions: "full" });
    expect(checkCount("take", 0)).toBe(0);
    expect(checkCount("take", 7)).toBe(7);
    expect(checkCount("take", Infinity)).toBe(Infinity);
  });

  it("throws InvalidCountError for bad counts", () => {
    config.set({ preconditions: "full" });
    expect(() => checkCount("take", -1)).toThrow(InvalidCountError);
    expect(() => checkCount("skip", 1.5)).toThrow(
      "skip() count must be a non-negative integer, got 1.5"
    );
    expect(() => checkCount("take", NaN)).toThrow(InvalidCountError);
  });

  it("normalises bad counts when preconditions are off", () => {
    config.set({ preconditions: "none" });
    expect(checkCount("take", -3)).toBe(0);
    expect(checkCount("take", NaN)).toBe(0);
    expect(checkCount("skip", 2.9)).toBe(2);
  });

  it("take and skip apply the normalised count", () => {
    config.set({ preconditions: "none" });
    const r = rangeOver([1, 2, 3, 4]);
    expect(contents(takeRange(r, 2.5))).toEqual([1, 2]);
    expect(contents(skipRange(r, -1))).toEqual([1, 2, 3, 4]);
  });
});

// ===========================================================================
// Transforming
// ===========================================================================

describe("transforming stages", () => {
  it("map builds a new container and ranges over all of it", () => {
    const input: Range<number> = { storage: [1, 2, 3, 4], start: 1, end: 3 };
    const { container, range } = mapRange(sequence, input, (x) => x * 10);
    expect(container).toEqual([20, 30]);
    expect(range).toEqual({ storage: container, start: 0, end: 2 });
  });

  it("filter builds a new container of the same kind", () => {
    const input = rangeOver([5, 1, 4, 2]);
    const { container, range } = filterRange(orderedSet, input, (x) => x > 1);
    expect(container).toBeInstanceOf(SortedSet);
    expect(container.toArray()).toEqual([2, 4, 5]);
    expect(range.storage).toBe(container.view());
    expect(range.end).toBe(3);
  });

  it("map into a set kind drops duplicate results", () => {
    const { container, range } = mapRange(orderedSet, rangeOver([1, 2, 3, 4]), (x) => x % 2);
    expect(container.toArray()).toEqual([0, 1]);
    expect(range.end).toBe(2);
  });

  it("calls the operation once per element, in order", () => {
    const seen: number[] = [];
    mapRange(sequence, rangeOver([3, 2, 1]), (x) => {
      seen.push(x);
      return x;
    });
    filterRange(sequence, rangeOver([9, 8]), (x) => {
      seen.push(x);
      return true;
    });
    expect(seen).toEqual([3, 2, 1, 9, 8]);
  });

  it("never writes to the input storage", () => {
    const storage = [1, 2, 3];
    mapRange(sequence, rangeOver(storage), (x) => x + 1);
    filterRange(sequence, rangeOver(storage), () => false);
    expect(storage).toEqual([1, 2, 3]);
  });
});
