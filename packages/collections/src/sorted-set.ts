/**
 * SortedSet<A>: a unique set kept in ascending order.
 *
 * API mirrors native Set<A> where it can. Elements live in one sorted array,
 * so positional reads are O(1) and `view()` hands out that array directly.
 */

import { naturalOrder, type Comparator, type TypeFunction } from "@rangeline/core";

export class SortedSet<A> {
  private readonly _compare: Comparator<A>;
  private readonly _items: A[] = [];

  constructor(compare: Comparator<A> = naturalOrder, values?: Iterable<A>) {
    this._compare = compare;
    if (values) {
      for (const v of values) this.add(v);
    }
  }

  get size(): number {
    return this._items.length;
  }

  /** Index of `value` if present, otherwise the index it would be inserted at. */
  private search(value: A): { index: number; found: boolean } {
    let lo = 0;
    let hi = this._items.length;
    while (lo < hi) {
      const mid = (lo + hi) >>> 1;
      const ord = this._compare(this._items[mid], value);
      if (ord === 0) return { index: mid, found: true };
      if (ord < 0) lo = mid + 1;
      else hi = mid;
    }
    return { index: lo, found: false };
  }

  has(value: A): boolean {
    return this.search(value).found;
  }

  add(value: A): this {
    const { index, found } = this.search(value);
    if (!found) this._items.splice(index, 0, value);
    return this;
  }

  delete(value: A): boolean {
    const { index, found } = this.search(value);
    if (!found) return false;
    this._items.splice(index, 1);
    return true;
  }

  clear(): void {
    this._items.length = 0;
  }

  first(): A | undefined {
    return this._items[0];
  }

  last(): A | undefined {
    return this._items[this._items.length - 1];
  }

  /** The backing array, ascending. Valid until the set is next modified. */
  view(): readonly A[] {
    return this._items;
  }

  *[Symbol.iterator](): IterableIterator<A> {
    for (const v of this._items) yield v;
  }

  values(): IterableIterator<A> {
    return this[Symbol.iterator]();
  }

  forEach(fn: (value: A) => void): void {
    for (const v of this._items) fn(v);
  }

  toArray(): A[] {
    return this._items.slice();
  }
}

/**
 * Type-level function for `SortedSet<A>`: the ordered-set kind.
 */
export interface SortedSetF extends TypeFunction {
  readonly __kind__: unknown;
  readonly _: SortedSet<this["__kind__"]>;
}
