/**
 * Ord: total ordering for the ordered-set container kind.
 */

/**
 * Ordering result type.
 */
export type Ordering = -1 | 0 | 1;
export const LT: Ordering = -1;
export const EQ_ORD: Ordering = 0;
export const GT: Ordering = 1;

/**
 * A comparator returning an `Ordering`.
 */
export type Comparator<A> = (a: A, b: A) => Ordering;

/**
 * Ord typeclass.
 *
 * Laws:
 * - Antisymmetry: `compare(x, y) <= 0 && compare(y, x) <= 0 => x ≡ y`
 * - Transitivity: `compare(x, y) <= 0 && compare(y, z) <= 0 => compare(x, z) <= 0`
 * - Totality: `compare(x, y) <= 0 || compare(y, x) <= 0`
 */
export interface Ord<A> {
  compare: Comparator<A>;
}

export const ordNumber: Ord<number> = {
  compare: (a, b) => {
    // NaN sorts after every number and equal to itself
    if (Number.isNaN(a)) return Number.isNaN(b) ? EQ_ORD : GT;
    if (Number.isNaN(b)) return LT;
    return a < b ? LT : a > b ? GT : EQ_ORD;
  },
};

export const ordBigInt: Ord<bigint> = {
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
};

export const ordString: Ord<string> = {
  compare: (a, b) => (a < b ? LT : a > b ? GT : EQ_ORD),
};

export const ordBoolean: Ord<boolean> = {
  compare: (a, b) => (a === b ? EQ_ORD : a ? GT : LT),
};

export const ordDate: Ord<Date> = {
  compare: (a, b) => ordNumber.compare(a.getTime(), b.getTime()),
};

/** Reverse an ordering. */
export function reverse<A>(ord: Ord<A>): Ord<A> {
  return { compare: (a, b) => ord.compare(b, a) };
}

// ============================================================================
// Natural order, the default for ordered sets
// ============================================================================

const TYPE_RANK: Record<string, number> = {
  undefined: 0,
  boolean: 1,
  number: 2,
  bigint: 2,
  string: 3,
  symbol: 4,
  object: 5,
  function: 6,
};

function rankOf(value: unknown): number {
  if (value === null) return TYPE_RANK.object;
  return TYPE_RANK[typeof value];
}

function isReference(value: unknown): value is object {
  return (typeof value === "object" && value !== null) || typeof value === "function";
}

// Identity ids, handed out in first-compared order
let nextId = 0;
const referenceIds = new WeakMap<object, number>();
const symbolIds = new Map<symbol, number>();

function referenceId(value: object): number {
  let id = referenceIds.get(value);
  if (id === undefined) {
    id = nextId++;
    referenceIds.set(value, id);
  }
  return id;
}

function symbolId(value: symbol): number {
  let id = symbolIds.get(value);
  if (id === undefined) {
    id = nextId++;
    symbolIds.set(value, id);
  }
  return id;
}

/**
 * Order any two values the way an ordered set with no explicit comparator
 * does.
 *
 * Numbers, bigints, strings, booleans and dates compare by value (numbers and
 * bigints against each other too, NaN after both). Values of different kinds
 * compare by a fixed kind rank. Within the object rank `null` comes first,
 * then dates. Symbols, other objects and functions have no value order and
 * compare by identity: two of them are equal only when they are the same
 * value, and their relative order is stable for the life of the process.
 */
export function naturalOrder(a: unknown, b: unknown): Ordering {
  if (typeof a === "number" && typeof b === "number") return ordNumber.compare(a, b);
  if (typeof a === "bigint" && typeof b === "bigint") return ordBigInt.compare(a, b);
  if (typeof a === "string" && typeof b === "string") return ordString.compare(a, b);
  if (typeof a === "boolean" && typeof b === "boolean") return ordBoolean.compare(a, b);
  if (a instanceof Date && b instanceof Date) return ordDate.compare(a, b);

  if (typeof a === "number" && typeof b === "bigint") {
    if (Number.isNaN(a)) return GT;
    return a < b ? LT : a > b ? GT : EQ_ORD;
  }
  if (typeof a === "bigint" && typeof b === "number") {
    if (Number.isNaN(b)) return LT;
    return a < b ? LT : a > b ? GT : EQ_ORD;
  }

  const ra = rankOf(a);
  const rb = rankOf(b);
  if (ra !== rb) return ra < rb ? LT : GT;
  if (a === b) return EQ_ORD;

  if (typeof a === "symbol" && typeof b === "symbol") {
    return ordNumber.compare(symbolId(a), symbolId(b));
  }
  if (a === null) return LT;
  if (b === null) return GT;
  if (a instanceof Date) return LT;
  if (b instanceof Date) return GT;
  if (isReference(a) && isReference(b)) {
    return ordNumber.compare(referenceId(a), referenceId(b));
  }
  return EQ_ORD;
}
