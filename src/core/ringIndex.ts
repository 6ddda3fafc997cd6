/**
 * Index arithmetic and matching search shared by the array-backed rings.
 * Not part of the public entry point.
 */

export type Predicate<T> = (item: T) => boolean;

/** Only whole finite numbers address an element; NaN, fractions and infinities do not. */
export function isRingIndex(index: number): boolean {
  return Number.isInteger(index);
}

/**
 * Floored modulo: maps any integer into [0, size).
 * Returns 0 for an empty ring so callers never see NaN.
 */
export function normalizeIndex(index: number, size: number): number {
  if (size <= 0) return 0;
  return ((index % size) + size) % size;
}

export function firstMatchingIndex<T>(
  items: readonly T[],
  predicate: Predicate<T>
): number | undefined {
  const idx = items.findIndex((item) => predicate(item));
  return idx === -1 ? undefined : idx;
}

export function lastMatchingIndex<T>(
  items: readonly T[],
  predicate: Predicate<T>
): number | undefined {
  for (let i = items.length - 1; i >= 0; i--) {
    if (predicate(items[i])) return i;
  }
  return undefined;
}

/**
 * First match strictly after `focused`; failing that, wrap and take the
 * first match at or before it (the focused index itself included).
 */
export function nextMatchingIndex<T>(
  items: readonly T[],
  focused: number,
  predicate: Predicate<T>
): number | undefined {
  for (let i = focused + 1; i < items.length; i++) {
    if (predicate(items[i])) return i;
  }
  for (let i = 0; i <= focused && i < items.length; i++) {
    if (predicate(items[i])) return i;
  }
  return undefined;
}

/**
 * Scans backwards from the focused index (inclusive) to 0, then wraps and
 * scans from the end down to just after the focused index.
 */
export function previousMatchingIndex<T>(
  items: readonly T[],
  focused: number,
  predicate: Predicate<T>
): number | undefined {
  for (let i = Math.min(focused, items.length - 1); i >= 0; i--) {
    if (predicate(items[i])) return i;
  }
  for (let i = items.length - 1; i > focused; i--) {
    if (predicate(items[i])) return i;
  }
  return undefined;
}

/**
 * Focus after removing `removed` from a ring of `size` elements.
 * Removing the last index steps the focus back by one; any other removal keeps
 * the numeric focus, clamped into the shorter ring.
 */
export function focusAfterRemoval(focused: number, removed: number, size: number): number {
  const newSize = size - 1;
  if (newSize <= 0) return 0;
  if (removed === size - 1) return normalizeIndex(focused - 1, newSize);
  return Math.min(focused, newSize - 1);
}

/** Ascending copy of an index set. */
export function sortedIndexes(indexes: ReadonlySet<number>): number[] {
  return [...indexes].sort((a, b) => a - b);
}
