import type { Predicate } from '../core/ringIndex.js';
import { debug } from '../utils/logger.js';
import { FocusRing } from './FocusRing.js';

/**
 * Non-empty ring stored as a zipper: the elements before the focus (nearest
 * first), the focused element, and the elements after it.
 *
 * The ring `[1, 2, 3, 4]` focused on `3` is `left = [2, 1]`, `focused = 3`,
 * `right = [4]`. Stepping is cheap; indexed access and removal are not offered.
 */
export class ZipperRing<T> {
  private constructor(
    private readonly left: readonly T[],
    private readonly focused: T,
    private readonly right: readonly T[]
  ) {}

  static singleton<T>(item: T): ZipperRing<T> {
    return new ZipperRing<T>([], item, []);
  }

  /** Focuses the first element; `undefined` when `items` is empty. */
  static fromList<T>(items: Iterable<T>): ZipperRing<T> | undefined {
    const all = Array.from(items);
    if (all.length === 0) return undefined;
    return new ZipperRing<T>([], all[0], all.slice(1));
  }

  static fromListWithDefault<T>(fallback: T, items: Iterable<T>): ZipperRing<T> {
    return ZipperRing.fromList(items) ?? ZipperRing.singleton(fallback);
  }

  // Adding

  push(item: T): ZipperRing<T> {
    return new ZipperRing(this.left, this.focused, [...this.right, item]);
  }

  append(items: readonly T[]): ZipperRing<T> {
    return new ZipperRing(this.left, this.focused, [...this.right, ...items]);
  }

  /** Adds `item` as the new first element of the ring. */
  prepend(item: T): ZipperRing<T> {
    return new ZipperRing([...this.left, item], this.focused, this.right);
  }

  // Focus navigation

  focusOnFirst(): ZipperRing<T> {
    if (this.left.length === 0) return this;
    const first = this.left[this.left.length - 1];
    const between = this.left.slice(0, -1).reverse();
    return new ZipperRing<T>([], first, [...between, this.focused, ...this.right]);
  }

  focusOnLast(): ZipperRing<T> {
    if (this.right.length === 0) return this;
    const last = this.right[this.right.length - 1];
    const between = this.right.slice(0, -1).reverse();
    return new ZipperRing<T>([...between, this.focused, ...this.left], last, []);
  }

  focusOnNext(): ZipperRing<T> {
    if (this.right.length === 0) return this.focusOnFirst();
    const [next, ...rest] = this.right;
    return new ZipperRing([this.focused, ...this.left], next, rest);
  }

  focusOnPrevious(): ZipperRing<T> {
    if (this.left.length === 0) return this.focusOnLast();
    const [previous, ...rest] = this.left;
    return new ZipperRing(rest, previous, [this.focused, ...this.right]);
  }

  /** Scans from the first element forwards; `undefined` when nothing matches. */
  focusOnFirstMatching(predicate: Predicate<T>): ZipperRing<T> | undefined {
    return this.focusOnFirst().scan(predicate, (ring) => ring.focusOnNext(), true);
  }

  /** Scans from the last element backwards; `undefined` when nothing matches. */
  focusOnLastMatching(predicate: Predicate<T>): ZipperRing<T> | undefined {
    return this.focusOnLast().scan(predicate, (ring) => ring.focusOnPrevious(), true);
  }

  /**
   * Scans forwards from the element after the focus, wrapping around, and
   * stops once the starting position comes round again. The current focus is
   * never a candidate.
   */
  focusOnNextMatching(predicate: Predicate<T>): ZipperRing<T> | undefined {
    return this.scan(predicate, (ring) => ring.focusOnNext(), false);
  }

  focusOnPreviousMatching(predicate: Predicate<T>): ZipperRing<T> | undefined {
    return this.scan(predicate, (ring) => ring.focusOnPrevious(), false);
  }

  /**
   * Steps with `step` until `predicate` holds or the ring is back where it
   * started. The cycle check compares whole zippers, not focused values, so
   * duplicate elements do not end the scan early.
   */
  private scan(
    predicate: Predicate<T>,
    step: (ring: ZipperRing<T>) => ZipperRing<T>,
    includeStart: boolean
  ): ZipperRing<T> | undefined {
    if (includeStart && predicate(this.focused)) return this;
    let current = step(this);
    while (!current.equals(this)) {
      if (predicate(current.focused)) return current;
      current = step(current);
    }
    debug('zipper scan: no match');
    return undefined;
  }

  // Accessors

  size(): number {
    return this.left.length + 1 + this.right.length;
  }

  getFocused(): T {
    return this.focused;
  }

  isFocusedMatching(predicate: Predicate<T>): boolean {
    return predicate(this.focused);
  }

  setFocused(item: T): ZipperRing<T> {
    return new ZipperRing(this.left, item, this.right);
  }

  /** Structural equality of the two zippers, element by element. */
  equals(other: ZipperRing<T>): boolean {
    return (
      Object.is(this.focused, other.focused) &&
      sameElements(this.left, other.left) &&
      sameElements(this.right, other.right)
    );
  }

  // Conversion

  toList(): T[] {
    return [...this.left].reverse().concat([this.focused], this.right);
  }

  toArray(): T[] {
    return this.toList();
  }

  /** Array-backed ring focused on the same element. */
  toFocusRing(): FocusRing<T> {
    return FocusRing.fromArray(this.toList()).focusOn(this.left.length);
  }

  map<U>(fn: (item: T) => U): ZipperRing<U> {
    return new ZipperRing(
      this.left.map((item) => fn(item)),
      fn(this.focused),
      this.right.map((item) => fn(item))
    );
  }

  mapFocused(fn: (item: T) => T): ZipperRing<T> {
    return new ZipperRing(this.left, fn(this.focused), this.right);
  }
}

function sameElements<T>(a: readonly T[], b: readonly T[]): boolean {
  return a.length === b.length && a.every((item, i) => Object.is(item, b[i]));
}
