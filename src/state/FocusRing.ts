import {
  firstMatchingIndex,
  focusAfterRemoval,
  isRingIndex,
  lastMatchingIndex,
  nextMatchingIndex,
  normalizeIndex,
  previousMatchingIndex,
  type Predicate,
} from '../core/ringIndex.js';
import { debug } from '../utils/logger.js';

/**
 * Generic ring/cycle data structure with a single focus cursor.
 * Next/previous wrap at both ends; every operation returns a new ring.
 *
 * Indexes passed to any operation are normalized with floored modulo, so
 * `focusOn(-1)` focuses the last element. On an empty ring mutators return the
 * ring unchanged and accessors return `undefined`.
 */
export class FocusRing<T> {
  private readonly items: readonly T[];
  private readonly focused: number;

  private constructor(items: readonly T[], focused: number) {
    this.items = items;
    this.focused = items.length === 0 ? 0 : normalizeIndex(focused, items.length);
  }

  static empty<T>(): FocusRing<T> {
    return new FocusRing<T>([], 0);
  }

  static singleton<T>(item: T): FocusRing<T> {
    return new FocusRing([item], 0);
  }

  static fromArray<T>(items: readonly T[]): FocusRing<T> {
    return new FocusRing([...items], 0);
  }

  static fromList<T>(items: Iterable<T>): FocusRing<T> {
    return new FocusRing(Array.from(items), 0);
  }

  // Adding

  push(item: T): FocusRing<T> {
    return new FocusRing([...this.items, item], this.focused);
  }

  append(items: readonly T[]): FocusRing<T> {
    return new FocusRing([...this.items, ...items], this.focused);
  }

  /** Adds items to the front, keeping the same element focused. */
  prepend(items: readonly T[]): FocusRing<T> {
    const shift = this.items.length === 0 ? 0 : items.length;
    return new FocusRing([...items, ...this.items], this.focused + shift);
  }

  // Removing

  /**
   * Removes the element at `index`.
   *
   * Removing the last element steps the focus back by one. Removing any other
   * element keeps the numeric focus (clamped to the shorter ring), which means
   * removing an element before the focus moves focus onto the next element.
   */
  removeAt(index: number): FocusRing<T> {
    if (this.items.length === 0) {
      debug('removeAt ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`removeAt ignored: invalid index ${index}`);
      return this;
    }
    const removed = normalizeIndex(index, this.items.length);
    const items = this.items.filter((_, i) => i !== removed);
    return new FocusRing(items, focusAfterRemoval(this.focused, removed, this.items.length));
  }

  removeFirst(): FocusRing<T> {
    return this.removeAt(0);
  }

  removeLast(): FocusRing<T> {
    return this.removeAt(this.items.length - 1);
  }

  removeFocused(): FocusRing<T> {
    return this.removeAt(this.focused);
  }

  // Focus navigation

  focusOn(index: number): FocusRing<T> {
    if (this.items.length === 0) {
      debug('focusOn ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`focusOn ignored: invalid index ${index}`);
      return this;
    }
    return new FocusRing(this.items, index);
  }

  focusOnNext(): FocusRing<T> {
    return this.focusOn(this.focused + 1);
  }

  focusOnPrevious(): FocusRing<T> {
    return this.focusOn(this.focused - 1);
  }

  focusOnFirst(): FocusRing<T> {
    return this.focusOn(0);
  }

  focusOnLast(): FocusRing<T> {
    return this.focusOn(this.items.length - 1);
  }

  focusOnFirstMatching(predicate: Predicate<T>): FocusRing<T> {
    return this.focusOnFound('focusOnFirstMatching', firstMatchingIndex(this.items, predicate));
  }

  focusOnLastMatching(predicate: Predicate<T>): FocusRing<T> {
    return this.focusOnFound('focusOnLastMatching', lastMatchingIndex(this.items, predicate));
  }

  /** Searches after the focus first, then wraps to the start up to and including it. */
  focusOnNextMatching(predicate: Predicate<T>): FocusRing<T> {
    return this.focusOnFound(
      'focusOnNextMatching',
      nextMatchingIndex(this.items, this.focused, predicate)
    );
  }

  /** Searches from the focus back to the start, then wraps from the end. */
  focusOnPreviousMatching(predicate: Predicate<T>): FocusRing<T> {
    return this.focusOnFound(
      'focusOnPreviousMatching',
      previousMatchingIndex(this.items, this.focused, predicate)
    );
  }

  private focusOnFound(op: string, index: number | undefined): FocusRing<T> {
    if (index === undefined) {
      debug(`${op}: no match`);
      return this;
    }
    return this.focusOn(index);
  }

  // Accessors

  get(index: number): T | undefined {
    if (this.items.length === 0 || !isRingIndex(index)) return undefined;
    return this.items[normalizeIndex(index, this.items.length)];
  }

  getFirst(): T | undefined {
    return this.get(0);
  }

  getLast(): T | undefined {
    return this.get(this.items.length - 1);
  }

  getFocused(): T | undefined {
    return this.get(this.focused);
  }

  /** Raw focus position; 0 for an empty ring. */
  getFocusedIndex(): number {
    return this.focused;
  }

  size(): number {
    return this.items.length;
  }

  // Replacing

  set(index: number, item: T): FocusRing<T> {
    if (this.items.length === 0) {
      debug('set ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`set ignored: invalid index ${index}`);
      return this;
    }
    const target = normalizeIndex(index, this.items.length);
    return new FocusRing(
      this.items.map((existing, i) => (i === target ? item : existing)),
      this.focused
    );
  }

  setFocused(item: T): FocusRing<T> {
    return this.set(this.focused, item);
  }

  updateFocused(fn: (item: T) => T): FocusRing<T> {
    if (this.items.length === 0) return this;
    return this.set(this.focused, fn(this.items[this.focused]));
  }

  // Predicates

  isEmpty(): boolean {
    return this.items.length === 0;
  }

  isFocusedAt(index: number): boolean {
    return (
      this.items.length > 0 &&
      isRingIndex(index) &&
      normalizeIndex(index, this.items.length) === this.focused
    );
  }

  isFocusedMatching(predicate: Predicate<T>): boolean {
    return this.items.length > 0 && predicate(this.items[this.focused]);
  }

  // Conversion

  toArray(): T[] {
    return [...this.items];
  }

  toList(): T[] {
    return this.toArray();
  }

  map<U>(fn: (item: T, index: number) => U): FocusRing<U> {
    return new FocusRing(
      this.items.map((item, i) => fn(item, i)),
      this.focused
    );
  }

  /** Applies `fn` to the focused element without changing the ring. */
  mapFocused<U>(fn: (item: T) => U): U | undefined {
    if (this.items.length === 0) return undefined;
    return fn(this.items[this.focused]);
  }

  /**
   * One output per element: `focused` for the focused element, `basic` for the
   * rest. This is the hook list renderers use.
   */
  mapEachIntoArray<U>(
    basic: (item: T, index: number) => U,
    focused: (item: T, index: number) => U
  ): U[] {
    return this.items.map((item, i) => (i === this.focused ? focused(item, i) : basic(item, i)));
  }

  mapEachIntoList<U>(
    basic: (item: T, index: number) => U,
    focused: (item: T, index: number) => U
  ): U[] {
    return this.mapEachIntoArray(basic, focused);
  }
}
