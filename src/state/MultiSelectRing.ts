import { isRingIndex, normalizeIndex, sortedIndexes, type Predicate } from '../core/ringIndex.js';
import { debug } from '../utils/logger.js';
import { FocusRing } from './FocusRing.js';

/**
 * Focus ring with any number of selected elements, tracked as a set of
 * indexes. Selecting is a set union, so selecting twice is the same as once.
 */
export class MultiSelectRing<T> {
  private constructor(
    private readonly ring: FocusRing<T>,
    private readonly selected: ReadonlySet<number>
  ) {}

  static empty<T>(): MultiSelectRing<T> {
    return new MultiSelectRing(FocusRing.empty<T>(), new Set());
  }

  static singleton<T>(item: T): MultiSelectRing<T> {
    return new MultiSelectRing(FocusRing.singleton(item), new Set());
  }

  static fromArray<T>(items: readonly T[]): MultiSelectRing<T> {
    return new MultiSelectRing(FocusRing.fromArray(items), new Set());
  }

  static fromList<T>(items: Iterable<T>): MultiSelectRing<T> {
    return new MultiSelectRing(FocusRing.fromList(items), new Set());
  }

  private withRing(ring: FocusRing<T>): MultiSelectRing<T> {
    return ring === this.ring ? this : new MultiSelectRing(ring, this.selected);
  }

  private normalize(index: number): number {
    return normalizeIndex(index, this.ring.size());
  }

  private matchingIndexes(predicate: Predicate<T>): number[] {
    const indexes: number[] = [];
    this.ring.toArray().forEach((item, i) => {
      if (predicate(item)) indexes.push(i);
    });
    return indexes;
  }

  // Adding

  push(item: T): MultiSelectRing<T> {
    return this.withRing(this.ring.push(item));
  }

  append(items: readonly T[]): MultiSelectRing<T> {
    return this.withRing(this.ring.append(items));
  }

  /** Adds items to the front; focus and every selected index shift with them. */
  prepend(items: readonly T[]): MultiSelectRing<T> {
    const shifted = new Set([...this.selected].map((i) => i + items.length));
    return new MultiSelectRing(this.ring.prepend(items), shifted);
  }

  // Removing

  /**
   * Removes the element at `index`. Focus follows the FocusRing removal rule;
   * the removed index leaves the selection and every selected index above it
   * moves down by one.
   */
  removeAt(index: number): MultiSelectRing<T> {
    if (this.ring.isEmpty()) {
      debug('removeAt ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`removeAt ignored: invalid index ${index}`);
      return this;
    }
    const removed = this.normalize(index);
    const selected = new Set<number>();
    for (const i of this.selected) {
      if (i < removed) selected.add(i);
      else if (i > removed) selected.add(i - 1);
    }
    return new MultiSelectRing(this.ring.removeAt(removed), selected);
  }

  removeFirst(): MultiSelectRing<T> {
    return this.removeAt(0);
  }

  removeLast(): MultiSelectRing<T> {
    return this.removeAt(this.ring.size() - 1);
  }

  removeFocused(): MultiSelectRing<T> {
    return this.removeAt(this.ring.getFocusedIndex());
  }

  /** Removes every selected element, highest index first. */
  removeSelected(): MultiSelectRing<T> {
    return sortedIndexes(this.selected)
      .reverse()
      .reduce<MultiSelectRing<T>>((ring, i) => ring.removeAt(i), this);
  }

  // Focus navigation

  focusOn(index: number): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOn(index));
  }

  focusOnNext(): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnNext());
  }

  focusOnPrevious(): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnPrevious());
  }

  focusOnFirst(): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnFirst());
  }

  focusOnLast(): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnLast());
  }

  focusOnFirstMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnFirstMatching(predicate));
  }

  focusOnLastMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnLastMatching(predicate));
  }

  focusOnNextMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnNextMatching(predicate));
  }

  focusOnPreviousMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.withRing(this.ring.focusOnPreviousMatching(predicate));
  }

  // Selecting

  selectAt(index: number): MultiSelectRing<T> {
    return this.selectMany([index]);
  }

  selectFirst(): MultiSelectRing<T> {
    return this.selectAt(0);
  }

  selectLast(): MultiSelectRing<T> {
    return this.selectAt(this.ring.size() - 1);
  }

  selectFocused(): MultiSelectRing<T> {
    return this.selectAt(this.ring.getFocusedIndex());
  }

  selectAll(): MultiSelectRing<T> {
    return this.selectMany(this.ring.toArray().map((_, i) => i));
  }

  selectMany(indexes: Iterable<number>): MultiSelectRing<T> {
    if (this.ring.isEmpty()) {
      debug('select ignored: empty ring');
      return this;
    }
    const selected = new Set(this.selected);
    for (const index of indexes) {
      if (isRingIndex(index)) selected.add(this.normalize(index));
      else debug(`select skipped invalid index ${index}`);
    }
    return new MultiSelectRing(this.ring, selected);
  }

  selectManyMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.selectMany(this.matchingIndexes(predicate));
  }

  // Deselecting

  deselectAt(index: number): MultiSelectRing<T> {
    return this.deselectMany([index]);
  }

  deselectFirst(): MultiSelectRing<T> {
    return this.deselectAt(0);
  }

  deselectLast(): MultiSelectRing<T> {
    return this.deselectAt(this.ring.size() - 1);
  }

  deselectFocused(): MultiSelectRing<T> {
    return this.deselectAt(this.ring.getFocusedIndex());
  }

  deselectAll(): MultiSelectRing<T> {
    return this.selected.size === 0 ? this : new MultiSelectRing(this.ring, new Set());
  }

  deselectMany(indexes: Iterable<number>): MultiSelectRing<T> {
    if (this.ring.isEmpty()) return this;
    const selected = new Set(this.selected);
    for (const index of indexes) {
      if (isRingIndex(index)) selected.delete(this.normalize(index));
    }
    return new MultiSelectRing(this.ring, selected);
  }

  deselectManyMatching(predicate: Predicate<T>): MultiSelectRing<T> {
    return this.deselectMany(this.matchingIndexes(predicate));
  }

  // Toggling

  toggleAt(index: number): MultiSelectRing<T> {
    return this.isSelectedAt(index) ? this.deselectAt(index) : this.selectAt(index);
  }

  toggleFirst(): MultiSelectRing<T> {
    return this.toggleAt(0);
  }

  toggleLast(): MultiSelectRing<T> {
    return this.toggleAt(this.ring.size() - 1);
  }

  toggleFocused(): MultiSelectRing<T> {
    return this.toggleAt(this.ring.getFocusedIndex());
  }

  // Accessors

  get(index: number): T | undefined {
    return this.ring.get(index);
  }

  getFirst(): T | undefined {
    return this.ring.getFirst();
  }

  getLast(): T | undefined {
    return this.ring.getLast();
  }

  getFocused(): T | undefined {
    return this.ring.getFocused();
  }

  getFocusedIndex(): number {
    return this.ring.getFocusedIndex();
  }

  /** Selected elements in ascending index order. */
  getSelected(): T[] {
    const items = this.ring.toArray();
    return sortedIndexes(this.selected).map((i) => items[i]);
  }

  getSelectedIndexes(): number[] {
    return sortedIndexes(this.selected);
  }

  size(): number {
    return this.ring.size();
  }

  countSelected(): number {
    return this.selected.size;
  }

  countDeselected(): number {
    return this.ring.size() - this.selected.size;
  }

  // Replacing

  set(index: number, item: T): MultiSelectRing<T> {
    return this.withRing(this.ring.set(index, item));
  }

  setFocused(item: T): MultiSelectRing<T> {
    return this.withRing(this.ring.setFocused(item));
  }

  // Predicates

  isEmpty(): boolean {
    return this.ring.isEmpty();
  }

  isNoneSelected(): boolean {
    return this.selected.size === 0;
  }

  isAnySelected(): boolean {
    return this.selected.size > 0;
  }

  isAllSelected(): boolean {
    return this.selected.size === this.ring.size();
  }

  isSelectedAt(index: number): boolean {
    return !this.ring.isEmpty() && isRingIndex(index) && this.selected.has(this.normalize(index));
  }

  isFocusedAt(index: number): boolean {
    return this.ring.isFocusedAt(index);
  }

  isFocusedMatching(predicate: Predicate<T>): boolean {
    return this.ring.isFocusedMatching(predicate);
  }

  isFocusedSelected(): boolean {
    return !this.ring.isEmpty() && this.selected.has(this.ring.getFocusedIndex());
  }

  // Conversion

  toArray(): T[] {
    return this.ring.toArray();
  }

  toList(): T[] {
    return this.ring.toList();
  }

  map<U>(fn: (item: T, index: number) => U): MultiSelectRing<U> {
    return new MultiSelectRing(this.ring.map(fn), this.selected);
  }

  mapFocused<U>(fn: (item: T) => U): U | undefined {
    return this.ring.mapFocused(fn);
  }

  /**
   * One output per element. Focus wins over selection: a focused element is
   * always rendered with `focused`, selected or not.
   */
  mapEachIntoArray<U>(
    basic: (item: T, index: number) => U,
    focused: (item: T, index: number) => U,
    selected: (item: T, index: number) => U
  ): U[] {
    return this.ring.mapEachIntoArray(
      (item, i) => (this.selected.has(i) ? selected(item, i) : basic(item, i)),
      focused
    );
  }

  mapEachIntoList<U>(
    basic: (item: T, index: number) => U,
    focused: (item: T, index: number) => U,
    selected: (item: T, index: number) => U
  ): U[] {
    return this.mapEachIntoArray(basic, focused, selected);
  }
}
