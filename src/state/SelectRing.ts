import {
  firstMatchingIndex,
  isRingIndex,
  lastMatchingIndex,
  normalizeIndex,
  type Predicate,
} from '../core/ringIndex.js';
import { debug } from '../utils/logger.js';
import { FocusRing } from './FocusRing.js';

/**
 * Focus ring with at most one selected element.
 *
 * Selection is independent of focus: the two may sit on the same element or on
 * different ones. `selected` is either a valid index or `undefined`, never a
 * flag plus a stale index.
 */
export class SelectRing<T> {
  private constructor(
    private readonly ring: FocusRing<T>,
    private readonly selected: number | undefined
  ) {}

  static empty<T>(): SelectRing<T> {
    return new SelectRing(FocusRing.empty<T>(), undefined);
  }

  static singleton<T>(item: T): SelectRing<T> {
    return new SelectRing(FocusRing.singleton(item), undefined);
  }

  static fromArray<T>(items: readonly T[]): SelectRing<T> {
    return new SelectRing(FocusRing.fromArray(items), undefined);
  }

  static fromList<T>(items: Iterable<T>): SelectRing<T> {
    return new SelectRing(FocusRing.fromList(items), undefined);
  }

  private withRing(ring: FocusRing<T>): SelectRing<T> {
    return ring === this.ring ? this : new SelectRing(ring, this.selected);
  }

  private withSelected(selected: number | undefined): SelectRing<T> {
    return selected === this.selected ? this : new SelectRing(this.ring, selected);
  }

  // Adding

  push(item: T): SelectRing<T> {
    return this.withRing(this.ring.push(item));
  }

  append(items: readonly T[]): SelectRing<T> {
    return this.withRing(this.ring.append(items));
  }

  /** Adds items to the front; focus and selection stay on the same elements. */
  prepend(items: readonly T[]): SelectRing<T> {
    const selected = this.selected === undefined ? undefined : this.selected + items.length;
    return new SelectRing(this.ring.prepend(items), selected);
  }

  // Removing

  /**
   * Removes the element at `index`. Focus follows the FocusRing removal rule;
   * a selection on the removed element is cleared and one after it moves down.
   */
  removeAt(index: number): SelectRing<T> {
    if (this.ring.isEmpty()) {
      debug('removeAt ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`removeAt ignored: invalid index ${index}`);
      return this;
    }
    const removed = normalizeIndex(index, this.ring.size());
    let selected = this.selected;
    if (selected === removed) {
      selected = undefined;
    } else if (selected !== undefined && selected > removed) {
      selected -= 1;
    }
    return new SelectRing(this.ring.removeAt(removed), selected);
  }

  removeFirst(): SelectRing<T> {
    return this.removeAt(0);
  }

  removeLast(): SelectRing<T> {
    return this.removeAt(this.ring.size() - 1);
  }

  removeFocused(): SelectRing<T> {
    return this.removeAt(this.ring.getFocusedIndex());
  }

  removeSelected(): SelectRing<T> {
    if (this.selected === undefined) return this;
    return this.removeAt(this.selected);
  }

  // Focus navigation

  focusOn(index: number): SelectRing<T> {
    return this.withRing(this.ring.focusOn(index));
  }

  focusOnNext(): SelectRing<T> {
    return this.withRing(this.ring.focusOnNext());
  }

  focusOnPrevious(): SelectRing<T> {
    return this.withRing(this.ring.focusOnPrevious());
  }

  focusOnFirst(): SelectRing<T> {
    return this.withRing(this.ring.focusOnFirst());
  }

  focusOnLast(): SelectRing<T> {
    return this.withRing(this.ring.focusOnLast());
  }

  focusOnFirstMatching(predicate: Predicate<T>): SelectRing<T> {
    return this.withRing(this.ring.focusOnFirstMatching(predicate));
  }

  focusOnLastMatching(predicate: Predicate<T>): SelectRing<T> {
    return this.withRing(this.ring.focusOnLastMatching(predicate));
  }

  focusOnNextMatching(predicate: Predicate<T>): SelectRing<T> {
    return this.withRing(this.ring.focusOnNextMatching(predicate));
  }

  focusOnPreviousMatching(predicate: Predicate<T>): SelectRing<T> {
    return this.withRing(this.ring.focusOnPreviousMatching(predicate));
  }

  // Selecting

  /** Selects the element at `index`, replacing any previous selection. */
  selectAt(index: number): SelectRing<T> {
    if (this.ring.isEmpty()) {
      debug('selectAt ignored: empty ring');
      return this;
    }
    if (!isRingIndex(index)) {
      debug(`selectAt ignored: invalid index ${index}`);
      return this;
    }
    return this.withSelected(normalizeIndex(index, this.ring.size()));
  }

  selectFirst(): SelectRing<T> {
    return this.selectAt(0);
  }

  selectLast(): SelectRing<T> {
    return this.selectAt(this.ring.size() - 1);
  }

  selectFocused(): SelectRing<T> {
    return this.selectAt(this.ring.getFocusedIndex());
  }

  selectFirstMatching(predicate: Predicate<T>): SelectRing<T> {
    const index = firstMatchingIndex(this.ring.toArray(), predicate);
    if (index === undefined) {
      debug('selectFirstMatching: no match');
      return this;
    }
    return this.selectAt(index);
  }

  selectLastMatching(predicate: Predicate<T>): SelectRing<T> {
    const index = lastMatchingIndex(this.ring.toArray(), predicate);
    if (index === undefined) {
      debug('selectLastMatching: no match');
      return this;
    }
    return this.selectAt(index);
  }

  // Deselecting

  clearSelected(): SelectRing<T> {
    return this.withSelected(undefined);
  }

  /** Clears the selection only if it sits on `index`. */
  deselectAt(index: number): SelectRing<T> {
    return this.isSelectedAt(index) ? this.clearSelected() : this;
  }

  deselectFirst(): SelectRing<T> {
    return this.deselectAt(0);
  }

  deselectLast(): SelectRing<T> {
    return this.deselectAt(this.ring.size() - 1);
  }

  deselectFocused(): SelectRing<T> {
    return this.deselectAt(this.ring.getFocusedIndex());
  }

  /** Clears the selection only if the selected element matches. */
  deselectMatching(predicate: Predicate<T>): SelectRing<T> {
    return this.isSelectedMatching(predicate) ? this.clearSelected() : this;
  }

  // Toggling

  toggleAt(index: number): SelectRing<T> {
    return this.isSelectedAt(index) ? this.clearSelected() : this.selectAt(index);
  }

  toggleFirst(): SelectRing<T> {
    return this.toggleAt(0);
  }

  toggleLast(): SelectRing<T> {
    return this.toggleAt(this.ring.size() - 1);
  }

  toggleFocused(): SelectRing<T> {
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

  getSelected(): T | undefined {
    return this.selected === undefined ? undefined : this.ring.get(this.selected);
  }

  getSelectedIndex(): number | undefined {
    return this.selected;
  }

  size(): number {
    return this.ring.size();
  }

  // Replacing

  set(index: number, item: T): SelectRing<T> {
    return this.withRing(this.ring.set(index, item));
  }

  setFocused(item: T): SelectRing<T> {
    return this.withRing(this.ring.setFocused(item));
  }

  /** Replaces the selected element; no-op when nothing is selected. */
  setSelected(item: T): SelectRing<T> {
    if (this.selected === undefined) return this;
    return this.set(this.selected, item);
  }

  // Predicates

  isEmpty(): boolean {
    return this.ring.isEmpty();
  }

  isFocusedAt(index: number): boolean {
    return this.ring.isFocusedAt(index);
  }

  isFocusedMatching(predicate: Predicate<T>): boolean {
    return this.ring.isFocusedMatching(predicate);
  }

  isFocusedSelected(): boolean {
    return this.selected !== undefined && this.selected === this.ring.getFocusedIndex();
  }

  isNoneSelected(): boolean {
    return this.selected === undefined;
  }

  isAnySelected(): boolean {
    return this.selected !== undefined;
  }

  isSelectedAt(index: number): boolean {
    if (this.selected === undefined || this.ring.isEmpty() || !isRingIndex(index)) return false;
    return normalizeIndex(index, this.ring.size()) === this.selected;
  }

  isSelectedMatching(predicate: Predicate<T>): boolean {
    if (this.selected === undefined) return false;
    return this.ring.toArray().some((item, i) => i === this.selected && predicate(item));
  }

  // Conversion

  toArray(): T[] {
    return this.ring.toArray();
  }

  toList(): T[] {
    return this.ring.toList();
  }

  map<U>(fn: (item: T, index: number) => U): SelectRing<U> {
    return new SelectRing(this.ring.map(fn), this.selected);
  }

  mapFocused<U>(fn: (item: T) => U): U | undefined {
    return this.ring.mapFocused(fn);
  }

  /**
   * One output per element. An element that is both focused and selected is
   * rendered with `focused`.
   */
  mapEachIntoArray<U>(
    basic: (item: T, index: number) => U,
    focused: (item: T, index: number) => U,
    selected: (item: T, index: number) => U
  ): U[] {
    return this.ring.mapEachIntoArray(
      (item, i) => (i === this.selected ? selected(item, i) : basic(item, i)),
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
