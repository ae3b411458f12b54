/**
 * Double-ended circular buffer for fixed-size collections
 *
 * Provides O(1) operations for adding and removing elements at both ends.
 * Storage is allocated once at construction; a push into a full buffer
 * overwrites the element at the opposite end instead of growing.
 */

import { none, some } from '@lookaround/option';

import type { Option } from '@lookaround/option';

/**
 * Largest length a JavaScript array can have
 */
export const MAX_CAPACITY = 2 ** 32 - 1;

const VACANT: unique symbol = Symbol('vacant');
type Slot<T> = T | typeof VACANT;

/**
 * A fixed-size ring buffer that overwrites from the opposite end when full
 */
export class CircularBuffer<T> implements Iterable<T> {
  private slots: Slot<T>[];
  // physical index of the logical front
  private head = 0;
  private size = 0;
  private readonly capacity: number;

  constructor(capacity: number) {
    if (!Number.isSafeInteger(capacity) || capacity < 0) {
      throw new RangeError('Capacity must be a non-negative integer');
    }
    if (capacity > MAX_CAPACITY) {
      throw new RangeError(`Capacity must not exceed ${MAX_CAPACITY}`);
    }
    this.capacity = capacity;
    this.slots = new Array<Slot<T>>(capacity).fill(VACANT);
  }

  /**
   * Append an element at the back.
   * When full, the front element is overwritten and returned.
   * O(1) operation
   */
  pushBack(item: T): Option<T> {
    if (this.capacity === 0) {
      return some(item);
    }

    if (this.size < this.capacity) {
      this.slots[this.physical(this.size)] = item;
      this.size++;
      return none();
    }

    // full: the slot after the back is the front
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    this.head = (this.head + 1) % this.capacity;
    return evicted === VACANT ? none() : some(evicted);
  }

  /**
   * Prepend an element at the front.
   * When full, the back element is overwritten and returned.
   * O(1) operation
   */
  pushFront(item: T): Option<T> {
    if (this.capacity === 0) {
      return some(item);
    }

    this.head = (this.head - 1 + this.capacity) % this.capacity;

    if (this.size < this.capacity) {
      this.slots[this.head] = item;
      this.size++;
      return none();
    }

    // full: the slot before the front is the back
    const evicted = this.slots[this.head];
    this.slots[this.head] = item;
    return evicted === VACANT ? none() : some(evicted);
  }

  /**
   * Remove and return the front element
   * O(1) operation
   */
  popFront(): Option<T> {
    if (this.size === 0) {
      return none();
    }

    const slot = this.slots[this.head];
    this.slots[this.head] = VACANT;
    this.head = (this.head + 1) % this.capacity;
    this.size--;

    return slot === VACANT ? none() : some(slot);
  }

  /**
   * Remove and return the back element
   * O(1) operation
   */
  popBack(): Option<T> {
    if (this.size === 0) {
      return none();
    }

    const index = this.physical(this.size - 1);
    const slot = this.slots[index];
    this.slots[index] = VACANT;
    this.size--;

    return slot === VACANT ? none() : some(slot);
  }

  /**
   * Get the element at a logical position, counted from the front
   * O(1) operation
   */
  get(index: number): Option<T> {
    if (!Number.isSafeInteger(index) || index < 0 || index >= this.size) {
      return none();
    }

    const slot = this.slots[this.physical(index)];
    return slot === VACANT ? none() : some(slot);
  }

  /**
   * Get the front element without removing it
   */
  peekFirst(): Option<T> {
    return this.get(0);
  }

  /**
   * Get the back element without removing it
   */
  peekLast(): Option<T> {
    return this.get(this.size - 1);
  }

  /**
   * Get all elements as an array, front to back
   * O(n) operation
   */
  toArray(): T[] {
    return [...this];
  }

  *[Symbol.iterator](): Iterator<T> {
    for (let i = 0; i < this.size; i++) {
      const slot = this.slots[this.physical(i)];
      if (slot !== VACANT) {
        yield slot;
      }
    }
  }

  /**
   * Get the current number of elements
   */
  get length(): number {
    return this.size;
  }

  /**
   * Check if the buffer is empty
   */
  isEmpty(): boolean {
    return this.size === 0;
  }

  /**
   * Check if the buffer is full. A zero-capacity buffer is always full.
   */
  isFull(): boolean {
    return this.size === this.capacity;
  }

  /**
   * Clear all elements
   */
  clear(): void {
    this.slots.fill(VACANT);
    this.head = 0;
    this.size = 0;
  }

  /**
   * Get the maximum capacity
   */
  getCapacity(): number {
    return this.capacity;
  }

  private physical(index: number): number {
    return (this.head + index) % this.capacity;
  }
}
