/**
 * Append-only slot array owning every record of one hit list
 *
 * @module record-store
 */

import type { Hit } from '../models/hit.js';
import { releaseHit } from '../models/hit.js';
import { type Result, ok, err } from '../lib/result-types.js';
import { AllocationError, InvariantError } from '../lib/errors/HitListErrors.js';

/**
 * Backing storage for records; slots at and past the logical size are empty
 */
export type RecordSlots = Array<Hit | undefined>;

/**
 * Allocate a slot array of exactly `capacity` entries
 *
 * @param operation - Operation name reported on failure
 * @param capacity - Number of slots
 * @param maxCapacity - Largest capacity the owning list accepts
 */
export function allocateSlots(
  operation: string,
  capacity: number,
  maxCapacity: number
): Result<RecordSlots, AllocationError> {
  if (!Number.isSafeInteger(capacity) || capacity < 1 || capacity > maxCapacity) {
    return err(new AllocationError(operation, capacity, maxCapacity));
  }

  try {
    const slots: RecordSlots = new Array<Hit | undefined>(capacity);
    return ok(slots);
  } catch (error) {
    if (error instanceof RangeError) {
      return err(new AllocationError(operation, capacity, maxCapacity, error));
    }
    throw error;
  }
}

/**
 * RecordStore keeps records in append order
 *
 * Records never move relative to the store's own indexing: index `i` names
 * the same record before and after growth, so rank buffers holding indices
 * stay valid when the backing array is replaced.
 */
export class RecordStore {
  private slots: RecordSlots;
  private count = 0;

  constructor(slots: RecordSlots) {
    this.slots = slots;
  }

  get size(): number {
    return this.count;
  }

  get capacity(): number {
    return this.slots.length;
  }

  isFull(): boolean {
    return this.count >= this.slots.length;
  }

  /**
   * Record at a store index
   *
   * @throws InvariantError when the index is outside [0, size)
   */
  get(index: number): Hit {
    const hit = index >= 0 && index < this.count ? this.slots[index] : undefined;
    if (hit === undefined) {
      throw new InvariantError(`Store index ${index} outside [0, ${this.count})`);
    }
    return hit;
  }

  /**
   * Place a record in the next slot and return its index
   *
   * Callers reserve capacity first; appending to a full store is a bug.
   */
  append(hit: Hit): number {
    if (this.isFull()) {
      throw new InvariantError(`Append to a full record store (capacity ${this.slots.length})`);
    }
    const index = this.count;
    this.slots[index] = hit;
    this.count++;
    return index;
  }

  /**
   * Switch to a larger slot array, carrying every record over at its index
   */
  rehome(slots: RecordSlots): void {
    if (slots.length < this.count) {
      throw new InvariantError(`Cannot rehome ${this.count} records into ${slots.length} slots`);
    }
    for (let i = 0; i < this.count; i++) {
      slots[i] = this.slots[i];
    }
    this.slots = slots;
  }

  /**
   * Move every record of `other` after this store's records
   *
   * Ownership moves with the records: `other` is left empty and must not
   * release them.
   *
   * @returns Store index of the first moved record
   */
  adopt(other: RecordStore): number {
    const base = this.count;
    if (this.slots.length - base < other.count) {
      throw new InvariantError(
        `Cannot adopt ${other.count} records with ${this.slots.length - base} free slots`
      );
    }
    for (let i = 0; i < other.count; i++) {
      this.slots[base + i] = other.slots[i];
      other.slots[i] = undefined;
    }
    this.count += other.count;
    other.count = 0;
    return base;
  }

  /**
   * Release every record and empty the store, keeping its capacity
   */
  clear(): void {
    for (let i = 0; i < this.count; i++) {
      const hit = this.slots[i];
      if (hit !== undefined) {
        releaseHit(hit);
      }
      this.slots[i] = undefined;
    }
    this.count = 0;
  }

  /**
   * Release every record and the backing array
   */
  release(): void {
    this.clear();
    this.slots = [];
  }

  *[Symbol.iterator](): IterableIterator<Hit> {
    for (let i = 0; i < this.count; i++) {
      yield this.get(i);
    }
  }
}
