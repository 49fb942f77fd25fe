/**
 * Rank order over a record store
 *
 * @module sorted-view
 */

import { type Result, ok, err } from '../lib/result-types.js';
import { AllocationError, InvariantError } from '../lib/errors/HitListErrors.js';

/**
 * Store indices in rank order
 */
export type RankBuffer = Uint32Array;

/**
 * Sort key lookup by store index
 */
export type KeyOf = (storeIndex: number) => number;

/**
 * Allocate a rank buffer of exactly `capacity` entries
 */
export function allocateRanks(
  operation: string,
  capacity: number,
  maxCapacity: number
): Result<RankBuffer, AllocationError> {
  if (!Number.isSafeInteger(capacity) || capacity < 1 || capacity > maxCapacity) {
    return err(new AllocationError(operation, capacity, maxCapacity));
  }

  try {
    return ok(new Uint32Array(capacity));
  } catch (error) {
    if (error instanceof RangeError) {
      return err(new AllocationError(operation, capacity, maxCapacity, error));
    }
    throw error;
  }
}

/**
 * Descending by key; equal keys compare equal
 */
export function compareByKeyDescending(a: number, b: number): number {
  if (a < b) return 1;
  if (a > b) return -1;
  return 0;
}

/**
 * SortedView holds store indices in rank order
 *
 * The view knows nothing about the list's sorted/unsorted state; its owner
 * decides when the first `count` entries may be read.
 */
export class SortedView {
  private ranks: RankBuffer;

  constructor(ranks: RankBuffer) {
    this.ranks = ranks;
  }

  get capacity(): number {
    return this.ranks.length;
  }

  /**
   * Store index at a rank
   */
  at(rank: number): number {
    if (rank < 0 || rank >= this.ranks.length) {
      throw new InvariantError(`Rank ${rank} outside view capacity ${this.ranks.length}`);
    }
    return this.ranks[rank] ?? 0;
  }

  /**
   * Point the first entry at the store's first slot, so a list of zero or
   * one records reads as sorted without special cases
   */
  resetTrivial(): void {
    if (this.ranks.length > 0) {
      this.ranks[0] = 0;
    }
  }

  /**
   * Re-seed as the identity permutation and sort it by descending key
   *
   * Typed-array sort is stable: records with equal keys stay in store order.
   */
  sort(count: number, keyOf: KeyOf): void {
    const live = this.ranks.subarray(0, count);
    for (let i = 0; i < count; i++) {
      live[i] = i;
    }
    if (count > 1) {
      live.sort((a, b) => compareByKeyDescending(keyOf(a), keyOf(b)));
    }
  }

  /**
   * Switch to a larger buffer, carrying the first `count` ranks over
   */
  rehome(ranks: RankBuffer, count: number): void {
    ranks.set(this.ranks.subarray(0, count));
    this.ranks = ranks;
  }

  /**
   * Replace the buffer outright (after a merge has filled a new one)
   */
  replace(ranks: RankBuffer): void {
    this.ranks = ranks;
  }

  release(): void {
    this.ranks = new Uint32Array(0);
  }

  /**
   * First `count` ranks as a plain array
   */
  toArray(count: number): number[] {
    return Array.from(this.ranks.subarray(0, count));
  }

  /**
   * Two-pointer merge of two sorted views into `target`
   *
   * Walks both views in lock-step and writes the index with the larger key;
   * on equal keys the left view wins. Right-hand indices are shifted by
   * `rightOffset`, the position their records now occupy in the shared
   * store, and `keyOf` reads keys through that shared store. Once one view
   * is exhausted the rest of the other is copied as it stands.
   *
   * @returns Number of ranks written
   */
  static merge(
    target: RankBuffer,
    left: SortedView,
    leftCount: number,
    right: SortedView,
    rightCount: number,
    rightOffset: number,
    keyOf: KeyOf
  ): number {
    if (target.length < leftCount + rightCount) {
      throw new InvariantError(
        `Merge target holds ${target.length} ranks, needs ${leftCount + rightCount}`
      );
    }

    let i = 0;
    let j = 0;
    let k = 0;

    while (i < leftCount && j < rightCount) {
      const fromLeft = left.at(i);
      const fromRight = right.at(j) + rightOffset;
      if (keyOf(fromRight) > keyOf(fromLeft)) {
        target[k++] = fromRight;
        j++;
      } else {
        target[k++] = fromLeft;
        i++;
      }
    }
    while (i < leftCount) {
      target[k++] = left.at(i++);
    }
    while (j < rightCount) {
      target[k++] = right.at(j++) + rightOffset;
    }

    return k;
  }
}
