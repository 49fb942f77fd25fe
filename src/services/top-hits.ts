/**
 * Ranked hit list: record store plus sorted view
 *
 * @module top-hits
 */

import type { Hit, HitFields } from '../models/hit.js';
import { createEmptyHit, nameLength } from '../models/hit.js';
import { RecordStore, allocateSlots, type RecordSlots } from './record-store.js';
import { SortedView, allocateRanks, type RankBuffer } from './sorted-view.js';
import {
  flagReportableDomains,
  flagReportableTargets,
  type ReportingPolicy,
  type ThresholdSummary,
} from './threshold.js';
import { type Result, ok, err } from '../lib/result-types.js';
import { AllocationError, ListStateError } from '../lib/errors/HitListErrors.js';
import { Logger, logger as defaultLogger } from '../lib/logger.js';
import {
  DEFAULT_HIT_CAPACITY,
  DEFAULT_MAX_HIT_CAPACITY,
  GROWTH_FACTOR,
} from '../constants/hitlist-constants.js';

/**
 * Lifecycle of a hit list
 *
 * - sorted: the view orders every record by descending sort key
 * - unsorted: records were appended since the last sort; the view is stale
 * - drained: the list was merged into another; only destroy() is allowed
 * - destroyed: every record and buffer has been released
 */
export type HitListState = 'sorted' | 'unsorted' | 'drained' | 'destroyed';

export interface TopHitsOptions {
  /** Initial slot capacity; never below the default of 256 */
  initialCapacity?: number;
  /** Largest capacity growth or merge may reach */
  maxCapacity?: number;
  logger?: Logger;
}

/**
 * TopHits accumulates hits from a producer and ranks them
 *
 * Records live in an append-only {@link RecordStore}; a {@link SortedView}
 * of store indices gives their rank order. Because the view holds indices,
 * growing the store never invalidates it, and a merge only shifts the
 * source's indices by the destination's size.
 *
 * @example
 * ```ts
 * const hits = TopHits.create()._unsafeUnwrap();
 * hits.add({ name: 'globin', sortKey: 42.1 });
 * hits.sort();
 * hits.at(0).name; // 'globin'
 * ```
 */
export class TopHits {
  private store: RecordStore;
  private view: SortedView;
  private status: HitListState = 'sorted';
  private reportedCount = 0;
  private readonly maxCapacity: number;
  private readonly logger: Logger;

  private constructor(store: RecordStore, view: SortedView, maxCapacity: number, logger: Logger) {
    this.store = store;
    this.view = view;
    this.maxCapacity = maxCapacity;
    this.logger = logger;
    this.view.resetTrivial();
  }

  /**
   * Create an empty, trivially sorted list
   */
  static create(options: TopHitsOptions = {}): Result<TopHits, AllocationError> {
    const capacity = Math.max(DEFAULT_HIT_CAPACITY, options.initialCapacity ?? DEFAULT_HIT_CAPACITY);
    const maxCapacity = options.maxCapacity ?? DEFAULT_MAX_HIT_CAPACITY;

    const slots = allocateSlots('create', capacity, maxCapacity);
    if (slots.isErr()) {
      return err(slots.error);
    }
    const ranks = allocateRanks('create', capacity, maxCapacity);
    if (ranks.isErr()) {
      return err(ranks.error);
    }

    return ok(
      new TopHits(
        new RecordStore(slots.value),
        new SortedView(ranks.value),
        maxCapacity,
        options.logger ?? defaultLogger
      )
    );
  }

  get state(): HitListState {
    return this.status;
  }

  get isSorted(): boolean {
    return this.status === 'sorted';
  }

  /** Number of records (N) */
  get size(): number {
    this.assertUsable('read');
    return this.store.size;
  }

  get capacity(): number {
    this.assertUsable('read');
    return this.store.capacity;
  }

  /** Records flagged reportable by the last threshold pass */
  get nReported(): number {
    this.assertUsable('read');
    return this.reportedCount;
  }

  /**
   * Make room for one more record, doubling capacity when full
   *
   * Both the new store and the new view are allocated before either is
   * installed; on failure the list is untouched.
   */
  grow(): Result<void, AllocationError> {
    this.assertUsable('grow');
    if (!this.store.isFull()) {
      return ok(undefined);
    }

    const capacity = this.store.capacity * GROWTH_FACTOR;
    const prepared = this.allocateBuffers('grow', capacity);
    if (prepared.isErr()) {
      return err(prepared.error);
    }

    const [slots, ranks] = prepared.value;
    this.store.rehome(slots);
    this.view.rehome(ranks, this.store.size);
    this.logger.logListEvent('grow', this.store.size, capacity);
    return ok(undefined);
  }

  /**
   * Append a default-initialised record for the caller to fill in place
   */
  nextHit(): Result<Hit, AllocationError> {
    this.assertUsable('append to');
    const grown = this.grow();
    if (grown.isErr()) {
      return err(grown.error);
    }

    const hit = createEmptyHit();
    this.store.append(hit);
    if (this.store.size >= 2) {
      this.status = 'unsorted';
    }
    return ok(hit);
  }

  /**
   * Append a record built from caller-supplied fields
   *
   * Strings are immutable, so the record's texts are independent of the
   * caller's object. Domains start empty.
   */
  add(fields: HitFields): Result<Hit, AllocationError> {
    return this.nextHit().map(hit => {
      hit.name = fields.name;
      hit.accession = fields.accession ?? null;
      hit.description = fields.description ?? null;
      hit.sortKey = fields.sortKey;
      hit.score = fields.score ?? 0;
      hit.preScore = fields.preScore ?? 0;
      hit.sumScore = fields.sumScore ?? 0;
      hit.pvalue = fields.pvalue ?? 0;
      hit.prePvalue = fields.prePvalue ?? 0;
      hit.sumPvalue = fields.sumPvalue ?? 0;
      hit.nExpected = fields.nExpected ?? 0;
      hit.nRegions = fields.nRegions ?? 0;
      hit.nClustered = fields.nClustered ?? 0;
      hit.nOverlaps = fields.nOverlaps ?? 0;
      hit.nEnvelopes = fields.nEnvelopes ?? 0;
      return hit;
    });
  }

  /**
   * Rank records by descending sort key; a no-op when already sorted
   */
  sort(): void {
    this.assertUsable('sort');
    if (this.status === 'sorted') {
      return;
    }

    this.view.sort(this.store.size, index => this.store.get(index).sortKey);
    this.status = 'sorted';
  }

  /**
   * Merge `source` into this list
   *
   * Both lists are sorted first. The combined store and view are allocated
   * before anything moves, so on failure both lists remain valid. On
   * success the source's records belong to this list and the source is
   * drained: it may only be destroyed.
   */
  merge(source: TopHits): Result<void, AllocationError> {
    this.assertUsable('merge into');
    source.assertUsable('merge from');
    if (source === this) {
      throw new ListStateError('merge', this.status, 'a list cannot be merged into itself');
    }

    this.sort();
    source.sort();

    const capacity = this.store.capacity + source.store.capacity;
    const prepared = this.allocateBuffers('merge', capacity);
    if (prepared.isErr()) {
      return err(prepared.error);
    }

    const [slots, ranks] = prepared.value;
    const destCount = this.store.size;
    const sourceCount = source.store.size;

    this.store.rehome(slots);
    const base = this.store.adopt(source.store);

    SortedView.merge(
      ranks,
      this.view,
      destCount,
      source.view,
      sourceCount,
      base,
      index => this.store.get(index).sortKey
    );
    this.view.replace(ranks);

    source.drain();
    this.logger.logListEvent('merge', this.store.size, capacity, { merged: sourceCount });
    return ok(undefined);
  }

  /**
   * Flag reportable hits and domains
   *
   * Pass 1 evaluates the target predicate on every hit; the policy is then
   * told how many were reported; pass 2 flags the domains of reported hits.
   */
  threshold(policy: ReportingPolicy): ThresholdSummary {
    this.assertUsable('threshold');

    this.reportedCount = flagReportableTargets(this.store, policy);
    policy.onTargetsThresholded?.(this.reportedCount);
    const domains = flagReportableDomains(this.store, policy);

    return { targets: this.reportedCount, domains };
  }

  /**
   * Longest record name in characters; 0 when no record has a name
   */
  maxNameLength(): number {
    this.assertUsable('read');
    let max = 0;
    for (const hit of this.store) {
      max = Math.max(max, nameLength(hit));
    }
    return max;
  }

  /**
   * Record at a store (append-order) index
   */
  hit(index: number): Hit {
    this.assertUsable('read');
    return this.store.get(index);
  }

  /**
   * Record at a rank; rank 0 has the largest sort key
   */
  at(rank: number): Hit {
    this.assertRanked();
    if (rank < 0 || rank >= this.store.size) {
      throw new RangeError(`Rank ${rank} outside [0, ${this.store.size})`);
    }
    return this.store.get(this.view.at(rank));
  }

  /**
   * Records in rank order
   */
  ranked(): Hit[] {
    this.assertRanked();
    return this.view.toArray(this.store.size).map(index => this.store.get(index));
  }

  /**
   * Store indices in rank order
   */
  rankIndices(): number[] {
    this.assertRanked();
    return this.view.toArray(this.store.size);
  }

  /**
   * Records in append order
   */
  records(): Hit[] {
    this.assertUsable('read');
    return Array.from(this.store);
  }

  /**
   * Empty the list for another run, keeping its capacity
   */
  reuse(): void {
    this.assertUsable('reuse');
    this.store.clear();
    this.view.resetTrivial();
    this.status = 'sorted';
    this.reportedCount = 0;
    this.logger.logListEvent('reuse', 0, this.store.capacity);
  }

  /**
   * Release every record and both buffers; safe in any state
   */
  destroy(): void {
    if (this.status === 'destroyed') {
      return;
    }
    this.logger.logListEvent('destroy', this.store.size, this.store.capacity, { state: this.status });
    this.store.release();
    this.view.release();
    this.status = 'destroyed';
    this.reportedCount = 0;
  }

  private drain(): void {
    this.store.release();
    this.view.release();
    this.status = 'drained';
    this.reportedCount = 0;
  }

  private allocateBuffers(
    operation: string,
    capacity: number
  ): Result<[RecordSlots, RankBuffer], AllocationError> {
    const buffers = allocateSlots(operation, capacity, this.maxCapacity).andThen(slots =>
      allocateRanks(operation, capacity, this.maxCapacity).map(
        (ranks): [RecordSlots, RankBuffer] => [slots, ranks]
      )
    );

    if (buffers.isErr()) {
      this.logger.logListEvent('allocation_failed', this.store.size, this.store.capacity, {
        operation,
        requested: capacity,
        maxCapacity: this.maxCapacity,
      });
    }
    return buffers;
  }

  private assertUsable(operation: string): void {
    if (this.status === 'drained' || this.status === 'destroyed') {
      throw new ListStateError(operation, this.status);
    }
  }

  private assertRanked(): void {
    this.assertUsable('read ranks of');
    if (this.status !== 'sorted') {
      throw new ListStateError('read ranks of', this.status, 'call sort() first');
    }
  }
}

/**
 * Destroy a list if there is one
 */
export function destroyTopHits(list: TopHits | null | undefined): void {
  if (list) {
    list.destroy();
  }
}
