/**
 * Merge benchmark: many worker lists folded into one
 *
 * @module benchmark
 */

import { TopHits, type TopHitsOptions } from './top-hits.js';
import { type Result, ok, err } from '../lib/result-types.js';
import type { AllocationError } from '../lib/errors/HitListErrors.js';

export interface BenchmarkOptions {
  /** Number of lists to build and merge (M) */
  lists: number;
  /** Hits per list (N) */
  hitsPerList: number;
  /** Seed for the sort-key generator */
  seed: number;
  listOptions?: TopHitsOptions;
}

export interface BenchmarkResult {
  lists: number;
  hitsPerList: number;
  totalHits: number;
  /** Time to fill and sort every list */
  buildMs: number;
  /** Time to fold-merge them into the first */
  mergeMs: number;
  /** Whether the merged ranking is non-increasing */
  ordered: boolean;
}

/**
 * Deterministic uniform generator on [0, 1) (mulberry32)
 */
export function createRandom(seed: number): () => number {
  let state = seed >>> 0;
  return () => {
    state = (state + 0x6d2b79f5) >>> 0;
    let t = state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

/**
 * Whether ranks read in order never increase in sort key
 */
export function isRankedDescending(list: TopHits): boolean {
  const ranked = list.ranked();
  for (let i = 1; i < ranked.length; i++) {
    const previous = ranked[i - 1];
    const current = ranked[i];
    if (previous !== undefined && current !== undefined && current.sortKey > previous.sortKey) {
      return false;
    }
  }
  return true;
}

/**
 * Build `lists` lists of `hitsPerList` random hits, sort each, and merge
 * them all into the first
 */
export function runMergeBenchmark(options: BenchmarkOptions): Result<BenchmarkResult, AllocationError> {
  const random = createRandom(options.seed);
  const keys = Array.from({ length: options.lists * options.hitsPerList }, () => random());
  const lists: TopHits[] = [];
  const release = (): void => lists.forEach(list => list.destroy());

  const buildStart = performance.now();
  for (let j = 0; j < options.lists; j++) {
    const created = TopHits.create(options.listOptions);
    if (created.isErr()) {
      release();
      return err(created.error);
    }
    const list = created.value;
    lists.push(list);

    for (let i = 0; i < options.hitsPerList; i++) {
      const key = keys[j * options.hitsPerList + i] ?? 0;
      const added = list.add({
        name: 'not_unique_name',
        accession: 'not_unique_acc',
        description: 'Benchmark description allocated for every hit',
        sortKey: key,
        score: key,
        pvalue: key,
      });
      if (added.isErr()) {
        release();
        return err(added.error);
      }
    }
    list.sort();
  }
  const buildMs = performance.now() - buildStart;

  const [target, ...rest] = lists;
  if (target === undefined) {
    return ok({ lists: 0, hitsPerList: options.hitsPerList, totalHits: 0, buildMs, mergeMs: 0, ordered: true });
  }

  const mergeStart = performance.now();
  for (const source of rest) {
    const merged = target.merge(source);
    source.destroy();
    if (merged.isErr()) {
      release();
      return err(merged.error);
    }
  }
  const mergeMs = performance.now() - mergeStart;

  const result: BenchmarkResult = {
    lists: options.lists,
    hitsPerList: options.hitsPerList,
    totalHits: target.size,
    buildMs,
    mergeMs,
    ordered: isRankedDescending(target),
  };
  target.destroy();
  return ok(result);
}
