/**
 * Builds hit lists from JSON hit-list files
 *
 * @module hit-list-loader
 */

import { readFileSync } from 'fs';
import { HitListFileSchema, type HitInput } from '../models/hit-input.js';
import type { Hit } from '../models/hit.js';
import { findBestDomain } from '../models/hit.js';
import { TopHits, type TopHitsOptions } from './top-hits.js';
import { type Result, ok, err, trySync } from '../lib/result-types.js';
import { AllocationError, HitListFormatError } from '../lib/errors/HitListErrors.js';

export type LoadError = HitListFormatError | AllocationError;

/**
 * Copy a validated hit into a record handed out by the list
 */
function fillHit(hit: Hit, input: HitInput): void {
  hit.name = input.name;
  hit.accession = input.accession;
  hit.description = input.description;
  hit.sortKey = input.sortKey;
  hit.score = input.score;
  hit.preScore = input.preScore;
  hit.sumScore = input.sumScore;
  hit.pvalue = input.pvalue;
  hit.prePvalue = input.prePvalue;
  hit.sumPvalue = input.sumPvalue;
  hit.nExpected = input.nExpected;
  hit.nRegions = input.nRegions;
  hit.nClustered = input.nClustered;
  hit.nOverlaps = input.nOverlaps;
  hit.nEnvelopes = input.nEnvelopes;
  hit.domains = input.domains.map(domain => ({
    envFrom: domain.envFrom,
    envTo: domain.envTo,
    bitScore: domain.bitScore,
    pvalue: domain.pvalue,
    domCorrection: domain.domCorrection,
    expectedAccuracy: domain.expectedAccuracy,
    isReported: false,
    alignment: domain.alignment === null ? null : { ...domain.alignment },
  }));
  hit.bestDomain = input.bestDomain ?? findBestDomain(hit.domains);
}

/**
 * Validate parsed JSON and append its hits to a new list
 *
 * @param data - Parsed file contents
 * @param source - File name used in error messages
 */
export function buildHitList(
  data: unknown,
  source: string,
  options: TopHitsOptions = {}
): Result<TopHits, LoadError> {
  const parsed = HitListFileSchema.safeParse(data);
  if (!parsed.success) {
    return err(
      new HitListFormatError(
        source,
        parsed.error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
      )
    );
  }

  const created = TopHits.create(options);
  if (created.isErr()) {
    return err(created.error);
  }

  const list = created.value;
  for (const input of parsed.data.hits) {
    const slot = list.nextHit();
    if (slot.isErr()) {
      list.destroy();
      return err(slot.error);
    }
    fillHit(slot.value, input);
  }

  return ok(list);
}

/**
 * Read one worker's hit-list file
 */
export function loadHitList(file: string, options: TopHitsOptions = {}): Result<TopHits, LoadError> {
  const data = trySync(
    (): unknown => JSON.parse(readFileSync(file, 'utf8')),
    error => new HitListFormatError(file, [error instanceof Error ? error.message : String(error)])
  );
  if (data.isErr()) {
    return err(data.error);
  }

  return buildHitList(data.value, file, options);
}

/**
 * Load several workers' files and fold-merge them into the first list
 *
 * Lists are merged in the order given; each merged list is destroyed.
 */
export function loadAndMerge(files: string[], options: TopHitsOptions = {}): Result<TopHits, LoadError> {
  const created = TopHits.create(options);
  if (created.isErr()) {
    return err(created.error);
  }

  const merged = created.value;
  for (const file of files) {
    const loaded = loadHitList(file, options);
    if (loaded.isErr()) {
      merged.destroy();
      return err(loaded.error);
    }

    const result = merged.merge(loaded.value);
    loaded.value.destroy();
    if (result.isErr()) {
      merged.destroy();
      return err(result.error);
    }
  }

  return ok(merged);
}
