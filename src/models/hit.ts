/**
 * Hit records: one scored match of a target against the query
 *
 * @module hit
 */

import { NO_BEST_DOMAIN } from '../constants/hitlist-constants.js';

/**
 * Printable alignment of one domain
 *
 * Produced upstream and owned by its domain; the hit list only carries it
 * and drops it with the record. Coordinates are 1-based and inclusive.
 */
export interface AlignmentDisplay {
  /** Start and end in the query model, and the model length (M) */
  modelFrom: number;
  modelTo: number;
  modelLength: number;

  /** Start and end in the target sequence, and its length (L) */
  seqFrom: number;
  seqTo: number;
  seqLength: number;

  /** Display lines, all of the same width when present */
  modelLine?: string;
  matchLine?: string;
  targetLine?: string;
  posteriorLine?: string;
}

/**
 * One independently scored sub-alignment region of a hit
 */
export interface Domain {
  /** Envelope coordinates on the target (1-based, inclusive) */
  envFrom: number;
  envTo: number;

  bitScore: number;
  pvalue: number;

  /** Null2 score correction, reported as the domain's bias */
  domCorrection: number;

  /** Sum of posterior probabilities over the aligned residues */
  expectedAccuracy: number;

  isReported: boolean;

  alignment: AlignmentDisplay | null;
}

/**
 * One unit of search output
 *
 * `bestDomain` is either -1 (no domains) or a valid index into `domains`.
 */
export interface Hit {
  name: string | null;
  accession: string | null;
  description: string | null;

  /** Value to rank by: bigger is better */
  sortKey: number;

  /** Final score, score before bias correction, summed multi-domain score */
  score: number;
  preScore: number;
  sumScore: number;

  pvalue: number;
  prePvalue: number;
  sumPvalue: number;

  /** Expected number of domains, and the region/cluster counters from upstream */
  nExpected: number;
  nRegions: number;
  nClustered: number;
  nOverlaps: number;
  nEnvelopes: number;

  domains: Domain[];

  /** Number of domains flagged reportable */
  nReported: number;
  bestDomain: number;
  isReported: boolean;
}

/**
 * Caller-supplied fields for copy-and-append
 */
export type HitFields = Pick<Hit, 'name' | 'sortKey'> &
  Partial<
    Pick<
      Hit,
      | 'accession'
      | 'description'
      | 'score'
      | 'preScore'
      | 'sumScore'
      | 'pvalue'
      | 'prePvalue'
      | 'sumPvalue'
      | 'nExpected'
      | 'nRegions'
      | 'nClustered'
      | 'nOverlaps'
      | 'nEnvelopes'
    >
  >;

/**
 * A record with every field at its default
 */
export function createEmptyHit(): Hit {
  return {
    name: null,
    accession: null,
    description: null,
    sortKey: 0,
    score: 0,
    preScore: 0,
    sumScore: 0,
    pvalue: 0,
    prePvalue: 0,
    sumPvalue: 0,
    nExpected: 0,
    nRegions: 0,
    nClustered: 0,
    nOverlaps: 0,
    nEnvelopes: 0,
    domains: [],
    nReported: 0,
    bestDomain: NO_BEST_DOMAIN,
    isReported: false,
  };
}

/**
 * A domain with every field at its default
 */
export function createEmptyDomain(): Domain {
  return {
    envFrom: 0,
    envTo: 0,
    bitScore: 0,
    pvalue: 0,
    domCorrection: 0,
    expectedAccuracy: 0,
    isReported: false,
    alignment: null,
  };
}

/**
 * Drop everything a record owns: its texts, domains and their alignments
 */
export function releaseHit(hit: Hit): void {
  hit.name = null;
  hit.accession = null;
  hit.description = null;
  for (const domain of hit.domains) {
    domain.alignment = null;
  }
  hit.domains = [];
  hit.bestDomain = NO_BEST_DOMAIN;
}

/**
 * Index of the highest-scoring domain, or -1 when there are none
 */
export function findBestDomain(domains: readonly Domain[]): number {
  let best = NO_BEST_DOMAIN;
  for (let d = 0; d < domains.length; d++) {
    const domain = domains[d];
    if (domain === undefined) continue;
    const current = best === NO_BEST_DOMAIN ? undefined : domains[best];
    if (current === undefined || domain.bitScore > current.bitScore) {
      best = d;
    }
  }
  return best;
}

/**
 * Name length in characters, counting astral code points once
 */
export function nameLength(hit: Hit): number {
  return hit.name === null ? 0 : Array.from(hit.name).length;
}
