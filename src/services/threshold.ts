/**
 * Two-pass reportability flagging of hits and their domains
 *
 * @module threshold
 */

import type { Hit } from '../models/hit.js';
import { InvariantError } from '../lib/errors/HitListErrors.js';

/**
 * Reportability predicates supplied by the pipeline
 *
 * The domain predicate usually depends on a search-space size derived from
 * the number of reported targets; `onTargetsThresholded` is the point at
 * which the policy gets to refresh it.
 */
export interface ReportingPolicy {
  isTargetReportable(score: number, pvalue: number): boolean;
  isDomainReportable(bitScore: number, pvalue: number): boolean;
  onTargetsThresholded?(nReported: number): void;
}

/**
 * Counts produced by one threshold pass
 */
export interface ThresholdSummary {
  /** Hits flagged reportable */
  targets: number;
  /** Domains flagged reportable across all reported hits */
  domains: number;
}

/**
 * First pass: flag every hit the target predicate accepts
 *
 * Previous flags and per-hit domain counts are cleared, so a second run
 * with the same policy yields the same flags.
 *
 * @returns Number of hits flagged reportable
 */
export function flagReportableTargets(hits: Iterable<Hit>, policy: ReportingPolicy): number {
  let nReported = 0;

  for (const hit of hits) {
    hit.nReported = 0;
    for (const domain of hit.domains) {
      domain.isReported = false;
    }

    hit.isReported = policy.isTargetReportable(hit.score, hit.pvalue);
    if (hit.isReported) {
      nReported++;
    }
  }

  return nReported;
}

/**
 * Second pass: flag domains of reported hits
 *
 * A reported hit always reports its best domain, whatever its score.
 *
 * @returns Number of domains flagged reportable
 * @throws InvariantError when a reported hit with domains has no valid best domain
 */
export function flagReportableDomains(hits: Iterable<Hit>, policy: ReportingPolicy): number {
  let total = 0;

  for (const hit of hits) {
    if (!hit.isReported || hit.domains.length === 0) continue;

    if (!Number.isInteger(hit.bestDomain) || hit.bestDomain < 0 || hit.bestDomain >= hit.domains.length) {
      throw new InvariantError(
        `Hit '${hit.name ?? '(unnamed)'}' has best domain ${hit.bestDomain} of ${hit.domains.length}`
      );
    }

    hit.domains.forEach((domain, d) => {
      if (d === hit.bestDomain || policy.isDomainReportable(domain.bitScore, domain.pvalue)) {
        domain.isReported = true;
        hit.nReported++;
        total++;
      }
    });
  }

  return total;
}
