/**
 * E-value and bit-score reporting thresholds
 *
 * @module reporting-thresholds
 */

import type { ReportingPolicy } from './threshold.js';
import {
  ThresholdConfigSchema,
  type ThresholdConfig,
  type ThresholdConfigInput,
} from '../models/threshold-config.js';
import { type Result, ok, err } from '../lib/result-types.js';
import { ConfigurationError } from '../lib/errors/HitListErrors.js';

/**
 * ReportingThresholds decides reportability the way a search pipeline does
 *
 * Targets: score >= targetT when a bit-score threshold is set, otherwise
 * E-value (pvalue * Z) <= targetE. Domains: bitScore >= domainT, otherwise
 * conditional E-value (pvalue * domZ) <= domainE. With domZSetBy
 * 'ntargets', domZ becomes the number of reported targets once the target
 * pass is done.
 */
export class ReportingThresholds implements ReportingPolicy {
  private readonly config: ThresholdConfig;
  private domainSpace: number;

  private constructor(config: ThresholdConfig) {
    this.config = config;
    this.domainSpace = config.domZ ?? config.Z;
  }

  /**
   * Validate a threshold configuration
   */
  static fromConfig(input: ThresholdConfigInput): Result<ReportingThresholds, ConfigurationError> {
    const parsed = ThresholdConfigSchema.safeParse(input);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const field = issue ? issue.path.join('.') || 'thresholds' : 'thresholds';
      const key = issue?.path[0];
      const value: unknown = key === undefined
        ? input
        : Object.entries(input).find(([name]) => name === String(key))?.[1];
      return err(new ConfigurationError(field, value, issue?.message ?? 'invalid thresholds'));
    }
    return ok(new ReportingThresholds(parsed.data));
  }

  /** Search-space size for target E-values */
  get Z(): number {
    return this.config.Z;
  }

  /** Search-space size for conditional domain E-values */
  get domZ(): number {
    return this.domainSpace;
  }

  get settings(): Readonly<ThresholdConfig> {
    return this.config;
  }

  isTargetReportable(score: number, pvalue: number): boolean {
    if (this.config.targetT !== undefined) {
      return score >= this.config.targetT;
    }
    return pvalue * this.config.Z <= this.config.targetE;
  }

  isDomainReportable(bitScore: number, pvalue: number): boolean {
    if (this.config.domainT !== undefined) {
      return bitScore >= this.config.domainT;
    }
    return pvalue * this.domainSpace <= this.config.domainE;
  }

  onTargetsThresholded(nReported: number): void {
    if (this.config.domZSetBy === 'ntargets') {
      this.domainSpace = nReported;
    }
  }
}
