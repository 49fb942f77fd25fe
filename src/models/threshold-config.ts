/**
 * Reporting threshold configuration
 *
 * @module threshold-config
 */

import { z } from 'zod';
import { DEFAULT_DOMAIN_E, DEFAULT_TARGET_E } from '../constants/hitlist-constants.js';

/**
 * How the domain search-space size (domZ) is decided
 * - ntargets: number of targets reported by the target pass
 * - option: the configured domZ, left as it is
 */
export const ZSetBySchema = z.enum(['ntargets', 'option']);

export type ZSetBy = z.infer<typeof ZSetBySchema>;

const positive = z.number().finite().positive();

/**
 * Reporting thresholds
 *
 * A bit-score threshold (T), when given, replaces the E-value threshold (E)
 * for its level.
 */
export const ThresholdConfigSchema = z
  .object({
    targetE: positive.default(DEFAULT_TARGET_E).describe('Report targets with E-value <= targetE'),
    targetT: z.number().finite().optional().describe('Report targets with score >= targetT'),
    domainE: positive.default(DEFAULT_DOMAIN_E).describe('Report domains with conditional E-value <= domainE'),
    domainT: z.number().finite().optional().describe('Report domains with bit score >= domainT'),
    Z: positive.describe('Search-space size: number of targets searched'),
    domZ: positive.optional().describe('Domain search-space size'),
    domZSetBy: ZSetBySchema.default('ntargets'),
  })
  .refine(config => config.domZSetBy !== 'option' || config.domZ !== undefined, {
    message: 'domZ is required when domZSetBy is "option"',
    path: ['domZ'],
  });

export type ThresholdConfigInput = z.input<typeof ThresholdConfigSchema>;
export type ThresholdConfig = z.output<typeof ThresholdConfigSchema>;
