/**
 * Schemas for hit-list files written by search workers
 *
 * @module hit-input
 */

import { z } from 'zod';

const count = z.number().int().nonnegative();
const coordinate = z.number().int().nonnegative();
const probability = z.number().min(0).max(1);

export const AlignmentDisplaySchema = z.object({
  modelFrom: coordinate.describe('Start in the query model (1-based)'),
  modelTo: coordinate,
  modelLength: coordinate.describe('Model length M'),
  seqFrom: coordinate.describe('Start in the target sequence (1-based)'),
  seqTo: coordinate,
  seqLength: coordinate.describe('Target length L'),
  modelLine: z.string().optional(),
  matchLine: z.string().optional(),
  targetLine: z.string().optional(),
  posteriorLine: z.string().optional(),
});

export const DomainInputSchema = z.object({
  envFrom: coordinate,
  envTo: coordinate,
  bitScore: z.number(),
  pvalue: probability,
  domCorrection: z.number().default(0),
  expectedAccuracy: z.number().nonnegative().default(0),
  alignment: AlignmentDisplaySchema.nullable().default(null),
});

export const HitInputSchema = z
  .object({
    name: z.string().min(1).nullable().default(null),
    accession: z.string().nullable().default(null),
    description: z.string().nullable().default(null),
    sortKey: z.number().describe('Ranking value: bigger is better'),
    score: z.number().default(0),
    preScore: z.number().default(0),
    sumScore: z.number().default(0),
    pvalue: probability.default(0),
    prePvalue: probability.default(0),
    sumPvalue: probability.default(0),
    nExpected: z.number().nonnegative().default(0),
    nRegions: count.default(0),
    nClustered: count.default(0),
    nOverlaps: count.default(0),
    nEnvelopes: count.default(0),
    domains: z.array(DomainInputSchema).default([]),
    bestDomain: z.number().int().min(0).optional().describe('Defaults to the highest-scoring domain'),
  })
  .refine(hit => hit.bestDomain === undefined || hit.bestDomain < hit.domains.length, {
    message: 'bestDomain must index one of the domains',
    path: ['bestDomain'],
  });

export const HitListFileSchema = z.object({
  hits: z.array(HitInputSchema),
});

export type AlignmentDisplayInput = z.infer<typeof AlignmentDisplaySchema>;
export type DomainInput = z.infer<typeof DomainInputSchema>;
export type HitInput = z.infer<typeof HitInputSchema>;
export type HitListFile = z.infer<typeof HitListFileSchema>;
