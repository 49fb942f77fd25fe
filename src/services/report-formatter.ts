/**
 * Text and JSON renderings of a sorted, thresholded hit list
 *
 * @module report-formatter
 */

import type { Domain, Hit } from '../models/hit.js';
import type { TopHits } from './top-hits.js';
import {
  DEFAULT_NULL2_OMEGA,
  DOMAIN_HEADER_FIXED_WIDTH,
  MIN_DESC_WIDTH,
  MIN_NAME_WIDTH,
  NO_HITS_MESSAGE,
  TARGET_ROW_FIXED_WIDTH,
} from '../constants/hitlist-constants.js';

/**
 * Search-space sizes used to turn P-values into E-values
 */
export interface SearchSpace {
  /** Targets searched */
  Z: number;
  /** Targets the domains were found among */
  domZ: number;
}

export interface ReportOptions {
  /** Line width to fit descriptions into; 0 or absent means no limit */
  textWidth?: number;
  /** Whether targets are sequences (query was a model) or models */
  mode?: 'sequences' | 'models';
  /** Prior of the biased-composition null model */
  omega?: number;
}

/**
 * C-style `%.<precision>g`: shortest of fixed and exponent notation,
 * trailing zeros dropped, exponent with at least two digits
 */
export function formatGeneral(value: number, precision = 2): string {
  if (!Number.isFinite(value)) {
    return Number.isNaN(value) ? 'nan' : value > 0 ? 'inf' : '-inf';
  }
  if (value === 0) {
    return '0';
  }

  const [mantissa = '0', exponentText = '0'] = value.toExponential(precision - 1).split('e');
  const exponent = parseInt(exponentText, 10);

  if (exponent < -4 || exponent >= precision) {
    const sign = exponent < 0 ? '-' : '+';
    const digits = String(Math.abs(exponent)).padStart(2, '0');
    return `${stripZeros(mantissa)}e${sign}${digits}`;
  }

  return stripZeros(value.toFixed(Math.max(0, precision - 1 - exponent)));
}

function stripZeros(text: string): string {
  return text.includes('.') ? text.replace(/\.?0+$/, '') : text;
}

/**
 * Bias of a domain: log(1 + omega * exp(domCorrection))
 */
export function domainBias(domain: Domain, omega: number = DEFAULT_NULL2_OMEGA): number {
  const x = Math.log(omega) + domain.domCorrection;
  // log-sum of 0 and x without overflow for large x
  return x > 0 ? x + Math.log1p(Math.exp(-x)) : Math.log1p(Math.exp(x));
}

const right = (text: string | number, width: number): string => String(text).padStart(width);
const left = (text: string, width: number): string => text.padEnd(width);
const truncate = (text: string | null, width: number): string => {
  const value = text ?? '';
  return Number.isFinite(width) ? Array.from(value).slice(0, width).join('') : value;
};

/**
 * Targets table: one row per reported hit, in rank order
 */
export function formatTargets(list: TopHits, space: SearchSpace, options: ReportOptions = {}): string[] {
  const mode = options.mode ?? 'sequences';
  const omega = options.omega ?? DEFAULT_NULL2_OMEGA;
  const textWidth = options.textWidth ?? 0;
  const namew = Math.max(MIN_NAME_WIDTH, list.maxNameLength());
  const descw = textWidth > 0
    ? Math.max(MIN_DESC_WIDTH, textWidth - namew - TARGET_ROW_FIXED_WIDTH)
    : Number.POSITIVE_INFINITY;

  const lines: string[] = [
    `Scores for complete sequence${mode === 'sequences' ? 's' : ''} (score includes all domains):`,
    `${right(' --- full sequence ---', 22)}  ${right(' --- best 1 domain ---', 22)}  ${right('-#dom-', 8)}`,
    [
      right('E-value', 9), right(' score', 6), right(' bias', 5), '',
      right('E-value', 9), right(' score', 6), right(' bias', 5), '',
      right('  exp', 5), right('N', 2), '',
      left(mode === 'sequences' ? 'Sequence' : 'Model', namew), 'Description',
    ].join(' '),
    [
      right('-------', 9), right('------', 6), right('-----', 5), '',
      right('-------', 9), right('------', 6), right('-----', 5), '',
      right(' ----', 5), right('--', 2), '',
      left('--------', namew), '-----------',
    ].join(' '),
  ];

  for (const hit of list.ranked()) {
    if (!hit.isReported) continue;

    const best = hit.domains[hit.bestDomain];
    lines.push(
      [
        right(formatGeneral(hit.pvalue * space.Z), 9),
        right(hit.score.toFixed(1), 6),
        right((hit.preScore - hit.score).toFixed(1), 5),
        '',
        right(best ? formatGeneral(best.pvalue * space.Z) : '-', 9),
        right(best ? best.bitScore.toFixed(1) : '-', 6),
        right(best ? domainBias(best, omega).toFixed(1) : '-', 5),
        '',
        right(hit.nExpected.toFixed(1), 5),
        right(hit.nReported, 2),
        '',
        left(hit.name ?? '', namew),
        truncate(hit.description, descw),
      ].join(' ').trimEnd()
    );
  }

  if (list.nReported === 0) {
    lines.push('', NO_HITS_MESSAGE);
  }
  return lines;
}

const DOMAIN_COLUMNS = [
  ['#', '---', 4],
  ['bit score', '---------', 9],
  ['bias', '-------', 7],
  ['E-value', '----------', 10],
  ['ind Evalue', '----------', 10],
  ['hmm from', '--------', 8],
  ['hmm to', '--------', 8],
  ['  ', '  ', 2],
  ['ali from', '--------', 8],
  ['ali to', '--------', 8],
  ['  ', '  ', 2],
  ['env from', '--------', 8],
  ['env to', '--------', 8],
  ['  ', '  ', 2],
  ['ali-acc', '-------', 7],
] as const;

function boundMarks(from: number, to: number, length: number): string {
  return `${from === 1 ? '[' : '.'}${to === length ? ']' : '.'}`;
}

function domainRow(index: number, domain: Domain, space: SearchSpace, omega: number): string {
  const ali = domain.alignment;
  const accuracy = domain.expectedAccuracy / (1 + Math.abs(domain.envTo - domain.envFrom));

  const cells: string[] = [
    right(index, 4),
    right(domain.bitScore.toFixed(1), 9),
    right(domainBias(domain, omega).toFixed(1), 7),
    right(formatGeneral(domain.pvalue * space.domZ), 10),
    right(formatGeneral(domain.pvalue * space.Z), 10),
    right(ali ? ali.modelFrom : '-', 8),
    right(ali ? ali.modelTo : '-', 8),
    ali ? boundMarks(ali.modelFrom, ali.modelTo, ali.modelLength) : '  ',
    right(ali ? ali.seqFrom : '-', 8),
    right(ali ? ali.seqTo : '-', 8),
    ali ? boundMarks(ali.seqFrom, ali.seqTo, ali.seqLength) : '  ',
    right(domain.envFrom, 8),
    right(domain.envTo, 8),
    ali ? boundMarks(domain.envFrom, domain.envTo, ali.seqLength) : '  ',
    right(accuracy.toFixed(2), 7),
  ];
  return `  ${cells.join(' ')}`;
}

/**
 * Per-target domain tables, followed by each reported domain's alignment
 */
export function formatDomains(list: TopHits, space: SearchSpace, options: ReportOptions = {}): string[] {
  const mode = options.mode ?? 'sequences';
  const omega = options.omega ?? DEFAULT_NULL2_OMEGA;
  const textWidth = options.textWidth ?? 0;

  const lines: string[] = [
    `Domain and alignment annotation for each ${mode === 'sequences' ? 'sequence' : 'model'}:`,
  ];

  for (const hit of list.ranked()) {
    if (!hit.isReported) continue;

    const name = hit.name ?? '';
    const descw = textWidth > 0
      ? Math.max(MIN_DESC_WIDTH, textWidth - Array.from(name).length - DOMAIN_HEADER_FIXED_WIDTH)
      : Number.POSITIVE_INFINITY;

    lines.push(`>> ${name}  ${truncate(hit.description, descw)}`.trimEnd());
    lines.push(`  ${DOMAIN_COLUMNS.map(([title, , width]) => right(title, width)).join(' ')}`);
    lines.push(`  ${DOMAIN_COLUMNS.map(([, rule, width]) => right(rule, width)).join(' ')}`);

    const reported = reportedDomains(hit);
    reported.forEach((domain, i) => lines.push(domainRow(i + 1, domain, space, omega)));

    lines.push('', '  Alignments for each domain:');
    reported.forEach((domain, i) => {
      lines.push(
        `  == domain ${i + 1}    score: ${domain.bitScore.toFixed(1)} bits;  ` +
          `conditional E-value: ${formatGeneral(domain.pvalue * space.domZ)}`
      );
      const ali = domain.alignment;
      if (ali) {
        for (const line of [ali.modelLine, ali.matchLine, ali.targetLine, ali.posteriorLine]) {
          if (line !== undefined) lines.push(`    ${line}`);
        }
      }
      lines.push('');
    });
  }

  if (list.nReported === 0) {
    lines.push('', NO_HITS_MESSAGE);
  }
  return lines;
}

function reportedDomains(hit: Hit): Domain[] {
  return hit.domains.filter(domain => domain.isReported);
}

/**
 * Plain-object view of the reported hits, for JSON output
 */
export interface ReportedHitSummary {
  rank: number;
  name: string | null;
  accession: string | null;
  description: string | null;
  sortKey: number;
  score: number;
  evalue: number;
  nReportedDomains: number;
  domains: Array<{
    bitScore: number;
    conditionalEvalue: number;
    independentEvalue: number;
    envFrom: number;
    envTo: number;
  }>;
}

export function summarizeReported(list: TopHits, space: SearchSpace): ReportedHitSummary[] {
  const summaries: ReportedHitSummary[] = [];

  list.ranked().forEach((hit, rank) => {
    if (!hit.isReported) return;
    summaries.push({
      rank: rank + 1,
      name: hit.name,
      accession: hit.accession,
      description: hit.description,
      sortKey: hit.sortKey,
      score: hit.score,
      evalue: hit.pvalue * space.Z,
      nReportedDomains: hit.nReported,
      domains: reportedDomains(hit).map(domain => ({
        bitScore: domain.bitScore,
        conditionalEvalue: domain.pvalue * space.domZ,
        independentEvalue: domain.pvalue * space.Z,
        envFrom: domain.envFrom,
        envTo: domain.envTo,
      })),
    });
  });

  return summaries;
}
