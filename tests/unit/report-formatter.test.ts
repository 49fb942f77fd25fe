/**
 * Unit tests for report rendering
 */

import { describe, it, expect } from 'vitest';
import {
  domainBias,
  formatDomains,
  formatGeneral,
  formatTargets,
  summarizeReported,
  type SearchSpace,
} from '../../src/services/report-formatter.js';
import { ReportingThresholds } from '../../src/services/reporting-thresholds.js';
import type { TopHits } from '../../src/services/top-hits.js';
import { NO_HITS_MESSAGE } from '../../src/constants/hitlist-constants.js';
import { attachDomains, createTestList, makeDomain } from '../helpers/hit-list-test-helper.js';

/**
 * Two hits, one above the bit-score thresholds, thresholded and sorted
 */
function createReportFixture(): { list: TopHits; space: SearchSpace } {
  const list = createTestList();
  attachDomains(
    list.add({
      name: 'alpha',
      description: 'test protein',
      sortKey: 50,
      score: 50,
      preScore: 52.5,
      pvalue: 1.5e-6,
      nExpected: 1.2,
    })._unsafeUnwrap(),
    [
      makeDomain({
        envFrom: 1,
        envTo: 95,
        bitScore: 49.5,
        pvalue: 2e-7,
        expectedAccuracy: 85.5,
        alignment: {
          modelFrom: 1,
          modelTo: 100,
          modelLength: 100,
          seqFrom: 3,
          seqTo: 90,
          seqLength: 120,
          modelLine: 'MKV',
          matchLine: 'MK+',
          targetLine: 'MKI',
        },
      }),
    ]
  );
  list.add({ name: 'beta', description: 'weak match', sortKey: 5, score: 5, pvalue: 0.5 })._unsafeUnwrap();
  list.sort();

  const thresholds = ReportingThresholds.fromConfig({ Z: 1, targetT: 20, domainT: 20 })._unsafeUnwrap();
  list.threshold(thresholds);
  return { list, space: { Z: thresholds.Z, domZ: thresholds.domZ } };
}

describe('formatGeneral', () => {
  it('should use fixed notation for moderate exponents', () => {
    expect(formatGeneral(0.5)).toBe('0.5');
    expect(formatGeneral(12)).toBe('12');
    expect(formatGeneral(0.0001)).toBe('0.0001');
    expect(formatGeneral(-0.25)).toBe('-0.25');
  });

  it('should use exponent notation for small and large values', () => {
    expect(formatGeneral(1.5e-10)).toBe('1.5e-10');
    expect(formatGeneral(3e-5)).toBe('3e-05');
    expect(formatGeneral(123)).toBe('1.2e+02');
    expect(formatGeneral(1e100)).toBe('1e+100');
  });

  it('should carry rounding into the exponent', () => {
    expect(formatGeneral(9.96)).toBe('10');
  });

  it('should handle zero and non-finite values', () => {
    expect(formatGeneral(0)).toBe('0');
    expect(formatGeneral(Number.NaN)).toBe('nan');
    expect(formatGeneral(Number.POSITIVE_INFINITY)).toBe('inf');
    expect(formatGeneral(Number.NEGATIVE_INFINITY)).toBe('-inf');
  });
});

describe('domainBias', () => {
  it('should be log(1 + omega) without a correction', () => {
    expect(domainBias(makeDomain(), 0.5)).toBeCloseTo(Math.log(1.5), 12);
  });

  it('should stay finite for large corrections', () => {
    expect(domainBias(makeDomain({ domCorrection: 1000 }), 1)).toBeCloseTo(1000, 9);
  });
});

describe('formatTargets', () => {
  it('should render one row per reported hit', () => {
    const { list, space } = createReportFixture();

    expect(formatTargets(list, space)).toEqual([
      'Scores for complete sequences (score includes all domains):',
      ' --- full sequence ---   --- best 1 domain ---    -#dom-',
      '  E-value  score  bias    E-value  score  bias    exp  N  Sequence Description',
      '  ------- ------ -----    ------- ------ -----   ---- --  -------- -----------',
      '  1.5e-06   50.0   2.5      2e-07   49.5   0.0    1.2  1  alpha    test protein',
    ]);
  });

  it('should label models in model mode', () => {
    const { list, space } = createReportFixture();
    const lines = formatTargets(list, space, { mode: 'models' });

    expect(lines[0]).toBe('Scores for complete sequence (score includes all domains):');
    expect(lines[2]).toBe('  E-value  score  bias    E-value  score  bias    exp  N  Model    Description');
  });

  it('should print dashes when a hit has no domains', () => {
    const list = createTestList();
    list.add({ name: 'nodoms', sortKey: 1, score: 30, pvalue: 0.25 })._unsafeUnwrap();
    list.threshold(ReportingThresholds.fromConfig({ Z: 2 })._unsafeUnwrap());

    expect(formatTargets(list, { Z: 2, domZ: 1 })[4]).toBe(
      '      0.5   30.0 -30.0          -      -     -    0.0  0  nodoms'
    );
  });

  it('should truncate descriptions to fit the text width', () => {
    const list = createTestList();
    list.add({ name: 'long', description: 'x'.repeat(40), sortKey: 1, score: 30 })._unsafeUnwrap();
    list.threshold(ReportingThresholds.fromConfig({ Z: 1 })._unsafeUnwrap());

    const row = formatTargets(list, { Z: 1, domZ: 1 }, { textWidth: 80 })[4];

    expect(row?.endsWith(` ${'x'.repeat(32)}`)).toBe(true);
    expect(row?.endsWith('x'.repeat(33))).toBe(false);
  });

  it('should report when nothing passes the thresholds', () => {
    const list = createTestList();
    list.add({ name: 'beta', sortKey: 5, score: 5 })._unsafeUnwrap();
    list.threshold(ReportingThresholds.fromConfig({ Z: 1, targetT: 100 })._unsafeUnwrap());

    const lines = formatTargets(list, { Z: 1, domZ: 1 });

    expect(lines).toHaveLength(6);
    expect(lines.slice(4)).toEqual(['', NO_HITS_MESSAGE]);
  });
});

describe('formatDomains', () => {
  it('should render domain tables and alignments for reported hits', () => {
    const { list, space } = createReportFixture();

    expect(formatDomains(list, space)).toEqual([
      'Domain and alignment annotation for each sequence:',
      '>> alpha  test protein',
      '     # bit score    bias    E-value ind Evalue hmm from   hmm to    ali from   ali to    env from   env to    ali-acc',
      '   --- --------- ------- ---------- ---------- -------- --------    -------- --------    -------- --------    -------',
      '     1      49.5     0.0      2e-07      2e-07        1      100 []        3       90 ..        1       95 [.    0.90',
      '',
      '  Alignments for each domain:',
      '  == domain 1    score: 49.5 bits;  conditional E-value: 2e-07',
      '    MKV',
      '    MK+',
      '    MKI',
      '',
    ]);
  });

  it('should report when nothing passes the thresholds', () => {
    const list = createTestList();
    list.threshold(ReportingThresholds.fromConfig({ Z: 1 })._unsafeUnwrap());

    expect(formatDomains(list, { Z: 1, domZ: 1 })).toEqual([
      'Domain and alignment annotation for each sequence:',
      '',
      NO_HITS_MESSAGE,
    ]);
  });
});

describe('summarizeReported', () => {
  it('should list reported hits with their rank and E-values', () => {
    const { list, space } = createReportFixture();

    expect(summarizeReported(list, space)).toEqual([
      {
        rank: 1,
        name: 'alpha',
        accession: null,
        description: 'test protein',
        sortKey: 50,
        score: 50,
        evalue: 1.5e-6,
        nReportedDomains: 1,
        domains: [
          { bitScore: 49.5, conditionalEvalue: 2e-7, independentEvalue: 2e-7, envFrom: 1, envTo: 95 },
        ],
      },
    ]);
  });
});
