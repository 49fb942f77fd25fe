/**
 * Integration test: worker files merged, thresholded and reported
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { fileURLToPath } from 'url';
import { loadAndMerge } from '../../src/services/hit-list-loader.js';
import { ReportingThresholds } from '../../src/services/reporting-thresholds.js';
import { formatTargets, summarizeReported } from '../../src/services/report-formatter.js';
import { Logger, type ListEventLog } from '../../src/lib/logger.js';

const FIXTURES = fileURLToPath(new URL('../fixtures/hit-lists/', import.meta.url));
const WORKER_FILES = [join(FIXTURES, 'worker-a.json'), join(FIXTURES, 'worker-b.json')];

describe('Worker merge pipeline', () => {
  let logDir: string;
  let logger: Logger;

  beforeEach(() => {
    logDir = mkdtempSync(join(tmpdir(), 'ranked-hits-pipeline-'));
    logger = new Logger({ logDir, console: false });
  });

  afterEach(() => {
    rmSync(logDir, { recursive: true, force: true });
  });

  it('should report the merged hits that pass the thresholds', () => {
    const list = loadAndMerge(WORKER_FILES, { logger })._unsafeUnwrap();
    const thresholds = ReportingThresholds.fromConfig({
      Z: list.size,
      targetE: 0.5,
      domainE: 0.05,
    })._unsafeUnwrap();

    const summary = list.threshold(thresholds);

    expect(summary).toEqual({ targets: 3, domains: 3 });
    expect(thresholds.domZ).toBe(3);

    const reported = summarizeReported(list, { Z: thresholds.Z, domZ: thresholds.domZ });
    expect(reported.map(hit => [hit.rank, hit.name, hit.nReportedDomains])).toEqual([
      [1, 'kinase_dom', 1],
      [2, 'helix_turn', 1],
      [3, 'zinc_finger', 1],
    ]);
    expect(reported[2]?.domains.map(domain => domain.envFrom)).toEqual([40]);

    const lines = formatTargets(list, { Z: thresholds.Z, domZ: thresholds.domZ });
    expect(lines).toHaveLength(7);
    expect(lines[4]?.endsWith('kinase_dom  placeholder kinase-like domain')).toBe(true);

    list.destroy();
  });

  it('should log each merge and destroy as a list event', () => {
    const list = loadAndMerge(WORKER_FILES, { logger })._unsafeUnwrap();
    list.destroy();

    const logFile = logger.getLogFilePath('list-events');
    expect(logFile).toBe(join(logDir, 'list-events.jsonl'));

    const events: ListEventLog[] = readFileSync(join(logDir, 'list-events.jsonl'), 'utf8')
      .trim()
      .split('\n')
      .map(line => JSON.parse(line));

    expect(events.map(event => [event.operation, event.size, event.capacity, event.context])).toEqual([
      ['merge', 3, 512, { merged: 3 }],
      ['destroy', 0, 0, { state: 'drained' }],
      ['merge', 5, 768, { merged: 2 }],
      ['destroy', 0, 0, { state: 'drained' }],
      ['destroy', 5, 768, { state: 'sorted' }],
    ]);
  });
});
