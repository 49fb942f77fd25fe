/**
 * Unit tests for the JSON Lines logger
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { existsSync, mkdtempSync, readFileSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { Logger } from '../../src/lib/logger.js';
import { createTestList, addKeys } from '../helpers/hit-list-test-helper.js';

function readEntries(file: string): Array<Record<string, unknown>> {
  return readFileSync(file, 'utf8')
    .trim()
    .split('\n')
    .map(line => JSON.parse(line));
}

describe('Logger', () => {
  let tempDir: string;

  beforeEach(() => {
    tempDir = mkdtempSync(join(tmpdir(), 'ranked-hits-logger-'));
  });

  afterEach(() => {
    vi.restoreAllMocks();
    rmSync(tempDir, { recursive: true, force: true });
  });

  it('should create the log directory', () => {
    const logDir = join(tempDir, 'nested', 'logs');
    new Logger({ logDir, console: false });

    expect(existsSync(logDir)).toBe(true);
  });

  it('should have no log files without a directory', () => {
    expect(new Logger({ console: false }).getLogFilePath('general')).toBeNull();
  });

  it('should append list events as JSON lines', () => {
    const logger = new Logger({ logDir: tempDir, console: false });
    logger.logListEvent('grow', 256, 512);
    logger.logListEvent('allocation_failed', 512, 512, { operation: 'grow' });

    const entries = readEntries(join(tempDir, 'list-events.jsonl'));

    expect(entries).toHaveLength(2);
    expect(entries[0]).toMatchObject({ type: 'list_event', level: 'debug', operation: 'grow', size: 256, capacity: 512 });
    expect(entries[1]).toMatchObject({ level: 'warn', operation: 'allocation_failed', context: { operation: 'grow' } });
  });

  it('should write general messages to their own file', () => {
    const logger = new Logger({ logDir: tempDir, console: false });
    logger.info('merged lists', { lists: 2 });

    expect(readEntries(join(tempDir, 'general.jsonl'))).toEqual([
      expect.objectContaining({ type: 'general', level: 'info', message: 'merged lists', context: { lists: 2 } }),
    ]);
  });

  it('should log list growth from a hit list', () => {
    const logger = new Logger({ logDir: tempDir, console: false });
    const list = createTestList({ logger });
    addKeys(list, Array.from({ length: 257 }, (_, i) => i));

    expect(readEntries(join(tempDir, 'list-events.jsonl'))).toEqual([
      expect.objectContaining({ operation: 'grow', size: 256, capacity: 512 }),
    ]);
  });

  it('should only print entries at or above the console level', () => {
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger({ consoleLevel: 'warn' });

    logger.debug('hidden');
    logger.warn('shown');

    expect(log).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('should keep stdout clear when every entry goes to stderr', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => undefined);
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const logger = new Logger({ consoleLevel: 'debug', stderrOnly: true });

    logger.debug('detail');
    logger.info('Thresholded merged hit list', { hits: 3 });
    logger.warn('late');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
    expect(error).toHaveBeenCalledTimes(3);
    expect(error.mock.calls[1][0]).toMatch(/^\[INFO\] /);
  });
});
