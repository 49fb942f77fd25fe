/**
 * Unit tests for merging hit lists
 */

import { describe, it, expect } from 'vitest';
import { ListStateError } from '../../src/lib/errors/HitListErrors.js';
import { Logger, type ListOperation } from '../../src/lib/logger.js';
import {
  addKeys,
  createSortedList,
  createTestList,
  rankedKeys,
  rankedNames,
} from '../helpers/hit-list-test-helper.js';

describe('TopHits.merge', () => {
  it('should fold worker lists into an empty list in rank order', () => {
    const merged = createTestList();
    const first = createSortedList([10, 5, 1]);
    const second = createSortedList([7, 2]);

    merged.merge(first)._unsafeUnwrap();
    merged.merge(second)._unsafeUnwrap();

    expect(rankedKeys(merged)).toEqual([10, 7, 5, 2, 1]);
    expect(merged.size).toBe(5);
    expect(merged.capacity).toBe(768);
    expect(merged.state).toBe('sorted');
  });

  it('should append source records after the destination records', () => {
    const dest = createSortedList([3, 9], ['d0', 'd1']);
    const source = createSortedList([5, 1], ['s0', 's1']);

    dest.merge(source)._unsafeUnwrap();

    expect(dest.records().map(hit => hit.name)).toEqual(['d0', 'd1', 's0', 's1']);
    expect(dest.rankIndices()).toEqual([1, 2, 0, 3]);
  });

  it('should move records rather than copy them', () => {
    const dest = createSortedList([1]);
    const source = createTestList();
    const [moved] = addKeys(source, [2], ['moved']);

    dest.merge(source)._unsafeUnwrap();

    expect(dest.at(0)).toBe(moved);
    expect(moved?.name).toBe('moved');
  });

  it('should sort unsorted inputs before merging', () => {
    const dest = createTestList();
    addKeys(dest, [1, 8, 4]);
    const source = createTestList();
    addKeys(source, [6, 2, 9]);

    dest.merge(source)._unsafeUnwrap();

    expect(rankedKeys(dest)).toEqual([9, 8, 6, 4, 2, 1]);
  });

  it('should rank destination records first on equal keys', () => {
    const dest = createSortedList([5, 5], ['d0', 'd1']);
    const source = createSortedList([5, 6], ['s0', 's1']);

    dest.merge(source)._unsafeUnwrap();

    expect(rankedNames(dest)).toEqual(['s1', 'd0', 'd1', 's0']);
  });

  it('should handle an empty source', () => {
    const dest = createSortedList([2, 1]);
    const source = createTestList();

    dest.merge(source)._unsafeUnwrap();

    expect(rankedKeys(dest)).toEqual([2, 1]);
    expect(dest.capacity).toBe(512);
  });

  it('should give the same ranking whichever way merges are grouped', () => {
    const keysA = [4, 11, 2];
    const keysB = [9, 3];
    const keysC = [7, 12, 1, 5];

    const leftFirst = createSortedList(keysA);
    leftFirst.merge(createSortedList(keysB))._unsafeUnwrap();
    leftFirst.merge(createSortedList(keysC))._unsafeUnwrap();

    const rightFirst = createSortedList(keysB);
    rightFirst.merge(createSortedList(keysC))._unsafeUnwrap();
    const grouped = createSortedList(keysA);
    grouped.merge(rightFirst)._unsafeUnwrap();

    expect(rankedKeys(leftFirst)).toEqual([12, 11, 9, 7, 5, 4, 3, 2, 1]);
    expect(rankedKeys(grouped)).toEqual(rankedKeys(leftFirst));
  });

  describe('drained source', () => {
    it('should leave the source drained and empty', () => {
      const dest = createTestList();
      const source = createSortedList([1, 2]);

      dest.merge(source)._unsafeUnwrap();

      expect(source.state).toBe('drained');
      expect(() => source.size).toThrow('Cannot read drained hit list');
      expect(() => source.nextHit()).toThrow(ListStateError);
      expect(() => dest.merge(source)).toThrow('Cannot merge from drained hit list');
    });

    it('should not release moved records when the source is destroyed', () => {
      const dest = createTestList();
      const source = createSortedList([1, 2], ['kept1', 'kept2']);

      dest.merge(source)._unsafeUnwrap();
      source.destroy();

      expect(source.state).toBe('destroyed');
      expect(rankedNames(dest)).toEqual(['kept2', 'kept1']);
    });
  });

  it('should refuse to merge a list into itself', () => {
    const list = createSortedList([1]);

    expect(() => list.merge(list)).toThrow(
      'Cannot merge sorted hit list: a list cannot be merged into itself'
    );
    expect(list.size).toBe(1);
  });

  describe('allocation failure', () => {
    it('should leave both lists valid', () => {
      const dest = createSortedList([3, 1], ['d0', 'd1'], { maxCapacity: 300 });
      const source = createSortedList([2], ['s0']);

      const result = dest.merge(source);

      expect(result.isErr()).toBe(true);
      expect(result._unsafeUnwrapErr().message).toBe("Failed to allocate 512 slots for 'merge' (limit 300)");
      expect(rankedNames(dest)).toEqual(['d0', 'd1']);
      expect(dest.capacity).toBe(256);
      expect(source.state).toBe('sorted');
      expect(rankedNames(source)).toEqual(['s0']);
    });

    it('should log the failure as a list event', () => {
      const events: string[] = [];
      class RecordingLogger extends Logger {
        override logListEvent(operation: ListOperation): void {
          events.push(operation);
        }
      }
      const logger = new RecordingLogger({ console: false });
      const dest = createSortedList([1], undefined, { maxCapacity: 300, logger });

      dest.merge(createSortedList([2]));

      expect(events).toEqual(['allocation_failed']);
    });
  });
});
