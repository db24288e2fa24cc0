/**
 * FollowUpQueue Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { FollowUpQueue } from './FollowUpQueue.js';
import { PersistenceError } from '../core/errors.js';
import { createTempDatabase, type TempDatabase } from '../testing/fixtures.js';

describe('FollowUpQueue', () => {
  let db: TempDatabase;
  let storage: SQLiteStorage;
  let queue: FollowUpQueue;
  const now = new Date('2024-01-01T00:00:00.000Z');

  beforeEach(() => {
    db = createTempDatabase('follow-ups');
    storage = db.open();
    queue = new FollowUpQueue(storage, { maxPerSkill: 2 });
  });

  afterEach(() => {
    storage.close();
    db.cleanup();
  });

  it('should hand out follow-ups per skill, oldest first', () => {
    const queued = queue.record([], [
      { skill: 'algebra', query: 'Linear algebra' },
      { skill: 'biology', query: 'Mitochondrion' },
      { skill: 'algebra', query: 'Matrix' }
    ], now);

    expect(queued).toBe(3);
    expect(queue.peek('algebra')).toBe('Linear algebra');
    expect(queue.pending('algebra')).toEqual(['Linear algebra', 'Matrix']);
    expect(queue.peek('chemistry')).toBeNull();
    expect(queue.count()).toBe(3);
  });

  it('should ignore repeats, blank queries and anything past the per-skill limit', () => {
    const queued = queue.record([], [
      { skill: 'algebra', query: 'Linear  algebra ' },
      { skill: 'algebra', query: 'Linear algebra' },
      { skill: 'algebra', query: '   ' },
      { skill: 'algebra', query: 'Matrix' },
      { skill: 'algebra', query: 'Vector space' }
    ], now);

    expect(queued).toBe(2);
    expect(queue.pending('algebra')).toEqual(['Linear algebra', 'Matrix']);
  });

  it('should drop asked follow-ups before queueing new ones', () => {
    queue.record([], [
      { skill: 'algebra', query: 'Linear algebra' },
      { skill: 'algebra', query: 'Matrix' }
    ], now);

    const queued = queue.record(
      [{ skill: 'algebra', query: 'Linear algebra' }],
      [{ skill: 'algebra', query: 'Vector space' }],
      now
    );

    expect(queued).toBe(1);
    expect(queue.pending('algebra')).toEqual(['Matrix', 'Vector space']);
  });

  it('should leave the queue untouched when the surrounding transaction fails', () => {
    queue.record([], [{ skill: 'algebra', query: 'Matrix' }], now);

    expect(() => storage.transaction('outer', () => {
      queue.record([{ skill: 'algebra', query: 'Matrix' }], [{ skill: 'algebra', query: 'Vector space' }], now);
      storage.getDb().prepare('INSERT INTO missing_table VALUES (1)').run();
    })).toThrow(PersistenceError);

    expect(queue.pending('algebra')).toEqual(['Matrix']);
  });
});
