/**
 * SkillRegistry Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { SkillRegistry, proportionalHeadroom } from './SkillRegistry.js';
import { InvariantViolationError, PersistenceError } from '../core/errors.js';
import { createTempDatabase, type TempDatabase } from '../testing/fixtures.js';

describe('SkillRegistry', () => {
  let db: TempDatabase;
  let storage: SQLiteStorage;
  let skills: SkillRegistry;
  const now = new Date('2024-01-01T00:00:00.000Z');

  beforeEach(() => {
    db = createTempDatabase('skills');
    storage = db.open();
    skills = new SkillRegistry(storage);
  });

  afterEach(() => {
    storage.close();
    db.cleanup();
  });

  describe('applyDeltas', () => {
    it('should start unknown skills at zero', () => {
      const changed = skills.applyDeltas({ algebra: 0.5 }, now);

      expect(changed).toHaveLength(1);
      expect(changed[0].score).toBe(0.5);
      expect(changed[0].trend).toBe(0.5);
      expect(changed[0].lastUpdated).toEqual(now);
    });

    it('should shrink gains as the score approaches the ceiling', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);
      skills.applyDeltas({ algebra: 0.5 }, now);

      expect(skills.get('algebra')?.score).toBeCloseTo(0.75, 10);
      expect(skills.get('algebra')?.trend).toBeCloseTo(0.25, 10);
    });

    it('should never exceed the ceiling', () => {
      skills.applyDeltas({ algebra: 10 }, now);
      expect(skills.get('algebra')?.score).toBe(1);

      skills.applyDeltas({ algebra: 5 }, now);
      expect(skills.get('algebra')?.score).toBe(1);
      expect(skills.get('algebra')?.trend).toBe(0);
    });

    it('should honour per-skill ceilings', () => {
      const capped = new SkillRegistry(storage, { ceilings: { art: 0.5 } });
      capped.applyDeltas({ art: 2 }, now);

      expect(capped.get('art')?.score).toBe(0.5);
      expect(capped.ceilingFor('art')).toBe(0.5);
      expect(capped.ceilingFor('algebra')).toBe(1);
    });

    it('should accept a Map of deltas', () => {
      skills.applyDeltas(new Map([['algebra', 0.25], ['biology', 0.5]]), now);

      expect(skills.get('algebra')?.score).toBe(0.25);
      expect(skills.get('biology')?.score).toBe(0.5);
    });

    it('should skip zero deltas', () => {
      expect(skills.applyDeltas({ algebra: 0 }, now)).toEqual([]);
      expect(skills.get('algebra')).toBeUndefined();
    });

    it('should reject negative deltas without changing anything', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);

      expect(() => skills.applyDeltas({ algebra: 0.1, biology: -0.1 }, now)).toThrow(InvariantViolationError);
      expect(skills.get('algebra')?.score).toBe(0.5);
      expect(skills.get('biology')).toBeUndefined();
    });

    it('should reject non-finite deltas', () => {
      expect(() => skills.applyDeltas({ algebra: Number.NaN }, now)).toThrow(InvariantViolationError);
    });

    it('should keep the previous snapshot when the write fails', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);
      storage.getDb().exec('DROP TABLE skills');

      expect(() => skills.applyDeltas({ algebra: 0.5 }, now)).toThrow(PersistenceError);
      expect(skills.get('algebra')?.score).toBe(0.5);
    });
  });

  describe('stageDeltas and commitWith', () => {
    function storedScore(name: string): number | undefined {
      const row = storage.getDb().prepare('SELECT score FROM skills WHERE name = ?').get(name) as
        { score: number } | undefined;
      return row?.score;
    }

    it('should not change anything until the staged update is committed', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);

      const staged = skills.stageDeltas({ algebra: 0.5 }, now);

      expect(staged.changed.map(record => record.score)).toEqual([0.75]);
      expect(skills.get('algebra')?.score).toBe(0.5);
      expect(storedScore('algebra')).toBe(0.5);

      expect(skills.commitWith(staged, 'test commit', () => 'written')).toBe('written');
      expect(skills.get('algebra')?.score).toBe(0.75);
      expect(storedScore('algebra')).toBe(0.75);
    });

    it('should roll back the skill writes when the work alongside them fails', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);
      const staged = skills.stageDeltas({ algebra: 0.5, biology: 0.5 }, now);

      expect(() => skills.commitWith(staged, 'test commit', () => {
        storage.getDb().prepare(
          "INSERT INTO skills (name, score, ceiling, last_updated) VALUES ('algebra', 0, 1, 'x')"
        ).run();
      })).toThrow(PersistenceError);

      expect(skills.get('algebra')?.score).toBe(0.5);
      expect(skills.get('biology')).toBeUndefined();
      expect(storedScore('algebra')).toBe(0.5);
      expect(storedScore('biology')).toBeUndefined();
    });

    it('should refuse an update staged before another commit', () => {
      const stale = skills.stageDeltas({ algebra: 0.5 }, now);
      skills.applyDeltas({ biology: 0.5 }, now);

      expect(() => skills.commitWith(stale, 'test commit', () => undefined)).toThrow(InvariantViolationError);
      expect(skills.get('algebra')).toBeUndefined();
      expect(storedScore('algebra')).toBeUndefined();
    });
  });

  describe('persistence', () => {
    it('should reload committed scores', () => {
      skills.applyDeltas({ algebra: 0.5, biology: 0.25 }, now);

      const reloaded = new SkillRegistry(storage);
      expect(reloaded.get('algebra')?.score).toBe(0.5);
      expect(reloaded.get('biology')?.score).toBe(0.25);
      expect(reloaded.count()).toBe(2);
    });

    it('should clamp stored scores to a lowered ceiling', () => {
      skills.applyDeltas({ algebra: 0.8 }, now);

      const reloaded = new SkillRegistry(storage, { defaultCeiling: 0.5 });
      expect(reloaded.get('algebra')?.score).toBe(0.5);
    });
  });

  describe('decay', () => {
    it('should scale every score by (1 - rate)', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);

      const changed = skills.decay(0.5, now);

      expect(changed).toHaveLength(1);
      expect(skills.get('algebra')?.score).toBe(0.25);
      expect(skills.get('algebra')?.trend).toBe(-0.25);
    });

    it('should do nothing at rate zero', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);
      expect(skills.decay(0, now)).toEqual([]);
      expect(skills.get('algebra')?.score).toBe(0.5);
    });

    it('should reject rates outside [0, 1)', () => {
      expect(() => skills.decay(1, now)).toThrow(RangeError);
      expect(() => skills.decay(-0.1, now)).toThrow(RangeError);
    });
  });

  describe('ensureSkills', () => {
    it('should seed missing skills and leave existing ones alone', () => {
      skills.applyDeltas({ algebra: 0.5 }, now);

      const created = skills.ensureSkills(['algebra', 'biology'], 0.1, now);

      expect(created.map(record => record.name)).toEqual(['biology']);
      expect(skills.get('algebra')?.score).toBe(0.5);
      expect(skills.get('biology')?.score).toBe(0.1);
    });
  });

  describe('reads', () => {
    it('should order the snapshot by score, then name', () => {
      skills.applyDeltas({ chemistry: 0.25, algebra: 0.25, biology: 0.5 }, now);

      expect(skills.snapshot().map(record => record.name)).toEqual(['biology', 'algebra', 'chemistry']);
    });

    it('should average scores', () => {
      expect(skills.average()).toBe(0);
      skills.applyDeltas({ algebra: 0.5, biology: 0.25 }, now);
      expect(skills.average()).toBe(0.375);
    });
  });

  describe('proportionalHeadroom', () => {
    it('should fall linearly to zero at the ceiling', () => {
      expect(proportionalHeadroom.factor(0, 1)).toBe(1);
      expect(proportionalHeadroom.factor(0.25, 1)).toBe(0.75);
      expect(proportionalHeadroom.factor(1, 1)).toBe(0);
      expect(proportionalHeadroom.factor(0.5, 0)).toBe(0);
    });
  });
});
