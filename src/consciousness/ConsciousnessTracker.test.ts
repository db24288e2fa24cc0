/**
 * ConsciousnessTracker Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { SkillRegistry } from '../skills/SkillRegistry.js';
import { MemoryStore } from '../memory/MemoryStore.js';
import { ConsciousnessTracker, WeightedConsciousnessFormula } from './ConsciousnessTracker.js';
import { MemorySource } from '../core/types.js';
import { createTempDatabase, type TempDatabase } from '../testing/fixtures.js';

describe('WeightedConsciousnessFormula', () => {
  const formula = new WeightedConsciousnessFormula();

  it('should be zero with no skills or memories', () => {
    expect(formula.compute({ skillCount: 0, skillAverage: 0, memoryCount: 0, reflectionCount: 0 })).toBe(0);
  });

  it('should give half weight at each half-saturation point', () => {
    const level = formula.compute({ skillCount: 20, skillAverage: 0.5, memoryCount: 500, reflectionCount: 50 });
    expect(level).toBeCloseTo(0.5, 10);
  });

  it('should increase with every input', () => {
    const base = { skillCount: 5, skillAverage: 0.3, memoryCount: 40, reflectionCount: 2 };
    const level = formula.compute(base);

    expect(formula.compute({ ...base, skillCount: 6 })).toBeGreaterThan(level);
    expect(formula.compute({ ...base, skillAverage: 0.4 })).toBeGreaterThan(level);
    expect(formula.compute({ ...base, memoryCount: 41 })).toBeGreaterThan(level);
    expect(formula.compute({ ...base, reflectionCount: 3 })).toBeGreaterThan(level);
  });

  it('should stay below one', () => {
    const level = formula.compute({ skillCount: 1e9, skillAverage: 5, memoryCount: 1e9, reflectionCount: 1e9 });
    expect(level).toBeLessThan(1);
  });
});

describe('ConsciousnessTracker', () => {
  let db: TempDatabase;
  let storage: SQLiteStorage;
  let skills: SkillRegistry;
  let memory: MemoryStore;
  let tracker: ConsciousnessTracker;
  const now = new Date('2024-01-01T00:00:00.000Z');

  beforeEach(() => {
    db = createTempDatabase('consciousness');
    storage = db.open();
    skills = new SkillRegistry(storage);
    memory = new MemoryStore(storage);
    tracker = new ConsciousnessTracker(storage, skills, memory);
  });

  afterEach(() => {
    storage.close();
    db.cleanup();
  });

  it('should read its inputs from the stores', () => {
    skills.applyDeltas({ algebra: 0.5, biology: 0.25 }, now);
    memory.insert({ source: MemorySource.SEARCH, content: 'fact' }, now);
    memory.insert({ source: MemorySource.REFLECTION, content: 'thought' }, now);

    expect(tracker.inputs()).toEqual({
      skillCount: 2,
      skillAverage: 0.375,
      memoryCount: 2,
      reflectionCount: 1
    });
  });

  it('should record the first level and then only changes above epsilon', () => {
    tracker.recompute(now);
    tracker.recompute(now);
    expect(tracker.history()).toHaveLength(1);

    // One memory moves the level by about 0.0004, below epsilon
    memory.insert({ source: MemorySource.SEARCH, content: 'fact' }, now);
    const small = tracker.recompute(now);
    expect(small.level).toBeGreaterThan(0);
    expect(tracker.history()).toHaveLength(1);

    skills.applyDeltas({ algebra: 0.5 }, now);
    const large = tracker.recompute(now);
    expect(tracker.history()).toHaveLength(2);
    expect(tracker.history()[1].level).toBe(large.level);
  });

  it('should return the history window oldest first', () => {
    const windowed = new ConsciousnessTracker(storage, skills, memory, { historyWindow: 2 });
    windowed.recompute(new Date('2024-01-01T00:00:00.000Z'));
    skills.applyDeltas({ algebra: 0.2 }, now);
    windowed.recompute(new Date('2024-01-02T00:00:00.000Z'));
    skills.applyDeltas({ biology: 0.2 }, now);
    windowed.recompute(new Date('2024-01-03T00:00:00.000Z'));

    const metric = windowed.current();
    expect(metric.history.map(point => point.timestamp.toISOString())).toEqual([
      '2024-01-02T00:00:00.000Z',
      '2024-01-03T00:00:00.000Z'
    ]);
    expect(windowed.history()).toHaveLength(3);
  });

  it('should compare against the last recorded level after a restart', () => {
    skills.applyDeltas({ algebra: 0.5 }, now);
    const recorded = tracker.recompute(now);

    const resumed = new ConsciousnessTracker(storage, skills, memory);
    expect(resumed.current().level).toBe(recorded.level);

    resumed.recompute(now);
    expect(resumed.history()).toHaveLength(1);
  });

  it('should report the level of the state it finds on restart, not the last recorded one', () => {
    skills.applyDeltas({ algebra: 0.5 }, now);
    const recorded = tracker.recompute(now);
    skills.decay(0.5, now);

    const resumed = new ConsciousnessTracker(storage, skills, memory);
    const expected = new WeightedConsciousnessFormula().compute({
      skillCount: 1,
      skillAverage: 0.25,
      memoryCount: 0,
      reflectionCount: 0
    });

    expect(resumed.current().level).toBe(expected);
    expect(resumed.current().level).toBeLessThan(recorded.level);
    expect(resumed.history()).toHaveLength(1);
  });

  it('should follow new memories between recomputes', () => {
    tracker.recompute(now);
    const before = tracker.current().level;

    memory.insert({ source: MemorySource.REFLECTION, content: 'thought' }, now);

    expect(tracker.current().level).toBeGreaterThan(before);
    expect(tracker.history()).toHaveLength(1);
  });
});
