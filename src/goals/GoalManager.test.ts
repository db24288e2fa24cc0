/**
 * GoalManager Tests
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { SkillRegistry } from '../skills/SkillRegistry.js';
import { GoalManager } from './GoalManager.js';
import { createTempDatabase, type TempDatabase } from '../testing/fixtures.js';

describe('GoalManager', () => {
  let db: TempDatabase;
  let storage: SQLiteStorage;
  let skills: SkillRegistry;
  let goals: GoalManager;
  const now = new Date('2024-01-01T00:00:00.000Z');
  const later = new Date('2024-01-02T00:00:00.000Z');

  beforeEach(() => {
    db = createTempDatabase('goals');
    storage = db.open();
    skills = new SkillRegistry(storage);
    goals = new GoalManager(storage, skills);
  });

  afterEach(() => {
    storage.close();
    db.cleanup();
  });

  describe('proposeGoal', () => {
    it('should create an active goal prioritized by the skill gap', () => {
      skills.applyDeltas({ algebra: 0.25 }, now);

      const goal = goals.proposeGoal('algebra', undefined, now);

      expect(goal.status).toBe('active');
      expect(goal.targetSkill).toBe('algebra');
      expect(goal.priority).toBe(0.75);
      expect(goal.description).toBe('Raise algebra to 0.80');
      expect(goals.activeGoals().map(active => active.id)).toEqual([goal.id]);
    });

    it('should return the existing goal instead of creating a second one', () => {
      const first = goals.proposeGoal('algebra', 'Learn algebra', now);
      const second = goals.proposeGoal('algebra', 'Learn more algebra', later);

      expect(second.id).toBe(first.id);
      expect(second.description).toBe('Learn algebra');
      expect(goals.listGoals()).toHaveLength(1);
    });

    it('should survive a restart', () => {
      const goal = goals.proposeGoal('algebra', undefined, now);

      const reloaded = new GoalManager(storage, skills);
      expect(reloaded.activeGoals().map(active => active.id)).toEqual([goal.id]);
    });
  });

  describe('activeGoals', () => {
    it('should hand out goals that cannot be changed in place', () => {
      skills.applyDeltas({ algebra: 0.25 }, now);
      goals.proposeGoal('algebra', undefined, now);
      goals.rerank(later);

      const [goal] = goals.activeGoals();

      expect(Object.isFrozen(goal)).toBe(true);
      expect(() => {
        goal.priority = 0;
      }).toThrow(TypeError);
      expect(goals.activeGoals()[0].priority).toBe(0.75);
      expect(goals.getGoal(goal.id)?.priority).toBe(0.75);
    });
  });

  describe('rerank', () => {
    it('should satisfy goals whose skill crossed the threshold', () => {
      const goal = goals.proposeGoal('algebra', undefined, now);
      skills.applyDeltas({ algebra: 10 }, now);

      expect(goals.rerank(later)).toEqual([]);

      const stored = goals.getGoal(goal.id);
      expect(stored?.status).toBe('satisfied');
      expect(stored?.priority).toBe(0);
      expect(stored?.resolvedAt).toEqual(later);
    });

    it('should allow a new goal once the previous one is satisfied', () => {
      const first = goals.proposeGoal('algebra', undefined, now);
      skills.applyDeltas({ algebra: 10 }, now);
      goals.rerank(later);

      const second = goals.proposeGoal('algebra', undefined, later);
      expect(second.id).not.toBe(first.id);
      expect(goals.listGoals('satisfied').map(goal => goal.id)).toEqual([first.id]);
      expect(goals.listGoals('active').map(goal => goal.id)).toEqual([second.id]);
    });

    it('should order by gap and keep creation order on ties', () => {
      skills.applyDeltas({ algebra: 0.2, biology: 0.5, chemistry: 0.2 }, now);
      goals.proposeGoal('biology', undefined, now);
      goals.proposeGoal('algebra', undefined, now);
      goals.proposeGoal('chemistry', undefined, now);

      const ranked = goals.rerank(later);

      expect(ranked.map(goal => goal.targetSkill)).toEqual(['algebra', 'chemistry', 'biology']);
      expect(ranked.map(goal => goal.priority)).toEqual([0.8, 0.8, 0.5]);
    });

    it('should refresh priorities as skills improve', () => {
      goals.proposeGoal('algebra', undefined, now);
      skills.applyDeltas({ algebra: 0.5 }, now);

      const [goal] = goals.rerank(later);
      expect(goal.priority).toBe(0.5);
      expect(goals.getGoal(goal.id)?.priority).toBe(0.5);
    });
  });

  describe('fillGoals', () => {
    it('should target the largest gaps until the limit is reached', () => {
      const limited = new GoalManager(storage, skills, { maxActiveGoals: 2 });
      skills.applyDeltas({ algebra: 0.2, biology: 0.5, chemistry: 0.2 }, now);

      const created = limited.fillGoals(['biology', 'chemistry', 'algebra', 'drawing'], undefined, now);

      expect(created.map(goal => goal.targetSkill)).toEqual(['drawing', 'algebra']);
      expect(limited.fillGoals(['chemistry'], undefined, now)).toEqual([]);
    });

    it('should skip skills that are already satisfied', () => {
      skills.applyDeltas({ algebra: 10 }, now);

      const created = goals.fillGoals(['algebra', 'biology'], skill => `Study ${skill}`, now);

      expect(created.map(goal => goal.description)).toEqual(['Study biology']);
    });
  });

  describe('abandonGoal', () => {
    it('should retire an active goal', () => {
      const goal = goals.proposeGoal('algebra', undefined, now);

      const abandoned = goals.abandonGoal(goal.id, later);

      expect(abandoned?.status).toBe('abandoned');
      expect(goals.activeGoals()).toEqual([]);
      expect(goals.abandonGoal(goal.id, later)).toBeNull();
    });
  });
});
