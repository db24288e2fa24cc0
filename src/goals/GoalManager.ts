/**
 * GoalManager
 *
 * Prioritized improvement goals, one active goal per skill at most.
 * Priority is the skill gap (ceiling - score); goals are satisfied once their
 * skill crosses the satisfaction threshold.
 *
 * Goals handed out are frozen; a change is a new object.
 */

import { v4 as uuidv4 } from 'uuid';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import type { SkillRegistry } from '../skills/SkillRegistry.js';
import type { Goal, GoalStatus } from '../core/types.js';
import { InvariantViolationError } from '../core/errors.js';

export interface GoalManagerConfig {
  /** Fraction of a skill's ceiling at which its goal is satisfied (default: 0.8) */
  satisfactionThreshold: number;
  /** Upper bound on simultaneously active goals when filling (default: 3) */
  maxActiveGoals: number;
}

export const DEFAULT_GOAL_MANAGER_CONFIG: GoalManagerConfig = {
  satisfactionThreshold: 0.8,
  maxActiveGoals: 3
};

interface GoalRow {
  seq: number;
  id: string;
  description: string;
  target_skill: string;
  priority: number;
  status: string;
  created_at: string;
  updated_at: string;
  resolved_at: string | null;
}

function toStatus(value: string): GoalStatus {
  if (value === 'active' || value === 'satisfied' || value === 'abandoned') return value;
  throw new InvariantViolationError('known goal status', `unexpected status "${value}"`);
}

export class GoalManager {
  private storage: SQLiteStorage;
  private skills: SkillRegistry;
  private config: GoalManagerConfig;
  private ranked: ReadonlyArray<Readonly<Goal>> = [];

  constructor(storage: SQLiteStorage, skills: SkillRegistry, config: Partial<GoalManagerConfig> = {}) {
    this.storage = storage;
    this.skills = skills;
    this.config = { ...DEFAULT_GOAL_MANAGER_CONFIG, ...config };
    this.ranked = this.sortByGap(this.loadActive());
  }

  // ==========================================
  // WRITES
  // ==========================================

  /**
   * Create an active goal for `skill`, or return the one that already exists.
   */
  proposeGoal(skill: string, description?: string, now: Date = new Date()): Goal {
    const db = this.storage.getDb();

    const goal = this.storage.transaction('goal proposal', () => {
      const existing = db.prepare(
        `SELECT * FROM goals WHERE target_skill = ? AND status = 'active'`
      ).all(skill) as GoalRow[];

      if (existing.length > 1) {
        throw new InvariantViolationError(
          'one active goal per skill',
          `${existing.length} active goals for "${skill}"`
        );
      }
      if (existing.length === 1) {
        return { goal: this.rowToGoal(existing[0]), created: false };
      }

      const created: Goal = Object.freeze({
        id: uuidv4(),
        description: description ?? `Raise ${skill} to ${this.satisfactionScore(skill).toFixed(2)}`,
        targetSkill: skill,
        priority: this.gapFor(skill),
        status: 'active',
        createdAt: now,
        updatedAt: now
      });

      db.prepare(`
        INSERT INTO goals (id, description, target_skill, priority, status, created_at, updated_at)
        VALUES (?, ?, ?, ?, ?, ?, ?)
      `).run(
        created.id,
        created.description,
        created.targetSkill,
        created.priority,
        created.status,
        created.createdAt.toISOString(),
        created.updatedAt.toISOString()
      );

      return { goal: created, created: true };
    });

    if (goal.created) {
      console.log(`[GoalManager] New goal for ${skill} (gap ${goal.goal.priority.toFixed(3)})`);
      this.ranked = this.sortByGap(this.loadActive());
    }
    return goal.goal;
  }

  /**
   * Satisfy goals whose skill crossed the threshold, refresh priorities, and
   * return the remaining active goals by descending gap (earliest first on ties).
   */
  rerank(now: Date = new Date()): Goal[] {
    const db = this.storage.getDb();
    const active = this.loadActive();
    const satisfied: Goal[] = [];
    const remaining: Goal[] = [];

    for (const goal of active) {
      const score = this.skills.get(goal.targetSkill)?.score ?? 0;
      if (score >= this.satisfactionScore(goal.targetSkill)) {
        satisfied.push(goal);
      } else {
        remaining.push(Object.freeze({ ...goal, priority: this.gapFor(goal.targetSkill), updatedAt: now }));
      }
    }

    this.storage.transaction('goal rerank', () => {
      const satisfy = db.prepare(`
        UPDATE goals SET status = 'satisfied', priority = 0, updated_at = ?, resolved_at = ?
        WHERE id = ? AND status = 'active'
      `);
      const reprioritize = db.prepare('UPDATE goals SET priority = ?, updated_at = ? WHERE id = ?');

      for (const goal of satisfied) {
        satisfy.run(now.toISOString(), now.toISOString(), goal.id);
      }
      for (const goal of remaining) {
        reprioritize.run(goal.priority, now.toISOString(), goal.id);
      }
    });

    for (const goal of satisfied) {
      console.log(`[GoalManager] Goal satisfied: ${goal.targetSkill}`);
    }

    this.ranked = this.sortByGap(remaining);
    return [...this.ranked];
  }

  /**
   * Propose goals for the weakest unsatisfied skills among `candidates` until
   * maxActiveGoals are active.
   *
   * @returns Goals created by this call
   */
  fillGoals(candidates: Iterable<string>, describe?: (skill: string) => string, now: Date = new Date()): Goal[] {
    const activeSkills = new Set(this.ranked.map(goal => goal.targetSkill));
    let openSlots = this.config.maxActiveGoals - activeSkills.size;
    if (openSlots <= 0) return [];

    const unique = [...new Set(candidates)]
      .filter(skill => !activeSkills.has(skill))
      .filter(skill => (this.skills.get(skill)?.score ?? 0) < this.satisfactionScore(skill))
      .sort((a, b) => {
        const gapDiff = this.gapFor(b) - this.gapFor(a);
        if (gapDiff !== 0) return gapDiff;
        return a < b ? -1 : a > b ? 1 : 0;
      });

    const created: Goal[] = [];
    for (const skill of unique) {
      if (openSlots <= 0) break;
      created.push(this.proposeGoal(skill, describe?.(skill), now));
      openSlots--;
    }
    return created;
  }

  abandonGoal(id: string, now: Date = new Date()): Goal | null {
    const changes = this.storage.transaction('goal abandon', () =>
      this.storage.getDb().prepare(`
        UPDATE goals SET status = 'abandoned', updated_at = ?, resolved_at = ?
        WHERE id = ? AND status = 'active'
      `).run(now.toISOString(), now.toISOString(), id).changes
    );

    if (changes === 0) return null;

    this.ranked = this.ranked.filter(goal => goal.id !== id);
    console.log(`[GoalManager] Goal abandoned: ${id}`);
    return this.getGoal(id);
  }

  // ==========================================
  // READS
  // ==========================================

  /**
   * Active goals as of the last committed rerank/proposal
   */
  activeGoals(): Goal[] {
    return [...this.ranked];
  }

  getGoal(id: string): Goal | null {
    const row = this.storage.getDb().prepare('SELECT * FROM goals WHERE id = ?').get(id) as GoalRow | undefined;
    return row ? this.rowToGoal(row) : null;
  }

  listGoals(status?: GoalStatus): Goal[] {
    const db = this.storage.getDb();
    const rows = status
      ? db.prepare('SELECT * FROM goals WHERE status = ? ORDER BY seq ASC').all(status) as GoalRow[]
      : db.prepare('SELECT * FROM goals ORDER BY seq ASC').all() as GoalRow[];
    return rows.map(row => this.rowToGoal(row));
  }

  satisfactionScore(skill: string): number {
    return this.config.satisfactionThreshold * this.skills.ceilingFor(skill);
  }

  private gapFor(skill: string): number {
    const score = this.skills.get(skill)?.score ?? 0;
    return Math.max(0, this.skills.ceilingFor(skill) - score);
  }

  private loadActive(): Goal[] {
    const rows = this.storage.getDb().prepare(
      `SELECT * FROM goals WHERE status = 'active' ORDER BY seq ASC`
    ).all() as GoalRow[];
    return rows.map(row => this.rowToGoal(row));
  }

  /**
   * Stable sort: goals arrive in creation order, so equal gaps keep it
   */
  private sortByGap(goals: Goal[]): Goal[] {
    return [...goals].sort((a, b) => this.gapFor(b.targetSkill) - this.gapFor(a.targetSkill));
  }

  private rowToGoal(row: GoalRow): Goal {
    return Object.freeze({
      id: row.id,
      description: row.description,
      targetSkill: row.target_skill,
      priority: row.priority,
      status: toStatus(row.status),
      createdAt: new Date(row.created_at),
      updatedAt: new Date(row.updated_at),
      resolvedAt: row.resolved_at ? new Date(row.resolved_at) : undefined
    });
  }
}
