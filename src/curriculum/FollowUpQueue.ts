/**
 * FollowUpQueue
 *
 * Per-skill queue of research queries the agent raised for itself. Titles of
 * novel search hits are queued after a cycle commits; topic selection asks
 * the oldest pending follow-up before the curriculum's own queries.
 */

import type { SQLiteStorage } from '../storage/SQLiteStorage.js';

export interface FollowUp {
  skill: string;
  query: string;
}

export interface FollowUpQueueConfig {
  /** Pending follow-ups kept per skill; later ones are dropped (default: 5) */
  maxPerSkill: number;
}

export const DEFAULT_FOLLOW_UP_CONFIG: FollowUpQueueConfig = {
  maxPerSkill: 5
};

function normalizeQuery(query: string): string {
  return query.replace(/\s+/g, ' ').trim();
}

export class FollowUpQueue {
  private storage: SQLiteStorage;
  private config: FollowUpQueueConfig;

  constructor(storage: SQLiteStorage, config: Partial<FollowUpQueueConfig> = {}) {
    this.storage = storage;
    this.config = { ...DEFAULT_FOLLOW_UP_CONFIG, ...config };
  }

  /**
   * Oldest first
   */
  pending(skill: string, limit: number = this.config.maxPerSkill): string[] {
    const rows = this.storage.getDb().prepare(
      'SELECT query FROM follow_up_queries WHERE skill = ? ORDER BY seq ASC LIMIT ?'
    ).all(skill, limit) as Array<{ query: string }>;
    return rows.map(row => row.query);
  }

  peek(skill: string): string | null {
    return this.pending(skill, 1)[0] ?? null;
  }

  count(skill?: string): number {
    const row = skill === undefined
      ? this.storage.getDb().prepare('SELECT COUNT(*) AS count FROM follow_up_queries').get() as { count: number }
      : this.storage.getDb().prepare(
          'SELECT COUNT(*) AS count FROM follow_up_queries WHERE skill = ?'
        ).get(skill) as { count: number };
    return row.count;
  }

  /**
   * Remove the follow-ups a cycle asked and queue the ones it raised, in one
   * unit. Joins the caller's transaction when there is one.
   *
   * @returns Number of follow-ups newly queued
   */
  record(asked: readonly FollowUp[], raised: readonly FollowUp[], now: Date = new Date()): number {
    if (asked.length === 0 && raised.length === 0) return 0;

    return this.storage.transaction('follow-up update', () => {
      const db = this.storage.getDb();
      const remove = db.prepare('DELETE FROM follow_up_queries WHERE skill = ? AND query = ?');
      const size = db.prepare('SELECT COUNT(*) AS count FROM follow_up_queries WHERE skill = ?');
      const insert = db.prepare(`
        INSERT OR IGNORE INTO follow_up_queries (skill, query, created_at)
        VALUES (?, ?, ?)
      `);

      for (const { skill, query } of asked) {
        remove.run(skill, normalizeQuery(query));
      }

      let queued = 0;
      for (const { skill, query } of raised) {
        const text = normalizeQuery(query);
        if (text.length === 0) continue;

        const { count } = size.get(skill) as { count: number };
        if (count >= this.config.maxPerSkill) continue;

        queued += insert.run(skill, text, now.toISOString()).changes;
      }
      return queued;
    });
  }
}
