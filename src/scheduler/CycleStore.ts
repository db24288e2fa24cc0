/**
 * CycleStore
 *
 * Persistence for learning-cycle records. A cycle is inserted when it starts
 * and finalized exactly once when it returns to Idle.
 */

import { z } from 'zod';
import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { InvariantViolationError } from '../core/errors.js';
import {
  CyclePhase,
  emptyCycleStats,
  type CycleOutcome,
  type LearningCycle
} from './types.js';

interface CycleRow {
  cycle_id: number;
  phase: string;
  started_at: string;
  ended_at: string | null;
  outcome: string | null;
  focus: string | null;
  topics: string;
  phase_reports: string;
  stats: string | null;
}

const phaseSchema = z.nativeEnum(CyclePhase);
const outcomeSchema = z.enum(['success', 'partial', 'failed']);

const topicsSchema = z.array(z.object({
  skill: z.string(),
  query: z.string(),
  origin: z.enum(['curriculum', 'follow-up', 'focus'])
}));

const phaseReportsSchema = z.array(z.object({
  phase: phaseSchema,
  result: z.enum(['success', 'partial', 'failed', 'skipped']),
  startedAt: z.coerce.date(),
  endedAt: z.coerce.date(),
  detail: z.string().optional(),
  errors: z.array(z.string())
}));

const statsSchema = z.object({
  hitsGathered: z.number(),
  videosDiscovered: z.number(),
  videosAnalyzed: z.number(),
  candidates: z.number(),
  entriesInserted: z.number(),
  duplicates: z.number(),
  skillsUpdated: z.number(),
  followUpsQueued: z.number(),
  consciousnessLevel: z.number().nullable()
});

function parseColumn<S extends z.ZodTypeAny>(schema: S, cycleId: number, column: string, raw: string): z.output<S> {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new InvariantViolationError('readable cycle record', `cycle ${cycleId} has malformed ${column}`);
  }
  const parsed = schema.safeParse(json);
  if (!parsed.success) {
    throw new InvariantViolationError('readable cycle record', `cycle ${cycleId} ${column}: ${parsed.error.message}`);
  }
  return parsed.data;
}

export class CycleStore {
  private storage: SQLiteStorage;

  constructor(storage: SQLiteStorage) {
    this.storage = storage;
  }

  /**
   * Next id: one past the highest ever recorded, so ids keep rising across restarts
   */
  nextCycleId(): number {
    const row = this.storage.getDb().prepare(
      'SELECT MAX(cycle_id) AS max_id FROM learning_cycles'
    ).get() as { max_id: number | null };
    return (row.max_id ?? 0) + 1;
  }

  begin(cycle: LearningCycle): void {
    this.storage.transaction('cycle begin', () => {
      this.storage.getDb().prepare(`
        INSERT INTO learning_cycles (cycle_id, phase, started_at, focus, topics, phase_reports)
        VALUES (?, ?, ?, ?, ?, ?)
      `).run(
        cycle.cycleId,
        cycle.phase,
        cycle.startedAt.toISOString(),
        cycle.focus ?? null,
        JSON.stringify(cycle.topics),
        JSON.stringify(cycle.phases)
      );
    });
  }

  /**
   * Write the terminal state. Throws if the cycle is unknown or was already finalized.
   */
  finalize(cycle: LearningCycle): void {
    const endedAt = cycle.endedAt;
    const outcome = cycle.outcome;
    if (!endedAt || !outcome) {
      throw new InvariantViolationError('finalized cycle has an outcome', `cycle ${cycle.cycleId} is still open`);
    }

    const changes = this.storage.transaction('cycle finalize', () =>
      this.storage.getDb().prepare(`
        UPDATE learning_cycles
        SET phase = ?, ended_at = ?, outcome = ?, topics = ?, phase_reports = ?, stats = ?
        WHERE cycle_id = ? AND ended_at IS NULL
      `).run(
        cycle.phase,
        endedAt.toISOString(),
        outcome,
        JSON.stringify(cycle.topics),
        JSON.stringify(cycle.phases),
        JSON.stringify(cycle.stats),
        cycle.cycleId
      ).changes
    );

    if (changes === 0) {
      throw new InvariantViolationError('cycle finalized once', `cycle ${cycle.cycleId} is not open`);
    }
  }

  /**
   * Mark cycles left open by a crash as failed.
   *
   * @returns Number of cycles recovered
   */
  recoverInterrupted(now: Date = new Date()): number {
    const changes = this.storage.transaction('cycle recovery', () =>
      this.storage.getDb().prepare(`
        UPDATE learning_cycles
        SET phase = ?, ended_at = ?, outcome = 'failed'
        WHERE ended_at IS NULL
      `).run(CyclePhase.IDLE, now.toISOString()).changes
    );

    if (changes > 0) {
      console.log(`[CycleStore] Recovered ${changes} interrupted cycle(s) as failed`);
    }
    return changes;
  }

  get(cycleId: number): LearningCycle | null {
    const row = this.storage.getDb().prepare(
      'SELECT * FROM learning_cycles WHERE cycle_id = ?'
    ).get(cycleId) as CycleRow | undefined;
    return row ? this.rowToCycle(row) : null;
  }

  /**
   * Most recent finalized cycle
   */
  lastFinalized(): LearningCycle | null {
    const row = this.storage.getDb().prepare(
      'SELECT * FROM learning_cycles WHERE ended_at IS NOT NULL ORDER BY cycle_id DESC LIMIT 1'
    ).get() as CycleRow | undefined;
    return row ? this.rowToCycle(row) : null;
  }

  /**
   * Newest first
   */
  list(limit: number = 20): LearningCycle[] {
    const rows = this.storage.getDb().prepare(
      'SELECT * FROM learning_cycles ORDER BY cycle_id DESC LIMIT ?'
    ).all(limit) as CycleRow[];
    return rows.map(row => this.rowToCycle(row));
  }

  countByOutcome(): Record<CycleOutcome, number> {
    const rows = this.storage.getDb().prepare(`
      SELECT outcome, COUNT(*) AS count FROM learning_cycles
      WHERE outcome IS NOT NULL GROUP BY outcome
    `).all() as Array<{ outcome: string; count: number }>;

    const counts: Record<CycleOutcome, number> = { success: 0, partial: 0, failed: 0 };
    for (const row of rows) {
      const outcome = outcomeSchema.safeParse(row.outcome);
      if (outcome.success) counts[outcome.data] = row.count;
    }
    return counts;
  }

  private rowToCycle(row: CycleRow): LearningCycle {
    const phase = phaseSchema.safeParse(row.phase);
    if (!phase.success) {
      throw new InvariantViolationError('readable cycle record', `cycle ${row.cycle_id} has phase "${row.phase}"`);
    }

    let outcome: CycleOutcome | undefined;
    if (row.outcome !== null) {
      const parsed = outcomeSchema.safeParse(row.outcome);
      if (!parsed.success) {
        throw new InvariantViolationError('readable cycle record', `cycle ${row.cycle_id} has outcome "${row.outcome}"`);
      }
      outcome = parsed.data;
    }

    return {
      cycleId: row.cycle_id,
      phase: phase.data,
      startedAt: new Date(row.started_at),
      endedAt: row.ended_at ? new Date(row.ended_at) : undefined,
      outcome,
      focus: row.focus ?? undefined,
      topics: parseColumn(topicsSchema, row.cycle_id, 'topics', row.topics),
      phases: parseColumn(phaseReportsSchema, row.cycle_id, 'phase_reports', row.phase_reports),
      stats: row.stats ? parseColumn(statsSchema, row.cycle_id, 'stats', row.stats) : emptyCycleStats()
    };
  }
}
