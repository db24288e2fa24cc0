/**
 * SkillRegistry
 *
 * Named capability scores with a saturating update rule. Scores only move up
 * through applyDeltas; the sole way down is an explicit decay pass.
 *
 * Readers always see the last committed snapshot: the in-memory map is
 * replaced only after the SQLite transaction for an update has committed.
 * A cycle stages its update first and commits it together with its memory
 * writes through commitWith.
 */

import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import type { SkillDeltas, SkillRecord } from '../core/types.js';
import { InvariantViolationError } from '../core/errors.js';

/**
 * Scales a raw gain by how much headroom a skill has left. Must be strictly
 * decreasing in `score` on [0, ceiling).
 */
export interface DiminishingReturns {
  factor(score: number, ceiling: number): number;
}

/**
 * f(s) = 1 - s / ceiling
 */
export const proportionalHeadroom: DiminishingReturns = {
  factor(score: number, ceiling: number): number {
    if (ceiling <= 0) return 0;
    return Math.max(0, 1 - score / ceiling);
  }
};

export interface SkillRegistryConfig {
  /** Ceiling for skills without an explicit override (default: 1.0) */
  defaultCeiling: number;
  /** Per-skill ceiling overrides */
  ceilings: Record<string, number>;
  diminishing: DiminishingReturns;
}

export const DEFAULT_SKILL_REGISTRY_CONFIG: SkillRegistryConfig = {
  defaultCeiling: 1.0,
  ceilings: {},
  diminishing: proportionalHeadroom
};

/**
 * Update computed against one committed snapshot, not yet written
 */
export interface StagedSkillUpdate {
  readonly changed: readonly SkillRecord[];
  readonly base: ReadonlyMap<string, Readonly<SkillRecord>>;
  readonly next: ReadonlyMap<string, Readonly<SkillRecord>>;
}

interface SkillRow {
  name: string;
  score: number;
  ceiling: number;
  trend: number;
  last_updated: string;
}

export class SkillRegistry {
  private storage: SQLiteStorage;
  private config: SkillRegistryConfig;
  private records: ReadonlyMap<string, Readonly<SkillRecord>> = new Map();

  constructor(storage: SQLiteStorage, config: Partial<SkillRegistryConfig> = {}) {
    this.storage = storage;
    this.config = { ...DEFAULT_SKILL_REGISTRY_CONFIG, ...config };
    this.load();
  }

  private load(): void {
    const rows = this.storage.getDb().prepare('SELECT * FROM skills').all() as SkillRow[];
    const loaded = new Map<string, Readonly<SkillRecord>>();

    for (const row of rows) {
      const ceiling = this.ceilingFor(row.name);
      if (row.score > ceiling) {
        console.warn(`[SkillRegistry] ${row.name} score ${row.score.toFixed(3)} above ceiling ${ceiling}, clamping`);
      }
      loaded.set(row.name, Object.freeze({
        name: row.name,
        score: Math.min(row.score, ceiling),
        ceiling,
        trend: row.trend,
        lastUpdated: new Date(row.last_updated)
      }));
    }

    this.records = loaded;
  }

  ceilingFor(name: string): number {
    return this.config.ceilings[name] ?? this.config.defaultCeiling;
  }

  /**
   * Apply non-negative gains. Unknown skills start at 0. All deltas commit
   * together or not at all.
   *
   * @returns The records that changed
   */
  applyDeltas(deltas: SkillDeltas | Record<string, number>, now: Date = new Date()): SkillRecord[] {
    const staged = this.stageDeltas(deltas, now);
    this.commitWith(staged, 'skill update', () => undefined);
    return [...staged.changed];
  }

  /**
   * Compute the records `deltas` would produce without writing anything.
   *
   * @throws InvariantViolationError on a negative or non-finite delta
   */
  stageDeltas(deltas: SkillDeltas | Record<string, number>, now: Date = new Date()): StagedSkillUpdate {
    const entries = deltas instanceof Map ? [...deltas.entries()] : Object.entries(deltas);

    for (const [name, delta] of entries) {
      if (!Number.isFinite(delta) || delta < 0) {
        throw new InvariantViolationError(
          'non-negative skill delta',
          `delta ${delta} for "${name}"`
        );
      }
    }

    const next = new Map(this.records);
    const changed: SkillRecord[] = [];

    for (const [name, delta] of entries) {
      if (delta === 0) continue;

      const current = next.get(name);
      const ceiling = this.ceilingFor(name);
      const score = current?.score ?? 0;
      const gain = delta * this.config.diminishing.factor(score, ceiling);
      const newScore = Math.min(ceiling, score + gain);

      const record = Object.freeze({
        name,
        score: newScore,
        ceiling,
        trend: newScore - score,
        lastUpdated: now
      });
      next.set(name, record);
      changed.push(record);
    }

    return { changed, base: this.records, next };
  }

  /**
   * Write a staged update and run `alongside` in the same transaction. The
   * in-memory snapshot moves only once both have committed; if either
   * throws, neither the database nor the snapshot changes.
   *
   * @throws InvariantViolationError when the update was staged on an older snapshot
   */
  commitWith<T>(staged: StagedSkillUpdate, operation: string, alongside: () => T): T {
    if (staged.base !== this.records) {
      throw new InvariantViolationError(
        'skill update staged on the current snapshot',
        `${staged.changed.length} staged records are stale`
      );
    }

    const result = this.storage.transaction(operation, () => {
      this.write(staged.changed);
      return alongside();
    });

    this.records = staged.next;
    return result;
  }

  /**
   * Fade every skill by `rate`. Maintenance only; never called mid-cycle.
   */
  decay(rate: number, now: Date = new Date()): SkillRecord[] {
    if (!(rate >= 0 && rate < 1)) {
      throw new RangeError(`Decay rate must be in [0, 1), got ${rate}`);
    }
    if (rate === 0 || this.records.size === 0) return [];

    const next = new Map<string, Readonly<SkillRecord>>();
    for (const record of this.records.values()) {
      const score = record.score * (1 - rate);
      next.set(record.name, Object.freeze({
        ...record,
        score,
        trend: score - record.score,
        lastUpdated: now
      }));
    }

    const changed = [...next.values()];
    this.persist('skill decay', changed);
    this.records = next;
    console.log(`[SkillRegistry] Decayed ${changed.length} skills by ${(rate * 100).toFixed(1)}%`);
    return changed;
  }

  /**
   * Create any missing skills at `seedScore` (clamped to the ceiling).
   * Existing skills are left untouched.
   */
  ensureSkills(names: Iterable<string>, seedScore: number = 0, now: Date = new Date()): SkillRecord[] {
    const next = new Map(this.records);
    const created: SkillRecord[] = [];

    for (const name of names) {
      if (next.has(name)) continue;
      const ceiling = this.ceilingFor(name);
      const record = Object.freeze({
        name,
        score: Math.max(0, Math.min(seedScore, ceiling)),
        ceiling,
        trend: 0,
        lastUpdated: now
      });
      next.set(name, record);
      created.push(record);
    }

    if (created.length === 0) return [];

    this.persist('skill seeding', created);
    this.records = next;
    return created;
  }

  private persist(operation: string, records: readonly SkillRecord[]): void {
    this.storage.transaction(operation, () => this.write(records));
  }

  /**
   * Caller owns the transaction
   */
  private write(records: readonly SkillRecord[]): void {
    if (records.length === 0) return;

    const upsert = this.storage.getDb().prepare(`
      INSERT INTO skills (name, score, ceiling, trend, last_updated)
      VALUES (?, ?, ?, ?, ?)
      ON CONFLICT(name) DO UPDATE SET
        score = excluded.score,
        ceiling = excluded.ceiling,
        trend = excluded.trend,
        last_updated = excluded.last_updated
    `);

    for (const record of records) {
      upsert.run(record.name, record.score, record.ceiling, record.trend, record.lastUpdated.toISOString());
    }
  }

  get(name: string): SkillRecord | undefined {
    return this.records.get(name);
  }

  /**
   * Read-only view ordered by score descending, ties broken by name
   */
  snapshot(): SkillRecord[] {
    return [...this.records.values()].sort((a, b) => {
      if (b.score !== a.score) return b.score - a.score;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
  }

  count(): number {
    return this.records.size;
  }

  average(): number {
    if (this.records.size === 0) return 0;
    let total = 0;
    for (const record of this.records.values()) total += record.score;
    return total / this.records.size;
  }
}
