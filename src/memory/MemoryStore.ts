/**
 * MemoryStore
 *
 * Append-only, content-addressed knowledge log. Entries are never removed;
 * the only mutation after insert is the importance decay pass.
 */

import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import {
  MEMORY_SOURCES,
  MemorySource,
  type MemoryCandidate,
  type MemoryEntry,
  type MemoryFilter,
  type MemoryInsertResult
} from '../core/types.js';
import { contentHash } from './contentHash.js';
import { InvariantViolationError } from '../core/errors.js';

export interface MemoryStoreConfig {
  /** Importance given to candidates that don't carry one (default: 0.5) */
  defaultImportance: number;
  /** Rows fetched per page while iterating a query (default: 100) */
  pageSize: number;
}

export const DEFAULT_MEMORY_STORE_CONFIG: MemoryStoreConfig = {
  defaultImportance: 0.5,
  pageSize: 100
};

export interface ImportanceDecayOptions {
  /** Only entries older than this are touched */
  olderThanMs: number;
  /** Multiplier applied to importance, in (0, 1] */
  factor: number;
  /** Importance never drops below this */
  floor: number;
  now?: Date;
}

interface MemoryEntryRow {
  seq: number;
  id: string;
  source: string;
  content: string;
  importance: number;
  created_at: string;
}

interface PageCursor {
  createdAt: string;
  seq: number;
}

function isMemorySource(value: string): value is MemorySource {
  return MEMORY_SOURCES.some(source => source === value);
}

function clampImportance(value: number): number {
  if (!Number.isFinite(value)) return 0;
  return Math.max(0, Math.min(1, value));
}

export class MemoryStore {
  private storage: SQLiteStorage;
  private config: MemoryStoreConfig;

  constructor(storage: SQLiteStorage, config: Partial<MemoryStoreConfig> = {}) {
    this.storage = storage;
    this.config = { ...DEFAULT_MEMORY_STORE_CONFIG, ...config };
  }

  // ==========================================
  // WRITES
  // ==========================================

  /**
   * Store a candidate unless identical content from the same source exists.
   * Inserting twice is a no-op that returns the stored entry.
   */
  insert(candidate: MemoryCandidate, now: Date = new Date()): MemoryInsertResult {
    return this.storage.transaction('memory insert', () => this.insertOne(candidate, now));
  }

  /**
   * Insert a batch in one transaction: either every new entry lands or none do.
   */
  insertMany(candidates: MemoryCandidate[], now: Date = new Date()): MemoryInsertResult[] {
    if (candidates.length === 0) return [];
    return this.storage.transaction('memory commit', () =>
      candidates.map(candidate => this.insertOne(candidate, now))
    );
  }

  private insertOne(candidate: MemoryCandidate, now: Date): MemoryInsertResult {
    const db = this.storage.getDb();
    const id = contentHash(candidate.source, candidate.content);
    const importance = clampImportance(candidate.importance ?? this.config.defaultImportance);
    const associations = [...new Set(candidate.associations ?? [])].sort();

    const result = db.prepare(`
      INSERT OR IGNORE INTO memory_entries (id, source, content, importance, created_at)
      VALUES (?, ?, ?, ?, ?)
    `).run(id, candidate.source, candidate.content, importance, now.toISOString());

    if (result.changes === 0) {
      const existing = this.get(id);
      if (!existing) {
        throw new InvariantViolationError('ignored insert has a stored entry', `entry ${id} missing`);
      }
      return { entry: existing, inserted: false };
    }

    const insertAssociation = db.prepare(`
      INSERT OR IGNORE INTO memory_associations (entry_id, skill) VALUES (?, ?)
    `);
    for (const skill of associations) {
      insertAssociation.run(id, skill);
    }

    return {
      entry: {
        id,
        source: candidate.source,
        content: candidate.content,
        importance,
        createdAt: now,
        associations
      },
      inserted: true
    };
  }

  /**
   * Lower the recall weight of old entries. Never deletes anything.
   *
   * @returns Number of entries whose importance changed
   */
  importanceDecayPass(options: ImportanceDecayOptions): number {
    if (!(options.factor > 0 && options.factor <= 1)) {
      throw new RangeError(`Importance decay factor must be in (0, 1], got ${options.factor}`);
    }

    const now = options.now ?? new Date();
    const cutoff = new Date(now.getTime() - options.olderThanMs).toISOString();

    const changed = this.storage.transaction('importance decay', () =>
      this.storage.getDb().prepare(`
        UPDATE memory_entries
        SET importance = MAX(?, importance * ?)
        WHERE created_at < ? AND importance > ?
      `).run(options.floor, options.factor, cutoff, options.floor).changes
    );

    if (changed > 0) {
      console.log(`[MemoryStore] Importance decay touched ${changed} entries older than ${cutoff}`);
    }
    return changed;
  }

  // ==========================================
  // READS
  // ==========================================

  has(id: string): boolean {
    return this.storage.getDb().prepare('SELECT 1 FROM memory_entries WHERE id = ?').get(id) !== undefined;
  }

  get(id: string): MemoryEntry | null {
    const row = this.storage.getDb().prepare('SELECT * FROM memory_entries WHERE id = ?').get(id) as MemoryEntryRow | undefined;
    return row ? this.rowToEntry(row) : null;
  }

  count(): number {
    const row = this.storage.getDb().prepare('SELECT COUNT(*) as count FROM memory_entries').get() as { count: number };
    return row.count;
  }

  countBySource(): Record<MemorySource, number> {
    const counts: Record<MemorySource, number> = {
      [MemorySource.SEARCH]: 0,
      [MemorySource.VIDEO]: 0,
      [MemorySource.VISION]: 0,
      [MemorySource.YOUTUBE]: 0,
      [MemorySource.REFLECTION]: 0
    };

    const rows = this.storage.getDb().prepare(`
      SELECT source, COUNT(*) as count FROM memory_entries GROUP BY source
    `).all() as Array<{ source: string; count: number }>;

    for (const row of rows) {
      if (isMemorySource(row.source)) counts[row.source] = row.count;
    }
    return counts;
  }

  countReflections(): number {
    const row = this.storage.getDb().prepare(
      'SELECT COUNT(*) as count FROM memory_entries WHERE source = ?'
    ).get(MemorySource.REFLECTION) as { count: number };
    return row.count;
  }

  /**
   * Entries in creation order. The result can be iterated any number of
   * times; each pass sees only entries that existed when query() was called.
   */
  query(filter: MemoryFilter = {}): Iterable<MemoryEntry> {
    const row = this.storage.getDb().prepare('SELECT COALESCE(MAX(seq), 0) as maxSeq FROM memory_entries').get() as { maxSeq: number };
    const maxSeq = row.maxSeq;
    return {
      [Symbol.iterator]: () => this.iterate(filter, maxSeq)
    };
  }

  private *iterate(filter: MemoryFilter, maxSeq: number): Generator<MemoryEntry> {
    let remaining = filter.limit ?? Number.POSITIVE_INFINITY;
    let cursor: PageCursor | null = null;

    while (remaining > 0) {
      const pageSize = Math.min(this.config.pageSize, remaining);
      const rows = this.fetchPage(filter, maxSeq, cursor, pageSize);

      for (const row of rows) {
        yield this.rowToEntry(row);
      }

      remaining -= rows.length;
      if (rows.length < pageSize) return;

      const last = rows[rows.length - 1];
      cursor = { createdAt: last.created_at, seq: last.seq };
    }
  }

  private fetchPage(
    filter: MemoryFilter,
    maxSeq: number,
    cursor: PageCursor | null,
    pageSize: number
  ): MemoryEntryRow[] {
    const conditions: string[] = ['m.seq <= ?'];
    const params: unknown[] = [maxSeq];

    if (filter.source) {
      conditions.push('m.source = ?');
      params.push(filter.source);
    }
    if (filter.since) {
      conditions.push('m.created_at >= ?');
      params.push(filter.since.toISOString());
    }
    if (filter.skill) {
      conditions.push('EXISTS (SELECT 1 FROM memory_associations a WHERE a.entry_id = m.id AND a.skill = ?)');
      params.push(filter.skill);
    }
    if (cursor) {
      conditions.push('(m.created_at > ? OR (m.created_at = ? AND m.seq > ?))');
      params.push(cursor.createdAt, cursor.createdAt, cursor.seq);
    }

    params.push(pageSize);

    return this.storage.getDb().prepare(`
      SELECT m.* FROM memory_entries m
      WHERE ${conditions.join(' AND ')}
      ORDER BY m.created_at ASC, m.seq ASC
      LIMIT ?
    `).all(...params) as MemoryEntryRow[];
  }

  private rowToEntry(row: MemoryEntryRow): MemoryEntry {
    const skills = this.storage.getDb().prepare(
      'SELECT skill FROM memory_associations WHERE entry_id = ? ORDER BY skill'
    ).all(row.id) as Array<{ skill: string }>;

    if (!isMemorySource(row.source)) {
      throw new InvariantViolationError('known memory source', `entry ${row.id} has source "${row.source}"`);
    }

    return {
      id: row.id,
      source: row.source,
      content: row.content,
      importance: row.importance,
      createdAt: new Date(row.created_at),
      associations: skills.map(s => s.skill)
    };
  }
}
