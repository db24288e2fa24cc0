/**
 * ConsciousnessTracker
 *
 * Derives the reported "awareness" scalar from skill and memory state.
 * Purely a metric: nothing in the scheduler branches on it.
 */

import type { SQLiteStorage } from '../storage/SQLiteStorage.js';
import type { SkillRegistry } from '../skills/SkillRegistry.js';
import type { MemoryStore } from '../memory/MemoryStore.js';
import type {
  ConsciousnessInputs,
  ConsciousnessMetric,
  ConsciousnessPoint
} from '../core/types.js';

/**
 * Swappable derivation. Implementations must be deterministic and
 * non-decreasing in every input.
 */
export interface ConsciousnessFormula {
  compute(inputs: ConsciousnessInputs): number;
}

export interface WeightedFormulaConfig {
  weights: {
    breadth: number;
    average: number;
    memory: number;
    reflection: number;
  };
  /** Count at which a saturating term reaches half its weight */
  halfSaturation: {
    breadth: number;
    memory: number;
    reflection: number;
  };
  /** Skill average that earns the full average weight */
  averageReference: number;
}

export const DEFAULT_WEIGHTED_FORMULA_CONFIG: WeightedFormulaConfig = {
  weights: { breadth: 0.3, average: 0.4, memory: 0.2, reflection: 0.1 },
  halfSaturation: { breadth: 20, memory: 500, reflection: 50 },
  averageReference: 1.0
};

function saturate(value: number, half: number): number {
  if (value <= 0) return 0;
  return value / (value + half);
}

/**
 * Weighted sum of normalized sub-terms. With the default weights the level
 * lies in [0, 1].
 */
export class WeightedConsciousnessFormula implements ConsciousnessFormula {
  private config: WeightedFormulaConfig;

  constructor(config: Partial<WeightedFormulaConfig> = {}) {
    this.config = { ...DEFAULT_WEIGHTED_FORMULA_CONFIG, ...config };
  }

  compute(inputs: ConsciousnessInputs): number {
    const { weights, halfSaturation, averageReference } = this.config;
    const average = averageReference > 0
      ? Math.min(1, Math.max(0, inputs.skillAverage / averageReference))
      : 0;

    return (
      weights.breadth * saturate(inputs.skillCount, halfSaturation.breadth) +
      weights.average * average +
      weights.memory * saturate(inputs.memoryCount, halfSaturation.memory) +
      weights.reflection * saturate(inputs.reflectionCount, halfSaturation.reflection)
    );
  }
}

export interface ConsciousnessTrackerConfig {
  /** Minimum change before a new history point is recorded (default: 0.001) */
  epsilon: number;
  /** Most recent history points returned with a metric (default: 100) */
  historyWindow: number;
  formula: ConsciousnessFormula;
}

export const DEFAULT_CONSCIOUSNESS_CONFIG: ConsciousnessTrackerConfig = {
  epsilon: 0.001,
  historyWindow: 100,
  formula: new WeightedConsciousnessFormula()
};

interface HistoryRow {
  timestamp: string;
  level: number;
}

export class ConsciousnessTracker {
  private storage: SQLiteStorage;
  private skills: SkillRegistry;
  private memory: MemoryStore;
  private config: ConsciousnessTrackerConfig;
  private lastRecorded: number | null;

  constructor(
    storage: SQLiteStorage,
    skills: SkillRegistry,
    memory: MemoryStore,
    config: Partial<ConsciousnessTrackerConfig> = {}
  ) {
    this.storage = storage;
    this.skills = skills;
    this.memory = memory;
    this.config = { ...DEFAULT_CONSCIOUSNESS_CONFIG, ...config };

    const last = this.storage.getDb().prepare(
      'SELECT level FROM consciousness_history ORDER BY seq DESC LIMIT 1'
    ).get() as { level: number } | undefined;
    this.lastRecorded = last?.level ?? null;
  }

  inputs(): ConsciousnessInputs {
    return {
      skillCount: this.skills.count(),
      skillAverage: this.skills.average(),
      memoryCount: this.memory.count(),
      reflectionCount: this.memory.countReflections()
    };
  }

  /**
   * Recompute the level from current state. A history point is appended only
   * when the level moved by more than epsilon since the last recorded point.
   */
  recompute(now: Date = new Date()): ConsciousnessMetric {
    const level = this.config.formula.compute(this.inputs());

    if (this.lastRecorded === null || Math.abs(level - this.lastRecorded) > this.config.epsilon) {
      this.storage.transaction('consciousness history', () => {
        this.storage.getDb().prepare(
          'INSERT INTO consciousness_history (timestamp, level) VALUES (?, ?)'
        ).run(now.toISOString(), level);
      });
      this.lastRecorded = level;
    }

    return { level, history: this.history(this.config.historyWindow) };
  }

  /**
   * Level of the committed state plus the recent history window. Never
   * writes; history only grows through recompute.
   */
  current(): ConsciousnessMetric {
    return {
      level: this.config.formula.compute(this.inputs()),
      history: this.history(this.config.historyWindow)
    };
  }

  /**
   * History in chronological order, optionally only the most recent `limit` points
   */
  history(limit?: number): ConsciousnessPoint[] {
    const db = this.storage.getDb();
    const rows = limit === undefined
      ? db.prepare('SELECT timestamp, level FROM consciousness_history ORDER BY seq ASC').all() as HistoryRow[]
      : (db.prepare(
          'SELECT timestamp, level FROM consciousness_history ORDER BY seq DESC LIMIT ?'
        ).all(limit) as HistoryRow[]).reverse();

    return rows.map(row => ({ timestamp: new Date(row.timestamp), level: row.level }));
  }
}
