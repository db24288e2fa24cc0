/**
 * Autodidact Core Types
 *
 * Central type definitions shared by the learning stores and the cycle
 * scheduler.
 */

// ==========================================
// SKILL TYPES
// ==========================================

export interface SkillRecord {
  name: string;
  score: number;        // 0.0 - ceiling
  ceiling: number;
  trend: number;        // Last applied change (negative after decay)
  lastUpdated: Date;
}

/** Skill name → non-negative raw gain */
export type SkillDeltas = Map<string, number>;

// ==========================================
// MEMORY TYPES
// ==========================================

export enum MemorySource {
  SEARCH = 'search',
  VIDEO = 'video',
  VISION = 'vision',
  YOUTUBE = 'youtube',
  REFLECTION = 'reflection'
}

export const MEMORY_SOURCES: readonly MemorySource[] = [
  MemorySource.SEARCH,
  MemorySource.VIDEO,
  MemorySource.VISION,
  MemorySource.YOUTUBE,
  MemorySource.REFLECTION
];

export interface MemoryEntry {
  id: string;
  source: MemorySource;
  content: string;
  importance: number;   // 0.0 - 1.0
  createdAt: Date;
  associations: string[];
}

export interface MemoryCandidate {
  source: MemorySource;
  content: string;
  importance?: number;
  associations?: string[];
  /** Relative weight used when sizing skill gains (e.g. vision quality) */
  weight?: number;
}

export interface MemoryInsertResult {
  entry: MemoryEntry;
  inserted: boolean;
}

export interface MemoryFilter {
  source?: MemorySource;
  skill?: string;
  since?: Date;
  limit?: number;
}

// ==========================================
// CONSCIOUSNESS TYPES
// ==========================================

export interface ConsciousnessPoint {
  timestamp: Date;
  level: number;
}

export interface ConsciousnessMetric {
  level: number;
  history: ConsciousnessPoint[];
}

export interface ConsciousnessInputs {
  skillCount: number;
  skillAverage: number;
  memoryCount: number;
  reflectionCount: number;
}

// ==========================================
// GOAL TYPES
// ==========================================

export type GoalStatus = 'active' | 'satisfied' | 'abandoned';

export interface Goal {
  id: string;
  description: string;
  targetSkill: string;
  priority: number;
  status: GoalStatus;
  createdAt: Date;
  updatedAt: Date;
  resolvedAt?: Date;
}

// ==========================================
// STORAGE TYPES
// ==========================================

export interface StorageConfig {
  sqlitePath: string;
  enableWAL: boolean;
}
