/**
 * Scheduler Types
 *
 * Type definitions for the learning-cycle state machine and its records.
 */

import type { Goal, SkillRecord } from '../core/types.js';

/**
 * Phases of one cycle, in execution order
 */
export enum CyclePhase {
  IDLE = 'idle',
  GATHERING = 'gathering',
  VIDEO_DISCOVERY = 'video_discovery',
  PROCESSING = 'processing',
  SKILL_UPDATE = 'skill_update',
  MEMORY_COMMIT = 'memory_commit',
  SELF_ASSESSMENT = 'self_assessment',
  GOAL_ADJUSTMENT = 'goal_adjustment'
}

export const PHASE_ORDER: readonly CyclePhase[] = [
  CyclePhase.GATHERING,
  CyclePhase.VIDEO_DISCOVERY,
  CyclePhase.PROCESSING,
  CyclePhase.SKILL_UPDATE,
  CyclePhase.MEMORY_COMMIT,
  CyclePhase.SELF_ASSESSMENT,
  CyclePhase.GOAL_ADJUSTMENT
];

export type CycleOutcome = 'success' | 'partial' | 'failed';

export type PhaseResult = CycleOutcome | 'skipped';

const OUTCOME_SEVERITY: Record<CycleOutcome, number> = {
  success: 0,
  partial: 1,
  failed: 2
};

/**
 * failed > partial > success
 */
export function worstOutcome(a: CycleOutcome, b: CycleOutcome): CycleOutcome {
  return OUTCOME_SEVERITY[a] >= OUTCOME_SEVERITY[b] ? a : b;
}

export interface PhaseReport {
  phase: CyclePhase;
  result: PhaseResult;
  startedAt: Date;
  endedAt: Date;
  detail?: string;
  errors: string[];
}

/**
 * Where a topic's query came from: the curriculum's rotation, the follow-up
 * queue, or a caller's free-text focus
 */
export type TopicOrigin = 'curriculum' | 'follow-up' | 'focus';

/**
 * One research query issued during Gathering
 */
export interface CycleTopic {
  skill: string;
  query: string;
  origin: TopicOrigin;
}

export interface CycleStats {
  hitsGathered: number;
  videosDiscovered: number;
  videosAnalyzed: number;
  candidates: number;
  entriesInserted: number;
  duplicates: number;
  skillsUpdated: number;
  followUpsQueued: number;
  consciousnessLevel: number | null;
}

export function emptyCycleStats(): CycleStats {
  return {
    hitsGathered: 0,
    videosDiscovered: 0,
    videosAnalyzed: 0,
    candidates: 0,
    entriesInserted: 0,
    duplicates: 0,
    skillsUpdated: 0,
    followUpsQueued: 0,
    consciousnessLevel: null
  };
}

/**
 * Cycle record. Written when the cycle starts and finalized when it returns
 * to Idle; never rewritten afterwards.
 */
export interface LearningCycle {
  cycleId: number;
  phase: CyclePhase;
  startedAt: Date;
  endedAt?: Date;
  outcome?: CycleOutcome;
  /** Skill or free-text topic the caller asked this cycle to study */
  focus?: string;
  topics: CycleTopic[];
  phases: PhaseReport[];
  stats: CycleStats;
}

export interface ImportanceDecaySettings {
  olderThanMs: number;
  factor: number;
  floor: number;
}

/**
 * Scheduler configuration
 */
export interface SchedulerConfig {
  /** Pause between cycle starts in runForever, in ms (default: 60000) */
  cycleIntervalMs: number;
  /** VideoDiscovery runs when cycleId % N == 0 (default: 3) */
  videoDiscoveryEvery: number;
  /** Research queries issued per cycle (default: 3) */
  queriesPerCycle: number;
  /** Search hits kept per query (default: 5) */
  maxHitsPerQuery: number;
  /** Follow-up queries raised per query from novel titled hits; 0 disables (default: 1) */
  followUpsPerQuery: number;
  /** Goal topics sent to video discovery (default: 1) */
  videoTopicsPerCycle: number;
  /** Top-ranked videos sent to vision analysis (default: 1) */
  videosAnalyzedPerCycle: number;
  /** Per-call timeouts in ms */
  researchTimeoutMs: number;
  videoTimeoutMs: number;
  visionTimeoutMs: number;
  /** A reflective entry is written every Nth cycle that learned something (default: 3) */
  reflectionInterval: number;
  /** Maintenance runs after every Nth finalized cycle (default: 10) */
  maintenanceInterval: number;
  /** Skill decay applied during maintenance; 0 disables it (default: 0) */
  skillDecayRate: number;
  importanceDecay: ImportanceDecaySettings;
}

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  cycleIntervalMs: 60000,
  videoDiscoveryEvery: 3,
  queriesPerCycle: 3,
  maxHitsPerQuery: 5,
  followUpsPerQuery: 1,
  videoTopicsPerCycle: 1,
  videosAnalyzedPerCycle: 1,
  researchTimeoutMs: 15000,
  videoTimeoutMs: 20000,
  visionTimeoutMs: 30000,
  reflectionInterval: 3,
  maintenanceInterval: 10,
  skillDecayRate: 0,
  importanceDecay: {
    olderThanMs: 30 * 24 * 60 * 60 * 1000,
    factor: 0.9,
    floor: 0.05
  }
};

export interface CycleOptions {
  /**
   * Study this instead of the usual goal and weak-skill selection. A skill
   * name or label researches that skill's queries; any other text is
   * researched as given.
   */
  focus?: string;
}

export interface RunForeverOptions extends CycleOptions {
  intervalMs?: number;
  maxCycles?: number;
}

/**
 * Read-only view for status reporting; never waits on a running cycle
 */
export interface SchedulerStatus {
  /** Last finalized cycle (0 before the first one) */
  currentCycleId: number;
  lastOutcome: CycleOutcome | null;
  cycleInProgress: number | null;
  consciousnessLevel: number;
  activeGoals: Goal[];
  skillSnapshot: SkillRecord[];
  memoryCount: number;
}

/**
 * Events emitted by LearningCycleScheduler
 */
export interface SchedulerEvents {
  'cycle:started': { cycle: LearningCycle };
  'phase:entered': { cycleId: number; phase: CyclePhase };
  'phase:completed': { cycleId: number; report: PhaseReport };
  'cycle:completed': { cycle: LearningCycle };
  'cycle:error': { error: Error; context: string };
  'maintenance': { cycleId: number; skillsDecayed: number; entriesDecayed: number };
  'stopped': { reason: string };
}
