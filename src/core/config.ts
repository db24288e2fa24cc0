/**
 * Configuration
 *
 * Default configuration and environment variable loading for the agent.
 */

import { config as loadDotenv } from 'dotenv';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import type { StorageConfig } from './types.js';
import { DEFAULT_CURRICULUM_PATH } from '../curriculum/Curriculum.js';
import { DEFAULT_SCHEDULER_CONFIG, type SchedulerConfig } from '../scheduler/types.js';
import { DEFAULT_GOAL_MANAGER_CONFIG, type GoalManagerConfig } from '../goals/GoalManager.js';
import { DEFAULT_FOLLOW_UP_CONFIG, type FollowUpQueueConfig } from '../curriculum/FollowUpQueue.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

// Project root is two levels up from src/core/ or dist/core/
const projectRoot = join(__dirname, '..', '..');
loadDotenv({ path: join(projectRoot, '.env') });

export interface WikipediaConfig {
  /** Wiki host, e.g. en.wikipedia.org */
  host: string;
}

export interface YouTubeConfig {
  apiKey?: string;
  maxResults: number;
}

export interface VisionConfig {
  apiKey?: string;
  model: string;
  maxTokens: number;
}

export interface AgentConfig {
  dataDir: string;
  storageConfig: StorageConfig;
  curriculumPath: string;
  scheduler: SchedulerConfig;
  goals: GoalManagerConfig;
  followUps: FollowUpQueueConfig;
  /** Upper bound for every skill score */
  skillCeiling: number;
  wikipedia: WikipediaConfig;
  youtube: YouTubeConfig;
  vision: VisionConfig;
}

function intFromEnv(name: string, fallback: number): number {
  return parseInt(process.env[name] ?? String(fallback), 10);
}

function floatFromEnv(name: string, fallback: number): number {
  return parseFloat(process.env[name] ?? String(fallback));
}

/**
 * Environment variables:
 * - AUTODIDACT_DATA_DIR: directory holding the SQLite file (default: ./data)
 * - AUTODIDACT_CURRICULUM: curriculum JSON path (default: bundled data/curriculum.json)
 * - AUTODIDACT_CYCLE_INTERVAL_MS: pause between cycle starts (default: 60000)
 * - AUTODIDACT_VIDEO_EVERY: run video discovery every N cycles (default: 3)
 * - AUTODIDACT_QUERIES_PER_CYCLE: research queries per cycle (default: 3)
 * - AUTODIDACT_FOLLOW_UPS_PER_QUERY: follow-up queries raised per query (default: 1)
 * - AUTODIDACT_MAX_FOLLOW_UPS: pending follow-ups kept per skill (default: 5)
 * - AUTODIDACT_SEARCH_TIMEOUT_MS / _VIDEO_TIMEOUT_MS / _VISION_TIMEOUT_MS
 * - AUTODIDACT_MAINTENANCE_INTERVAL: cycles between maintenance passes (default: 10)
 * - AUTODIDACT_SKILL_DECAY: skill decay rate per maintenance pass (default: 0)
 * - AUTODIDACT_MAX_GOALS: active goal limit (default: 3)
 * - AUTODIDACT_WIKI_HOST: wiki used for research (default: en.wikipedia.org)
 * - YOUTUBE_API_KEY: enables video discovery
 * - OPENAI_API_KEY: enables vision analysis
 * - AUTODIDACT_VISION_MODEL: vision model (default: gpt-4o-mini)
 */
export function getDefaultConfig(dataDir?: string): AgentConfig {
  const baseDir = dataDir ?? process.env.AUTODIDACT_DATA_DIR ?? './data';

  const scheduler: SchedulerConfig = {
    ...DEFAULT_SCHEDULER_CONFIG,
    cycleIntervalMs: intFromEnv('AUTODIDACT_CYCLE_INTERVAL_MS', DEFAULT_SCHEDULER_CONFIG.cycleIntervalMs),
    videoDiscoveryEvery: intFromEnv('AUTODIDACT_VIDEO_EVERY', DEFAULT_SCHEDULER_CONFIG.videoDiscoveryEvery),
    queriesPerCycle: intFromEnv('AUTODIDACT_QUERIES_PER_CYCLE', DEFAULT_SCHEDULER_CONFIG.queriesPerCycle),
    followUpsPerQuery: intFromEnv('AUTODIDACT_FOLLOW_UPS_PER_QUERY', DEFAULT_SCHEDULER_CONFIG.followUpsPerQuery),
    researchTimeoutMs: intFromEnv('AUTODIDACT_SEARCH_TIMEOUT_MS', DEFAULT_SCHEDULER_CONFIG.researchTimeoutMs),
    videoTimeoutMs: intFromEnv('AUTODIDACT_VIDEO_TIMEOUT_MS', DEFAULT_SCHEDULER_CONFIG.videoTimeoutMs),
    visionTimeoutMs: intFromEnv('AUTODIDACT_VISION_TIMEOUT_MS', DEFAULT_SCHEDULER_CONFIG.visionTimeoutMs),
    maintenanceInterval: intFromEnv('AUTODIDACT_MAINTENANCE_INTERVAL', DEFAULT_SCHEDULER_CONFIG.maintenanceInterval),
    skillDecayRate: floatFromEnv('AUTODIDACT_SKILL_DECAY', DEFAULT_SCHEDULER_CONFIG.skillDecayRate)
  };

  return {
    dataDir: baseDir,
    storageConfig: {
      sqlitePath: join(baseDir, 'autodidact.db'),
      enableWAL: true
    },
    curriculumPath: process.env.AUTODIDACT_CURRICULUM ?? DEFAULT_CURRICULUM_PATH,
    scheduler,
    goals: {
      ...DEFAULT_GOAL_MANAGER_CONFIG,
      maxActiveGoals: intFromEnv('AUTODIDACT_MAX_GOALS', DEFAULT_GOAL_MANAGER_CONFIG.maxActiveGoals)
    },
    followUps: {
      maxPerSkill: intFromEnv('AUTODIDACT_MAX_FOLLOW_UPS', DEFAULT_FOLLOW_UP_CONFIG.maxPerSkill)
    },
    skillCeiling: 1.0,
    wikipedia: {
      host: process.env.AUTODIDACT_WIKI_HOST ?? 'en.wikipedia.org'
    },
    youtube: {
      apiKey: process.env.YOUTUBE_API_KEY || undefined,
      maxResults: 10
    },
    vision: {
      apiKey: process.env.OPENAI_API_KEY || undefined,
      model: process.env.AUTODIDACT_VISION_MODEL ?? 'gpt-4o-mini',
      maxTokens: 500
    }
  };
}

export function validateConfig(config: AgentConfig): string[] {
  const errors: string[] = [];
  const { scheduler } = config;

  const positiveIntegers: Array<[string, number]> = [
    ['scheduler.cycleIntervalMs', scheduler.cycleIntervalMs],
    ['scheduler.videoDiscoveryEvery', scheduler.videoDiscoveryEvery],
    ['scheduler.queriesPerCycle', scheduler.queriesPerCycle],
    ['scheduler.maxHitsPerQuery', scheduler.maxHitsPerQuery],
    ['scheduler.researchTimeoutMs', scheduler.researchTimeoutMs],
    ['scheduler.videoTimeoutMs', scheduler.videoTimeoutMs],
    ['scheduler.visionTimeoutMs', scheduler.visionTimeoutMs],
    ['scheduler.reflectionInterval', scheduler.reflectionInterval],
    ['scheduler.maintenanceInterval', scheduler.maintenanceInterval],
    ['goals.maxActiveGoals', config.goals.maxActiveGoals]
  ];
  for (const [name, value] of positiveIntegers) {
    if (!Number.isInteger(value) || value <= 0) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  const counts: Array<[string, number]> = [
    ['scheduler.videoTopicsPerCycle', scheduler.videoTopicsPerCycle],
    ['scheduler.videosAnalyzedPerCycle', scheduler.videosAnalyzedPerCycle],
    ['scheduler.followUpsPerQuery', scheduler.followUpsPerQuery],
    ['followUps.maxPerSkill', config.followUps.maxPerSkill]
  ];
  for (const [name, value] of counts) {
    if (!Number.isInteger(value) || value < 0) {
      errors.push(`${name} must be a non-negative integer`);
    }
  }

  if (!(scheduler.skillDecayRate >= 0 && scheduler.skillDecayRate < 1)) {
    errors.push('scheduler.skillDecayRate must be in [0, 1)');
  }

  const decay = scheduler.importanceDecay;
  if (!(decay.factor > 0 && decay.factor <= 1)) {
    errors.push('scheduler.importanceDecay.factor must be in (0, 1]');
  }
  if (!(decay.floor >= 0 && decay.floor <= 1)) {
    errors.push('scheduler.importanceDecay.floor must be between 0 and 1');
  }
  if (!(decay.olderThanMs >= 0)) {
    errors.push('scheduler.importanceDecay.olderThanMs must not be negative');
  }

  if (!(config.goals.satisfactionThreshold > 0 && config.goals.satisfactionThreshold <= 1)) {
    errors.push('goals.satisfactionThreshold must be in (0, 1]');
  }

  if (!(config.skillCeiling > 0)) {
    errors.push('skillCeiling must be positive');
  }

  return errors;
}

export function mergeConfig(base: AgentConfig, overrides: Partial<AgentConfig>): AgentConfig {
  return {
    ...base,
    ...overrides,
    storageConfig: { ...base.storageConfig, ...overrides.storageConfig },
    scheduler: { ...base.scheduler, ...overrides.scheduler },
    goals: { ...base.goals, ...overrides.goals },
    followUps: { ...base.followUps, ...overrides.followUps },
    wikipedia: { ...base.wikipedia, ...overrides.wikipedia },
    youtube: { ...base.youtube, ...overrides.youtube },
    vision: { ...base.vision, ...overrides.vision }
  };
}
