/**
 * Autodidact - Self-directed learning agent
 *
 * Runs periodic learning cycles against research, video and vision
 * collaborators, keeping skills, memory, goals and a consciousness metric in
 * one SQLite database.
 */

// Core exports
export { LearningAgent } from './core/LearningAgent.js';
export type { LearningAgentOptions } from './core/LearningAgent.js';
export { getDefaultConfig, validateConfig, mergeConfig } from './core/config.js';
export type { AgentConfig, WikipediaConfig, YouTubeConfig, VisionConfig } from './core/config.js';
export {
  AutodidactError,
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  DecodeError,
  PersistenceError,
  InvariantViolationError,
  ConfigurationError,
  isCollaboratorError
} from './core/errors.js';

// Export enums as values (not just types)
export { MemorySource, MEMORY_SOURCES } from './core/types.js';

// Export interfaces as types
export type {
  SkillRecord,
  SkillDeltas,
  MemoryEntry,
  MemoryCandidate,
  MemoryInsertResult,
  MemoryFilter,
  ConsciousnessPoint,
  ConsciousnessMetric,
  ConsciousnessInputs,
  Goal,
  GoalStatus,
  StorageConfig
} from './core/types.js';

// Storage exports
export { SQLiteStorage } from './storage/SQLiteStorage.js';

// Learning stores
export { SkillRegistry, proportionalHeadroom } from './skills/SkillRegistry.js';
export type { SkillRegistryConfig, DiminishingReturns, StagedSkillUpdate } from './skills/SkillRegistry.js';
export { MemoryStore } from './memory/MemoryStore.js';
export type { MemoryStoreConfig, ImportanceDecayOptions } from './memory/MemoryStore.js';
export { contentHash, normalizeContent } from './memory/contentHash.js';
export { ConsciousnessTracker, WeightedConsciousnessFormula } from './consciousness/ConsciousnessTracker.js';
export type { ConsciousnessFormula, ConsciousnessTrackerConfig } from './consciousness/ConsciousnessTracker.js';
export { GoalManager } from './goals/GoalManager.js';
export type { GoalManagerConfig } from './goals/GoalManager.js';
export { Curriculum, DEFAULT_CURRICULUM_PATH } from './curriculum/Curriculum.js';
export type { CurriculumData } from './curriculum/Curriculum.js';
export { FollowUpQueue, DEFAULT_FOLLOW_UP_CONFIG } from './curriculum/FollowUpQueue.js';
export type { FollowUp, FollowUpQueueConfig } from './curriculum/FollowUpQueue.js';

// Scheduler exports
export { LearningCycleScheduler } from './scheduler/LearningCycleScheduler.js';
export type { SchedulerDependencies, Clock } from './scheduler/LearningCycleScheduler.js';
export { CycleStore } from './scheduler/CycleStore.js';
export { VolumeNoveltyStrategy } from './scheduler/SkillImpactStrategy.js';
export type { SkillImpactStrategy, AssessedCandidate, VolumeNoveltyConfig } from './scheduler/SkillImpactStrategy.js';
export { scoreVideo, rankVideos } from './scheduler/videoRanking.js';
export { CyclePhase, PHASE_ORDER, DEFAULT_SCHEDULER_CONFIG } from './scheduler/types.js';
export type {
  CycleOutcome,
  PhaseReport,
  PhaseResult,
  CycleTopic,
  TopicOrigin,
  CycleStats,
  CycleOptions,
  LearningCycle,
  SchedulerConfig,
  SchedulerStatus,
  SchedulerEvents,
  RunForeverOptions
} from './scheduler/types.js';

// Collaborators
export { withTimeout } from './collaborators/withTimeout.js';
export { WikipediaResearchCollaborator } from './collaborators/WikipediaResearchCollaborator.js';
export { YouTubeDiscoveryCollaborator } from './collaborators/YouTubeDiscoveryCollaborator.js';
export { OpenAIVisionCollaborator, parseVisionResponse } from './collaborators/OpenAIVisionCollaborator.js';
export type {
  CallOptions,
  SearchHit,
  ResearchCollaborator,
  VideoPlatform,
  VideoCandidate,
  VideoDiscoveryCollaborator,
  MediaRef,
  VisionAnalysis,
  VisionCollaborator,
  Collaborators
} from './collaborators/types.js';
