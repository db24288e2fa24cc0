/**
 * Learning Agent
 *
 * Facade that wires storage, the learning stores, the collaborators and the
 * cycle scheduler together from one AgentConfig.
 */

import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import { SkillRegistry } from '../skills/SkillRegistry.js';
import { MemoryStore } from '../memory/MemoryStore.js';
import { ConsciousnessTracker } from '../consciousness/ConsciousnessTracker.js';
import { GoalManager } from '../goals/GoalManager.js';
import { Curriculum } from '../curriculum/Curriculum.js';
import { FollowUpQueue } from '../curriculum/FollowUpQueue.js';
import { CycleStore } from '../scheduler/CycleStore.js';
import { LearningCycleScheduler, type Clock } from '../scheduler/LearningCycleScheduler.js';
import type { SkillImpactStrategy } from '../scheduler/SkillImpactStrategy.js';
import type { CycleOptions, LearningCycle, RunForeverOptions, SchedulerStatus } from '../scheduler/types.js';
import { WikipediaResearchCollaborator } from '../collaborators/WikipediaResearchCollaborator.js';
import { YouTubeDiscoveryCollaborator } from '../collaborators/YouTubeDiscoveryCollaborator.js';
import { OpenAIVisionCollaborator } from '../collaborators/OpenAIVisionCollaborator.js';
import type { Collaborators } from '../collaborators/types.js';
import { getDefaultConfig, mergeConfig, validateConfig, type AgentConfig } from './config.js';
import { ConfigurationError } from './errors.js';
import type { Goal, MemoryEntry, MemoryFilter } from './types.js';

export interface LearningAgentOptions {
  config?: Partial<AgentConfig>;
  /** Replace individual collaborators; `video: undefined` disables one */
  collaborators?: Partial<Collaborators>;
  curriculum?: Curriculum;
  skillImpact?: SkillImpactStrategy;
  clock?: Clock;
}

export class LearningAgent {
  private config: AgentConfig;
  private storage: SQLiteStorage;
  private skills: SkillRegistry;
  private memory: MemoryStore;
  private consciousness: ConsciousnessTracker;
  private goals: GoalManager;
  private curriculum: Curriculum;
  private followUps: FollowUpQueue;
  private cycles: CycleStore;
  private scheduler: LearningCycleScheduler;
  private initialized: boolean = false;

  constructor(options: LearningAgentOptions = {}) {
    const defaultConfig = getDefaultConfig();
    this.config = options.config ? mergeConfig(defaultConfig, options.config) : defaultConfig;

    const errors = validateConfig(this.config);
    if (errors.length > 0) {
      throw new ConfigurationError(errors);
    }

    this.curriculum = options.curriculum ?? Curriculum.load(this.config.curriculumPath);
    this.storage = new SQLiteStorage(this.config.storageConfig);
    this.skills = new SkillRegistry(this.storage, { defaultCeiling: this.config.skillCeiling });
    this.memory = new MemoryStore(this.storage);
    this.consciousness = new ConsciousnessTracker(this.storage, this.skills, this.memory);
    this.goals = new GoalManager(this.storage, this.skills, this.config.goals);
    this.followUps = new FollowUpQueue(this.storage, this.config.followUps);
    this.cycles = new CycleStore(this.storage);

    this.scheduler = new LearningCycleScheduler(
      {
        skills: this.skills,
        memory: this.memory,
        consciousness: this.consciousness,
        goals: this.goals,
        curriculum: this.curriculum,
        followUps: this.followUps,
        cycles: this.cycles,
        collaborators: this.buildCollaborators(options.collaborators ?? {}),
        skillImpact: options.skillImpact,
        clock: options.clock
      },
      this.config.scheduler
    );
  }

  private buildCollaborators(overrides: Partial<Collaborators>): Collaborators {
    const research = overrides.research ?? new WikipediaResearchCollaborator(this.config.wikipedia);

    const video = 'video' in overrides
      ? overrides.video
      : this.config.youtube.apiKey ? new YouTubeDiscoveryCollaborator(this.config.youtube) : undefined;

    const vision = 'vision' in overrides
      ? overrides.vision
      : this.config.vision.apiKey ? new OpenAIVisionCollaborator(this.config.vision) : undefined;

    if (!video) {
      console.log('[LearningAgent] No video collaborator (set YOUTUBE_API_KEY to enable)');
    }
    if (!vision) {
      console.log('[LearningAgent] No vision collaborator (set OPENAI_API_KEY to enable)');
    }

    return { research, video, vision };
  }

  /**
   * Recover interrupted cycles and seed skills
   */
  initialize(): void {
    if (this.initialized) return;
    this.scheduler.initialize();
    this.initialized = true;
  }

  runCycle(options: CycleOptions = {}): Promise<LearningCycle> {
    this.initialize();
    return this.scheduler.runCycle(options);
  }

  runForever(options: RunForeverOptions = {}): Promise<number> {
    this.initialize();
    return this.scheduler.runForever(options);
  }

  stop(reason?: string): Promise<void> {
    return this.scheduler.stop(reason);
  }

  status(): SchedulerStatus {
    this.initialize();
    return this.scheduler.status();
  }

  queryMemory(filter: MemoryFilter = {}): Iterable<MemoryEntry> {
    return this.scheduler.queryMemory(filter);
  }

  /**
   * Manually set a goal for a known skill
   */
  proposeGoal(skill: string, description?: string): Goal {
    this.initialize();
    if (!this.skills.get(skill)) {
      throw new ConfigurationError([`unknown skill "${skill}"`]);
    }
    return this.goals.proposeGoal(skill, description ?? this.curriculum.describeGoal(skill));
  }

  /**
   * Stop any running loop, then release the database
   */
  async close(): Promise<void> {
    await this.scheduler.stop('Agent closing');
    this.storage.close();
    this.initialized = false;
  }

  getScheduler(): LearningCycleScheduler {
    return this.scheduler;
  }

  getSkills(): SkillRegistry {
    return this.skills;
  }

  getMemory(): MemoryStore {
    return this.memory;
  }

  getGoals(): GoalManager {
    return this.goals;
  }

  getConsciousness(): ConsciousnessTracker {
    return this.consciousness;
  }

  getCycles(): CycleStore {
    return this.cycles;
  }

  getFollowUps(): FollowUpQueue {
    return this.followUps;
  }

  getCurriculum(): Curriculum {
    return this.curriculum;
  }

  getConfig(): AgentConfig {
    return { ...this.config };
  }
}
