/**
 * LearningCycleScheduler
 *
 * Drives the learning loop: Gathering → VideoDiscovery (every Nth cycle) →
 * Processing → SkillUpdate → MemoryCommit → SelfAssessment → GoalAdjustment,
 * then back to Idle. Exactly one cycle runs at a time.
 *
 * Collaborator failures degrade a cycle to partial or failed but never abort
 * the loop. A persistence failure skips the remaining phases of that cycle.
 * SkillUpdate only stages new scores; MemoryCommit writes them together with
 * the cycle's memory and follow-up queries in one transaction.
 */

import { EventEmitter } from 'events';
import type { SkillRegistry, StagedSkillUpdate } from '../skills/SkillRegistry.js';
import type { MemoryStore } from '../memory/MemoryStore.js';
import type { ConsciousnessTracker } from '../consciousness/ConsciousnessTracker.js';
import type { GoalManager } from '../goals/GoalManager.js';
import type { Curriculum } from '../curriculum/Curriculum.js';
import type { FollowUp, FollowUpQueue } from '../curriculum/FollowUpQueue.js';
import type { Collaborators, SearchHit, VisionAnalysis } from '../collaborators/types.js';
import { withTimeout } from '../collaborators/withTimeout.js';
import { contentHash } from '../memory/contentHash.js';
import {
  ConfigurationError,
  InvariantViolationError,
  PersistenceError,
  isCollaboratorError
} from '../core/errors.js';
import {
  MemorySource,
  type MemoryCandidate,
  type MemoryEntry,
  type MemoryFilter,
  type SkillDeltas
} from '../core/types.js';
import { CycleLock } from './CycleLock.js';
import type { CycleStore } from './CycleStore.js';
import { VolumeNoveltyStrategy, type AssessedCandidate, type SkillImpactStrategy } from './SkillImpactStrategy.js';
import { rankVideos, type RankedVideo } from './videoRanking.js';
import {
  CyclePhase,
  PHASE_ORDER,
  DEFAULT_SCHEDULER_CONFIG,
  emptyCycleStats,
  worstOutcome,
  type CycleOptions,
  type CycleOutcome,
  type CycleTopic,
  type LearningCycle,
  type PhaseReport,
  type RunForeverOptions,
  type SchedulerConfig,
  type SchedulerStatus
} from './types.js';

export type Clock = () => Date;

export interface SchedulerDependencies {
  skills: SkillRegistry;
  memory: MemoryStore;
  consciousness: ConsciousnessTracker;
  goals: GoalManager;
  curriculum: Curriculum;
  followUps: FollowUpQueue;
  cycles: CycleStore;
  collaborators: Collaborators;
  skillImpact?: SkillImpactStrategy;
  clock?: Clock;
}

interface PhaseOutcome {
  result: CycleOutcome;
  detail?: string;
  errors?: string[];
}

interface StudiedVideo {
  topic: CycleTopic;
  ranked: RankedVideo;
  analysis?: VisionAnalysis;
}

/**
 * Working state of one cycle; discarded when the cycle finalizes
 */
interface CycleWork {
  cycle: LearningCycle;
  /** stop() calls seen when the cycle was requested */
  epoch: number;
  hits: Array<{ topic: CycleTopic; hit: SearchHit }>;
  videos: StudiedVideo[];
  assessed: AssessedCandidate[];
  deltas: SkillDeltas;
  skillUpdate: StagedSkillUpdate | null;
  followUps: FollowUp[];
  fatal: Error | null;
  stopped: boolean;
}

function describeError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

function normalizeFocus(focus: string | undefined): string | undefined {
  if (focus === undefined) return undefined;
  const text = focus.replace(/\s+/g, ' ').trim();
  if (text.length === 0) {
    throw new ConfigurationError(['focus must not be empty']);
  }
  return text;
}

export class LearningCycleScheduler extends EventEmitter {
  private config: SchedulerConfig;
  private skills: SkillRegistry;
  private memory: MemoryStore;
  private consciousness: ConsciousnessTracker;
  private goals: GoalManager;
  private curriculum: Curriculum;
  private followUps: FollowUpQueue;
  private cycles: CycleStore;
  private collaborators: Collaborators;
  private skillImpact: SkillImpactStrategy;
  private clock: Clock;

  private lock = new CycleLock();
  private initialized = false;
  private lastFinalized: LearningCycle | null = null;
  private inProgress: LearningCycle | null = null;
  private looping = false;
  private stopRequested = false;
  private stopEpoch = 0;
  private wake: (() => void) | null = null;

  constructor(deps: SchedulerDependencies, config: Partial<SchedulerConfig> = {}) {
    super();
    this.config = { ...DEFAULT_SCHEDULER_CONFIG, ...config };
    this.skills = deps.skills;
    this.memory = deps.memory;
    this.consciousness = deps.consciousness;
    this.goals = deps.goals;
    this.curriculum = deps.curriculum;
    this.followUps = deps.followUps;
    this.cycles = deps.cycles;
    this.collaborators = deps.collaborators;
    this.skillImpact = deps.skillImpact ?? new VolumeNoveltyStrategy();
    this.clock = deps.clock ?? (() => new Date());
  }

  /**
   * Close out cycles a crash left open, seed the curriculum's skills, and
   * load the last finalized cycle. Safe to call more than once.
   */
  initialize(): void {
    if (this.initialized) return;

    const now = this.clock();
    this.cycles.recoverInterrupted(now);
    this.skills.ensureSkills(this.curriculum.skillNames(), this.curriculum.seedScore, now);
    this.lastFinalized = this.cycles.lastFinalized();
    this.initialized = true;

    console.log(`[LearningScheduler] Initialized at cycle ${this.lastFinalized?.cycleId ?? 0}`);
  }

  // ==========================================
  // CONTROL
  // ==========================================

  /**
   * Run one full cycle. Concurrent callers are queued, never interleaved.
   *
   * @throws ConfigurationError when `focus` is blank
   * @throws InvariantViolationError after the offending cycle is finalized as failed
   * @throws PersistenceError when the cycle record itself cannot be created
   */
  async runCycle(options: CycleOptions = {}): Promise<LearningCycle> {
    const focus = normalizeFocus(options.focus);
    const epoch = this.stopEpoch;
    return this.lock.runExclusive(() => this.executeCycle(epoch, focus));
  }

  /**
   * Run cycles until stop() is called or `maxCycles` complete. The interval
   * is measured from the start of each cycle.
   *
   * @returns Number of cycles run
   */
  async runForever(options: RunForeverOptions = {}): Promise<number> {
    if (this.looping) {
      throw new Error('runForever is already active');
    }

    const intervalMs = options.intervalMs ?? this.config.cycleIntervalMs;
    const focus = normalizeFocus(options.focus);
    this.looping = true;
    this.stopRequested = false;
    let completed = 0;

    try {
      while (!this.stopRequested) {
        if (options.maxCycles !== undefined && completed >= options.maxCycles) break;

        const startedAt = Date.now();
        try {
          await this.runCycle({ focus });
        } catch (error) {
          if (error instanceof InvariantViolationError) throw error;
          const err = describeError(error);
          console.error(`[LearningScheduler] Cycle could not run: ${err.message}`);
          this.emit('cycle:error', { error: err, context: 'runForever' });
        }
        completed++;

        if (this.stopRequested) break;
        if (options.maxCycles !== undefined && completed >= options.maxCycles) break;

        await this.sleep(Math.max(0, intervalMs - (Date.now() - startedAt)));
      }
    } finally {
      this.looping = false;
    }

    return completed;
  }

  /**
   * Ask the loop to stop. A running cycle finishes its current phase, skips
   * the rest and is finalized as partial; cycles already queued behind it are
   * finalized as partial without running a phase. Resolves once all have.
   * Cycles requested after this call run normally.
   */
  async stop(reason: string = 'Manual stop'): Promise<void> {
    this.stopRequested = true;
    this.stopEpoch++;
    this.wake?.();

    await this.lock.idle();
    this.emit('stopped', { reason });
  }

  isRunning(): boolean {
    return this.looping || this.lock.isHeld();
  }

  // ==========================================
  // READS (never wait for a running cycle)
  // ==========================================

  status(): SchedulerStatus {
    return {
      currentCycleId: this.lastFinalized?.cycleId ?? 0,
      lastOutcome: this.lastFinalized?.outcome ?? null,
      cycleInProgress: this.inProgress?.cycleId ?? null,
      consciousnessLevel: this.consciousness.current().level,
      activeGoals: this.goals.activeGoals(),
      skillSnapshot: this.skills.snapshot(),
      memoryCount: this.memory.count()
    };
  }

  queryMemory(filter: MemoryFilter = {}): Iterable<MemoryEntry> {
    return this.memory.query(filter);
  }

  getConfig(): SchedulerConfig {
    return { ...this.config };
  }

  // ==========================================
  // CYCLE EXECUTION
  // ==========================================

  private async executeCycle(epoch: number, focus: string | undefined): Promise<LearningCycle> {
    this.initialize();

    const cycle: LearningCycle = {
      cycleId: this.cycles.nextCycleId(),
      phase: CyclePhase.GATHERING,
      startedAt: this.clock(),
      focus,
      topics: [],
      phases: [],
      stats: emptyCycleStats()
    };

    this.cycles.begin(cycle);
    this.inProgress = cycle;
    this.emit('cycle:started', { cycle });
    console.log(`[LearningScheduler] Cycle #${cycle.cycleId} started`);

    const work: CycleWork = {
      cycle,
      epoch,
      hits: [],
      videos: [],
      assessed: [],
      deltas: new Map(),
      skillUpdate: null,
      followUps: [],
      fatal: null,
      stopped: false
    };

    try {
      for (const phase of PHASE_ORDER) {
        const skipReason = this.skipReason(work, phase);
        if (skipReason !== null) {
          this.recordSkip(work, phase, skipReason);
          continue;
        }
        await this.runPhase(work, phase);
      }
    } finally {
      this.inProgress = null;
    }

    this.finalize(work);

    if (work.fatal instanceof InvariantViolationError) {
      throw work.fatal;
    }
    return cycle;
  }

  private skipReason(work: CycleWork, phase: CyclePhase): string | null {
    if (work.fatal) {
      return `skipped after ${work.fatal.name}`;
    }
    if (this.stopEpoch !== work.epoch) {
      work.stopped = true;
      return 'stop requested';
    }
    if (phase === CyclePhase.VIDEO_DISCOVERY) {
      if (work.cycle.cycleId % this.config.videoDiscoveryEvery !== 0) {
        return 'not scheduled this cycle';
      }
      if (!this.collaborators.video) {
        return 'no video collaborator configured';
      }
    }
    return null;
  }

  private recordSkip(work: CycleWork, phase: CyclePhase, reason: string): void {
    const now = this.clock();
    const report: PhaseReport = { phase, result: 'skipped', startedAt: now, endedAt: now, detail: reason, errors: [] };
    work.cycle.phases.push(report);
    this.emit('phase:completed', { cycleId: work.cycle.cycleId, report });
  }

  private async runPhase(work: CycleWork, phase: CyclePhase): Promise<void> {
    const cycleId = work.cycle.cycleId;
    const startedAt = this.clock();
    work.cycle.phase = phase;
    this.emit('phase:entered', { cycleId, phase });

    let outcome: PhaseOutcome;
    try {
      outcome = await this.executePhase(work, phase);
    } catch (error) {
      const err = describeError(error);
      work.fatal = err;
      outcome = { result: 'failed', errors: [err.message] };
      console.error(`[LearningScheduler] Cycle #${cycleId} ${phase} failed: ${err.message}`);
      this.emit('cycle:error', { error: err, context: `${phase} of cycle ${cycleId}` });
    }

    const report: PhaseReport = {
      phase,
      result: outcome.result,
      startedAt,
      endedAt: this.clock(),
      detail: outcome.detail,
      errors: outcome.errors ?? []
    };
    work.cycle.phases.push(report);
    this.emit('phase:completed', { cycleId, report });
  }

  private executePhase(work: CycleWork, phase: CyclePhase): Promise<PhaseOutcome> {
    switch (phase) {
      case CyclePhase.GATHERING:
        return this.gather(work);
      case CyclePhase.VIDEO_DISCOVERY:
        return this.discoverVideos(work);
      case CyclePhase.PROCESSING:
        return Promise.resolve(this.process(work));
      case CyclePhase.SKILL_UPDATE:
        return Promise.resolve(this.updateSkills(work));
      case CyclePhase.MEMORY_COMMIT:
        return Promise.resolve(this.commitMemory(work));
      case CyclePhase.SELF_ASSESSMENT:
        return Promise.resolve(this.assess(work));
      case CyclePhase.GOAL_ADJUSTMENT:
        return Promise.resolve(this.adjustGoals(work));
      case CyclePhase.IDLE:
        throw new InvariantViolationError('idle is not an executable phase', `cycle ${work.cycle.cycleId}`);
    }
  }

  private finalize(work: CycleWork): void {
    const { cycle } = work;

    let outcome: CycleOutcome = 'success';
    for (const report of cycle.phases) {
      if (report.result !== 'skipped') {
        outcome = worstOutcome(outcome, report.result);
      }
    }
    if (work.stopped) {
      outcome = worstOutcome(outcome, 'partial');
    }

    cycle.phase = CyclePhase.IDLE;
    cycle.endedAt = this.clock();
    cycle.outcome = outcome;

    try {
      this.cycles.finalize(cycle);
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      cycle.outcome = 'failed';
      console.error(`[LearningScheduler] Cycle #${cycle.cycleId} could not be finalized: ${error.message}`);
      this.emit('cycle:error', { error, context: `finalize cycle ${cycle.cycleId}` });
      return;
    }

    this.lastFinalized = cycle;
    console.log(
      `[LearningScheduler] Cycle #${cycle.cycleId} ${outcome}: ` +
      `${cycle.stats.entriesInserted} new entries, ${cycle.stats.skillsUpdated} skills updated`
    );
    this.emit('cycle:completed', { cycle });

    if (cycle.cycleId % this.config.maintenanceInterval === 0) {
      this.runMaintenance(cycle.cycleId);
    }
  }

  // ==========================================
  // PHASES
  // ==========================================

  private async gather(work: CycleWork): Promise<PhaseOutcome> {
    const { research } = this.collaborators;
    const topics = this.selectTopics(work.cycle.cycleId, work.cycle.focus);
    work.cycle.topics = topics;

    if (topics.length === 0) {
      return { result: 'success', detail: 'no topics to research' };
    }

    const errors: string[] = [];
    for (const topic of topics) {
      try {
        const hits = await withTimeout(research.name, this.config.researchTimeoutMs,
          options => research.search(topic.query, options));
        for (const hit of hits.slice(0, this.config.maxHitsPerQuery)) {
          work.hits.push({ topic, hit });
        }
      } catch (error) {
        if (!isCollaboratorError(error)) throw error;
        errors.push(`${topic.skill}: ${error.message}`);
      }
    }

    work.cycle.stats.hitsGathered = work.hits.length;
    const detail = `${topics.length - errors.length}/${topics.length} queries answered, ${work.hits.length} hits`;

    if (errors.length === topics.length) return { result: 'failed', detail, errors };
    if (errors.length > 0) return { result: 'partial', detail, errors };
    return { result: 'success', detail };
  }

  private async discoverVideos(work: CycleWork): Promise<PhaseOutcome> {
    const { video: discovery, vision } = this.collaborators;
    if (!discovery) {
      return { result: 'success', detail: 'no video collaborator configured' };
    }

    const topicsBySkill = new Map<string, CycleTopic>();
    for (const topic of work.cycle.topics) {
      if (!topicsBySkill.has(topic.skill)) topicsBySkill.set(topic.skill, topic);
    }
    const topics = [...topicsBySkill.values()].slice(0, this.config.videoTopicsPerCycle);

    const errors: string[] = [];
    const found: StudiedVideo[] = [];

    for (const topic of topics) {
      const term = topic.origin === 'focus' ? topic.query : this.curriculum.labelFor(topic.skill);
      try {
        const videos = await withTimeout(discovery.name, this.config.videoTimeoutMs,
          options => discovery.discover(term, options));
        for (const ranked of rankVideos(videos)) {
          found.push({ topic, ranked });
        }
      } catch (error) {
        if (!isCollaboratorError(error)) throw error;
        errors.push(`${topic.skill}: ${error.message}`);
      }
    }

    const seen = new Set<string>();
    const unique = found
      .filter(entry => {
        if (seen.has(entry.ranked.video.url)) return false;
        seen.add(entry.ranked.video.url);
        return true;
      })
      .sort((a, b) => b.ranked.score - a.ranked.score);

    work.cycle.stats.videosDiscovered = unique.length;
    work.videos = unique.slice(0, this.config.videosAnalyzedPerCycle);

    if (vision) {
      for (const studied of work.videos) {
        const thumbnail = studied.ranked.video.thumbnailUrl;
        if (!thumbnail) continue;

        try {
          studied.analysis = await withTimeout(vision.name, this.config.visionTimeoutMs,
            options => vision.analyze({ url: thumbnail, origin: studied.ranked.video.url }, options));
          work.cycle.stats.videosAnalyzed++;
        } catch (error) {
          if (!isCollaboratorError(error)) throw error;
          errors.push(`${studied.ranked.video.url}: ${error.message}`);
        }
      }
    }

    const detail = `${unique.length} videos found, ${work.cycle.stats.videosAnalyzed} analyzed`;
    return errors.length > 0
      ? { result: 'partial', detail, errors }
      : { result: 'success', detail };
  }

  private process(work: CycleWork): PhaseOutcome {
    const candidates = this.buildCandidates(work);

    const seen = new Set<string>();
    const assess = (candidate: MemoryCandidate): AssessedCandidate => {
      const id = contentHash(candidate.source, candidate.content);
      const novel = !seen.has(id) && !this.memory.has(id);
      seen.add(id);
      return { candidate, id, novel };
    };

    work.assessed = candidates.map(assess);

    const novelCount = work.assessed.filter(entry => entry.novel).length;
    if (novelCount > 0 && work.cycle.cycleId % this.config.reflectionInterval === 0) {
      work.assessed.push(assess(this.reflect(work, novelCount)));
    }

    work.deltas = this.skillImpact.computeDeltas(work.assessed);
    work.followUps = this.raiseFollowUps(work);
    work.cycle.stats.candidates = work.assessed.length;

    return {
      result: 'success',
      detail: `${work.assessed.length} candidates, ${work.assessed.filter(entry => entry.novel).length} novel`
    };
  }

  /**
   * Stages the new scores; nothing is written until MemoryCommit
   */
  private updateSkills(work: CycleWork): PhaseOutcome {
    const staged = this.skills.stageDeltas(work.deltas, this.clock());
    work.skillUpdate = staged;

    if (work.deltas.size === 0) {
      return { result: 'success', detail: 'no skill gains' };
    }
    return { result: 'success', detail: staged.changed.map(record => record.name).join(', ') || 'all at ceiling' };
  }

  private commitMemory(work: CycleWork): PhaseOutcome {
    const now = this.clock();
    const staged = work.skillUpdate ?? this.skills.stageDeltas(new Map<string, number>(), now);
    const asked = work.cycle.topics.filter(topic => topic.origin === 'follow-up');

    const { results, queued } = this.skills.commitWith(staged, 'learning commit', () => ({
      results: this.memory.insertMany(work.assessed.map(entry => entry.candidate), now),
      queued: this.followUps.record(asked, work.followUps, now)
    }));
    const inserted = results.filter(result => result.inserted).length;

    const { stats } = work.cycle;
    stats.entriesInserted = inserted;
    stats.duplicates = results.length - inserted;
    stats.skillsUpdated = staged.changed.length;
    stats.followUpsQueued = queued;
    return {
      result: 'success',
      detail: `${inserted} inserted, ${results.length - inserted} already known, ` +
        `${staged.changed.length} skills updated, ${queued} follow-ups queued`
    };
  }

  private assess(work: CycleWork): PhaseOutcome {
    const metric = this.consciousness.recompute(this.clock());
    work.cycle.stats.consciousnessLevel = metric.level;
    return { result: 'success', detail: `level ${metric.level.toFixed(4)}` };
  }

  private adjustGoals(work: CycleWork): PhaseOutcome {
    const now = this.clock();
    const remaining = this.goals.rerank(now);
    const created = this.goals.fillGoals(
      this.skills.snapshot().map(record => record.name),
      skill => this.curriculum.describeGoal(skill),
      now
    );

    const active = remaining.length + created.length;
    return { result: 'success', detail: `${active} active goals, ${created.length} proposed in cycle ${work.cycle.cycleId}` };
  }

  // ==========================================
  // HELPERS
  // ==========================================

  /**
   * Active goals first (highest gap first), then the weakest skills. Each
   * skill asks its oldest pending follow-up before its curriculum query.
   */
  private selectTopics(cycleId: number, focus: string | undefined): CycleTopic[] {
    if (focus !== undefined) {
      return this.focusTopics(cycleId, focus);
    }

    const chosen: string[] = [];

    for (const goal of this.goals.activeGoals()) {
      if (chosen.length >= this.config.queriesPerCycle) break;
      if (!chosen.includes(goal.targetSkill)) chosen.push(goal.targetSkill);
    }

    const weakest = this.skills.snapshot().sort((a, b) => {
      if (a.score !== b.score) return a.score - b.score;
      return a.name < b.name ? -1 : a.name > b.name ? 1 : 0;
    });
    for (const record of weakest) {
      if (chosen.length >= this.config.queriesPerCycle) break;
      if (!chosen.includes(record.name)) chosen.push(record.name);
    }

    return chosen.map(skill => this.topicFor(skill, cycleId));
  }

  private topicFor(skill: string, cycleId: number): CycleTopic {
    const followUp = this.followUps.peek(skill);
    if (followUp !== null) {
      return { skill, query: followUp, origin: 'follow-up' };
    }
    return { skill, query: this.curriculum.queryFor(skill, cycleId), origin: 'curriculum' };
  }

  /**
   * A known skill gets up to queriesPerCycle distinct queries of its own,
   * pending follow-ups first. Any other text is researched as given and
   * credited to the skill its words name.
   */
  private focusTopics(cycleId: number, focus: string): CycleTopic[] {
    const skill = this.curriculum.resolveSkill(focus);
    if (skill === null) {
      return [{ skill: this.curriculum.skillForTopic(focus), query: focus, origin: 'focus' }];
    }

    const limit = this.config.queriesPerCycle;
    const topics = this.followUps.pending(skill, limit)
      .map((query): CycleTopic => ({ skill, query, origin: 'follow-up' }));

    for (const query of this.curriculum.queriesFor(skill, cycleId)) {
      if (topics.length >= limit) break;
      if (!topics.some(topic => topic.query === query)) {
        topics.push({ skill, query, origin: 'curriculum' });
      }
    }
    return topics;
  }

  /**
   * Each novel titled search hit raises its title as a follow-up for the
   * hit's skill, at most followUpsPerQuery per query.
   */
  private raiseFollowUps(work: CycleWork): FollowUp[] {
    const limit = this.config.followUpsPerQuery;
    if (limit === 0) return [];

    const novel = new Set(work.assessed.filter(entry => entry.novel).map(entry => entry.id));
    const raised = new Map<CycleTopic, number>();
    const followUps: FollowUp[] = [];

    for (const { topic, hit } of work.hits) {
      if (!novel.delete(contentHash(MemorySource.SEARCH, hit.text.trim()))) continue;

      const title = hit.title?.replace(/\s+/g, ' ').trim();
      if (!title || title.toLowerCase() === topic.query.toLowerCase()) continue;

      const count = raised.get(topic) ?? 0;
      if (count >= limit) continue;
      raised.set(topic, count + 1);
      followUps.push({ skill: topic.skill, query: title });
    }

    return followUps;
  }

  private buildCandidates(work: CycleWork): MemoryCandidate[] {
    const candidates: MemoryCandidate[] = [];

    for (const { topic, hit } of work.hits) {
      const text = hit.text.trim();
      if (text.length === 0) continue;
      candidates.push({ source: MemorySource.SEARCH, content: text, associations: [topic.skill] });
    }

    for (const { topic, ranked, analysis } of work.videos) {
      const { video } = ranked;
      const description = video.description?.trim();
      candidates.push({
        source: video.platform === 'youtube' ? MemorySource.YOUTUBE : MemorySource.VIDEO,
        content: description ? `${video.title} (${video.url})\n${description}` : `${video.title} (${video.url})`,
        importance: 0.5 + Math.max(-5, Math.min(10, ranked.score)) / 20,
        associations: [topic.skill, this.curriculum.videoSkill]
      });

      if (analysis) {
        const lines = [`Visual analysis of ${video.title}: ${analysis.summaryText}`];
        if (analysis.detectedObjects.length > 0) lines.push(`Objects: ${analysis.detectedObjects.join(', ')}`);
        if (analysis.extractedText.trim()) lines.push(`Text: ${analysis.extractedText.trim()}`);

        const quality = Math.max(0, Math.min(1, analysis.qualityScore));
        candidates.push({
          source: MemorySource.VISION,
          content: lines.join('\n'),
          importance: 0.3 + 0.6 * quality,
          associations: [topic.skill, this.curriculum.visionSkill],
          weight: quality
        });
      }
    }

    return candidates;
  }

  private reflect(work: CycleWork, novelCount: number): MemoryCandidate {
    const studied = [...new Set(work.cycle.topics.map(topic => this.curriculum.labelFor(topic.skill)))];
    const bySource = new Map<MemorySource, number>();
    for (const { candidate, novel } of work.assessed) {
      if (novel) bySource.set(candidate.source, (bySource.get(candidate.source) ?? 0) + 1);
    }
    const sources = [...bySource].map(([source, count]) => `${count} ${source}`).join(', ');

    const weakest = this.skills.snapshot().pop();
    const weakestText = weakest
      ? ` Weakest skill is ${this.curriculum.labelFor(weakest.name)} at ${weakest.score.toFixed(2)}.`
      : '';

    return {
      source: MemorySource.REFLECTION,
      content: `Reflection on cycle ${work.cycle.cycleId}: studied ${studied.join(', ')}; ` +
        `learned ${novelCount} new items (${sources}).${weakestText}`,
      importance: 0.6,
      associations: [this.curriculum.reflectionSkill]
    };
  }

  /**
   * Periodic upkeep after a finalized cycle. Failures are reported, never
   * fatal to the loop.
   */
  private runMaintenance(cycleId: number): void {
    const now = this.clock();
    try {
      const entriesDecayed = this.memory.importanceDecayPass({ ...this.config.importanceDecay, now });
      let skillsDecayed = 0;
      if (this.config.skillDecayRate > 0) {
        skillsDecayed = this.skills.decay(this.config.skillDecayRate, now).length;
        this.consciousness.recompute(now);
      }

      console.log(`[LearningScheduler] Maintenance after cycle #${cycleId}: ${entriesDecayed} entries faded, ${skillsDecayed} skills decayed`);
      this.emit('maintenance', { cycleId, skillsDecayed, entriesDecayed });
    } catch (error) {
      if (!(error instanceof PersistenceError)) throw error;
      console.error(`[LearningScheduler] Maintenance failed: ${error.message}`);
      this.emit('cycle:error', { error, context: `maintenance after cycle ${cycleId}` });
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => {
      const timer = setTimeout(() => {
        this.wake = null;
        resolve();
      }, ms);
      this.wake = () => {
        clearTimeout(timer);
        this.wake = null;
        resolve();
      };
    });
  }
}
