/**
 * Skill impact strategies
 *
 * Turn the knowledge gathered in a cycle into per-skill gains. Strategies are
 * pure: the same candidates always produce the same deltas.
 */

import type { MemoryCandidate, SkillDeltas } from '../core/types.js';

export interface AssessedCandidate {
  candidate: MemoryCandidate;
  /** Content hash the entry will be stored under */
  id: string;
  /** False when memory already holds it, or an earlier candidate in the batch does */
  novel: boolean;
}

export interface SkillImpactStrategy {
  readonly name: string;
  computeDeltas(candidates: readonly AssessedCandidate[]): SkillDeltas;
}

export interface VolumeNoveltyConfig {
  /** Gain per novel entry of weight 1 (default: 0.02) */
  novelGain: number;
  /** Gain per repeated entry of weight 1 (default: 0.002) */
  repeatGain: number;
  /** Cap on one skill's gain in one cycle (default: 0.1) */
  maxDeltaPerSkill: number;
}

export const DEFAULT_VOLUME_NOVELTY_CONFIG: VolumeNoveltyConfig = {
  novelGain: 0.02,
  repeatGain: 0.002,
  maxDeltaPerSkill: 0.1
};

/**
 * Gain grows with how much new material touched a skill; material already in
 * memory counts for a tenth as much.
 */
export class VolumeNoveltyStrategy implements SkillImpactStrategy {
  readonly name = 'volume-novelty';
  private config: VolumeNoveltyConfig;

  constructor(config: Partial<VolumeNoveltyConfig> = {}) {
    this.config = { ...DEFAULT_VOLUME_NOVELTY_CONFIG, ...config };
  }

  computeDeltas(candidates: readonly AssessedCandidate[]): SkillDeltas {
    const deltas: SkillDeltas = new Map();

    for (const { candidate, novel } of candidates) {
      const weight = Math.max(0, Math.min(1, candidate.weight ?? 1));
      const gain = weight * (novel ? this.config.novelGain : this.config.repeatGain);
      if (gain <= 0) continue;

      for (const skill of new Set(candidate.associations ?? [])) {
        deltas.set(skill, (deltas.get(skill) ?? 0) + gain);
      }
    }

    for (const [skill, delta] of deltas) {
      deltas.set(skill, Math.min(this.config.maxDeltaPerSkill, delta));
    }
    return deltas;
  }
}
