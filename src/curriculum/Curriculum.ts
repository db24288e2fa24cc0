/**
 * Curriculum
 *
 * Skill catalogue plus the research queries used to practise each skill.
 * Loaded from data/curriculum.json unless a path or object is supplied.
 */

import { readFileSync } from 'fs';
import { join, dirname } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';
import { ConfigurationError } from '../core/errors.js';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export const DEFAULT_CURRICULUM_PATH = join(__dirname, '..', '..', 'data', 'curriculum.json');

const skillSchema = z.object({
  name: z.string().min(1),
  label: z.string().min(1),
  queries: z.array(z.string().min(1)).min(1)
});

export const curriculumSchema = z.object({
  seedScore: z.number().min(0).default(0),
  mediaSkills: z.object({
    video: z.string().min(1),
    vision: z.string().min(1),
    reflection: z.string().min(1)
  }),
  skills: z.array(skillSchema).min(1)
});

export type CurriculumData = z.input<typeof curriculumSchema>;
export type CurriculumSkill = z.infer<typeof skillSchema>;

/**
 * Lower-case words separated by single spaces
 */
function words(text: string): string {
  return text.toLowerCase().replace(/[^\p{L}\p{N}]+/gu, ' ').trim();
}

function parseCurriculum(raw: unknown): z.infer<typeof curriculumSchema> {
  const parsed = curriculumSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ConfigurationError(
      parsed.error.issues.map(issue => `curriculum ${issue.path.join('.') || '(root)'}: ${issue.message}`)
    );
  }
  return parsed.data;
}

export class Curriculum {
  readonly seedScore: number;
  readonly videoSkill: string;
  readonly visionSkill: string;
  readonly reflectionSkill: string;
  private skills: Map<string, CurriculumSkill>;

  constructor(data: CurriculumData) {
    const parsed = parseCurriculum(data);

    this.seedScore = parsed.seedScore;
    this.videoSkill = parsed.mediaSkills.video;
    this.visionSkill = parsed.mediaSkills.vision;
    this.reflectionSkill = parsed.mediaSkills.reflection;
    this.skills = new Map(parsed.skills.map(skill => [skill.name, skill]));
  }

  static load(path: string = DEFAULT_CURRICULUM_PATH): Curriculum {
    let raw: unknown;
    try {
      raw = JSON.parse(readFileSync(path, 'utf-8'));
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError([`cannot read curriculum at ${path}: ${reason}`]);
    }

    return new Curriculum(parseCurriculum(raw));
  }

  skillNames(): string[] {
    const names = new Set(this.skills.keys());
    names.add(this.videoSkill);
    names.add(this.visionSkill);
    names.add(this.reflectionSkill);
    return [...names];
  }

  labelFor(skill: string): string {
    return this.skills.get(skill)?.label ?? skill.replace(/_/g, ' ');
  }

  /**
   * Rotates through the skill's queries so consecutive cycles ask different
   * questions. Skills outside the catalogue fall back to their label.
   */
  queryFor(skill: string, cycleId: number): string {
    const queries = this.skills.get(skill)?.queries;
    if (!queries || queries.length === 0) {
      return this.labelFor(skill);
    }
    return queries[cycleId % queries.length];
  }

  /**
   * Every query for the skill, starting at the one queryFor would pick
   */
  queriesFor(skill: string, cycleId: number): string[] {
    const queries = this.skills.get(skill)?.queries;
    if (!queries || queries.length === 0) {
      return [this.labelFor(skill)];
    }
    const start = cycleId % queries.length;
    return [...queries.slice(start), ...queries.slice(0, start)];
  }

  /**
   * Skill named by `text`, by name or label, ignoring case and punctuation
   */
  resolveSkill(text: string): string | null {
    const wanted = words(text);
    if (wanted.length === 0) return null;
    return this.skillNames().find(name => words(name) === wanted || words(this.labelFor(name)) === wanted) ?? null;
  }

  /**
   * Catalogue skill whose label appears as whole words in a free-text topic;
   * topics outside the catalogue count toward the reflection skill.
   */
  skillForTopic(topic: string): string {
    const padded = ` ${words(topic)} `;
    for (const skill of this.skills.values()) {
      if (padded.includes(` ${words(skill.label)} `)) return skill.name;
    }
    return this.reflectionSkill;
  }

  describeGoal(skill: string): string {
    return `Deepen understanding of ${this.labelFor(skill)}`;
  }
}
