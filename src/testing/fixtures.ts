/**
 * Shared test fixtures: throwaway SQLite files, a small curriculum, a
 * deterministic clock and scriptable collaborators.
 */

import { mkdtempSync, rmSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';
import { SQLiteStorage } from '../storage/SQLiteStorage.js';
import type { CurriculumData } from '../curriculum/Curriculum.js';
import type {
  CallOptions,
  MediaRef,
  ResearchCollaborator,
  SearchHit,
  VideoCandidate,
  VideoDiscoveryCollaborator,
  VisionAnalysis,
  VisionCollaborator
} from '../collaborators/types.js';

export interface TempDatabase {
  dir: string;
  path: string;
  open(): SQLiteStorage;
  cleanup(): void;
}

export function createTempDatabase(prefix: string): TempDatabase {
  const dir = mkdtempSync(join(tmpdir(), `autodidact-${prefix}-`));
  const path = join(dir, 'test.db');
  return {
    dir,
    path,
    open: () => new SQLiteStorage({ sqlitePath: path, enableWAL: false }),
    cleanup: () => rmSync(dir, { recursive: true, force: true })
  };
}

export const TEST_CURRICULUM: CurriculumData = {
  seedScore: 0.1,
  mediaSkills: {
    video: 'video_comprehension',
    vision: 'visual_analysis',
    reflection: 'self_improvement'
  },
  skills: [
    { name: 'algebra', label: 'algebra', queries: ['algebra basics', 'linear equations'] },
    { name: 'biology', label: 'biology', queries: ['cell biology'] }
  ]
};

/**
 * Starts at 2024-01-01T00:00:00Z and advances one second per reading
 */
export function steppingClock(start: string = '2024-01-01T00:00:00.000Z'): () => Date {
  let time = Date.parse(start);
  return () => {
    const now = new Date(time);
    time += 1000;
    return now;
  };
}

/**
 * Promise that only settles when the call's signal aborts, never by itself
 */
export function hangUntilAborted<T>(options: CallOptions): Promise<T> {
  return new Promise<T>((_, reject) => {
    options.signal.addEventListener('abort', () => reject(new Error('aborted')));
  });
}

type Responder<TInput, TOutput> = (input: TInput, options: CallOptions) => Promise<TOutput> | TOutput;

export class ScriptedResearch implements ResearchCollaborator {
  readonly name = 'scripted-research';
  readonly queries: string[] = [];
  private respond: Responder<string, SearchHit[]>;

  constructor(respond: Responder<string, SearchHit[]> = query => [
    { text: `${query} fact`, sourceUrl: `https://example.test/${encodeURIComponent(query)}` }
  ]) {
    this.respond = respond;
  }

  async search(query: string, options: CallOptions): Promise<SearchHit[]> {
    this.queries.push(query);
    return this.respond(query, options);
  }
}

export class ScriptedVideo implements VideoDiscoveryCollaborator {
  readonly name = 'scripted-video';
  readonly topics: string[] = [];
  private respond: Responder<string, VideoCandidate[]>;

  constructor(respond: Responder<string, VideoCandidate[]>) {
    this.respond = respond;
  }

  async discover(topic: string, options: CallOptions): Promise<VideoCandidate[]> {
    this.topics.push(topic);
    return this.respond(topic, options);
  }
}

export class ScriptedVision implements VisionCollaborator {
  readonly name = 'scripted-vision';
  readonly media: MediaRef[] = [];
  private respond: Responder<MediaRef, VisionAnalysis>;

  constructor(respond: Responder<MediaRef, VisionAnalysis>) {
    this.respond = respond;
  }

  async analyze(media: MediaRef, options: CallOptions): Promise<VisionAnalysis> {
    this.media.push(media);
    return this.respond(media, options);
  }
}
