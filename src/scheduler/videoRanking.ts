/**
 * Keyword scoring for discovered videos. Educational and technical terms in
 * the title count more than in the description; entertainment markers count
 * against a video.
 */

import type { VideoCandidate } from '../collaborators/types.js';

interface KeywordGroup {
  terms: readonly string[];
  titleWeight: number;
  descriptionWeight: number;
}

const EDUCATIONAL: KeywordGroup = {
  terms: [
    'tutorial', 'explained', 'guide', 'course', 'lesson', 'learn',
    'beginner', 'introduction', 'basics', 'fundamentals', 'complete'
  ],
  titleWeight: 2,
  descriptionWeight: 1
};

const TECHNICAL: KeywordGroup = {
  terms: [
    'algorithm', 'programming', 'science', 'technology', 'ai',
    'machine learning', 'neural network', 'data', 'analysis'
  ],
  titleWeight: 3,
  descriptionWeight: 1
};

const LOW_QUALITY_TERMS: readonly string[] = ['clickbait', 'reaction', 'funny', 'meme', 'prank', 'gossip'];
const LOW_QUALITY_PENALTY = 5;

function containsTerm(text: string, term: string): boolean {
  const escaped = term.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');
  return new RegExp(`\\b${escaped}\\b`).test(text);
}

export function scoreVideo(video: VideoCandidate): number {
  const title = video.title.toLowerCase();
  const description = (video.description ?? '').toLowerCase();
  let score = 0;

  for (const group of [EDUCATIONAL, TECHNICAL]) {
    for (const term of group.terms) {
      if (containsTerm(title, term)) score += group.titleWeight;
      if (containsTerm(description, term)) score += group.descriptionWeight;
    }
  }

  for (const term of LOW_QUALITY_TERMS) {
    if (containsTerm(title, term) || containsTerm(description, term)) {
      score -= LOW_QUALITY_PENALTY;
    }
  }

  return score;
}

export interface RankedVideo {
  video: VideoCandidate;
  score: number;
}

/**
 * Highest score first; equal scores keep discovery order. Repeated URLs are dropped.
 */
export function rankVideos(videos: readonly VideoCandidate[]): RankedVideo[] {
  const seen = new Set<string>();
  const ranked: RankedVideo[] = [];

  for (const video of videos) {
    if (seen.has(video.url)) continue;
    seen.add(video.url);
    ranked.push({ video, score: scoreVideo(video) });
  }

  return ranked.sort((a, b) => b.score - a.score);
}
