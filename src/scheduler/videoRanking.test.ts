/**
 * Video ranking Tests
 */

import { describe, it, expect } from 'vitest';
import { rankVideos, scoreVideo } from './videoRanking.js';
import type { VideoCandidate } from '../collaborators/types.js';

function video(title: string, url: string, description?: string): VideoCandidate {
  return { title, url, platform: 'youtube', description };
}

describe('scoreVideo', () => {
  it('should weight title keywords above description keywords', () => {
    expect(scoreVideo(video('Machine Learning Tutorial for Beginners', 'https://video.test/1'))).toBe(5);
    expect(scoreVideo(video('Weekend vlog', 'https://video.test/2', 'A complete guide to data analysis'))).toBe(4);
  });

  it('should match whole words only', () => {
    expect(scoreVideo(video('Painting with rain', 'https://video.test/3'))).toBe(0);
  });

  it('should penalize entertainment markers', () => {
    expect(scoreVideo(video('Funny AI prank', 'https://video.test/4'))).toBe(-7);
  });
});

describe('rankVideos', () => {
  it('should order by score and drop repeated urls', () => {
    const ranked = rankVideos([
      video('Funny moments', 'https://video.test/a'),
      video('Algebra lesson', 'https://video.test/b'),
      video('Algebra lesson (mirror)', 'https://video.test/b'),
      video('Chemistry lesson', 'https://video.test/c')
    ]);

    expect(ranked.map(entry => entry.video.url)).toEqual([
      'https://video.test/b',
      'https://video.test/c',
      'https://video.test/a'
    ]);
    expect(ranked.map(entry => entry.score)).toEqual([2, 2, -5]);
  });
});
