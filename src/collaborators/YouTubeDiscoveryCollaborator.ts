/**
 * YouTubeDiscoveryCollaborator
 *
 * Video discovery through the YouTube Data API v3 search endpoint.
 */

import { z } from 'zod';
import { CollaboratorUnavailableError } from '../core/errors.js';
import type { YouTubeConfig } from '../core/config.js';
import { htmlToText } from './htmlText.js';
import type { CallOptions, VideoCandidate, VideoDiscoveryCollaborator } from './types.js';

const SEARCH_ENDPOINT = 'https://www.googleapis.com/youtube/v3/search';

const thumbnailSchema = z.object({ url: z.string() }).optional();

const searchResponseSchema = z.object({
  items: z.array(z.object({
    id: z.object({ videoId: z.string().optional() }),
    snippet: z.object({
      title: z.string(),
      description: z.string().default(''),
      thumbnails: z.object({
        high: thumbnailSchema,
        medium: thumbnailSchema,
        default: thumbnailSchema
      }).default({})
    })
  })).default([])
});

export class YouTubeDiscoveryCollaborator implements VideoDiscoveryCollaborator {
  readonly name = 'youtube';
  private apiKey: string;
  private maxResults: number;

  constructor(config: YouTubeConfig) {
    if (!config.apiKey) {
      throw new Error('YOUTUBE_API_KEY is required for YouTube discovery');
    }
    this.apiKey = config.apiKey;
    this.maxResults = config.maxResults;
  }

  async discover(topic: string, options: CallOptions): Promise<VideoCandidate[]> {
    const url = new URL(SEARCH_ENDPOINT);
    url.searchParams.set('part', 'snippet');
    url.searchParams.set('type', 'video');
    url.searchParams.set('q', topic);
    url.searchParams.set('maxResults', String(this.maxResults));
    url.searchParams.set('key', this.apiKey);

    let body: unknown;
    try {
      const response = await fetch(url, { signal: options.signal });
      if (!response.ok) {
        throw new CollaboratorUnavailableError(this.name, `HTTP ${response.status}: ${response.statusText}`);
      }
      body = await response.json();
    } catch (error) {
      if (error instanceof CollaboratorUnavailableError) throw error;
      const reason = error instanceof Error ? error.message : String(error);
      throw new CollaboratorUnavailableError(this.name, reason, error);
    }

    const parsed = searchResponseSchema.safeParse(body);
    if (!parsed.success) {
      throw new CollaboratorUnavailableError(this.name, 'unexpected search response shape');
    }

    const videos: VideoCandidate[] = [];
    for (const item of parsed.data.items) {
      const videoId = item.id.videoId;
      if (!videoId) continue;

      const { thumbnails } = item.snippet;
      const description = htmlToText(item.snippet.description);
      videos.push({
        title: htmlToText(item.snippet.title),
        url: `https://www.youtube.com/watch?v=${videoId}`,
        platform: 'youtube',
        description: description || undefined,
        thumbnailUrl: (thumbnails.high ?? thumbnails.medium ?? thumbnails.default)?.url
      });
    }
    return videos;
  }
}
