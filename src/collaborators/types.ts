/**
 * Collaborator Contracts
 *
 * The external services the scheduler drives. Each call receives its own
 * timeout and an AbortSignal that fires when the timeout elapses.
 *
 * Implementations fail with CollaboratorUnavailableError or DecodeError;
 * the scheduler raises CollaboratorTimeoutError itself.
 */

export interface CallOptions {
  timeoutMs: number;
  signal: AbortSignal;
}

// ==========================================
// RESEARCH
// ==========================================

export interface SearchHit {
  text: string;
  sourceUrl: string;
  /** Article or page title; titled hits can raise follow-up queries */
  title?: string;
}

export interface ResearchCollaborator {
  readonly name: string;
  search(query: string, options: CallOptions): Promise<SearchHit[]>;
}

// ==========================================
// VIDEO DISCOVERY
// ==========================================

export type VideoPlatform = 'youtube' | 'vimeo' | 'other';

export interface VideoCandidate {
  title: string;
  url: string;
  platform: VideoPlatform;
  description?: string;
  thumbnailUrl?: string;
}

export interface VideoDiscoveryCollaborator {
  readonly name: string;
  discover(topic: string, options: CallOptions): Promise<VideoCandidate[]>;
}

// ==========================================
// VISION
// ==========================================

export interface MediaRef {
  /** Image or frame location the analyzer can fetch */
  url: string;
  /** Where the media came from, e.g. the video page */
  origin?: string;
}

export interface VisionAnalysis {
  summaryText: string;
  detectedObjects: string[];
  extractedText: string;
  qualityScore: number;   // 0.0 - 1.0
}

export interface VisionCollaborator {
  readonly name: string;
  analyze(media: MediaRef, options: CallOptions): Promise<VisionAnalysis>;
}

export interface Collaborators {
  research: ResearchCollaborator;
  video?: VideoDiscoveryCollaborator;
  vision?: VisionCollaborator;
}
