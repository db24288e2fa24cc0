/**
 * OpenAIVisionCollaborator
 *
 * Vision analysis through an OpenAI multimodal chat model. The model is asked
 * for a JSON object; anything that does not match the expected shape is a
 * DecodeError.
 */

import OpenAI from 'openai';
import { z } from 'zod';
import { CollaboratorUnavailableError, DecodeError } from '../core/errors.js';
import type { VisionConfig } from '../core/config.js';
import type { CallOptions, MediaRef, VisionAnalysis, VisionCollaborator } from './types.js';

const PROMPT = [
  'Describe this image for a learner taking notes.',
  'Reply with a JSON object with exactly these keys:',
  '"summary" (one or two sentences), "objects" (array of short nouns),',
  '"text" (any legible text, empty string if none),',
  '"quality" (0 to 1, how informative the image is for learning).'
].join(' ');

const visionResponseSchema = z.object({
  summary: z.string().min(1),
  objects: z.array(z.string()).default([]),
  text: z.string().default(''),
  quality: z.number().min(0).max(1)
});

/**
 * Decode the model's reply into a VisionAnalysis
 */
export function parseVisionResponse(mediaRef: string, raw: string | null | undefined): VisionAnalysis {
  if (!raw || raw.trim().length === 0) {
    throw new DecodeError(mediaRef, 'empty response');
  }

  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    throw new DecodeError(mediaRef, 'response is not JSON');
  }

  const parsed = visionResponseSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    throw new DecodeError(mediaRef, `${issue.path.join('.') || 'response'}: ${issue.message}`);
  }

  return {
    summaryText: parsed.data.summary.trim(),
    detectedObjects: parsed.data.objects.map(object => object.trim()).filter(object => object.length > 0),
    extractedText: parsed.data.text.trim(),
    qualityScore: parsed.data.quality
  };
}

export class OpenAIVisionCollaborator implements VisionCollaborator {
  readonly name = 'openai-vision';
  private client: OpenAI;
  private config: VisionConfig;

  constructor(config: VisionConfig) {
    if (!config.apiKey) {
      throw new Error('OPENAI_API_KEY is required for vision analysis');
    }
    this.config = config;
    this.client = new OpenAI({
      apiKey: config.apiKey,
      maxRetries: 0 // The scheduler owns the timeout budget
    });
  }

  async analyze(media: MediaRef, options: CallOptions): Promise<VisionAnalysis> {
    let content: string | null;
    try {
      const response = await this.client.chat.completions.create(
        {
          model: this.config.model,
          max_tokens: this.config.maxTokens,
          response_format: { type: 'json_object' },
          messages: [
            {
              role: 'user',
              content: [
                { type: 'text', text: PROMPT },
                { type: 'image_url', image_url: { url: media.url } }
              ]
            }
          ]
        },
        { signal: options.signal, timeout: options.timeoutMs }
      );
      content = response.choices[0]?.message.content ?? null;
    } catch (error) {
      const reason = error instanceof Error ? error.message : String(error);
      throw new CollaboratorUnavailableError(this.name, reason, error);
    }

    return parseVisionResponse(media.url, content);
  }
}
