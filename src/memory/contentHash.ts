import { createHash } from 'crypto';
import type { MemorySource } from '../core/types.js';

/**
 * NFKC, trimmed, whitespace runs collapsed, lower-cased
 */
export function normalizeContent(content: string): string {
  return content.normalize('NFKC').trim().replace(/\s+/g, ' ').toLowerCase();
}

/**
 * Deterministic memory id: the same (source, normalized content) always
 * hashes to the same id.
 */
export function contentHash(source: MemorySource, content: string): string {
  return createHash('sha256')
    .update(source)
    .update('\u0000')
    .update(normalizeContent(content))
    .digest('hex');
}
