import {
  CollaboratorTimeoutError,
  CollaboratorUnavailableError,
  isCollaboratorError
} from '../core/errors.js';
import type { CallOptions } from './types.js';

/**
 * Run one collaborator call under a hard timeout.
 *
 * The call gets an AbortSignal that fires at the deadline; whether or not
 * the collaborator honours it, the returned promise settles by then with a
 * CollaboratorTimeoutError. Untyped failures become CollaboratorUnavailableError.
 */
export async function withTimeout<T>(
  collaborator: string,
  timeoutMs: number,
  call: (options: CallOptions) => Promise<T>
): Promise<T> {
  const controller = new AbortController();
  let timeoutId: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutId = setTimeout(() => {
      controller.abort();
      reject(new CollaboratorTimeoutError(collaborator, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([
      call({ timeoutMs, signal: controller.signal }),
      timeoutPromise
    ]);
  } catch (error) {
    if (isCollaboratorError(error)) throw error;
    const reason = error instanceof Error ? error.message : String(error);
    throw new CollaboratorUnavailableError(collaborator, reason, error);
  } finally {
    clearTimeout(timeoutId);
  }
}
