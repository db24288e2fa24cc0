/**
 * WikipediaResearchCollaborator Tests
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { WikipediaResearchCollaborator } from './WikipediaResearchCollaborator.js';
import { CollaboratorUnavailableError } from '../core/errors.js';
import type { CallOptions } from './types.js';

function callOptions(): CallOptions {
  return { timeoutMs: 1000, signal: new AbortController().signal };
}

function jsonResponse(body: unknown): Response {
  return new Response(JSON.stringify(body), {
    status: 200,
    headers: { 'Content-Type': 'application/json' }
  });
}

describe('WikipediaResearchCollaborator', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should turn search results into plain-text hits', async () => {
    const fetchMock = vi.fn(async (_input: URL | string, _init?: RequestInit) => jsonResponse({
      query: {
        search: [
          { title: 'Linear algebra', snippet: '<span class="searchmatch">Linear</span> equations &amp; more' },
          { title: 'Matrix', snippet: '' }
        ]
      }
    }));
    vi.stubGlobal('fetch', fetchMock);

    const research = new WikipediaResearchCollaborator({ host: 'en.wikipedia.org' }, 2);
    const hits = await research.search('linear equations', callOptions());

    expect(hits).toEqual([
      { text: 'Linear algebra: Linear equations & more', title: 'Linear algebra', sourceUrl: 'https://en.wikipedia.org/wiki/Linear_algebra' },
      { text: 'Matrix', title: 'Matrix', sourceUrl: 'https://en.wikipedia.org/wiki/Matrix' }
    ]);

    const requested = new URL(String(fetchMock.mock.calls[0][0]));
    expect(requested.origin + requested.pathname).toBe('https://en.wikipedia.org/w/api.php');
    expect(requested.searchParams.get('srsearch')).toBe('linear equations');
    expect(requested.searchParams.get('srlimit')).toBe('2');
  });

  it('should pass the abort signal through', async () => {
    const fetchMock = vi.fn(async (_input: URL | string, _init?: RequestInit) => jsonResponse({ query: { search: [] } }));
    vi.stubGlobal('fetch', fetchMock);
    const options = callOptions();

    await new WikipediaResearchCollaborator({ host: 'en.wikipedia.org' }).search('cells', options);

    expect(fetchMock.mock.calls[0][1]?.signal).toBe(options.signal);
  });

  it('should report HTTP failures as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('down', { status: 503, statusText: 'Service Unavailable' })));

    const research = new WikipediaResearchCollaborator({ host: 'en.wikipedia.org' });

    await expect(research.search('cells', callOptions()))
      .rejects.toThrow(new CollaboratorUnavailableError('wikipedia', 'HTTP 503: Service Unavailable'));
  });

  it('should report network errors as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => {
      throw new TypeError('fetch failed');
    }));

    const research = new WikipediaResearchCollaborator({ host: 'en.wikipedia.org' });

    await expect(research.search('cells', callOptions())).rejects.toThrow('wikipedia unavailable: fetch failed');
  });

  it('should reject a response of the wrong shape', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => jsonResponse({ error: { code: 'maxlag' } })));

    const research = new WikipediaResearchCollaborator({ host: 'en.wikipedia.org' });

    await expect(research.search('cells', callOptions()))
      .rejects.toThrow('wikipedia unavailable: unexpected search response shape');
  });
});
