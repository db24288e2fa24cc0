/**
 * WikipediaResearchCollaborator
 *
 * Research collaborator backed by the MediaWiki search API. Each hit is the
 * article title plus its search snippet, with the snippet's highlight markup
 * stripped.
 */

import { z } from 'zod';
import { CollaboratorUnavailableError } from '../core/errors.js';
import type { WikipediaConfig } from '../core/config.js';
import { htmlToText } from './htmlText.js';
import type { CallOptions, ResearchCollaborator, SearchHit } from './types.js';

const searchResponseSchema = z.object({
  query: z.object({
    search: z.array(z.object({
      title: z.string(),
      snippet: z.string()
    }))
  })
});

export class WikipediaResearchCollaborator implements ResearchCollaborator {
  readonly name = 'wikipedia';
  private config: WikipediaConfig;
  private limit: number;

  constructor(config: WikipediaConfig, limit: number = 5) {
    this.config = config;
    this.limit = limit;
  }

  async search(query: string, options: CallOptions): Promise<SearchHit[]> {
    const url = new URL(`https://${this.config.host}/w/api.php`);
    url.searchParams.set('action', 'query');
    url.searchParams.set('list', 'search');
    url.searchParams.set('srsearch', query);
    url.searchParams.set('srlimit', String(this.limit));
    url.searchParams.set('format', 'json');

    let body: unknown;
    try {
      const response = await fetch(url, {
        headers: {
          'User-Agent': 'autodidact-agent/0.1',
          'Accept': 'application/json'
        },
        signal: options.signal
      });

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

    return parsed.data.query.search
      .map(result => {
        const snippet = htmlToText(result.snippet);
        return {
          text: snippet ? `${result.title}: ${snippet}` : result.title,
          title: result.title,
          sourceUrl: `https://${this.config.host}/wiki/${encodeURIComponent(result.title.replace(/ /g, '_'))}`
        };
      });
  }
}
