/**
 * SPARQL query service client
 *
 * @module services/wikibase/sparql-client
 */

import { z } from 'zod';
import type { SparqlBinding } from '../graph-store/types.js';
import { backendUnavailableError, wikibaseApiError } from '../../server/errors.js';

const SparqlResponse = z.object({
  results: z.object({
    bindings: z.array(
      z.record(
        z.object({
          type: z.string(),
          value: z.string(),
          datatype: z.string().optional(),
          'xml:lang': z.string().optional(),
        })
      )
    ),
  }),
});

export class SparqlClient {
  constructor(
    private readonly endpointUrl: string,
    private readonly timeoutMs: number
  ) {}

  async query(query: string): Promise<SparqlBinding[]> {
    const url = new URL(this.endpointUrl);
    url.searchParams.set('query', query);
    url.searchParams.set('format', 'json');

    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/sparql-results+json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw backendUnavailableError('SPARQL endpoint', error);
    }

    if (response.status === 400) {
      throw wikibaseApiError('sparql', { code: 'malformed-query', info: await response.text() });
    }
    if (!response.ok) {
      throw backendUnavailableError('SPARQL endpoint', new Error(`HTTP ${response.status}`));
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw backendUnavailableError('SPARQL endpoint', error);
    }
    const parsed = SparqlResponse.safeParse(body);
    if (!parsed.success) {
      throw backendUnavailableError('SPARQL endpoint', new Error('unexpected response shape'), { upstream: body });
    }
    return parsed.data.results.bindings;
  }
}
