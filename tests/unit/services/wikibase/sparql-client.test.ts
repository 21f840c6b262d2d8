/**
 * SPARQL client tests
 *
 * @module tests/unit/services/wikibase/sparql-client
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { SparqlClient } from '../../../../src/services/wikibase/sparql-client.js';

const QUERY = 'SELECT ?item WHERE { ?item wdt:P3 "0000-0001" }';

describe('SparqlClient', () => {
  const client = new SparqlClient('http://query.test/sparql', 5000);

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('sends the query as JSON request and returns the bindings', async () => {
    const fetchMock = vi.fn(
      async (_input: string | URL | Request, _init?: RequestInit) =>
        new Response(
          JSON.stringify({
            head: { vars: ['item'] },
            results: { bindings: [{ item: { type: 'uri', value: 'http://wiki.test/entity/Q12' } }] },
          }),
          { status: 200 }
        )
    );
    vi.stubGlobal('fetch', fetchMock);

    const bindings = await client.query(QUERY);

    expect(bindings).toEqual([{ item: { type: 'uri', value: 'http://wiki.test/entity/Q12' } }]);
    const url = new URL(String(fetchMock.mock.calls[0][0]));
    expect(url.searchParams.get('query')).toBe(QUERY);
    expect(url.searchParams.get('format')).toBe('json');
  });

  it('reports a malformed query with the endpoint message', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('Parse error: line 1', { status: 400 })));

    await expect(client.query('SELECT')).rejects.toMatchObject({
      category: 'WIKIBASE_API_ERROR',
      message: 'Wikibase API action "sparql" failed: Parse error: line 1',
    });
  });

  it('reports server errors as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('', { status: 502 })));

    await expect(client.query(QUERY)).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'SPARQL endpoint unavailable: HTTP 502',
    });
  });

  it('reports a body that is not JSON as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>gateway</html>', { status: 200 })));

    await expect(client.query(QUERY)).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      details: { backend: 'SPARQL endpoint', originalName: 'SyntaxError' },
    });
  });

  it('reports results of the wrong shape as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(JSON.stringify({ boolean: true }), { status: 200 })));

    await expect(client.query(QUERY)).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'SPARQL endpoint unavailable: unexpected response shape',
      details: { upstream: { boolean: true } },
    });
  });

  it('reports network failures as unavailable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );

    await expect(client.query(QUERY)).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'SPARQL endpoint unavailable: fetch failed',
    });
  });
});
