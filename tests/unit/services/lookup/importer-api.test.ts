/**
 * Importer API lookup backend tests
 *
 * @module tests/unit/services/lookup/importer-api
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import type { CuratorConfig } from '../../../../src/server/config.js';
import { createLookupBackend } from '../../../../src/services/lookup/index.js';
import { ImporterApiBackend } from '../../../../src/services/lookup/importer-api.js';

function stubFetch(status: number, body: unknown = {}) {
  const fetchMock = vi.fn(async () => new Response(JSON.stringify(body), { status }));
  vi.stubGlobal('fetch', fetchMock);
  return fetchMock;
}

function requestedUrl(fetchMock: ReturnType<typeof stubFetch>): string {
  const call: unknown[] = fetchMock.mock.calls[0] ?? [];
  return String(call[0]);
}

describe('ImporterApiBackend', () => {
  const backend = new ImporterApiBackend('http://importer.test/api/', 5000);

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('maps a remote item through its prefixed reference', async () => {
    const fetchMock = stubFetch(200, { local_id: 'Q10' });

    await expect(backend.lookupRemoteMapping('item', 'Q5')).resolves.toBe('Q10');
    expect(requestedUrl(fetchMock)).toBe('http://importer.test/api/items/wd%3AQ5/mapping');
  });

  it('maps a remote property under wdt:', async () => {
    const fetchMock = stubFetch(200, { local_id: 'P3' });

    await expect(backend.lookupRemoteMapping('property', 'P31')).resolves.toBe('P3');
    expect(requestedUrl(fetchMock)).toBe('http://importer.test/api/properties/wdt%3AP31/mapping');
  });

  it('treats 404 and a null local id as unmapped', async () => {
    stubFetch(404);
    await expect(backend.lookupRemoteMapping('item', 'Q5')).resolves.toBeNull();

    stubFetch(200, { local_id: null });
    await expect(backend.lookupRemoteMapping('item', 'Q5')).resolves.toBeNull();
  });

  it('accepts a single id or a list from label search', async () => {
    const fetchMock = stubFetch(200, { QID: 'Q7' });
    await expect(backend.searchByLabel('item', 'Ada Lovelace')).resolves.toEqual(['Q7']);
    expect(requestedUrl(fetchMock)).toBe('http://importer.test/api/search/items/Ada%20Lovelace');

    stubFetch(200, { QID: ['Q7', 'Q42'] });
    await expect(backend.searchByLabel('item', 'Ada Lovelace')).resolves.toEqual(['Q7', 'Q42']);
  });

  it('reads PID for properties', async () => {
    stubFetch(200, { QID: 'Q7', PID: 'P50' });
    await expect(backend.searchByLabel('property', 'author')).resolves.toEqual(['P50']);
  });

  it('returns no candidates when search finds nothing', async () => {
    stubFetch(404);
    await expect(backend.searchByLabel('item', 'nobody')).resolves.toEqual([]);

    stubFetch(200, {});
    await expect(backend.searchByLabel('item', 'nobody')).resolves.toEqual([]);
  });

  it('reports server errors as unavailable', async () => {
    stubFetch(500);
    await expect(backend.lookupRemoteMapping('item', 'Q5')).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'Importer API unavailable: HTTP 500 for http://importer.test/api/items/wd%3AQ5/mapping',
    });
  });

  it('reports a body that is not JSON as unavailable', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response('<html>proxy error</html>', { status: 200 })));
    await expect(backend.lookupRemoteMapping('item', 'Q5')).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      details: {
        backend: 'Importer API',
        originalName: 'SyntaxError',
        url: 'http://importer.test/api/items/wd%3AQ5/mapping',
      },
    });
  });

  it('reports a reply of the wrong shape as unavailable', async () => {
    stubFetch(200, { local_id: 5 });
    await expect(backend.lookupRemoteMapping('item', 'Q5')).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'Importer API unavailable: unexpected response shape',
      details: { issues: ['local_id: Expected string, received number'] },
    });
  });

  it('reports network failures as unavailable', async () => {
    vi.stubGlobal(
      'fetch',
      vi.fn(async () => {
        throw new TypeError('fetch failed');
      })
    );
    await expect(backend.searchByLabel('item', 'Ada Lovelace')).rejects.toMatchObject({
      category: 'BACKEND_UNAVAILABLE',
      message: 'Importer API unavailable: fetch failed',
    });
  });
});

describe('createLookupBackend', () => {
  const base: CuratorConfig = {
    user: 'curator',
    password: 'test-secret',
    loginWithBot: true,
    mediawikiApiUrl: 'http://wiki.test/w/api.php',
    sparqlEndpointUrl: 'http://query.test/sparql',
    wikibaseUrl: 'http://wiki.test',
    lookupBackend: 'importer',
    importerApiUrl: 'http://importer.test/api',
    instanceOfProperty: 'instance of',
    personPageNamespace: 'Person',
    httpTimeoutMs: 30000,
  };

  it('builds the importer backend', () => {
    expect(createLookupBackend(base).mode).toBe('importer');
  });

  it('requires the settings of the selected backend', () => {
    expect(() => createLookupBackend({ ...base, importerApiUrl: undefined })).toThrow(
      'IMPORTER_API_URL is required when LOOKUP_BACKEND=importer'
    );
    expect(() => createLookupBackend({ ...base, lookupBackend: 'direct' })).toThrow(
      'WIKIBASE_DB_PATH is required when LOOKUP_BACKEND=direct'
    );
  });
});
