/**
 * Unit tests for curator configuration loading
 *
 * @module tests/unit/server/config
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { loadCuratorConfig } from '../../../src/server/config.js';

const ENV_KEYS = [
  'WIKIBASE_USER',
  'WIKIBASE_PASSWORD',
  'WIKIBASE_LOGIN_WITH_BOT',
  'MEDIAWIKI_API_URL',
  'SPARQL_ENDPOINT_URL',
  'WIKIBASE_URL',
  'SPARQL_DIRECT_PROPERTY_PREFIX',
  'LOOKUP_BACKEND',
  'IMPORTER_API_URL',
  'WIKIBASE_DB_PATH',
  'INSTANCE_OF_PROPERTY',
  'PERSON_PAGE_NAMESPACE',
  'REMOTE_ITEM_LINK_PROPERTY',
  'REMOTE_PROPERTY_LINK_PROPERTY',
  'HTTP_TIMEOUT_MS',
];

describe('loadCuratorConfig', () => {
  beforeEach(() => {
    for (const key of ENV_KEYS) vi.stubEnv(key, '');
    vi.stubEnv('WIKIBASE_USER', 'curator');
    vi.stubEnv('WIKIBASE_PASSWORD', 'test-secret');
    vi.stubEnv('MEDIAWIKI_API_URL', 'http://wiki.test/w/api.php');
    vi.stubEnv('SPARQL_ENDPOINT_URL', 'http://query.test/sparql');
    vi.stubEnv('WIKIBASE_URL', 'http://wiki.test');
    vi.stubEnv('IMPORTER_API_URL', 'http://importer.test/api');
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('should load the environment with defaults', () => {
    expect(loadCuratorConfig()).toEqual({
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
    });
  });

  it('should read the optional settings', () => {
    vi.stubEnv('WIKIBASE_LOGIN_WITH_BOT', 'false');
    vi.stubEnv('HTTP_TIMEOUT_MS', '5000');
    vi.stubEnv('INSTANCE_OF_PROPERTY', 'P1');
    vi.stubEnv('PERSON_PAGE_NAMESPACE', 'Author');
    vi.stubEnv('REMOTE_ITEM_LINK_PROPERTY', 'Wikidata QID');

    const config = loadCuratorConfig();

    expect(config.loginWithBot).toBe(false);
    expect(config.httpTimeoutMs).toBe(5000);
    expect(config.instanceOfProperty).toBe('P1');
    expect(config.personPageNamespace).toBe('Author');
    expect(config.remoteItemLinkProperty).toBe('Wikidata QID');
    expect(config.remotePropertyLinkProperty).toBeUndefined();
  });

  it('should select the direct backend with a database path', () => {
    vi.stubEnv('LOOKUP_BACKEND', 'direct');
    vi.stubEnv('WIKIBASE_DB_PATH', '/var/lib/wikibase/wiki.sqlite');

    const config = loadCuratorConfig();

    expect(config.lookupBackend).toBe('direct');
    expect(config.databasePath).toBe('/var/lib/wikibase/wiki.sqlite');
  });

  it('should require the settings of the selected backend', () => {
    vi.stubEnv('LOOKUP_BACKEND', 'direct');
    expect(() => loadCuratorConfig()).toThrow('WIKIBASE_DB_PATH is required when LOOKUP_BACKEND=direct');

    vi.stubEnv('LOOKUP_BACKEND', '');
    vi.stubEnv('IMPORTER_API_URL', '');
    expect(() => loadCuratorConfig()).toThrow('IMPORTER_API_URL is required when LOOKUP_BACKEND=importer');
  });

  it('should require credentials', () => {
    vi.stubEnv('WIKIBASE_USER', '');
    expect(() => loadCuratorConfig()).toThrow('WIKIBASE_USER is required');
  });

  it('should let overrides win over the environment', () => {
    expect(loadCuratorConfig({ personPageNamespace: 'Researcher' }).personPageNamespace).toBe('Researcher');
  });
});
