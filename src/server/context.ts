/**
 * Curator process context
 *
 * Owns the wiki session, the lookup backend and the curation services for
 * the lifetime of the process. Created once at startup, torn down on exit;
 * handlers receive it explicitly.
 *
 * @module server/context
 */

import { Curator, curationSettingsFromConfig } from '../services/curation/index.js';
import type { GraphStore, LookupBackend } from '../services/graph-store/types.js';
import { WikibaseGraphStore } from '../services/graph-store/wikibase-graph-store.js';
import { createLookupBackend } from '../services/lookup/index.js';
import { MediaWikiClient } from '../services/wikibase/mediawiki-client.js';
import { SparqlClient } from '../services/wikibase/sparql-client.js';
import type { CuratorConfig } from './config.js';

export interface CuratorContext {
  config: CuratorConfig;
  wiki: MediaWikiClient;
  lookup: LookupBackend;
  store: GraphStore;
  curator: Curator;
}

/**
 * Log in to the wiki and open the configured lookup backend
 *
 * @throws CuratorError LOGIN_FAILED, BACKEND_UNAVAILABLE
 */
export async function createCuratorContext(config: CuratorConfig): Promise<CuratorContext> {
  const wiki = new MediaWikiClient({
    apiUrl: config.mediawikiApiUrl,
    user: config.user,
    password: config.password,
    loginWithBot: config.loginWithBot,
    timeoutMs: config.httpTimeoutMs,
  });
  await wiki.login();

  let lookup: LookupBackend;
  try {
    lookup = createLookupBackend(config);
  } catch (error) {
    wiki.close();
    throw error;
  }
  console.error(`[Context] Lookup backend: ${lookup.mode}`);

  const store = new WikibaseGraphStore(wiki, new SparqlClient(config.sparqlEndpointUrl, config.httpTimeoutMs), lookup);
  const curator = new Curator({ store, settings: curationSettingsFromConfig(config) });

  return { config, wiki, lookup, store, curator };
}

export function closeCuratorContext(context: CuratorContext): void {
  context.lookup.close();
  context.wiki.close();
  console.error('[Context] Closed');
}
