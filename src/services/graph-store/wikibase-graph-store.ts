/**
 * GraphStore backed by a live Wikibase: Action API for entities and pages,
 * the SPARQL service for structured queries, and the configured lookup
 * backend for id mapping and label search.
 *
 * @module services/graph-store/wikibase-graph-store
 */

import type { EntityKind } from '../../models/entity-id.js';
import type { EntityDocument, EntityEdit } from '../../models/entity-document.js';
import type { MediaWikiClient } from '../wikibase/mediawiki-client.js';
import type { SparqlClient } from '../wikibase/sparql-client.js';
import type { GraphStore, LookupBackend, MergeResult, SparqlBinding, WriteOutcome } from './types.js';

export class WikibaseGraphStore implements GraphStore {
  constructor(
    private readonly wiki: MediaWikiClient,
    private readonly sparql: SparqlClient,
    private readonly lookup: LookupBackend
  ) {}

  getEntity(id: string): Promise<EntityDocument> {
    return this.wiki.getEntity(id);
  }

  createEntity(kind: EntityKind): EntityDocument {
    return { type: kind, labels: {}, descriptions: {}, claims: {} };
  }

  writeEntity(entity: EntityEdit): Promise<WriteOutcome> {
    return this.wiki.editEntity(entity);
  }

  runStructuredQuery(query: string): Promise<SparqlBinding[]> {
    return this.sparql.query(query);
  }

  lookupRemoteMapping(kind: EntityKind, remoteId: string): Promise<string | null> {
    return this.lookup.lookupRemoteMapping(kind, remoteId);
  }

  searchByLabel(kind: EntityKind, label: string): Promise<string[]> {
    return this.lookup.searchByLabel(kind, label);
  }

  mergeEntities(sourceId: string, targetId: string): Promise<MergeResult> {
    return this.wiki.mergeItems(sourceId, targetId);
  }

  deletePage(name: string): Promise<void> {
    return this.wiki.deletePage(name);
  }

  movePage(from: string, to: string): Promise<void> {
    return this.wiki.movePage(from, to);
  }
}
