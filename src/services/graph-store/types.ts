/**
 * GraphStore capability
 *
 * Everything the curator core needs from the wiki: entity reads and writes,
 * structured queries, remote-id mapping, label search, merges, and the page
 * side channel. The core never sees how an edit is transmitted.
 *
 * @module services/graph-store/types
 */

import type { EntityKind } from '../../models/entity-id.js';
import type { EntityDocument, EntityEdit } from '../../models/entity-document.js';

/** One row of a SPARQL JSON result: variable name -> bound term */
export type SparqlBinding = Record<string, { type: string; value: string; datatype?: string; 'xml:lang'?: string }>;

/**
 * Outcome of persisting an entity. A label/description conflict reported by the
 * store is a normal outcome carrying the conflicting id, not an exception.
 */
export type WriteOutcome =
  | { status: 'created'; document: EntityDocument }
  | { status: 'already_exists'; id: string };

export interface MergeResult {
  from: string;
  to: string;
}

/**
 * Id-mapping and label-search backend. Two interchangeable implementations
 * exist (direct database, importer API); one is chosen at startup.
 */
export interface LookupBackend {
  readonly mode: 'direct' | 'importer';
  /** Local id for a bare remote id (e.g. "Q5"), or null when unmapped */
  lookupRemoteMapping(kind: EntityKind, remoteId: string): Promise<string | null>;
  /** Local ids of every entity of `kind` whose English label equals `label` */
  searchByLabel(kind: EntityKind, label: string): Promise<string[]>;
  close(): void;
}

export interface GraphStore {
  /** Fully hydrated entity; fails NOT_FOUND for an unknown or missing id */
  getEntity(id: string): Promise<EntityDocument>;
  /** Unset document of the given kind; nothing is persisted */
  createEntity(kind: EntityKind): EntityDocument;
  writeEntity(entity: EntityEdit): Promise<WriteOutcome>;
  runStructuredQuery(query: string): Promise<SparqlBinding[]>;
  lookupRemoteMapping(kind: EntityKind, remoteId: string): Promise<string | null>;
  searchByLabel(kind: EntityKind, label: string): Promise<string[]>;
  mergeEntities(sourceId: string, targetId: string): Promise<MergeResult>;
  deletePage(name: string): Promise<void>;
  movePage(from: string, to: string): Promise<void>;
}
