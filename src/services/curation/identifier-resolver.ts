/**
 * Identifier Resolver
 *
 * Maps any reference an agent may hold (local id, wd:/wdt: remote id, or an
 * English label) to the canonical local id. Rules apply in order, first
 * match wins:
 *
 *   1. Q123 / P123          -> returned unchanged, no backend call
 *   2. unprefixed label     -> created (allowCreate) or looked up by label
 *   3. wd:Q123 / wdt:P123   -> translated through the lookup backend
 *   4. anything else        -> INVALID_REFERENCE
 *
 * Label creation does not check for an existing entity first. Properties
 * are unique by label on the wiki, so their conflict comes back as the
 * existing id; items are only unique by label+description, so an unlabelled
 * duplicate can be minted. Callers that must not create use allowCreate=false.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/curation/identifier-resolver
 */

import type { Datatype } from '../../models/datatype.js';
import {
  type EntityKind,
  extractRemoteId,
  hasRemotePrefix,
  isLocalId,
  kindOfId,
} from '../../models/entity-id.js';
import { CuratorError, invalidReferenceError, isCuratorError, notFoundError } from '../../server/errors.js';
import type { CurationContext } from './context.js';
import { persistEntity } from './persist.js';

/** Trailing item id of an entity URI in a query result */
const ITEM_URI_PATTERN = /\/(Q\d+)$/;

export interface ResolveOptions {
  /** Datatype given to a property minted from a label (default: string) */
  datatype?: Datatype;
}

export class IdentifierResolver {
  constructor(private readonly context: CurationContext) {}

  /**
   * Resolve a reference to a local id
   *
   * @param reference - Local id, wd:/wdt: remote id, or English label
   * @param kind - Kind of entity a label refers to / creates
   * @param allowCreate - Mint a new entity for a label instead of looking it up
   * @throws CuratorError NOT_FOUND when nothing matches, INVALID_REFERENCE for malformed input
   */
  async resolve(
    reference: string,
    kind: EntityKind,
    allowCreate: boolean,
    options: ResolveOptions = {}
  ): Promise<string> {
    if (isLocalId(reference)) {
      return reference;
    }

    if (!hasRemotePrefix(reference)) {
      if (reference.trim().length === 0) {
        throw invalidReferenceError(reference);
      }
      return allowCreate
        ? this.createFromLabel(reference, kind, options)
        : this.findByLabel(reference, kind);
    }

    const remoteId = extractRemoteId(reference);
    if (remoteId) {
      return this.translateRemote(reference, remoteId);
    }

    throw invalidReferenceError(reference);
  }

  /**
   * Ids of every item whose `propertyRef` statement equals `value`.
   * Returns [] when the property is unknown or nothing matches.
   */
  async searchByValue(propertyRef: string, value: string | number): Promise<string[]> {
    let propertyId: string;
    try {
      propertyId = await this.resolve(propertyRef, 'property', false);
    } catch (error) {
      if (isCuratorError(error, 'NOT_FOUND')) {
        console.error(`[Resolver] searchByValue: property "${propertyRef}" has no local counterpart`);
        return [];
      }
      throw error;
    }

    const rows = await this.context.store.runStructuredQuery(
      buildValueQuery(propertyId, value, this.context.settings.sparqlDirectPropertyPrefix)
    );

    const ids: string[] = [];
    for (const row of rows) {
      const match = ITEM_URI_PATTERN.exec(row.item?.value ?? '');
      if (match) ids.push(match[1]);
    }
    return ids;
  }

  private async createFromLabel(label: string, kind: EntityKind, options: ResolveOptions): Promise<string> {
    const document = this.context.store.createEntity(kind);
    document.labels.en = { language: 'en', value: label };
    if (kind === 'property') {
      document.datatype = options.datatype ?? 'string';
    }

    const persisted = await persistEntity(this.context.store, document);
    if (!persisted.id) {
      throw new CuratorError('INTERNAL_ERROR', `Store returned no id after creating ${kind} "${label}"`);
    }
    console.error(`[Resolver] "${label}" resolved to ${kind} ${persisted.id} (create mode)`);
    return persisted.id;
  }

  private async findByLabel(label: string, kind: EntityKind): Promise<string> {
    const ids = await this.context.store.searchByLabel(kind, label);
    if (ids.length === 0) {
      throw notFoundError(label, kind);
    }
    return ids[0];
  }

  private async translateRemote(reference: string, remoteId: string): Promise<string> {
    const kind = kindOfId(remoteId);
    const localId = await this.context.store.lookupRemoteMapping(kind, remoteId);
    if (!localId) {
      throw notFoundError(reference, kind);
    }
    return localId;
  }
}

/**
 * SELECT query for items holding `propertyId` = `value`.
 * Strings become quoted literals; numbers are written bare.
 */
export function buildValueQuery(propertyId: string, value: string | number, directPropertyPrefix?: string): string {
  const literal = typeof value === 'string'
    ? `"${value.replace(/\\/g, '\\\\').replace(/"/g, '\\"')}"`
    : String(value);
  const query = `SELECT ?item WHERE {?item wdt:${propertyId} ${literal}}`;
  return directPropertyPrefix ? `PREFIX wdt: <${directPropertyPrefix}>\n${query}` : query;
}
