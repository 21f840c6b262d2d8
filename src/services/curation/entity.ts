/**
 * WikibaseEntity - in-memory working copy of an item or property
 *
 * Holds labels, descriptions and decoded claims. Mutations stay local until
 * write(); toJSON() renders the wbeditentity payload, including removal
 * markers for persisted statements dropped by replace_all.
 *
 * Statements whose datatype the curator does not understand are never
 * decoded. They are left alone on the wiki unless replace_all drops their
 * property.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/curation/entity
 */

import { type Claim, literalValue } from '../../models/claim.js';
import type { Datatype } from '../../models/datatype.js';
import {
  type EntityDocument,
  type EntityEdit,
  type StatementRemoval,
  type TermValue,
  type WikibaseStatement,
  termValue,
} from '../../models/entity-document.js';
import { type EntityKind, extractRemoteId, hasRemotePrefix, isLocalId } from '../../models/entity-id.js';
import { isCuratorError, validationError } from '../../server/errors.js';
import { decodeClaim, decodeClaims, encodeClaim } from '../wikibase/entity-codec.js';
import type { ClaimBuilder, ClaimOptions } from './claim-builder.js';
import type { CurationContext } from './context.js';
import type { IdentifierResolver } from './identifier-resolver.js';
import { persistEntity } from './persist.js';

// ═══════════════════════════════════════════════════════════════════════════════
// TYPES
// ═══════════════════════════════════════════════════════════════════════════════

export const CLAIM_ACTIONS = ['append_or_replace', 'replace_all'] as const;

export type ClaimAction = (typeof CLAIM_ACTIONS)[number];

/** Collaborators an entity needs for resolution, claim building and persistence */
export interface EntityServices {
  context: CurationContext;
  resolver: IdentifierResolver;
  claimBuilder: ClaimBuilder;
}

interface PendingRemoval {
  property: string;
  id: string;
}

interface Instance {
  id: string;
  document: EntityDocument;
}

/**
 * Unknown action strings fall back to append_or_replace
 */
export function normalizeClaimAction(action: string): ClaimAction {
  if (action === 'replace_all') return 'replace_all';
  if (action !== 'append_or_replace') {
    console.error(`[Entity] Unknown claim action "${action}", using append_or_replace`);
  }
  return 'append_or_replace';
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTITY
// ═══════════════════════════════════════════════════════════════════════════════

export class WikibaseEntity {
  readonly kind: EntityKind;
  readonly id: string | undefined;
  private datatype: string | undefined;
  private readonly labels: Record<string, TermValue>;
  private readonly descriptions: Record<string, TermValue>;
  private readonly aliases: Record<string, TermValue[]> | undefined;
  private readonly lastrevid: number | undefined;
  private claims: Claim[];
  /** Ids of persisted statements the curator could not decode, by property */
  private readonly opaqueStatementIds = new Map<string, string[]>();
  private readonly removals: PendingRemoval[] = [];

  constructor(
    private readonly services: EntityServices,
    document: EntityDocument
  ) {
    this.kind = document.type;
    this.id = document.id;
    this.datatype = document.datatype;
    this.labels = { ...document.labels };
    this.descriptions = { ...document.descriptions };
    this.aliases = document.aliases;
    this.lastrevid = document.lastrevid;
    this.claims = [];

    for (const [property, statements] of Object.entries(document.claims)) {
      for (const statement of statements) {
        const claim = decodeClaim(statement);
        if (claim) {
          this.claims.push(claim);
        } else if (statement.id) {
          const ids = this.opaqueStatementIds.get(property) ?? [];
          ids.push(statement.id);
          this.opaqueStatementIds.set(property, ids);
        }
      }
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Terms
  // ─────────────────────────────────────────────────────────────────────────────

  getLabel(language = 'en'): string | undefined {
    return termValue(this.labels, language);
  }

  setLabel(value: string, language = 'en'): this {
    this.labels[language] = { language, value };
    return this;
  }

  getDescription(language = 'en'): string | undefined {
    return termValue(this.descriptions, language);
  }

  setDescription(value: string, language = 'en'): this {
    this.descriptions[language] = { language, value };
    return this;
  }

  getDatatype(): string | undefined {
    return this.datatype;
  }

  setDatatype(datatype: Datatype): this {
    if (this.kind !== 'property') {
      throw validationError('Only properties carry a datatype', { kind: this.kind });
    }
    this.datatype = datatype;
    return this;
  }

  getClaims(): readonly Claim[] {
    return this.claims;
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Claims
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Build a claim and merge it into the working copy.
   *
   * append_or_replace replaces the first claim of the same property in place,
   * keeping its statement id; replace_all drops every claim of the property first.
   */
  async addClaim(
    propertyRef: string,
    value: string | null,
    action: string = 'append_or_replace',
    options: ClaimOptions = {}
  ): Promise<this> {
    const claim = await this.services.claimBuilder.build(propertyRef, value, options);
    this.applyClaim(claim, normalizeClaimAction(action));
    return this;
  }

  /**
   * Merge already-built claims, in order, under one action
   */
  addClaims(claims: Claim[], action: string = 'append_or_replace'): this {
    const normalized = normalizeClaimAction(action);
    for (const claim of claims) {
      this.applyClaim(claim, normalized);
    }
    return this;
  }

  /**
   * Link this entity to its reference-graph counterpart through the
   * deployment's linker property.
   *
   * @param remoteId - Q/P id on the reference graph, with or without wd:/wdt:
   */
  async addLinkerClaim(remoteId: string): Promise<this> {
    const { remoteItemLinkProperty, remotePropertyLinkProperty } = this.services.context.settings;
    const linkProperty = this.kind === 'item' ? remoteItemLinkProperty : remotePropertyLinkProperty;
    if (!linkProperty) {
      throw validationError(`No linker property configured for ${this.kind}s`, { kind: this.kind });
    }

    const bareId = hasRemotePrefix(remoteId) ? extractRemoteId(remoteId) : remoteId;
    if (!bareId || !isLocalId(bareId)) {
      throw validationError(`Not a reference-graph id: "${remoteId}"`, { remoteId });
    }

    return this.addClaim(linkProperty, bareId, 'append_or_replace', { newPropertyDatatype: 'external-id' });
  }

  private applyClaim(claim: Claim, action: ClaimAction): void {
    if (action === 'replace_all') {
      this.dropProperty(claim.property);
      this.claims.push(claim);
      return;
    }

    const index = this.claims.findIndex((existing) => existing.property === claim.property);
    if (index === -1) {
      this.claims.push(claim);
      return;
    }
    this.claims[index] = { ...claim, id: this.claims[index].id };
  }

  private dropProperty(property: string): void {
    const kept: Claim[] = [];
    for (const claim of this.claims) {
      if (claim.property !== property) {
        kept.push(claim);
      } else if (claim.id) {
        this.removals.push({ property, id: claim.id });
      }
    }
    this.claims = kept;

    for (const id of this.opaqueStatementIds.get(property) ?? []) {
      this.removals.push({ property, id });
    }
    this.opaqueStatementIds.delete(property);
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Lookup
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Ids of every entity of the same kind sharing this entity's English label
   */
  async findDuplicateCandidates(): Promise<string[]> {
    const label = this.getLabel();
    if (!label) return [];
    return this.services.context.store.searchByLabel(this.kind, label);
  }

  /**
   * Id of an already persisted counterpart: same label (and, for items, same
   * English description; a missing description compares as empty).
   */
  async exists(): Promise<string | null> {
    const candidates = await this.findDuplicateCandidates();
    if (this.kind === 'property') {
      return candidates[0] ?? null;
    }

    const description = this.getDescription() ?? '';
    for (const candidate of candidates) {
      const document = await this.services.context.store.getEntity(candidate);
      if ((termValue(document.descriptions) ?? '') === description) {
        return candidate;
      }
    }
    return null;
  }

  async isInstanceOf(classRef: string): Promise<boolean> {
    const first = await this.instancesOf(classRef).next();
    return first.done !== true;
  }

  async instancesSharingLabel(classRef: string): Promise<string[]> {
    const ids: string[] = [];
    for await (const instance of this.instancesOf(classRef)) {
      ids.push(instance.id);
    }
    return ids;
  }

  /**
   * First same-label instance of `classRef` whose `propertyRef` values include `value`
   */
  async instanceWithProperty(classRef: string, propertyRef: string, value: string): Promise<string | null> {
    const propertyId = await this.resolveOrNull(propertyRef, 'property');
    if (!propertyId) return null;

    let expected = value;
    if (hasRemotePrefix(value)) {
      const localId = await this.resolveOrNull(value, 'item');
      if (!localId) return null;
      expected = localId;
    }

    for await (const instance of this.instancesOf(classRef)) {
      if (extractValues(instance.document, propertyId).includes(expected)) {
        return instance.id;
      }
    }
    return null;
  }

  /**
   * Literal values this entity holds for a property, read from the store.
   * Returns [] when the entity has no persisted counterpart.
   */
  async valuesOf(propertyRef: string): Promise<string[]> {
    const id = this.id ?? (await this.exists());
    if (!id) return [];

    const propertyId = await this.resolveOrNull(propertyRef, 'property');
    if (!propertyId) return [];

    const document = await this.services.context.store.getEntity(id);
    return extractValues(document, propertyId);
  }

  /**
   * Same-label candidates whose first instance-of claim names the class
   */
  private async *instancesOf(classRef: string): AsyncGenerator<Instance> {
    const instanceOf = await this.resolveOrNull(this.services.context.settings.instanceOfProperty, 'property');
    const classId = await this.resolveOrNull(classRef, 'item');
    if (!instanceOf || !classId) return;

    for (const candidate of await this.findDuplicateCandidates()) {
      const document = await this.services.context.store.getEntity(candidate);
      const first = document.claims[instanceOf]?.[0];
      const claim = first ? decodeClaim(first) : null;
      if (claim?.datatype === 'wikibase-item' && claim.value === classId) {
        yield { id: candidate, document };
      }
    }
  }

  private async resolveOrNull(reference: string, kind: EntityKind): Promise<string | null> {
    try {
      return await this.services.resolver.resolve(reference, kind, false);
    } catch (error) {
      if (isCuratorError(error, 'NOT_FOUND')) {
        console.error(`[Entity] ${kind} "${reference}" not found`);
        return null;
      }
      throw error;
    }
  }

  // ─────────────────────────────────────────────────────────────────────────────
  // Persistence
  // ─────────────────────────────────────────────────────────────────────────────

  /**
   * Persist the working copy and return the stored entity. An exact
   * label+description collision returns the existing entity instead.
   */
  async write(): Promise<WikibaseEntity> {
    const document = await persistEntity(this.services.context.store, this.toJSON());
    return new WikibaseEntity(this.services, document);
  }

  toJSON(): EntityEdit {
    const claims: Record<string, Array<WikibaseStatement | StatementRemoval>> = {};
    for (const claim of this.claims) {
      (claims[claim.property] ??= []).push(encodeClaim(claim));
    }
    for (const removal of this.removals) {
      (claims[removal.property] ??= []).push({ id: removal.id, remove: '' });
    }

    const edit: EntityEdit = {
      type: this.kind,
      labels: { ...this.labels },
      descriptions: { ...this.descriptions },
      claims,
    };
    if (this.id) edit.id = this.id;
    if (this.lastrevid !== undefined) edit.lastrevid = this.lastrevid;
    if (this.kind === 'property' && this.datatype) edit.datatype = this.datatype;
    if (this.aliases) edit.aliases = this.aliases;
    return edit;
  }
}

function extractValues(document: EntityDocument, propertyId: string): string[] {
  const values: string[] = [];
  for (const claim of decodeClaims({ [propertyId]: document.claims[propertyId] ?? [] })) {
    const value = literalValue(claim);
    if (value !== null) values.push(value);
  }
  return values;
}
