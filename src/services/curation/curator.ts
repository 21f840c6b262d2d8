/**
 * Curator - entry point to the curation services
 *
 * Wires the resolver, claim builder and disambiguator over one context and
 * hands out entities bound to them.
 *
 * @module services/curation/curator
 */

import type { Datatype } from '../../models/datatype.js';
import type { EntityKind } from '../../models/entity-id.js';
import { notFoundError } from '../../server/errors.js';
import { ClaimBuilder } from './claim-builder.js';
import type { CurationContext } from './context.js';
import { Disambiguator } from './disambiguator.js';
import { type EntityServices, WikibaseEntity } from './entity.js';
import { IdentifierResolver } from './identifier-resolver.js';

export class Curator implements EntityServices {
  readonly resolver: IdentifierResolver;
  readonly claimBuilder: ClaimBuilder;
  readonly disambiguator: Disambiguator;

  constructor(readonly context: CurationContext) {
    this.resolver = new IdentifierResolver(context);
    this.claimBuilder = new ClaimBuilder(context, this.resolver);
    this.disambiguator = new Disambiguator(context);
  }

  newItem(): WikibaseEntity {
    return new WikibaseEntity(this, this.context.store.createEntity('item'));
  }

  newProperty(datatype: Datatype): WikibaseEntity {
    return new WikibaseEntity(this, this.context.store.createEntity('property')).setDatatype(datatype);
  }

  newEntity(kind: EntityKind): WikibaseEntity {
    return new WikibaseEntity(this, this.context.store.createEntity(kind));
  }

  async getItem(id: string): Promise<WikibaseEntity> {
    return this.getEntity(id, 'item');
  }

  async getProperty(id: string): Promise<WikibaseEntity> {
    return this.getEntity(id, 'property');
  }

  /**
   * Hydrate a persisted entity; fails NOT_FOUND when the id names the other kind
   */
  async getEntity(id: string, kind: EntityKind): Promise<WikibaseEntity> {
    const document = await this.context.store.getEntity(id);
    if (document.type !== kind) {
      throw notFoundError(id, kind);
    }
    return new WikibaseEntity(this, document);
  }
}
