/**
 * Claim Builder
 *
 * Turns (property reference, raw string value) into a claim shaped for the
 * property's declared datatype. Dispatch goes through CLAIM_CONSTRUCTORS, a
 * table keyed by every member of the datatype enumeration; a datatype added
 * to the enumeration without a constructor does not compile.
 *
 * @module services/curation/claim-builder
 */

import {
  type Claim,
  type ClaimPayload,
  type ClaimRank,
  type Snak,
  DAY_PRECISION,
  EARTH_GLOBE,
  GREGORIAN_CALENDAR,
} from '../../models/claim.js';
import { type Datatype, type PropertyDescriptor, isDatatype } from '../../models/datatype.js';
import { hasRemotePrefix } from '../../models/entity-id.js';
import { isCuratorError, propertyNotFoundError, unknownDatatypeError } from '../../server/errors.js';
import type { CurationContext } from './context.js';
import type { IdentifierResolver } from './identifier-resolver.js';

export interface ClaimOptions {
  qualifiers?: Snak[];
  references?: Snak[][];
  rank?: ClaimRank;
  /** monolingualtext language (default: en) */
  language?: string;
  /** time precision (default: 11, day) or globe-coordinate precision */
  precision?: number;
  timezone?: number;
  before?: number;
  after?: number;
  calendarModel?: string;
  /** quantity unit IRI (default: "1", unitless) */
  unit?: string;
  globe?: string;
  /** Datatype of the property if the reference is a label that has to be minted */
  newPropertyDatatype?: Datatype;
}

type ClaimConstructor<D extends Datatype> = (value: string | null, options: ClaimOptions) => ClaimPayload & { datatype: D };

const passThrough =
  <D extends Datatype>(datatype: D) =>
  (value: string | null) => ({ datatype, value });

function signedAmount(value: string | null): string | null {
  if (value === null) return null;
  const trimmed = value.trim();
  return /^[0-9.]/.test(trimmed) ? `+${trimmed}` : trimmed;
}

export const CLAIM_CONSTRUCTORS: { [D in Datatype]: ClaimConstructor<D> } = {
  'wikibase-item': (value) => ({ datatype: 'wikibase-item', value }),
  monolingualtext: (value, options) => ({
    datatype: 'monolingualtext',
    text: value,
    language: options.language ?? 'en',
  }),
  time: (value, options) => ({
    datatype: 'time',
    time: value,
    precision: options.precision ?? DAY_PRECISION,
    timezone: options.timezone ?? 0,
    before: options.before ?? 0,
    after: options.after ?? 0,
    calendarmodel: options.calendarModel ?? GREGORIAN_CALENDAR,
  }),
  quantity: (value, options) => ({
    datatype: 'quantity',
    value: signedAmount(value),
    unit: options.unit ?? '1',
  }),
  'globe-coordinate': (value, options) => ({
    datatype: 'globe-coordinate',
    value,
    precision: options.precision ?? 0.0001,
    globe: options.globe ?? EARTH_GLOBE,
  }),
  commonsMedia: passThrough('commonsMedia'),
  'external-id': passThrough('external-id'),
  'wikibase-form': passThrough('wikibase-form'),
  'geo-shape': passThrough('geo-shape'),
  'wikibase-lexeme': passThrough('wikibase-lexeme'),
  math: passThrough('math'),
  'musical-notation': passThrough('musical-notation'),
  'wikibase-property': passThrough('wikibase-property'),
  'wikibase-sense': passThrough('wikibase-sense'),
  string: passThrough('string'),
  'tabular-data': passThrough('tabular-data'),
  url: passThrough('url'),
};

export class ClaimBuilder {
  /** Datatypes never change once a property exists */
  private readonly descriptors = new Map<string, PropertyDescriptor>();

  constructor(
    private readonly context: CurationContext,
    private readonly resolver: IdentifierResolver
  ) {}

  /**
   * Build a claim for `propertyRef` (label, local or wdt: id) with a raw value.
   * A property label never seen before is minted as a new property.
   *
   * @throws CuratorError PROPERTY_NOT_FOUND, UNKNOWN_DATATYPE
   */
  async build(propertyRef: string, value: string | null, options: ClaimOptions = {}): Promise<Claim> {
    const descriptor = await this.describe(propertyRef, options.newPropertyDatatype);

    let resolvedValue = value;
    if (descriptor.datatype === 'wikibase-item' && value !== null && hasRemotePrefix(value)) {
      resolvedValue = await this.resolver.resolve(value, 'item', true);
    }

    const payload = CLAIM_CONSTRUCTORS[descriptor.datatype](resolvedValue, options);
    return {
      property: descriptor.id,
      ...payload,
      qualifiers: options.qualifiers ?? [],
      references: options.references ?? [],
      rank: options.rank ?? 'normal',
    };
  }

  /**
   * Resolve a property reference and read its declared datatype
   */
  async describe(propertyRef: string, newPropertyDatatype?: Datatype): Promise<PropertyDescriptor> {
    let propertyId: string;
    try {
      propertyId = await this.resolver.resolve(propertyRef, 'property', true, { datatype: newPropertyDatatype });
    } catch (error) {
      if (isCuratorError(error, 'NOT_FOUND') || isCuratorError(error, 'INVALID_REFERENCE')) {
        throw propertyNotFoundError(propertyRef, error);
      }
      throw error;
    }

    const cached = this.descriptors.get(propertyId);
    if (cached) return cached;

    let datatype: string | undefined;
    try {
      const document = await this.context.store.getEntity(propertyId);
      if (document.type !== 'property') {
        throw propertyNotFoundError(propertyRef);
      }
      datatype = document.datatype;
    } catch (error) {
      if (isCuratorError(error, 'NOT_FOUND')) {
        throw propertyNotFoundError(propertyRef, error);
      }
      throw error;
    }

    if (!datatype || !isDatatype(datatype)) {
      throw unknownDatatypeError(propertyId, datatype ?? '');
    }

    const descriptor: PropertyDescriptor = { id: propertyId, datatype };
    this.descriptors.set(propertyId, descriptor);
    return descriptor;
  }
}
