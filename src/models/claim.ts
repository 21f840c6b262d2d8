/**
 * Claim model
 *
 * A claim's payload shape is fixed by its property's datatype. The payload
 * is a closed union over the datatype enumeration: items carry a local id in
 * `value`, monolingual text carries `text`, time carries `time`, everything
 * else carries `value` as given. A null value/text/time is a "somevalue" snak.
 *
 * @module models/claim
 */

import type { Datatype } from './datatype.js';

export type ClaimRank = 'preferred' | 'normal' | 'deprecated';

/** Gregorian calendar model item on the reference graph, used by Wikibase for every time value */
export const GREGORIAN_CALENDAR = 'http://www.wikidata.org/entity/Q1985727';

/** Default globe for coordinates */
export const EARTH_GLOBE = 'http://www.wikidata.org/entity/Q2';

/** Day precision in the Wikibase time model */
export const DAY_PRECISION = 11;

export interface ItemPayload {
  datatype: 'wikibase-item';
  value: string | null;
}

export interface MonolingualTextPayload {
  datatype: 'monolingualtext';
  text: string | null;
  language: string;
}

export interface TimePayload {
  datatype: 'time';
  time: string | null;
  precision: number;
  timezone: number;
  before: number;
  after: number;
  calendarmodel: string;
}

export interface QuantityPayload {
  datatype: 'quantity';
  value: string | null;
  unit: string;
}

export interface GlobeCoordinatePayload {
  datatype: 'globe-coordinate';
  value: string | null;
  precision: number;
  globe: string;
}

export type PassThroughDatatype = Exclude<
  Datatype,
  'wikibase-item' | 'monolingualtext' | 'time' | 'quantity' | 'globe-coordinate'
>;

export interface PassThroughPayload {
  datatype: PassThroughDatatype;
  value: string | null;
}

export type ClaimPayload =
  | ItemPayload
  | MonolingualTextPayload
  | TimePayload
  | QuantityPayload
  | GlobeCoordinatePayload
  | PassThroughPayload;

/** A property/value pair, used as main snak, qualifier or reference snak */
export type Snak = { property: string } & ClaimPayload;

export type Claim = Snak & {
  /** Statement GUID, present once the claim has been persisted */
  id?: string;
  qualifiers: Snak[];
  references: Snak[][];
  rank: ClaimRank;
};

/**
 * The payload's principal value, whichever field carries it
 */
export function payloadValue(payload: ClaimPayload): string | null {
  switch (payload.datatype) {
    case 'monolingualtext':
      return payload.text;
    case 'time':
      return payload.time;
    default:
      return payload.value;
  }
}

/**
 * Literal value as read back by valuesOf(): only string, external-id,
 * wikibase-item and time claims yield one.
 */
export function literalValue(snak: Snak): string | null {
  switch (snak.datatype) {
    case 'string':
    case 'external-id':
    case 'wikibase-item':
      return snak.value;
    case 'time':
      return snak.time;
    default:
      return null;
  }
}
