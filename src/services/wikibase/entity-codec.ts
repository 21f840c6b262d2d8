/**
 * Claim <-> Wikibase statement JSON codec
 *
 * Decoding skips snaks whose datatype is outside the enumeration; those
 * statements are left untouched on the wiki because wbeditentity only
 * edits the statements it is sent.
 *
 * @module services/wikibase/entity-codec
 */

import { z } from 'zod';
import {
  type Claim,
  type ClaimPayload,
  type ClaimRank,
  type Snak,
  DAY_PRECISION,
  EARTH_GLOBE,
  GREGORIAN_CALENDAR,
  payloadValue,
} from '../../models/claim.js';
import { isDatatype, type Datatype } from '../../models/datatype.js';
import type {
  WikibaseDataValue,
  WikibaseReference,
  WikibaseSnak,
  WikibaseStatement,
} from '../../models/entity-document.js';
import { validationError } from '../../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// WIRE VALUE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const EntityIdValue = z.object({
  'entity-type': z.string(),
  'numeric-id': z.number().optional(),
  id: z.string().optional(),
});

const MonolingualValue = z.object({ text: z.string(), language: z.string() });

const TimeValue = z.object({
  time: z.string(),
  timezone: z.number().default(0),
  before: z.number().default(0),
  after: z.number().default(0),
  precision: z.number().default(DAY_PRECISION),
  calendarmodel: z.string().default(GREGORIAN_CALENDAR),
});

const QuantityValue = z.object({ amount: z.string(), unit: z.string().default('1') });

const GlobeCoordinateValue = z.object({
  latitude: z.number(),
  longitude: z.number(),
  precision: z.number().nullable().default(null),
  globe: z.string().default(EARTH_GLOBE),
});

const ENTITY_TYPE_BY_DATATYPE: Partial<Record<Datatype, string>> = {
  'wikibase-item': 'item',
  'wikibase-property': 'property',
  'wikibase-lexeme': 'lexeme',
  'wikibase-form': 'form',
  'wikibase-sense': 'sense',
};

// ═══════════════════════════════════════════════════════════════════════════════
// ENCODING
// ═══════════════════════════════════════════════════════════════════════════════

function encodeEntityId(datatype: Datatype, id: string): WikibaseDataValue {
  const entityType = ENTITY_TYPE_BY_DATATYPE[datatype] ?? 'item';
  const numeric = /^[A-Z](\d+)$/.exec(id);
  return {
    type: 'wikibase-entityid',
    value: numeric
      ? { 'entity-type': entityType, 'numeric-id': parseInt(numeric[1], 10), id }
      : { 'entity-type': entityType, id },
  };
}

function parseCoordinate(value: string): { latitude: number; longitude: number } {
  const parts = value.split(',').map((part) => Number(part.trim()));
  if (parts.length !== 2 || parts.some((part) => Number.isNaN(part))) {
    throw validationError(`Globe coordinate must be "latitude,longitude", got "${value}"`, { value });
  }
  return { latitude: parts[0], longitude: parts[1] };
}

/**
 * Datavalue for a payload, or undefined for a somevalue snak
 */
export function encodeDataValue(payload: ClaimPayload): WikibaseDataValue | undefined {
  if (payloadValue(payload) === null) return undefined;

  switch (payload.datatype) {
    case 'wikibase-item':
    case 'wikibase-property':
    case 'wikibase-lexeme':
    case 'wikibase-form':
    case 'wikibase-sense':
      return encodeEntityId(payload.datatype, payload.value ?? '');
    case 'monolingualtext':
      return { type: 'monolingualtext', value: { text: payload.text, language: payload.language } };
    case 'time':
      return {
        type: 'time',
        value: {
          time: payload.time,
          timezone: payload.timezone,
          before: payload.before,
          after: payload.after,
          precision: payload.precision,
          calendarmodel: payload.calendarmodel,
        },
      };
    case 'quantity':
      return { type: 'quantity', value: { amount: payload.value, unit: payload.unit } };
    case 'globe-coordinate': {
      const { latitude, longitude } = parseCoordinate(payload.value ?? '');
      return {
        type: 'globecoordinate',
        value: { latitude, longitude, altitude: null, precision: payload.precision, globe: payload.globe },
      };
    }
    case 'string':
    case 'external-id':
    case 'url':
    case 'commonsMedia':
    case 'geo-shape':
    case 'tabular-data':
    case 'math':
    case 'musical-notation':
      return { type: 'string', value: payload.value };
  }
}

export function encodeSnak(snak: Snak): WikibaseSnak {
  const datavalue = encodeDataValue(snak);
  return datavalue
    ? { snaktype: 'value', property: snak.property, datatype: snak.datatype, datavalue }
    : { snaktype: 'somevalue', property: snak.property, datatype: snak.datatype };
}

function groupSnaks(snaks: Snak[]): { snaks: Record<string, WikibaseSnak[]>; order: string[] } {
  const grouped: Record<string, WikibaseSnak[]> = {};
  const order: string[] = [];
  for (const snak of snaks) {
    if (!grouped[snak.property]) {
      grouped[snak.property] = [];
      order.push(snak.property);
    }
    grouped[snak.property].push(encodeSnak(snak));
  }
  return { snaks: grouped, order };
}

export function encodeClaim(claim: Claim): WikibaseStatement {
  const statement: WikibaseStatement = {
    type: 'statement',
    mainsnak: encodeSnak(claim),
    rank: claim.rank,
  };
  if (claim.id) statement.id = claim.id;

  if (claim.qualifiers.length > 0) {
    const { snaks, order } = groupSnaks(claim.qualifiers);
    statement.qualifiers = snaks;
    statement['qualifiers-order'] = order;
  }

  if (claim.references.length > 0) {
    statement.references = claim.references.map((reference): WikibaseReference => {
      const { snaks, order } = groupSnaks(reference);
      return { snaks, 'snaks-order': order };
    });
  }

  return statement;
}

// ═══════════════════════════════════════════════════════════════════════════════
// DECODING
// ═══════════════════════════════════════════════════════════════════════════════

function decodePayload(datatype: Datatype, datavalue: WikibaseDataValue | undefined): ClaimPayload | null {
  const raw = datavalue?.value;

  switch (datatype) {
    case 'wikibase-item':
    case 'wikibase-property':
    case 'wikibase-lexeme':
    case 'wikibase-form':
    case 'wikibase-sense': {
      if (raw === undefined) return { datatype, value: null };
      const parsed = EntityIdValue.safeParse(raw);
      if (!parsed.success) return null;
      const prefix = parsed.data['entity-type'] === 'property' ? 'P' : 'Q';
      const id = parsed.data.id ?? `${prefix}${parsed.data['numeric-id'] ?? ''}`;
      return { datatype, value: id };
    }
    case 'monolingualtext': {
      if (raw === undefined) return { datatype, text: null, language: 'en' };
      const parsed = MonolingualValue.safeParse(raw);
      return parsed.success ? { datatype, text: parsed.data.text, language: parsed.data.language } : null;
    }
    case 'time': {
      if (raw === undefined) {
        return { datatype, time: null, precision: DAY_PRECISION, timezone: 0, before: 0, after: 0, calendarmodel: GREGORIAN_CALENDAR };
      }
      const parsed = TimeValue.safeParse(raw);
      return parsed.success ? { datatype, ...parsed.data } : null;
    }
    case 'quantity': {
      if (raw === undefined) return { datatype, value: null, unit: '1' };
      const parsed = QuantityValue.safeParse(raw);
      return parsed.success ? { datatype, value: parsed.data.amount, unit: parsed.data.unit } : null;
    }
    case 'globe-coordinate': {
      if (raw === undefined) return { datatype, value: null, precision: 0, globe: EARTH_GLOBE };
      const parsed = GlobeCoordinateValue.safeParse(raw);
      if (!parsed.success) return null;
      return {
        datatype,
        value: `${parsed.data.latitude},${parsed.data.longitude}`,
        precision: parsed.data.precision ?? 0,
        globe: parsed.data.globe,
      };
    }
    case 'string':
    case 'external-id':
    case 'url':
    case 'commonsMedia':
    case 'geo-shape':
    case 'tabular-data':
    case 'math':
    case 'musical-notation':
      if (raw === undefined) return { datatype, value: null };
      return typeof raw === 'string' ? { datatype, value: raw } : null;
  }
}

/**
 * Decode a wire snak, or null when its datatype or value shape is not understood.
 * novalue snaks also decode to null: they carry nothing a caller can match on.
 */
export function decodeSnak(snak: WikibaseSnak): Snak | null {
  if (snak.snaktype === 'novalue' || !snak.datatype || !isDatatype(snak.datatype)) return null;
  const payload = decodePayload(snak.datatype, snak.datavalue);
  return payload ? { property: snak.property, ...payload } : null;
}

function decodeSnakGroups(groups: Record<string, WikibaseSnak[]> | undefined): Snak[] {
  const snaks: Snak[] = [];
  for (const list of Object.values(groups ?? {})) {
    for (const wire of list) {
      const snak = decodeSnak(wire);
      if (snak) snaks.push(snak);
    }
  }
  return snaks;
}

export function decodeClaim(statement: WikibaseStatement): Claim | null {
  const main = decodeSnak(statement.mainsnak);
  if (!main) return null;
  const rank: ClaimRank = statement.rank ?? 'normal';
  return {
    ...main,
    id: statement.id,
    qualifiers: decodeSnakGroups(statement.qualifiers),
    references: (statement.references ?? []).map((reference) => decodeSnakGroups(reference.snaks)),
    rank,
  };
}

/**
 * Decode every statement of a claims map, preserving property then statement order
 */
export function decodeClaims(claims: Record<string, WikibaseStatement[]>): Claim[] {
  const decoded: Claim[] = [];
  for (const statements of Object.values(claims)) {
    for (const statement of statements) {
      const claim = decodeClaim(statement);
      if (claim) decoded.push(claim);
    }
  }
  return decoded;
}
