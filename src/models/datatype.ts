/**
 * Property datatypes
 *
 * @module models/datatype
 */

import { z } from 'zod';

export const DATATYPES = [
  'wikibase-item',
  'commonsMedia',
  'external-id',
  'wikibase-form',
  'geo-shape',
  'globe-coordinate',
  'wikibase-lexeme',
  'math',
  'monolingualtext',
  'musical-notation',
  'wikibase-property',
  'quantity',
  'wikibase-sense',
  'string',
  'tabular-data',
  'time',
  'url',
] as const;

export type Datatype = (typeof DATATYPES)[number];

export const DatatypeSchema = z.enum(DATATYPES);

const DATATYPE_SET: ReadonlySet<string> = new Set(DATATYPES);

export function isDatatype(value: string): value is Datatype {
  return DATATYPE_SET.has(value);
}

export interface PropertyDescriptor {
  id: string;
  datatype: Datatype;
}
