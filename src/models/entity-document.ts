/**
 * Wikibase JSON entity format, as returned by wbgetentities and accepted
 * by wbeditentity. Fields the curator never reads (sitelinks, page
 * metadata) are stripped on parse.
 *
 * @module models/entity-document
 */

import { z } from 'zod';

export const TermValueSchema = z.object({
  language: z.string(),
  value: z.string(),
});

export const WikibaseDataValueSchema = z.object({
  type: z.string(),
  value: z.unknown(),
});

export const WikibaseSnakSchema = z.object({
  snaktype: z.enum(['value', 'somevalue', 'novalue']),
  property: z.string(),
  datatype: z.string().optional(),
  datavalue: WikibaseDataValueSchema.optional(),
  hash: z.string().optional(),
});

export const WikibaseReferenceSchema = z.object({
  hash: z.string().optional(),
  snaks: z.record(z.array(WikibaseSnakSchema)),
  'snaks-order': z.array(z.string()).optional(),
});

export const WikibaseStatementSchema = z.object({
  id: z.string().optional(),
  type: z.literal('statement').default('statement'),
  mainsnak: WikibaseSnakSchema,
  rank: z.enum(['preferred', 'normal', 'deprecated']).default('normal'),
  qualifiers: z.record(z.array(WikibaseSnakSchema)).optional(),
  'qualifiers-order': z.array(z.string()).optional(),
  references: z.array(WikibaseReferenceSchema).optional(),
});

export const EntityDocumentSchema = z.object({
  id: z.string().optional(),
  type: z.enum(['item', 'property']),
  /** Properties only */
  datatype: z.string().optional(),
  labels: z.record(TermValueSchema).default({}),
  descriptions: z.record(TermValueSchema).default({}),
  aliases: z.record(z.array(TermValueSchema)).optional(),
  claims: z.record(z.array(WikibaseStatementSchema)).default({}),
  lastrevid: z.number().optional(),
});

export type TermValue = z.infer<typeof TermValueSchema>;
export type WikibaseDataValue = z.infer<typeof WikibaseDataValueSchema>;
export type WikibaseSnak = z.infer<typeof WikibaseSnakSchema>;
export type WikibaseReference = z.infer<typeof WikibaseReferenceSchema>;
export type WikibaseStatement = z.infer<typeof WikibaseStatementSchema>;
export type EntityDocument = z.infer<typeof EntityDocumentSchema>;

/** Marker that asks wbeditentity to delete an existing statement */
export interface StatementRemoval {
  id: string;
  remove: '';
}

/** Payload of a wbeditentity call: a document whose claim lists may carry removals */
export type EntityEdit = Omit<EntityDocument, 'claims'> & {
  claims: Record<string, Array<WikibaseStatement | StatementRemoval>>;
};

export function isStatementRemoval(entry: WikibaseStatement | StatementRemoval): entry is StatementRemoval {
  return 'remove' in entry;
}

/**
 * Term value of a label/description map for one language
 */
export function termValue(terms: Record<string, TermValue> | undefined, language = 'en'): string | undefined {
  return terms?.[language]?.value;
}
