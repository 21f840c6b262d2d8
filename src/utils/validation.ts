/**
 * Zod validation helpers and shared schemas for tool inputs
 *
 * @module utils/validation
 */

import { z } from 'zod';
import { DatatypeSchema } from '../models/datatype.js';
import { LOCAL_ID_PATTERN } from '../models/entity-id.js';

// ═══════════════════════════════════════════════════════════════════════════════
// CUSTOM ERROR CLASS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * Custom validation error with descriptive message
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPER FUNCTIONS
// ═══════════════════════════════════════════════════════════════════════════════

function describeIssues(error: z.ZodError): string {
  return error.errors
    .map((e) => {
      const path = e.path.length > 0 ? `${e.path.join('.')}: ` : '';
      return `${path}${e.message}`;
    })
    .join('; ');
}

/**
 * Validate input against schema and throw descriptive error if invalid
 *
 * @throws ValidationError listing every failing path
 */
export function validateInput<S extends z.ZodTypeAny>(schema: S, input: unknown): z.output<S> {
  const result = schema.safeParse(input);
  if (!result.success) {
    throw new ValidationError(describeIssues(result.error));
  }
  return result.data;
}

// ═══════════════════════════════════════════════════════════════════════════════
// SHARED ENUMS AND BASE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

export const EntityKindSchema = z.enum(['item', 'property']);

export const ClaimRankSchema = z.enum(['preferred', 'normal', 'deprecated']);

/** Any reference the resolver accepts: local id, wd:/wdt: id or English label */
export const ReferenceSchema = z.string().min(1, 'Reference cannot be empty');

export const LocalIdSchema = z.string().regex(LOCAL_ID_PATTERN, 'Expected a local id such as Q42 or P31');

export const LocalItemIdSchema = z.string().regex(/^Q\d+$/, 'Expected a local item id such as Q42');

export const LanguageCodeSchema = z.string().min(2).max(12);

/** Datatype extras accepted wherever a claim is built */
export const ClaimExtrasSchema = z.object({
  rank: ClaimRankSchema.optional(),
  language: LanguageCodeSchema.optional().describe('monolingualtext language (default: en)'),
  precision: z.number().optional().describe('time precision (11 = day) or coordinate precision'),
  timezone: z.number().int().optional(),
  calendar_model: z.string().url().optional(),
  unit: z.string().optional().describe('quantity unit IRI (default: 1)'),
  globe: z.string().url().optional(),
  property_datatype: DatatypeSchema.optional()
    .describe('Datatype for a property that does not exist yet and is minted from its label'),
});

export type ClaimExtras = z.infer<typeof ClaimExtrasSchema>;

/** Term map keyed by language code */
export const TermMapSchema = z.record(LanguageCodeSchema, z.string().min(1));
