/**
 * Curation MCP Tools
 *
 * Tools: kg_resolve_identifier, kg_search_by_value, kg_build_claim,
 *        kg_entity_find, kg_entity_upsert, kg_entity_values,
 *        kg_instance_lookup, kg_merge_authors
 *
 * CRITICAL: NEVER use console.log() - stdout is reserved for JSON-RPC protocol.
 *
 * @module tools/curation
 */

import { z } from 'zod';
import { DatatypeSchema } from '../models/datatype.js';
import { validationError } from '../server/errors.js';
import type { ClaimOptions } from '../services/curation/claim-builder.js';
import type { Curator } from '../services/curation/curator.js';
import type { WikibaseEntity } from '../services/curation/entity.js';
import {
  type ClaimExtras,
  ClaimExtrasSchema,
  EntityKindSchema,
  LocalIdSchema,
  LocalItemIdSchema,
  ReferenceSchema,
  TermMapSchema,
  validateInput,
} from '../utils/validation.js';
import { handleError, successResponse, type ToolDefinition, type ToolResponse } from './shared.js';

// ═══════════════════════════════════════════════════════════════════════════════
// INPUT SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ResolveIdentifierInput = z.object({
  reference: ReferenceSchema.describe('Local id (Q42), reference-graph id (wd:Q42, wdt:P31) or English label'),
  kind: EntityKindSchema.default('item').describe('Kind a label refers to'),
  allow_create: z.boolean().default(false)
    .describe('Mint a new entity for a label instead of looking it up'),
  datatype: DatatypeSchema.optional().describe('Datatype of a property minted from a label (default: string)'),
});

const SearchByValueInput = z.object({
  property: ReferenceSchema,
  value: z.union([z.string(), z.number()]),
});

const BuildClaimInput = ClaimExtrasSchema.extend({
  property: ReferenceSchema,
  value: z.string().nullable().describe('Raw value; null records an unknown value'),
});

const EntityFindInput = z.object({
  kind: EntityKindSchema.default('item'),
  label: z.string().min(1),
  description: z.string().optional().describe('English description; only items compare it'),
});

const ClaimInput = ClaimExtrasSchema.extend({
  property: ReferenceSchema,
  value: z.string().nullable(),
  action: z.string().default('append_or_replace')
    .describe('append_or_replace (default) or replace_all'),
});

const EntityUpsertInput = z.object({
  kind: EntityKindSchema.default('item'),
  id: LocalIdSchema.optional().describe('Edit this entity instead of creating one'),
  datatype: DatatypeSchema.optional().describe('Required when creating a property'),
  labels: TermMapSchema.default({}),
  descriptions: TermMapSchema.default({}),
  claims: z.array(ClaimInput).default([]),
  remote_id: z.string().optional().describe('Reference-graph id to link through the linker property'),
  reuse_existing: z.boolean().default(true)
    .describe('Edit a same-label (and description) entity when one exists instead of creating'),
});

const EntityValuesInput = z.object({
  kind: EntityKindSchema.default('item'),
  id: LocalIdSchema.optional(),
  label: z.string().min(1).optional(),
  description: z.string().optional(),
  property: ReferenceSchema,
});

const InstanceLookupInput = z.object({
  label: z.string().min(1).describe('English label shared by the candidates'),
  class_ref: ReferenceSchema.describe('Class the candidates must be an instance of'),
  property: ReferenceSchema.optional(),
  value: z.string().optional().describe('Value the property must hold (wd: ids are translated)'),
});

const MergeAuthorsInput = z.object({
  source_id: LocalItemIdSchema,
  target_id: LocalItemIdSchema,
});

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

export function toClaimOptions(extras: ClaimExtras): ClaimOptions {
  return {
    rank: extras.rank,
    language: extras.language,
    precision: extras.precision,
    timezone: extras.timezone,
    calendarModel: extras.calendar_model,
    unit: extras.unit,
    globe: extras.globe,
    newPropertyDatatype: extras.property_datatype,
  };
}

function applyTerms(entity: WikibaseEntity, labels: Record<string, string>, descriptions: Record<string, string>): void {
  for (const [language, value] of Object.entries(labels)) entity.setLabel(value, language);
  for (const [language, value] of Object.entries(descriptions)) entity.setDescription(value, language);
}

function summarize(entity: WikibaseEntity) {
  return {
    id: entity.id ?? null,
    kind: entity.kind,
    label: entity.getLabel() ?? null,
    description: entity.getDescription() ?? null,
    datatype: entity.getDatatype() ?? null,
    claims: entity.getClaims(),
  };
}

// ═══════════════════════════════════════════════════════════════════════════════
// TOOL FACTORY
// ═══════════════════════════════════════════════════════════════════════════════

export function createCurationTools(curator: Curator): Record<string, ToolDefinition> {
  async function handleResolveIdentifier(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(ResolveIdentifierInput, params);
      const id = await curator.resolver.resolve(input.reference, input.kind, input.allow_create, {
        datatype: input.datatype,
      });
      return successResponse({ reference: input.reference, id });
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleSearchByValue(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(SearchByValueInput, params);
      const itemIds = await curator.resolver.searchByValue(input.property, input.value);
      return successResponse({ property: input.property, value: input.value, item_ids: itemIds });
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleBuildClaim(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(BuildClaimInput, params);
      const claim = await curator.claimBuilder.build(input.property, input.value, toClaimOptions(input));
      return successResponse({ claim });
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleEntityFind(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(EntityFindInput, params);
      const draft = curator.newEntity(input.kind).setLabel(input.label);
      if (input.description !== undefined) draft.setDescription(input.description);

      const candidates = await draft.findDuplicateCandidates();
      const existingId = await draft.exists();
      return successResponse({ label: input.label, candidates, existing_id: existingId });
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleEntityUpsert(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(EntityUpsertInput, params);

      let entity: WikibaseEntity;
      if (input.id) {
        entity = await curator.getEntity(input.id, input.kind);
      } else {
        if (input.kind === 'property' && !input.datatype) {
          throw validationError('datatype is required when creating a property');
        }
        entity = input.datatype && input.kind === 'property' ? curator.newProperty(input.datatype) : curator.newItem();
        applyTerms(entity, input.labels, input.descriptions);

        const existingId = input.reuse_existing ? await entity.exists() : null;
        if (existingId) {
          console.error(`[Tools] Reusing existing ${input.kind} ${existingId}`);
          entity = await curator.getEntity(existingId, input.kind);
        }
      }

      applyTerms(entity, input.labels, input.descriptions);
      for (const claim of input.claims) {
        await entity.addClaim(claim.property, claim.value, claim.action, toClaimOptions(claim));
      }
      if (input.remote_id) {
        await entity.addLinkerClaim(input.remote_id);
      }

      const written = await entity.write();
      return successResponse(summarize(written));
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleEntityValues(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(EntityValuesInput, params);
      let entity: WikibaseEntity;
      if (input.id) {
        entity = await curator.getEntity(input.id, input.kind);
      } else if (input.label) {
        entity = curator.newEntity(input.kind).setLabel(input.label);
        if (input.description !== undefined) entity.setDescription(input.description);
      } else {
        throw validationError('Either id or label is required');
      }

      const values = await entity.valuesOf(input.property);
      return successResponse({ id: entity.id ?? null, property: input.property, values });
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleInstanceLookup(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(InstanceLookupInput, params);
      if ((input.property === undefined) !== (input.value === undefined)) {
        throw validationError('property and value must be given together');
      }

      const draft = curator.newItem().setLabel(input.label);
      const instanceIds = await draft.instancesSharingLabel(input.class_ref);
      const result: Record<string, unknown> = {
        label: input.label,
        class_ref: input.class_ref,
        is_instance: await draft.isInstanceOf(input.class_ref),
        instance_ids: instanceIds,
      };
      if (input.property !== undefined && input.value !== undefined) {
        result.match_id = await draft.instanceWithProperty(input.class_ref, input.property, input.value);
      }
      return successResponse(result);
    } catch (error) {
      return handleError(error);
    }
  }

  async function handleMergeAuthors(params: Record<string, unknown>): Promise<ToolResponse> {
    try {
      const input = validateInput(MergeAuthorsInput, params);
      if (input.source_id === input.target_id) {
        throw validationError('source_id and target_id must differ');
      }
      const result = await curator.disambiguator.mergeAuthors(input.source_id, input.target_id);
      return successResponse(result);
    } catch (error) {
      return handleError(error);
    }
  }

  return {
    kg_resolve_identifier: {
      description: 'Resolve a local id, reference-graph id (wd:/wdt:) or English label to the local Wikibase id. Labels are looked up, or minted as new entities when allow_create is true.',
      inputSchema: ResolveIdentifierInput.shape,
      handler: handleResolveIdentifier,
    },
    kg_search_by_value: {
      description: 'List the ids of every item whose statement for a property equals a value. Returns an empty list when the property is unknown.',
      inputSchema: SearchByValueInput.shape,
      handler: handleSearchByValue,
    },
    kg_build_claim: {
      description: "Build a claim shaped for the property's datatype without writing it. Unknown property labels are minted.",
      inputSchema: BuildClaimInput.shape,
      handler: handleBuildClaim,
    },
    kg_entity_find: {
      description: 'Find entities sharing an English label, and the one that matches label and description (items) or label (properties).',
      inputSchema: EntityFindInput.shape,
      handler: handleEntityFind,
    },
    kg_entity_upsert: {
      description: 'Create or edit an item or property: terms, claims (append_or_replace or replace_all), optional reference-graph link. Exact label+description duplicates return the existing entity.',
      inputSchema: EntityUpsertInput.shape,
      handler: handleEntityUpsert,
    },
    kg_entity_values: {
      description: 'Read the literal values (string, external id, item id, time) an entity holds for a property.',
      inputSchema: EntityValuesInput.shape,
      handler: handleEntityValues,
    },
    kg_instance_lookup: {
      description: 'Among entities sharing a label, find instances of a class, optionally the one holding a property value.',
      inputSchema: InstanceLookupInput.shape,
      handler: handleInstanceLookup,
    },
    kg_merge_authors: {
      description: 'Merge two author items. The shorter label survives; the wiki pages are updated before the graph merge.',
      inputSchema: MergeAuthorsInput.shape,
      handler: handleMergeAuthors,
    },
  };
}
