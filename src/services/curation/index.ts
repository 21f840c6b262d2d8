/**
 * Curation services
 *
 * @module services/curation
 */

export { ClaimBuilder, CLAIM_CONSTRUCTORS, type ClaimOptions } from './claim-builder.js';
export {
  type CurationContext,
  type CurationSettings,
  DEFAULT_CURATION_SETTINGS,
  curationSettingsFromConfig,
} from './context.js';
export { Curator } from './curator.js';
export { Disambiguator, type MergeAuthorsResult, type MergeRecord, pageName } from './disambiguator.js';
export {
  CLAIM_ACTIONS,
  type ClaimAction,
  type EntityServices,
  WikibaseEntity,
  normalizeClaimAction,
} from './entity.js';
export { IdentifierResolver, type ResolveOptions, buildValueQuery } from './identifier-resolver.js';
export { persistEntity } from './persist.js';
