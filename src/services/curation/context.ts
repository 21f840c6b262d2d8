/**
 * Curation context
 *
 * Explicit dependencies of every curation operation. Built once per process
 * and passed in; nothing in the curation services reads ambient state.
 *
 * @module services/curation/context
 */

import type { CuratorConfig } from '../../server/config.js';
import type { GraphStore } from '../graph-store/types.js';

export interface CurationSettings {
  /** Reference (label, local id or wdt: id) of the deployment's "instance of" property */
  instanceOfProperty: string;
  /** Namespace of the user-facing pages kept in sync by merges */
  personPageNamespace: string;
  /** IRI bound to wdt: in structured queries, when the endpoint needs it declared */
  sparqlDirectPropertyPrefix?: string;
  /** Property linking a local item to its reference-graph id */
  remoteItemLinkProperty?: string;
  /** Property linking a local property to its reference-graph id */
  remotePropertyLinkProperty?: string;
}

export interface CurationContext {
  store: GraphStore;
  settings: CurationSettings;
}

export const DEFAULT_CURATION_SETTINGS: CurationSettings = {
  instanceOfProperty: 'instance of',
  personPageNamespace: 'Person',
};

export function curationSettingsFromConfig(config: CuratorConfig): CurationSettings {
  return {
    instanceOfProperty: config.instanceOfProperty,
    personPageNamespace: config.personPageNamespace,
    sparqlDirectPropertyPrefix: config.sparqlDirectPropertyPrefix,
    remoteItemLinkProperty: config.remoteItemLinkProperty,
    remotePropertyLinkProperty: config.remotePropertyLinkProperty,
  };
}
