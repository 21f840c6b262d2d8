/**
 * Lookup backend selection
 *
 * @module services/lookup
 */

import type { CuratorConfig } from '../../server/config.js';
import type { LookupBackend } from '../graph-store/types.js';
import { validationError } from '../../server/errors.js';
import { DirectStoreBackend } from './direct-store.js';
import { ImporterApiBackend } from './importer-api.js';

export { DirectStoreBackend } from './direct-store.js';
export { ImporterApiBackend } from './importer-api.js';

/**
 * Build the backend named by the configuration. Called once per process.
 */
export function createLookupBackend(config: CuratorConfig): LookupBackend {
  if (config.lookupBackend === 'direct') {
    if (!config.databasePath) throw validationError('WIKIBASE_DB_PATH is required when LOOKUP_BACKEND=direct');
    return DirectStoreBackend.open(config.databasePath);
  }

  if (!config.importerApiUrl) throw validationError('IMPORTER_API_URL is required when LOOKUP_BACKEND=importer');
  return new ImporterApiBackend(config.importerApiUrl, config.httpTimeoutMs);
}
