/**
 * Curator Configuration
 *
 * Read once at process start. The lookup backend choice (direct database
 * vs importer API) is fixed here and never re-evaluated per call.
 *
 * @module server/config
 */

import { z } from 'zod';

export const LOOKUP_BACKENDS = ['direct', 'importer'] as const;

export type LookupBackendMode = (typeof LOOKUP_BACKENDS)[number];

export const CuratorConfigSchema = z
  .object({
    // Credentials
    user: z.string().min(1, 'WIKIBASE_USER is required'),
    password: z.string().min(1, 'WIKIBASE_PASSWORD is required'),
    loginWithBot: z.boolean().default(true),

    // Endpoints
    mediawikiApiUrl: z.string().url(),
    sparqlEndpointUrl: z.string().url(),
    wikibaseUrl: z.string().url(),
    /** IRI bound to the wdt: prefix in structured queries, when the endpoint does not predeclare it */
    sparqlDirectPropertyPrefix: z.string().url().optional(),

    // Lookup backend
    lookupBackend: z.enum(LOOKUP_BACKENDS).default('importer'),
    importerApiUrl: z.string().url().optional(),
    databasePath: z.string().min(1).optional(),

    // Deployment-specific references
    instanceOfProperty: z.string().min(1).default('instance of'),
    personPageNamespace: z.string().min(1).default('Person'),
    remoteItemLinkProperty: z.string().min(1).optional(),
    remotePropertyLinkProperty: z.string().min(1).optional(),

    httpTimeoutMs: z.number().int().positive().default(30000),
  })
  .superRefine((config, ctx) => {
    if (config.lookupBackend === 'importer' && !config.importerApiUrl) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['importerApiUrl'],
        message: 'IMPORTER_API_URL is required when LOOKUP_BACKEND=importer',
      });
    }
    if (config.lookupBackend === 'direct' && !config.databasePath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['databasePath'],
        message: 'WIKIBASE_DB_PATH is required when LOOKUP_BACKEND=direct',
      });
    }
  });

export type CuratorConfig = z.infer<typeof CuratorConfigSchema>;

type CuratorConfigInput = z.input<typeof CuratorConfigSchema>;

function optionalEnv(name: string): string | undefined {
  const value = process.env[name];
  return value === undefined || value === '' ? undefined : value;
}

/**
 * Load configuration from environment variables
 */
export function loadCuratorConfig(overrides?: Partial<CuratorConfigInput>): CuratorConfig {
  const timeout = optionalEnv('HTTP_TIMEOUT_MS');
  const envConfig: Partial<CuratorConfigInput> = {
    user: process.env.WIKIBASE_USER || '',
    password: process.env.WIKIBASE_PASSWORD || '',
    loginWithBot: process.env.WIKIBASE_LOGIN_WITH_BOT !== 'false',
    mediawikiApiUrl: process.env.MEDIAWIKI_API_URL || '',
    sparqlEndpointUrl: process.env.SPARQL_ENDPOINT_URL || '',
    wikibaseUrl: process.env.WIKIBASE_URL || '',
    sparqlDirectPropertyPrefix: optionalEnv('SPARQL_DIRECT_PROPERTY_PREFIX'),
    lookupBackend: optionalEnv('LOOKUP_BACKEND') === 'direct' ? 'direct' : 'importer',
    importerApiUrl: optionalEnv('IMPORTER_API_URL'),
    databasePath: optionalEnv('WIKIBASE_DB_PATH'),
    instanceOfProperty: optionalEnv('INSTANCE_OF_PROPERTY'),
    personPageNamespace: optionalEnv('PERSON_PAGE_NAMESPACE'),
    remoteItemLinkProperty: optionalEnv('REMOTE_ITEM_LINK_PROPERTY'),
    remotePropertyLinkProperty: optionalEnv('REMOTE_PROPERTY_LINK_PROPERTY'),
    httpTimeoutMs: timeout ? parseInt(timeout, 10) : undefined,
  };

  return CuratorConfigSchema.parse({ ...envConfig, ...overrides });
}
