/**
 * Importer API lookup backend
 *
 * Remote mapping service that sits next to the wiki:
 *   GET {base}/items/{wd:Q..}/mapping        -> { local_id }
 *   GET {base}/properties/{wdt:P..}/mapping  -> { local_id }
 *   GET {base}/search/items/{label}          -> { QID: string | string[] }
 *   GET {base}/search/properties/{label}     -> { PID: string | string[] }
 *
 * @module services/lookup/importer-api
 */

import { z } from 'zod';
import type { EntityKind } from '../../models/entity-id.js';
import type { LookupBackend } from '../graph-store/types.js';
import { backendUnavailableError } from '../../server/errors.js';

const MappingResponse = z.object({
  local_id: z.string().nullable().optional(),
});

const IdList = z.union([z.string(), z.array(z.string())]).nullable().optional();

const SearchResponse = z.object({
  QID: IdList,
  PID: IdList,
});

const COLLECTION: Record<EntityKind, string> = {
  item: 'items',
  property: 'properties',
};

export class ImporterApiBackend implements LookupBackend {
  readonly mode = 'importer' as const;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs: number
  ) {}

  async lookupRemoteMapping(kind: EntityKind, remoteId: string): Promise<string | null> {
    const reference = `${kind === 'item' ? 'wd' : 'wdt'}:${remoteId}`;
    const body = await this.getJson(`${COLLECTION[kind]}/${encodeURIComponent(reference)}/mapping`);
    if (body === null) return null;
    return parseReply(MappingResponse, body).local_id ?? null;
  }

  async searchByLabel(kind: EntityKind, label: string): Promise<string[]> {
    const body = await this.getJson(`search/${COLLECTION[kind]}/${encodeURIComponent(label)}`);
    if (body === null) return [];
    const parsed = parseReply(SearchResponse, body);
    const ids = kind === 'item' ? parsed.QID : parsed.PID;
    if (!ids) return [];
    return Array.isArray(ids) ? ids : [ids];
  }

  close(): void {
    // stateless
  }

  /**
   * GET a path under the base URL; null on 404
   */
  private async getJson(path: string): Promise<unknown> {
    const url = `${this.baseUrl.replace(/\/+$/, '')}/${path}`;
    let response: Response;
    try {
      response = await fetch(url, {
        headers: { Accept: 'application/json' },
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      throw backendUnavailableError('Importer API', error);
    }

    if (response.status === 404) return null;
    if (!response.ok) {
      throw backendUnavailableError('Importer API', new Error(`HTTP ${response.status} for ${url}`));
    }
    try {
      return await response.json();
    } catch (error) {
      throw backendUnavailableError('Importer API', error, { url });
    }
  }
}

function parseReply<S extends z.ZodTypeAny>(schema: S, body: unknown): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw backendUnavailableError('Importer API', new Error('unexpected response shape'), {
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }
  return parsed.data;
}
