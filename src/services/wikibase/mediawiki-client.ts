/**
 * MediaWiki / Wikibase Action API client
 *
 * One session per process: the cookie jar and the CSRF token live on the
 * client instance, established by login() and reused until close().
 * Page operations always fetch a fresh token.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/wikibase/mediawiki-client
 */

import { z } from 'zod';
import { EntityDocumentSchema, type EntityDocument, type EntityEdit } from '../../models/entity-document.js';
import type { MergeResult, WriteOutcome } from '../graph-store/types.js';
import {
  CuratorError,
  backendUnavailableError,
  duplicateLabelDescriptionError,
  notFoundError,
  wikiPageOperationError,
  wikibaseApiError,
} from '../../server/errors.js';

// ═══════════════════════════════════════════════════════════════════════════════
// RESPONSE SCHEMAS
// ═══════════════════════════════════════════════════════════════════════════════

const ApiErrorSchema = z.object({
  code: z.string(),
  info: z.string().optional(),
  messages: z
    .array(
      z.object({
        name: z.string(),
        parameters: z.array(z.unknown()).default([]),
      })
    )
    .optional(),
});

type ApiError = z.infer<typeof ApiErrorSchema>;

const TokensResponse = z.object({
  query: z.object({
    tokens: z.object({
      logintoken: z.string().optional(),
      csrftoken: z.string().optional(),
    }),
  }),
});

const BotLoginResponse = z.object({
  login: z.object({ result: z.string(), reason: z.string().optional() }).passthrough(),
});

const ClientLoginResponse = z.object({
  clientlogin: z.object({ status: z.string(), message: z.string().optional() }).passthrough(),
});

const GetEntitiesResponse = z.object({
  entities: z.record(z.unknown()),
});

const EditEntityResponse = z.object({
  entity: EntityDocumentSchema,
});

const MergeItemsResponse = z.object({
  from: z.object({ id: z.string() }),
  to: z.object({ id: z.string() }),
});

/** Wikibase message keys raised when a label (and description) is already taken */
const CONFLICT_MESSAGES = new Set([
  'wikibase-validator-label-with-description-conflict',
  'wikibase-validator-label-conflict',
]);

/** `[[Item:Q7|Q7]]`: the link Wikibase renders for the entity holding the label */
const ENTITY_LINK = /\[\[[^|\]]*:([PQ]\d+)\|/;
const BARE_ENTITY_ID = /^[PQ]\d+$/;
const ID_BEFORE_LABEL_TEXT = /\b([PQ]\d+)\s+already has label/i;

// ═══════════════════════════════════════════════════════════════════════════════
// CLIENT
// ═══════════════════════════════════════════════════════════════════════════════

export interface MediaWikiClientOptions {
  apiUrl: string;
  user: string;
  password: string;
  /** Bot password login (action=login) instead of interactive clientlogin */
  loginWithBot: boolean;
  timeoutMs: number;
}

type ApiParams = Record<string, string>;

export class MediaWikiClient {
  private readonly options: MediaWikiClientOptions;
  private readonly cookies = new Map<string, string>();
  private csrfToken: string | null = null;

  constructor(options: MediaWikiClientOptions) {
    this.options = options;
  }

  // ==================== SESSION ====================

  /**
   * Log in and cache the edit token for the lifetime of the process
   */
  async login(): Promise<void> {
    const loginToken = await this.fetchToken('login');

    if (this.options.loginWithBot) {
      const reply = await this.post({
        action: 'login',
        lgname: this.options.user,
        lgpassword: this.options.password,
        lgtoken: loginToken,
      });
      const body = parseBody(BotLoginResponse, reply, 'login');
      if (body.login.result !== 'Success') {
        throw new CuratorError('LOGIN_FAILED', `Login failed for "${this.options.user}": ${body.login.reason ?? body.login.result}`, {
          upstream: body.login,
        });
      }
    } else {
      const reply = await this.post({
        action: 'clientlogin',
        username: this.options.user,
        password: this.options.password,
        logintoken: loginToken,
        loginreturnurl: this.options.apiUrl,
      });
      const body = parseBody(ClientLoginResponse, reply, 'clientlogin');
      if (body.clientlogin.status !== 'PASS') {
        throw new CuratorError('LOGIN_FAILED', `Login failed for "${this.options.user}": ${body.clientlogin.message ?? body.clientlogin.status}`, {
          upstream: body.clientlogin,
        });
      }
    }

    this.csrfToken = await this.fetchToken('csrf');
    console.error(`[MediaWiki] Logged in as ${this.options.user}`);
  }

  /**
   * Drop the session. The client cannot edit again until login() is called.
   */
  close(): void {
    this.cookies.clear();
    this.csrfToken = null;
  }

  private async fetchToken(type: 'login' | 'csrf'): Promise<string> {
    const body = parseBody(TokensResponse, await this.get({ action: 'query', meta: 'tokens', type }), 'query');
    const token = type === 'login' ? body.query.tokens.logintoken : body.query.tokens.csrftoken;
    if (!token) {
      throw wikibaseApiError('query', { code: 'notoken', info: `No ${type} token in response` });
    }
    return token;
  }

  private requireCsrfToken(): string {
    if (!this.csrfToken) {
      throw new CuratorError('LOGIN_FAILED', 'Not logged in: call login() before editing');
    }
    return this.csrfToken;
  }

  // ==================== ENTITIES ====================

  async getEntity(id: string): Promise<EntityDocument> {
    const body = await this.get({ action: 'wbgetentities', ids: id });
    const apiError = readApiError(body);
    if (apiError) {
      if (apiError.code === 'no-such-entity') throw notFoundError(id, 'entity');
      throw wikibaseApiError('wbgetentities', apiError);
    }

    const raw = parseBody(GetEntitiesResponse, body, 'wbgetentities').entities[id];
    if (!raw || (typeof raw === 'object' && 'missing' in raw)) {
      throw notFoundError(id, 'entity');
    }
    return parseBody(EntityDocumentSchema, raw, 'wbgetentities');
  }

  /**
   * Create (no id) or update (with id) an entity. A label/description
   * conflict comes back as already_exists with the conflicting id.
   */
  async editEntity(edit: EntityEdit): Promise<WriteOutcome> {
    const { id, type, lastrevid, ...data } = edit;
    const params: ApiParams = {
      action: 'wbeditentity',
      data: JSON.stringify(data),
      token: this.requireCsrfToken(),
      bot: '1',
    };
    if (id) {
      params.id = id;
      if (lastrevid !== undefined) params.baserevid = String(lastrevid);
    } else {
      params.new = type;
    }

    const body = await this.post(params);
    const apiError = readApiError(body);
    if (apiError) {
      const conflictId = findConflictingId(apiError);
      if (conflictId) return { status: 'already_exists', id: conflictId };
      if (isConflict(apiError)) {
        throw duplicateLabelDescriptionError(edit.labels.en?.value ?? '', apiError);
      }
      throw wikibaseApiError('wbeditentity', apiError);
    }

    return { status: 'created', document: parseBody(EditEntityResponse, body, 'wbeditentity').entity };
  }

  async mergeItems(fromId: string, toId: string): Promise<MergeResult> {
    const body = await this.post({
      action: 'wbmergeitems',
      fromid: fromId,
      toid: toId,
      token: this.requireCsrfToken(),
      bot: '1',
    });
    const apiError = readApiError(body);
    if (apiError) throw wikibaseApiError('wbmergeitems', apiError);

    const merged = parseBody(MergeItemsResponse, body, 'wbmergeitems');
    return { from: merged.from.id, to: merged.to.id };
  }

  // ==================== PAGES ====================

  async deletePage(title: string, reason = 'Duplicate'): Promise<void> {
    await this.pageOperation('delete', title, { title, reason });
  }

  async movePage(from: string, to: string, reason = 'Duplicate'): Promise<void> {
    await this.pageOperation('move', from, { from, to, reason });
  }

  /**
   * Any failure of a page operation, token fetch and transport included,
   * surfaces as WIKI_PAGE_OPERATION_FAILED with the upstream failure attached.
   */
  private async pageOperation(operation: 'delete' | 'move', page: string, params: ApiParams): Promise<void> {
    let body: unknown;
    try {
      const token = await this.fetchToken('csrf');
      body = await this.post({ ...params, action: operation, token });
    } catch (error) {
      const cause = CuratorError.fromUnknown(error, 'BACKEND_UNAVAILABLE');
      throw wikiPageOperationError(operation, page, {
        category: cause.category,
        message: cause.message,
        ...cause.details,
      });
    }

    const apiError = readApiError(body);
    if (apiError) throw wikiPageOperationError(operation, page, apiError);
  }

  // ==================== TRANSPORT ====================

  private async get(params: ApiParams): Promise<unknown> {
    const url = new URL(this.options.apiUrl);
    for (const [key, value] of Object.entries({ ...params, format: 'json' })) {
      url.searchParams.set(key, value);
    }
    return this.send(url, { method: 'GET' }, params.action);
  }

  private async post(params: ApiParams): Promise<unknown> {
    const body = new URLSearchParams({ ...params, format: 'json' });
    return this.send(new URL(this.options.apiUrl), {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body,
    }, params.action);
  }

  private async send(url: URL, init: RequestInit, action: string | undefined): Promise<unknown> {
    const headers = new Headers(init.headers);
    if (this.cookies.size > 0) {
      headers.set('Cookie', [...this.cookies].map(([name, value]) => `${name}=${value}`).join('; '));
    }

    let response: Response;
    try {
      response = await fetch(url, { ...init, headers, signal: AbortSignal.timeout(this.options.timeoutMs) });
    } catch (error) {
      throw backendUnavailableError(`MediaWiki API (${action ?? 'request'})`, error);
    }

    this.storeCookies(response);
    const backend = `MediaWiki API (${action ?? 'request'})`;
    if (!response.ok) {
      throw backendUnavailableError(backend, new Error(`HTTP ${response.status}`), {
        status: response.status,
        body: await response.text(),
      });
    }
    try {
      return await response.json();
    } catch (error) {
      throw backendUnavailableError(backend, error, { status: response.status });
    }
  }

  private storeCookies(response: Response): void {
    for (const header of response.headers.getSetCookie()) {
      const pair = header.split(';', 1)[0];
      const eq = pair.indexOf('=');
      if (eq > 0) {
        this.cookies.set(pair.slice(0, eq).trim(), pair.slice(eq + 1).trim());
      }
    }
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELPERS
// ═══════════════════════════════════════════════════════════════════════════════

/**
 * The `error` object of an API response, if any
 */
export function readApiError(body: unknown): ApiError | null {
  if (!body || typeof body !== 'object' || !('error' in body)) return null;
  const parsed = ApiErrorSchema.safeParse(body.error);
  return parsed.success ? parsed.data : { code: 'unknown', info: JSON.stringify(body.error) };
}

/**
 * Validate a response body; an unexpected shape is a backend fault, not caller input
 */
function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown, action: string): z.output<S> {
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw backendUnavailableError(
      `MediaWiki API (${action})`,
      new Error(`unexpected response shape: ${parsed.error.issues.map((issue) => issue.message).join('; ')}`),
      { upstream: body }
    );
  }
  return parsed.data;
}

function isConflict(apiError: ApiError): boolean {
  return (apiError.messages ?? []).some((message) => CONFLICT_MESSAGES.has(message.name))
    || /already has label/i.test(apiError.info ?? '');
}

/**
 * Id of the entity that already holds the label/description. Only the entity
 * link is read: the label parameter may itself look like an id ("Protein P53").
 */
export function findConflictingId(apiError: ApiError): string | null {
  for (const message of apiError.messages ?? []) {
    if (!CONFLICT_MESSAGES.has(message.name)) continue;
    for (const parameter of [...message.parameters].reverse()) {
      const link = ENTITY_LINK.exec(String(parameter));
      if (link) return link[1];
    }
    // label and language come first, the entity last
    const last = message.parameters[message.parameters.length - 1];
    if (message.parameters.length > 2 && typeof last === 'string' && BARE_ENTITY_ID.test(last)) return last;
  }

  const info = apiError.info ?? '';
  if (/already has label/i.test(info)) {
    const match = ENTITY_LINK.exec(info) ?? ID_BEFORE_LABEL_TEXT.exec(info);
    if (match) return match[1];
  }
  return null;
}
