/**
 * Entity identifiers
 *
 * Local ids (Q<n>/P<n>) are canonical inside this wiki. Remote ids come from
 * the external reference graph as wd:/wdt: prefixed strings and must be
 * translated before any claim references them.
 *
 * @module models/entity-id
 */

export type EntityKind = 'item' | 'property';

export const LOCAL_ID_PATTERN = /^[PQ]\d+$/;

export const REMOTE_ID_PATTERN = /^wdt?:([PQ]\d+)$/;

const REMOTE_PREFIXES = ['wd:', 'wdt:'] as const;

/**
 * True for an unprefixed Q<n>/P<n> string
 */
export function isLocalId(reference: string): boolean {
  return LOCAL_ID_PATTERN.test(reference);
}

/**
 * True when the string carries a remote prefix, whether or not the rest is well formed
 */
export function hasRemotePrefix(reference: string): boolean {
  return REMOTE_PREFIXES.some((prefix) => reference.startsWith(prefix));
}

/**
 * Extract the bare remote id (e.g. "Q5" from "wd:Q5"), or null if the string is not a remote id
 */
export function extractRemoteId(reference: string): string | null {
  const match = REMOTE_ID_PATTERN.exec(reference);
  return match ? match[1] : null;
}

/**
 * Kind implied by the leading letter of a bare id
 */
export function kindOfId(id: string): EntityKind {
  return id.startsWith('P') ? 'property' : 'item';
}

/**
 * Numeric part of a local id ("Q42" -> "42"), used for wiki page slots
 */
export function numericPart(localId: string): string {
  return localId.replace(/^[PQ]/, '');
}
