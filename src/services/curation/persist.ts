/**
 * Shared write path for entities
 *
 * @module services/curation/persist
 */

import type { EntityDocument, EntityEdit } from '../../models/entity-document.js';
import { termValue } from '../../models/entity-document.js';
import type { GraphStore } from '../graph-store/types.js';

/**
 * Persist an edit and return the stored document. When the store reports
 * that an entity with the same label (and description) already exists, the
 * existing entity is fetched and returned instead of failing.
 */
export async function persistEntity(store: GraphStore, edit: EntityEdit): Promise<EntityDocument> {
  const outcome = await store.writeEntity(edit);
  if (outcome.status === 'created') {
    return outcome.document;
  }

  const label = termValue(edit.labels) ?? '';
  console.error(
    `[Entity] ${edit.type === 'item' ? 'Item' : 'Property'} "${label}" already exists with the same label and description, returning ${outcome.id}`
  );
  return store.getEntity(outcome.id);
}
