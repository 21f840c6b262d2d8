/**
 * Disambiguator - folds two author entries into one
 *
 * The entry with the shorter English label survives. Its user-facing page is
 * deleted and the loser's page is moved onto the survivor's slot before the
 * graph merge runs; a failed page operation aborts the whole merge.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/curation/disambiguator
 */

import { termValue } from '../../models/entity-document.js';
import { numericPart } from '../../models/entity-id.js';
import type { CurationContext } from './context.js';

export interface MergeRecord {
  sourceId: string;
  targetId: string;
  resultingSurvivorId: string;
}

export interface MergeAuthorsResult {
  /** Id folded into the survivor */
  finalSourceId: string;
  finalSurvivorId: string;
  record: MergeRecord;
}

export class Disambiguator {
  constructor(private readonly context: CurationContext) {}

  async mergeAuthors(sourceId: string, targetId: string): Promise<MergeAuthorsResult> {
    const { store, settings } = this.context;

    const sourceDocument = await store.getEntity(sourceId);
    const targetDocument = await store.getEntity(targetId);
    const sourceLabel = termValue(sourceDocument.labels) ?? '';
    const targetLabel = termValue(targetDocument.labels) ?? '';

    let source = sourceId;
    let target = targetId;
    if (targetLabel.length > sourceLabel.length) {
      [source, target] = [targetId, sourceId];
    }
    console.error(`[Disambiguator] Merging ${source} into ${target}`);

    const survivorPage = pageName(settings.personPageNamespace, target);
    await store.deletePage(survivorPage);
    await store.movePage(pageName(settings.personPageNamespace, source), survivorPage);

    const merged = await store.mergeEntities(source, target);
    console.error(`[Disambiguator] ${merged.from} merged into ${merged.to}`);

    return {
      finalSourceId: merged.from,
      finalSurvivorId: merged.to,
      record: { sourceId, targetId, resultingSurvivorId: merged.to },
    };
  }
}

export function pageName(namespace: string, id: string): string {
  return `${namespace}:${numericPart(id)}`;
}
