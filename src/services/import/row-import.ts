/**
 * Bulk claim import from two-column CSV rows (article, software)
 *
 * Each row adds one claim to an existing item and writes it. A failing row
 * is logged and counted; the batch carries on.
 *
 * CRITICAL: NEVER use console.log() - stdout is JSON-RPC protocol.
 *
 * @module services/import/row-import
 */

import { z } from 'zod';
import { CuratorError } from '../../server/errors.js';
import { LocalItemIdSchema, validateInput } from '../../utils/validation.js';
import type { Curator } from '../curation/curator.js';

export const DEFAULT_IMPORT_PROPERTY = 'P223';

export const ImportRowSchema = z.object({
  article: LocalItemIdSchema,
  software: z.string().min(1, 'software cannot be empty'),
});

export type ImportRow = z.infer<typeof ImportRowSchema>;

export interface ImportSummary {
  processed: number;
  succeeded: number;
  failed: number;
}

/**
 * Split one CSV line into fields. Double-quoted fields may contain commas
 * and "" escapes; quoted line breaks are not supported.
 */
export function parseCsvLine(line: string): string[] {
  const fields: string[] = [];
  let current = '';
  let quoted = false;

  for (let i = 0; i < line.length; i++) {
    const char = line[i];
    if (quoted) {
      if (char === '"' && line[i + 1] === '"') {
        current += '"';
        i++;
      } else if (char === '"') {
        quoted = false;
      } else {
        current += char;
      }
    } else if (char === '"') {
      quoted = true;
    } else if (char === ',') {
      fields.push(current);
      current = '';
    } else {
      current += char;
    }
  }
  fields.push(current);
  return fields;
}

/**
 * Turn lines into records keyed by the header line. Blank lines are skipped.
 */
export async function* csvRecords(lines: AsyncIterable<string>): AsyncGenerator<Record<string, string>> {
  let header: string[] | null = null;
  for await (const raw of lines) {
    const line = raw.replace(/\r$/, '');
    if (line.trim().length === 0) continue;

    const fields = parseCsvLine(line);
    if (!header) {
      header = fields.map((field) => field.trim());
      continue;
    }

    const record: Record<string, string> = {};
    header.forEach((name, index) => {
      record[name] = (fields[index] ?? '').trim();
    });
    yield record;
  }
}

export async function importRow(curator: Curator, row: ImportRow, property: string): Promise<string | undefined> {
  const article = await curator.getItem(row.article);
  await article.addClaim(property, row.software);
  const written = await article.write();
  return written.id;
}

export async function importRows(
  curator: Curator,
  records: AsyncIterable<Record<string, string>>,
  property: string = DEFAULT_IMPORT_PROPERTY
): Promise<ImportSummary> {
  const summary: ImportSummary = { processed: 0, succeeded: 0, failed: 0 };

  for await (const record of records) {
    summary.processed++;
    try {
      const row = validateInput(ImportRowSchema, record);
      await importRow(curator, row, property);
      summary.succeeded++;
    } catch (error) {
      summary.failed++;
      const failure = CuratorError.fromUnknown(error);
      console.error(`[Import] Row ${summary.processed} ${JSON.stringify(record)} failed: ${failure.category}: ${failure.message}`);
    }
  }

  console.error(
    `[Import] Done: ${summary.processed} rows, ${summary.succeeded} written, ${summary.failed} failed`
  );
  return summary;
}
