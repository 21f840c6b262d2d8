/**
 * Bulk CSV Import Script
 *
 * Streams a two-column CSV (article,software) from a URL and adds one claim
 * per row on IMPORT_SOFTWARE_PROPERTY (default P223).
 * Usage: npm run import:csv -- <url>
 */

import dotenv from 'dotenv';
dotenv.config();

import { createInterface } from 'node:readline';
import { Readable } from 'node:stream';
import {
  backendUnavailableError,
  closeCuratorContext,
  createCuratorContext,
  loadCuratorConfig,
} from '../src/server/index.js';
import { DEFAULT_IMPORT_PROPERTY, csvRecords, importRows } from '../src/services/import/row-import.js';

async function main() {
  const url = process.argv[2];
  if (!url) {
    console.error('Usage: npm run import:csv -- <url>');
    process.exit(1);
  }

  const config = loadCuratorConfig();
  const context = await createCuratorContext(config);
  const property = process.env.IMPORT_SOFTWARE_PROPERTY || DEFAULT_IMPORT_PROPERTY;

  try {
    const response = await fetch(url);
    if (!response.ok || !response.body) {
      throw backendUnavailableError('csv source', new Error(`HTTP ${response.status} for ${url}`));
    }

    const lines = createInterface({ input: Readable.fromWeb(response.body), crlfDelay: Infinity });
    const summary = await importRows(context.curator, csvRecords(lines), property);
    if (summary.failed > 0) {
      process.exitCode = 2;
    }
  } finally {
    closeCuratorContext(context);
  }
}

main().catch((error) => {
  console.error('Import failed:', error);
  process.exit(1);
});
