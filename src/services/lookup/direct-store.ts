/**
 * Direct-store lookup backend
 *
 * Reads the wiki's own database: the wb_id_mapping table written by the
 * importer, and Wikibase's normalized term store (wbt_*) for label search.
 * Opened read-only; the curator never writes to it.
 *
 * Only a SQLite copy of those tables can be opened. A stock Wikibase keeps
 * them in MySQL/MariaDB, which this backend does not connect to: point
 * LOOKUP_BACKEND=importer at the importer API for such a wiki, or export the
 * tables to a SQLite file.
 *
 * @module services/lookup/direct-store
 */

import Database from 'better-sqlite3';
import type { EntityKind } from '../../models/entity-id.js';
import type { LookupBackend } from '../graph-store/types.js';
import { backendUnavailableError, validationError } from '../../server/errors.js';

/** `mysql://host/db` and the like: a server connection string, not a file */
const CONNECTION_URL = /^[a-z][a-z0-9+.-]*:\/\//i;

/** wbt_term_in_lang.wbtl_type_id for labels (2 = description, 3 = alias) */
const LABEL_TERM_TYPE = 1;

const TERM_TABLES: Record<EntityKind, { table: string; entityColumn: string; termColumn: string; prefix: string }> = {
  item: { table: 'wbt_item_terms', entityColumn: 'wbit_item_id', termColumn: 'wbit_term_in_lang_id', prefix: 'Q' },
  property: { table: 'wbt_property_terms', entityColumn: 'wbpt_property_id', termColumn: 'wbpt_term_in_lang_id', prefix: 'P' },
};

interface MappingRow {
  local_id: string;
}

interface TermRow {
  entity_id: number;
}

export class DirectStoreBackend implements LookupBackend {
  readonly mode = 'direct' as const;
  private readonly db: Database.Database;

  constructor(db: Database.Database) {
    this.db = db;
  }

  static open(path: string): DirectStoreBackend {
    if (CONNECTION_URL.test(path)) {
      throw validationError(
        `WIKIBASE_DB_PATH must be a SQLite file, got connection URL "${path}". Use LOOKUP_BACKEND=importer for a MySQL/MariaDB wiki.`,
        { path }
      );
    }
    try {
      return new DirectStoreBackend(new Database(path, { readonly: true, fileMustExist: true }));
    } catch (error) {
      throw backendUnavailableError(`Wikibase database at ${path}`, error);
    }
  }

  async lookupRemoteMapping(_kind: EntityKind, remoteId: string): Promise<string | null> {
    const row = this.run(() =>
      this.db.prepare('SELECT local_id FROM wb_id_mapping WHERE wikidata_id = ? LIMIT 1').get(remoteId)
    ) as MappingRow | undefined;
    return row?.local_id ?? null;
  }

  async searchByLabel(kind: EntityKind, label: string): Promise<string[]> {
    const { table, entityColumn, termColumn, prefix } = TERM_TABLES[kind];
    const rows = this.run(() =>
      this.db
        .prepare(
          `SELECT DISTINCT t.${entityColumn} AS entity_id
           FROM ${table} t
           JOIN wbt_term_in_lang tl ON t.${termColumn} = tl.wbtl_id
           JOIN wbt_text_in_lang xl ON tl.wbtl_text_in_lang_id = xl.wbxl_id
           JOIN wbt_text x ON x.wbx_id = xl.wbxl_text_id
           WHERE x.wbx_text = ? AND tl.wbtl_type_id = ? AND xl.wbxl_language = 'en'
           ORDER BY t.${entityColumn}`
        )
        .all(label, LABEL_TERM_TYPE)
    ) as TermRow[];
    return rows.map((row) => `${prefix}${row.entity_id}`);
  }

  close(): void {
    this.db.close();
  }

  private run<T>(query: () => T): T {
    try {
      return query();
    } catch (error) {
      throw backendUnavailableError('Wikibase database', error);
    }
  }
}
