/**
 * In-memory Wikibase term store and id mapping table
 *
 * @module tests/unit/fixtures/wikibase-db
 */

import Database from 'better-sqlite3';
import type { EntityKind } from '../../../src/models/entity-id.js';

export function createWikibaseDatabase(): Database.Database {
  const db = new Database(':memory:');
  db.exec(`
    CREATE TABLE wb_id_mapping (wikidata_id TEXT PRIMARY KEY, local_id TEXT NOT NULL);
    CREATE TABLE wbt_text (wbx_id INTEGER PRIMARY KEY AUTOINCREMENT, wbx_text TEXT NOT NULL UNIQUE);
    CREATE TABLE wbt_text_in_lang (
      wbxl_id INTEGER PRIMARY KEY AUTOINCREMENT,
      wbxl_language TEXT NOT NULL,
      wbxl_text_id INTEGER NOT NULL
    );
    CREATE TABLE wbt_term_in_lang (
      wbtl_id INTEGER PRIMARY KEY AUTOINCREMENT,
      wbtl_type_id INTEGER NOT NULL,
      wbtl_text_in_lang_id INTEGER NOT NULL
    );
    CREATE TABLE wbt_item_terms (
      wbit_id INTEGER PRIMARY KEY AUTOINCREMENT,
      wbit_item_id INTEGER NOT NULL,
      wbit_term_in_lang_id INTEGER NOT NULL
    );
    CREATE TABLE wbt_property_terms (
      wbpt_id INTEGER PRIMARY KEY AUTOINCREMENT,
      wbpt_property_id INTEGER NOT NULL,
      wbpt_term_in_lang_id INTEGER NOT NULL
    );
  `);
  return db;
}

/**
 * Attach a term to an entity. type: 1 label, 2 description, 3 alias.
 */
export function addTerm(
  db: Database.Database,
  kind: EntityKind,
  entityNumber: number,
  text: string,
  options: { language?: string; type?: number } = {}
): void {
  db.prepare('INSERT OR IGNORE INTO wbt_text (wbx_text) VALUES (?)').run(text);
  const textRow = db.prepare('SELECT wbx_id FROM wbt_text WHERE wbx_text = ?').get(text) as { wbx_id: number };

  const textInLang = db
    .prepare('INSERT INTO wbt_text_in_lang (wbxl_language, wbxl_text_id) VALUES (?, ?)')
    .run(options.language ?? 'en', textRow.wbx_id);
  const termInLang = db
    .prepare('INSERT INTO wbt_term_in_lang (wbtl_type_id, wbtl_text_in_lang_id) VALUES (?, ?)')
    .run(options.type ?? 1, textInLang.lastInsertRowid);

  if (kind === 'item') {
    db.prepare('INSERT INTO wbt_item_terms (wbit_item_id, wbit_term_in_lang_id) VALUES (?, ?)').run(
      entityNumber,
      termInLang.lastInsertRowid
    );
  } else {
    db.prepare('INSERT INTO wbt_property_terms (wbpt_property_id, wbpt_term_in_lang_id) VALUES (?, ?)').run(
      entityNumber,
      termInLang.lastInsertRowid
    );
  }
}

export function addMapping(db: Database.Database, remoteId: string, localId: string): void {
  db.prepare('INSERT INTO wb_id_mapping (wikidata_id, local_id) VALUES (?, ?)').run(remoteId, localId);
}
