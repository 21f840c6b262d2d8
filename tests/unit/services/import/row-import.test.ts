/**
 * Bulk CSV claim import tests
 *
 * @module tests/unit/services/import/row-import
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { DEFAULT_CURATION_SETTINGS } from '../../../../src/services/curation/context.js';
import { Curator } from '../../../../src/services/curation/curator.js';
import { csvRecords, importRows, parseCsvLine } from '../../../../src/services/import/row-import.js';
import { InMemoryGraphStore } from '../../fixtures/in-memory-graph-store.js';

async function* lines(...values: string[]): AsyncGenerator<string> {
  for (const value of values) yield value;
}

async function collect<T>(source: AsyncIterable<T>): Promise<T[]> {
  const items: T[] = [];
  for await (const item of source) items.push(item);
  return items;
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCsvLine', () => {
  it('splits plain fields', () => {
    expect(parseCsvLine('Q10,GROMACS')).toEqual(['Q10', 'GROMACS']);
  });

  it('handles quoted commas, escaped quotes and a trailing empty field', () => {
    expect(parseCsvLine('a,"b, c","say ""hi""",')).toEqual(['a', 'b, c', 'say "hi"', '']);
  });
});

describe('csvRecords', () => {
  it('keys rows by the header and trims fields', async () => {
    const records = await collect(csvRecords(lines('article,software\r', '', 'Q10, GROMACS ', 'Q11')));

    expect(records).toEqual([
      { article: 'Q10', software: 'GROMACS' },
      { article: 'Q11', software: '' },
    ]);
  });
});

describe('importRows', () => {
  function setup() {
    const store = new InMemoryGraphStore({ firstItem: 10, firstProperty: 223 });
    store.seedProperty('software used', 'string'); // P223
    store.seedItem('Paper one'); // Q10
    store.seedItem('Paper two'); // Q11
    return { store, curator: new Curator({ store, settings: { ...DEFAULT_CURATION_SETTINGS } }) };
  }

  it('writes one claim per row and counts failures without stopping', async () => {
    const { store, curator } = setup();
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const summary = await importRows(
      curator,
      csvRecords(lines('article,software', 'Q10,GROMACS', 'Q99,VMD', 'Q11,"Tool, v2"', 'bad,x'))
    );

    expect(summary).toEqual({ processed: 4, succeeded: 2, failed: 2 });
    expect((await store.getEntity('Q10')).claims.P223?.[0].mainsnak.datavalue?.value).toBe('GROMACS');
    expect((await store.getEntity('Q11')).claims.P223?.[0].mainsnak.datavalue?.value).toBe('Tool, v2');
    expect(log).toHaveBeenCalledWith(
      '[Import] Row 2 {"article":"Q99","software":"VMD"} failed: NOT_FOUND: No local entity found for "Q99"'
    );
    expect(log).toHaveBeenCalledWith(
      '[Import] Row 4 {"article":"bad","software":"x"} failed: VALIDATION_ERROR: article: Expected a local item id such as Q42'
    );
    expect(log).toHaveBeenLastCalledWith('[Import] Done: 4 rows, 2 written, 2 failed');
  });

  it('writes to the given property', async () => {
    const { store, curator } = setup();
    store.seedProperty('uses software', 'string'); // P224
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    await importRows(curator, csvRecords(lines('article,software', 'Q10,GROMACS')), 'P224');

    const stored = await store.getEntity('Q10');
    expect(Object.keys(stored.claims)).toEqual(['P224']);
  });
});
