/**
 * Entity id parsing tests
 *
 * @module tests/unit/models/entity-id
 */

import { describe, it, expect } from 'vitest';
import {
  extractRemoteId,
  hasRemotePrefix,
  isLocalId,
  kindOfId,
  numericPart,
} from '../../../src/models/entity-id.js';

describe('isLocalId', () => {
  it.each(['Q1', 'Q42', 'P31', 'P1000000'])('accepts %s', (reference) => {
    expect(isLocalId(reference)).toBe(true);
  });

  it.each(['q42', 'Q', 'Q42a', 'wd:Q42', ' Q42', 'L12', 'human'])('rejects %s', (reference) => {
    expect(isLocalId(reference)).toBe(false);
  });
});

describe('remote ids', () => {
  it('detects both prefixes', () => {
    expect(hasRemotePrefix('wd:Q5')).toBe(true);
    expect(hasRemotePrefix('wdt:P31')).toBe(true);
    expect(hasRemotePrefix('wd:garbage')).toBe(true);
    expect(hasRemotePrefix('Q5')).toBe(false);
  });

  it('extracts the bare id only when well formed', () => {
    expect(extractRemoteId('wd:Q5')).toBe('Q5');
    expect(extractRemoteId('wdt:P31')).toBe('P31');
    expect(extractRemoteId('wd:garbage')).toBeNull();
    expect(extractRemoteId('Q5')).toBeNull();
  });

  it('takes the kind from the leading letter', () => {
    expect(kindOfId('P31')).toBe('property');
    expect(kindOfId('Q5')).toBe('item');
  });
});

describe('numericPart', () => {
  it('strips the letter for page slots', () => {
    expect(numericPart('Q123')).toBe('123');
  });
});
