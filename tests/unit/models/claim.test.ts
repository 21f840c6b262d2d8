/**
 * Claim model helper tests
 *
 * @module tests/unit/models/claim
 */

import { describe, it, expect } from 'vitest';
import {
  type Snak,
  DAY_PRECISION,
  GREGORIAN_CALENDAR,
  literalValue,
  payloadValue,
} from '../../../src/models/claim.js';

const time = (value: string, precision = DAY_PRECISION): Snak => ({
  property: 'P5',
  datatype: 'time',
  time: value,
  precision,
  timezone: 0,
  before: 0,
  after: 0,
  calendarmodel: GREGORIAN_CALENDAR,
});

describe('payloadValue', () => {
  it('reads the field that carries the value', () => {
    expect(payloadValue({ datatype: 'monolingualtext', text: 'Hallo', language: 'de' })).toBe('Hallo');
    expect(payloadValue(time('+2001-01-01T00:00:00Z'))).toBe('+2001-01-01T00:00:00Z');
    expect(payloadValue({ datatype: 'url', value: 'https://example.org' })).toBe('https://example.org');
  });
});

describe('literalValue', () => {
  it('yields values for string, external-id, item and time snaks', () => {
    expect(literalValue({ property: 'P1', datatype: 'string', value: 'abc' })).toBe('abc');
    expect(literalValue({ property: 'P2', datatype: 'external-id', value: '0000-0001' })).toBe('0000-0001');
    expect(literalValue({ property: 'P3', datatype: 'wikibase-item', value: 'Q9' })).toBe('Q9');
    expect(literalValue(time('+1999-12-31T00:00:00Z'))).toBe('+1999-12-31T00:00:00Z');
  });

  it('yields null for other datatypes', () => {
    expect(literalValue({ property: 'P4', datatype: 'url', value: 'https://example.org' })).toBeNull();
    expect(literalValue({ property: 'P6', datatype: 'quantity', value: '+3', unit: '1' })).toBeNull();
  });
});
