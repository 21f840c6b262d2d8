/**
 * Tool response envelope tests
 *
 * @module tests/unit/tools/shared
 */

import { describe, it, expect, vi, afterEach } from 'vitest';
import { notFoundError } from '../../../src/server/errors.js';
import { handleError, successResponse, type ToolResponse } from '../../../src/tools/shared.js';

function body(response: ToolResponse): unknown {
  expect(response.content).toHaveLength(1);
  return JSON.parse(response.content[0].text);
}

afterEach(() => {
  vi.restoreAllMocks();
});

describe('successResponse', () => {
  it('wraps the data in a success envelope', () => {
    expect(body(successResponse({ id: 'Q10' }))).toEqual({ success: true, data: { id: 'Q10' } });
  });

  it('keeps null data', () => {
    expect(body(successResponse(null))).toEqual({ success: true, data: null });
  });
});

describe('handleError', () => {
  it('reports the category and details of a curator error', () => {
    const log = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const response = handleError(notFoundError('wd:Q5', 'item'));

    expect(body(response)).toEqual({
      success: false,
      error: {
        category: 'NOT_FOUND',
        message: 'No local item found for "wd:Q5"',
        details: { reference: 'wd:Q5', kind: 'item' },
      },
    });
    expect(log).toHaveBeenCalledWith('[ERROR] NOT_FOUND: No local item found for "wd:Q5"');
  });

  it('files a foreign error as internal', () => {
    vi.spyOn(console, 'error').mockImplementation(() => undefined);

    const parsed = body(handleError(new RangeError('out of range')));

    expect(parsed).toMatchObject({ success: false, error: { category: 'INTERNAL_ERROR', message: 'out of range' } });
  });
});
