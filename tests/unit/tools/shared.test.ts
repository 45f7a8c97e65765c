import { describe, it, expect } from 'vitest';
import { documentNotFoundError } from '../../../src/server/errors.js';
import { formatResponse, handleError } from '../../../src/tools/shared.js';

describe('formatResponse', () => {
  it('serializes small results unchanged', () => {
    const response = formatResponse({ success: true, data: { count: 1 } });
    expect(response.content).toEqual([
      { type: 'text', text: JSON.stringify({ success: true, data: { count: 1 } }, null, 2) },
    ]);
    expect(response.isError).toBeUndefined();
  });

  it('cuts the largest array when the result is too big', () => {
    const items = Array.from({ length: 100 }, (_, i) => ({ i, pad: 'x'.repeat(50) }));
    const response = formatResponse({ data: { items } }, 2000);
    const parsed = JSON.parse(response.content[0].text);

    expect(parsed.data.items).toHaveLength(10);
    expect(parsed.data._items_total).toBe(100);
    expect(parsed._response_truncated.truncated_fields).toEqual(['data.items (100 → 10)']);
    expect(parsed._response_truncated.reason).toBe('Response exceeded 2KB limit');
  });

  it('replaces the result when array truncation is not enough', () => {
    const response = formatResponse({ items: [1, 2, 3], text: 'x'.repeat(5000) }, 1000);
    const parsed = JSON.parse(response.content[0].text);

    expect(Object.keys(parsed)).toEqual(['_response_truncated']);
    expect(parsed._response_truncated.reason).toBe(
      'Response exceeded 1KB limit and could not be reduced by array truncation'
    );
  });
});

describe('handleError', () => {
  it('formats the error with its recovery hint', () => {
    const response = handleError(documentNotFoundError('doc-1'));
    const parsed = JSON.parse(response.content[0].text);

    expect(response.isError).toBe(true);
    expect(parsed.success).toBe(false);
    expect(parsed.error.category).toBe('DOCUMENT_NOT_FOUND');
    expect(parsed.error.recovery.tool).toBe('doc_list');
  });

  it('wraps unexpected errors as internal errors', () => {
    const parsed = JSON.parse(handleError(new Error('boom')).content[0].text);
    expect(parsed.error).toMatchObject({ category: 'INTERNAL_ERROR', message: 'boom' });
  });
});
