/**
 * Tests for JSON formatter
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { JsonFormatter } from '../JsonFormatter.js';
import { createMockSegments } from '../../../tests/helpers/mockFactories.js';

describe('JsonFormatter', () => {
  let formatter: JsonFormatter;

  beforeEach(() => {
    formatter = new JsonFormatter();
  });

  it('should have correct format type and extension', () => {
    expect(formatter.formatType).toBe('json');
    expect(formatter.extension).toBe('json');
  });

  it('pretty prints with two-space indentation', () => {
    expect(formatter.format([{ start: 0, end: 4, text: ' Hello.' }])).toBe(
      '[\n  {\n    "start": 0,\n    "end": 4,\n    "text": "Hello."\n  }\n]'
    );
  });

  it('decodes back to the input sequence with trimmed text', () => {
    const segments = createMockSegments(3);
    const parsed: unknown = JSON.parse(formatter.format(segments));

    expect(parsed).toEqual([
      { start: 0, end: 5, text: 'This is segment 1.' },
      { start: 5, end: 10, text: 'This is segment 2.' },
      { start: 10, end: 15, text: 'This is segment 3.' },
    ]);
  });

  it('keeps untruncated float precision', () => {
    const parsed: unknown = JSON.parse(formatter.format([{ start: 1.23456789, end: 2.0000001, text: 'x' }]));
    expect(parsed).toEqual([{ start: 1.23456789, end: 2.0000001, text: 'x' }]);
  });

  it('writes non-ASCII text as-is', () => {
    expect(formatter.format([{ start: 0, end: 1, text: 'Grüße, 世界' }])).toContain('"text": "Grüße, 世界"');
  });

  it('emits an empty array for no segments', () => {
    expect(formatter.format([])).toBe('[]');
    expect(JSON.parse(formatter.format([]))).toEqual([]);
  });

  it('does not mutate the input', () => {
    const segments = Object.freeze([Object.freeze({ start: 1, end: 2, text: '  padded  ' })]);
    formatter.format(segments);
    expect(segments[0]?.text).toBe('  padded  ');
  });
});
