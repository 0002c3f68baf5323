import type { TranscriptFormatter, Segment } from './types.js';

/**
 * JSON formatter for transcripts
 * The only format that keeps the untruncated second offsets
 */
export class JsonFormatter implements TranscriptFormatter {
  readonly formatType = 'json' as const;
  readonly extension = 'json';

  format(segments: readonly Segment[]): string {
    const output = segments.map(segment => ({
      start: segment.start,
      end: segment.end,
      text: segment.text.trim(),
    }));

    return JSON.stringify(output, null, 2);
  }
}
