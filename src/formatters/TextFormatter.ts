import type { TranscriptFormatter, Segment } from './types.js';

/**
 * Plain text formatter for transcripts
 * One line per segment, no timestamps
 */
export class TextFormatter implements TranscriptFormatter {
  readonly formatType = 'txt' as const;
  readonly extension = 'txt';

  format(segments: readonly Segment[]): string {
    return segments.map(segment => `${segment.text.trim()}\n`).join('');
  }
}
