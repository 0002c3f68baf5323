import type { TranscriptFormatter, Segment } from './types.js';
import { formatTimestamp } from './timecode.js';

/**
 * SubRip (.srt) formatter for transcripts
 * Standard subtitle format supported by most video players
 *
 * Format:
 * 1
 * 00:00:01,000 --> 00:00:05,000
 * First subtitle
 *
 * 2
 * 00:00:05,000 --> 00:00:10,000
 * Next subtitle
 */
export class SrtFormatter implements TranscriptFormatter {
  readonly formatType = 'srt' as const;
  readonly extension = 'srt';

  format(segments: readonly Segment[]): string {
    const lines: string[] = [];

    segments.forEach((segment, index) => {
      // Cue numbers restart at 1 per document and ignore timing gaps
      lines.push(String(index + 1));

      const startTime = formatTimestamp(segment.start, 'srt');
      const endTime = formatTimestamp(segment.end, 'srt');
      lines.push(`${startTime} --> ${endTime}`);

      lines.push(segment.text.trim());

      // Blank line separator between subtitles
      lines.push('');
    });

    return lines.map(line => `${line}\n`).join('');
  }
}
