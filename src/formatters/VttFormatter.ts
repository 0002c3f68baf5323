import type { TranscriptFormatter, Segment } from './types.js';
import { formatTimestamp } from './timecode.js';

/**
 * WebVTT (.vtt) formatter for transcripts
 *
 * Format:
 * WEBVTT
 *
 * 00:00:01.000 --> 00:00:05.000
 * First subtitle
 *
 * 00:00:05.000 --> 00:00:10.000
 * Next subtitle
 */
export class VttFormatter implements TranscriptFormatter {
  readonly formatType = 'vtt' as const;
  readonly extension = 'vtt';

  format(segments: readonly Segment[]): string {
    // WebVTT signature (required first line)
    const lines: string[] = ['WEBVTT', ''];

    for (const segment of segments) {
      const startTime = formatTimestamp(segment.start, 'vtt');
      const endTime = formatTimestamp(segment.end, 'vtt');
      lines.push(`${startTime} --> ${endTime}`);
      lines.push(segment.text.trim());
      lines.push('');
    }

    return lines.map(line => `${line}\n`).join('');
  }
}
