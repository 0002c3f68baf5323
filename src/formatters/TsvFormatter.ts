import type { TranscriptFormatter, Segment } from './types.js';
import { formatSeconds } from './timecode.js';

const HEADER = ['start', 'end', 'speaker', 'text'];

/**
 * Tab-separated formatter
 * Raw second offsets, no timestamp composition. The speaker column is kept
 * for compatibility with diarized exports and is always empty here.
 */
export class TsvFormatter implements TranscriptFormatter {
  readonly formatType = 'tsv' as const;
  readonly extension = 'tsv';

  format(segments: readonly Segment[]): string {
    const rows = [HEADER.join('\t')];

    for (const segment of segments) {
      rows.push(
        [formatSeconds(segment.start), formatSeconds(segment.end), '', segment.text.trim()].join('\t')
      );
    }

    return rows.map(row => `${row}\n`).join('');
  }
}
