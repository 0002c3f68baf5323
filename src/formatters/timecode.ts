/**
 * Timestamp rendering shared by the subtitle formatters
 */

export type TimestampStyle = 'srt' | 'vtt';

const MILLISECONDS_PER_SECOND = 1000;

// Far below one millisecond, above the representation error of a double at subtitle scales
const REPRESENTATION_EPSILON_MS = 1e-6;

/**
 * Converts a second offset to whole milliseconds, truncating.
 * A tiny epsilon absorbs binary representation error (3661.234 is stored as
 * 3661.23399...), so that error does not cost a millisecond; anything
 * genuinely below a boundary (0.9999996) still truncates down.
 * Negative and non-finite offsets clamp to zero.
 */
export function toWholeMilliseconds(seconds: number): number {
  if (!Number.isFinite(seconds) || seconds <= 0) {
    return 0;
  }

  return Math.floor(seconds * MILLISECONDS_PER_SECOND + REPRESENTATION_EPSILON_MS);
}

/**
 * Formats seconds to a subtitle timestamp
 * @param seconds - Offset in seconds
 * @param style - 'srt' for HH:MM:SS,mmm or 'vtt' for HH:MM:SS.mmm
 * @returns Formatted timestamp string; the hour field grows past two digits instead of wrapping
 */
export function formatTimestamp(seconds: number, style: TimestampStyle): string {
  const totalMs = toWholeMilliseconds(seconds);
  const totalSeconds = Math.floor(totalMs / 1000);
  const milliseconds = totalMs % 1000;

  const hours = Math.floor(totalSeconds / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const secs = totalSeconds % 60;

  const hh = String(hours).padStart(2, '0');
  const mm = String(minutes).padStart(2, '0');
  const ss = String(secs).padStart(2, '0');
  const mmm = String(milliseconds).padStart(3, '0');

  const separator = style === 'srt' ? ',' : '.';
  return `${hh}:${mm}:${ss}${separator}${mmm}`;
}

/**
 * Renders a raw second value the way tabular output expects it:
 * whole numbers keep one decimal place (4 -> "4.0"), everything else uses
 * the shortest round-tripping representation (8.5 -> "8.5").
 */
export function formatSeconds(seconds: number): string {
  if (Number.isInteger(seconds)) {
    return seconds.toFixed(1);
  }
  return String(seconds);
}
