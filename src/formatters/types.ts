/**
 * Output format identifiers, one per canonical file extension
 */
export type OutputFormat = 'srt' | 'vtt' | 'tsv' | 'json' | 'txt';

/**
 * One recognized utterance span as produced by the speech model
 */
export interface Segment {
  /** Start offset in seconds */
  start: number;
  /** End offset in seconds */
  end: number;
  /** Recognized text; may carry surrounding whitespace */
  text: string;
}

/**
 * Interface that all formatters must implement
 */
export interface TranscriptFormatter {
  /** The format this formatter produces */
  readonly formatType: OutputFormat;

  /** File extension for this format (without dot) */
  readonly extension: string;

  /**
   * Render a segment sequence into the target format.
   * Must not mutate the input and must not touch the filesystem.
   */
  format(segments: readonly Segment[]): string;
}

/**
 * Result of splitting a user-supplied format list
 */
export interface ParsedFormatList {
  formats: OutputFormat[];
  rejected: string[];
}
