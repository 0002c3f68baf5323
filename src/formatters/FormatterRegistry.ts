import type { TranscriptFormatter, OutputFormat, ParsedFormatList } from './types.js';
import { JsonFormatter } from './JsonFormatter.js';
import { SrtFormatter } from './SrtFormatter.js';
import { VttFormatter } from './VttFormatter.js';
import { TsvFormatter } from './TsvFormatter.js';
import { TextFormatter } from './TextFormatter.js';

const extensionMap: Record<string, OutputFormat> = {
  srt: 'srt',
  vtt: 'vtt',
  tsv: 'tsv',
  json: 'json',
  txt: 'txt',
  text: 'txt',
};

/**
 * Registry for all available transcript formatters
 * Provides centralized access to formatters and format detection
 */
export class FormatterRegistry {
  private static formatters = new Map<OutputFormat, TranscriptFormatter>([
    ['srt', new SrtFormatter()],
    ['tsv', new TsvFormatter()],
    ['txt', new TextFormatter()],
    ['vtt', new VttFormatter()],
    ['json', new JsonFormatter()],
  ]);

  /**
   * Get formatter by format type
   * @returns The formatter instance, or undefined if not found
   */
  static getFormatter(format: OutputFormat): TranscriptFormatter | undefined {
    return this.formatters.get(format);
  }

  /**
   * Detect format from file path
   * @returns Detected format, or undefined for unknown extensions
   */
  static detectFormat(filePath: string): OutputFormat | undefined {
    const match = filePath.match(/\.([^./\\]+)$/);
    const extension = match?.[1];
    if (!extension) {
      return undefined;
    }
    return extensionMap[extension.toLowerCase()];
  }

  /**
   * Get the canonical file extension for a format (without leading dot)
   */
  static getExtension(format: OutputFormat): string {
    return this.getFormatter(format)?.extension ?? format;
  }

  static getAvailableFormats(): OutputFormat[] {
    return Array.from(this.formatters.keys());
  }

  static isFormatSupported(format: string): format is OutputFormat {
    return this.getAvailableFormats().some(available => available === format);
  }

  /**
   * Split a requested format list into recognized formats and rejected identifiers.
   * Accepts a comma-separated string or an array; identifiers are trimmed and
   * lower-cased, and duplicates keep their first position.
   */
  static parseFormatList(input: string | readonly string[]): ParsedFormatList {
    const raw = typeof input === 'string' ? input.split(',') : input;
    const formats: OutputFormat[] = [];
    const rejected: string[] = [];

    for (const entry of raw) {
      const normalized = entry.trim().toLowerCase();
      if (!normalized) {
        continue;
      }
      if (this.isFormatSupported(normalized)) {
        if (!formats.includes(normalized)) {
          formats.push(normalized);
        }
      } else if (!rejected.includes(entry.trim())) {
        rejected.push(entry.trim());
      }
    }

    return { formats, rejected };
  }
}
