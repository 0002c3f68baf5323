import { promises as fs } from 'node:fs';
import { basename, dirname, extname, join } from 'node:path';
import { randomBytes } from 'node:crypto';
import type { OutputBatch, OutputConfig, OutputFormat } from '../types.js';
import { FormatterRegistry } from '../formatters/index.js';

/**
 * Run directory names: YYYYMMDD_HHMMSS, optionally followed by _N when a
 * run in the same second already claimed the plain name.
 */
export const RUN_DIRECTORY_PATTERN = /^(\d{4})(\d{2})(\d{2})_(\d{2})(\d{2})(\d{2})(?:_(\d+))?$/;

export type OutputBatchOptions = Pick<OutputConfig, 'outputRoot' | 'inputPath' | 'formats'> & {
  timestamp: string;
};

/**
 * Formats a run start time as YYYYMMDD_HHMMSS in local time
 */
export function formatRunTimestamp(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `${day}_${time}`;
}

/**
 * Input basename without its last extension: "talk.final.mp3" -> "talk.final"
 */
export function getOutputBasename(inputPath: string): string {
  const name = basename(inputPath);
  const extension = extname(name);
  return extension ? name.slice(0, -extension.length) : name;
}

function buildBatch(directory: string, timestamp: string, inputPath: string, formats: readonly OutputFormat[]): OutputBatch {
  const base = getOutputBasename(inputPath);
  const files = new Map<OutputFormat, string>();

  for (const format of formats) {
    files.set(format, join(directory, `${base}.${FormatterRegistry.getExtension(format)}`));
  }

  return Object.freeze({ directory, timestamp, files });
}

/**
 * Derives the run directory and per-format file paths without touching the disk
 */
export function planOutputBatch({ outputRoot, timestamp, inputPath, formats }: OutputBatchOptions): OutputBatch {
  return buildBatch(join(outputRoot, timestamp), timestamp, inputPath, formats);
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

/**
 * Claims a directory no other run owns and returns the batch. The claim is
 * the non-recursive mkdir itself, so concurrent runs in the same second
 * cannot share a directory: EEXIST moves on to the next _N suffix.
 */
export async function createOutputBatch(options: OutputBatchOptions): Promise<OutputBatch> {
  await fs.mkdir(options.outputRoot, { recursive: true });

  for (let counter = 0; ; counter++) {
    const directoryName = counter === 0 ? options.timestamp : `${options.timestamp}_${counter}`;
    const directory = join(options.outputRoot, directoryName);

    try {
      await fs.mkdir(directory);
    } catch (error) {
      if (isNodeError(error) && error.code === 'EEXIST') {
        continue;
      }
      throw error;
    }

    return buildBatch(directory, options.timestamp, options.inputPath, options.formats);
  }
}

/**
 * Writes UTF-8 content through a temporary sibling and a rename,
 * so a failed write leaves no partial file at the final path.
 */
export async function writeOutputFile(filePath: string, content: string): Promise<void> {
  const tempPath = join(dirname(filePath), `.${basename(filePath)}.${randomBytes(4).toString('hex')}.tmp`);

  try {
    await fs.writeFile(tempPath, content, 'utf8');
    await fs.rename(tempPath, filePath);
  } catch (error) {
    await fs.rm(tempPath, { force: true });
    throw error;
  }
}
