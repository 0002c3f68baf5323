import { promises as fs } from 'node:fs';
import { join } from 'node:path';
import type { OutputFormat } from '../types.js';
import { FormatterRegistry } from '../formatters/index.js';
import { InputError } from '../errors.js';
import { RUN_DIRECTORY_PATTERN, getOutputBasename } from './OutputDirectoryManager.js';

export interface JobSummary {
  /** Run directory name, e.g. 20240102_030405 */
  name: string;
  createdAt: Date;
  /** YYYY-MM-DD HH:MM:SS */
  displayTime: string;
  /** Basename shared by the job's files */
  baseName: string;
  files: string[];
}

export type JobContents = Partial<Record<OutputFormat, string>>;

function parseRunDirectoryName(name: string): Date | null {
  const match = RUN_DIRECTORY_PATTERN.exec(name);
  if (!match) {
    return null;
  }

  const [year, month, day, hours, minutes, seconds] = match.slice(1, 7).map(Number);
  if (
    year === undefined ||
    month === undefined ||
    day === undefined ||
    hours === undefined ||
    minutes === undefined ||
    seconds === undefined
  ) {
    return null;
  }

  const date = new Date(year, month - 1, day, hours, minutes, seconds);
  // Reject rollovers such as month 13 or second 61
  if (date.getMonth() !== month - 1 || date.getDate() !== day || date.getSeconds() !== seconds) {
    return null;
  }
  return date;
}

function formatDisplayTime(date: Date): string {
  const pad = (value: number) => String(value).padStart(2, '0');
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

async function readDirectoryIfPresent(path: string) {
  try {
    return await fs.readdir(path, { withFileTypes: true });
  } catch (error) {
    if (error instanceof Error && 'code' in error && error.code === 'ENOENT') {
      return null;
    }
    throw error;
  }
}

/**
 * Lists previous runs under the output root, most recent first.
 * Directories that are not run folders, and runs without files, are skipped.
 */
export async function listJobs(outputRoot: string): Promise<JobSummary[]> {
  const entries = await readDirectoryIfPresent(outputRoot);
  if (!entries) {
    return [];
  }

  const jobs: JobSummary[] = [];

  for (const entry of entries) {
    if (!entry.isDirectory()) {
      continue;
    }
    const createdAt = parseRunDirectoryName(entry.name);
    if (!createdAt) {
      continue;
    }

    const contents = await fs.readdir(join(outputRoot, entry.name), { withFileTypes: true });
    const files = contents
      .filter(file => file.isFile() && !file.name.endsWith('.zip') && !file.name.startsWith('.'))
      .map(file => file.name)
      .sort();

    const firstFile = files[0];
    if (firstFile === undefined) {
      continue;
    }

    jobs.push({
      name: entry.name,
      createdAt,
      displayTime: formatDisplayTime(createdAt),
      baseName: getOutputBasename(firstFile),
      files,
    });
  }

  return jobs.sort((a, b) => (a.name < b.name ? 1 : a.name > b.name ? -1 : 0));
}

/**
 * Reads every recognized format file of one run
 * @throws {InputError} If the run directory does not exist
 */
export async function loadJob(outputRoot: string, name: string): Promise<JobContents> {
  const directory = join(outputRoot, name);
  const entries = await readDirectoryIfPresent(directory);
  if (!entries) {
    throw new InputError(`Job folder not found: ${name}`, directory);
  }

  const contents: JobContents = {};

  for (const entry of entries) {
    if (!entry.isFile()) {
      continue;
    }
    const format = FormatterRegistry.detectFormat(entry.name);
    if (!format || entry.name.startsWith('.')) {
      continue;
    }
    contents[format] = await fs.readFile(join(directory, entry.name), 'utf8');
  }

  return contents;
}
