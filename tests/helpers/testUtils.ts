/**
 * Test utilities for Ink frames and filesystem fixtures
 */

import { mkdtemp, rm, writeFile, mkdir } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { dirname, join } from 'node:path';

/**
 * Waits for output to contain specific text
 */
export async function waitForText(
  lastFrame: () => string | undefined,
  text: string,
  options: { timeout?: number; interval?: number } = {}
): Promise<void> {
  const { timeout = 5000, interval = 20 } = options;
  const startTime = Date.now();

  while (Date.now() - startTime < timeout) {
    if ((lastFrame() ?? '').includes(text)) {
      return;
    }
    await new Promise((resolve) => setTimeout(resolve, interval));
  }

  throw new Error(`Timeout waiting for text "${text}". Last frame: ${lastFrame() ?? ''}`);
}

/**
 * Creates a scratch directory under the OS temp dir
 */
export async function createTempDir(prefix: string = 'whisper-subtitles-'): Promise<string> {
  return mkdtemp(join(tmpdir(), prefix));
}

export async function removeTempDir(path: string): Promise<void> {
  await rm(path, { recursive: true, force: true });
}

/**
 * Writes a fixture file, creating parent directories
 */
export async function writeFixture(path: string, content: string = 'fake audio bytes'): Promise<string> {
  await mkdir(dirname(path), { recursive: true });
  await writeFile(path, content, 'utf8');
  return path;
}
