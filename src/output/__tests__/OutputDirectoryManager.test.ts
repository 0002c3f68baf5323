/**
 * Tests for output directory and file path management
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { readdir, readFile, stat, writeFile } from 'node:fs/promises';
import { join } from 'node:path';
import {
  createOutputBatch,
  formatRunTimestamp,
  getOutputBasename,
  planOutputBatch,
  writeOutputFile,
} from '../OutputDirectoryManager.js';
import { createTempDir, removeTempDir } from '../../../tests/helpers/testUtils.js';

describe('formatRunTimestamp', () => {
  it('formats local time down to the second', () => {
    expect(formatRunTimestamp(new Date(2024, 0, 2, 3, 4, 5))).toBe('20240102_030405');
    expect(formatRunTimestamp(new Date(2023, 11, 31, 23, 59, 59, 999))).toBe('20231231_235959');
  });
});

describe('getOutputBasename', () => {
  it('strips only the last extension', () => {
    expect(getOutputBasename('/audio/talk.final.mp3')).toBe('talk.final');
    expect(getOutputBasename('clip')).toBe('clip');
    expect(getOutputBasename('/audio/.hidden')).toBe('.hidden');
  });
});

describe('planOutputBatch', () => {
  it('places every format under one directory with distinct paths', () => {
    const batch = planOutputBatch({
      outputRoot: 'outputs',
      timestamp: '20240102_030405',
      inputPath: '/audio/talk.mp3',
      formats: ['srt', 'json'],
    });

    expect(batch.directory).toBe(join('outputs', '20240102_030405'));
    expect(batch.files.get('srt')).toBe(join('outputs', '20240102_030405', 'talk.srt'));
    expect(batch.files.get('json')).toBe(join('outputs', '20240102_030405', 'talk.json'));
    expect(batch.files.get('srt')).not.toBe(batch.files.get('json'));
  });

  it('returns a frozen batch', () => {
    const batch = planOutputBatch({ outputRoot: 'outputs', timestamp: '20240102_030405', inputPath: 'a.wav', formats: ['txt'] });
    expect(Object.isFrozen(batch)).toBe(true);
  });
});

describe('createOutputBatch', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('creates the directory with all missing parents', async () => {
    const outputRoot = join(tempDir, 'nested', 'outputs');
    const batch = await createOutputBatch({
      outputRoot,
      timestamp: '20240102_030405',
      inputPath: 'talk.mp3',
      formats: ['vtt'],
    });

    expect(batch.directory).toBe(join(outputRoot, '20240102_030405'));
    expect((await stat(batch.directory)).isDirectory()).toBe(true);
    expect(batch.files.get('vtt')).toBe(join(outputRoot, '20240102_030405', 'talk.vtt'));
  });

  it('gives a same-second run its own suffixed directory', async () => {
    const options = { outputRoot: tempDir, timestamp: '20240102_030405', inputPath: 'talk.mp3', formats: ['txt' as const] };

    const first = await createOutputBatch(options);
    const second = await createOutputBatch(options);
    const third = await createOutputBatch(options);

    expect(first.directory).toBe(join(tempDir, '20240102_030405'));
    expect(second.directory).toBe(join(tempDir, '20240102_030405_1'));
    expect(third.directory).toBe(join(tempDir, '20240102_030405_2'));
    expect(second.timestamp).toBe('20240102_030405');
  });

  it('gives concurrent same-second runs distinct directories', async () => {
    const options = { outputRoot: tempDir, timestamp: '20240102_030405', inputPath: 'talk.mp3', formats: ['txt' as const] };

    const batches = await Promise.all([createOutputBatch(options), createOutputBatch(options), createOutputBatch(options)]);

    expect(batches.map((batch) => batch.directory).sort()).toEqual([
      join(tempDir, '20240102_030405'),
      join(tempDir, '20240102_030405_1'),
      join(tempDir, '20240102_030405_2'),
    ]);
  });

  it('skips a plain file occupying the run name', async () => {
    await writeFile(join(tempDir, '20240102_030405'), 'not a directory');

    const batch = await createOutputBatch({
      outputRoot: tempDir,
      timestamp: '20240102_030405',
      inputPath: 'talk.mp3',
      formats: ['txt'],
    });

    expect(batch.directory).toBe(join(tempDir, '20240102_030405_1'));
  });
});

describe('writeOutputFile', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await removeTempDir(tempDir);
  });

  it('writes UTF-8 content and leaves no temporary files behind', async () => {
    const target = join(tempDir, 'talk.txt');
    await writeOutputFile(target, 'Grüße\n');

    expect(await readFile(target, 'utf8')).toBe('Grüße\n');
    expect(await readdir(tempDir)).toEqual(['talk.txt']);
  });

  it('replaces an existing file', async () => {
    const target = join(tempDir, 'talk.txt');
    await writeOutputFile(target, 'first\n');
    await writeOutputFile(target, 'second\n');

    expect(await readFile(target, 'utf8')).toBe('second\n');
  });

  it('rejects when the directory does not exist', async () => {
    await expect(writeOutputFile(join(tempDir, 'missing', 'talk.txt'), 'x')).rejects.toThrow();
    expect(await readdir(tempDir)).toEqual([]);
  });
});
