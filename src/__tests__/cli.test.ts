/**
 * Tests for command-line parsing
 */

import { describe, it, expect } from 'vitest';
import { parseCliArgs, CliUsageError } from '../cli.js';
import { loadConfig } from '../config/index.js';

describe('parseCliArgs', () => {
  const config = loadConfig({ WHISPER_OUTPUT_DIR: 'outputs', WHISPER_MODEL: 'small.en' });

  it('fills the request from configuration defaults', () => {
    expect(parseCliArgs(['--audio', 'talk.mp3'], config)).toEqual({
      kind: 'transcribe',
      request: {
        audioPath: 'talk.mp3',
        model: 'small.en',
        language: 'auto',
        task: 'transcribe',
        formats: 'srt,txt,json',
        device: 'auto',
        outputRoot: 'outputs',
      },
    });
  });

  it('lets flags override configuration', () => {
    const command = parseCliArgs(
      [
        '--audio=talk.mp3',
        '--model', 'medium',
        '--language', 'de',
        '--task', 'translate',
        '--formats', 'vtt,tsv',
        '--device', 'CPU',
        '--output-dir', 'subs',
      ],
      config
    );

    expect(command).toEqual({
      kind: 'transcribe',
      request: {
        audioPath: 'talk.mp3',
        model: 'medium',
        language: 'de',
        task: 'translate',
        formats: 'vtt,tsv',
        device: 'cpu',
        outputRoot: 'subs',
      },
    });
  });

  it('uses the configured audio path when no flag is given', () => {
    const withAudio = loadConfig({ WHISPER_AUDIO: 'default.wav' });
    const command = parseCliArgs([], withAudio);
    expect(command.kind === 'transcribe' && command.request.audioPath).toBe('default.wav');
  });

  it('maps language display names from the configured table', () => {
    const withLanguages = loadConfig({ WHISPER_LANGUAGES: 'English:en,French:fr' });

    const named = parseCliArgs(['--audio', 'a.mp3', '--language', 'French'], withLanguages);
    const coded = parseCliArgs(['--audio', 'a.mp3', '--language', 'de'], withLanguages);

    expect(named.kind === 'transcribe' && named.request.language).toBe('fr');
    expect(coded.kind === 'transcribe' && coded.request.language).toBe('de');
  });

  it('requires an audio path', () => {
    expect(() => parseCliArgs([], config)).toThrow(new CliUsageError('--audio argument is required'));
  });

  it('returns help and history commands', () => {
    expect(parseCliArgs(['-h'], config)).toEqual({ kind: 'help' });
    expect(parseCliArgs(['--history', '--output-dir', 'runs'], config)).toEqual({ kind: 'history', outputRoot: 'runs' });
  });

  it('returns the show command for a previous job', () => {
    expect(parseCliArgs(['--show', '20240102_030405'], config)).toEqual({
      kind: 'show',
      outputRoot: 'outputs',
      job: '20240102_030405',
    });
  });

  it('rejects invalid choices', () => {
    expect(() => parseCliArgs(['--audio', 'a.mp3', '--task', 'summarize'], config)).toThrow(
      "Invalid --task 'summarize'. Choose transcribe or translate."
    );
    expect(() => parseCliArgs(['--audio', 'a.mp3', '--device', 'gpu'], config)).toThrow(
      "Invalid --device 'gpu'. Choose auto, cuda or cpu."
    );
  });

  it('turns unknown options into usage errors', () => {
    expect(() => parseCliArgs(['--speed', 'fast'], config)).toThrow(CliUsageError);
  });
});
