/**
 * Tests for FormatterRegistry
 */

import { describe, it, expect } from 'vitest';
import { FormatterRegistry } from '../FormatterRegistry.js';

describe('FormatterRegistry', () => {
  it('lists every supported format', () => {
    expect(FormatterRegistry.getAvailableFormats()).toEqual(['srt', 'tsv', 'txt', 'vtt', 'json']);
  });

  it('maps each format to a distinct canonical extension', () => {
    const extensions = FormatterRegistry.getAvailableFormats().map(format => FormatterRegistry.getExtension(format));
    expect(extensions).toEqual(['srt', 'tsv', 'txt', 'vtt', 'json']);
    expect(new Set(extensions).size).toBe(extensions.length);
  });

  it('recognizes supported format identifiers', () => {
    expect(FormatterRegistry.isFormatSupported('vtt')).toBe(true);
    expect(FormatterRegistry.isFormatSupported('docx')).toBe(false);
  });

  describe('parseFormatList', () => {
    it('splits a comma list and separates unknown identifiers', () => {
      expect(FormatterRegistry.parseFormatList('srt,bogus,txt')).toEqual({
        formats: ['srt', 'txt'],
        rejected: ['bogus'],
      });
    });

    it('trims, lower-cases and de-duplicates', () => {
      expect(FormatterRegistry.parseFormatList([' SRT', 'json ', 'srt', '', 'Bogus', 'Bogus'])).toEqual({
        formats: ['srt', 'json'],
        rejected: ['Bogus'],
      });
    });
  });

  describe('detectFormat', () => {
    it('detects formats from file extensions', () => {
      expect(FormatterRegistry.detectFormat('outputs/run/talk.SRT')).toBe('srt');
      expect(FormatterRegistry.detectFormat('notes.text')).toBe('txt');
    });

    it('returns undefined for unknown or missing extensions', () => {
      expect(FormatterRegistry.detectFormat('talk.mp3')).toBeUndefined();
      expect(FormatterRegistry.detectFormat('README')).toBeUndefined();
    });
  });
});
