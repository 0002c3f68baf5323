import React from 'react';
import { describe, it, expect } from 'vitest';
import { render } from 'ink-testing-library';
import { JobScreen } from '../JobScreen.js';

describe('JobScreen', () => {
  it('prints each format file in registry order', () => {
    const { lastFrame } = render(
      <JobScreen job="20240102_030405" contents={{ txt: 'Hello.\nWorld.\n', srt: '1\n00:00:00,000 --> 00:00:04,000\nHello.\n\n' }} error={null} />
    );

    const frame = lastFrame() ?? '';
    expect(frame).toContain('Transcription job 20240102_030405');
    expect(frame).toContain('00:00:00,000 --> 00:00:04,000');
    expect(frame).toContain('World.');
    expect(frame.indexOf('[srt]')).toBeGreaterThan(-1);
    expect(frame.indexOf('[srt]')).toBeLessThan(frame.indexOf('[txt]'));
  });

  it('shows missing jobs and empty jobs', () => {
    expect(
      render(<JobScreen job="nope" contents={null} error={new Error('Job folder not found: nope')} />).lastFrame()
    ).toContain('Job folder not found: nope');
    expect(render(<JobScreen job="20240102_030405" contents={{}} error={null} />).lastFrame()).toContain(
      'No transcript files in this job'
    );
  });
});
