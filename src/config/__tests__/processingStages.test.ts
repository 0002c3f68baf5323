import { describe, it, expect } from 'vitest';
import {
  STAGE_ORDER,
  STAGE_DEFINITIONS,
  getStageInfo,
  getStageIndex,
  isStageCompleted,
  formatDuration,
} from '../processingStages.js';

describe('processing stages', () => {
  it('defines every stage in order', () => {
    expect(STAGE_ORDER).toEqual(['initializing', 'resolvingDevice', 'loadingModel', 'transcribing', 'writing', 'complete']);
    for (const stage of STAGE_ORDER) {
      expect(STAGE_DEFINITIONS[stage].stage).toBe(stage);
    }
  });

  it('looks up stage info and position', () => {
    expect(getStageInfo('transcribing').label).toBe('Transcribing');
    expect(getStageIndex('writing')).toBe(4);
  });

  it('marks earlier stages as completed', () => {
    expect(isStageCompleted('resolvingDevice', 'transcribing')).toBe(true);
    expect(isStageCompleted('transcribing', 'transcribing')).toBe(false);
    expect(isStageCompleted('complete', 'writing')).toBe(false);
  });
});

describe('formatDuration', () => {
  it.each([
    [0, '0s'],
    [1500, '2s'],
    [60000, '1m'],
    [61000, '1m 1s'],
    [125400, '2m 6s'],
  ])('formats %d ms as %s', (ms, expected) => {
    expect(formatDuration(ms)).toBe(expected);
  });
});
