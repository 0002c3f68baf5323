import type { OutputFormat, Segment } from './formatters/types.js';

export type { OutputFormat, Segment } from './formatters/types.js';

export type DevicePreference = 'auto' | 'cuda' | 'cpu';

export type ResolvedDevice = 'cuda' | 'cpu';

export type TranscriptionTask = 'transcribe' | 'translate';

export type ProcessingStage =
  | 'initializing'
  | 'resolvingDevice'
  | 'loadingModel'
  | 'transcribing'
  | 'writing'
  | 'complete';

export interface StageInfo {
  stage: ProcessingStage;
  label: string;
  description: string;
  icon: string;
}

export type WarningKind = 'ConfigurationWarning' | 'DeviceFallback';

/**
 * Non-fatal condition absorbed during a run and reported to the caller
 */
export interface RunWarning {
  kind: WarningKind;
  message: string;
}

/**
 * Resolved output settings for a single run
 */
export interface OutputConfig {
  formats: readonly OutputFormat[];
  device: DevicePreference;
  inputPath: string;
  outputRoot: string;
}

/**
 * The directory and per-format file paths chosen for one run.
 * Frozen once created; a later run never reuses it.
 */
export interface OutputBatch {
  readonly directory: string;
  readonly timestamp: string;
  readonly files: ReadonlyMap<OutputFormat, string>;
}

export interface TranscriptionResult {
  outputDir: string;
  /** Written file paths, in requested-format order */
  files: string[];
  segments: readonly Segment[];
  language?: string;
  model: string;
  device: ResolvedDevice;
  warnings: RunWarning[];
}
