import type { ResolvedDevice, Segment, TranscriptionTask } from '../types.js';

export interface InferenceRequest {
  audioPath: string;
  model: string;
  /** Device the model must be constructed on; fixed for the whole call */
  device: ResolvedDevice;
  /** Language code; undefined lets the model detect it */
  language?: string;
  task: TranscriptionTask;
}

export interface InferenceResult {
  /** Segments in non-decreasing start order */
  segments: Segment[];
  /** Language the model reports, when it detected one */
  language?: string;
}

/**
 * Loads the model on the requested device and recognizes one audio file.
 * A rejection covers both model loading and recognition.
 */
export type InferenceFn = (request: InferenceRequest) => Promise<InferenceResult>;
