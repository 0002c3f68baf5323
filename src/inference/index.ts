export { createCommandInference, buildCommandArgs, parseCommandOutput } from './commandInference.js';
export type { CommandInferenceOptions } from './commandInference.js';
export type { InferenceFn, InferenceRequest, InferenceResult } from './types.js';
