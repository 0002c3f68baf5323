import type { ProcessingStage, StageInfo } from '../types.js';

/**
 * Definitions for every stage of a transcription run, used for UI display.
 */
export const STAGE_DEFINITIONS: Record<ProcessingStage, StageInfo> = {
  initializing: {
    stage: 'initializing',
    label: 'Initializing',
    description: 'Checking input file and requested formats',
    icon: '⚙️',
  },
  resolvingDevice: {
    stage: 'resolvingDevice',
    label: 'Device',
    description: 'Selecting CUDA or CPU for the model',
    icon: '🖥️',
  },
  loadingModel: {
    stage: 'loadingModel',
    label: 'Loading model',
    description: 'Loading the speech model on the selected device',
    icon: '📦',
  },
  transcribing: {
    stage: 'transcribing',
    label: 'Transcribing',
    description: 'Running speech recognition',
    icon: '🎤',
  },
  writing: {
    stage: 'writing',
    label: 'Writing',
    description: 'Saving subtitle and text files',
    icon: '📝',
  },
  complete: {
    stage: 'complete',
    label: 'Complete',
    description: 'Processing finished successfully',
    icon: '✓',
  },
};

/**
 * Ordered list of stages for progression tracking.
 */
export const STAGE_ORDER: ProcessingStage[] = [
  'initializing',
  'resolvingDevice',
  'loadingModel',
  'transcribing',
  'writing',
  'complete',
];

export function getStageInfo(stage: ProcessingStage): StageInfo {
  return STAGE_DEFINITIONS[stage];
}

export function getStageIndex(stage: ProcessingStage): number {
  return STAGE_ORDER.indexOf(stage);
}

/**
 * Check if a stage has been completed based on current stage.
 */
export function isStageCompleted(stage: ProcessingStage, currentStage: ProcessingStage): boolean {
  return getStageIndex(stage) < getStageIndex(currentStage);
}

/**
 * Format milliseconds to a human-readable duration string.
 */
export function formatDuration(ms: number): string {
  const seconds = Math.ceil(ms / 1000);

  if (seconds < 60) {
    return `${seconds}s`;
  }

  const minutes = Math.floor(seconds / 60);
  const remainingSeconds = seconds % 60;

  if (remainingSeconds === 0) {
    return `${minutes}m`;
  }

  return `${minutes}m ${remainingSeconds}s`;
}
