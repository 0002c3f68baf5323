import { useEffect, useRef, useState } from 'react';
import type { ProcessingStage, RunWarning, TranscriptionResult } from '../types.js';
import { transcribe, type TranscribeDependencies, type TranscribeRequest } from '../commands/transcribe.js';
import { STAGE_ORDER, isStageCompleted } from '../config/processingStages.js';

const DEFAULT_SPINNER_SYMBOL = '⠋';
const spinnerFrames = [DEFAULT_SPINNER_SYMBOL, '⠙', '⠹', '⠸', '⠼', '⠴', '⠦', '⠧', '⠇', '⠏'];
const MAX_STATUS_LINES = 6;

export type RunDependencies = Omit<TranscribeDependencies, 'onStatus' | 'onWarning' | 'onStageChange'>;

export interface TranscriptionRunState {
  running: boolean;
  spinnerSymbol: string;
  currentStage?: ProcessingStage;
  completedStages: ProcessingStage[];
  statusMessages: string[];
  warnings: RunWarning[];
  elapsedTime: number;
  result: TranscriptionResult | null;
  error: Error | null;
}

/**
 * Drives one transcription run and exposes its progress to the screens
 */
export const useTranscriptionRun = (
  request: TranscribeRequest,
  dependencies: RunDependencies
): TranscriptionRunState => {
  const [currentStage, setCurrentStage] = useState<ProcessingStage | undefined>(undefined);
  const [statusMessages, setStatusMessages] = useState<string[]>([]);
  const [warnings, setWarnings] = useState<RunWarning[]>([]);
  const [result, setResult] = useState<TranscriptionResult | null>(null);
  const [error, setError] = useState<Error | null>(null);
  const [spinnerIndex, setSpinnerIndex] = useState(0);
  const [elapsedTime, setElapsedTime] = useState(0);

  const startedRef = useRef(false);
  const running = result === null && error === null;

  useEffect(() => {
    if (startedRef.current) {
      return;
    }
    startedRef.current = true;

    const startTime = Date.now();
    const timer = setInterval(() => {
      setSpinnerIndex(prev => (prev + 1) % spinnerFrames.length);
      setElapsedTime(Date.now() - startTime);
    }, 80);

    transcribe(request, {
      ...dependencies,
      onStatus: message => setStatusMessages(prev => [...prev.slice(-(MAX_STATUS_LINES - 1)), message]),
      onWarning: warning => setWarnings(prev => [...prev, warning]),
      onStageChange: setCurrentStage,
    })
      .then(setResult)
      .catch((runError: unknown) => {
        setError(runError instanceof Error ? runError : new Error(String(runError)));
      })
      .finally(() => {
        clearInterval(timer);
        setElapsedTime(Date.now() - startTime);
      });
    // A run starts once per mount; later prop changes do not restart it
  }, []);

  const completedStages = currentStage
    ? STAGE_ORDER.filter(stage => isStageCompleted(stage, currentStage))
    : [];

  const state: TranscriptionRunState = {
    running,
    spinnerSymbol: spinnerFrames[spinnerIndex % spinnerFrames.length] ?? DEFAULT_SPINNER_SYMBOL,
    completedStages,
    statusMessages,
    warnings,
    elapsedTime,
    result,
    error,
  };
  if (currentStage) {
    state.currentStage = currentStage;
  }
  return state;
};
