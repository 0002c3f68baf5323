import { promises as fs, constants as fsConstants } from 'node:fs';
import type {
  DevicePreference,
  OutputFormat,
  ProcessingStage,
  ResolvedDevice,
  RunWarning,
  Segment,
  TranscriptionResult,
  TranscriptionTask,
} from '../types.js';
import { FormatterRegistry } from '../formatters/index.js';
import { createOutputBatch, formatRunTimestamp, writeOutputFile } from '../output/index.js';
import { resolveDevice, describeDevice, type CudaProbe } from '../device/index.js';
import type { InferenceFn, InferenceRequest, InferenceResult } from '../inference/index.js';
import { isAutoLanguage } from '../config/languages.js';
import { ConfigurationError, InferenceFailure, InputError, errorMessage } from '../errors.js';

export interface TranscribeRequest {
  audioPath: string;
  model: string;
  /** Language code, or an auto-detect sentinel ('', 'auto', 'Auto Detect') */
  language?: string | undefined;
  task: TranscriptionTask;
  /** Comma-separated list or array of format identifiers */
  formats: string | readonly string[];
  device: DevicePreference;
  outputRoot: string;
}

export interface TranscribeDependencies {
  inference: InferenceFn;
  cudaProbe: CudaProbe;
  /** Clock used for the run directory name */
  now?: () => Date;
  onStatus?: (status: string) => void;
  onWarning?: (warning: RunWarning) => void;
  onStageChange?: (stage: ProcessingStage) => void;
}

async function assertReadableFile(audioPath: string): Promise<void> {
  let isFile: boolean;
  try {
    const stats = await fs.stat(audioPath);
    isFile = stats.isFile();
    await fs.access(audioPath, fsConstants.R_OK);
  } catch (error) {
    const code = error instanceof Error && 'code' in error ? error.code : undefined;
    if (code === 'ENOENT') {
      throw new InputError(`Audio file '${audioPath}' not found.`, audioPath);
    }
    throw new InputError(`Audio file '${audioPath}' is not readable: ${errorMessage(error)}`, audioPath);
  }

  if (!isFile) {
    throw new InputError(`Audio path '${audioPath}' is not a file.`, audioPath);
  }
}

function freezeSegments(segments: readonly Segment[]): readonly Segment[] {
  return Object.freeze(segments.map(segment => Object.freeze({ ...segment })));
}

/**
 * Runs one transcription: device resolution, inference, then every requested
 * format written into a fresh timestamped directory.
 *
 * Non-fatal conditions (unknown formats, CUDA fallback) are reported through
 * onWarning and collected in the result. Fatal conditions reject:
 * ConfigurationError, InputError and InferenceFailure.
 */
export async function transcribe(
  request: TranscribeRequest,
  dependencies: TranscribeDependencies
): Promise<TranscriptionResult> {
  const warnings: RunWarning[] = [];
  const emitStatus = dependencies.onStatus ?? ((message: string) => console.log(message));
  const emitStage = (stage: ProcessingStage) => dependencies.onStageChange?.(stage);
  const warn = (warning: RunWarning) => {
    warnings.push(warning);
    if (dependencies.onWarning) {
      dependencies.onWarning(warning);
    } else {
      console.warn(`Warning: ${warning.message}`);
    }
  };

  emitStage('initializing');

  const { formats, rejected } = FormatterRegistry.parseFormatList(request.formats);
  for (const identifier of rejected) {
    warn({
      kind: 'ConfigurationWarning',
      message: `Unsupported output format '${identifier}' skipped. Supported: ${FormatterRegistry.getAvailableFormats().join(', ')}`,
    });
  }
  if (formats.length === 0) {
    throw new ConfigurationError(
      `No valid formats selected. Supported: ${FormatterRegistry.getAvailableFormats().join(', ')}`
    );
  }

  await assertReadableFile(request.audioPath);

  const language = isAutoLanguage(request.language) ? undefined : request.language?.trim();

  emitStage('resolvingDevice');
  const resolution = await resolveDevice(request.device, dependencies.cudaProbe);
  if (resolution.fallbackOccurred) {
    warn({ kind: 'DeviceFallback', message: resolution.reason ?? 'CUDA unavailable, falling back to CPU' });
  }
  emitStatus(describeDevice(request.device, resolution));

  const { result, device } = await runInference(
    { audioPath: request.audioPath, model: request.model, device: resolution.device, task: request.task, ...(language ? { language } : {}) },
    dependencies.inference,
    { emitStatus, emitStage, warn }
  );

  const segments = freezeSegments(result.segments);

  emitStage('writing');
  const now = dependencies.now ?? (() => new Date());
  const batch = await createOutputBatch({
    outputRoot: request.outputRoot,
    timestamp: formatRunTimestamp(now()),
    inputPath: request.audioPath,
    formats,
  });

  const files: string[] = [];
  for (const [format, filePath] of batch.files) {
    await writeFormat(format, filePath, segments);
    files.push(filePath);
    emitStatus(`Saved ${format} to ${filePath}`);
  }

  emitStage('complete');

  const transcription: TranscriptionResult = {
    outputDir: batch.directory,
    files,
    segments,
    model: request.model,
    device,
    warnings,
  };
  if (result.language) {
    transcription.language = result.language;
  }
  return transcription;
}

async function writeFormat(format: OutputFormat, filePath: string, segments: readonly Segment[]): Promise<void> {
  const formatter = FormatterRegistry.getFormatter(format);
  if (!formatter) {
    throw new ConfigurationError(`No formatter registered for '${format}'`);
  }
  await writeOutputFile(filePath, formatter.format(segments));
}

interface InferenceHooks {
  emitStatus: (message: string) => void;
  emitStage: (stage: ProcessingStage) => void;
  warn: (warning: RunWarning) => void;
}

/**
 * Invokes inference, retrying exactly once on CPU when the CUDA attempt fails
 */
async function runInference(
  request: InferenceRequest,
  inference: InferenceFn,
  { emitStatus, emitStage, warn }: InferenceHooks
): Promise<{ result: InferenceResult; device: ResolvedDevice }> {
  const attempt = async (device: ResolvedDevice) => {
    emitStage('loadingModel');
    emitStatus(`Loading model '${request.model}' on ${device}...`);
    emitStage('transcribing');
    return inference({ ...request, device });
  };

  try {
    return { result: await attempt(request.device), device: request.device };
  } catch (firstError) {
    if (request.device !== 'cuda') {
      throw new InferenceFailure(
        `Transcription failed on cpu: ${errorMessage(firstError)}`,
        ['cpu'],
        firstError
      );
    }

    warn({
      kind: 'DeviceFallback',
      message: `Failed to load model on CUDA: ${errorMessage(firstError).slice(0, 100)}. Falling back to CPU.`,
    });

    try {
      return { result: await attempt('cpu'), device: 'cpu' };
    } catch (secondError) {
      throw new InferenceFailure(
        `Transcription failed on cuda and cpu: ${errorMessage(secondError)}`,
        ['cuda', 'cpu'],
        secondError
      );
    }
  }
}
