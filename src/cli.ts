import { Command, CommanderError } from 'commander';
import { getLanguageCode, parseLanguageMapping, type Config } from './config/index.js';
import { devicePreferenceSchema, taskSchema } from './config/schema.js';
import type { TranscribeRequest } from './commands/transcribe.js';

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
    Object.setPrototypeOf(this, CliUsageError.prototype);
  }
}

export type CliCommand =
  | { kind: 'help' }
  | { kind: 'history'; outputRoot: string }
  | { kind: 'show'; outputRoot: string; job: string }
  | { kind: 'transcribe'; request: TranscribeRequest };

type CliOptions = {
  audio?: string;
  model?: string;
  language?: string;
  task?: string;
  formats?: string;
  device?: string;
  outputDir?: string;
  history?: boolean;
  show?: string;
};

// Defaults come from Config, so options carry none of their own
function buildProgram(): Command {
  return new Command()
    .name('whisper-subtitles')
    .description('Transcribe an audio file into subtitle and transcript files.')
    .option('--audio <path>', 'Path to audio file')
    .option('--model <name>', 'Model to use')
    .option('--language <code>', 'Audio language code, a name from WHISPER_LANGUAGES, or "auto"')
    .option('--task <task>', 'transcribe | translate')
    .option('--formats <list>', 'Output formats (comma-separated): srt, vtt, tsv, json, txt')
    .option('--device <device>', 'auto | cuda | cpu')
    .option('--output-dir <dir>', 'Directory receiving timestamped run folders')
    .option('--history', 'List previous transcription jobs')
    .option('--show <job>', 'Print the files of a previous job (a name from --history)')
    .helpOption('-h, --help', 'Show this help')
    .exitOverride()
    .configureOutput({ writeOut: () => {}, writeErr: () => {} });
}

export function usage(): string {
  return buildProgram().helpInformation();
}

function readArgs(argv: string[]): CliOptions {
  const program = buildProgram();
  program.parse(argv, { from: 'user' });
  return program.opts<CliOptions>();
}

/**
 * Maps a display name from WHISPER_LANGUAGES to its code; anything else passes through
 */
function resolveLanguage(language: string, config: Config): string {
  const mapping = parseLanguageMapping(config.whisper.languages);
  return Object.hasOwn(mapping, language) ? getLanguageCode(mapping, language) : language;
}

/**
 * Parses command-line arguments, filling gaps from the loaded configuration
 * @throws {CliUsageError} On unknown options, invalid values or a missing audio path
 */
export function parseCliArgs(argv: string[], config: Config): CliCommand {
  let values: CliOptions;
  try {
    values = readArgs(argv);
  } catch (error) {
    if (error instanceof CommanderError) {
      if (error.code === 'commander.helpDisplayed') {
        return { kind: 'help' };
      }
      throw new CliUsageError(error.message.replace(/^error: /, ''));
    }
    throw error;
  }

  const outputRoot = values.outputDir ?? config.output.rootDir;

  if (values.history) {
    return { kind: 'history', outputRoot };
  }

  if (values.show !== undefined) {
    return { kind: 'show', outputRoot, job: values.show };
  }

  const task = taskSchema.safeParse(values.task ?? config.whisper.task);
  if (!task.success) {
    throw new CliUsageError(`Invalid --task '${values.task}'. Choose transcribe or translate.`);
  }

  const device = devicePreferenceSchema.safeParse((values.device ?? config.whisper.device).toLowerCase());
  if (!device.success) {
    throw new CliUsageError(`Invalid --device '${values.device}'. Choose auto, cuda or cpu.`);
  }

  const audioPath = values.audio ?? config.whisper.audio;
  if (!audioPath) {
    throw new CliUsageError('--audio argument is required');
  }

  return {
    kind: 'transcribe',
    request: {
      audioPath,
      model: values.model ?? config.whisper.model,
      language: resolveLanguage(values.language ?? config.whisper.language, config),
      task: task.data,
      formats: values.formats ?? config.whisper.formats,
      device: device.data,
      outputRoot,
    },
  };
}
