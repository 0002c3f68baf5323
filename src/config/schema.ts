import { z } from 'zod';

/**
 * Helper to parse boolean-like environment variables
 */
const booleanString = () =>
  z
    .string()
    .optional()
    .default('false')
    .transform((val) => /^(1|true|yes)$/i.test(val));

/**
 * Helper for optional string variables with a default
 */
const stringWithDefault = (defaultValue: string) =>
  z
    .string()
    .optional()
    .transform((val) => (val === undefined || val.trim() === '' ? defaultValue : val.trim()));

export const devicePreferenceSchema = z.enum(['auto', 'cuda', 'cpu']);

export const taskSchema = z.enum(['transcribe', 'translate']);

/**
 * Recognizer configuration schema
 */
const whisperConfigSchema = z.object({
  audio: z.string().describe('Default audio path when none is given on the command line'),
  model: z.string().min(1).describe('Model name handed to the recognizer (default: small.en)'),
  language: z.string().describe('Language code, or "auto" to let the model detect it'),
  task: taskSchema.describe('Recognizer task: transcribe or translate'),
  formats: z.string().describe('Comma-separated output formats (default: srt,txt,json)'),
  device: devicePreferenceSchema.describe('Device preference: auto, cuda or cpu'),
  languages: z.string().describe('Display-name to language-code pairs, "English:en,French:fr"'),
  command: z.string().min(1).describe('Recognizer executable emitting JSON segments'),
});

/**
 * Output placement schema
 */
const outputConfigSchema = z.object({
  rootDir: z.string().min(1).describe('Directory that receives timestamped run folders'),
});

/**
 * Device probing schema
 */
const deviceConfigSchema = z.object({
  nvidiaSmiPath: z.string().min(1).describe('nvidia-smi executable used to detect CUDA GPUs'),
});

/**
 * Application settings schema
 */
const appConfigSchema = z.object({
  verbose: z.boolean().describe('Enable verbose logging'),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  whisper: whisperConfigSchema,
  output: outputConfigSchema,
  device: deviceConfigSchema,
  app: appConfigSchema,
});

/**
 * Environment variables schema - maps env vars to config structure
 */
export const envSchema = z.object({
  WHISPER_AUDIO: stringWithDefault(''),
  WHISPER_MODEL: stringWithDefault('small.en'),
  WHISPER_LANGUAGE: stringWithDefault('auto'),
  WHISPER_TASK: stringWithDefault('transcribe'),
  WHISPER_FORMATS: stringWithDefault('srt,txt,json'),
  WHISPER_DEVICE: stringWithDefault('auto').transform((val) => val.toLowerCase()),
  WHISPER_OUTPUT_DIR: stringWithDefault('outputs'),
  WHISPER_LANGUAGES: stringWithDefault(''),
  WHISPER_COMMAND: stringWithDefault('whisper-json'),
  NVIDIA_SMI_PATH: stringWithDefault('nvidia-smi'),
  VERBOSE: booleanString(),
});

/**
 * TypeScript type for the complete configuration
 */
export type Config = z.infer<typeof configSchema>;

/**
 * TypeScript type for environment variables
 */
export type EnvVars = z.infer<typeof envSchema>;
