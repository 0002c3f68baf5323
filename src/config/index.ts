import { ZodError } from 'zod';
import { configSchema, envSchema, type Config } from './schema.js';
import { ConfigValidationError, ConfigNotLoadedError } from './errors.js';

export type Environment = Record<string, string | undefined>;

/**
 * Singleton configuration instance
 */
let configInstance: Config | null = null;

/**
 * Loads and validates configuration from environment variables.
 * The environment is read here and nowhere else; components receive the
 * resulting Config.
 * @throws {ConfigValidationError} If validation fails
 */
export function loadConfig(env: Environment = process.env): Config {
  try {
    const validatedEnv = envSchema.parse({
      WHISPER_AUDIO: env.WHISPER_AUDIO,
      WHISPER_MODEL: env.WHISPER_MODEL,
      WHISPER_LANGUAGE: env.WHISPER_LANGUAGE,
      WHISPER_TASK: env.WHISPER_TASK,
      WHISPER_FORMATS: env.WHISPER_FORMATS,
      WHISPER_DEVICE: env.WHISPER_DEVICE,
      WHISPER_OUTPUT_DIR: env.WHISPER_OUTPUT_DIR,
      WHISPER_LANGUAGES: env.WHISPER_LANGUAGES,
      WHISPER_COMMAND: env.WHISPER_COMMAND,
      NVIDIA_SMI_PATH: env.NVIDIA_SMI_PATH,
      VERBOSE: env.VERBOSE,
    });

    // Transform environment variables into structured config
    const configInput = {
      whisper: {
        audio: validatedEnv.WHISPER_AUDIO,
        model: validatedEnv.WHISPER_MODEL,
        language: validatedEnv.WHISPER_LANGUAGE,
        task: validatedEnv.WHISPER_TASK,
        formats: validatedEnv.WHISPER_FORMATS,
        device: validatedEnv.WHISPER_DEVICE,
        languages: validatedEnv.WHISPER_LANGUAGES,
        command: validatedEnv.WHISPER_COMMAND,
      },
      output: {
        rootDir: validatedEnv.WHISPER_OUTPUT_DIR,
      },
      device: {
        nvidiaSmiPath: validatedEnv.NVIDIA_SMI_PATH,
      },
      app: {
        verbose: validatedEnv.VERBOSE,
      },
    };

    configInstance = configSchema.parse(configInput);
    return configInstance;
  } catch (error) {
    if (error instanceof ZodError) {
      throw ConfigValidationError.fromZodError(error);
    }
    throw error;
  }
}

/**
 * Gets the current configuration instance
 * @throws {ConfigNotLoadedError} If config hasn't been loaded yet
 */
export function getConfig(): Config {
  if (!configInstance) {
    throw new ConfigNotLoadedError();
  }
  return configInstance;
}

export function isConfigLoaded(): boolean {
  return configInstance !== null;
}

/**
 * Resets the configuration instance (primarily for testing)
 */
export function resetConfig(): void {
  configInstance = null;
}

export { ConfigValidationError, ConfigNotLoadedError } from './errors.js';
export { parseLanguageMapping, getLanguageCode, isAutoLanguage } from './languages.js';
export type { LanguageMapping } from './languages.js';

export type { Config } from './schema.js';
