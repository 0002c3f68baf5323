import { ZodError } from 'zod';

/**
 * Config path -> environment variable that feeds it
 */
const ENV_VARIABLES: Record<string, string> = {
  'whisper.audio': 'WHISPER_AUDIO',
  'whisper.model': 'WHISPER_MODEL',
  'whisper.language': 'WHISPER_LANGUAGE',
  'whisper.task': 'WHISPER_TASK',
  'whisper.formats': 'WHISPER_FORMATS',
  'whisper.device': 'WHISPER_DEVICE',
  'whisper.languages': 'WHISPER_LANGUAGES',
  'whisper.command': 'WHISPER_COMMAND',
  'output.rootDir': 'WHISPER_OUTPUT_DIR',
  'device.nvidiaSmiPath': 'NVIDIA_SMI_PATH',
  'app.verbose': 'VERBOSE',
};

/**
 * Error thrown when configuration validation fails
 */
export class ConfigValidationError extends Error {
  constructor(
    message: string,
    public readonly zodError?: ZodError
  ) {
    super(message);
    this.name = 'ConfigValidationError';
    Object.setPrototypeOf(this, ConfigValidationError.prototype);
  }

  /**
   * One line per issue, naming the environment variable behind it:
   * `  - WHISPER_DEVICE (whisper.device): Invalid enum value...`
   */
  static fromZodError(error: ZodError): ConfigValidationError {
    const issues = error.issues.map((issue) => {
      const path = issue.path.join('.');
      const variable = ENV_VARIABLES[path];
      return variable ? `  - ${variable} (${path}): ${issue.message}` : `  - ${path}: ${issue.message}`;
    });

    const message = ['Configuration validation failed:', '', ...issues, '', 'Check your environment and .env file.'].join(
      '\n'
    );

    return new ConfigValidationError(message, error);
  }
}

/**
 * Thrown by getConfig() before loadConfig() has run
 */
export class ConfigNotLoadedError extends Error {
  constructor() {
    super('Configuration accessed before loadConfig() was called.');
    this.name = 'ConfigNotLoadedError';
    Object.setPrototypeOf(this, ConfigNotLoadedError.prototype);
  }
}
