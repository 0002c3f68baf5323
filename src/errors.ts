import type { ResolvedDevice } from './types.js';

/**
 * Thrown when the input audio path is missing or unreadable.
 * Raised before any device resolution or file write.
 */
export class InputError extends Error {
  constructor(
    message: string,
    public readonly path: string
  ) {
    super(message);
    this.name = 'InputError';
    Object.setPrototypeOf(this, InputError.prototype);
  }
}

/**
 * Thrown when a run has nothing it can produce, e.g. no recognized output format
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
    Object.setPrototypeOf(this, ConfigurationError.prototype);
  }
}

/**
 * Thrown when inference fails on every device it was attempted on
 */
export class InferenceFailure extends Error {
  constructor(
    message: string,
    public readonly attemptedDevices: ResolvedDevice[],
    cause?: unknown
  ) {
    super(message, { cause });
    this.name = 'InferenceFailure';
    Object.setPrototypeOf(this, InferenceFailure.prototype);
  }
}

/**
 * Extracts a printable message from anything thrown
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
