import { spawn } from 'node:child_process';
import { z } from 'zod';
import type { InferenceFn, InferenceRequest, InferenceResult } from './types.js';

const segmentSchema = z.object({
  start: z.number(),
  end: z.number(),
  text: z.string(),
});

const outputSchema = z.object({
  segments: z.array(segmentSchema),
  language: z.string().nullable().optional(),
});

const STDERR_TAIL_LINES = 5;

export interface CommandInferenceOptions {
  /** Recognizer executable */
  command: string;
  /** Extra arguments placed before the generated ones */
  args?: string[];
  /** Receives stderr lines as they arrive */
  onLog?: (line: string) => void;
}

/**
 * Builds the argument list handed to the recognizer
 */
export function buildCommandArgs(request: InferenceRequest, extraArgs: readonly string[] = []): string[] {
  const args = [...extraArgs, '--model', request.model, '--device', request.device, '--task', request.task];
  if (request.language) {
    args.push('--language', request.language);
  }
  args.push(request.audioPath);
  return args;
}

/**
 * Validates the recognizer's stdout document
 * @throws {Error} If the output is not JSON or does not match the expected shape
 */
export function parseCommandOutput(stdout: string): InferenceResult {
  let raw: unknown;
  try {
    raw = JSON.parse(stdout);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new Error(`Recognizer output is not valid JSON: ${message}`);
  }

  const parsed = outputSchema.safeParse(raw);
  if (!parsed.success) {
    const issues = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new Error(`Recognizer output has an unexpected shape: ${issues}`);
  }

  const result: InferenceResult = { segments: parsed.data.segments };
  if (parsed.data.language) {
    result.language = parsed.data.language;
  }
  return result;
}

/**
 * Inference collaborator that runs an external recognizer process.
 * The process receives `--model --device --task [--language] <audio>` and
 * must print `{ "segments": [{ "start", "end", "text" }], "language" }` on stdout.
 */
export function createCommandInference(options: CommandInferenceOptions): InferenceFn {
  return (request) =>
    new Promise<InferenceResult>((resolve, reject) => {
      const child = spawn(options.command, buildCommandArgs(request, options.args), {
        stdio: ['ignore', 'pipe', 'pipe'],
      });

      const stdoutChunks: Buffer[] = [];
      const stderrLines: string[] = [];
      let pendingStderr = '';

      child.stdout.on('data', (chunk: Buffer) => {
        stdoutChunks.push(chunk);
      });

      child.stderr.on('data', (chunk: Buffer) => {
        pendingStderr += chunk.toString('utf8');
        const lines = pendingStderr.split(/\r?\n/);
        pendingStderr = lines.pop() ?? '';
        for (const line of lines) {
          stderrLines.push(line);
          options.onLog?.(line);
        }
      });

      child.on('error', (error) => {
        reject(new Error(`Failed to start recognizer '${options.command}': ${error.message}`));
      });

      child.on('close', (code, signal) => {
        if (pendingStderr) {
          stderrLines.push(pendingStderr);
          options.onLog?.(pendingStderr);
        }

        if (code !== 0) {
          const tail = stderrLines.filter(line => line.trim()).slice(-STDERR_TAIL_LINES).join('\n');
          const status = signal ? `signal ${signal}` : `exit code ${code}`;
          reject(new Error(`Recognizer failed on ${request.device} (${status})${tail ? `:\n${tail}` : ''}`));
          return;
        }

        try {
          resolve(parseCommandOutput(Buffer.concat(stdoutChunks).toString('utf8')));
        } catch (error) {
          reject(error);
        }
      });
    });
}
