import { execFile } from 'node:child_process';
import { promisify } from 'node:util';
import type { CudaProbe, CudaProbeResult } from './types.js';

const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[]) => Promise<{ stdout: string }>;

export interface NvidiaSmiProbeOptions {
  /** nvidia-smi executable (default: nvidia-smi) */
  executable?: string;
  /** Override for running the command (tests) */
  run?: CommandRunner;
  timeoutMs?: number;
}

const QUERY_ARGS = ['--query-gpu=name,memory.total', '--format=csv,noheader,nounits'];

/**
 * Parses `nvidia-smi --query-gpu=name,memory.total --format=csv,noheader,nounits`.
 * Memory is reported in MiB; the first GPU wins.
 */
export function parseNvidiaSmiOutput(stdout: string): CudaProbeResult {
  const firstLine = stdout
    .split(/\r?\n/)
    .map(line => line.trim())
    .find(line => line.length > 0);

  if (!firstLine) {
    return { available: false };
  }

  const separator = firstLine.lastIndexOf(',');
  if (separator === -1) {
    return { available: true, gpu: { name: firstLine, memoryGb: 0 } };
  }

  const name = firstLine.slice(0, separator).trim();
  const memoryMib = Number(firstLine.slice(separator + 1).trim());

  return {
    available: true,
    gpu: {
      name,
      memoryGb: Number.isFinite(memoryMib) ? memoryMib / 1024 : 0,
    },
  };
}

function isMissingExecutable(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}

/**
 * CUDA probe backed by nvidia-smi. A missing executable means no CUDA;
 * any other failure propagates so the selector can report it.
 */
export function createNvidiaSmiProbe(options: NvidiaSmiProbeOptions = {}): CudaProbe {
  const executable = options.executable ?? 'nvidia-smi';
  const timeoutMs = options.timeoutMs ?? 10000;
  const run: CommandRunner =
    options.run ??
    (async (file, args) => {
      const { stdout } = await execFileAsync(file, args, { timeout: timeoutMs, encoding: 'utf8' });
      return { stdout };
    });

  return {
    async probe() {
      try {
        const { stdout } = await run(executable, QUERY_ARGS);
        return parseNvidiaSmiOutput(stdout);
      } catch (error) {
        if (isMissingExecutable(error)) {
          return { available: false };
        }
        throw error;
      }
    },
  };
}
