import type { DevicePreference } from '../types.js';
import { errorMessage } from '../errors.js';
import type { CudaProbe, CudaProbeResult, DeviceResolution } from './types.js';

type ProbeOutcome = { ok: true; result: CudaProbeResult } | { ok: false; error: string };

async function runProbe(probe: CudaProbe): Promise<ProbeOutcome> {
  try {
    return { ok: true, result: await probe.probe() };
  } catch (error) {
    return { ok: false, error: errorMessage(error) };
  }
}

/**
 * Resolves a device preference to a concrete device.
 *
 * - cpu: always cpu, the probe is not consulted
 * - cuda: cuda when the probe reports a device, otherwise cpu with a fallback
 * - auto: cuda when available, otherwise cpu
 *
 * Never rejects; probe failures count as "CUDA unavailable".
 */
export async function resolveDevice(preference: DevicePreference, probe: CudaProbe): Promise<DeviceResolution> {
  if (preference === 'cpu') {
    return { device: 'cpu', fallbackOccurred: false };
  }

  const outcome = await runProbe(probe);

  if (outcome.ok && outcome.result.available) {
    const resolution: DeviceResolution = { device: 'cuda', fallbackOccurred: false };
    if (outcome.result.gpu) {
      resolution.gpu = outcome.result.gpu;
    }
    return resolution;
  }

  const reason = outcome.ok ? 'No CUDA GPU detected' : `CUDA probe failed: ${outcome.error}`;

  if (preference === 'cuda') {
    return {
      device: 'cpu',
      fallbackOccurred: true,
      reason: `Requested device 'cuda' not available (${reason}), falling back to CPU`,
    };
  }

  return { device: 'cpu', fallbackOccurred: false, reason };
}

/**
 * Human-readable status line for a resolution
 */
export function describeDevice(preference: DevicePreference, resolution: DeviceResolution): string {
  if (resolution.device === 'cuda') {
    const prefix = preference === 'auto' ? 'CUDA GPU detected' : 'Using CUDA GPU';
    return resolution.gpu
      ? `${prefix}: ${resolution.gpu.name} (${resolution.gpu.memoryGb.toFixed(1)}GB)`
      : prefix;
  }

  if (preference === 'cpu') {
    return 'Using CPU (forced)';
  }
  if (resolution.fallbackOccurred) {
    return 'Using CPU';
  }
  return 'Using CPU (no CUDA GPU detected)';
}
