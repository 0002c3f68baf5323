import type { ResolvedDevice } from '../types.js';

export interface GpuInfo {
  name: string;
  /** Total memory in GiB */
  memoryGb: number;
}

export interface CudaProbeResult {
  available: boolean;
  gpu?: GpuInfo;
}

/**
 * Answers whether a CUDA device can be used right now.
 * Probed once per run; results are never cached because VRAM and driver
 * state can change between runs.
 */
export interface CudaProbe {
  probe(): Promise<CudaProbeResult>;
}

/**
 * Outcome of resolving a device preference. The expected "no CUDA" path is
 * modelled here rather than thrown.
 */
export interface DeviceResolution {
  device: ResolvedDevice;
  /** True when CUDA was explicitly requested but the run ends up on CPU */
  fallbackOccurred: boolean;
  reason?: string;
  gpu?: GpuInfo;
}
