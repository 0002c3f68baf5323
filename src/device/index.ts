export { resolveDevice, describeDevice } from './DeviceSelector.js';
export { createNvidiaSmiProbe, parseNvidiaSmiOutput } from './nvidiaSmiProbe.js';
export type { CommandRunner, NvidiaSmiProbeOptions } from './nvidiaSmiProbe.js';
export type { CudaProbe, CudaProbeResult, DeviceResolution, GpuInfo } from './types.js';
