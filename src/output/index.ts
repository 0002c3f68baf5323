export {
  RUN_DIRECTORY_PATTERN,
  formatRunTimestamp,
  getOutputBasename,
  planOutputBatch,
  createOutputBatch,
  writeOutputFile,
} from './OutputDirectoryManager.js';
export type { OutputBatchOptions } from './OutputDirectoryManager.js';
export { listJobs, loadJob } from './history.js';
export type { JobSummary, JobContents } from './history.js';
