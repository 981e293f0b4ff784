export {
  convertFile,
  convertFiles,
  getExitCode,
  type ConvertRunOptions,
  type FileResult,
  type RunContext,
  type RunSummary,
} from './converter.js';
export { discoverFiles, outputPathFor, type DiscoveredFiles } from './discovery.js';
export { reportResults, type ReporterOptions } from './reporter.js';
