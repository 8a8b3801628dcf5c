export {
  extractSamples,
  formatSample,
  parseThroughputLine,
  resolveExtractionOptions,
} from './lib/LogSampleExtractor.ts'
export { reportLogSamples, writeSamples } from './lib/reportLogSamples.ts'
export type { ReportLogSamplesParams, WriteSamplesParams } from './lib/reportLogSamples.ts'
export { isLogParseError, LogParseError } from './lib/errors/LogParseError.ts'
export {
  DEFAULT_DELTA_SECONDS,
  LATENCY_OPERATIONS,
  NO_LATENCY_SENTINEL,
} from './lib/types.ts'
export type {
  ExtractionOptions,
  ExtractionSummary,
  LatencyOperation,
  LineSource,
  Sample,
} from './lib/types.ts'
