export const NO_LATENCY_SENTINEL = -1

export const DEFAULT_DELTA_SECONDS = 10

export const LATENCY_OPERATIONS = ['READ', 'UPDATE', 'INSERT', 'SCAN', 'READ-MODIFY-WRITE'] as const
export type LatencyOperation = (typeof LATENCY_OPERATIONS)[number]

/**
 * One point of the reported time series.
 * `avgLatencyMicros` is NO_LATENCY_SENTINEL when the interval recorded no operations of the
 * selected kind, or when the point was synthesized to fill a gap.
 */
export type Sample = {
  time: number
  avgLatencyMicros: number
}

export type ExtractionOptions = {
  deltaSeconds: number
  operation: LatencyOperation
}

export type LineSource = Iterable<string> | AsyncIterable<string>

export type ExtractionSummary = {
  sampleCount: number
  sentinelCount: number
  firstTime?: number
  lastTime?: number
}
