import { InvalidConfigurationError } from '@bench-tools/core'

import { LogParseError } from './errors/LogParseError.ts'
import {
  DEFAULT_DELTA_SECONDS,
  type ExtractionOptions,
  type LatencyOperation,
  type LineSource,
  NO_LATENCY_SENTINEL,
  type Sample,
} from './types.ts'

const FAILURE_MARKER = 'failed'
const THROUGHPUT_MARKER = 'current ops/sec'
const TIME_MARKER = 'sec:'

const INTEGER_PATTERN = /^-?\d+$/
const LATENCY_VALUE_PATTERN = /^\s*(\d+(?:\.\d+)?(?:[eE][+-]?\d+)?)/

function latencyMarker(operation: LatencyOperation): string {
  return `${operation} AverageLatency(us)=`
}

/**
 * Parses a throughput status line such as
 * `10 sec: 4520 operations; 452 current ops/sec; [READ AverageLatency(us)=120.5]`.
 *
 * A line without a latency field for the requested operation means nothing of that kind ran in
 * the interval, and yields NO_LATENCY_SENTINEL.
 */
export function parseThroughputLine(line: string, operation: LatencyOperation = 'READ'): Sample {
  const markerIndex = line.indexOf(TIME_MARKER)
  if (markerIndex === -1) {
    throw new LogParseError({
      message: `Throughput line has no "${TIME_MARKER}" marker`,
      details: { line },
    })
  }

  const timePrefix = line.slice(0, markerIndex).trim()
  if (!INTEGER_PATTERN.test(timePrefix)) {
    throw new LogParseError({
      message: `Throughput line has a non-integer timestamp "${timePrefix}"`,
      details: { line },
    })
  }
  const time = Number.parseInt(timePrefix, 10)

  const remainder = line.slice(markerIndex + TIME_MARKER.length)
  const marker = latencyMarker(operation)
  const latencyIndex = remainder.indexOf(marker)
  if (latencyIndex === -1) {
    return { time, avgLatencyMicros: NO_LATENCY_SENTINEL }
  }

  const valueMatch = LATENCY_VALUE_PATTERN.exec(remainder.slice(latencyIndex + marker.length))
  if (!valueMatch?.[1]) {
    throw new LogParseError({
      message: `Throughput line has a malformed ${operation} latency`,
      details: { line },
    })
  }

  return { time, avgLatencyMicros: Number(valueMatch[1]) }
}

export function resolveExtractionOptions(
  options: Partial<ExtractionOptions> = {},
): ExtractionOptions {
  const deltaSeconds = options.deltaSeconds ?? DEFAULT_DELTA_SECONDS
  if (!Number.isInteger(deltaSeconds) || deltaSeconds <= 0) {
    throw new InvalidConfigurationError({
      message: 'Delta must be a positive number of seconds',
      details: { deltaSeconds },
    })
  }

  return { deltaSeconds, operation: options.operation ?? 'READ' }
}

/**
 * Turns benchmark status log lines into a gap-free time series.
 *
 * Every input line is taken to cover one reporting interval, so the expected timestamp advances
 * by `deltaSeconds` per line, including lines that are skipped. When a throughput line reports a
 * later time than expected, the missing steps are filled with sentinel samples first.
 */
export async function* extractSamples(
  lines: LineSource,
  options: Partial<ExtractionOptions> = {},
): AsyncGenerator<Sample, void, undefined> {
  const { deltaSeconds, operation } = resolveExtractionOptions(options)
  let expectedTime = 0 - deltaSeconds

  for await (const line of lines) {
    expectedTime += deltaSeconds

    // failed operations still take up their time slot
    if (line.includes(FAILURE_MARKER)) {
      continue
    }
    if (!line.includes(THROUGHPUT_MARKER)) {
      continue
    }

    const sample = parseThroughputLine(line, operation)
    if (sample.time !== expectedTime) {
      for (let time = expectedTime; time < sample.time; time += deltaSeconds) {
        yield { time, avgLatencyMicros: NO_LATENCY_SENTINEL }
      }
      expectedTime = sample.time
    }

    yield sample
  }
}

export function formatSample(sample: Sample): string {
  return `${sample.time}\t${sample.avgLatencyMicros}`
}
