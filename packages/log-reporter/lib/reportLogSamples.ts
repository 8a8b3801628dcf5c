import { once } from 'node:events'
import type { Writable } from 'node:stream'
import { readFileLines } from '@bench-tools/core'
import type { CommonLogger } from '@lokalise/node-core'

import { extractSamples, formatSample } from './LogSampleExtractor.ts'
import {
  type ExtractionOptions,
  type ExtractionSummary,
  type LineSource,
  NO_LATENCY_SENTINEL,
} from './types.ts'

export type ReportLogSamplesParams = Partial<ExtractionOptions> & {
  filePath: string
  output: Writable
  logger: CommonLogger
}

export type WriteSamplesParams = Partial<ExtractionOptions> & {
  lines: LineSource
  output: Writable
}

/**
 * Writes the extracted time series to `output`, one `time<TAB>latency` row per sample.
 */
export async function writeSamples(params: WriteSamplesParams): Promise<ExtractionSummary> {
  const summary: ExtractionSummary = { sampleCount: 0, sentinelCount: 0 }

  for await (const sample of extractSamples(params.lines, params)) {
    if (summary.firstTime === undefined) {
      summary.firstTime = sample.time
    }
    summary.lastTime = sample.time
    summary.sampleCount++
    if (sample.avgLatencyMicros === NO_LATENCY_SENTINEL) {
      summary.sentinelCount++
    }

    if (!params.output.write(`${formatSample(sample)}\n`)) {
      await once(params.output, 'drain')
    }
  }

  return summary
}

export async function reportLogSamples(params: ReportLogSamplesParams): Promise<ExtractionSummary> {
  const { filePath, logger } = params
  logger.debug({ message: 'Extracting samples', filePath })

  const summary = await writeSamples({ ...params, lines: readFileLines(filePath) })

  logger.info({ message: 'Sample extraction completed', filePath, ...summary })
  return summary
}
