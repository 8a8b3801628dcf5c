import { parseArgs } from 'node:util'
import { InvalidConfigurationError, parseOptions } from '@bench-tools/core'
import { type Either, isError } from '@lokalise/node-core'
import { z } from 'zod/v4'

import { DEFAULT_DELTA_SECONDS, LATENCY_OPERATIONS } from './types.ts'

export const REPORT_OPTIONS_SCHEMA = z.object({
  file: z.string({ error: 'A log file is required (-f/--file)' }).min(1),
  delta: z.coerce.number().int().positive().default(DEFAULT_DELTA_SECONDS),
  operation: z.enum(LATENCY_OPERATIONS).default('READ'),
})

export type ReportOptions = z.output<typeof REPORT_OPTIONS_SCHEMA>

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        file: { type: 'string', short: 'f' },
        delta: { type: 'string', short: 'd' },
        operation: { type: 'string', short: 'p' },
      },
      strict: true,
    }).values
  } catch (err) {
    throw new InvalidConfigurationError({
      message: isError(err) ? err.message : 'Invalid command line arguments',
      cause: err,
    })
  }
}

export function parseReportArgs(args: string[]): Either<InvalidConfigurationError, ReportOptions> {
  return parseOptions(readArgs(args), REPORT_OPTIONS_SCHEMA)
}
