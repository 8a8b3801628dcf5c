import { parseArgs } from 'node:util'
import { InvalidConfigurationError, parseOptions } from '@bench-tools/core'
import { type Either, isError } from '@lokalise/node-core'
import { z } from 'zod/v4'

import type { GenerationRequest } from './types.ts'

const COUNT_SCHEMA = z.coerce.number().int().positive()

export const GENERATE_OPTIONS_SCHEMA = z.object({
  recordcount: COUNT_SCHEMA.default(500_000_000),
  operationcount: COUNT_SCHEMA.default(10_000_000),
  insertcount: COUNT_SCHEMA.default(25_000_000),
  hosts: z.string().min(1).default('queenbee'),
  threadcount: COUNT_SCHEMA.default(100),
  template: z.string({ error: 'A template file is required (-t/--template)' }).min(1),
  output: z.string().min(1).default('workload'),
  yes: z.boolean().default(false),
})

export type GenerateOptions = z.output<typeof GENERATE_OPTIONS_SCHEMA>

function readArgs(args: string[]) {
  try {
    return parseArgs({
      args,
      options: {
        recordcount: { type: 'string', short: 'r' },
        operationcount: { type: 'string', short: 'o' },
        insertcount: { type: 'string', short: 'i' },
        hosts: { type: 'string', short: 'n' },
        threadcount: { type: 'string', short: 'c' },
        template: { type: 'string', short: 't' },
        output: { type: 'string', short: 'f' },
        yes: { type: 'boolean', short: 'y' },
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

export function parseGenerateArgs(
  args: string[],
): Either<InvalidConfigurationError, GenerateOptions> {
  return parseOptions(readArgs(args), GENERATE_OPTIONS_SCHEMA)
}

export function toGenerationRequest(options: GenerateOptions): GenerationRequest {
  return {
    recordCount: options.recordcount,
    operationCount: options.operationcount,
    insertCountPerPartition: options.insertcount,
    hosts: options.hosts,
    threadCount: options.threadcount,
    templatePath: options.template,
    outputPathPrefix: options.output,
  }
}
