#!/usr/bin/env tsx
import { createLogger, runCli } from '@bench-tools/core'

import { parseReportArgs } from '../lib/cliOptions.ts'
import { reportLogSamples } from '../lib/reportLogSamples.ts'

const logger = createLogger({ name: 'bench-report' })

await runCli(async () => {
  const parsedOptions = parseReportArgs(process.argv.slice(2))
  if (parsedOptions.error) {
    throw parsedOptions.error
  }
  const options = parsedOptions.result

  await reportLogSamples({
    filePath: options.file,
    deltaSeconds: options.delta,
    operation: options.operation,
    output: process.stdout,
    logger,
  })
}, logger)
