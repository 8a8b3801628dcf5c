#!/usr/bin/env tsx
import { createLogger, runCli } from '@bench-tools/core'

import { parseGenerateArgs, toGenerationRequest } from '../lib/cliOptions.ts'
import { autoConfirm, createConsoleConfirmation } from '../lib/confirmation.ts'
import { GenerationDeclinedError } from '../lib/errors/GenerationDeclinedError.ts'
import { WorkloadConfigGenerator } from '../lib/WorkloadConfigGenerator.ts'

const logger = createLogger({ name: 'bench-generate-workload' })

await runCli(async () => {
  const parsedOptions = parseGenerateArgs(process.argv.slice(2))
  if (parsedOptions.error) {
    throw parsedOptions.error
  }
  const options = parsedOptions.result

  const generator = new WorkloadConfigGenerator({
    logger,
    confirm: options.yes ? autoConfirm : createConsoleConfirmation(),
  })

  const result = await generator.generate(toGenerationRequest(options))
  if (result.status === 'declined') {
    throw new GenerationDeclinedError(result.plan.numPartitions)
  }
}, logger)
