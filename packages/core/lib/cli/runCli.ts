import { type CommonLogger, InternalError, isError } from '@lokalise/node-core'

export type CliMain = () => Promise<void>

/**
 * Runs a command line entry point, logging any failure and marking the process as failed.
 * Exit is left to the event loop so that pending log writes are flushed.
 */
export async function runCli(main: CliMain, logger: CommonLogger): Promise<boolean> {
  try {
    await main()
    return true
  } catch (err) {
    if (err instanceof InternalError) {
      logger.error({
        message: err.message,
        errorCode: err.errorCode,
        details: err.details,
      })
    } else if (isError(err)) {
      logger.error({ message: err.message, error: err })
    } else {
      logger.error({ message: 'Unknown failure', error: err })
    }

    process.exitCode = 1
    return false
  }
}
