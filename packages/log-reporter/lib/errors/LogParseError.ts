import { BenchToolErrorCodes, type CommonErrorParams } from '@bench-tools/core'
import { InternalError } from '@lokalise/node-core'

export class LogParseError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: BenchToolErrorCodes.LOG_PARSE_ERROR,
      details: params.details,
      cause: params.cause,
    })
    this.name = 'LogParseError'
  }
}

export function isLogParseError(err: unknown): err is LogParseError {
  return err instanceof InternalError && err.errorCode === BenchToolErrorCodes.LOG_PARSE_ERROR
}
