import { InternalError } from '@lokalise/node-core'

// biome-ignore lint/suspicious/noExplicitAny: This is expected
export type FreeformRecord = Record<string, any>

export type CommonErrorParams = {
  message: string
  details?: FreeformRecord
  cause?: unknown
}

export const BenchToolErrorCodes = {
  LOG_PARSE_ERROR: 'LOG_PARSE_ERROR',
  INPUT_FILE_NOT_FOUND: 'INPUT_FILE_NOT_FOUND',
  INVALID_CONFIGURATION: 'INVALID_CONFIGURATION',
  OUTPUT_WRITE_FAILED: 'OUTPUT_WRITE_FAILED',
  GENERATION_DECLINED: 'GENERATION_DECLINED',
} as const

export type BenchToolErrorCode = (typeof BenchToolErrorCodes)[keyof typeof BenchToolErrorCodes]

export class InputFileNotFoundError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: BenchToolErrorCodes.INPUT_FILE_NOT_FOUND,
      details: params.details,
      cause: params.cause,
    })
    this.name = 'InputFileNotFoundError'
  }
}

export class InvalidConfigurationError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: BenchToolErrorCodes.INVALID_CONFIGURATION,
      details: params.details,
      cause: params.cause,
    })
    this.name = 'InvalidConfigurationError'
  }
}

export class OutputWriteError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: BenchToolErrorCodes.OUTPUT_WRITE_FAILED,
      details: params.details,
      cause: params.cause,
    })
    this.name = 'OutputWriteError'
  }
}

const BENCH_TOOL_ERROR_CODES: ReadonlySet<string> = new Set(Object.values(BenchToolErrorCodes))

export function isBenchToolError(err: unknown): err is InternalError {
  return err instanceof InternalError && BENCH_TOOL_ERROR_CODES.has(err.errorCode)
}
