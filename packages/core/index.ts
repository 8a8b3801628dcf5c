export {
  BenchToolErrorCodes,
  InputFileNotFoundError,
  InvalidConfigurationError,
  OutputWriteError,
  isBenchToolError,
} from './lib/errors/Errors.ts'
export type { BenchToolErrorCode, CommonErrorParams, FreeformRecord } from './lib/errors/Errors.ts'

export { createLogger } from './lib/logging/loggerFactory.ts'
export type { LoggerOptions } from './lib/logging/loggerFactory.ts'

export { getLogLevel, LOG_LEVELS, reloadConfig } from './lib/utils/envUtils.ts'
export type { LogLevel } from './lib/utils/envUtils.ts'

export { parseOptions } from './lib/utils/parseUtils.ts'
export { readFileLines, readTextFile, writeTextFile } from './lib/utils/fileUtils.ts'

export { runCli } from './lib/cli/runCli.ts'
export type { CliMain } from './lib/cli/runCli.ts'
