import type { CommonLogger } from '@lokalise/node-core'
import { pino } from 'pino'

import { getLogLevel, type LogLevel } from '../utils/envUtils.ts'

const STDERR_FD = 2

export type LoggerOptions = {
  name: string
  level?: LogLevel
}

/**
 * Creates the logger used by the command line tools.
 * Logs go to stderr because stdout carries the tools' data output.
 */
export function createLogger(options: LoggerOptions): CommonLogger {
  return pino(
    {
      name: options.name,
      level: options.level ?? getLogLevel(),
    },
    pino.destination(STDERR_FD),
  )
}
