import { ConfigScope } from '@lokalise/node-core'
import { z } from 'zod/v4'

import { InvalidConfigurationError } from '../errors/Errors.ts'

export const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const
export type LogLevel = (typeof LOG_LEVELS)[number]

const LOG_LEVEL_SCHEMA = z.enum(LOG_LEVELS)

const configScope = new ConfigScope()

export function reloadConfig() {
  configScope.updateEnv()
}

export function getLogLevel(): LogLevel {
  const rawLevel = configScope.getOptional('LOG_LEVEL', 'info')
  const parsed = LOG_LEVEL_SCHEMA.safeParse(rawLevel)
  if (!parsed.success) {
    throw new InvalidConfigurationError({
      message: `Unsupported LOG_LEVEL "${rawLevel}"`,
      details: { supportedValues: LOG_LEVELS },
    })
  }

  return parsed.data
}
