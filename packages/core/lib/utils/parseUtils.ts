import type { Either } from '@lokalise/node-core'
import type { z } from 'zod/v4'

import { InvalidConfigurationError } from '../errors/Errors.ts'

/**
 * Validates raw CLI option values against a zod schema.
 *
 * `parseArgs` hands back strings (or booleans for flags), so schemas are expected to coerce
 * numeric options and fill in defaults. Validation issues are collected into the `details` of a
 * single InvalidConfigurationError instead of being thrown, so callers decide how to report them.
 */
export function parseOptions<Schema extends z.ZodType>(
  rawValues: unknown,
  schema: Schema,
): Either<InvalidConfigurationError, z.output<Schema>> {
  const parsed = schema.safeParse(rawValues)
  if (parsed.success) {
    return { result: parsed.data }
  }

  return {
    error: new InvalidConfigurationError({
      message: 'Invalid command line options',
      details: {
        issues: parsed.error.issues.map((issue) => ({
          path: issue.path.map(String).join('.'),
          message: issue.message,
        })),
      },
    }),
  }
}
