import { InvalidConfigurationError } from '@bench-tools/core'
import { describe, expect, it } from 'vitest'

import { isLogParseError, LogParseError } from './LogParseError.ts'

describe('LogParseError', () => {
  it('is recognized by its error code', () => {
    const error = new LogParseError({ message: 'bad line', details: { line: 'x' } })

    expect(error.errorCode).toBe('LOG_PARSE_ERROR')
    expect(isLogParseError(error)).toBe(true)
    expect(isLogParseError(new InvalidConfigurationError({ message: 'other' }))).toBe(false)
  })
})
