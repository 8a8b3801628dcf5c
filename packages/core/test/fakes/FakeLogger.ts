import type { CommonLogger } from '@lokalise/node-core'
import type { Bindings, ChildLoggerOptions, Level, LevelWithSilentOrString } from 'pino'

export type LoggedEntry = {
  level: Level
  obj: unknown
}

/**
 * Keeps every log call in order, so tests can assert on what was reported and at which level.
 */
export class FakeLogger implements CommonLogger {
  public readonly entries: LoggedEntry[] = []
  public readonly level: LevelWithSilentOrString

  constructor(level: LevelWithSilentOrString = 'debug') {
    this.level = level
  }

  loggedAt(level: Level): unknown[] {
    return this.entries.filter((entry) => entry.level === level).map((entry) => entry.obj)
  }

  trace(obj: unknown) {
    this.entries.push({ level: 'trace', obj })
  }
  debug(obj: unknown) {
    this.entries.push({ level: 'debug', obj })
  }
  info(obj: unknown) {
    this.entries.push({ level: 'info', obj })
  }
  warn(obj: unknown) {
    this.entries.push({ level: 'warn', obj })
  }
  error(obj: unknown) {
    this.entries.push({ level: 'error', obj })
  }
  fatal(obj: unknown) {
    this.entries.push({ level: 'fatal', obj })
  }
  silent(_obj: unknown) {
    return
  }

  child(_bindings: Bindings, _options?: ChildLoggerOptions): CommonLogger {
    return this
  }

  isLevelEnabled(_level: string): boolean {
    return true
  }
}
