import { once } from 'node:events'
import { createInterface } from 'node:readline/promises'

import type { ConfirmGeneration } from './types.ts'

const CONFIRMING_ANSWERS = new Set(['', 'y', 'yes'])

export type ConsoleConfirmationOptions = {
  input?: NodeJS.ReadableStream & { isTTY?: boolean }
  output?: NodeJS.WritableStream
  /**
   * When set, input that is not a terminal declines without prompting
   */
  requireTty?: boolean
}

/**
 * Prompts on the terminal before files are written. Pressing enter or answering "y" confirms.
 */
export function createConsoleConfirmation(
  options: ConsoleConfirmationOptions = {},
): ConfirmGeneration {
  const input = options.input ?? process.stdin
  const output = options.output ?? process.stderr
  const requireTty = options.requireTty ?? true

  return async ({ numPartitions }) => {
    if (requireTty && !input.isTTY) {
      return false
    }

    const readline = createInterface({ input, output, terminal: false })
    // input ending before an answer declines
    let isClosed = false
    readline.once('close', () => {
      isClosed = true
    })
    const inputClosed = once(readline, 'close').then(() => undefined)
    const question = readline
      .question(
        `there will be ${numPartitions} config files generated, press enter to continue [Y/n] `,
      )
      .catch((err: unknown) => {
        if (isClosed) {
          return undefined
        }
        throw err
      })
    try {
      const answer = await Promise.race([question, inputClosed])
      return answer !== undefined && CONFIRMING_ANSWERS.has(answer.trim().toLowerCase())
    } finally {
      readline.close()
    }
  }
}

export const autoConfirm: ConfirmGeneration = () => Promise.resolve(true)
