import { type FileHandle, open, readFile, writeFile } from 'node:fs/promises'
import { createInterface } from 'node:readline'
import { isError } from '@lokalise/node-core'

import { InputFileNotFoundError, OutputWriteError } from '../errors/Errors.ts'

function isFileNotFound(err: unknown): boolean {
  return isError(err) && 'code' in err && err.code === 'ENOENT'
}

function toInputError(filePath: string, err: unknown): unknown {
  if (isFileNotFound(err)) {
    return new InputFileNotFoundError({
      message: `Input file "${filePath}" does not exist`,
      details: { filePath },
      cause: err,
    })
  }
  return err
}

async function openForReading(filePath: string): Promise<FileHandle> {
  try {
    return await open(filePath, 'r')
  } catch (err) {
    throw toInputError(filePath, err)
  }
}

/**
 * Yields the lines of a text file without their line terminators.
 * The file handle is released once iteration finishes, including when the consumer stops early
 * or throws.
 */
export async function* readFileLines(filePath: string): AsyncGenerator<string, void, undefined> {
  const fileHandle = await openForReading(filePath)
  // the stream owns the handle from here on and closes it when destroyed
  const input = fileHandle.createReadStream({ encoding: 'utf8' })
  const lines = createInterface({ input, crlfDelay: Number.POSITIVE_INFINITY })
  try {
    for await (const line of lines) {
      yield line
    }
  } finally {
    lines.close()
    input.destroy()
  }
}

export async function readTextFile(filePath: string): Promise<string> {
  try {
    return await readFile(filePath, 'utf8')
  } catch (err) {
    throw toInputError(filePath, err)
  }
}

export async function writeTextFile(filePath: string, content: string): Promise<void> {
  try {
    await writeFile(filePath, content, 'utf8')
  } catch (err) {
    throw new OutputWriteError({
      message: `Failed to write "${filePath}"`,
      details: { filePath },
      cause: err,
    })
  }
}
