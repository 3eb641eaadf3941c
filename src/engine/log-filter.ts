import {createReadStream} from 'node:fs'
import {open, stat, unlink, type FileHandle} from 'node:fs/promises'
import {createInterface} from 'node:readline'
import {CleanupError} from '../errors.js'
import type {LogArtifact} from './log-artifact.js'

/** Marker of a structural log line: `[YYYY-MM-DD_HH-MM-SS]`. */
export const specificLogPattern = /\[\d{4}-\d{2}-\d{2}_\d{2}-\d{2}-\d{2}\]/

export type LogFileStatus = 'ready' | 'removed' | 'missing'

export type LogFinalization = {
  /** Exit code after bookkeeping: a successful build becomes 1 when cleanup failed. */
  exitCode: number;
  complete: LogFileStatus;
  specific: LogFileStatus;
  /** Number of lines copied to the specific log. */
  matches: number;
  errors: CleanupError[];
}

/**
 * Copies the lines matching the marker from one file to another, in order.
 * The output file is only created once a line matches.
 * @returns Number of matching lines
 */
export async function extractSpecificLines(inputPath: string, outputPath: string, pattern = specificLogPattern): Promise<number> {
  const input = createReadStream(inputPath, {encoding: 'utf8'})
  const reader = createInterface({input, crlfDelay: Number.POSITIVE_INFINITY})
  let output: FileHandle | undefined
  let matches = 0
  try {
    for await (const line of reader) {
      if (pattern.test(line)) {
        output ??= await open(outputPath, 'w')
        await output.appendFile(`${line}\n`, 'utf8')
        matches++
      }
    }
  } finally {
    reader.close()
    input.destroy()
    await output?.close()
  }

  return matches
}

async function fileSize(path: string): Promise<number | undefined> {
  try {
    const stats = await stat(path)
    return stats.size
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return undefined
    }

    throw error
  }
}

async function removeLog(path: string, errors: CleanupError[]): Promise<void> {
  try {
    await unlink(path)
  } catch (error) {
    if ((error as NodeJS.ErrnoException).code !== 'ENOENT') {
      errors.push(new CleanupError(path, {cause: error}))
    }
  }
}

/**
 * Derives the specific log from the complete log and removes empty artifacts.
 *
 * - complete log missing: nothing to do
 * - complete log empty: it is removed, no specific log is written
 * - no matching line: the specific log is removed
 * - the specific log cannot be written: recorded in `errors`, status `missing`
 *
 * A failed removal never hides an earlier build failure, but turns a
 * successful build (exit code 0) into a failed one (exit code 1).
 */
export async function finalizeLogs(artifact: LogArtifact, exitCode: number): Promise<LogFinalization> {
  const errors: CleanupError[] = []
  const size = await fileSize(artifact.completeLogPath)

  let result: Omit<LogFinalization, 'exitCode' | 'errors'>
  if (size === undefined) {
    result = {complete: 'missing', specific: 'missing', matches: 0}
  } else if (size === 0) {
    await removeLog(artifact.completeLogPath, errors)
    result = {complete: 'removed', specific: 'missing', matches: 0}
  } else {
    let matches = 0
    let specific: LogFileStatus = 'missing'
    try {
      matches = await extractSpecificLines(artifact.completeLogPath, artifact.specificLogPath)
      specific = matches > 0 ? 'ready' : 'removed'
    } catch (error) {
      errors.push(new CleanupError(artifact.specificLogPath, {cause: error}, `Could not write '${artifact.specificLogPath}'`))
    }

    // A stale file at the specific log path goes too
    if (specific === 'removed') {
      await removeLog(artifact.specificLogPath, errors)
    }

    result = {complete: 'ready', specific, matches}
  }

  const finalExitCode = errors.length > 0 && exitCode === 0 ? 1 : exitCode
  return {...result, exitCode: finalExitCode, errors}
}
