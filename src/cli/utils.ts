import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {ConsoleReporter, type Reporter} from '../core/reporter.js'
import {ValidationError} from '../errors.js'
import {InteractiveReporter} from './interactive-reporter.js'

export type GlobalOptions = {
  json?: boolean;
  verbose?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export function createReporter({json, verbose}: GlobalOptions): Reporter {
  return json ? new ConsoleReporter() : new InteractiveReporter({verbose})
}

/** Commander collector for repeatable options. */
export function collect(value: string, previous: string[] = []): string[] {
  return [...previous, value]
}

export const buildFilenames = ['imgkiln.yml', 'imgkiln.yaml', 'imgkiln.json']

/**
 * Accepts a build file, or a directory containing one of `buildFilenames`.
 */
export async function resolveBuildFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new ValidationError(`Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of buildFilenames) {
    const candidate = join(target, filename)
    try {
      await access(candidate)
      return candidate
    } catch {
      // Try the next name
    }
  }

  throw new ValidationError(`No build file found in ${target}. Expected one of: ${buildFilenames.join(', ')}`)
}
