import {isPlainObject} from 'lodash-es'
import {ValidationError} from '../errors.js'

/** True for plain mappings (parsed YAML/JSON objects), false for arrays, null and class instances. */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return isPlainObject(value)
}

export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`
  }

  const seconds = ms / 1000
  if (seconds < 60) {
    return `${seconds.toFixed(1)}s`
  }

  const minutes = Math.floor(seconds / 60)
  const remainingSeconds = Math.round(seconds % 60)
  return `${minutes}m ${remainingSeconds}s`
}

/**
 * Parses repeated `KEY=VALUE` CLI values. The first `=` splits; the value may contain more.
 */
export function parseKeyValues(values: string[] | undefined, flag: string): Record<string, string> {
  const result: Record<string, string> = {}
  for (const item of values ?? []) {
    const index = item.indexOf('=')
    if (index <= 0) {
      throw new ValidationError(`${flag} expects KEY=VALUE, got '${item}'`)
    }

    result[item.slice(0, index)] = item.slice(index + 1)
  }

  return result
}
