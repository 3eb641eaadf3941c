import {join} from 'node:path'
import {sanitizeTag} from '../core/image-reference.js'

/**
 * The two log files of one build.
 */
export type LogArtifact = {
  /** Everything the engine printed, in order. */
  completeLogPath: string;
  /** Only the timestamp-marked lines of the complete log. */
  specificLogPath: string;
}

const pad = (value: number) => String(value).padStart(2, '0')

/** `YYYY-MM-DD_HH-MM-SS`, in UTC. */
export function formatLogTimestamp(date: Date): string {
  const day = `${date.getUTCFullYear()}-${pad(date.getUTCMonth() + 1)}-${pad(date.getUTCDate())}`
  const time = `${pad(date.getUTCHours())}-${pad(date.getUTCMinutes())}-${pad(date.getUTCSeconds())}`
  return `${day}_${time}`
}

export function createLogArtifact(logDir: string, tag: string, now = new Date()): LogArtifact {
  const prefix = `build_img_${sanitizeTag(tag)}_${formatLogTimestamp(now)}`
  return {
    completeLogPath: join(logDir, `${prefix}_complete.log`),
    specificLogPath: join(logDir, `${prefix}_specific.log`)
  }
}
