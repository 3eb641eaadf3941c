import process from 'node:process'
import {readFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join, resolve} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {isRecord} from '../core/utils.js'

/**
 * Runtime settings. Resolved from, in increasing priority:
 * built-in defaults, environment (IMGKILN_*), `.imgkiln.yml`, CLI flags.
 */
export type ImgkilnConfig = {
  /** Build engine executable. */
  executable: string;
  /** Where complete and specific logs are written. */
  logDir: string;
  /** Parent directory of temporary build contexts. */
  contextDir: string;
  /** Enable BuildKit for the engine process. */
  buildkit: boolean;
}

export const configFileName = '.imgkiln.yml'

function parseBoolean(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value === '') {
    return fallback
  }

  return !['0', 'false', 'no', 'off'].includes(value.toLowerCase())
}

export function configFromEnv(env: NodeJS.ProcessEnv = process.env): ImgkilnConfig {
  return {
    executable: env.IMGKILN_DOCKER ?? 'docker',
    logDir: env.IMGKILN_LOG_DIR ?? tmpdir(),
    contextDir: env.IMGKILN_CONTEXT_DIR ?? tmpdir(),
    buildkit: parseBoolean(env.IMGKILN_BUILDKIT, true)
  }
}

/**
 * Reads the project-level `.imgkiln.yml` from a directory.
 * Returns an empty object when the file does not exist.
 */
export async function loadConfigFile(dir: string): Promise<Partial<ImgkilnConfig>> {
  let content: string
  try {
    content = await readFile(join(dir, configFileName), 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (!isRecord(parsed)) {
    throw new ValidationError(`${configFileName}: expected a mapping`)
  }

  const config: Partial<ImgkilnConfig> = {}
  for (const key of ['executable', 'logDir', 'contextDir'] as const) {
    const value = parsed[key]
    if (value === undefined) {
      continue
    }

    if (typeof value !== 'string' || !value) {
      throw new ValidationError(`${configFileName}: "${key}" must be a non-empty string`)
    }

    config[key] = key === 'executable' ? value : resolve(dir, value)
  }

  const {buildkit} = parsed
  if (buildkit !== undefined) {
    if (typeof buildkit !== 'boolean') {
      throw new ValidationError(`${configFileName}: "buildkit" must be a boolean`)
    }

    config.buildkit = buildkit
  }

  return config
}

/**
 * Merges defaults, environment, project file and explicit overrides.
 */
export async function loadConfig(
  dir: string,
  overrides: Partial<ImgkilnConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): Promise<ImgkilnConfig> {
  const fileConfig = await loadConfigFile(dir)
  const base = configFromEnv(env)
  return {
    executable: overrides.executable ?? fileConfig.executable ?? base.executable,
    logDir: overrides.logDir ?? fileConfig.logDir ?? base.logDir,
    contextDir: overrides.contextDir ?? fileConfig.contextDir ?? base.contextDir,
    buildkit: overrides.buildkit ?? fileConfig.buildkit ?? base.buildkit
  }
}
