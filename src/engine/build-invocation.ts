import {join} from 'node:path'
import type {KeyValueList} from '../types.js'

/**
 * Everything the build engine is called with. Immutable once created.
 */
export type BuildInvocation = Readonly<{
  /** Engine executable (e.g. "docker" or an absolute path). */
  executablePath: string;
  /** Staged build context directory. */
  contextDir: string;
  /** Build file path, relative to the context directory. */
  buildFile: string;
  /** Sorted by key. */
  buildArgs: Readonly<KeyValueList>;
  /** Sorted by key. */
  labels: Readonly<KeyValueList>;
  tag: string;
  useCache: boolean;
  pull: boolean;
  /** Enables BuildKit for the child process only. */
  buildkit: boolean;
}>

export type BuildInvocationInit = {
  executablePath: string;
  contextDir: string;
  buildFile?: string;
  buildArgs?: Record<string, string>;
  labels?: Record<string, string>;
  tag: string;
  useCache?: boolean;
  pull?: boolean;
  buildkit?: boolean;
}

function sortedPairs(record: Record<string, string> | undefined): KeyValueList {
  return Object.entries(record ?? {}).sort(([a], [b]) => {
    if (a < b) {
      return -1
    }

    return a > b ? 1 : 0
  })
}

export function createInvocation(init: BuildInvocationInit): BuildInvocation {
  return Object.freeze({
    executablePath: init.executablePath,
    contextDir: init.contextDir,
    buildFile: init.buildFile ?? 'Dockerfile',
    buildArgs: Object.freeze(sortedPairs(init.buildArgs)),
    labels: Object.freeze(sortedPairs(init.labels)),
    tag: init.tag,
    useCache: init.useCache ?? false,
    pull: init.pull ?? false,
    buildkit: init.buildkit ?? true
  })
}

/**
 * Command-line arguments for the engine, without the executable.
 * The same invocation always yields the same argument list.
 */
export function buildCommandArgs(invocation: BuildInvocation): string[] {
  const args = ['build', '--file', join(invocation.contextDir, invocation.buildFile), '--progress=plain']

  if (invocation.pull) {
    args.push('--pull')
  }

  if (!invocation.useCache) {
    args.push('--no-cache')
  }

  for (const [key, value] of invocation.buildArgs) {
    args.push('--build-arg', `${key}=${value}`)
  }

  for (const [key, value] of invocation.labels) {
    args.push('--label', `${key}=${value}`)
  }

  args.push('--tag', invocation.tag, invocation.contextDir)
  return args
}

/** Printable form of the command, for logs. */
export function formatCommand(invocation: BuildInvocation): string {
  return [invocation.executablePath, ...buildCommandArgs(invocation)].join(' ')
}

// -- Pull policy -------------------------------------------------------------

export type BaseImageState = 'NoLocalCopy' | 'LocalCopyPresent'

export type PullDecision = {
  state: BaseImageState;
  /** Whether `--pull` goes on the command line. */
  pull: boolean;
  /** What the engine will do about the base image. */
  notice: 'pull-requested' | 'engine-will-fetch' | 'use-local';
}

/**
 * Decides whether the build asks the engine to refresh the base image.
 *
 * - pull requested: `--pull`, whatever the local state
 * - not requested, no local copy: no flag, the engine fetches it on its own
 * - not requested, local copy present: no flag, the build stays offline for the base image
 */
export function resolvePullPolicy(pullRequested: boolean, state: BaseImageState): PullDecision {
  if (pullRequested) {
    return {state, pull: true, notice: 'pull-requested'}
  }

  if (state === 'NoLocalCopy') {
    return {state, pull: false, notice: 'engine-will-fetch'}
  }

  return {state, pull: false, notice: 'use-local'}
}
