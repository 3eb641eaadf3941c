import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import type {BuildEvent, Reporter} from '../core/reporter.js'
import type {BuildInvocation} from '../engine/build-invocation.js'
import {BuildExecutor, type BuildProcess} from '../engine/executor.js'
import type {ConsoleSink} from '../engine/log-multiplexer.js'
import {DockerNotAvailableError} from '../errors.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'imgkiln-test-'))
}

/**
 * Returns a reporter that records emit() calls for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: BuildEvent[]} {
  const events: BuildEvent[] = []
  const reporter: Reporter = {
    emit(event: BuildEvent) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/**
 * Console sink that keeps every chunk in memory.
 * `onChunk` runs after each chunk is stored, before the write completes.
 */
export function memorySink(onChunk?: (chunk: string) => void): {sink: ConsoleSink; chunks: string[]} {
  const chunks: string[] = []
  const sink: ConsoleSink = {
    write(chunk, callback) {
      chunks.push(chunk)
      onChunk?.(chunk)
      callback()
      return true
    }
  }

  return {sink, chunks}
}

export type FakeBuildScript = {
  /** Lines the simulated engine prints. */
  lines?: string[];
  exitCode?: number;
  /** Images reported as present locally. */
  localImages?: string[];
  /** When false, check() fails like a missing Docker CLI. */
  available?: boolean;
  /** After printing its lines, the engine keeps running until killed. */
  hang?: boolean;
}

/**
 * In-process stand-in for the build engine: replays a script instead of
 * spawning a process.
 */
export class FakeExecutor extends BuildExecutor {
  readonly invocations: BuildInvocation[] = []
  readonly inspected: string[] = []
  killed = false

  constructor(private readonly script: FakeBuildScript = {}) {
    super()
  }

  async check(): Promise<void> {
    if (this.script.available === false) {
      throw new DockerNotAvailableError('fake-docker')
    }
  }

  async imageExists(reference: string): Promise<boolean> {
    this.inspected.push(reference)
    return this.script.localImages?.includes(reference) ?? false
  }

  start(invocation: BuildInvocation): BuildProcess {
    this.invocations.push(invocation)
    const {lines = [], exitCode = 0, hang = false} = this.script

    let release = () => {/* replaced below */}
    const killed = new Promise<void>(resolve => {
      release = resolve
    })

    async function * produce(): AsyncGenerator<string> {
      for (const line of lines) {
        yield line
      }

      if (hang) {
        await killed
      }
    }

    return {
      lines: produce(),
      wait: async () => this.killed ? 130 : exitCode,
      kill: () => {
        this.killed = true
        release()
      }
    }
  }
}
