import type {BuildInvocation} from './build-invocation.js'
import type {BuildExecutor, BuildProcess} from './executor.js'
import type {LogArtifact} from './log-artifact.js'
import type {LogMultiplexer} from './log-multiplexer.js'

export type InvocationResult = {
  /** Engine exit code, authoritative for the build outcome. */
  exitCode: number;
  /** Number of output lines captured. */
  lines: number;
  startedAt: Date;
  finishedAt: Date;
}

/**
 * Runs one build: starts the engine, streams its output through the
 * multiplexer, then waits for the exit code. No retries.
 */
export class BuildInvoker {
  private current?: BuildProcess

  constructor(
    private readonly executor: BuildExecutor,
    private readonly multiplexer: LogMultiplexer
  ) {}

  get running(): boolean {
    return this.current !== undefined
  }

  async invoke(invocation: BuildInvocation, artifact: LogArtifact): Promise<InvocationResult> {
    const startedAt = new Date()
    const proc = this.executor.start(invocation)
    this.current = proc

    try {
      let lines = 0
      let streamError: unknown
      try {
        lines = await this.multiplexer.consume(proc.lines, artifact.completeLogPath)
      } catch (error) {
        streamError = error
      }

      // Waits even when the stream failed, so the child never outlives the call
      const exitCode = await proc.wait()
      if (streamError !== undefined) {
        throw streamError
      }

      return {exitCode, lines, startedAt, finishedAt: new Date()}
    } finally {
      this.current = undefined
    }
  }

  /** Stops the running build, if any. */
  kill(): void {
    this.current?.kill()
  }
}
