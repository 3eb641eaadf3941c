import {mkdir} from 'node:fs/promises'
import {type BuildContext, withBuildContext} from '../engine/build-context.js'
import {createInvocation, formatCommand, resolvePullPolicy, type BuildInvocation} from '../engine/build-invocation.js'
import {BuildInvoker} from '../engine/build-invoker.js'
import {ContextStager} from '../engine/context-stager.js'
import type {BuildExecutor} from '../engine/executor.js'
import {createLogArtifact, type LogArtifact} from '../engine/log-artifact.js'
import {finalizeLogs, type LogFinalization} from '../engine/log-filter.js'
import {LogMultiplexer, type ConsoleSink} from '../engine/log-multiplexer.js'
import {CleanupError, UserInterruptError} from '../errors.js'
import type {BuildDefinition, BuildOptions} from '../types.js'
import {assertImageReference} from './image-reference.js'
import {Manifest} from './manifest.js'
import {logStatusEvent, type Reporter} from './reporter.js'

export type BuildRunnerOptions = {
  /** Parent directory of the temporary build context. */
  contextDir: string;
  /** Directory receiving the complete and specific logs. */
  logDir: string;
  /** Engine executable for the invocation. */
  executable: string;
  buildkit: boolean;
  /** Where engine output is echoed (default: process.stdout). */
  console: ConsoleSink;
  /** Clock for log file names. */
  now?: () => Date;
}

export type BuildOutcome = {
  /** 0 only when the build and the log bookkeeping both succeeded. */
  exitCode: number;
  /** Exit code of the engine itself. */
  engineExitCode: number;
  invocation: BuildInvocation;
  artifact: LogArtifact;
  logs: LogFinalization;
}

/**
 * Runs one image build from a loaded build definition.
 *
 * ## Workflow
 *
 * 1. **Validation**: tag and base image are checked before anything touches the disk
 * 2. **Engine check**: the executor must be available
 * 3. **Context**: a temporary context directory is created and the manifest staged into it
 * 4. **Pull policy**: the base image's local presence decides the notice (and `--pull`)
 * 5. **Invocation**: the engine runs, its output goes to the console and the complete log
 * 6. **Logs**: the specific log is derived, empty logs are removed
 * 7. **Cleanup**: the context directory is removed on every path, including interrupts
 *
 * Only one build runs at a time per runner.
 */
export class BuildRunner {
  private readonly stager = new ContextStager()
  private readonly invoker: BuildInvoker
  private interrupted = false
  private activeContext?: BuildContext

  constructor(
    private readonly executor: BuildExecutor,
    private readonly reporter: Reporter,
    private readonly options: BuildRunnerOptions
  ) {
    this.invoker = new BuildInvoker(executor, new LogMultiplexer(options.console))
  }

  /**
   * @throws {ValidationError} On an invalid tag or base image (nothing is created)
   * @throws {StagingError} When staging fails (the context is still removed)
   * @throws {UserInterruptError} After `abort()`, once cleanup has run
   */
  async run(definition: BuildDefinition, buildOptions: BuildOptions = {}): Promise<BuildOutcome> {
    const tag = buildOptions.tag ?? definition.tag
    const baseImage = buildOptions.baseImage ?? definition.baseImage
    assertImageReference(tag, 'image')
    if (baseImage !== undefined) {
      assertImageReference(baseImage, 'base image')
    }

    const manifest = Manifest.from(definition.entries)
    this.interrupted = false

    await this.executor.check()
    this.reporter.emit({event: 'BUILD_START', tag, baseImage, entries: manifest.size})

    return withBuildContext(this.options.contextDir, async context => {
      await this.stager.stage(manifest, context.path, (destination, entry, path) => {
        this.reporter.emit({event: 'ENTRY_STAGED', destination, action: entry.action, path})
      })
      this.throwIfInterrupted()

      let pull = buildOptions.pull ?? false
      if (baseImage !== undefined) {
        const state = await this.executor.imageExists(baseImage) ? 'LocalCopyPresent' : 'NoLocalCopy'
        const decision = resolvePullPolicy(pull, state)
        pull = decision.pull
        this.reporter.emit({event: 'BASE_IMAGE', image: baseImage, state, notice: decision.notice})
        this.throwIfInterrupted()
      }

      const invocation = createInvocation({
        executablePath: this.options.executable,
        contextDir: context.path,
        buildFile: definition.buildFile,
        buildArgs: {
          ...definition.buildArgs,
          ...buildOptions.buildArgs,
          ...(baseImage === undefined ? {} : {BASE_IMG: baseImage})
        },
        labels: {...definition.labels, ...buildOptions.labels},
        tag,
        useCache: buildOptions.cache ?? false,
        pull,
        buildkit: this.options.buildkit
      })

      return this.invoke(invocation)
    }, {
      onCreated: context => {
        this.activeContext = context
        this.reporter.emit({event: 'CONTEXT_CREATED', path: context.path})
      },
      onDisposed: context => {
        this.activeContext = undefined
        this.reporter.emit({event: 'CONTEXT_REMOVED', path: context.path})
      },
      onCleanupError: error => {
        this.reportCleanupError(error)
      }
    })
  }

  /**
   * Stops the running build. `run()` still finalizes the logs and removes
   * the context, then rejects with UserInterruptError. Calling it again
   * signals the engine again.
   */
  abort(): void {
    if (!this.interrupted) {
      this.interrupted = true
      this.reporter.emit({event: 'INTERRUPTED'})
    }

    this.invoker.kill()
  }

  /** Path of the context directory while a build is in progress. */
  get contextPath(): string | undefined {
    return this.activeContext?.path
  }

  private async invoke(invocation: BuildInvocation): Promise<BuildOutcome> {
    const now = this.options.now ?? (() => new Date())
    await mkdir(this.options.logDir, {recursive: true})
    // From here to the engine start nothing awaits, so a later abort reaches the running process
    this.throwIfInterrupted()
    const artifact = createLogArtifact(this.options.logDir, invocation.tag, now())

    this.reporter.emit({event: 'BUILD_COMMAND', command: formatCommand(invocation)})

    let engineExitCode: number
    try {
      const result = await this.invoker.invoke(invocation, artifact)
      engineExitCode = result.exitCode
      const durationMs = result.finishedAt.getTime() - result.startedAt.getTime()
      if (engineExitCode === 0) {
        this.reporter.emit({event: 'BUILD_FINISHED', tag: invocation.tag, durationMs})
      } else {
        this.reporter.emit({event: 'BUILD_FAILED', tag: invocation.tag, exitCode: engineExitCode, durationMs})
      }
    } catch (error) {
      // Logs captured so far are still finalized before the error propagates
      const reason = error instanceof Error ? error.message : String(error)
      this.reporter.emit({event: 'BUILD_FAILED', tag: invocation.tag, exitCode: 1, reason})
      await this.finalize(artifact, 1)
      throw error
    }

    const logs = await this.finalize(artifact, engineExitCode)
    this.throwIfInterrupted()

    return {exitCode: logs.exitCode, engineExitCode, invocation, artifact, logs}
  }

  private async finalize(artifact: LogArtifact, exitCode: number): Promise<LogFinalization> {
    let logs: LogFinalization
    try {
      logs = await finalizeLogs(artifact, exitCode)
    } catch (error) {
      // The engine's exit code stays the result of a failed build
      const cleanupError = new CleanupError(artifact.completeLogPath, {cause: error}, `Could not finalize '${artifact.completeLogPath}'`)
      this.reportCleanupError(cleanupError)
      return {exitCode: exitCode === 0 ? 1 : exitCode, complete: 'missing', specific: 'missing', matches: 0, errors: [cleanupError]}
    }

    this.reporter.emit({event: logStatusEvent(logs.complete), kind: 'complete', path: artifact.completeLogPath})
    if (logs.complete === 'ready') {
      this.reporter.emit({event: logStatusEvent(logs.specific), kind: 'specific', path: artifact.specificLogPath})
    }

    for (const error of logs.errors) {
      this.reportCleanupError(error)
    }

    return logs
  }

  private reportCleanupError(error: unknown): void {
    const path = error instanceof CleanupError ? error.path : this.activeContext?.path ?? ''
    const cause = error instanceof Error && error.cause instanceof Error ? error.cause : error
    this.reporter.emit({event: 'CLEANUP_FAILED', path, reason: cause instanceof Error ? cause.message : String(cause)})
  }

  private throwIfInterrupted(): void {
    if (this.interrupted) {
      throw new UserInterruptError()
    }
  }
}
