import type {BuildInvocation} from './build-invocation.js'

/**
 * A running build, as seen by the invoker.
 */
export type BuildProcess = {
  /**
   * Combined stdout and stderr, one line at a time, in the order the engine
   * produced them. Iterating it pulls the next line only when the previous
   * one has been handled.
   */
  lines: AsyncIterable<string>;
  /**
   * Resolves with the engine's exit code once the process has terminated.
   * @throws {BuildEngineError} If the engine could not be started
   */
  wait(): Promise<number>;
  /** Asks the engine to stop (user interrupt). */
  kill(): void;
}

/**
 * Abstract interface for image-build engines.
 *
 * Implementations:
 * - `DockerCliExecutor`: Uses the Docker CLI
 *
 * The executor is responsible for:
 * - Checking that the engine is installed
 * - Answering whether an image exists locally
 * - Starting one build per invocation and exposing its output as lines
 */
export abstract class BuildExecutor {
  /**
   * Verifies that the engine is available and functional.
   * @throws {DockerNotAvailableError} If the engine is not installed or not accessible
   */
  abstract check(): Promise<void>

  /**
   * Whether a local copy of the image exists. Never throws: a failed
   * query counts as "no local copy".
   */
  abstract imageExists(reference: string): Promise<boolean>

  /**
   * Starts a build. The caller must consume `lines` and then call `wait()`.
   */
  abstract start(invocation: BuildInvocation): BuildProcess
}
