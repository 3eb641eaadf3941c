import {access, mkdir, mkdtemp, readdir, rm} from 'node:fs/promises'
import {join} from 'node:path'
import {CleanupError, StagingError} from '../errors.js'

/**
 * Exclusively owned temporary directory handed to the build engine.
 *
 * ## Lifecycle
 *
 * 1. `create()` makes a fresh `context_XXXXXX` directory under the parent
 * 2. The context stager writes the manifest entries into it
 * 3. The build engine reads it (never writes)
 * 4. `dispose()` removes it recursively, on every exit path
 *
 * Prefer `withBuildContext()`, which ties the release to a scope.
 *
 * @example
 * ```typescript
 * const outcome = await withBuildContext(tmpdir(), async context => {
 *   await stager.stage(manifest, context.path)
 *   return invoker.invoke(invocation, artifact)
 * })
 * ```
 */
export class BuildContext {
  /**
   * Creates a new, empty context directory.
   * @param parentDir - Directory under which the context is created (created if missing)
   */
  static async create(parentDir: string): Promise<BuildContext> {
    try {
      await mkdir(parentDir, {recursive: true})
      const path = await mkdtemp(join(parentDir, 'context_'))
      return new BuildContext(path)
    } catch (error) {
      throw new StagingError(parentDir, `Failed to create build context under ${parentDir}`, 'CONTEXT_CREATE_FAILED', {cause: error})
    }
  }

  private disposed = false

  private constructor(readonly path: string) {}

  get isDisposed(): boolean {
    return this.disposed
  }

  /**
   * Lists the top-level names currently in the context, sorted.
   */
  async list(): Promise<string[]> {
    const entries = await readdir(this.path)
    return entries.sort()
  }

  async exists(): Promise<boolean> {
    try {
      await access(this.path)
      return true
    } catch {
      return false
    }
  }

  /**
   * Removes the context directory and everything in it.
   * Calling it again is a no-op.
   * @throws {CleanupError} If the directory could not be removed
   */
  async dispose(): Promise<void> {
    if (this.disposed) {
      return
    }

    try {
      await rm(this.path, {recursive: true, force: true})
      this.disposed = true
    } catch (error) {
      throw new CleanupError(this.path, {cause: error})
    }
  }
}

export type BuildContextHooks = {
  onCreated?: (context: BuildContext) => void;
  onDisposed?: (context: BuildContext) => void;
  /** Receives a cleanup failure that happened while another error was already propagating. */
  onCleanupError?: (error: unknown) => void;
}

/**
 * Runs `fn` with a fresh build context and removes the context afterwards,
 * whether `fn` resolves or rejects.
 *
 * A cleanup failure after a successful `fn` is thrown. After a failed `fn`
 * the original error wins; the cleanup failure goes to `onCleanupError`,
 * or both are thrown together as an AggregateError when no hook is given.
 */
export async function withBuildContext<T>(
  parentDir: string,
  fn: (context: BuildContext) => Promise<T>,
  hooks: BuildContextHooks = {}
): Promise<T> {
  const context = await BuildContext.create(parentDir)
  hooks.onCreated?.(context)

  let result: T
  try {
    result = await fn(context)
  } catch (error) {
    try {
      await context.dispose()
      hooks.onDisposed?.(context)
    } catch (cleanupError) {
      if (!hooks.onCleanupError) {
        throw new AggregateError([error, cleanupError], error instanceof Error ? error.message : String(error))
      }

      hooks.onCleanupError(cleanupError)
    }

    throw error
  }

  await context.dispose()
  hooks.onDisposed?.(context)
  return result
}
