/**
 * Library exports for programmatic use.
 *
 * The engine stages build contexts, runs the build engine and manages the
 * build logs; the core layer loads build files and orchestrates a build.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import process from 'node:process'
 * import {tmpdir} from 'node:os'
 * import {BuildRunner, ConsoleReporter, DockerCliExecutor, ManifestLoader} from 'imgkiln'
 *
 * const definition = await new ManifestLoader().load('imgkiln.yml')
 * const runner = new BuildRunner(new DockerCliExecutor(), new ConsoleReporter(), {
 *   contextDir: tmpdir(),
 *   logDir: tmpdir(),
 *   executable: 'docker',
 *   buildkit: true,
 *   console: process.stdout
 * })
 *
 * const {exitCode, artifact} = await runner.run(definition, {pull: true})
 * ```
 */

export * from './engine/index.js'
export * from './core/index.js'
export * from './errors.js'
export type {
  TemplateValue,
  TemplateContext,
  ManifestEntry,
  ManifestAction,
  CopyFileEntry,
  CopyDirectoryEntry,
  RenderEntry,
  CreateFileEntry,
  CreateDirectoryEntry,
  KeyValueList,
  BuildDefinition,
  BuildOptions
} from './types.js'
