import process from 'node:process'
import {resolve} from 'node:path'
import type {Command} from 'commander'
import {BuildRunner} from '../../core/build-runner.js'
import {ManifestLoader} from '../../core/manifest-loader.js'
import {parseKeyValues} from '../../core/utils.js'
import {DockerCliExecutor} from '../../engine/docker-executor.js'
import {loadConfig} from '../config.js'
import {collect, createReporter, getGlobalOptions, resolveBuildFile} from '../utils.js'

type BuildCommandOptions = {
  tag?: string;
  baseImg?: string;
  cache?: boolean;
  pull?: boolean;
  buildArg?: string[];
  label?: string[];
  logDir?: string;
  contextDir?: string;
}

export function registerBuildCommand(program: Command): void {
  program
    .command('build')
    .description('Stage a build context from a build file and build the image')
    .argument('[file]', 'Build file or directory (default: current directory)')
    .option('-t, --tag <image>', 'Tag of the image to build (overrides the build file)')
    .option('-b, --base-img <image>', 'Base image (overrides the build file)')
    .option('-c, --cache', 'Reuse cached layers instead of building with --no-cache')
    .option('-p, --pull', 'Ask the engine to check the registry for a newer base image')
    .option('--build-arg <key=value>', 'Extra build argument (repeatable)', collect)
    .option('--label <key=value>', 'Extra image label (repeatable)', collect)
    .option('--log-dir <dir>', 'Directory for the complete and specific logs')
    .option('--context-dir <dir>', 'Parent directory of the temporary build context')
    .action(async (fileArg: string | undefined, options: BuildCommandOptions, cmd: Command) => {
      const globals = getGlobalOptions(cmd)
      const buildArgs = parseKeyValues(options.buildArg, '--build-arg')
      const labels = parseKeyValues(options.label, '--label')
      const buildFile = await resolveBuildFile(fileArg)
      const config = await loadConfig(process.cwd(), {
        logDir: options.logDir === undefined ? undefined : resolve(options.logDir),
        contextDir: options.contextDir === undefined ? undefined : resolve(options.contextDir)
      })

      const definition = await new ManifestLoader().load(buildFile)
      const runner = new BuildRunner(new DockerCliExecutor(config.executable), createReporter(globals), {
        ...config,
        console: process.stdout
      })

      // Cleanup must run on interrupt: the runner stops the engine and unwinds
      const onSignal = () => {
        runner.abort()
      }

      process.on('SIGINT', onSignal)
      process.on('SIGTERM', onSignal)

      try {
        const outcome = await runner.run(definition, {
          tag: options.tag?.trim(),
          baseImage: options.baseImg?.trim(),
          cache: options.cache,
          pull: options.pull,
          buildArgs,
          labels
        })
        process.exitCode = outcome.exitCode
      } finally {
        process.off('SIGINT', onSignal)
        process.off('SIGTERM', onSignal)
      }
    })
}
