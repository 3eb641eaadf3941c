import {mkdir} from 'node:fs/promises'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {Manifest} from '../../core/manifest.js'
import {ManifestLoader} from '../../core/manifest-loader.js'
import {ContextStager} from '../../engine/context-stager.js'
import {createReporter, getGlobalOptions, resolveBuildFile} from '../utils.js'

export function registerStageCommand(program: Command): void {
  program
    .command('stage')
    .description('Stage a build context into a directory without building')
    .argument('<dir>', 'Target directory (created if missing, must be empty)')
    .argument('[file]', 'Build file or directory (default: current directory)')
    .action(async (dir: string, fileArg: string | undefined, _options: Record<string, unknown>, cmd: Command) => {
      const globals = getGlobalOptions(cmd)
      const reporter = createReporter(globals)
      const definition = await new ManifestLoader().load(await resolveBuildFile(fileArg))
      const target = resolve(dir)
      await mkdir(target, {recursive: true})

      const staged = await new ContextStager().stage(Manifest.from(definition.entries), target, (destination, entry, path) => {
        reporter.emit({event: 'ENTRY_STAGED', destination, action: entry.action, path})
      })

      if (!globals.json) {
        console.log(chalk.green(`Staged ${staged.length} entr${staged.length === 1 ? 'y' : 'ies'} into ${target}`))
      }
    })
}
