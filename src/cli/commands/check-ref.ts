import process from 'node:process'
import chalk from 'chalk'
import type {Command} from 'commander'
import {isValidImageReference} from '../../core/image-reference.js'
import {getGlobalOptions} from '../utils.js'

export function registerCheckRefCommand(program: Command): void {
  program
    .command('check-ref')
    .description('Check image references against the registry naming rules')
    .argument('<reference...>', 'Image references (e.g. ubuntu:22.04)')
    .action((references: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const results = references.map(reference => ({reference, valid: isValidImageReference(reference)}))

      if (json) {
        console.log(JSON.stringify(results))
      } else {
        for (const {reference, valid} of results) {
          console.log(valid ? `${chalk.green('✓')} ${reference}` : `${chalk.red('✗')} ${reference}`)
        }
      }

      if (results.some(result => !result.valid)) {
        process.exitCode = 1
      }
    })
}
