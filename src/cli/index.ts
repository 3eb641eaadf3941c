#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {ImgkilnError, UserInterruptError} from '../errors.js'
import {registerBuildCommand} from './commands/build.js'
import {registerCheckRefCommand} from './commands/check-ref.js'
import {registerStageCommand} from './commands/stage.js'

async function main() {
  const program = new Command()

  program
    .name('imgkiln')
    .description('Stage a declarative build context and build an image from it')
    .version('0.1.0')
    .option('--json', 'Output structured JSON logs')
    .option('--verbose', 'Show every staged entry')

  registerBuildCommand(program)
  registerStageCommand(program)
  registerCheckRefCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof UserInterruptError) {
    console.error(chalk.yellow('Aborted by user (Ctrl-C)'))
  } else if (error instanceof ImgkilnError) {
    console.error(chalk.red(`Error: ${error.message}`))
  } else {
    console.error('Fatal error:', error)
  }

  process.exitCode = error instanceof ImgkilnError ? error.exitCode : 1
}
