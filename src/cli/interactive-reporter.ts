import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {BuildEvent, LogEvent, Reporter} from '../core/reporter.js'
import {formatDuration} from '../core/utils.js'

/**
 * Reporter with interactive terminal output: colors, and a spinner while
 * the build context is staged. The spinner is stopped before the engine
 * starts writing to the console.
 */
export class InteractiveReporter implements Reporter {
  private spinner?: Ora
  private staged = 0

  constructor(private readonly options: {verbose?: boolean} = {}) {}

  emit(event: BuildEvent): void {
    switch (event.event) {
      case 'BUILD_START': {
        const base = event.baseImage ? ` from ${chalk.cyan(event.baseImage)}` : ''
        console.log(chalk.bold(`\n▶ Building ${chalk.cyan(event.tag)}${base} (${event.entries} context entries)\n`))
        break
      }

      case 'CONTEXT_CREATED': {
        this.staged = 0
        this.spinner = ora({text: `Staging build context ${chalk.gray(event.path)}`, prefixText: ' '}).start()
        break
      }

      case 'ENTRY_STAGED': {
        this.staged++
        if (this.options.verbose) {
          this.printAboveSpinner(chalk.gray(`  + ${event.destination} (${event.action})`))
        }

        if (this.spinner) {
          this.spinner.text = `Staging build context: ${event.destination}`
        }

        break
      }

      case 'BASE_IMAGE': {
        this.stopSpinner(true)
        if (event.notice === 'pull-requested') {
          console.log(`  ${chalk.yellow('↻')} Pull requested: the engine will refresh base image '${event.image}'`)
        } else if (event.notice === 'engine-will-fetch') {
          console.log(`  ${chalk.yellow('↓')} Base image '${event.image}' not found locally. The engine will attempt to pull it`)
        } else {
          console.log(`  ${chalk.green('✓')} Using local base image '${event.image}'`)
        }

        break
      }

      case 'BUILD_COMMAND': {
        this.stopSpinner(true)
        console.log(chalk.gray(`\n$ ${event.command}\n`))
        break
      }

      case 'BUILD_FINISHED': {
        console.log(chalk.bold.green(`\n✓ Build of '${event.tag}' succeeded (${formatDuration(event.durationMs)})\n`))
        break
      }

      case 'BUILD_FAILED': {
        const reason = event.reason ? `: ${event.reason}` : ''
        console.log(chalk.bold.red(`\n✗ Build of '${event.tag}' failed (exit ${event.exitCode})${reason}\n`))
        break
      }

      case 'LOG_READY':
      case 'LOG_REMOVED':
      case 'LOG_MISSING': {
        this.printLogEvent(event)
        break
      }

      case 'CLEANUP_FAILED': {
        this.stopSpinner(false)
        console.error(chalk.red(`  ✗ Could not remove '${event.path}': ${event.reason}`))
        break
      }

      case 'CONTEXT_REMOVED': {
        this.stopSpinner(false)
        if (this.options.verbose) {
          console.log(chalk.gray(`  Removed build context ${event.path}`))
        }

        break
      }

      case 'INTERRUPTED': {
        this.stopSpinner(false)
        console.log(chalk.bold.yellow('\n⚠ Aborted by user (Ctrl-C), cleaning up\n'))
        break
      }
    }
  }

  private printLogEvent(event: LogEvent): void {
    const label = event.kind === 'complete' ? 'Log file' : 'Specific log file'
    switch (event.event) {
      case 'LOG_READY': {
        console.log(`  ${chalk.green('✓')} ${label} '${event.path}' is ready`)
        break
      }

      case 'LOG_REMOVED': {
        const why = event.kind === 'complete' ? 'empty' : 'no matching lines'
        console.log(chalk.gray(`  ${label} removed (${why})`))
        break
      }

      case 'LOG_MISSING': {
        console.log(chalk.yellow(`  ${label} '${event.path}' does not exist`))
        break
      }
    }
  }

  private printAboveSpinner(line: string): void {
    if (this.spinner) {
      this.spinner.clear()
      console.log(line)
      this.spinner.render()
    } else {
      console.log(line)
    }
  }

  private stopSpinner(success: boolean): void {
    if (!this.spinner) {
      return
    }

    const text = `Staged ${this.staged} entr${this.staged === 1 ? 'y' : 'ies'}`
    if (success) {
      this.spinner.succeed(text)
    } else {
      this.spinner.stop()
    }

    this.spinner = undefined
  }
}
