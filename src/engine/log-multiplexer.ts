import {open} from 'node:fs/promises'

/**
 * Anything with a Node-style `write(chunk, callback)`, usually process.stdout.
 */
export type ConsoleSink = {
  write(chunk: string, callback: (error?: Error | null) => void): boolean;
}

async function writeToSink(sink: ConsoleSink, chunk: string): Promise<void> {
  return new Promise((resolve, reject) => {
    sink.write(chunk, error => {
      if (error) {
        reject(error)
      } else {
        resolve()
      }
    })
  })
}

/**
 * Duplicates a line stream to the console and to the complete log file.
 *
 * A single reader pulls one line at a time. The console write and the file
 * append for a line both complete before the next line is read, so the
 * file holds the lines in the order the console showed them.
 */
export class LogMultiplexer {
  constructor(private readonly console: ConsoleSink) {}

  /**
   * @param lines - Lines without their trailing newline
   * @param logPath - Complete log, created (truncated) before the first line is read
   * @returns Number of lines written
   */
  async consume(lines: AsyncIterable<string>, logPath: string): Promise<number> {
    const log = await open(logPath, 'w')
    let count = 0
    try {
      for await (const line of lines) {
        const chunk = `${line}\n`
        await writeToSink(this.console, chunk)
        await log.appendFile(chunk, 'utf8')
        count++
      }

      await log.sync()
    } finally {
      await log.close()
    }

    return count
  }
}
