import process from 'node:process'
import {execa} from 'execa'
import {BuildEngineError, DockerNotAvailableError} from '../errors.js'
import {buildCommandArgs, type BuildInvocation} from './build-invocation.js'
import {BuildExecutor, type BuildProcess} from './executor.js'

/**
 * Build a minimal environment for the Docker CLI process.
 * Only PATH, HOME, and DOCKER_* are kept, so that host secrets
 * (API keys, tokens, credentials) never reach the build engine.
 */
export function dockerCliEnv(source: NodeJS.ProcessEnv = process.env): Record<string, string> {
  const env: Record<string, string> = {}
  for (const [key, value] of Object.entries(source)) {
    if (value !== undefined && (key === 'PATH' || key === 'HOME' || key.startsWith('DOCKER_'))) {
      env[key] = value
    }
  }

  return env
}

const mergedOutputScript = 'exec "$0" "$@" 2>&1'

export class DockerCliExecutor extends BuildExecutor {
  private readonly env = dockerCliEnv()

  constructor(private readonly executable = 'docker') {
    super()
  }

  async check(): Promise<void> {
    try {
      await execa(this.executable, ['--version'], {env: this.env, extendEnv: false})
    } catch (error) {
      throw new DockerNotAvailableError(this.executable, {cause: error})
    }
  }

  async imageExists(reference: string): Promise<boolean> {
    try {
      const result = await execa(this.executable, ['image', 'inspect', reference], {
        env: this.env,
        extendEnv: false,
        reject: false
      })
      return result.exitCode === 0
    } catch {
      return false
    }
  }

  start(invocation: BuildInvocation): BuildProcess {
    const env = {...this.env}
    if (invocation.buildkit) {
      env.DOCKER_BUILDKIT = '1'
    } else {
      delete env.DOCKER_BUILDKIT
    }

    // Both streams share one descriptor, so lines keep the order the engine wrote them in
    const proc = execa('sh', ['-c', mergedOutputScript, invocation.executablePath, ...buildCommandArgs(invocation)], {
      env,
      extendEnv: false,
      reject: false,
      stdin: 'ignore'
    })

    return {
      lines: proc.iterable(),
      async wait() {
        const result = await proc
        if (result.exitCode !== undefined) {
          return result.exitCode
        }

        if (result.isTerminated) {
          // Conventional shell code for a signal: 128 + signal number
          return result.signal === 'SIGINT' ? 130 : 143
        }

        throw new BuildEngineError('BUILD_ENGINE_FAILED', `Failed to run '${invocation.executablePath}'`, {cause: result})
      },
      kill() {
        proc.kill('SIGINT')
      }
    }
  }
}
