/**
 * Command Builder
 *
 * Default build collaborator: runs the configured build command in a shell
 * from the project root. Serve-time settings reach the command through
 * PAGEWATCH_* environment variables.
 */

import { spawn } from 'node:child_process'
import { BuildError } from '../errors/index.js'
import { getReloadScript } from '../server/client-reload.js'
import type { BuildSettings, DocumentBuilder } from '../types/index.js'

const STDERR_TAIL_LINES = 20

export interface CommandBuilderOptions {
  /** Where to echo the command's stderr; defaults to process.stderr */
  stderr?: NodeJS.WritableStream
  /** Base environment; defaults to process.env */
  env?: NodeJS.ProcessEnv
}

export function buildEnvironment(settings: BuildSettings, base: NodeJS.ProcessEnv): NodeJS.ProcessEnv {
  const env: NodeJS.ProcessEnv = {
    ...base,
    PAGEWATCH_ROOT: settings.root,
    PAGEWATCH_BUILD_DIR: settings.buildDir,
  }

  if (settings.language) env.PAGEWATCH_LANGUAGE = settings.language
  if (settings.input404) env.PAGEWATCH_INPUT_404 = settings.input404
  if (settings.siteUrl) env.PAGEWATCH_SITE_URL = settings.siteUrl
  if (settings.liveReloadUrl) {
    env.PAGEWATCH_LIVERELOAD_URL = settings.liveReloadUrl
    env.PAGEWATCH_LIVERELOAD_SCRIPT = getReloadScript(settings.liveReloadUrl)
  }

  return env
}

export class CommandBuilder implements DocumentBuilder {
  constructor(private readonly options: CommandBuilderOptions = {}) {}

  async build(settings: BuildSettings): Promise<void> {
    const command = settings.command
    if (!command) {
      throw new BuildError('no build command configured; set build.command in pagewatch.toml')
    }

    const echo = this.options.stderr ?? process.stderr
    const env = buildEnvironment(settings, this.options.env ?? process.env)

    await new Promise<void>((resolve, reject) => {
      const stderr = new LineTail(STDERR_TAIL_LINES)

      const child = spawn(command, {
        cwd: settings.root,
        env,
        shell: true,
        stdio: ['ignore', 'inherit', 'pipe'],
      })

      child.stderr?.on('data', (chunk: Buffer) => {
        const text = chunk.toString()
        stderr.push(text)
        echo.write(text)
      })

      child.on('error', (error) => {
        reject(new BuildError(`Unable to run build command: ${command}`, { command }, { cause: error }))
      })

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve()
          return
        }

        const status = signal ? `signal ${signal}` : `code ${code}`
        reject(
          new BuildError(`build command exited with ${status}: ${command}`, {
            command,
            exitCode: code,
            signal,
            stderr: stderr.toString(),
          })
        )
      })
    })
  }
}

const MAX_LINE_LENGTH = 4096

/**
 * Last `limit` lines of a stream of text chunks
 */
export class LineTail {
  private lines: string[] = []
  private partial = ''

  constructor(private readonly limit: number) {}

  push(text: string): void {
    const parts = (this.partial + text).split('\n')
    this.partial = (parts.pop() ?? '').slice(-MAX_LINE_LENGTH)

    for (const line of parts) {
      this.lines.push(line.slice(-MAX_LINE_LENGTH))
    }
    if (this.lines.length > this.limit) {
      this.lines.splice(0, this.lines.length - this.limit)
    }
  }

  toString(): string {
    const lines = this.partial ? [...this.lines, this.partial] : this.lines
    return lines.join('\n').trimEnd().split('\n').slice(-this.limit).join('\n')
  }
}
