/**
 * Build Command
 *
 * Runs the configured build once, without live reload.
 */

import { resolve } from 'node:path'
import { CommandBuilder, createLogger, loadBuildSettings, type LogLevel } from '@pagewatch/server'

export interface BuildOptions {
  dir?: string
  destDir?: string
  language?: string
  logLevel?: LogLevel
}

export async function buildCommand(options: BuildOptions = {}): Promise<void> {
  const logger = createLogger({ level: options.logLevel })
  const root = resolve(process.cwd(), options.dir ?? '.')

  const settings = await loadBuildSettings(root, {
    destDir: options.destDir,
    language: options.language,
  })

  logger.info('Building book...')
  const startTime = Date.now()
  await new CommandBuilder().build(settings)
  logger.info(`✅ Book built in ${Date.now() - startTime}ms: ${settings.buildDir}`)
}
