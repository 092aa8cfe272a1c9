/**
 * Serve Command
 *
 * Builds the book, serves it and rebuilds on every source change, reloading
 * connected browsers after each successful build.
 */

import { resolve } from 'node:path'
import {
  CommandBuilder,
  Supervisor,
  createLogger,
  createSourceWatcher,
  loadBuildSettings,
  type BuildOverrides,
  type LogLevel,
} from '@pagewatch/server'

export interface ServeOptions {
  dir?: string
  destDir?: string
  hostname?: string
  port?: number
  open?: boolean
  language?: string
  logLevel?: LogLevel
}

export async function serveCommand(options: ServeOptions = {}): Promise<void> {
  const logger = createLogger({ level: options.logLevel })
  const root = resolve(process.cwd(), options.dir ?? '.')

  const overrides: BuildOverrides = { destDir: options.destDir, language: options.language }
  const settings = await loadBuildSettings(root, overrides)
  logger.debug(
    settings.configFile ? `Loaded configuration from ${settings.configFile}` : 'No pagewatch.toml found, using defaults'
  )

  const supervisor = new Supervisor({
    settings,
    reloadSettings: () => loadBuildSettings(root, overrides),
    builder: new CommandBuilder(),
    createWatcher: (watched) => createSourceWatcher(watched, logger),
    host: options.hostname ?? 'localhost',
    port: options.port ?? 3000,
    open: options.open ?? false,
    logger,
  })

  await supervisor.run()
}
