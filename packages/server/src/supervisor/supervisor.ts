/**
 * Supervisor
 *
 * Startup and lifetime of a serve session. Builds once, derives the serving
 * context, then runs the serving line (HTTP + live reload) and the
 * watch-and-rebuild line side by side until a shutdown signal arrives.
 */

import type { EventEmitter } from 'node:events'
import { ReloadBus } from '../bus/index.js'
import { applyLiveReload } from '../config/index.js'
import { BuildError, describeError } from '../errors/index.js'
import type { Logger } from '../logging/index.js'
import { RebuildTrigger } from '../rebuild/index.js'
import { ServerRuntime } from '../server/index.js'
import type { BuildSettings, ChangeWatcher, DocumentBuilder, ServingContext } from '../types/index.js'
import { installFatalHook, type FatalHook } from './fatal-hook.js'
import { openBrowser, type BrowserOpener } from './open-browser.js'
import {
  deriveServingContext,
  liveReloadUrlFor,
  resolveLocale,
  type HostResolver,
} from './serving-context.js'

export const DEFAULT_SHUTDOWN_TIMEOUT_MS = 5000

export interface SupervisorOptions {
  settings: BuildSettings
  /** Re-reads the build configuration before each rebuild */
  reloadSettings?: () => Promise<BuildSettings>
  builder: DocumentBuilder
  createWatcher: (settings: BuildSettings) => ChangeWatcher
  host: string
  port: number
  open?: boolean
  logger: Logger
  resolver?: HostResolver
  opener?: BrowserOpener
  exit?: (code: number) => void
  /** Receives SIGINT/SIGTERM and fatal process events; defaults to process */
  signals?: EventEmitter
  shutdownTimeout?: number
}

export class Supervisor {
  private bus: ReloadBus | null = null
  private runtime: ServerRuntime | null = null
  private watcher: ChangeWatcher | null = null
  private fatalHook: FatalHook | null = null
  private removeSignalHandlers: (() => void) | null = null
  private stopping: Promise<void> | null = null
  private resolveStopped: () => void = () => {}
  private readonly stopped: Promise<void>

  constructor(private readonly options: SupervisorOptions) {
    this.stopped = new Promise((resolve) => {
      this.resolveStopped = resolve
    })
  }

  /**
   * Serve until stopped. Startup failures reject before anything is left
   * running.
   */
  async run(): Promise<void> {
    await this.start()
    await this.stopped
  }

  async start(): Promise<ServingContext> {
    const { settings, builder, host, port, logger } = this.options
    const liveReloadUrl = liveReloadUrlFor(host, port)

    logger.info('Building book...')
    try {
      await builder.build(applyLiveReload(settings, liveReloadUrl))
    } catch (error) {
      if (error instanceof BuildError) throw error
      throw new BuildError('Unable to build the book', { root: settings.root }, { cause: error })
    }

    const context = await deriveServingContext({
      host,
      port,
      outputDir: settings.buildDir,
      locale: resolveLocale(settings.language, settings.defaultLanguage),
      input404: settings.input404,
      resolver: this.options.resolver,
    })

    const bus = new ReloadBus()
    this.bus = bus

    const fatalHook = installFatalHook({ logger, exit: this.options.exit, target: this.options.signals })
    this.fatalHook = fatalHook

    const runtime = new ServerRuntime({ context, bus, logger, onFault: (error) => fatalHook.fail(error) })
    try {
      await runtime.start()
    } catch (error) {
      fatalHook.uninstall()
      bus.close()
      throw error
    }
    this.runtime = runtime
    this.installSignalHandlers()

    logger.info(`Serving on: ${context.servingUrl}`)

    if (this.options.open) {
      const opener = this.options.opener ?? openBrowser
      const opened = await opener(context.servingUrl)
      if (!opened) {
        logger.warn('Error opening web browser')
      }
    }

    const trigger = new RebuildTrigger({
      builder,
      settings,
      reloadSettings: this.options.reloadSettings,
      liveReloadUrl: context.liveReloadUrl,
      bus,
      logger,
    })
    const watcher = this.options.createWatcher(settings)
    watcher.watch(settings.root, trigger.toChangeHandler())
    this.watcher = watcher

    return context
  }

  /**
   * Stop the watcher, release waiting browsers and close the HTTP server.
   */
  stop(): Promise<void> {
    if (!this.stopping) {
      this.stopping = this.teardown()
    }
    return this.stopping
  }

  private async teardown(): Promise<void> {
    this.removeSignalHandlers?.()
    this.removeSignalHandlers = null

    try {
      await this.watcher?.close()
      this.bus?.close()
      await this.runtime?.stop()
    } finally {
      this.fatalHook?.uninstall()
      this.watcher = null
      this.runtime = null
      this.resolveStopped()
    }
  }

  private installSignalHandlers(): void {
    const { logger } = this.options
    const target: EventEmitter = this.options.signals ?? process
    const exit = this.options.exit ?? ((code: number) => process.exit(code))
    const timeout = this.options.shutdownTimeout ?? DEFAULT_SHUTDOWN_TIMEOUT_MS

    const shutdown = (signal: string) => {
      logger.warn(`Received ${signal}, shutting down...`)

      const forceShutdownTimer = setTimeout(() => {
        logger.error('Shutdown timed out, forcing exit')
        exit(1)
      }, timeout)
      forceShutdownTimer.unref()

      this.stop().then(
        () => {
          clearTimeout(forceShutdownTimer)
          exit(0)
        },
        (error: unknown) => {
          clearTimeout(forceShutdownTimer)
          logger.error('Error during shutdown')
          logger.error(describeError(error))
          exit(1)
        }
      )
    }

    const onSigint = () => shutdown('SIGINT')
    const onSigterm = () => shutdown('SIGTERM')
    target.once('SIGINT', onSigint)
    target.once('SIGTERM', onSigterm)

    this.removeSignalHandlers = () => {
      target.off('SIGINT', onSigint)
      target.off('SIGTERM', onSigterm)
    }
  }
}
