/**
 * Rebuild Trigger
 *
 * Bridges the change watcher to the reload bus: every batch of changes re-runs
 * the build and, only when it succeeds, publishes a reload. A failed rebuild
 * leaves the last good output on disk and waiting browsers untouched.
 */

import path from 'node:path'
import type { ReloadBus } from '../bus/index.js'
import { applyLiveReload } from '../config/index.js'
import { describeError } from '../errors/index.js'
import type { Logger } from '../logging/index.js'
import type { BuildSettings, ChangeSet, DocumentBuilder } from '../types/index.js'

export interface RebuildTriggerOptions {
  builder: DocumentBuilder
  settings: BuildSettings
  /**
   * Re-reads the build configuration before each rebuild so edits to
   * pagewatch.toml take effect. Without it the startup settings are reused.
   */
  reloadSettings?: () => Promise<BuildSettings>
  liveReloadUrl: string
  bus: ReloadBus
  logger: Logger
}

export type RebuildOutcome =
  | { status: 'rebuilt'; notified: number; durationMs: number }
  | { status: 'failed'; error: unknown }

export class RebuildTrigger {
  constructor(private readonly options: RebuildTriggerOptions) {}

  /**
   * Handle one batch of changes. Never rejects.
   */
  async handleChanges(changes: ChangeSet): Promise<RebuildOutcome> {
    const { builder, liveReloadUrl, bus, logger } = this.options
    const relative = changes.paths.map((p) => path.relative(changes.root, p) || p)

    logger.info(`Files changed: ${relative.join(', ')}`)
    logger.info('Building book...')

    const startTime = Date.now()
    try {
      const settings = await this.currentSettings()
      await builder.build(applyLiveReload(settings, liveReloadUrl))
    } catch (error) {
      logger.error('Unable to rebuild the book')
      logger.error(describeError(error))
      return { status: 'failed', error }
    }

    const durationMs = Date.now() - startTime
    const notified = bus.publish()
    logger.info(`✅ Rebuild complete in ${durationMs}ms`)
    logger.debug(`Reload sent to ${notified} connection(s)`)

    return { status: 'rebuilt', notified, durationMs }
  }

  private currentSettings(): Promise<BuildSettings> {
    const { reloadSettings, settings } = this.options
    return reloadSettings ? reloadSettings() : Promise.resolve(settings)
  }

  /**
   * Adapter for ChangeWatcher.watch
   */
  toChangeHandler(): (changes: ChangeSet) => Promise<RebuildOutcome> {
    return (changes) => this.handleChanges(changes)
  }
}
