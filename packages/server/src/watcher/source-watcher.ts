/**
 * Source Watcher
 *
 * Default change watcher: chokidar on the source directories, with events
 * batched over a short debounce window. Batches are delivered one at a time;
 * changes that arrive while a handler runs are collected into the next batch.
 */

import path from 'node:path'
import { watch, type FSWatcher } from 'chokidar'
import { describeError } from '../errors/index.js'
import type { Logger } from '../logging/index.js'
import type { BuildSettings, ChangeHandler, ChangeWatcher } from '../types/index.js'

export const DEFAULT_DEBOUNCE_MS = 250

const ALWAYS_IGNORED = ['**/node_modules/**', '**/.git/**']

export interface SourceWatcherOptions {
  paths: readonly string[]
  ignored?: readonly string[]
  debounceMs?: number
  logger: Logger
}

export class SourceWatcher implements ChangeWatcher {
  private watcher: FSWatcher | null = null
  private pending = new Set<string>()
  private timer: NodeJS.Timeout | null = null
  private running: Promise<void> | null = null
  private closed = false

  constructor(private readonly options: SourceWatcherOptions) {}

  watch(root: string, onChange: ChangeHandler): void {
    const { paths, logger } = this.options
    logger.info(`👀 Watching for changes: ${paths.map((p) => path.relative(root, p) || '.').join(', ')}`)

    this.watcher = watch([...paths], {
      persistent: true,
      ignoreInitial: true,
      ignored: [...ALWAYS_IGNORED, ...(this.options.ignored ?? [])],
      awaitWriteFinish: {
        stabilityThreshold: 100,
        pollInterval: 100,
      },
    })

    this.watcher.on('all', (_event, changedPath) => {
      this.record(root, path.resolve(root, changedPath), onChange)
    })

    this.watcher.on('error', (error) => {
      logger.error(`Watcher error: ${describeError(error)}`)
    })
  }

  async close(): Promise<void> {
    this.closed = true
    if (this.timer) {
      clearTimeout(this.timer)
      this.timer = null
    }
    this.pending.clear()

    if (this.watcher) {
      await this.watcher.close()
      this.watcher = null
      this.options.logger.debug('Stopped watching sources')
    }
  }

  private record(root: string, changedPath: string, onChange: ChangeHandler): void {
    if (this.closed) return

    this.pending.add(changedPath)
    if (this.timer) clearTimeout(this.timer)
    this.timer = setTimeout(() => {
      this.timer = null
      this.flush(root, onChange)
    }, this.options.debounceMs ?? DEFAULT_DEBOUNCE_MS)
  }

  private flush(root: string, onChange: ChangeHandler): void {
    if (this.closed || this.running || this.pending.size === 0) return

    const paths = [...this.pending].sort()
    this.pending.clear()

    this.running = Promise.resolve()
      .then(() => onChange({ root, paths }))
      .then(
        () => undefined,
        (error: unknown) => {
          this.options.logger.error(`Change handler failed: ${describeError(error)}`)
        }
      )
      .finally(() => {
        this.running = null
        if (!this.timer) this.flush(root, onChange)
      })
  }
}

/**
 * Watch the configured source directories and the config file, skipping the
 * build output so a rebuild never re-triggers itself.
 */
export function createSourceWatcher(settings: BuildSettings, logger: Logger, debounceMs?: number): SourceWatcher {
  const paths = settings.configFile ? [...settings.sourceDirs, settings.configFile] : [...settings.sourceDirs]

  return new SourceWatcher({
    paths,
    ignored: [settings.buildDir, path.join(settings.buildDir, '**'), ...settings.ignore],
    debounceMs,
    logger,
  })
}
