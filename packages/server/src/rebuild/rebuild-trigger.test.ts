import { describe, it, expect, vi } from 'vitest'
import { RebuildTrigger } from './rebuild-trigger.js'
import { ReloadBus } from '../bus/index.js'
import { BuildError, ConfigurationError } from '../errors/index.js'
import type { Logger } from '../logging/index.js'
import type { BuildSettings, DocumentBuilder } from '../types/index.js'

const settings: BuildSettings = Object.freeze({
  root: '/work/book',
  configFile: null,
  command: 'make docs',
  buildDir: '/work/book/book',
  sourceDirs: ['/work/book/src'],
  ignore: [],
  language: null,
  defaultLanguage: null,
  input404: null,
  siteUrl: '/docs/',
  liveReloadUrl: null,
})

const LIVE_RELOAD_URL = 'ws://localhost:3000/__livereload'

function fakeLogger(): Logger {
  return { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() }
}

function setup(builder: DocumentBuilder) {
  const bus = new ReloadBus()
  const logger = fakeLogger()
  const trigger = new RebuildTrigger({ builder, settings, liveReloadUrl: LIVE_RELOAD_URL, bus, logger })
  return { bus, logger, trigger }
}

describe('RebuildTrigger', () => {
  it('rebuilds with the live-reload endpoint applied and publishes a reload', async () => {
    const build = vi.fn(async (_settings: BuildSettings) => {})
    const { bus, logger, trigger } = setup({ build })
    const subscription = bus.subscribe()

    const outcome = await trigger.handleChanges({
      root: '/work/book',
      paths: ['/work/book/src/intro.md', '/work/book/src/SUMMARY.md'],
    })

    expect(outcome).toMatchObject({ status: 'rebuilt', notified: 1 })
    expect(build).toHaveBeenCalledTimes(1)
    expect(build.mock.calls[0][0]).toMatchObject({
      liveReloadUrl: LIVE_RELOAD_URL,
      siteUrl: '/',
      buildDir: '/work/book/book',
    })
    expect(logger.info).toHaveBeenCalledWith('Files changed: src/intro.md, src/SUMMARY.md')
    await expect(subscription.receive()).resolves.toEqual({ kind: 'message', message: 'reload' })
  })

  it('re-applies the endpoint on every rebuild', async () => {
    const seen: Array<string | null> = []
    const { trigger } = setup({
      build: async (s) => {
        seen.push(s.liveReloadUrl)
      },
    })

    await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/a.md'] })
    await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/b.md'] })

    expect(seen).toEqual([LIVE_RELOAD_URL, LIVE_RELOAD_URL])
  })

  it('publishes nothing when the build fails', async () => {
    const failure = new BuildError('build command exited with code 1')
    const { bus, logger, trigger } = setup({
      build: async () => {
        throw failure
      },
    })
    const subscription = bus.subscribe()
    let received = false
    void subscription.receive().then((result) => {
      received = result.kind !== 'closed'
    })

    const outcome = await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/a.md'] })
    await new Promise((resolve) => setImmediate(resolve))

    expect(outcome).toEqual({ status: 'failed', error: failure })
    expect(received).toBe(false)
    expect(logger.error).toHaveBeenCalledWith('Unable to rebuild the book')
    expect(logger.error).toHaveBeenCalledWith('Error: build command exited with code 1')

    subscription.close()
  })

  it('lets a later successful rebuild release a connection that waited through a failure', async () => {
    let fail = true
    const { bus, trigger } = setup({
      build: async () => {
        if (fail) throw new BuildError('broken edit')
      },
    })
    const subscription = bus.subscribe()
    const pending = subscription.receive()

    await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/a.md'] })
    fail = false
    await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/a.md'] })

    await expect(pending).resolves.toEqual({ kind: 'message', message: 'reload' })
  })

  it('publishes with no connected browsers without failing', async () => {
    const { trigger } = setup({ build: async () => {} })

    const outcome = await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/src/a.md'] })

    expect(outcome).toMatchObject({ status: 'rebuilt', notified: 0 })
  })

  it('builds with freshly loaded settings when a loader is given', async () => {
    const build = vi.fn(async (_settings: BuildSettings) => {})
    const bus = new ReloadBus()
    const reloadSettings = vi.fn(async () => Object.freeze({ ...settings, command: 'make site' }))
    const trigger = new RebuildTrigger({
      builder: { build },
      settings,
      reloadSettings,
      liveReloadUrl: LIVE_RELOAD_URL,
      bus,
      logger: fakeLogger(),
    })

    await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/pagewatch.toml'] })

    expect(reloadSettings).toHaveBeenCalledTimes(1)
    expect(build.mock.calls[0][0]).toMatchObject({
      command: 'make site',
      liveReloadUrl: LIVE_RELOAD_URL,
      siteUrl: '/',
    })
  })

  it('treats a broken configuration as a failed rebuild', async () => {
    const build = vi.fn(async (_settings: BuildSettings) => {})
    const bus = new ReloadBus()
    const logger = fakeLogger()
    const failure = new ConfigurationError('Invalid TOML in pagewatch.toml at line 1, column 7')
    const trigger = new RebuildTrigger({
      builder: { build },
      settings,
      reloadSettings: async () => {
        throw failure
      },
      liveReloadUrl: LIVE_RELOAD_URL,
      bus,
      logger,
    })
    const subscription = bus.subscribe()
    let received = false
    void subscription.receive().then((result) => {
      received = result.kind !== 'closed'
    })

    const outcome = await trigger.handleChanges({ root: '/work/book', paths: ['/work/book/pagewatch.toml'] })
    await new Promise((resolve) => setImmediate(resolve))

    expect(outcome).toEqual({ status: 'failed', error: failure })
    expect(build).not.toHaveBeenCalled()
    expect(received).toBe(false)
    expect(logger.error).toHaveBeenCalledWith('Unable to rebuild the book')
    expect(logger.error).toHaveBeenCalledWith('Error: Invalid TOML in pagewatch.toml at line 1, column 7')

    subscription.close()
  })
})
