import { describe, it, expect, vi, afterEach } from 'vitest'
import { ConfigurationError } from '@pagewatch/server'
import { createProgram, parsePort, reportFailure, type CommandHandlers } from './program.js'

function fakeHandlers() {
  return {
    serve: vi.fn<CommandHandlers['serve']>(async () => {}),
    build: vi.fn<CommandHandlers['build']>(async () => {}),
  }
}

function parse(handlers: CommandHandlers, args: string[]): Promise<unknown> {
  const program = createProgram(handlers)
  program.exitOverride()
  program.configureOutput({ writeErr: () => {}, writeOut: () => {} })
  for (const command of program.commands) {
    command.exitOverride()
    command.configureOutput({ writeErr: () => {}, writeOut: () => {} })
  }
  return program.parseAsync(['node', 'pagewatch', ...args])
}

describe('pagewatch CLI', () => {
  afterEach(() => {
    vi.unstubAllEnvs()
  })

  it('serves the current directory on localhost:3000 by default', async () => {
    const handlers = fakeHandlers()

    await parse(handlers, ['serve'])

    expect(handlers.serve).toHaveBeenCalledWith({
      dir: '.',
      hostname: 'localhost',
      port: 3000,
      logLevel: 'info',
    })
  })

  it('passes serve options through', async () => {
    const handlers = fakeHandlers()

    await parse(handlers, ['serve', 'docs', '-d', 'out', '-n', '0.0.0.0', '-p', '8080', '-o', '-l', 'fr', '--log-level', 'debug'])

    expect(handlers.serve).toHaveBeenCalledWith({
      dir: 'docs',
      destDir: 'out',
      hostname: '0.0.0.0',
      port: 8080,
      open: true,
      language: 'fr',
      logLevel: 'debug',
    })
  })

  it('takes the log level from PAGEWATCH_LOG', async () => {
    vi.stubEnv('PAGEWATCH_LOG', 'warn')
    const handlers = fakeHandlers()

    await parse(handlers, ['build'])

    expect(handlers.build).toHaveBeenCalledWith({ dir: '.', logLevel: 'warn' })
  })

  it('rejects an unknown log level', async () => {
    const handlers = fakeHandlers()

    await expect(parse(handlers, ['serve', '--log-level', 'loud'])).rejects.toThrow()
    expect(handlers.serve).not.toHaveBeenCalled()
  })

  it('rejects an invalid port', async () => {
    const handlers = fakeHandlers()

    await expect(parse(handlers, ['serve', '-p', 'http'])).rejects.toThrow()
    expect(handlers.serve).not.toHaveBeenCalled()
  })

  it('propagates command failures', async () => {
    const handlers = fakeHandlers()
    handlers.build.mockRejectedValue(new Error('no build command configured'))

    await expect(parse(handlers, ['build', 'docs'])).rejects.toThrow('no build command configured')
  })
})

describe('parsePort', () => {
  it('accepts ports in range', () => {
    expect(parsePort('0')).toBe(0)
    expect(parsePort('65535')).toBe(65535)
  })

  it('rejects anything else', () => {
    expect(() => parsePort('65536')).toThrow('Not a valid port number.')
    expect(() => parsePort('3.5')).toThrow('Not a valid port number.')
  })
})

describe('reportFailure', () => {
  it('prints expected failures without a stack', () => {
    const sink = { error: vi.fn() }

    reportFailure(new ConfigurationError('Invalid TOML in pagewatch.toml at line 2, column 1'), sink)

    expect(sink.error.mock.calls).toEqual([['❌ Error: Invalid TOML in pagewatch.toml at line 2, column 1']])
  })

  it('adds the stack for unexpected failures', () => {
    const sink = { error: vi.fn() }
    const bug = new TypeError('settings is undefined')

    reportFailure(bug, sink)

    expect(sink.error.mock.calls).toEqual([['❌ Error: settings is undefined'], [bug.stack]])
  })
})
