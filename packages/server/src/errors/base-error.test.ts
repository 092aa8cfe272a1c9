import { describe, it, expect } from 'vitest'
import {
  AddressResolutionError,
  AppError,
  BuildError,
  ConfigurationError,
  ReloadBusError,
  describeError,
  isOperationalError,
  reportableStack,
} from './base-error.js'

describe('base-error', () => {
  it('keeps the subclass identity', () => {
    const error = new BuildError('failed', { command: 'make html' })

    expect(error).toBeInstanceOf(AppError)
    expect(error).toBeInstanceOf(Error)
    expect(error.name).toBe('BuildError')
    expect(error.context).toEqual({ command: 'make html' })
  })

  it('uses expected codes for the startup errors', () => {
    expect(new ConfigurationError('bad').code).toBe('CONFIGURATION_ERROR')
    expect(new BuildError('failed').code).toBe('BUILD_ERROR')
    expect(new ReloadBusError('busy').code).toBe('RELOAD_BUS_ERROR')

    const resolution = new AddressResolutionError('nowhere.invalid:3000')
    expect(resolution.message).toBe('no address found for nowhere.invalid:3000')
    expect(resolution.context).toEqual({ address: 'nowhere.invalid:3000' })
  })

  it('detects operational errors', () => {
    expect(isOperationalError(new BuildError('x'))).toBe(true)
    expect(isOperationalError(new ReloadBusError('x'))).toBe(false)
    expect(isOperationalError(new Error('plain'))).toBe(false)
  })

  it('reports stacks only for non-operational errors', () => {
    const bug = new TypeError('undefined is not a function')

    expect(reportableStack(new ConfigurationError('bad'))).toBeNull()
    expect(reportableStack(bug)).toBe(bug.stack)
    expect(reportableStack('plain string')).toBeNull()
  })

  it('describes the cause chain', () => {
    const root = new Error('exit code 2')
    const error = new BuildError('Unable to build', {}, { cause: root })

    expect(describeError(error)).toBe('Error: Unable to build\n\tCaused By: exit code 2')
    expect(describeError('plain string')).toBe('Error: plain string')
  })
})
