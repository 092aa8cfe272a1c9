/**
 * Fatal Hook
 *
 * Routes failures that nothing else can handle to a single exit path: log
 * "Unable to serve" and terminate with status 1.
 */

import type { EventEmitter } from 'node:events'
import { describeError, reportableStack } from '../errors/index.js'
import type { Logger } from '../logging/index.js'

export interface FatalHookOptions {
  logger: Logger
  exit?: (code: number) => void
  /** Source of uncaughtException / unhandledRejection; defaults to process */
  target?: EventEmitter
}

export interface FatalHook {
  fail(error: unknown): void
  uninstall(): void
}

export function installFatalHook(options: FatalHookOptions): FatalHook {
  const { logger } = options
  const exit = options.exit ?? ((code: number) => process.exit(code))
  const target: EventEmitter = options.target ?? process
  let failed = false

  const fail = (error: unknown) => {
    if (failed) return
    failed = true
    logger.error('Unable to serve')
    logger.error(describeError(error))
    const stack = reportableStack(error)
    if (stack) {
      logger.error(stack)
    }
    exit(1)
  }

  const onException = (error: unknown) => fail(error)
  const onRejection = (reason: unknown) => fail(reason)

  target.on('uncaughtException', onException)
  target.on('unhandledRejection', onRejection)

  return {
    fail,
    uninstall: () => {
      target.off('uncaughtException', onException)
      target.off('unhandledRejection', onRejection)
    },
  }
}
