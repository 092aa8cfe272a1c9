/**
 * Base Error Classes
 *
 * Error hierarchy for startup, build and reload-bus failures.
 */

export interface ErrorContext {
  [key: string]: unknown
}

/**
 * Base application error class
 */
export abstract class AppError extends Error {
  public readonly code: string
  public readonly isOperational: boolean
  public readonly context?: ErrorContext

  constructor(
    message: string,
    code: string,
    isOperational: boolean = true,
    context?: ErrorContext,
    options?: ErrorOptions
  ) {
    super(message, options)
    Object.setPrototypeOf(this, new.target.prototype)

    this.name = this.constructor.name
    this.code = code
    this.isOperational = isOperational
    this.context = context

    Error.captureStackTrace(this, new.target)
  }
}

/**
 * Invalid or unreadable pagewatch.toml, or a bad option value
 */
export class ConfigurationError extends AppError {
  constructor(message: string, context?: ErrorContext, options?: ErrorOptions) {
    super(message, 'CONFIGURATION_ERROR', true, context, options)
  }
}

/**
 * The bind target did not resolve to any network address
 */
export class AddressResolutionError extends AppError {
  constructor(address: string, options?: ErrorOptions) {
    super(`no address found for ${address}`, 'ADDRESS_RESOLUTION_ERROR', true, { address }, options)
  }
}

/**
 * The build collaborator failed
 */
export class BuildError extends AppError {
  constructor(message: string, context?: ErrorContext, options?: ErrorOptions) {
    super(message, 'BUILD_ERROR', true, context, options)
  }
}

/**
 * Misuse of a reload bus subscription
 */
export class ReloadBusError extends AppError {
  constructor(message: string, context?: ErrorContext) {
    super(message, 'RELOAD_BUS_ERROR', false, context)
  }
}

/**
 * Operational errors are expected failures (bad config, failed build,
 * unresolvable host); their message is enough. Anything else is a bug and
 * gets its stack reported.
 */
export function isOperationalError(error: unknown): boolean {
  if (error instanceof AppError) {
    return error.isOperational
  }
  return false
}

/**
 * Render an error and its `cause` chain, one line per link
 */
export function describeError(error: unknown): string {
  const lines: string[] = []
  let current: unknown = error
  let depth = 0

  while (current !== undefined && current !== null && depth < 10) {
    const message = current instanceof Error ? current.message : String(current)
    lines.push(depth === 0 ? `Error: ${message}` : `\tCaused By: ${message}`)
    current = current instanceof Error ? current.cause : undefined
    depth++
  }

  return lines.join('\n')
}

/**
 * Stack trace worth reporting for an error, or null for operational errors
 */
export function reportableStack(error: unknown): string | null {
  if (isOperationalError(error) || !(error instanceof Error)) return null
  return error.stack ?? null
}
