/**
 * Serving Context
 *
 * Everything the serving line needs, derived once at startup from the
 * command line and the loaded configuration.
 */

import { lookup } from 'node:dns/promises'
import path from 'node:path'
import { AddressResolutionError } from '../errors/index.js'
import { LIVE_RELOAD_ENDPOINT } from '../server/router.js'
import type { ResolvedAddress, ServingContext } from '../types/index.js'

export const DEFAULT_INPUT_404 = '404.md'

/**
 * Resolves a host name to candidate addresses, first preferred
 */
export type HostResolver = (host: string) => Promise<Array<{ address: string; family: number }>>

export interface ServingContextOptions {
  host: string
  port: number
  outputDir: string
  locale: string | null
  input404: string | null
  resolver?: HostResolver
}

export const lookupHost: HostResolver = (host) => lookup(host, { all: true })

export function servingUrlFor(host: string, port: number): string {
  return `http://${host}:${port}`
}

export function liveReloadUrlFor(host: string, port: number): string {
  return `ws://${host}:${port}/${LIVE_RELOAD_ENDPOINT}`
}

/**
 * Output file of the 404 page: the configured source file with an .html
 * extension.
 */
export function notFoundOutputFile(input404: string | null): string {
  const source = input404 ?? DEFAULT_INPUT_404
  const parsed = path.parse(source)
  return path.join(parsed.dir, `${parsed.name}.html`)
}

/**
 * A language picked on the command line is built at the output root, so no
 * locale prefix applies. Otherwise the configured default language does.
 */
export function resolveLocale(requestedLanguage: string | null, defaultLanguage: string | null): string | null {
  if (requestedLanguage) return null
  return defaultLanguage || null
}

export async function deriveServingContext(options: ServingContextOptions): Promise<ServingContext> {
  const { host, port } = options
  const resolver = options.resolver ?? lookupHost
  const target = `${host}:${port}`

  let candidates: Array<{ address: string; family: number }>
  try {
    candidates = await resolver(host)
  } catch (error) {
    throw new AddressResolutionError(target, { cause: error })
  }

  const first = candidates[0]
  if (!first) {
    throw new AddressResolutionError(target)
  }

  const address: ResolvedAddress = { address: first.address, family: first.family, port }

  return Object.freeze({
    address: Object.freeze(address),
    host,
    port,
    outputDir: path.resolve(options.outputDir),
    locale: options.locale,
    notFoundPath: notFoundOutputFile(options.input404),
    servingUrl: servingUrlFor(host, port),
    liveReloadUrl: liveReloadUrlFor(host, port),
  })
}
