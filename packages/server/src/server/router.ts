/**
 * Router
 *
 * Per-request route selection, first match wins:
 *   1. live-reload endpoint (upgrades are taken by the runtime before routing)
 *   2. locale redirect of the site root, when a locale is configured
 *   3. static files from the output directory
 *   4. the configured 404 document
 */

import { Hono } from 'hono'
import { describeError } from '../errors/index.js'
import type { Logger } from '../logging/index.js'
import type { ServingContext } from '../types/index.js'
import { serveAssets, serveNotFoundDocument } from './static-assets.js'

/** The HTTP endpoint for the websocket used to trigger reloads when a file changes. */
export const LIVE_RELOAD_ENDPOINT = '__livereload'
export const LIVE_RELOAD_PATH = `/${LIVE_RELOAD_ENDPOINT}`

export interface RouterOptions {
  logger: Logger
}

/**
 * Absolute target of the root redirect. A bare `/{locale}` would break the
 * relative asset links of localized pages.
 */
export function localeIndexPath(locale: string): string {
  return `/${encodeURIComponent(locale)}/index.html`
}

export function createRouter(context: ServingContext, options: RouterOptions): Hono {
  const app = new Hono()

  app.onError((error, c) => {
    options.logger.error(`Request failed: ${c.req.method} ${c.req.path}`)
    options.logger.error(describeError(error))
    return c.text('Internal Server Error', 500)
  })

  // Registered first so no file in the output directory can shadow it
  app.all(LIVE_RELOAD_PATH, (c) => {
    return c.text('Upgrade Required', 426, { Upgrade: 'websocket' })
  })

  if (context.locale) {
    const target = localeIndexPath(context.locale)
    app.get('/', (c) => c.redirect(target, 302))
  }

  app.get('*', serveAssets({ root: context.outputDir }))

  app.notFound(serveNotFoundDocument(context))

  return app
}
