/**
 * Static Assets
 *
 * Serves the build output verbatim with conditional-request support. Misses
 * fall through to the next handler so the 404 fallback can answer.
 */

import type { Context, MiddlewareHandler, NotFoundHandler } from 'hono'
import { getMimeType } from 'hono/utils/mime'
import { readFile, stat } from 'node:fs/promises'
import type { Stats } from 'node:fs'
import path from 'node:path'
import type { ServingContext } from '../types/index.js'

const DEFAULT_CONTENT_TYPE = 'application/octet-stream'

/** stat() failures that mean "nothing to serve here" */
const UNSERVABLE_PATH_CODES = ['ENOENT', 'ENOTDIR', 'ENAMETOOLONG', 'EACCES', 'EISDIR']

export interface StaticAssetsOptions {
  root: string
  index?: string
}

export function serveAssets(options: StaticAssetsOptions): MiddlewareHandler {
  const root = path.resolve(options.root)
  const index = options.index ?? 'index.html'

  return async (c, next) => {
    const url = new URL(c.req.url)
    const pathname = decodePathname(url.pathname)
    if (pathname === null) {
      return next()
    }

    let filePath = path.join(root, pathname)
    // Prevent path traversal outside the output directory
    if (filePath !== root && !filePath.startsWith(root + path.sep)) {
      return next()
    }

    let stats = await statOrNull(filePath)
    if (stats?.isDirectory()) {
      if (!url.pathname.endsWith('/')) {
        // A leading `//` would read as a host in Location
        const location = `/${url.pathname.replace(/^\/+/, '')}/${url.search}`
        return c.redirect(location, 301)
      }
      filePath = path.join(filePath, index)
      stats = await statOrNull(filePath)
    }

    if (!stats || !stats.isFile()) {
      return next()
    }

    return respondWithFile(c, filePath, stats)
  }
}

/**
 * Answer unmatched requests with the configured 404 document, read from disk
 * on every request so rebuilds are picked up.
 */
export function serveNotFoundDocument(context: ServingContext): NotFoundHandler {
  const file = path.join(context.outputDir, context.locale ?? '', context.notFoundPath)

  return async (c) => {
    let body: Buffer
    try {
      body = await readFile(file)
    } catch (error) {
      if (isMissingFile(error)) {
        return c.text('Not Found', 404)
      }
      throw error
    }

    return new Response(body, {
      status: 404,
      headers: { 'Content-Type': getMimeType(file) ?? 'text/html; charset=utf-8' },
    })
  }
}

export function entityTag(stats: Stats): string {
  return `W/"${stats.size.toString(16)}-${Math.floor(stats.mtimeMs).toString(16)}"`
}

export function isNotModified(headers: Headers, etag: string, modified: Date): boolean {
  const ifNoneMatch = headers.get('if-none-match')
  if (ifNoneMatch !== null) {
    if (ifNoneMatch.trim() === '*') return true
    const wanted = stripWeak(etag)
    return ifNoneMatch.split(',').some((tag) => stripWeak(tag.trim()) === wanted)
  }

  const ifModifiedSince = headers.get('if-modified-since')
  if (ifModifiedSince !== null) {
    const since = Date.parse(ifModifiedSince)
    if (Number.isNaN(since)) return false
    // HTTP dates carry whole seconds
    return Math.floor(modified.getTime() / 1000) * 1000 <= since
  }

  return false
}

async function respondWithFile(c: Context, filePath: string, stats: Stats): Promise<Response> {
  const etag = entityTag(stats)
  const headers: Record<string, string> = {
    ETag: etag,
    'Last-Modified': stats.mtime.toUTCString(),
    'Cache-Control': 'no-cache',
  }

  if (isNotModified(c.req.raw.headers, etag, stats.mtime)) {
    return new Response(null, { status: 304, headers })
  }

  const body = await readFile(filePath)
  return new Response(body, {
    status: 200,
    headers: {
      ...headers,
      'Content-Type': getMimeType(filePath) ?? DEFAULT_CONTENT_TYPE,
      'Content-Length': String(body.byteLength),
    },
  })
}

function stripWeak(tag: string): string {
  return tag.startsWith('W/') ? tag.slice(2) : tag
}

function decodePathname(pathname: string): string | null {
  let decoded: string
  try {
    decoded = decodeURIComponent(pathname)
  } catch {
    return null
  }
  return decoded.includes('\0') ? null : decoded
}

async function statOrNull(filePath: string): Promise<Stats | null> {
  try {
    return await stat(filePath)
  } catch (error) {
    if (hasErrorCode(error, UNSERVABLE_PATH_CODES)) return null
    throw error
  }
}

function isMissingFile(error: unknown): boolean {
  return hasErrorCode(error, ['ENOENT'])
}

function hasErrorCode(error: unknown, codes: readonly string[]): boolean {
  return (
    typeof error === 'object' &&
    error !== null &&
    'code' in error &&
    typeof error.code === 'string' &&
    codes.includes(error.code)
  )
}
