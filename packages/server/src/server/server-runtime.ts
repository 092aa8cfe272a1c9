/**
 * Server Runtime
 *
 * Binds the router and the live-reload WebSocket server to one HTTP server.
 * Static requests and live-reload connections all progress concurrently on the
 * event loop; the only waits are socket/disk I/O and reload bus receives.
 */

import { createServer, type Server } from 'node:http'
import type { AddressInfo } from 'node:net'
import { getRequestListener } from '@hono/node-server'
import type { ReloadBus } from '../bus/index.js'
import type { Logger } from '../logging/index.js'
import type { ServingContext } from '../types/index.js'
import { LiveReloadServer } from './live-reload.js'
import { LIVE_RELOAD_PATH, createRouter } from './router.js'

export interface ServerRuntimeOptions {
  context: ServingContext
  bus: ReloadBus
  logger: Logger
  /** Called for server errors after a successful bind */
  onFault?: (error: Error) => void
}

export class ServerRuntime {
  private server: Server | null = null
  private liveReload: LiveReloadServer | null = null

  constructor(private readonly options: ServerRuntimeOptions) {}

  /**
   * Bind and start accepting connections. Bind failures reject.
   */
  async start(): Promise<AddressInfo> {
    if (this.server) {
      throw new Error('Server runtime already started')
    }

    const { context, bus, logger } = this.options
    const app = createRouter(context, { logger })
    const liveReload = new LiveReloadServer({ bus, path: LIVE_RELOAD_PATH, logger })
    const server = createServer(getRequestListener(app.fetch))

    server.on('upgrade', (request, socket, head) => {
      liveReload.handleUpgrade(request, socket, head)
    })

    await new Promise<void>((resolve, reject) => {
      server.once('error', reject)
      server.listen(context.address.port, context.address.address, () => {
        server.off('error', reject)
        resolve()
      })
    })

    server.on('error', (error) => {
      if (this.options.onFault) {
        this.options.onFault(error)
      } else {
        logger.error(`HTTP server error: ${error.message}`)
      }
    })

    this.server = server
    this.liveReload = liveReload

    const address = server.address()
    if (address === null || typeof address === 'string') {
      throw new Error('HTTP server is not bound to a TCP address')
    }
    logger.debug(`HTTP server listening on ${address.address}:${address.port}`)
    return address
  }

  /**
   * Close live-reload connections, then the HTTP server. In-flight static
   * responses finish; idle keep-alive sockets are dropped.
   */
  async stop(): Promise<void> {
    const server = this.server
    if (!server) return
    this.server = null

    await this.liveReload?.close()
    this.liveReload = null

    await new Promise<void>((resolve, reject) => {
      server.close((error) => {
        if (error) reject(error)
        else resolve()
      })
      server.closeIdleConnections()
    })
  }

  get liveReloadConnections(): number {
    return this.liveReload?.connectionCount ?? 0
  }
}
