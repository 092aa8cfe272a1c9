/**
 * Live Reload WebSocket Server
 *
 * Each upgraded connection waits for one message on its own reload bus
 * subscription, sends a single "reload" text frame and closes. The browser
 * reloads and opens a fresh connection, so liveness never has to be tracked.
 */

import type { IncomingMessage } from 'node:http'
import type { Duplex } from 'node:stream'
import { WebSocketServer, type WebSocket } from 'ws'
import { RELOAD_MESSAGE, type ReloadBus, type ReloadSubscription } from '../bus/index.js'
import type { Logger } from '../logging/index.js'

export type ConnectionState = 'start' | 'subscribed' | 'waiting' | 'notify' | 'closed'

const SOCKET_OPEN = 1

/**
 * The part of a ws WebSocket a connection needs
 */
export interface ReloadSocket {
  readonly readyState: number
  send(data: string, cb?: (error?: Error) => void): void
  close(code?: number, reason?: string): void
  once(event: 'close', listener: () => void): unknown
}

export interface LiveReloadConnectionOptions {
  logger: Logger
  onStateChange?: (state: ConnectionState) => void
}

export class LiveReloadConnection {
  private current: ConnectionState = 'start'
  private subscription: ReloadSubscription | null = null

  constructor(
    private readonly socket: ReloadSocket,
    private readonly bus: ReloadBus,
    private readonly options: LiveReloadConnectionOptions
  ) {}

  get state(): ConnectionState {
    return this.current
  }

  /**
   * Drive the connection from start to closed. Resolves once closed; never
   * rejects.
   */
  async run(): Promise<void> {
    if (this.current !== 'start') return

    const subscription = this.bus.subscribe()
    this.subscription = subscription
    this.transition('subscribed')

    // Peer went away: stop waiting
    this.socket.once('close', () => subscription.close())

    this.transition('waiting')
    const result = await subscription.receive()

    if (result.kind === 'closed' || this.socket.readyState !== SOCKET_OPEN) {
      this.finish()
      return
    }

    if (result.kind === 'lagged') {
      this.options.logger.debug(`Live reload subscriber missed ${result.missed} message(s)`)
    }

    this.transition('notify')
    try {
      await this.send(RELOAD_MESSAGE)
      this.options.logger.debug('Notified browser of reload')
    } catch (error) {
      this.options.logger.debug(`Unable to notify browser: ${error instanceof Error ? error.message : String(error)}`)
    }
    this.finish()
  }

  /**
   * Abandon the wait without notifying (server shutdown)
   */
  close(): void {
    this.subscription?.close()
    if (this.current === 'start') {
      this.finish()
    }
  }

  private send(data: string): Promise<void> {
    return new Promise((resolve, reject) => {
      this.socket.send(data, (error) => {
        if (error) reject(error)
        else resolve()
      })
    })
  }

  private finish(): void {
    if (this.current === 'closed') return

    this.subscription?.close()
    if (this.socket.readyState === SOCKET_OPEN) {
      this.socket.close(1000)
    }
    this.transition('closed')
  }

  private transition(next: ConnectionState): void {
    this.current = next
    this.options.onStateChange?.(next)
  }
}

export interface LiveReloadServerOptions {
  bus: ReloadBus
  path: string
  logger: Logger
}

export class LiveReloadServer {
  private readonly wss: WebSocketServer
  private readonly connections = new Map<LiveReloadConnection, Promise<void>>()

  constructor(private readonly options: LiveReloadServerOptions) {
    this.wss = new WebSocketServer({ noServer: true })
  }

  /**
   * Take an HTTP upgrade. Only the live-reload path is accepted.
   */
  handleUpgrade(request: IncomingMessage, socket: Duplex, head: Buffer): void {
    const pathname = upgradePathname(request.url)

    if (pathname !== this.options.path) {
      socket.once('finish', () => socket.destroy())
      socket.end('HTTP/1.1 400 Bad Request\r\nConnection: close\r\n\r\n')
      return
    }

    this.wss.handleUpgrade(request, socket, head, (ws) => this.accept(ws))
  }

  get connectionCount(): number {
    return this.connections.size
  }

  /**
   * Close every open connection without notifying
   */
  async close(): Promise<void> {
    for (const connection of this.connections.keys()) {
      connection.close()
    }
    await Promise.all(this.connections.values())

    await new Promise<void>((resolve, reject) => {
      this.wss.close((error) => {
        if (error) reject(error)
        else resolve()
      })
    })
  }

  private accept(ws: WebSocket): void {
    const { bus, logger } = this.options
    logger.debug('websocket got connection')

    ws.on('error', (error) => {
      logger.debug(`Live reload socket error: ${error.message}`)
    })

    const connection = new LiveReloadConnection(ws, bus, { logger })
    this.connections.set(
      connection,
      connection.run().finally(() => {
        this.connections.delete(connection)
      })
    )
  }
}

/**
 * Path of an upgrade request target, or null when the target does not parse
 */
export function upgradePathname(target: string | undefined): string | null {
  try {
    return new URL(target ?? '/', 'http://localhost').pathname
  } catch {
    return null
  }
}
