/**
 * Reload Bus
 *
 * Bounded broadcast channel carrying "content changed" notifications from the
 * rebuild trigger to live-reload connections. Subscriptions only observe
 * messages published after they were created. A subscription that falls more
 * than `capacity` messages behind loses the oldest ones and is told how many
 * it missed on its next receive.
 */

import { ConfigurationError, ReloadBusError } from '../errors/index.js'

export const RELOAD_MESSAGE = 'reload'
export const DEFAULT_BUS_CAPACITY = 100

export type ReloadMessage = typeof RELOAD_MESSAGE

export type ReceiveResult =
  | { kind: 'message'; message: ReloadMessage }
  | { kind: 'lagged'; missed: number }
  | { kind: 'closed' }

export interface ReloadBusOptions {
  capacity?: number
}

type Waiter = (result: ReceiveResult) => void

export class ReloadSubscription {
  private queue: ReloadMessage[] = []
  private missed = 0
  private waiter: Waiter | null = null
  private closed = false

  constructor(
    private readonly capacity: number,
    private readonly detach: (subscription: ReloadSubscription) => void
  ) {}

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Wait for the next message on this subscription
   */
  receive(): Promise<ReceiveResult> {
    if (this.waiter) {
      return Promise.reject(new ReloadBusError('receive() is already pending on this subscription'))
    }

    if (this.missed > 0) {
      const missed = this.missed
      this.missed = 0
      return Promise.resolve({ kind: 'lagged', missed })
    }

    const next = this.queue.shift()
    if (next !== undefined) {
      return Promise.resolve({ kind: 'message', message: next })
    }

    if (this.closed) {
      return Promise.resolve({ kind: 'closed' })
    }

    return new Promise((resolve) => {
      this.waiter = resolve
    })
  }

  /**
   * Detach from the bus. A pending receive resolves with `closed`.
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    this.queue = []
    this.missed = 0
    this.detach(this)
    this.settle({ kind: 'closed' })
  }

  /** @internal */
  deliver(message: ReloadMessage): void {
    if (this.closed) return

    if (this.waiter) {
      this.settle({ kind: 'message', message })
      return
    }

    if (this.queue.length >= this.capacity) {
      this.queue.shift()
      this.missed++
    }
    this.queue.push(message)
  }

  private settle(result: ReceiveResult): void {
    const waiter = this.waiter
    this.waiter = null
    waiter?.(result)
  }
}

export class ReloadBus {
  private readonly capacity: number
  private readonly subscriptions = new Set<ReloadSubscription>()
  private closed = false

  constructor(options: ReloadBusOptions = {}) {
    const capacity = options.capacity ?? DEFAULT_BUS_CAPACITY
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new ConfigurationError(`reload bus capacity must be a positive integer, got ${capacity}`)
    }
    this.capacity = capacity
  }

  /**
   * Queue a message for every live subscription. Returns how many
   * subscriptions it reached; zero subscribers is not an error.
   */
  publish(message: ReloadMessage = RELOAD_MESSAGE): number {
    if (this.closed) return 0

    for (const subscription of this.subscriptions) {
      subscription.deliver(message)
    }
    return this.subscriptions.size
  }

  subscribe(): ReloadSubscription {
    const subscription = new ReloadSubscription(this.capacity, (s) => this.subscriptions.delete(s))
    if (this.closed) {
      subscription.close()
    } else {
      this.subscriptions.add(subscription)
    }
    return subscription
  }

  get subscriberCount(): number {
    return this.subscriptions.size
  }

  get isClosed(): boolean {
    return this.closed
  }

  /**
   * Close every subscription and refuse further publishes
   */
  close(): void {
    if (this.closed) return
    this.closed = true
    for (const subscription of [...this.subscriptions]) {
      subscription.close()
    }
  }
}
