/**
 * Message Bus
 * ===========
 *
 * Deferred publish/subscribe between view models. `publish` only enqueues;
 * a periodic tick supplied by the host scheduler drains the queue and calls
 * every live subscriber of each message's topic, so handlers always run on the
 * host's loop regardless of who published.
 *
 * Subscribers are held through `WeakHandle`s. A handle whose receiver was
 * collected or disposed is skipped and purged from every topic.
 *
 * A bus is meant to be created once at startup and passed to the objects that
 * need it. See `ergonomic.ts` for a context-based way to share it.
 */

import { MvvmError, isTargetUnavailable } from './errors'
import { createLogger, type Logger } from './logger'
import { WeakHandle, type AnyHandler } from './weak-handle'

// =============================================================================
// SCHEDULING
// =============================================================================

export const DEFAULT_TICK_INTERVAL = 5

/**
 * Host scheduling primitive. Must call `tick` periodically on one consistent
 * loop and return a function that stops it.
 */
export interface Scheduler {
  schedule(tick: () => void, intervalMs: number): () => void
}

/**
 * `setInterval` based scheduler. The timer is unref'd under Node so a running
 * bus never holds the process open.
 */
export const intervalScheduler: Scheduler = {
  schedule(tick, intervalMs) {
    const timer = setInterval(tick, intervalMs)
    if (typeof timer === 'object') timer.unref()
    return () => clearInterval(timer)
  }
}

export interface ManualScheduler extends Scheduler {
  /** Runs the scheduled tick once. Returns false when nothing is scheduled. */
  tick(): boolean
  readonly active: boolean
  readonly intervalMs: number | undefined
}

/**
 * Scheduler driven by hand, for tests and hosts that own their event loop.
 */
export function manualScheduler(): ManualScheduler {
  let current: { tick: () => void; intervalMs: number } | undefined

  return {
    schedule(tick, intervalMs) {
      const entry = { tick, intervalMs }
      current = entry
      return () => {
        if (current === entry) current = undefined
      }
    },
    tick() {
      if (!current) return false
      current.tick()
      return true
    },
    get active() {
      return current !== undefined
    },
    get intervalMs() {
      return current?.intervalMs
    }
  }
}

// =============================================================================
// BUS
// =============================================================================

export interface MessageBusOptions {
  /** Tick period in milliseconds. */
  interval?: number
  scheduler?: Scheduler
  /** Start ticking on construction. Defaults to true. */
  autoStart?: boolean
  /** Receives subscriber failures after they are logged. */
  onError?: (error: unknown, topic: object) => void
  logger?: Logger
}

interface QueuedMessage {
  readonly topic: object
  readonly args: readonly unknown[]
}

export class MessageBus {
  readonly interval: number
  private readonly scheduler: Scheduler
  private readonly onError: ((error: unknown, topic: object) => void) | undefined
  private readonly log: Logger
  private readonly subscribers = new Map<object, WeakHandle[]>()
  private queue: QueuedMessage[] = []
  private cancelTick: (() => void) | undefined
  private draining = false
  private disposed = false

  constructor(options: MessageBusOptions = {}) {
    this.interval = options.interval ?? DEFAULT_TICK_INTERVAL
    this.scheduler = options.scheduler ?? intervalScheduler
    this.onError = options.onError
    this.log = options.logger ?? createLogger('bus')

    if (options.autoStart !== false) this.start()
  }

  get isRunning(): boolean {
    return this.cancelTick !== undefined
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  get pendingCount(): number {
    return this.queue.length
  }

  /** Number of topics with at least one registered handle. */
  get topicCount(): number {
    return this.subscribers.size
  }

  /**
   * Starts the periodic drain. Calling it on a running bus does nothing.
   */
  start(): void {
    if (this.disposed) throw new MvvmError('Cannot start a disposed message bus')
    if (this.cancelTick) return
    this.cancelTick = this.scheduler.schedule(() => {
      this.drain()
    }, this.interval)
  }

  /**
   * Queues a message for the next tick. Never runs subscribers.
   */
  publish(topic: object, ...args: unknown[]): void {
    if (this.disposed) throw new MvvmError(`Cannot publish ${String(topic)} on a disposed message bus`)
    this.queue.push({ topic, args })
  }

  /**
   * Registers `handler` for `topic`. Subscribing the same handler twice gives
   * two entries and two calls per message.
   *
   * @param receiver When given, `handler` is called with `this = receiver`,
   * and the entry dies with the receiver.
   * @returns A function removing this exact entry.
   */
  subscribe(topic: object, handler: AnyHandler, receiver?: object): () => void {
    if (this.disposed) throw new MvvmError(`Cannot subscribe to ${String(topic)} on a disposed message bus`)
    const handle = new WeakHandle(handler, receiver, dead => this.purge(dead))
    const handles = this.subscribers.get(topic)
    if (handles) {
      handles.push(handle)
    } else {
      this.subscribers.set(topic, [handle])
    }
    return () => {
      this.removeHandle(topic, handle)
    }
  }

  /**
   * Removes the first entry of `topic` wrapping `handler` (and `receiver`).
   * @returns Whether an entry was removed.
   */
  unsubscribe(topic: object, handler: AnyHandler, receiver?: object): boolean {
    const handles = this.subscribers.get(topic)
    if (!handles) return false
    const index = handles.findIndex(handle => handle.matches(handler, receiver))
    if (index === -1) return false
    handles.splice(index, 1)
    if (handles.length === 0) this.subscribers.delete(topic)
    return true
  }

  /** Live subscribers of `topic`. */
  subscriberCount(topic: object): number {
    return this.subscribers.get(topic)?.filter(handle => handle.isAlive).length ?? 0
  }

  /**
   * One tick: delivers every message queued before the call, in order, then
   * purges dead handles of every topic. Messages published by handlers wait
   * for the next tick. Calls made from inside a handler return immediately.
   *
   * @returns Number of successful handler invocations.
   */
  drain(): number {
    if (this.draining) return 0
    this.draining = true
    let delivered = 0

    try {
      const batch = this.queue
      this.queue = []
      for (const message of batch) {
        const handles = this.subscribers.get(message.topic)
        if (!handles) continue
        // Snapshot: handlers may subscribe, unsubscribe or dispose receivers.
        for (const handle of [...handles]) {
          if (handle.isCollected || !handles.includes(handle)) continue
          if (this.dispatch(handle, message)) delivered++
        }
      }
      this.sweep()
    } finally {
      this.draining = false
    }

    return delivered
  }

  /**
   * Collects every dead handle now instead of at the end of the next tick.
   * @returns Number of handles purged.
   */
  sweep(): number {
    let purged = 0
    for (const handles of [...this.subscribers.values()]) {
      for (const handle of [...handles]) {
        if (!handle.isAlive && !handle.isCollected) {
          handle.collect()
          purged++
        }
      }
    }
    return purged
  }

  /**
   * Stops the tick and drops every queued message and subscriber.
   */
  dispose(): void {
    if (this.disposed) return
    this.cancelTick?.()
    this.cancelTick = undefined
    this.queue = []
    this.subscribers.clear()
    this.disposed = true
  }

  private dispatch(handle: WeakHandle, message: QueuedMessage): boolean {
    try {
      handle.invoke(message.args)
      return true
    } catch (error) {
      if (isTargetUnavailable(error)) {
        handle.collect()
      } else {
        this.log.error(`Subscriber of ${String(message.topic)} failed`, error)
        this.reportError(error, message.topic)
      }
      return false
    }
  }

  private reportError(error: unknown, topic: object): void {
    if (!this.onError) return
    try {
      this.onError(error, topic)
    } catch (hookError) {
      this.log.error(`onError hook failed for ${String(topic)}`, hookError)
    }
  }

  private purge(handle: WeakHandle): void {
    let removed = 0
    for (const topic of [...this.subscribers.keys()]) {
      if (this.removeHandle(topic, handle)) removed++
    }
    this.log.debug(`Purged collected subscriber from ${removed} topic(s)`)
  }

  private removeHandle(topic: object, handle: WeakHandle): boolean {
    const handles = this.subscribers.get(topic)
    if (!handles) return false
    const index = handles.indexOf(handle)
    if (index === -1) return false
    handles.splice(index, 1)
    if (handles.length === 0) this.subscribers.delete(topic)
    return true
  }
}
