/**
 * Non-owning references to message handlers.
 *
 * A handler subscribed to a topic must never keep its receiver (usually a
 * view model) alive. `WeakHandle` holds the receiver and the function through
 * `WeakRef`s and resolves both on every call. A receiver that reports
 * `isDisposed` counts as gone.
 */

import { TargetUnavailableError } from './errors'

export type Handler<TArgs extends unknown[]> = (...args: TArgs) => unknown

/** Any function, whatever its parameters. */
export type AnyHandler = (...args: never) => unknown

/**
 * Anything with an explicit teardown flag. A disposed receiver makes every
 * handle bound to it unavailable.
 */
export interface Lifetime {
  readonly isDisposed: boolean
}

const isDisposed = (receiver: object): boolean =>
  'isDisposed' in receiver && receiver.isDisposed === true

export class WeakHandle {
  private readonly fnRef: WeakRef<AnyHandler>
  private readonly receiverRef: WeakRef<object> | undefined
  private readonly onCollect: ((handle: WeakHandle) => void) | undefined
  private collected = false

  /**
   * @param fn Free function, or an unbound method invoked with `this = receiver`.
   * @param receiver Object the method belongs to.
   * @param onCollect Called once, with this handle, when the bus finds it dead.
   */
  constructor(
    fn: AnyHandler,
    receiver?: object,
    onCollect?: (handle: WeakHandle) => void
  ) {
    this.fnRef = new WeakRef(fn)
    this.receiverRef = receiver === undefined ? undefined : new WeakRef(receiver)
    this.onCollect = onCollect
  }

  get isAlive(): boolean {
    if (this.collected || this.fnRef.deref() === undefined) return false
    if (this.receiverRef === undefined) return true
    const receiver = this.receiverRef.deref()
    return receiver !== undefined && !isDisposed(receiver)
  }

  get isCollected(): boolean {
    return this.collected
  }

  invoke(args: readonly unknown[]): unknown {
    const fn = this.fnRef.deref()
    if (this.receiverRef === undefined) {
      if (fn === undefined || this.collected) {
        throw new TargetUnavailableError('Function no longer available')
      }
      return Reflect.apply(fn, undefined, args)
    }

    const receiver = this.receiverRef.deref()
    if (fn === undefined || receiver === undefined || this.collected || isDisposed(receiver)) {
      throw new TargetUnavailableError('Object no longer available')
    }
    return Reflect.apply(fn, receiver, args)
  }

  /**
   * Marks the handle dead and notifies the owner. Runs the callback at most once.
   */
  collect(): void {
    if (this.collected) return
    this.collected = true
    this.onCollect?.(this)
  }

  /**
   * Whether this handle wraps `fn`, bound to `receiver` when one is given.
   */
  matches(fn: AnyHandler, receiver?: object): boolean {
    if (this.fnRef.deref() !== fn) return false
    return this.receiverRef?.deref() === receiver
  }
}
