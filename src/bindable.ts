/**
 * Bindable Objects
 * ================
 *
 * `BindableObject` is the base of every view model: it owns the list of
 * `PropertyChanged` handlers a view binds to, the message bus it was given and
 * an explicit teardown hook.
 *
 * `defineBindable` is the class-preparation step. It names the descriptors
 * after the keys they are registered under and installs accessors on the
 * prototype, so a subclass only declares the member types:
 *
 * ```ts
 * class CounterViewModel extends BindableObject {
 *   declare count: number
 *   declare increment: CommandHandle
 * }
 *
 * defineBindable(CounterViewModel, {
 *   count: new NotifiableProperty({ initial: 0 }),
 *   increment: command<CounterViewModel>(vm => { vm.count += 1 })
 * })
 * ```
 */

import { MvvmError } from './errors'
import type { MessageBus } from './message-bus'
import type { PropertyChangeSource } from './observable'
import { Topic } from './topic'
import type { Lifetime } from './weak-handle'

// =============================================================================
// PROPERTY CHANGED
// =============================================================================

export interface PropertyChangedEventArgs {
  readonly propertyName: string
}

export type PropertyChangedHandler = (sender: BindableObject, args: PropertyChangedEventArgs) => void

// =============================================================================
// BASE CLASS
// =============================================================================

export class BindableObject implements PropertyChangeSource, Lifetime {
  readonly messenger: MessageBus | undefined
  private propertyChangedHandlers: PropertyChangedHandler[] = []
  private disposed = false

  constructor(messenger?: MessageBus) {
    this.messenger = messenger
  }

  get isDisposed(): boolean {
    return this.disposed
  }

  /**
   * Registers a handler. The same handler registered twice is called twice.
   */
  addPropertyChanged(handler: PropertyChangedHandler): void {
    this.propertyChangedHandlers.push(handler)
  }

  /** Removes the first registration of `handler`. */
  removePropertyChanged(handler: PropertyChangedHandler): boolean {
    const index = this.propertyChangedHandlers.indexOf(handler)
    if (index === -1) return false
    this.propertyChangedHandlers.splice(index, 1)
    return true
  }

  onPropertyChanged(handler: PropertyChangedHandler): () => void {
    this.addPropertyChanged(handler)
    return () => {
      this.removePropertyChanged(handler)
    }
  }

  raisePropertyChanged(propertyName: string): void {
    const args: PropertyChangedEventArgs = { propertyName }
    for (const handler of [...this.propertyChangedHandlers]) {
      handler(this, args)
    }
  }

  /**
   * Creates a topic on this object's message bus.
   */
  protected topic<TArgs extends unknown[] = []>(name: string): Topic<TArgs> {
    if (!this.messenger) {
      throw new MvvmError(`Cannot create topic "${name}" on ${this.constructor.name}: no message bus was provided`)
    }
    return new Topic<TArgs>(this.messenger, name)
  }

  /**
   * Teardown. Drops the property-changed handlers and purges every bus
   * subscription this object is the receiver of.
   */
  dispose(): void {
    if (this.disposed) return
    this.disposed = true
    this.propertyChangedHandlers = []
    if (this.messenger && !this.messenger.isDisposed) this.messenger.sweep()
  }
}

// =============================================================================
// CLASS PREPARATION
// =============================================================================

/**
 * Anything `defineBindable` can install: notifiable properties and accessors
 * (get/set) or command descriptors (get only).
 */
export interface BindableMember<TOwner extends BindableObject> {
  readonly name: string | undefined
  assignName(name: string): void
  get(owner: TOwner): unknown
  set?(owner: TOwner, value: unknown): unknown
}

type BindableClass<TOwner extends BindableObject> = abstract new (...args: never[]) => TOwner

const registeredMembers = new WeakMap<object, string[]>()

/**
 * Names every member after its key, unless it already has a name, and defines
 * the matching accessor on `ctor.prototype`.
 */
export function defineBindable<TOwner extends BindableObject>(
  ctor: BindableClass<TOwner>,
  members: Record<string, BindableMember<TOwner>>
): void {
  const prototype: object = ctor.prototype
  const names = registeredMembers.get(prototype) ?? []

  for (const [key, member] of Object.entries(members)) {
    member.assignName(key)

    const descriptor: PropertyDescriptor = {
      configurable: true,
      get(this: TOwner) {
        return member.get(this)
      }
    }
    if (member.set !== undefined) {
      descriptor.set = function (this: TOwner, value: unknown) {
        member.set?.(this, value)
      }
    }
    Object.defineProperty(prototype, key, descriptor)

    if (!names.includes(key)) names.push(key)
  }

  registeredMembers.set(prototype, names)
}

/**
 * Names of the members registered for `ctor` and its base classes.
 */
export function bindableMembers(ctor: BindableClass<BindableObject>): string[] {
  const names: string[] = []
  const prototype: object = ctor.prototype
  let proto: unknown = prototype
  while (typeof proto === 'object' && proto !== null) {
    for (const name of registeredMembers.get(proto) ?? []) {
      if (!names.includes(name)) names.push(name)
    }
    proto = Object.getPrototypeOf(proto)
  }
  return names
}
