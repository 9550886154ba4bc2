/**
 * Change-Notifying Values
 * =======================
 *
 * `ObservableValue` is the storage primitive: a value, an equality check and a
 * list of change listeners. The two descriptors built on it raise
 * `PropertyChanged` on their owning object:
 *
 * - `NotifiableProperty` keeps one slot per owner.
 * - `NotifiableAccessor` wraps a getter/setter pair the owner implements.
 *
 * Both only notify when the new value differs from the current one.
 */

import { MvvmError } from './errors'

export type Equality<T> = (a: T, b: T) => boolean

/**
 * What a descriptor needs from its owner.
 */
export interface PropertyChangeSource {
  raisePropertyChanged(propertyName: string): void
}

// =============================================================================
// EQUALITY
// =============================================================================

export const defaultEquals = <T>(a: T, b: T): boolean => Object.is(a, b)

/**
 * Compares arrays item by item and plain objects key by key, one level deep.
 */
export function shallowEqual(a: unknown, b: unknown): boolean {
  if (Object.is(a, b)) return true

  if (Array.isArray(a) && Array.isArray(b)) {
    if (a.length !== b.length) return false
    return a.every((item, i) => Object.is(item, b[i]))
  }

  if (typeof a === 'object' && typeof b === 'object' && a !== null && b !== null) {
    const keysA = Object.keys(a)
    const keysB = Object.keys(b)
    if (keysA.length !== keysB.length) return false
    return keysA.every(key => Object.prototype.hasOwnProperty.call(b, key) && Object.is(Reflect.get(a, key), Reflect.get(b, key)))
  }

  return false
}

// =============================================================================
// OBSERVABLE VALUE
// =============================================================================

export type ChangeListener<T> = (value: T, previous: T) => void

export interface ObservableValueOptions<T> {
  equals?: Equality<T>
}

export class ObservableValue<T> {
  private current: T
  private assigned = false
  private readonly equals: Equality<T>
  private readonly listeners: ChangeListener<T>[] = []

  constructor(
    readonly initial: T,
    options: ObservableValueOptions<T> = {}
  ) {
    this.current = initial
    this.equals = options.equals ?? defaultEquals
  }

  get value(): T {
    return this.current
  }

  set value(next: T) {
    this.set(next)
  }

  /** Whether a value was written since construction or the last `reset`. */
  get isSet(): boolean {
    return this.assigned
  }

  get(): T {
    return this.current
  }

  /**
   * Stores `next` and notifies listeners, unless it equals the current value.
   * @returns Whether the value changed.
   */
  set(next: T): boolean {
    if (this.equals(this.current, next)) return false
    const previous = this.current
    this.current = next
    this.assigned = true
    for (const listener of [...this.listeners]) {
      listener(next, previous)
    }
    return true
  }

  /**
   * Drops the stored value. Reads return the initial value again; listeners
   * are not told.
   */
  reset(): void {
    this.current = this.initial
    this.assigned = false
  }

  subscribe(listener: ChangeListener<T>): () => void {
    this.listeners.push(listener)
    return () => {
      const index = this.listeners.indexOf(listener)
      if (index !== -1) this.listeners.splice(index, 1)
    }
  }
}

// =============================================================================
// DESCRIPTORS
// =============================================================================

/**
 * Base of every member `defineBindable` can name.
 */
export abstract class NamedMember {
  private memberName: string | undefined

  constructor(name?: string) {
    this.memberName = name
  }

  get name(): string | undefined {
    return this.memberName
  }

  /** Assigns `name` unless the member already has one. */
  assignName(name: string): void {
    if (this.memberName === undefined) this.memberName = name
  }

  protected requireName(): string {
    if (this.memberName === undefined) {
      throw new MvvmError('Member has no name; pass one or register it with defineBindable()')
    }
    return this.memberName
  }
}

export interface NotifiablePropertyOptions<T> {
  initial: T
  name?: string
  equals?: Equality<T>
}

/**
 * A property whose value lives in a per-owner slot. The slot is created on the
 * first write and lives as long as the owner.
 *
 * @example
 * ```ts
 * const title = new NotifiableProperty({ initial: '', name: 'title' })
 * title.set(viewModel, 'Draft') // raises PropertyChanged('title')
 * title.set(viewModel, 'Draft') // no-op
 * ```
 */
export class NotifiableProperty<T> extends NamedMember {
  readonly initial: T
  private readonly equals: Equality<T>
  private readonly slots = new WeakMap<object, ObservableValue<T>>()

  constructor(options: NotifiablePropertyOptions<T>) {
    super(options.name)
    this.initial = options.initial
    this.equals = options.equals ?? defaultEquals
  }

  get(owner: object): T {
    const slot = this.slots.get(owner)
    return slot ? slot.value : this.initial
  }

  set(owner: PropertyChangeSource, value: T): boolean {
    const name = this.requireName()
    let slot = this.slots.get(owner)
    if (!slot) {
      if (this.equals(this.initial, value)) return false
      slot = new ObservableValue(this.initial, { equals: this.equals })
      this.slots.set(owner, slot)
    }
    if (!slot.set(value)) return false
    owner.raisePropertyChanged(name)
    return true
  }

  /**
   * Removes the owner's slot. No notification is raised.
   */
  delete(owner: object): boolean {
    return this.slots.delete(owner)
  }

  has(owner: object): boolean {
    return this.slots.has(owner)
  }
}

export interface NotifiableAccessorOptions<TOwner, T> {
  get: (owner: TOwner) => T
  set: (owner: TOwner, value: T) => void
  name?: string
  equals?: Equality<T | undefined>
}

/**
 * Computed property over a getter/setter pair. A getter that throws a
 * `TypeError` (typically reading through a backing object that is not set up
 * yet) counts as "no value yet" and reads as `undefined`, so the first write
 * always notifies. Any other error propagates.
 */
export class NotifiableAccessor<TOwner extends PropertyChangeSource, T> extends NamedMember {
  private readonly getter: (owner: TOwner) => T
  private readonly setter: (owner: TOwner, value: T) => void
  private readonly equals: Equality<T | undefined>

  constructor(options: NotifiableAccessorOptions<TOwner, T>) {
    super(options.name)
    this.getter = options.get
    this.setter = options.set
    this.equals = options.equals ?? defaultEquals
  }

  get(owner: TOwner): T | undefined {
    try {
      return this.getter(owner)
    } catch (error) {
      if (error instanceof TypeError) return undefined
      throw error
    }
  }

  set(owner: TOwner, value: T): boolean {
    const name = this.requireName()
    if (this.equals(this.get(owner), value)) return false
    this.setter(owner, value)
    owner.raisePropertyChanged(name)
    return true
  }
}
