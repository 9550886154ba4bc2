/**
 * A list whose mutations can be observed by bound UI collections.
 */

export type CollectionChangeAction = 'add' | 'remove' | 'reset'

export interface CollectionChangedEvent<T> {
  readonly action: CollectionChangeAction
  /** Items added or removed. Empty for `reset`. */
  readonly items: readonly T[]
  /** Position of the first affected item, -1 for `reset`. */
  readonly index: number
}

export type CollectionChangedListener<T> = (event: CollectionChangedEvent<T>) => void

export class ObservableList<T> implements Iterable<T> {
  private readonly items: T[]
  private readonly listeners: CollectionChangedListener<T>[] = []

  constructor(items: Iterable<T> = []) {
    this.items = [...items]
  }

  get length(): number {
    return this.items.length
  }

  [Symbol.iterator](): Iterator<T> {
    return this.items[Symbol.iterator]()
  }

  /** Item at `index`; negative indexes count from the end. */
  at(index: number): T | undefined {
    return this.items.at(index)
  }

  toArray(): T[] {
    return [...this.items]
  }

  append(item: T): void {
    this.items.push(item)
    this.raise({ action: 'add', items: [item], index: this.items.length - 1 })
  }

  extend(items: Iterable<T>): void {
    for (const item of items) {
      this.append(item)
    }
  }

  insert(index: number, item: T): void {
    const position = Math.max(0, Math.min(index < 0 ? this.items.length + index : index, this.items.length))
    this.items.splice(position, 0, item)
    this.raise({ action: 'add', items: [item], index: position })
  }

  /**
   * Removes the first item equal to `item`.
   * @returns Whether an item was removed.
   */
  remove(item: T): boolean {
    const index = this.items.indexOf(item)
    if (index === -1) return false
    this.items.splice(index, 1)
    this.raise({ action: 'remove', items: [item], index })
    return true
  }

  /**
   * Removes and returns the item at `index`, the last one by default.
   * @throws RangeError when the list is empty or the index is out of range.
   */
  pop(index: number = this.items.length - 1): T {
    const position = index < 0 ? this.items.length + index : index
    if (position < 0 || position >= this.items.length) {
      throw new RangeError(`pop index ${index} out of range for list of length ${this.items.length}`)
    }
    const [item] = this.items.splice(position, 1)
    this.raise({ action: 'remove', items: [item], index: position })
    return item
  }

  clear(): void {
    this.items.length = 0
    this.raise({ action: 'reset', items: [], index: -1 })
  }

  index(item: T): number {
    return this.items.indexOf(item)
  }

  count(item: T): number {
    return this.items.filter(candidate => candidate === item).length
  }

  onCollectionChanged(listener: CollectionChangedListener<T>): () => void {
    this.listeners.push(listener)
    return () => {
      const index = this.listeners.indexOf(listener)
      if (index !== -1) this.listeners.splice(index, 1)
    }
  }

  private raise(event: CollectionChangedEvent<T>): void {
    for (const listener of [...this.listeners]) {
      listener(event)
    }
  }
}
