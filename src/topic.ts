import type { MessageBus } from './message-bus'
import type { Handler } from './weak-handle'

/**
 * A named channel on a message bus. The topic object itself is the bus key,
 * so two topics never collide even when they share a name.
 *
 * @example
 * ```ts
 * const saved = new Topic<[id: string]>(bus, 'saved')
 * saved.connect(viewModel.onSaved, viewModel)
 * saved.emit('42') // delivered on the next tick
 * ```
 */
export class Topic<TArgs extends unknown[] = []> {
  constructor(
    readonly bus: MessageBus,
    readonly name = 'anonymous'
  ) {}

  connect(handler: Handler<TArgs>, receiver?: object): () => void {
    return this.bus.subscribe(this, handler, receiver)
  }

  disconnect(handler: Handler<TArgs>, receiver?: object): boolean {
    return this.bus.unsubscribe(this, handler, receiver)
  }

  emit(...args: TArgs): void {
    this.bus.publish(this, ...args)
  }

  toString(): string {
    return `topic ${this.name}`
  }
}
