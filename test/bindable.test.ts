import { describe, it, expect, vi } from 'vitest'
import { BindableObject, defineBindable, bindableMembers } from '../src/bindable'
import { NotifiableProperty, NotifiableAccessor } from '../src/observable'
import { command, type CommandHandle } from '../src/command'
import { MessageBus, manualScheduler } from '../src/message-bus'
import type { Topic } from '../src/topic'
import { MvvmError } from '../src/errors'

class CounterViewModel extends BindableObject {
  declare count: number
  declare doubled: number
  declare increment: CommandHandle
  declare add: CommandHandle<number>
}

defineBindable(CounterViewModel, {
  count: new NotifiableProperty({ initial: 0 }),
  doubled: new NotifiableAccessor<CounterViewModel, number>({
    get: vm => vm.count * 2,
    set: (vm, value) => {
      vm.count = value / 2
    }
  }),
  increment: command<CounterViewModel>(vm => {
    vm.count += 1
  }),
  add: command<CounterViewModel, number>((vm, amount) => {
    vm.count += amount
  }).canExecute((_vm, amount) => amount !== undefined && amount > 0)
})

class NamedCounterViewModel extends CounterViewModel {
  declare title: string
}

defineBindable(NamedCounterViewModel, {
  title: new NotifiableProperty({ initial: 'untitled' })
})

class InboxViewModel extends BindableObject {
  readonly received: Topic<[text: string]>
  messages: string[] = []

  constructor(messenger?: MessageBus) {
    super(messenger)
    this.received = this.topic<[text: string]>('received')
    this.received.connect(this.onReceived, this)
  }

  onReceived(text: string) {
    this.messages.push(text)
  }
}

describe('BindableObject', () => {
  describe('PropertyChanged', () => {
    it('should pass the sender and property name to handlers', () => {
      const vm = new CounterViewModel()
      const handler = vi.fn()
      vm.addPropertyChanged(handler)

      vm.raisePropertyChanged('count')

      expect(handler).toHaveBeenCalledWith(vm, { propertyName: 'count' })
    })

    it('should call a handler registered twice twice', () => {
      const vm = new CounterViewModel()
      const handler = vi.fn()
      vm.addPropertyChanged(handler)
      vm.addPropertyChanged(handler)

      vm.raisePropertyChanged('count')

      expect(handler).toHaveBeenCalledTimes(2)
    })

    it('should remove the first registration only', () => {
      const vm = new CounterViewModel()
      const handler = vi.fn()
      vm.addPropertyChanged(handler)
      vm.addPropertyChanged(handler)

      expect(vm.removePropertyChanged(handler)).toBe(true)
      vm.raisePropertyChanged('count')

      expect(handler).toHaveBeenCalledTimes(1)
      expect(vm.removePropertyChanged(handler)).toBe(true)
      expect(vm.removePropertyChanged(handler)).toBe(false)
    })

    it('should drop handlers on dispose', () => {
      const vm = new CounterViewModel()
      const handler = vi.fn()
      vm.onPropertyChanged(handler)

      vm.dispose()
      vm.raisePropertyChanged('count')

      expect(vm.isDisposed).toBe(true)
      expect(handler).not.toHaveBeenCalled()
    })
  })

  describe('Topics', () => {
    it('should refuse to create topics without a message bus', () => {
      expect(() => new InboxViewModel()).toThrow(MvvmError)
      expect(() => new InboxViewModel()).toThrow(
        'Cannot create topic "received" on InboxViewModel: no message bus was provided'
      )
    })

    it('should receive its own topic messages on the next tick', () => {
      const bus = new MessageBus({ scheduler: manualScheduler() })
      const inbox = new InboxViewModel(bus)

      inbox.received.emit('hello')
      expect(inbox.messages).toEqual([])

      bus.drain()
      expect(inbox.messages).toEqual(['hello'])
      bus.dispose()
    })

    it('should purge its subscriptions on dispose', () => {
      const bus = new MessageBus({ scheduler: manualScheduler() })
      const inbox = new InboxViewModel(bus)

      inbox.dispose()

      expect(bus.subscriberCount(inbox.received)).toBe(0)
      bus.dispose()
    })

    it('should not deliver messages queued before dispose', () => {
      const bus = new MessageBus({ scheduler: manualScheduler() })
      const inbox = new InboxViewModel(bus)
      const other = new InboxViewModel(bus)

      inbox.received.emit('late')
      other.received.emit('on time')
      inbox.dispose()

      expect(bus.drain()).toBe(1)
      expect(inbox.messages).toEqual([])
      expect(other.messages).toEqual(['on time'])
      bus.dispose()
    })
  })
})

describe('defineBindable', () => {
  it('should install notifying property accessors', () => {
    const vm = new CounterViewModel()
    const changed: string[] = []
    vm.onPropertyChanged((_sender, args) => changed.push(args.propertyName))

    vm.count = 5
    vm.count = 5

    expect(vm.count).toBe(5)
    expect(changed).toEqual(['count'])
  })

  it('should install computed accessors', () => {
    const vm = new CounterViewModel()
    const changed: string[] = []
    vm.onPropertyChanged((_sender, args) => changed.push(args.propertyName))

    vm.doubled = 8

    expect(vm.count).toBe(4)
    expect(vm.doubled).toBe(8)
    expect(changed).toEqual(['count', 'doubled'])
  })

  it('should install read-only command accessors', () => {
    const vm = new CounterViewModel()

    expect(vm.increment).toBe(vm.increment)
    vm.increment.execute()
    vm.increment.execute()

    expect(vm.count).toBe(2)
  })

  it('should honour command predicates', () => {
    const vm = new CounterViewModel()

    expect(vm.add.canExecute(3)).toBe(true)
    expect(vm.add.canExecute(-1)).toBe(false)
    vm.add.execute(3)

    expect(vm.count).toBe(3)
  })

  it('should keep instances independent', () => {
    const a = new CounterViewModel()
    const b = new CounterViewModel()

    a.count = 1

    expect(b.count).toBe(0)
    expect(a.increment).not.toBe(b.increment)
  })

  it('should inherit members from base classes', () => {
    const vm = new NamedCounterViewModel()

    vm.title = 'Laps'
    vm.increment.execute()

    expect(vm.title).toBe('Laps')
    expect(vm.count).toBe(1)
    expect(new CounterViewModel()).not.toHaveProperty('title')
  })

  it('should list registered members across the prototype chain', () => {
    expect(bindableMembers(CounterViewModel)).toEqual(['count', 'doubled', 'increment', 'add'])
    expect(bindableMembers(NamedCounterViewModel)).toEqual(['title', 'count', 'doubled', 'increment', 'add'])
  })
})
