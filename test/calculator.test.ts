import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { createActor } from 'xstate'
import {
  createCalculatorState,
  pressDigit,
  pressOperator,
  isOperatorKey,
  type CalculatorState,
  type OperatorKey
} from '../src/calculator/logic'
import { calculatorMachine } from '../src/calculator/machine'
import { CalculatorViewModel } from '../src/calculator/view-model'
import { MessageBus, manualScheduler, type ManualScheduler } from '../src/message-bus'
import { collectGarbage } from './collect-garbage'

const press = (state: CalculatorState, keys: string[]): CalculatorState =>
  keys.reduce(
    (current, key) => (isOperatorKey(key) ? pressOperator(current, key) : pressDigit(current, key)),
    state
  )

describe('Calculator logic', () => {
  it('should start empty with a pending equals', () => {
    const state = createCalculatorState()

    expect(state.input).toBe('')
    expect(state.output).toBe('')
    expect(state.accumulator.isZero()).toBe(true)
    expect(state.operator).toBe('=')
  })

  it('should ignore digits that would not form a number', () => {
    const state = press(createCalculatorState(), ['1', '.', '.', '5'])

    expect(state.input).toBe('1.5')
  })

  it('should compute a running total', () => {
    const state = press(createCalculatorState(), ['5', '+', '3', '='])

    expect(state.output).toBe('8.0')
    expect(state.input).toBe('')
    expect(state.operator).toBe('=')
  })

  it('should apply operators in the order they were pressed', () => {
    const state = press(createCalculatorState(), ['2', '+', '3', 'x', '4', '='])

    expect(state.output).toBe('20.0')
  })

  it('should subtract and divide', () => {
    expect(press(createCalculatorState(), ['5', '-', '8', '=']).output).toBe('-3.0')
    expect(press(createCalculatorState(), ['1', '/', '3', '=']).output).toBe('0.3333333333333333')
  })

  it('should replace the pending operator when no input was typed', () => {
    const state = press(createCalculatorState(), ['6', '+', 'x', '2', '='])

    expect(state.output).toBe('12.0')
  })

  it('should reset on division by zero', () => {
    const state = press(createCalculatorState(), ['8', '/', '0', '='])

    expect(state).toEqual(createCalculatorState())
  })

  it('should clear the input only on C', () => {
    const state = press(createCalculatorState(), ['7', '+', '4', 'C'])

    expect(state.input).toBe('')
    expect(state.output).toBe('7.0')
    expect(state.operator).toBe('+')
  })

  it('should clear everything on AC', () => {
    const state = press(createCalculatorState(), ['7', '+', '4', 'AC'])

    expect(state).toEqual(createCalculatorState())
  })

  it('should tell operator keys from digits', () => {
    expect(isOperatorKey('x')).toBe(true)
    expect(isOperatorKey('AC')).toBe(true)
    expect(isOperatorKey('7')).toBe(false)
    expect(isOperatorKey('*')).toBe(false)
  })
})

describe('calculatorMachine', () => {
  it('should keep the calculator state in its context', () => {
    const actor = createActor(calculatorMachine).start()

    actor.send({ type: 'DIGIT', digit: '9' })
    actor.send({ type: 'OPERATOR', key: 'x' })
    actor.send({ type: 'DIGIT', digit: '2' })
    actor.send({ type: 'OPERATOR', key: '=' })

    expect(actor.getSnapshot().context.output).toBe('18.0')
    actor.stop()
  })

  it('should give every actor its own context', () => {
    const first = createActor(calculatorMachine).start()
    const second = createActor(calculatorMachine).start()

    first.send({ type: 'DIGIT', digit: '1' })

    expect(second.getSnapshot().context.input).toBe('')
    first.stop()
    second.stop()
  })
})

describe('CalculatorViewModel', () => {
  let scheduler: ManualScheduler
  let bus: MessageBus
  let vm: CalculatorViewModel

  const keys = (...pressed: string[]) => {
    for (const key of pressed) {
      if (isOperatorKey(key)) {
        vm.operatorCommand.execute(key)
      } else {
        vm.addDigitCommand.execute(key)
      }
    }
  }

  beforeEach(() => {
    scheduler = manualScheduler()
    bus = new MessageBus({ scheduler })
    vm = new CalculatorViewModel(bus)
  })

  afterEach(() => {
    vm.dispose()
    bus.dispose()
  })

  it('should start with empty displays', () => {
    expect(vm.inputText).toBe('')
    expect(vm.outputText).toBe('')
    expect(vm.history.length).toBe(0)
  })

  it('should mirror typed digits into inputText', () => {
    const changed: string[] = []
    vm.onPropertyChanged((_sender, args) => changed.push(args.propertyName))

    keys('4', '2')

    expect(vm.inputText).toBe('42')
    expect(changed).toEqual(['inputText', 'inputText'])
  })

  it('should show the result of 5 + 3 =', () => {
    keys('5', '+', '3', '=')

    expect(vm.outputText).toBe('8.0')
    expect(vm.inputText).toBe('')
    expect(vm.accumulator.toString()).toBe('8')
    expect(vm.pendingOperator).toBe('=')
  })

  it('should clear both displays on division by zero', () => {
    keys('8', '/', '0', '=')

    expect(vm.inputText).toBe('')
    expect(vm.outputText).toBe('')
    expect(vm.accumulator.isZero()).toBe(true)
  })

  it('should record results in history on the next tick', () => {
    keys('5', '+', '3', '=')

    expect(vm.history.toArray()).toEqual([])
    expect(bus.pendingCount).toBe(2)

    scheduler.tick()

    expect(vm.history.toArray()).toEqual(['5.0', '8.0'])
  })

  it('should not record cleared results', () => {
    keys('8', '/', '0', '=')
    scheduler.tick()

    expect(vm.history.toArray()).toEqual(['8.0'])
  })

  it('should enable C only while there is input', () => {
    const clear: OperatorKey = 'C'

    expect(vm.operatorCommand.canExecute(clear)).toBe(false)
    expect(vm.operatorCommand.canExecute('+')).toBe(true)

    keys('1')
    expect(vm.operatorCommand.canExecute(clear)).toBe(true)

    keys('C')
    expect(vm.operatorCommand.canExecute(clear)).toBe(false)
  })

  it('should raise CanExecuteChanged when the input changes', () => {
    const listener = vi.fn()
    vm.operatorCommand.onCanExecuteChanged(listener)

    keys('1', '2', '+')

    expect(listener).toHaveBeenCalledTimes(3)
    expect(listener).toHaveBeenCalledWith(vm.operatorCommand)
  })

  it('should leave nothing on the bus for view models dropped without dispose', async () => {
    const createDropped = () => {
      new CalculatorViewModel(bus).addDigit('1')
    }
    for (let i = 0; i < 20; i++) createDropped()
    expect(bus.topicCount).toBe(21)

    await collectGarbage()
    scheduler.tick()

    expect(bus.topicCount).toBe(1)
    expect(bus.subscriberCount(vm.calculated)).toBe(1)
  })

  it('should stop receiving results after dispose', () => {
    keys('5', '+')
    vm.dispose()
    scheduler.tick()

    expect(vm.history.toArray()).toEqual([])
    expect(bus.subscriberCount(vm.calculated)).toBe(0)
  })
})
