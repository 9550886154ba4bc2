import { createActor, type Actor } from 'xstate'
import { BindableObject, defineBindable } from '../bindable'
import { command, type CommandHandle } from '../command'
import type { MessageBus } from '../message-bus'
import { NotifiableProperty } from '../observable'
import { ObservableList } from '../observable-list'
import type { Topic } from '../topic'
import type { Operator, OperatorKey } from './logic'
import { calculatorMachine } from './machine'
import type { Rational } from './rational'

/**
 * View model of the calculator window. The arithmetic lives in the
 * `calculatorMachine` actor; this class mirrors its context into bindable
 * properties and exposes the keypad as commands.
 *
 * Every new result is emitted on `calculated` and, on the next bus tick,
 * appended to `history`.
 */
export class CalculatorViewModel extends BindableObject {
  declare inputText: string
  declare outputText: string
  declare addDigitCommand: CommandHandle<string>
  declare operatorCommand: CommandHandle<OperatorKey>

  readonly calculated: Topic<[output: string]>
  readonly history = new ObservableList<string>()
  private readonly actor: Actor<typeof calculatorMachine>

  constructor(messenger: MessageBus) {
    super(messenger)
    this.calculated = this.topic<[output: string]>('calculated')
    this.calculated.connect(this.recordResult, this)

    this.actor = createActor(calculatorMachine)
    this.actor.subscribe(snapshot => {
      this.sync(snapshot.context.input, snapshot.context.output)
    })
    this.actor.start()
  }

  get accumulator(): Rational {
    return this.actor.getSnapshot().context.accumulator
  }

  get pendingOperator(): Operator {
    return this.actor.getSnapshot().context.operator
  }

  addDigit(digit: string): void {
    this.actor.send({ type: 'DIGIT', digit })
  }

  pressOperator(key: OperatorKey): void {
    this.actor.send({ type: 'OPERATOR', key })
  }

  dispose(): void {
    this.actor.stop()
    super.dispose()
  }

  private recordResult(output: string): void {
    this.history.append(output)
  }

  private sync(input: string, output: string): void {
    const inputChanged = input !== this.inputText
    this.inputText = input
    if (output !== this.outputText) {
      this.outputText = output
      if (output !== '') this.calculated.emit(output)
    }
    if (inputChanged) this.operatorCommand.raiseCanExecuteChanged()
  }
}

defineBindable(CalculatorViewModel, {
  inputText: new NotifiableProperty({ initial: '' }),
  outputText: new NotifiableProperty({ initial: '' }),
  addDigitCommand: command<CalculatorViewModel, string>((vm, digit) => vm.addDigit(digit)),
  operatorCommand: command<CalculatorViewModel, OperatorKey>((vm, key) => vm.pressOperator(key))
    .canExecute((vm, key) => key !== 'C' || vm.inputText !== '')
})
