import { html, type TemplateResult } from 'lit-html'

import { useMessageBus } from '../ergonomic'
import type { MessageBus } from '../message-bus'
import { createView, type CommandBinding, type TemplateFunction, type View } from '../lit'
import { DIGIT_KEYS, OPERATOR_KEYS } from './logic'
import { CalculatorViewModel } from './view-model'

const key = (label: string, binding: CommandBinding): TemplateResult => html`
  <button type="button" data-key=${label} ?disabled=${binding.disabled} @click=${binding.onClick}>${label}</button>
`

/**
 * Window layout: result and input displays, the keypad and the list of
 * previous results.
 */
export const calculatorTemplate: TemplateFunction<CalculatorViewModel> = (vm, ctx) => html`
  <div class="calculator">
    <output class="output">${vm.outputText}</output>
    <output class="input">${vm.inputText}</output>
    <div class="digits">
      ${DIGIT_KEYS.map(digit => key(digit, ctx.command(vm.addDigitCommand, digit)))}
    </div>
    <div class="operators">
      ${OPERATOR_KEYS.map(operator => key(operator, ctx.command(vm.operatorCommand, operator)))}
    </div>
    <ol class="history">
      ${ctx.list(vm.history, (_result, index) => index, result => html`<li>${result}</li>`)}
    </ol>
  </div>
`

export interface MountedCalculator {
  readonly viewModel: CalculatorViewModel
  readonly view: View<CalculatorViewModel>
  unmount(): void
}

/**
 * Creates a calculator view model on `bus` (the context bus by default) and
 * renders it into `container`.
 */
export function mountCalculator(container: HTMLElement, bus: MessageBus = useMessageBus()): MountedCalculator {
  const viewModel = new CalculatorViewModel(bus)
  const view = createView(viewModel, container, calculatorTemplate)
  return {
    viewModel,
    view,
    unmount: () => {
      view.destroy()
      viewModel.dispose()
    }
  }
}
