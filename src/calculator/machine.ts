/**
 * Calculator state machine (XState)
 * =================================
 *
 * A single-state machine whose context is the calculator's `CalculatorState`.
 * Key presses arrive as `DIGIT` and `OPERATOR` events; the transitions are the
 * pure functions of `logic.ts`.
 *
 * @dependency xstate
 */

import { assign, setup } from 'xstate'
import { createCalculatorState, pressDigit, pressOperator, type CalculatorState, type OperatorKey } from './logic'

export type CalculatorEvent =
  | { type: 'DIGIT'; digit: string }
  | { type: 'OPERATOR'; key: OperatorKey }

export const calculatorMachine = setup({
  types: {
    context: {} as CalculatorState,
    events: {} as CalculatorEvent
  },
  actions: {
    appendDigit: assign(({ context, event }) =>
      event.type === 'DIGIT' ? pressDigit(context, event.digit) : context
    ),
    applyOperator: assign(({ context, event }) =>
      event.type === 'OPERATOR' ? pressOperator(context, event.key) : context
    )
  }
}).createMachine({
  id: 'calculator',
  context: () => createCalculatorState(),
  on: {
    DIGIT: { actions: 'appendDigit' },
    OPERATOR: { actions: 'applyOperator' }
  }
})
