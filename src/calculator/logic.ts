/**
 * Four-function running-total calculator as pure transitions over
 * `CalculatorState`. The xstate machine in `machine.ts` drives them.
 */

import { Rational } from './rational'

export type Operator = '+' | '-' | 'x' | '/' | '='
export type ClearKey = 'C' | 'AC'
export type OperatorKey = Operator | ClearKey

export const DIGIT_KEYS = ['7', '8', '9', '4', '5', '6', '1', '2', '3', '0', '.'] as const
export const OPERATOR_KEYS: readonly OperatorKey[] = ['AC', 'C', '/', 'x', '-', '+', '=']

export interface CalculatorState {
  /** Digits typed since the last operator. */
  readonly input: string
  /** Display text of the running total, empty until the first result. */
  readonly output: string
  readonly accumulator: Rational
  /** Operator applied to the accumulator when the next operator is pressed. */
  readonly operator: Operator
}

export function createCalculatorState(): CalculatorState {
  return { input: '', output: '', accumulator: Rational.ZERO, operator: '=' }
}

const operations: Record<Operator, (accumulator: Rational, operand: Rational) => Rational> = {
  '+': (accumulator, operand) => accumulator.add(operand),
  '-': (accumulator, operand) => accumulator.subtract(operand),
  'x': (accumulator, operand) => accumulator.multiply(operand),
  '/': (accumulator, operand) => accumulator.divide(operand),
  '=': (_accumulator, operand) => operand
}

export function isOperatorKey(key: string): key is OperatorKey {
  return OPERATOR_KEYS.some(candidate => candidate === key)
}

/**
 * Appends `digit` to the input when the result still reads as a number;
 * otherwise the keystroke is ignored.
 */
export function pressDigit(state: CalculatorState, digit: string): CalculatorState {
  const input = state.input + digit
  return Rational.isDecimal(input) ? { ...state, input } : state
}

/**
 * - `AC` clears everything, `C` clears the input.
 * - With no input, the key replaces the pending operator.
 * - Dividing by zero resets the calculator instead of failing.
 * - Otherwise the pending operator is applied and `key` becomes pending.
 */
export function pressOperator(state: CalculatorState, key: OperatorKey): CalculatorState {
  if (key === 'AC') return createCalculatorState()
  if (key === 'C') return { ...state, input: '' }
  if (state.input === '') return { ...state, operator: key }

  const operand = Rational.parse(state.input)
  if (state.operator === '/' && operand.isZero()) return createCalculatorState()

  const accumulator = operations[state.operator](state.accumulator, operand)
  return {
    input: '',
    output: accumulator.toFloatString(),
    accumulator,
    operator: key
  }
}
