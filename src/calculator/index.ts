export { Rational } from './rational'
export {
  createCalculatorState,
  pressDigit,
  pressOperator,
  isOperatorKey,
  DIGIT_KEYS,
  OPERATOR_KEYS,
  type CalculatorState,
  type Operator,
  type OperatorKey,
  type ClearKey
} from './logic'
export { calculatorMachine, type CalculatorEvent } from './machine'
export { CalculatorViewModel } from './view-model'
export { calculatorTemplate, mountCalculator, type MountedCalculator } from './view'
