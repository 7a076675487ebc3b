export type ErrorKind =
  | 'LexFailure'
  | 'UnbalancedParentheses'
  | 'StackUnderflow'
  | 'SurplusOperands'
  | 'UnknownIdentifier'
  | 'InvalidIdentifier'
  | 'ArithmeticFault'
  | 'UnknownCommand'

export const INVALID_EXPRESSION = 'Invalid expression'

/**
 * Base class of every fault a single input line can raise.
 *
 * `index` is the column (in the trimmed line) the fault points at, when
 * there is one.
 */
export abstract class CalculatorError extends Error {
  public abstract readonly kind: ErrorKind
  public readonly index?: number

  constructor (message: string, index?: number) {
    super(message)

    this.name = new.target.name
    this.index = index
  }
}

export class LexFailure extends CalculatorError {
  public readonly kind = 'LexFailure'

  constructor (index: number) {
    super(INVALID_EXPRESSION, index)
  }
}

export class UnbalancedParentheses extends CalculatorError {
  public readonly kind = 'UnbalancedParentheses'

  constructor () {
    super(INVALID_EXPRESSION)
  }
}

export class StackUnderflow extends CalculatorError {
  public readonly kind = 'StackUnderflow'

  constructor () {
    super(INVALID_EXPRESSION)
  }
}

export class SurplusOperands extends CalculatorError {
  public readonly kind = 'SurplusOperands'

  constructor () {
    super(INVALID_EXPRESSION)
  }
}

export class UnknownIdentifier extends CalculatorError {
  public readonly kind = 'UnknownIdentifier'

  constructor () {
    super('Unknown variable')
  }
}

export class InvalidIdentifier extends CalculatorError {
  public readonly kind = 'InvalidIdentifier'

  constructor () {
    super('Invalid identifier')
  }
}

export class ArithmeticFault extends CalculatorError {
  public readonly kind = 'ArithmeticFault'
}

export class UnknownCommand extends CalculatorError {
  public readonly kind = 'UnknownCommand'

  constructor () {
    super('Unknown command')
  }
}
