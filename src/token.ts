import { ArithmeticFault } from './errors.js'

// bigint exponents are capped at the largest signed 32-bit integer
export const MAX_EXPONENT = 2147483647n

export type BinaryFunction = (a: bigint, b: bigint) => bigint

export type Operand =
  | { readonly type: 'operand', readonly name: string }
  | { readonly type: 'operand', readonly literal: bigint }

export enum Tier {
  ADDITIVE = 1,
  MULTIPLICATIVE = 2,
  EXPONENTIAL = 3
}

export type ArithmeticKind = 'ADD' | 'SUBTRACT' | 'MULTIPLY' | 'DIVIDE' | 'POWER'

export interface LeftParenthesis {
  readonly type: 'operator'
  readonly kind: 'LEFT_PAREN'
  readonly symbol: '('
}

export interface RightParenthesis {
  readonly type: 'operator'
  readonly kind: 'RIGHT_PAREN'
  readonly symbol: ')'
}

// structural only, never evaluated
export type Parenthesis = LeftParenthesis | RightParenthesis

export interface ArithmeticOperator {
  readonly type: 'operator'
  readonly kind: ArithmeticKind
  readonly symbol: string
  readonly tier: Tier
  readonly apply: BinaryFunction
}

export type Operator = Parenthesis | ArithmeticOperator

export type Token = Operand | Operator

function power (a: bigint, b: bigint): bigint {
  if (b < 0n) throw new ArithmeticFault('Negative exponent')
  if (b > MAX_EXPONENT) throw new ArithmeticFault('Exponent too large')

  return a ** b
}

export const LEFT_PAREN: LeftParenthesis = { type: 'operator', kind: 'LEFT_PAREN', symbol: '(' }

export const RIGHT_PAREN: RightParenthesis = { type: 'operator', kind: 'RIGHT_PAREN', symbol: ')' }

export const ADD: ArithmeticOperator = {
  type: 'operator',
  kind: 'ADD',
  symbol: '+',
  tier: Tier.ADDITIVE,
  apply: (a, b) => a + b
}

export const SUBTRACT: ArithmeticOperator = {
  type: 'operator',
  kind: 'SUBTRACT',
  symbol: '-',
  tier: Tier.ADDITIVE,
  apply: (a, b) => a - b
}

export const MULTIPLY: ArithmeticOperator = {
  type: 'operator',
  kind: 'MULTIPLY',
  symbol: '*',
  tier: Tier.MULTIPLICATIVE,
  apply: (a, b) => a * b
}

export const DIVIDE: ArithmeticOperator = {
  type: 'operator',
  kind: 'DIVIDE',
  symbol: '/',
  tier: Tier.MULTIPLICATIVE,
  apply: (a, b) => {
    if (b === 0n) throw new ArithmeticFault('Division by zero')

    // truncates toward zero
    return a / b
  }
}

export const POWER: ArithmeticOperator = {
  type: 'operator',
  kind: 'POWER',
  symbol: '^',
  tier: Tier.EXPONENTIAL,
  apply: power
}

export function literal (value: bigint): Operand {
  return { type: 'operand', literal: value }
}

export function identifier (name: string): Operand {
  return { type: 'operand', name }
}

export function isArithmetic (token: Token): token is ArithmeticOperator {
  return token.type === 'operator' && 'tier' in token
}

export function formatToken (token: Token): string {
  if (token.type === 'operator') return token.symbol

  return 'name' in token ? token.name : token.literal.toString()
}
