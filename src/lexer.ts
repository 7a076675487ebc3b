import { LexFailure } from './errors.js'
import {
  ADD,
  DIVIDE,
  LEFT_PAREN,
  MULTIPLY,
  POWER,
  RIGHT_PAREN,
  SUBTRACT,
  identifier,
  literal,
  type Token
} from './token.js'

export const INTEGER = /^[+-]?\d+$/

export const IDENTIFIER = /^[a-zA-Z]+$/

// none     = parentheses stand on their own
// operand  = must not run straight into another word character
// operator = must be followed by a word, a parenthesis or the end of the line
export type Boundary = 'none' | 'operand' | 'operator'

export interface Rule {
  // sticky, so that it only ever matches at the current index
  readonly pattern: RegExp
  readonly boundary: Boundary
  readonly create: (text: string) => Token
}

const BOUNDARY_PATTERN: Record<Boundary, RegExp | undefined> = {
  none: undefined,
  operand: /(?!\w)/y,
  operator: /(?=\s*(?:\w|[()]|$))/y
}

export function parseInteger (text: string): bigint {
  return BigInt(text.startsWith('+') ? text.slice(1) : text)
}

function countMinus (text: string): number {
  let count = 0

  for (const character of text) {
    if (character === '-') count++
  }

  return count
}

// Operators come first: a sign in front of a digit is always read as an
// operator, and parentheses must never be taken for part of an operand.
export const RULES: readonly Rule[] = [
  { pattern: /\(/y, boundary: 'none', create: () => LEFT_PAREN },
  { pattern: /\)/y, boundary: 'none', create: () => RIGHT_PAREN },
  { pattern: /\+(?:\s*\+)*/y, boundary: 'operator', create: () => ADD },
  {
    pattern: /-(?:\s*-)*/y,
    boundary: 'operator',
    create: text => countMinus(text) % 2 === 0 ? ADD : SUBTRACT
  },
  { pattern: /\*/y, boundary: 'operator', create: () => MULTIPLY },
  { pattern: /\//y, boundary: 'operator', create: () => DIVIDE },
  { pattern: /\^/y, boundary: 'operator', create: () => POWER },
  { pattern: /[+-]?\d+/y, boundary: 'operand', create: text => literal(parseInteger(text)) },
  { pattern: /[a-zA-Z]+/y, boundary: 'operand', create: identifier }
]

// consume = move past input
// seek    = look without moving
// read    = seek & consume
export class Lexer implements Iterable<Token> {
  public readonly buffer: string
  public index: number

  constructor (buffer: string, index: number = 0) {
    this.buffer = buffer
    this.index = index
  }

  public consume (length: number): void {
    this.index += length
  }

  public consumeWhitespace (): void {
    while (/\s/.test(this.seekCharacter() ?? '')) {
      this.index++
    }
  }

  public seekCharacter (): string | undefined {
    return this.buffer[this.index]
  }

  public get exhausted (): boolean {
    return this.index >= this.buffer.length
  }

  protected seekRule (rule: Rule): string | undefined {
    rule.pattern.lastIndex = this.index

    const match = rule.pattern.exec(this.buffer)

    if (match === null) return undefined

    const text = match[0]

    const boundary = BOUNDARY_PATTERN[rule.boundary]

    if (boundary !== undefined) {
      boundary.lastIndex = this.index + text.length

      if (!boundary.test(this.buffer)) return undefined
    }

    return text
  }

  /**
   * Reads the next token, or `undefined` once only whitespace is left.
   *
   * @throws {LexFailure} when no rule matches at the current index
   */
  public readToken (): Token | undefined {
    this.consumeWhitespace()

    if (this.exhausted) return undefined

    for (const rule of RULES) {
      const text = this.seekRule(rule)

      if (text === undefined) continue

      this.consume(text.length)
      this.consumeWhitespace()

      return rule.create(text)
    }

    throw new LexFailure(this.index)
  }

  public * [Symbol.iterator] (): Iterator<Token> {
    while (true) {
      const token = this.readToken()

      if (token === undefined) return

      yield token
    }
  }
}

export function tokenize (line: string): Token[] {
  return [...new Lexer(line)]
}
