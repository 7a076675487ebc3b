import { InvalidIdentifier, UnknownIdentifier } from './errors.js'
import { IDENTIFIER, INTEGER, parseInteger } from './lexer.js'
import { type Operand } from './token.js'

/**
 * Variables of one session. Entries are only ever added or overwritten.
 */
export class Environment {
  private readonly variables = new Map<string, bigint>()

  public has (name: string): boolean {
    return this.variables.has(name)
  }

  public get (name: string): bigint {
    const value = this.variables.get(name)

    if (value === undefined) throw new UnknownIdentifier()

    return value
  }

  public set (name: string, value: bigint): void {
    this.variables.set(name, value)
  }

  public get size (): number {
    return this.variables.size
  }
}

export function resolveOperand (operand: Operand, environment: Environment): bigint {
  return 'name' in operand ? environment.get(operand.name) : operand.literal
}

/**
 * Resolves a bare operand written as text: a signed integer or the name of
 * an existing variable. Used for assignment right-hand sides and lines that
 * hold a single number.
 */
export function resolveOperandText (text: string, environment: Environment): bigint {
  const trimmed = text.trim()

  if (INTEGER.test(trimmed)) return parseInteger(trimmed)

  if (IDENTIFIER.test(trimmed)) return environment.get(trimmed)

  throw new InvalidIdentifier()
}
