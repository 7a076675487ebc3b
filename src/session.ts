import { COMMAND_MAP } from './command.js'
import './commands.js'
import { toPostfix } from './converter.js'
import { Environment, resolveOperandText } from './environment.js'
import {
  CalculatorError,
  InvalidIdentifier,
  UnknownCommand
} from './errors.js'
import { evaluatePostfix } from './evaluator.js'
import { classify } from './input.js'
import { IDENTIFIER, Lexer } from './lexer.js'
import { formatToken, type Token } from './token.js'
import chalk from 'chalk'

export type Reply =
  | { kind: 'none' }
  | { kind: 'value', value: bigint }
  | { kind: 'message', text: string }
  | { kind: 'error', error: CalculatorError }
  | { kind: 'exit', text: string }

export interface SessionOptions {
  debug?: boolean
}

const NONE: Reply = { kind: 'none' }

/**
 * One interactive session: owns the variables and runs each input line to
 * completion.
 */
export class Session {
  public readonly environment: Environment
  public readonly debug: boolean

  constructor (options: SessionOptions = {}, environment: Environment = new Environment()) {
    this.environment = environment
    this.debug = options.debug ?? false
  }

  protected trace (message: string): void {
    if (this.debug) console.debug(chalk.gray(message))
  }

  protected * traced (tokens: Iterable<Token>): Iterable<Token> {
    for (const token of tokens) {
      this.trace(`Token: ${formatToken(token)}`)

      yield token
    }
  }

  /**
   * Runs one line. Faults of the line come back as an `error` reply;
   * anything else is a bug and is thrown.
   */
  public evaluate (line: string): Reply {
    try {
      return this.dispatch(line)
    } catch (error) {
      if (error instanceof CalculatorError) return { kind: 'error', error }

      throw error
    }
  }

  public dispatch (line: string): Reply {
    const input = line.trim()

    switch (classify(input)) {
      case 'command':
        return this.runCommand(input.slice(1))
      case 'assignment':
        this.assign(input)
        return NONE
      case 'number':
        return { kind: 'value', value: resolveOperandText(input, this.environment) }
      case 'empty':
        return NONE
      case 'expression':
        return { kind: 'value', value: this.calculate(input) }
      case 'unknown':
        throw new UnknownCommand()
    }
  }

  public runCommand (name: string): Reply {
    const command = COMMAND_MAP.get(name)

    if (command === undefined) throw new UnknownCommand()

    return command(this)
  }

  /**
   * `name = value`, where value is an integer or an existing variable.
   * Nothing is written unless both sides are valid.
   */
  public assign (input: string): void {
    const separator = input.indexOf('=')

    const name = input.slice(0, separator).trim()
    const rhs = input.slice(separator + 1)

    if (!IDENTIFIER.test(name)) throw new InvalidIdentifier()

    const value = resolveOperandText(rhs, this.environment)

    this.environment.set(name, value)
  }

  public calculate (expression: string): bigint {
    const postfix = toPostfix(this.traced(new Lexer(expression)))

    this.trace(`Postfix: ${postfix.map(formatToken).join(' ')}`)

    return evaluatePostfix(postfix, this.environment)
  }
}
