import { Environment } from './environment.js'
import { Session } from './session.js'

export { COMMAND_MAP, type Command } from './command.js'
export { FAREWELL, HELP_TEXT } from './commands.js'
export { DEFAULT_CONFIG, loadConfig, type Config } from './config.js'
export { toPostfix } from './converter.js'
export { Environment, resolveOperand, resolveOperandText } from './environment.js'
export * from './errors.js'
export { evaluatePostfix } from './evaluator.js'
export { classify, type InputType } from './input.js'
export { Lexer, RULES, tokenize, type Boundary, type Rule } from './lexer.js'
export { prettyError, renderReply, type Output } from './pretty.js'
export { Session, type Reply, type SessionOptions } from './session.js'
export * from './token.js'

/**
 * Evaluates a single infix expression, e.g. `calculate('(2 + 3) * x', { x: 4n })`.
 */
export function calculate (expression: string, variables: Record<string, bigint> = {}): bigint {
  const environment = new Environment()

  for (const [name, value] of Object.entries(variables)) {
    environment.set(name, value)
  }

  return new Session({}, environment).calculate(expression)
}
