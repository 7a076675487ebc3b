import { type CalculatorError } from './errors.js'
import { type Reply } from './session.js'
import chalk from 'chalk'

/**
 * Renders a line fault in red, with a caret under the column it points at
 * when it has one.
 */
export function prettyError (input: string, error: CalculatorError): string {
  const lines: string[] = []

  if (error.index !== undefined) {
    lines.push(input)
    lines.push(`${' '.repeat(error.index)}^`)
  }

  lines.push(error.message)

  return lines.map(line => chalk.red(line)).join('\n')
}

export interface Output {
  stdout?: string
  stderr?: string
}

export function renderReply (input: string, reply: Reply): Output {
  switch (reply.kind) {
    case 'none':
      return {}
    case 'value':
      return { stdout: reply.value.toString() }
    case 'message':
    case 'exit':
      return { stdout: reply.text }
    case 'error':
      return { stderr: prettyError(input, reply.error) }
  }
}
