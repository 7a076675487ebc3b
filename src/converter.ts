import { UnbalancedParentheses } from './errors.js'
import { isArithmetic, type Operator, type Token } from './token.js'

/**
 * Shunting-yard: turns an infix token stream into postfix order.
 *
 * Tokens are pulled one at a time, so a stray `)` aborts before the rest of
 * the line is even lexed.
 *
 * @throws {UnbalancedParentheses} when a `)` has no matching `(` or the
 * nesting level is not back at 0 once the input runs out
 */
export function toPostfix (tokens: Iterable<Token>): Token[] {
  const postfix: Token[] = []
  const operators: Operator[] = []

  let level = 0

  for (const token of tokens) {
    if (token.type === 'operand') {
      postfix.push(token)

      continue
    }

    switch (token.kind) {
      case 'LEFT_PAREN':
        operators.push(token)
        level++
        break
      case 'RIGHT_PAREN':
        level--

        while (true) {
          const top = operators.pop()

          if (top === undefined) throw new UnbalancedParentheses()

          if (top.kind === 'LEFT_PAREN') break

          postfix.push(top)
        }
        break
      default:
        // left-associative: equal tiers leave the stack first
        while (true) {
          const top = operators.at(-1)

          if (top === undefined || !isArithmetic(top) || top.tier < token.tier) break

          postfix.push(top)
          operators.pop()
        }

        operators.push(token)
        break
    }
  }

  if (level !== 0) throw new UnbalancedParentheses()

  while (operators.length > 0) {
    const top = operators.pop()

    if (top !== undefined) postfix.push(top)
  }

  return postfix
}
