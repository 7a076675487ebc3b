import { resolveOperand, type Environment } from './environment.js'
import { ArithmeticFault, StackUnderflow, SurplusOperands } from './errors.js'
import { isArithmetic, type ArithmeticOperator, type Token } from './token.js'

function apply (operator: ArithmeticOperator, a: bigint, b: bigint): bigint {
  try {
    return operator.apply(a, b)
  } catch (error) {
    // V8 refuses to allocate bigints past its size limit
    if (error instanceof RangeError) throw new ArithmeticFault('Result too large')

    throw error
  }
}

/**
 * Evaluates a postfix token sequence against an environment.
 *
 * The first unknown variable aborts the whole evaluation.
 */
export function evaluatePostfix (postfix: Iterable<Token>, environment: Environment): bigint {
  const stack: bigint[] = []

  for (const token of postfix) {
    if (token.type === 'operand') {
      stack.push(resolveOperand(token, environment))

      continue
    }

    // a parenthesis never survives conversion
    if (!isArithmetic(token)) throw new StackUnderflow()

    const b = stack.pop()
    const a = stack.pop()

    if (a === undefined || b === undefined) throw new StackUnderflow()

    stack.push(apply(token, a, b))
  }

  const [result, ...rest] = stack

  if (result === undefined || rest.length > 0) throw new SurplusOperands()

  return result
}
