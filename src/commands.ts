import { COMMAND_MAP } from './command.js'

export const HELP_TEXT = [
  'Evaluates arithmetic on integers of any size.',
  '',
  '  operators    + - * / ^ and parentheses',
  '  variables    name = value (letters only; value is a number or another variable)',
  '  /help        show this message',
  '  /exit        leave',
  '',
  'Minus signs cancel in pairs: 5 - - 3 is 8. Division truncates toward zero.',
  'Operators of the same precedence group left to right: 2 ^ 3 ^ 2 is 64.'
].join('\n')

export const FAREWELL = 'Bye!'

COMMAND_MAP.set(
  'help',
  () => ({ kind: 'message', text: HELP_TEXT })
)

COMMAND_MAP.set(
  'exit',
  () => ({ kind: 'exit', text: FAREWELL })
)
