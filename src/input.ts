export type InputType = 'command' | 'assignment' | 'number' | 'empty' | 'expression' | 'unknown'

// first match wins
const INPUT_PATTERNS: ReadonlyArray<readonly [InputType, RegExp]> = [
  ['command', /^\/[a-zA-Z]+$/],
  ['assignment', /^\w+\s*=/],
  ['number', /^[+-]?\d+$/],
  ['empty', /^\s*$/],
  ['expression', /^[^/]/]
]

export function classify (line: string): InputType {
  for (const [type, pattern] of INPUT_PATTERNS) {
    if (pattern.test(line)) return type
  }

  return 'unknown'
}
