import chalk from 'chalk'

export interface Config {
  prompt: string
  debug: boolean
}

export const DEFAULT_CONFIG: Config = {
  prompt: '> ',
  debug: false
}

const TRUTHY = new Set(['1', 'true', 'yes', 'on'])
const FALSY = new Set(['', '0', 'false', 'no', 'off'])

function parseFlag (name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback

  const normalized = value.trim().toLowerCase()

  if (TRUTHY.has(normalized)) return true
  if (FALSY.has(normalized)) return false

  console.warn(chalk.yellow(`Ignoring ${name}=${JSON.stringify(value)}, expected 1/true or 0/false`))

  return fallback
}

export function loadConfig (env: NodeJS.ProcessEnv = process.env): Config {
  return {
    prompt: env.CALCULATOR_PROMPT ?? DEFAULT_CONFIG.prompt,
    debug: parseFlag('CALCULATOR_DEBUG', env.CALCULATOR_DEBUG, DEFAULT_CONFIG.debug)
  }
}
