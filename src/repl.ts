#!/usr/bin/env node
import { loadConfig } from './config.js'
import { renderReply } from './pretty.js'
import { Session } from './session.js'
import { createInterface } from 'readline/promises'

const config = loadConfig()

const session = new Session({ debug: config.debug })

const rl = createInterface({
  input: process.stdin,
  output: process.stdout,
  terminal: false
})

rl.setPrompt(config.prompt)
rl.prompt()

for await (const line of rl) {
  try {
    const reply = session.evaluate(line)

    const { stdout, stderr } = renderReply(line.trim(), reply)

    if (stdout !== undefined) console.log(stdout)
    if (stderr !== undefined) console.error(stderr)

    if (reply.kind === 'exit') break
  } catch (error) {
    console.error(error)
  }

  rl.prompt()
}

rl.close()
