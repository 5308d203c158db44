/**
 * keyscout console
 *
 * Usage: npm run cli
 * Reads one request per line and prints the assistant's answer. Logs go to
 * stderr so stdout carries only the conversation.
 */

import 'dotenv/config'
import { createInterface } from 'readline/promises'
import { stdin as input, stdout as output } from 'process'
import { createKeyscout } from './bootstrap/create-keyscout'
import type { Keyscout } from './bootstrap/create-keyscout'
import { ConfigurationError, validateEnvironmentConfig } from './config/environment'
import { Observability } from './observability'

const QUIT_COMMANDS = new Set(['quit', 'exit', 'bye'])

const EXAMPLES = [
  'List all my secrets',
  'Get the secret secrets/MySecondSecret',
  'How many secrets of each type do I have?',
  'Show rotated secrets under /prod',
]

function isQuitCommand(line: string): boolean {
  return QUIT_COMMANDS.has(line.trim().toLowerCase())
}

async function main(): Promise<number> {
  let keyscout: Keyscout
  try {
    validateEnvironmentConfig()
    keyscout = createKeyscout(process.env, {
      observability: new Observability({
        level: process.env.LOG_LEVEL || 'warn',
        pretty: process.env.NODE_ENV !== 'production',
        destination: 2,
      }),
    })
  } catch (error) {
    if (error instanceof ConfigurationError) {
      console.error(error.message)
      if (error.details?.missing) console.error('\nSet AKEYLESS_ACCESS_ID, AKEYLESS_ACCESS_KEY and GEMINI_API_KEY (optionally AKEYLESS_GATEWAY_URL) in the environment or a .env file.')
      return 1
    }
    throw error
  }

  const session = keyscout.createSession()

  console.log('keyscout - ask about your Akeyless secrets. Type "quit" to leave.')
  console.log('Try:')
  for (const example of EXAMPLES) {
    console.log(`  - ${example}`)
  }
  console.log()

  const rl = createInterface({ input, output })
  rl.setPrompt('You: ')
  rl.prompt()

  try {
    // The iterator ends at end-of-input
    for await (const line of rl) {
      if (isQuitCommand(line)) break

      if (line.trim() !== '') {
        const turn = await keyscout.assistant.handleTurn(session, line)
        console.log(`Agent: ${turn.response}\n`)
      }
      rl.prompt()
    }
  } finally {
    rl.close()
  }

  console.log('Goodbye!')
  return 0
}

main()
  .then(code => {
    process.exitCode = code
  })
  .catch(error => {
    console.error('Fatal error:', error instanceof Error ? error.message : error)
    process.exitCode = 1
  })
