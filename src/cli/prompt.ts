import process from 'node:process'
import {createInterface} from 'node:readline/promises'
import type {UserPrompt} from '../core/instrumentation.js'

/**
 * Waits for Enter on the terminal. Interrupting the process is the only
 * way to abandon the wait.
 */
export class TerminalPrompt implements UserPrompt {
  constructor(
    private readonly input: NodeJS.ReadableStream = process.stdin,
    private readonly output: NodeJS.WritableStream = process.stderr
  ) {}

  async waitForUser(message: string): Promise<void> {
    const rl = createInterface({input: this.input, output: this.output})
    try {
      await rl.question(`\n${message}... `)
    } finally {
      rl.close()
    }
  }
}
