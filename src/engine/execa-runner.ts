import {execa} from 'execa'
import {ToolNotFoundError, ToolTimeoutError} from '../errors.js'
import type {ToolInvocation, ToolRunResult} from './types.js'
import {ToolRunner, type OnLogLine} from './executor.js'

async function pumpLines(lines: AsyncIterable<string>, stream: 'stdout' | 'stderr', onLogLine: OnLogLine): Promise<void> {
  for await (const line of lines) {
    onLogLine({stream, line})
  }
}

/**
 * Runs tools as local processes.
 */
export class ExecaToolRunner extends ToolRunner {
  async run(invocation: ToolInvocation, onLogLine?: OnLogLine): Promise<ToolRunResult> {
    const [file, ...args] = invocation.command
    if (!file) {
      throw new ToolNotFoundError(invocation.tool)
    }

    const startedAt = new Date()
    const proc = execa(file, args, {
      cwd: invocation.cwd,
      env: invocation.env,
      reject: false,
      timeout: invocation.timeoutSec ? invocation.timeoutSec * 1000 : undefined
    })

    // Handlers are attached right away so an early stream error is never unhandled
    const pumps = onLogLine
      ? Promise.allSettled([
        pumpLines(proc.iterable({from: 'stdout'}), 'stdout', onLogLine),
        pumpLines(proc.iterable({from: 'stderr'}), 'stderr', onLogLine)
      ])
      : Promise.resolve([])

    const result = await proc
    await pumps

    if (result.timedOut) {
      throw new ToolTimeoutError(invocation.tool, invocation.timeoutSec ?? 0)
    }

    if (result.exitCode === undefined && !result.isTerminated) {
      throw new ToolNotFoundError(invocation.tool, undefined, {cause: result})
    }

    const stderr = result.isTerminated && result.signal
      ? [result.stderr, `terminated by ${result.signal}`].filter(Boolean).join('\n')
      : result.stderr

    return {
      exitCode: result.exitCode ?? 1,
      stdout: result.stdout,
      stderr,
      startedAt,
      finishedAt: new Date()
    }
  }
}
