import type {ToolInvocation, ToolRunResult} from './types.js'

/**
 * Log line from a tool execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during a tool execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Abstract interface for running external tools.
 *
 * Implementations:
 * - `ExecaToolRunner`: spawns local processes through execa
 * - Tests: scripted runners that simulate the tools in process
 *
 * A runner reports how the process ended and nothing more:
 * - the tool cannot be launched: `ToolNotFoundError`
 * - the timeout expires: `ToolTimeoutError`
 * - otherwise the exit code is returned, whatever it is
 *
 * Deciding whether a non-zero exit is fatal belongs to `invoke()`.
 */
export abstract class ToolRunner {
  /**
   * Runs a tool once.
   * @param invocation - Command, working directory and timeout
   * @param onLogLine - Callback for real-time stdout/stderr lines
   */
  abstract run(invocation: ToolInvocation, onLogLine?: OnLogLine): Promise<ToolRunResult>
}
