/**
 * One invocation of an external tool.
 *
 * Invocations are immutable and run exactly once: a failure is reported to
 * the caller and never re-run automatically.
 */
export type ToolInvocation = {
  /** Tool name used in errors and reports (e.g., apktool) */
  tool: string;
  /** Executable followed by its arguments */
  command: readonly string[];
  /** Working directory (defaults to the current directory) */
  cwd?: string;
  /** Execution timeout in seconds (undefined = no timeout) */
  timeoutSec?: number;
  /** When false, a non-zero exit code is returned instead of raised (default true) */
  check?: boolean;
  /** Extra environment variables merged over the current environment */
  env?: Record<string, string>;
}

/**
 * Result of a tool execution that ran to completion.
 */
export type ToolRunResult = {
  /** Exit code (0 = success, non-zero = failure) */
  exitCode: number;
  /** Buffered stdout */
  stdout: string;
  /** Buffered stderr */
  stderr: string;
  /** Execution start timestamp */
  startedAt: Date;
  /** Execution end timestamp */
  finishedAt: Date;
}

/**
 * Artifact a stage is expected to leave on disk.
 */
export type ExpectedArtifact = {
  path: string;
  kind: 'file' | 'directory';
}
