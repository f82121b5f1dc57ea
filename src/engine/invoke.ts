import {stat} from 'node:fs/promises'
import {ArtifactMissingError, ToolExitError} from '../errors.js'
import type {ToolRunner, OnLogLine} from './executor.js'
import type {ExpectedArtifact, ToolInvocation, ToolRunResult} from './types.js'

/**
 * Runs an invocation once. A non-zero exit raises `ToolExitError` unless the
 * invocation sets `check: false`.
 */
export async function invoke(runner: ToolRunner, invocation: ToolInvocation, onLogLine?: OnLogLine): Promise<ToolRunResult> {
  const result = await runner.run(invocation, onLogLine)
  if (result.exitCode !== 0 && invocation.check !== false) {
    throw new ToolExitError(invocation.tool, result.exitCode, tail(result.stderr || result.stdout))
  }

  return result
}

/**
 * Asserts that a tool left its declared artifact on disk.
 * @throws {ArtifactMissingError} If the path is missing or of the wrong kind
 */
export async function assertArtifact(tool: string, artifact: ExpectedArtifact): Promise<void> {
  const stats = await stat(artifact.path).catch(() => undefined)
  const present = artifact.kind === 'file' ? stats?.isFile() : stats?.isDirectory()
  if (!present) {
    throw new ArtifactMissingError(tool, artifact.path)
  }
}

function tail(output: string, maxLines = 20): string {
  const lines = output.trimEnd().split('\n')
  return lines.slice(-maxLines).join('\n')
}
