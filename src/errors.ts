export class DroidsmithError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'DroidsmithError'
  }
}

export class ValidationError extends DroidsmithError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class ConfigurationError extends DroidsmithError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIG', message, options)
    this.name = 'ConfigurationError'
  }
}

export class LockTimeoutError extends DroidsmithError {
  constructor(readonly lockPath: string, readonly holderPid: number, options?: {cause?: unknown}) {
    super('LOCK_TIMEOUT', `Timed out waiting for lock ${lockPath} held by pid ${holderPid}`, options)
    this.name = 'LockTimeoutError'
  }
}

export class StagingError extends DroidsmithError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('STAGING_FAILED', message, options)
    this.name = 'StagingError'
  }
}

// -- Tool errors -------------------------------------------------------------

export class ToolExecutionError extends DroidsmithError {
  constructor(
    code: string,
    readonly tool: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'ToolExecutionError'
  }
}

export class ToolNotFoundError extends ToolExecutionError {
  constructor(tool: string, readonly installHint?: string, options?: {cause?: unknown}) {
    super('TOOL_NOT_FOUND', tool, installHint ? `Required tool not found: ${tool}\nInstall: ${installHint}` : `Required tool not found: ${tool}`, options)
    this.name = 'ToolNotFoundError'
  }
}

export class ToolTimeoutError extends ToolExecutionError {
  constructor(tool: string, readonly timeoutSec: number, options?: {cause?: unknown}) {
    super('TOOL_TIMEOUT', tool, `${tool} exceeded timeout of ${timeoutSec}s`, options)
    this.name = 'ToolTimeoutError'
  }
}

export class ToolExitError extends ToolExecutionError {
  constructor(
    tool: string,
    readonly exitCode: number,
    readonly stderr: string,
    options?: {cause?: unknown}
  ) {
    const detail = stderr.trim()
    super('TOOL_EXIT', tool, detail ? `${tool} failed with exit code ${exitCode}\n${detail}` : `${tool} failed with exit code ${exitCode}`, options)
    this.name = 'ToolExitError'
  }
}

export class ArtifactMissingError extends ToolExecutionError {
  constructor(tool: string, readonly artifact: string, options?: {cause?: unknown}) {
    super('ARTIFACT_MISSING', tool, `${tool} reported success but ${artifact} was not created`, options)
    this.name = 'ArtifactMissingError'
  }
}

// -- Stage errors ------------------------------------------------------------

export type StageFailureReason = 'precondition' | 'unresolved' | 'timeout' | 'exit' | 'artifact-missing' | 'other'

export type StageErrorContext = {
  stage: string;
  tool?: string;
  artifact?: string;
  cause?: unknown;
}

/**
 * Derives the failure reason from the error that made a stage fail.
 */
export function failureReason(cause: unknown): StageFailureReason {
  if (cause instanceof ValidationError) {
    return 'precondition'
  }

  if (cause instanceof ToolNotFoundError) {
    return 'unresolved'
  }

  if (cause instanceof ToolTimeoutError) {
    return 'timeout'
  }

  if (cause instanceof ArtifactMissingError) {
    return 'artifact-missing'
  }

  if (cause instanceof ToolExitError) {
    return 'exit'
  }

  return 'other'
}

export class StageError extends DroidsmithError {
  readonly stage: string
  readonly tool?: string
  readonly artifact?: string
  readonly reason: StageFailureReason

  constructor(code: string, message: string, context: StageErrorContext) {
    super(code, message, {cause: context.cause})
    this.name = 'StageError'
    this.stage = context.stage
    this.tool = context.tool ?? (context.cause instanceof ToolExecutionError ? context.cause.tool : undefined)
    this.artifact = context.artifact
    this.reason = failureReason(context.cause)
  }
}

function describe(summary: string, context: StageErrorContext): string {
  const parts = [summary]
  if (context.cause instanceof Error) {
    parts.push(context.cause.message)
  }

  return parts.join(': ')
}

export class BuildError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('BUILD_FAILED', describe(message, context), context)
    this.name = 'BuildError'
  }
}

export class AlignError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('ALIGN_FAILED', describe(message, context), context)
    this.name = 'AlignError'
  }
}

export class SignError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('SIGN_FAILED', describe(message, context), context)
    this.name = 'SignError'
  }
}

export class DecompileError extends StageError {
  readonly failures: Error[]

  constructor(message: string, context: StageErrorContext & {failures?: Error[]}) {
    const details = context.failures?.map(f => `  - ${f.message}`) ?? []
    super('DECOMPILE_FAILED', [describe(message, context), ...details].join('\n'), context)
    this.name = 'DecompileError'
    this.failures = context.failures ?? []
  }
}

export class MergeError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('MERGE_FAILED', describe(message, context), context)
    this.name = 'MergeError'
  }
}

export class InstrumentationError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('INSTRUMENTATION_FAILED', describe(message, context), context)
    this.name = 'InstrumentationError'
  }
}

export class InstallError extends StageError {
  constructor(message: string, context: StageErrorContext) {
    super('INSTALL_FAILED', describe(message, context), context)
    this.name = 'InstallError'
  }
}

export type DumpFailureReason = 'root-required' | 'read-failed' | 'empty'

export class DumpError extends StageError {
  constructor(
    readonly dumpReason: DumpFailureReason,
    message: string,
    context: StageErrorContext
  ) {
    super('DUMP_FAILED', describe(message, context), context)
    this.name = 'DumpError'
  }
}

export class FrameworkMismatchError extends DroidsmithError {
  constructor(
    readonly expected: string,
    readonly detected: string[],
    readonly apkPath: string,
    options?: {cause?: unknown}
  ) {
    const found = detected.length > 0 ? detected.join(', ') : 'none'
    super('FRAMEWORK_MISMATCH', `${apkPath} is not a ${expected} application. Detected frameworks: ${found}`, options)
    this.name = 'FrameworkMismatchError'
  }
}

/**
 * Checks the Node.js error code of a filesystem or process error.
 */
export function isErrnoCode(error: unknown, code: string): boolean {
  return error instanceof Error && 'code' in error && error.code === code
}
