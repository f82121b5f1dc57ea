import process from 'node:process'
import {mkdir} from 'node:fs/promises'
import {basename, extname, join, resolve} from 'node:path'
import {apkGates, checkGates} from '../engine/gates.js'
import {DecompileError, ValidationError} from '../errors.js'
import type {DecompileResult, StageOutcome} from '../types.js'
import {PipelineRun, type ArtifactStage, type PipelineDeps} from './pipeline-run.js'
import {toolCall} from './tool-locator.js'

export type DecompileOptions = {
  apkPath: string;
  /** Root output directory (default `./<apk name without extension>`) */
  outputDir?: string;
  /** Extract Java sources with jadx into `<outputDir>/java` (default true) */
  java?: boolean;
  /** Extract smali and resources with apktool into `<outputDir>/smali` (default true) */
  smali?: boolean;
  /** Check the ZIP header of the input (default true) */
  strict?: boolean;
  timeoutSec?: number;
}

const stages = {
  java: {id: 'java', displayName: 'Extract Java sources'},
  smali: {id: 'smali', displayName: 'Extract smali and resources'}
}

export function defaultDecompileOutput(apkPath: string, cwd = process.cwd()): string {
  return join(cwd, basename(apkPath, extname(apkPath)))
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error))
}

/**
 * Extracts Java sources and smali from an APK.
 *
 * Both extractions are attempted when requested; one failing does not stop
 * the other. The pipeline fails only when every requested extraction failed.
 */
export class DecompilePipeline {
  constructor(private readonly deps: PipelineDeps) {}

  /**
   * @throws {ValidationError} If the input is not an APK or nothing is requested
   * @throws {DecompileError} If every requested extraction failed
   */
  async run(options: DecompileOptions): Promise<DecompileResult> {
    const run = PipelineRun.start(this.deps.reporter, 'decompile', options.apkPath)
    return run.complete(async () => this.execute(run, options), result => result.outputDir)
  }

  private async execute(run: PipelineRun, options: DecompileOptions): Promise<DecompileResult> {
    const {java = true, smali = true, strict = true} = options
    const apkPath = resolve(options.apkPath)
    const outputDir = resolve(options.outputDir ?? defaultDecompileOutput(apkPath))
    const timeoutSec = options.timeoutSec ?? this.deps.settings.toolTimeoutSec

    if (!java && !smali) {
      throw new ValidationError('Nothing to decompile: request Java sources, smali, or both')
    }

    await checkGates(apkGates(apkPath, {strict}))
    await mkdir(outputDir, {recursive: true})

    let javaOutcome: StageOutcome | undefined
    if (java) {
      const javaDir = join(outputDir, 'java')
      javaOutcome = await this.attempt(run, {
        ref: stages.java,
        invocation: toolCall(this.deps.tools, 'jadx', ['-d', javaDir, apkPath], {timeoutSec}),
        artifact: {path: javaDir, kind: 'directory'}
      }, 'jadx')
    } else {
      run.skip(stages.java, 'not-requested')
    }

    let smaliOutcome: StageOutcome | undefined
    if (smali) {
      const smaliDir = join(outputDir, 'smali')
      smaliOutcome = await this.attempt(run, {
        ref: stages.smali,
        invocation: toolCall(this.deps.tools, 'apktool', ['d', '-o', smaliDir, apkPath, '-f'], {timeoutSec}),
        artifact: {path: smaliDir, kind: 'directory'}
      }, 'apktool')
    } else {
      run.skip(stages.smali, 'not-requested')
    }

    const requested = [javaOutcome, smaliOutcome].filter((outcome): outcome is StageOutcome => outcome !== undefined)
    const failures = requested.flatMap(outcome => (outcome.ok ? [] : [outcome.error]))
    if (failures.length === requested.length) {
      throw new DecompileError(`Every requested decompilation of ${apkPath} failed`, {stage: 'decompile', artifact: outputDir, failures})
    }

    for (const failure of failures) {
      run.warn(failure.message)
    }

    return {
      apkPath,
      outputDir,
      java: javaOutcome,
      smali: smaliOutcome,
      javaSuccess: javaOutcome?.ok ?? false,
      smaliSuccess: smaliOutcome?.ok ?? false,
      stages: [...run.stages]
    }
  }

  private async attempt(run: PipelineRun, stage: ArtifactStage, tool: string): Promise<StageOutcome> {
    try {
      const path = await run.runStage(this.deps.runner, stage, cause => new DecompileError(`${tool} decompilation failed`, {stage: stage.ref.id, tool, artifact: stage.artifact.path, cause}))
      return {ok: true, path}
    } catch (error) {
      return {ok: false, error: toError(error)}
    }
  }
}
