import {randomUUID} from 'node:crypto'
import {checkGates, type ValidationGate} from '../engine/gates.js'
import {assertArtifact, invoke} from '../engine/invoke.js'
import type {ToolRunner} from '../engine/executor.js'
import type {ExpectedArtifact, ToolInvocation, ToolRunResult} from '../engine/types.js'
import {DroidsmithError} from '../errors.js'
import type {StageSummary} from '../types.js'
import type {Settings} from './config.js'
import type {ToolLocator} from './tool-locator.js'
import type {PipelineName, Reporter, RunContext, StageRef} from './reporter.js'

/**
 * Stage that runs one tool invocation behind its validation gates.
 *
 * A deferred invocation is built after the gates pass, so a missing tool is
 * only looked up for inputs that are valid.
 */
export type ToolStage = {
  ref: StageRef;
  gates?: readonly ValidationGate[];
  invocation: ToolInvocation | (() => Promise<ToolInvocation>);
}

/**
 * Tool stage that must leave an artifact on disk.
 */
export type ArtifactStage = ToolStage & {
  artifact: ExpectedArtifact;
}

/** Maps the error that failed a stage to the error the pipeline raises. */
export type FailureMapper = (cause: unknown) => Error

/**
 * Collaborators every pipeline is constructed with.
 */
export type PipelineDeps = {
  runner: ToolRunner;
  tools: ToolLocator;
  reporter: Reporter;
  settings: Settings;
  /** Parent directory of staging areas (defaults to the OS temp directory) */
  stagingRoot?: string;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error)
}

/**
 * One invocation of a pipeline: identifies the run in every event it emits
 * and records which stages ran.
 *
 * Stages are executed one at a time, in the order the pipeline calls them.
 */
export class PipelineRun {
  /**
   * Starts a run and emits PIPELINE_START.
   * @param target - Input the pipeline works on (APK, directory, package)
   */
  static start(reporter: Reporter, pipeline: PipelineName, target: string): PipelineRun {
    const run = new PipelineRun(reporter, {pipeline, runId: `${Date.now()}-${randomUUID().slice(0, 8)}`})
    reporter.emit({...run.context, event: 'PIPELINE_START', target})
    return run
  }

  readonly stages: StageSummary[] = []
  private readonly startedAt = Date.now()

  private constructor(
    private readonly reporter: Reporter,
    readonly context: RunContext
  ) {}

  /**
   * Checks the gates, invokes the tool and asserts its artifact exists.
   * @returns The artifact path
   */
  async runStage(runner: ToolRunner, stage: ArtifactStage, fail?: FailureMapper): Promise<string> {
    await this.track(stage.ref, async () => {
      const {tool} = await this.invokeGated(runner, stage)
      await assertArtifact(tool, stage.artifact)
    }, fail, stage.artifact.path)
    return stage.artifact.path
  }

  /**
   * Checks the gates and invokes the tool; no artifact is expected.
   */
  async runTool(runner: ToolRunner, stage: ToolStage, fail?: FailureMapper): Promise<ToolRunResult> {
    return this.track(stage.ref, async () => (await this.invokeGated(runner, stage)).result, fail)
  }

  /**
   * Runs in-process work as a tracked stage.
   */
  async step<T>(ref: StageRef, fn: () => Promise<T>, fail?: FailureMapper, artifact?: string): Promise<T> {
    return this.track(ref, fn, fail, artifact)
  }

  skip(ref: StageRef, reason: 'disabled' | 'not-requested' | 'existing'): void {
    this.stages.push({id: ref.id, ran: false, ok: false})
    this.reporter.emit({...this.context, event: 'STAGE_SKIPPED', stage: ref, reason})
  }

  warn(message: string): void {
    this.reporter.emit({...this.context, event: 'PIPELINE_WARNING', message})
  }

  finish(output?: string): void {
    this.reporter.emit({...this.context, event: 'PIPELINE_FINISHED', durationMs: Date.now() - this.startedAt, output})
  }

  failed(error: unknown): void {
    this.reporter.emit({...this.context, event: 'PIPELINE_FAILED', error: errorMessage(error)})
  }

  /**
   * Runs `fn` and reports the pipeline as finished or failed.
   */
  async complete<T>(fn: () => Promise<T>, output: (value: T) => string | undefined): Promise<T> {
    try {
      const value = await fn()
      this.finish(output(value))
      return value
    } catch (error) {
      this.failed(error)
      throw error
    }
  }

  private async invokeGated(runner: ToolRunner, stage: ToolStage): Promise<{tool: string; result: ToolRunResult}> {
    await checkGates(stage.gates ?? [])
    const invocation = typeof stage.invocation === 'function' ? await stage.invocation() : stage.invocation
    const result = await invoke(runner, invocation, ({stream, line}) => {
      this.reporter.emit({...this.context, event: 'STAGE_LOG', stage: stage.ref, stream, line})
    })
    return {tool: invocation.tool, result}
  }

  private async track<T>(ref: StageRef, fn: () => Promise<T>, fail?: FailureMapper, artifact?: string): Promise<T> {
    const startedAt = Date.now()
    this.reporter.emit({...this.context, event: 'STAGE_STARTING', stage: ref})
    try {
      const value = await fn()
      const durationMs = Date.now() - startedAt
      this.stages.push({id: ref.id, ran: true, ok: true, artifact, durationMs})
      this.reporter.emit({...this.context, event: 'STAGE_FINISHED', stage: ref, durationMs, artifact})
      return value
    } catch (error) {
      const mapped = fail ? fail(error) : error
      this.stages.push({id: ref.id, ran: true, ok: false, durationMs: Date.now() - startedAt})
      this.reporter.emit({
        ...this.context,
        event: 'STAGE_FAILED',
        stage: ref,
        error: errorMessage(mapped),
        code: mapped instanceof DroidsmithError ? mapped.code : undefined
      })
      throw mapped
    }
  }
}
