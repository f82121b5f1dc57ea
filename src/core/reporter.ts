import pino from 'pino'

/** Pipelines that emit events. */
export type PipelineName = 'build' | 'decompile' | 'merge' | 'instrument' | 'dump'

/** Reference to a stage for display and keying purposes. */
export type StageRef = {
  id: string;
  displayName: string;
}

/** Fields identifying one pipeline invocation. */
export type RunContext = {
  pipeline: PipelineName;
  runId: string;
}

/**
 * Discriminated union of pipeline execution events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - Pipeline invocation begins
 * 2. For each stage, in order:
 *    a. STAGE_STARTING - Stage passed its gates' turn and begins
 *    b. STAGE_LOG - Tool output line (stdout/stderr), zero or more
 *    c. STAGE_FINISHED - Stage succeeded
 *       OR STAGE_FAILED - Stage failed (pipeline stops for mandatory stages)
 *       OR STAGE_SKIPPED - Stage disabled by options or not requested
 * 3. PIPELINE_WARNING - Non-fatal problem (e.g., a failed dump), any time
 * 4. PIPELINE_FINISHED - Pipeline completed
 *    OR PIPELINE_FAILED - Pipeline aborted
 */
export type PipelineStartEvent = RunContext & {
  event: 'PIPELINE_START';
  target: string;
}

export type StageStartingEvent = RunContext & {
  event: 'STAGE_STARTING';
  stage: StageRef;
}

export type StageLogEvent = RunContext & {
  event: 'STAGE_LOG';
  stage: StageRef;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type StageFinishedEvent = RunContext & {
  event: 'STAGE_FINISHED';
  stage: StageRef;
  durationMs: number;
  artifact?: string;
}

export type StageSkippedEvent = RunContext & {
  event: 'STAGE_SKIPPED';
  stage: StageRef;
  reason: 'disabled' | 'not-requested' | 'existing';
}

export type StageFailedEvent = RunContext & {
  event: 'STAGE_FAILED';
  stage: StageRef;
  error: string;
  code?: string;
}

export type PipelineWarningEvent = RunContext & {
  event: 'PIPELINE_WARNING';
  message: string;
}

export type PipelineFinishedEvent = RunContext & {
  event: 'PIPELINE_FINISHED';
  durationMs: number;
  output?: string;
}

export type PipelineFailedEvent = RunContext & {
  event: 'PIPELINE_FAILED';
  error: string;
}

export type PipelineEvent =
  | PipelineStartEvent
  | StageStartingEvent
  | StageLogEvent
  | StageFinishedEvent
  | StageSkippedEvent
  | StageFailedEvent
  | PipelineWarningEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent

/**
 * Interface for reporting pipeline execution events.
 */
export type Reporter = {
  emit(event: PipelineEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: pino.Logger

  constructor(options?: {level?: string; destination?: pino.DestinationStream}) {
    const level = options?.level ?? 'info'
    this.logger = options?.destination ? pino({level}, options.destination) : pino({level})
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'STAGE_LOG': {
        this.logger.debug(event)
        break
      }

      case 'STAGE_FAILED':
      case 'PIPELINE_FAILED': {
        this.logger.error(event)
        break
      }

      case 'PIPELINE_WARNING': {
        this.logger.warn(event)
        break
      }

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Reporter that forwards every event to several reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: PipelineEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}

/** Reporter that drops every event. */
export const silentReporter: Reporter = {
  emit() {/* noop */}
}
