import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {PipelineEvent, Reporter, StageFailedEvent, StageFinishedEvent, StageSkippedEvent} from '../core/reporter.js'

const skipLabels: Record<StageSkippedEvent['reason'], string> = {
  disabled: '(disabled)',
  'not-requested': '(not requested)',
  existing: '(already present)'
}

/**
 * Stage timing as shown next to a spinner: milliseconds below one second,
 * tenths of a second below one minute, then minutes and padded seconds.
 */
export function formatElapsed(ms: number): string {
  if (ms < 1000) {
    return `${Math.round(ms)}ms`
  }

  if (ms < 60_000) {
    return `${(ms / 1000).toFixed(1)}s`
  }

  const totalSeconds = Math.round(ms / 1000)
  const seconds = String(totalSeconds % 60).padStart(2, '0')
  return `${Math.floor(totalSeconds / 60)}m${seconds}s`
}

/**
 * Reporter with spinners for terminal sessions.
 * Writes to stderr so that stdout carries only command results.
 */
export class InteractiveReporter implements Reporter {
  private static get maxStderrLines() {
    return 20
  }

  private readonly verbose: boolean
  private readonly stageSpinners = new Map<string, Ora>()
  private readonly stderrBuffers = new Map<string, string[]>()

  constructor(options?: {verbose?: boolean}) {
    this.verbose = options?.verbose ?? false
  }

  emit(event: PipelineEvent): void {
    switch (event.event) {
      case 'PIPELINE_START': {
        console.error(chalk.bold(`\n▶ ${event.pipeline}: ${chalk.cyan(event.target)}\n`))
        break
      }

      case 'STAGE_STARTING': {
        const spinner = ora({text: event.stage.displayName, prefixText: ' '}).start()
        this.stageSpinners.set(event.stage.id, spinner)
        break
      }

      case 'STAGE_LOG': {
        this.handleLog(event.stage.id, event.stream, event.line)
        break
      }

      case 'STAGE_SKIPPED': {
        console.error(`  ${chalk.gray('⊙')} ${chalk.gray(`${event.stage.displayName} ${skipLabels[event.reason]}`)}`)
        break
      }

      case 'STAGE_FINISHED': {
        this.handleStageFinished(event)
        break
      }

      case 'STAGE_FAILED': {
        this.handleStageFailed(event)
        break
      }

      case 'PIPELINE_WARNING': {
        console.error(chalk.yellow(`  ! ${event.message}`))
        break
      }

      case 'PIPELINE_FINISHED': {
        const suffix = event.output ? `: ${event.output}` : ''
        console.error(chalk.bold.green(`\n✓ Completed in ${formatElapsed(event.durationMs)}${suffix}\n`))
        break
      }

      case 'PIPELINE_FAILED': {
        console.error(chalk.bold.red('\n✗ Failed\n'))
        break
      }
    }
  }

  private handleLog(stageId: string, stream: 'stdout' | 'stderr', line: string): void {
    if (this.verbose) {
      const spinner = this.stageSpinners.get(stageId)
      const prefix = chalk.gray(`  [${stageId}]`)
      if (spinner) {
        spinner.clear()
        console.error(`${prefix} ${line}`)
        spinner.render()
      } else {
        console.error(`${prefix} ${line}`)
      }
    }

    if (stream === 'stderr') {
      let buffer = this.stderrBuffers.get(stageId)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(stageId, buffer)
      }

      buffer.push(line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handleStageFinished(event: StageFinishedEvent): void {
    const spinner = this.stageSpinners.get(event.stage.id)
    if (spinner) {
      spinner.stopAndPersist({symbol: chalk.green('✓'), text: chalk.green(`${event.stage.displayName} (${formatElapsed(event.durationMs)})`)})
      this.stageSpinners.delete(event.stage.id)
    }

    this.stderrBuffers.delete(event.stage.id)
  }

  private handleStageFailed(event: StageFailedEvent): void {
    const spinner = this.stageSpinners.get(event.stage.id)
    const code = event.code ? ` (${event.code})` : ''
    if (spinner) {
      spinner.stopAndPersist({symbol: chalk.red('✗'), text: chalk.red(`${event.stage.displayName}${code}`)})
      this.stageSpinners.delete(event.stage.id)
    }

    const stderr = this.stderrBuffers.get(event.stage.id)
    if (stderr && stderr.length > 0) {
      console.error(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.error(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.stage.id)
  }
}
