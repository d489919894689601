import chalk from 'chalk'
import ora, {type Ora} from 'ora'
import type {
  PipelineEvent,
  PipelineFinishedEvent,
  Reporter,
  StageBuiltEvent,
  StageFailedEvent,
  StageLogEvent,
  StageSkippedEvent
} from '../core/reporter.js'
import {formatDuration, formatSize, shortFingerprint} from '../core/utils.js'

const skipLabels: Record<StageSkippedEvent['reason'], string> = {
  dependency: 'parent failed',
  cancelled: 'cancelled',
  'fail-fast': 'fail-fast'
}

/**
 * Reporter with interactive terminal UI using spinners and colors.
 * Suitable for local development and manual execution.
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
        console.log(chalk.bold(`\n▶ Build: ${chalk.cyan(event.buildName)} ${chalk.gray(`(${event.stages.length} stages)`)}\n`))
        break
      }

      case 'STAGE_STARTING': {
        const spinner = ora({text: `${event.stage} ${chalk.gray(shortFingerprint(event.fingerprint))}`, prefixText: ' '}).start()
        this.stageSpinners.set(event.stage, spinner)
        break
      }

      case 'STAGE_CACHED': {
        console.log(`  ${chalk.gray('⊙')} ${chalk.gray(`${event.stage} (cached)`)}`)
        break
      }

      case 'STAGE_BUILT': {
        this.handleStageBuilt(event)
        break
      }

      case 'STAGE_FAILED': {
        this.handleStageFailed(event)
        break
      }

      case 'STAGE_SKIPPED': {
        console.log(`  ${chalk.gray('-')} ${chalk.gray(`${event.stage} (skipped: ${skipLabels[event.reason]})`)}`)
        break
      }

      case 'STAGE_WOULD_RUN': {
        const suffix = event.fingerprint ? ` ${chalk.gray(shortFingerprint(event.fingerprint))}` : ''
        console.log(`  ${chalk.yellow('○')} ${chalk.yellow(`${event.stage} (would run)`)}${suffix}`)
        break
      }

      case 'STAGE_LOG': {
        this.handleLog(event)
        break
      }

      case 'PIPELINE_FINISHED': {
        this.handlePipelineFinished(event)
        break
      }

      case 'PIPELINE_FAILED': {
        const detail = event.failedStage ?? event.error
        console.log(chalk.bold.red(`\n✗ Build failed${detail ? `: ${detail}` : ''}\n`))
        break
      }

      case 'PIPELINE_CANCELLED': {
        console.log(chalk.bold.yellow('\n⊘ Build cancelled\n'))
        break
      }
    }
  }

  private handleLog(event: StageLogEvent): void {
    if (this.verbose) {
      const spinner = this.stageSpinners.get(event.stage)
      const prefix = chalk.gray(`  [${event.stage}]`)
      if (spinner) {
        spinner.clear()
        console.log(`${prefix} ${event.line}`)
        spinner.render()
      } else {
        console.log(`${prefix} ${event.line}`)
      }
    }

    if (event.stream === 'stderr') {
      let buffer = this.stderrBuffers.get(event.stage)
      if (!buffer) {
        buffer = []
        this.stderrBuffers.set(event.stage, buffer)
      }

      buffer.push(event.line)
      if (buffer.length > InteractiveReporter.maxStderrLines) {
        buffer.shift()
      }
    }
  }

  private handleStageBuilt(event: StageBuiltEvent): void {
    const details = [formatDuration(event.result.durationMs)]
    if (event.artifactSize > 0) {
      details.push(formatSize(event.artifactSize))
    }

    const text = chalk.green(`${event.stage} (${details.join(', ')})`)
    const spinner = this.stageSpinners.get(event.stage)
    if (spinner) {
      spinner.stopAndPersist({symbol: chalk.green('✓'), text})
      this.stageSpinners.delete(event.stage)
    } else {
      console.log(`  ${chalk.green('✓')} ${text}`)
    }

    this.stderrBuffers.delete(event.stage)
  }

  private handleStageFailed(event: StageFailedEvent): void {
    const {exitCode, error} = event.result
    const info = exitCode === undefined ? (error ?? 'error') : `exit ${exitCode}`
    const text = chalk.red(`${event.stage} (${info})`)
    const spinner = this.stageSpinners.get(event.stage)
    if (spinner) {
      spinner.stopAndPersist({symbol: chalk.red('✗'), text})
      this.stageSpinners.delete(event.stage)
    } else {
      console.log(`  ${chalk.red('✗')} ${text}`)
    }

    const stderr = this.stderrBuffers.get(event.stage)
    if (stderr && stderr.length > 0) {
      console.log(chalk.red('  ── stderr ──'))
      for (const line of stderr) {
        console.log(chalk.red(`  ${line}`))
      }
    }

    this.stderrBuffers.delete(event.stage)
  }

  private handlePipelineFinished(event: PipelineFinishedEvent): void {
    const parts = [`Build completed in ${formatDuration(event.durationMs)}`]
    parts.push(chalk.gray(`(${event.built} built, ${event.cacheHits} cached)`))
    console.log(chalk.bold.green(`\n✓ ${parts.join(' ')}\n`))
  }
}
