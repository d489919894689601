import pino, {type Logger} from 'pino'
import type {BuildResult} from '../types.js'

/** Common fields identifying one build invocation. */
export type JobContext = {
  buildId: string;
  jobId: string;
}

/**
 * Discriminated union of build events.
 *
 * Lifecycle:
 * 1. PIPELINE_START - Build begins, lists the stages in execution order
 * 2. For each stage:
 *    a. STAGE_STARTING - Cache miss, the runner is invoked
 *    b. STAGE_LOG - Runner log line (stdout/stderr)
 *    c. STAGE_CACHED - Served from cache
 *       OR STAGE_BUILT - Runner succeeded, artifact committed
 *       OR STAGE_FAILED - Fingerprinting or runner failed
 *       OR STAGE_SKIPPED - Parent failed or build cancelled, never attempted
 *       OR STAGE_WOULD_RUN - Cache miss in dry-run mode
 * 3. PIPELINE_FINISHED - Every attempted stage is cached or built
 *    OR PIPELINE_FAILED - At least one stage failed
 *    OR PIPELINE_CANCELLED - The build signal was aborted
 *
 * STAGE_CACHED, STAGE_BUILT and STAGE_FAILED carry the stage's BuildResult
 * and are emitted as each stage completes.
 */
export type PipelineStartEvent = {
  event: 'PIPELINE_START';
  buildId: string;
  jobId: string;
  buildName: string;
  stages: string[];
}

export type StageStartingEvent = {
  event: 'STAGE_STARTING';
  buildId: string;
  jobId: string;
  stage: string;
  fingerprint: string;
}

export type StageCachedEvent = {
  event: 'STAGE_CACHED';
  buildId: string;
  jobId: string;
  stage: string;
  result: BuildResult;
}

export type StageBuiltEvent = {
  event: 'STAGE_BUILT';
  buildId: string;
  jobId: string;
  stage: string;
  result: BuildResult;
  artifactSize: number;
}

export type StageFailedEvent = {
  event: 'STAGE_FAILED';
  buildId: string;
  jobId: string;
  stage: string;
  result: BuildResult;
}

export type StageSkippedEvent = {
  event: 'STAGE_SKIPPED';
  buildId: string;
  jobId: string;
  stage: string;
  reason: 'dependency' | 'cancelled' | 'fail-fast';
}

export type StageWouldRunEvent = {
  event: 'STAGE_WOULD_RUN';
  buildId: string;
  jobId: string;
  stage: string;
  /** Unknown when it depends on a parent artifact that would be rebuilt. */
  fingerprint?: string;
}

export type StageLogEvent = {
  event: 'STAGE_LOG';
  buildId: string;
  jobId: string;
  stage: string;
  stream: 'stdout' | 'stderr';
  line: string;
}

export type PipelineFinishedEvent = {
  event: 'PIPELINE_FINISHED';
  buildId: string;
  jobId: string;
  durationMs: number;
  cacheHits: number;
  built: number;
}

export type PipelineFailedEvent = {
  event: 'PIPELINE_FAILED';
  buildId: string;
  jobId: string;
  /** Absent when the build aborted on a store error rather than a stage failure. */
  failedStage?: string;
  error?: string;
}

export type PipelineCancelledEvent = {
  event: 'PIPELINE_CANCELLED';
  buildId: string;
  jobId: string;
}

export type PipelineEvent =
  | PipelineStartEvent
  | StageStartingEvent
  | StageCachedEvent
  | StageBuiltEvent
  | StageFailedEvent
  | StageSkippedEvent
  | StageWouldRunEvent
  | StageLogEvent
  | PipelineFinishedEvent
  | PipelineFailedEvent
  | PipelineCancelledEvent

/**
 * Interface for reporting build events.
 */
export type Reporter = {
  emit(event: PipelineEvent): void;
}

/**
 * Reporter that outputs structured JSON logs via pino.
 * Suitable for CI/CD environments and log aggregation.
 */
export class ConsoleReporter implements Reporter {
  private readonly logger: Logger

  constructor(options?: {level?: string}) {
    this.logger = pino({level: options?.level ?? 'info'})
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

      default: {
        this.logger.info(event)
      }
    }
  }
}

/**
 * Silent reporter.
 */
export const noopReporter: Reporter = {
  emit() {/* noop */}
}
