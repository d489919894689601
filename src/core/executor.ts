import {cpus} from 'node:os'
import {CacheCorruptionError, CacheMissError, StagecacheError} from '../errors.js'
import type {RunStageResult, StageRunner} from '../engine/stage-runner.js'
import type {Artifact, BuildResult, ExecutionMode, Stage} from '../types.js'
import type {CacheStore} from './cache-store.js'
import type {Fingerprinter} from './fingerprint.js'
import type {JobContext, Reporter, StageSkippedEvent} from './reporter.js'
import {Semaphore} from './semaphore.js'
import type {StageGraph} from './stage-graph.js'

export type StageState = 'pending' | 'fingerprinting' | 'cache-check' | 'running' | 'committing' | 'done' | 'failed'

const allowedTransitions: Record<StageState, StageState[]> = {
  pending: ['fingerprinting'],
  fingerprinting: ['cache-check', 'failed'],
  'cache-check': ['done', 'running', 'failed'],
  running: ['committing', 'failed'],
  committing: ['done', 'failed'],
  done: [],
  failed: []
}

export type OnTransition = (stage: string, from: StageState, to: StageState) => void

export type ExecuteOptions = {
  /** Default: sequential */
  mode?: ExecutionMode;
  /** Max stages running at once in parallel mode (default: CPU count) */
  concurrency?: number;
  signal?: AbortSignal;
  /** Skip the cache lookup for every stage, or for the named ones */
  force?: true | string[];
  /** Fingerprint and check the cache, never run */
  dryRun?: boolean;
  /** Start no further stage once one has failed */
  failFast?: boolean;
  onTransition?: OnTransition;
}

export type ExecutionSummary = {
  /** In completion order */
  results: BuildResult[];
  artifacts: Map<string, Artifact>;
  fingerprints: Map<string, string>;
  /** Failed stages, in topological order */
  failed: string[];
  /** Stages never attempted, in topological order */
  skipped: string[];
  cancelled: boolean;
}

type StageOutcome = 'done' | 'failed' | 'skipped' | 'would-run'

type ExecutionContext = {
  job: JobContext;
  signal: AbortSignal;
  options: ExecuteOptions;
  results: BuildResult[];
  artifacts: Map<string, Artifact>;
  fingerprints: Map<string, string>;
  outcomes: Map<string, StageOutcome>;
  skipReasons: Map<string, StageSkippedEvent['reason']>;
}

/**
 * Tracks one stage through its state machine:
 *
 * ```
 * pending → fingerprinting → cache-check → done                 (hit)
 *                          ↘ failed      ↘ running → committing → done
 *                                                  ↘ failed     ↘ failed
 * ```
 */
class StageLifecycle {
  private state: StageState = 'pending'

  constructor(
    private readonly stage: string,
    private readonly onTransition?: OnTransition
  ) {}

  get current(): StageState {
    return this.state
  }

  move(to: StageState): void {
    const from = this.state
    if (!allowedTransitions[from].includes(to)) {
      throw new StagecacheError('ILLEGAL_TRANSITION', `Stage ${this.stage} cannot move from ${from} to ${to}`)
    }

    this.state = to
    this.onTransition?.(this.stage, from, to)
  }
}

/**
 * Walks a stage graph, serving stages from the cache store when their
 * fingerprint is known and running them otherwise.
 *
 * ## Per stage
 *
 * 1. Fingerprint, chaining the parent's fingerprint (and its artifact when the
 *    stage declares a `parent` input)
 * 2. Cache hit: reuse the artifact, the runner is never called
 * 3. Cache miss: run, then commit the artifact under the fingerprint
 * 4. Failure: the stage's descendants are never attempted; committed entries
 *    of other stages stay
 *
 * ## Modes
 *
 * - **sequential**: one stage at a time in topological order
 * - **parallel**: a stage starts as soon as its parent is done, at most
 *   `concurrency` at once; independent branches keep running after a failure
 *
 * A `CacheCorruptionError` aborts the whole execution and is rethrown.
 * Nothing is retried.
 */
export class Executor {
  constructor(
    private readonly store: CacheStore,
    private readonly fingerprinter: Fingerprinter,
    private readonly runner: StageRunner,
    private readonly reporter: Reporter
  ) {}

  async execute(graph: StageGraph, job: JobContext, options: ExecuteOptions = {}): Promise<ExecutionSummary> {
    const abort = new AbortController()
    const onAbort = () => {
      abort.abort(options.signal?.reason)
    }

    if (options.signal?.aborted) {
      onAbort()
    } else {
      options.signal?.addEventListener('abort', onAbort, {once: true})
    }

    const ctx: ExecutionContext = {
      job,
      signal: abort.signal,
      options,
      results: [],
      artifacts: new Map(),
      fingerprints: new Map(),
      outcomes: new Map(),
      skipReasons: new Map()
    }

    try {
      await (options.mode === 'parallel'
        ? this.executeParallel(graph, ctx, abort)
        : this.executeSequential(graph, ctx))
    } finally {
      options.signal?.removeEventListener('abort', onAbort)
    }

    const order = graph.topologicalOrder().map(s => s.name)
    return {
      results: ctx.results,
      artifacts: ctx.artifacts,
      fingerprints: ctx.fingerprints,
      failed: order.filter(name => ctx.outcomes.get(name) === 'failed'),
      skipped: order.filter(name => ctx.outcomes.get(name) === 'skipped'),
      cancelled: options.signal?.aborted ?? false
    }
  }

  private async executeSequential(graph: StageGraph, ctx: ExecutionContext): Promise<void> {
    for (const stage of graph.topologicalOrder()) {
      const skipReason = this.blockedBy(stage, ctx)
      if (skipReason) {
        this.skip(stage, skipReason, ctx)
        continue
      }

      ctx.outcomes.set(stage.name, await this.runStage(stage, ctx))
    }
  }

  private async executeParallel(graph: StageGraph, ctx: ExecutionContext, abort: AbortController): Promise<void> {
    const limiter = new Semaphore(ctx.options.concurrency ?? cpus().length)
    const tasks = new Map<string, Promise<void>>()
    let fatal: unknown

    for (const stage of graph.topologicalOrder()) {
      const parentTask = stage.parent === undefined ? undefined : tasks.get(stage.parent)
      tasks.set(stage.name, (async () => {
        await parentTask
        const release = await limiter.acquire()
        try {
          const skipReason = this.blockedBy(stage, ctx)
          if (skipReason) {
            this.skip(stage, skipReason, ctx)
            return
          }

          ctx.outcomes.set(stage.name, await this.runStage(stage, ctx))
        } catch (error) {
          ctx.outcomes.set(stage.name, 'failed')
          fatal ??= error
          abort.abort(error)
        } finally {
          release()
        }
      })())
    }

    await Promise.all(tasks.values())
    if (fatal !== undefined) {
      throw fatal
    }
  }

  /** Returns why a stage must not start, if it must not. */
  private blockedBy(stage: Stage, ctx: ExecutionContext): StageSkippedEvent['reason'] | undefined {
    if (ctx.signal.aborted) {
      return 'cancelled'
    }

    if (stage.parent !== undefined) {
      const parentOutcome = ctx.outcomes.get(stage.parent)
      if (parentOutcome === 'failed' || parentOutcome === 'skipped') {
        return 'dependency'
      }
    }

    if (ctx.options.failFast && [...ctx.outcomes.values()].includes('failed')) {
      return 'fail-fast'
    }

    return undefined
  }

  private skip(stage: Stage, reason: StageSkippedEvent['reason'], ctx: ExecutionContext): void {
    ctx.outcomes.set(stage.name, 'skipped')
    ctx.skipReasons.set(stage.name, reason)
    this.reporter.emit({...ctx.job, event: 'STAGE_SKIPPED', stage: stage.name, reason})
  }

  private async runStage(stage: Stage, ctx: ExecutionContext): Promise<StageOutcome> {
    const startedAt = Date.now()
    const lifecycle = new StageLifecycle(stage.name, ctx.options.onTransition)
    const parentFingerprint = stage.parent === undefined ? undefined : ctx.fingerprints.get(stage.parent)
    const parentArtifact = stage.parent === undefined ? undefined : ctx.artifacts.get(stage.parent)
    const needsParentArtifact = stage.inputs.some(input => input.kind === 'parent')

    // Dry run below a stage that would run: nothing to chain yet
    if (stage.parent !== undefined && (!parentFingerprint || (needsParentArtifact && !parentArtifact))) {
      this.reporter.emit({...ctx.job, event: 'STAGE_WOULD_RUN', stage: stage.name})
      return 'would-run'
    }

    lifecycle.move('fingerprinting')
    let fingerprint: string
    try {
      fingerprint = await this.fingerprinter.fingerprint(stage, parentFingerprint, needsParentArtifact ? parentArtifact : undefined)
    } catch (error) {
      return this.fail(stage, lifecycle, ctx, {startedAt, error})
    }

    ctx.fingerprints.set(stage.name, fingerprint)
    lifecycle.move('cache-check')

    const {force} = ctx.options
    const forced = force === true || (Array.isArray(force) && force.includes(stage.name))
    if (!forced) {
      let cached: Artifact | undefined
      try {
        cached = await this.lookup(fingerprint)
      } catch (error) {
        this.fail(stage, lifecycle, ctx, {startedAt, fingerprint, error})
        if (error instanceof CacheCorruptionError) {
          throw error
        }

        return 'failed'
      }

      if (cached) {
        ctx.artifacts.set(stage.name, cached)
        lifecycle.move('done')
        const result: BuildResult = {stage: stage.name, fingerprint, outcome: 'cache-hit', durationMs: Date.now() - startedAt}
        ctx.results.push(result)
        this.reporter.emit({...ctx.job, event: 'STAGE_CACHED', stage: stage.name, result})
        return 'done'
      }
    }

    if (ctx.options.dryRun) {
      this.reporter.emit({...ctx.job, event: 'STAGE_WOULD_RUN', stage: stage.name, fingerprint})
      return 'would-run'
    }

    lifecycle.move('running')
    this.reporter.emit({...ctx.job, event: 'STAGE_STARTING', stage: stage.name, fingerprint})

    let runResult: RunStageResult
    try {
      runResult = await this.runner.run(
        {
          stage: stage.name,
          command: stage.command,
          env: stage.env,
          parentArtifact,
          inputs: stage.inputs,
          timeoutSec: stage.timeoutSec,
          signal: ctx.signal
        },
        ({stream, line}) => {
          this.reporter.emit({...ctx.job, event: 'STAGE_LOG', stage: stage.name, stream, line})
        }
      )
    } catch (error) {
      return this.fail(stage, lifecycle, ctx, {startedAt, fingerprint, error})
    }

    if (runResult.exitCode !== 0) {
      const error = runResult.error ?? (ctx.signal.aborted ? 'Build was cancelled' : `Command exited with code ${runResult.exitCode}`)
      return this.fail(stage, lifecycle, ctx, {startedAt, fingerprint, exitCode: runResult.exitCode, error})
    }

    lifecycle.move('committing')
    const payload = runResult.payload ?? new Uint8Array(0)
    const artifact: Artifact = {
      payload,
      meta: {stage: stage.name, size: payload.byteLength, createdAt: runResult.finishedAt.toISOString()}
    }

    try {
      await this.store.put(fingerprint, artifact, {replace: forced})
    } catch (error) {
      this.fail(stage, lifecycle, ctx, {startedAt, fingerprint, error})
      if (error instanceof CacheCorruptionError) {
        throw error
      }

      return 'failed'
    }

    ctx.artifacts.set(stage.name, artifact)
    lifecycle.move('done')
    const result: BuildResult = {stage: stage.name, fingerprint, outcome: 'built', durationMs: Date.now() - startedAt, exitCode: 0}
    ctx.results.push(result)
    this.reporter.emit({...ctx.job, event: 'STAGE_BUILT', stage: stage.name, result, artifactSize: payload.byteLength})
    return 'done'
  }

  /** Cache lookup; a miss racing an eviction counts as a miss. */
  private async lookup(fingerprint: string): Promise<Artifact | undefined> {
    if (!await this.store.has(fingerprint)) {
      return undefined
    }

    try {
      return await this.store.get(fingerprint)
    } catch (error) {
      if (error instanceof CacheMissError) {
        return undefined
      }

      throw error
    }
  }

  private fail(stage: Stage, lifecycle: StageLifecycle, ctx: ExecutionContext, details: {
    startedAt: number;
    fingerprint?: string;
    exitCode?: number;
    error: unknown;
  }): 'failed' {
    lifecycle.move('failed')
    const result: BuildResult = {
      stage: stage.name,
      fingerprint: details.fingerprint,
      outcome: 'failed',
      durationMs: Date.now() - details.startedAt,
      exitCode: details.exitCode,
      error: details.error instanceof Error ? details.error.message : String(details.error)
    }
    ctx.results.push(result)
    this.reporter.emit({...ctx.job, event: 'STAGE_FAILED', stage: stage.name, result})
    return 'failed'
  }
}
