import {randomUUID} from 'node:crypto'
import process from 'node:process'
import {LocalFileAccess, type FileAccess} from '../engine/file-access.js'
import type {StageRunner} from '../engine/stage-runner.js'
import type {BuildDefinition, BuildReport, BuildStatus, LoadedBuild} from '../types.js'
import type {CacheStore} from './cache-store.js'
import {slugify} from './definition-loader.js'
import {Executor, type ExecuteOptions, type ExecutionSummary} from './executor.js'
import {Fingerprinter} from './fingerprint.js'
import type {JobContext, Reporter} from './reporter.js'
import {StageGraph} from './stage-graph.js'

export type PipelineControllerOptions = {
  store: CacheStore;
  runner: StageRunner;
  reporter: Reporter;
  /** Defaults to local files under the build root (or the current directory). */
  files?: FileAccess;
}

export type BuildOptions = ExecuteOptions & {
  /** Build only these stages and their ancestors. */
  targets?: string[];
}

/**
 * Orchestrates one build invocation: graph construction, execution and the
 * final report. Per-stage events are streamed to the reporter as each stage
 * completes.
 */
export class PipelineController {
  private readonly store: CacheStore
  private readonly runner: StageRunner
  private readonly reporter: Reporter
  private readonly files?: FileAccess

  constructor(options: PipelineControllerOptions) {
    this.store = options.store
    this.runner = options.runner
    this.reporter = options.reporter
    this.files = options.files
  }

  /**
   * Runs a build.
   *
   * Graph errors (`ValidationError`, `UnknownParentError`, `CycleDetectedError`)
   * are thrown before any stage runs. A stage failure does not throw: it is
   * reported through `status` and `failedStage`. `CacheCorruptionError` aborts
   * the build and is rethrown.
   */
  async build(definition: BuildDefinition | LoadedBuild, options: BuildOptions = {}): Promise<BuildReport> {
    const startedAt = Date.now()
    const fullGraph = StageGraph.build(definition.stages)
    const graph = options.targets?.length ? fullGraph.subgraph(options.targets) : fullGraph
    const order = graph.topologicalOrder()

    const buildId = definition.id ?? slugify(definition.name ?? 'build')
    const job: JobContext = {buildId, jobId: randomUUID()}
    const root = 'root' in definition ? definition.root : process.cwd()
    const executor = new Executor(
      this.store,
      new Fingerprinter(this.files ?? new LocalFileAccess(root)),
      this.runner,
      this.reporter
    )

    this.reporter.emit({
      ...job,
      event: 'PIPELINE_START',
      buildName: definition.name ?? buildId,
      stages: order.map(s => s.name)
    })

    let summary: ExecutionSummary
    try {
      summary = await executor.execute(graph, job, options)
    } catch (error) {
      this.reporter.emit({
        ...job,
        event: 'PIPELINE_FAILED',
        error: error instanceof Error ? error.message : String(error)
      })
      throw error
    }

    const durationMs = Date.now() - startedAt
    const [failedStage] = summary.failed
    let status: BuildStatus = 'success'
    if (summary.cancelled) {
      status = 'cancelled'
      this.reporter.emit({...job, event: 'PIPELINE_CANCELLED'})
    } else if (failedStage === undefined) {
      this.reporter.emit({
        ...job,
        event: 'PIPELINE_FINISHED',
        durationMs,
        cacheHits: summary.results.filter(r => r.outcome === 'cache-hit').length,
        built: summary.results.filter(r => r.outcome === 'built').length
      })
    } else {
      status = 'failed'
      this.reporter.emit({...job, event: 'PIPELINE_FAILED', failedStage})
    }

    const last = order.at(-1)
    return {
      ...job,
      status,
      results: summary.results,
      failedStage,
      output: last ? summary.artifacts.get(last.name) : undefined,
      durationMs
    }
  }
}
