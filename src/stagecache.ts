import {resolve} from 'node:path'
import {ValidationError} from './errors.js'
import type {FileAccess} from './engine/file-access.js'
import {ShellStageRunner} from './engine/shell-runner.js'
import type {StageRunner} from './engine/stage-runner.js'
import type {CacheEntryInfo, CacheStore, EvictionPolicy} from './core/cache-store.js'
import {DefinitionLoader} from './core/definition-loader.js'
import {evictAll, policyFromConfig} from './core/eviction.js'
import {FsCacheStore} from './core/fs-cache-store.js'
import {PipelineController, type BuildOptions} from './core/pipeline-controller.js'
import {ConsoleReporter, type Reporter} from './core/reporter.js'
import type {BuildDefinition, BuildReport, LoadedBuild, StagecacheConfig} from './types.js'

export type RemoveResult = {
  removed: string[];
  /** Entries that were being read and stayed in place */
  kept: string[];
}

export type StagecacheOptions = {
  /** Cache directory for the default file-system store (default: `./.stagecache`). */
  cacheDir?: string;
  /** Replaces the file-system store. */
  store?: CacheStore;
  runner?: StageRunner;
  reporter?: Reporter;
  /** Replaces local file access under the build root. */
  files?: FileAccess;
  config?: StagecacheConfig;
}

const defaultCacheDir = '.stagecache'

/**
 * Entry point wiring a cache store, a stage runner and a reporter together.
 *
 * Configuration values (`mode`, `concurrency`, `failFast`) are defaults that
 * per-build options override.
 */
export class Stagecache {
  static async open(options: StagecacheOptions = {}): Promise<Stagecache> {
    const config = options.config ?? {}
    const store = options.store
      ?? await FsCacheStore.open(resolve(options.cacheDir ?? config.cacheDir ?? defaultCacheDir))
    return new Stagecache(store, options)
  }

  readonly loader = new DefinitionLoader()
  private readonly runner?: StageRunner
  private readonly reporter: Reporter
  private readonly files?: FileAccess
  private readonly config: StagecacheConfig

  constructor(readonly store: CacheStore, options: Omit<StagecacheOptions, 'store' | 'cacheDir'> = {}) {
    this.runner = options.runner
    this.reporter = options.reporter ?? new ConsoleReporter()
    this.files = options.files
    this.config = options.config ?? {}
  }

  async load(input: string | BuildDefinition): Promise<LoadedBuild> {
    return this.loader.load(input)
  }

  /**
   * Runs a build. Without a configured runner, commands run in a shell from
   * the build root. The runner is checked first unless this is a dry run.
   * @throws RunnerUnavailableError when the runner cannot execute commands
   */
  async build(build: LoadedBuild | BuildDefinition, options: BuildOptions = {}): Promise<BuildReport> {
    const runner = this.runner ?? new ShellStageRunner({root: 'root' in build ? build.root : undefined})
    if (!options.dryRun) {
      await runner.check()
    }

    const controller = new PipelineController({
      store: this.store,
      runner,
      reporter: this.reporter,
      files: this.files
    })
    return controller.build(build, {
      ...options,
      mode: options.mode ?? this.config.mode,
      concurrency: options.concurrency ?? this.config.concurrency,
      failFast: options.failFast ?? this.config.failFast
    })
  }

  /** Fingerprints every stage and checks the cache without running anything. */
  async plan(build: LoadedBuild | BuildDefinition, options: Omit<BuildOptions, 'dryRun'> = {}): Promise<BuildReport> {
    return this.build(build, {...options, dryRun: true})
  }

  async entries(): Promise<CacheEntryInfo[]> {
    return this.store.list()
  }

  /**
   * Removes entries by full fingerprint or by an unambiguous prefix of at
   * least 4 characters. References naming the same entry count once; entries
   * being read are kept.
   */
  async remove(references: string[]): Promise<RemoveResult> {
    const entries = await this.store.list()
    const fingerprints = new Set(references.map(reference => resolveReference(reference, entries)))
    const result: RemoveResult = {removed: [], kept: []}
    for (const fingerprint of fingerprints) {
      if (await this.store.invalidate(fingerprint)) {
        result.removed.push(fingerprint)
      } else {
        result.kept.push(fingerprint)
      }
    }

    return result
  }

  /**
   * Applies an eviction policy, by default the one configured under `eviction`.
   * @throws ValidationError when no policy is given and none is configured
   */
  async prune(policy?: EvictionPolicy): Promise<string[]> {
    const effective = policy ?? policyFromConfig(this.config.eviction ?? {})
    if (!effective) {
      throw new ValidationError('No eviction limits given: set eviction in the configuration or pass limits')
    }

    return this.store.evict(effective)
  }

  async clear(): Promise<string[]> {
    return this.store.evict(evictAll())
  }
}

function resolveReference(reference: string, entries: CacheEntryInfo[]): string {
  if (reference.length < 4) {
    throw new ValidationError(`Fingerprint prefix '${reference}' is too short (min 4 characters)`)
  }

  const matches = entries.filter(e => e.fingerprint.startsWith(reference.toLowerCase()))
  if (matches.length > 1) {
    throw new ValidationError(`Fingerprint prefix '${reference}' is ambiguous (${matches.length} entries)`)
  }

  if (matches.length === 0) {
    throw new ValidationError(`No cache entry matches '${reference}'`)
  }

  return matches[0].fingerprint
}
