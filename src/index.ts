// Facade
export {Stagecache, type RemoveResult, type StagecacheOptions} from './stagecache.js'

// Collaborators: stage runners and file access
export {
  StageRunner,
  ShellStageRunner,
  LocalFileAccess,
  type ShellStageRunnerOptions,
  type FileAccess,
  type LogLine,
  type OnLogLine,
  type RunStageRequest,
  type RunStageResult
} from './engine/index.js'

// Build orchestration
export {PipelineController, type PipelineControllerOptions, type BuildOptions} from './core/pipeline-controller.js'
export {Executor, type ExecuteOptions, type ExecutionSummary, type OnTransition, type StageState} from './core/executor.js'
export {StageGraph} from './core/stage-graph.js'
export {Fingerprinter, artifactDigest, rootFingerprint} from './core/fingerprint.js'
export {DefinitionLoader, slugify, parseBuildFile} from './core/definition-loader.js'

// Cache stores and eviction
export {BaseCacheStore, type CacheStore, type CacheEntryInfo, type EvictionPolicy, type PutOptions, type PutResult} from './core/cache-store.js'
export {MemoryCacheStore} from './core/memory-cache-store.js'
export {FsCacheStore} from './core/fs-cache-store.js'
export {lruPolicy, sizePolicy, maxAgePolicy, evictAll, anyOf, policyFromConfig} from './core/eviction.js'

// Reporting
export {ConsoleReporter, noopReporter} from './core/reporter.js'
export type {
  Reporter,
  JobContext,
  PipelineEvent,
  PipelineStartEvent,
  StageStartingEvent,
  StageCachedEvent,
  StageBuiltEvent,
  StageFailedEvent,
  StageSkippedEvent,
  StageWouldRunEvent,
  StageLogEvent,
  PipelineFinishedEvent,
  PipelineFailedEvent,
  PipelineCancelledEvent
} from './core/reporter.js'
export {StreamReporter, CompositeReporter} from './core/stream-reporter.js'
export {InMemoryTransport, NdjsonTransport, type TransportMessage, type EventTransport} from './core/transport.js'

// Utilities
export {formatSize, formatDuration, shortFingerprint} from './core/utils.js'

// Errors
export {
  StagecacheError,
  GraphError,
  ValidationError,
  CycleDetectedError,
  UnknownParentError,
  InputError,
  UnreadableInputError,
  CacheError,
  CacheMissError,
  CacheCorruptionError,
  InvalidFingerprintError,
  RunnerError,
  RunnerUnavailableError,
  RunnerFailureError,
  BuildCancelledError
} from './errors.js'

// Types
export type {
  TextInput,
  FileInput,
  ParentArtifactInput,
  InputDeclaration,
  InputKind,
  StageDefinition,
  BuildDefinition,
  LoadedBuild,
  Stage,
  ArtifactMeta,
  Artifact,
  BuildOutcome,
  BuildResult,
  BuildStatus,
  BuildReport,
  ExecutionMode,
  EvictionConfig,
  StagecacheConfig
} from './types.js'
