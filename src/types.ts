// ---------------------------------------------------------------------------
// Shared build domain types.
//
// Definitions are what a build file (or a programmatic caller) declares;
// resolved stages are what the graph hands to the executor.
// ---------------------------------------------------------------------------

// -- Inputs -----------------------------------------------------------------

/** Literal text hashed as-is (command fragments, manifest hashes, versions). */
export type TextInput = {
  kind: 'text';
  value: string;
}

/** File or directory reference, resolved through the file-access collaborator. */
export type FileInput = {
  kind: 'file';
  /** Path relative to the build root. */
  value: string;
}

/** The parent stage's artifact, hashed by payload digest. */
export type ParentArtifactInput = {
  kind: 'parent';
}

export type InputDeclaration = TextInput | FileInput | ParentArtifactInput

export type InputKind = InputDeclaration['kind']

// -- Definitions ------------------------------------------------------------

export type StageDefinition = {
  /** Unique within a build. */
  name: string;
  /** Name of the stage this one extends. */
  parent?: string;
  /** Shell command line, or an argument list executed without a shell. */
  command: string | string[];
  /** Ordered: reordering inputs changes the fingerprint. */
  inputs?: InputDeclaration[];
  env?: Record<string, string>;
  timeoutSec?: number;
}

export type BuildDefinition = {
  id?: string;
  name?: string;
  stages: StageDefinition[];
}

/** A build definition after loading: id resolved, root directory known. */
export type LoadedBuild = {
  id: string;
  name?: string;
  stages: StageDefinition[];
  /** Directory file inputs are resolved against. */
  root: string;
}

// -- Resolved stages --------------------------------------------------------

export type Stage = {
  name: string;
  /** Position in the definition, used to break topological ties. */
  index: number;
  parent?: string;
  parentIndex?: number;
  command: string | string[];
  inputs: InputDeclaration[];
  env?: Record<string, string>;
  timeoutSec?: number;
}

// -- Artifacts & results ----------------------------------------------------

export type ArtifactMeta = {
  /** Name of the stage that produced the payload. */
  stage: string;
  size: number;
  /** ISO-8601 timestamp. */
  createdAt: string;
}

export type Artifact = {
  payload: Uint8Array;
  meta: ArtifactMeta;
}

export type BuildOutcome = 'cache-hit' | 'built' | 'failed'

export type BuildResult = {
  stage: string;
  /** Absent only when fingerprinting itself failed. */
  fingerprint?: string;
  outcome: BuildOutcome;
  durationMs: number;
  exitCode?: number;
  error?: string;
}

export type BuildStatus = 'success' | 'failed' | 'cancelled'

export type BuildReport = {
  buildId: string;
  jobId: string;
  status: BuildStatus;
  /** Attempted stages, in completion order. */
  results: BuildResult[];
  /** First failing stage in topological order. */
  failedStage?: string;
  /** Artifact of the last stage in topological order, when it completed. */
  output?: Artifact;
  durationMs: number;
}

// -- Configuration ----------------------------------------------------------

export type ExecutionMode = 'sequential' | 'parallel'

export type EvictionConfig = {
  maxEntries?: number;
  maxBytes?: number;
  maxAgeDays?: number;
}

/** Project-level configuration (`.stagecache.yml`). */
export type StagecacheConfig = {
  cacheDir?: string;
  mode?: ExecutionMode;
  concurrency?: number;
  failFast?: boolean;
  eviction?: EvictionConfig;
}
