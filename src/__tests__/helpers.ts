import {Buffer} from 'node:buffer'
import {mkdtemp} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join} from 'node:path'
import {setTimeout} from 'node:timers/promises'
import {UnreadableInputError} from '../errors.js'
import {MemoryCacheStore} from '../core/memory-cache-store.js'
import type {FileAccess} from '../engine/file-access.js'
import {StageRunner, type OnLogLine, type RunStageRequest, type RunStageResult} from '../engine/stage-runner.js'
import type {PipelineEvent, Reporter} from '../core/reporter.js'
import type {Artifact} from '../types.js'

/**
 * Creates a temporary directory for test isolation.
 * Each test should use its own tmpdir to avoid interference.
 */
export async function createTmpDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'stagecache-test-'))
}

/**
 * Returns a reporter that records emitted events for assertions.
 */
export function recordingReporter(): {reporter: Reporter; events: PipelineEvent[]} {
  const events: PipelineEvent[] = []
  const reporter: Reporter = {
    emit(event) {
      events.push(event)
    }
  }

  return {reporter, events}
}

/** Event names in emission order, optionally limited to one stage. */
export function eventNames(events: PipelineEvent[], stage?: string): string[] {
  return events
    .filter(e => stage === undefined || ('stage' in e && e.stage === stage))
    .map(e => e.event)
}

export function artifact(stage: string, text: string): Artifact {
  const payload = Buffer.from(text, 'utf8')
  return {payload, meta: {stage, size: payload.byteLength, createdAt: '2024-01-01T00:00:00.000Z'}}
}

/** Memory store where another writer commits `rival` right before every write. */
export class RacingStore extends MemoryCacheStore {
  constructor(private readonly rival: string) {
    super()
  }

  protected override async writeEntry(fingerprint: string, artifact: Artifact, digest: string): Promise<boolean> {
    await super.writeEntry(fingerprint, {payload: Buffer.from(this.rival, 'utf8'), meta: artifact.meta}, digest)
    return super.writeEntry(fingerprint, artifact, digest)
  }
}

export function text(payload: Uint8Array | undefined): string | undefined {
  return payload === undefined ? undefined : Buffer.from(payload).toString('utf8')
}

/** File access over an in-memory map of reference to content. */
export class MemoryFileAccess implements FileAccess {
  readonly reads: string[] = []

  constructor(readonly files: Map<string, string> = new Map()) {}

  async readInput(reference: string): Promise<Uint8Array> {
    this.reads.push(reference)
    const content = this.files.get(reference)
    if (content === undefined) {
      throw new UnreadableInputError(reference)
    }

    return Buffer.from(content, 'utf8')
  }
}

export type ScriptedBehavior = {
  exitCode?: number;
  /** Thrown instead of returning a result. */
  throws?: Error;
  /** Overrides the default payload. */
  payload?: string;
  /** Resolves the run only once this promise settles (or the signal aborts). */
  gate?: Promise<void>;
  delayMs?: number;
  logs?: Array<{stream: 'stdout' | 'stderr'; line: string}>;
}

/**
 * Stage runner that never spawns anything.
 *
 * By default a stage succeeds with the payload `<stage>(<parent payload>)`,
 * so the payload of a leaf shows the whole chain it was built from.
 */
export class ScriptedRunner extends StageRunner {
  readonly calls: RunStageRequest[] = []
  running = 0
  maxRunning = 0

  constructor(readonly behaviors: Record<string, ScriptedBehavior> = {}) {
    super()
  }

  get stages(): string[] {
    return this.calls.map(c => c.stage)
  }

  async check(): Promise<void> {
    // Always available
  }

  async run(request: RunStageRequest, onLogLine: OnLogLine): Promise<RunStageResult> {
    this.calls.push(request)
    this.running++
    this.maxRunning = Math.max(this.maxRunning, this.running)
    const startedAt = new Date()
    const behavior = this.behaviors[request.stage] ?? {}

    try {
      if (behavior.delayMs !== undefined) {
        await setTimeout(behavior.delayMs)
      }

      if (behavior.gate) {
        await waitOrAbort(behavior.gate, request.signal)
      }

      if (request.signal?.aborted) {
        return {exitCode: 130, startedAt, finishedAt: new Date(), error: 'Command was canceled'}
      }

      for (const log of behavior.logs ?? []) {
        onLogLine(log)
      }

      if (behavior.throws) {
        throw behavior.throws
      }

      const exitCode = behavior.exitCode ?? 0
      if (exitCode !== 0) {
        return {exitCode, startedAt, finishedAt: new Date()}
      }

      const parent = text(request.parentArtifact?.payload) ?? ''
      const payload = behavior.payload ?? `${request.stage}(${parent})`
      return {exitCode: 0, payload: Buffer.from(payload, 'utf8'), startedAt, finishedAt: new Date()}
    } finally {
      this.running--
    }
  }
}

async function waitOrAbort(gate: Promise<void>, signal?: AbortSignal): Promise<void> {
  if (!signal) {
    await gate
    return
  }

  if (signal.aborted) {
    return
  }

  await new Promise<void>((resolve, reject) => {
    const onAbort = () => {
      resolve()
    }

    signal.addEventListener('abort', onAbort, {once: true})
    void gate.then(resolve, reject).finally(() => {
      signal.removeEventListener('abort', onAbort)
    })
  })
}

/** A promise with its resolve function, for gating scripted stages. */
export function deferred(): {promise: Promise<void>; resolve: () => void} {
  let resolve: () => void = () => {/* replaced below */}
  const promise = new Promise<void>(r => {
    resolve = r
  })
  return {promise, resolve}
}
