import process from 'node:process'
import {Buffer} from 'node:buffer'
import {mkdtemp, readFile, rm, writeFile} from 'node:fs/promises'
import {tmpdir} from 'node:os'
import {join, resolve} from 'node:path'
import {execa, type Options} from 'execa'
import {RunnerUnavailableError} from '../errors.js'
import {hasErrorCode} from '../core/utils.js'
import {StageRunner, type OnLogLine, type RunStageRequest, type RunStageResult} from './stage-runner.js'

/**
 * Build a minimal environment for stage commands.
 * Only PATH and HOME are kept from the host so that host secrets never reach
 * a stage unless it declares them in its own env (which is fingerprinted).
 */
function hostEnv(): Record<string, string> {
  const env: Record<string, string> = {}
  for (const key of ['PATH', 'HOME']) {
    const value = process.env[key]
    if (value !== undefined) {
      env[key] = value
    }
  }

  return env
}

export type ShellStageRunnerOptions = {
  /** Working directory of every command (default: process cwd). */
  root?: string;
  /** Shell used for string commands (default: system shell). */
  shell?: string;
}

/**
 * Runs stage commands on the host.
 *
 * Each run gets a scratch directory exposed through environment variables:
 * - `STAGECACHE_STAGE`: stage name
 * - `STAGECACHE_ROOT`: build root (also the working directory)
 * - `STAGECACHE_OUTPUT`: file the command writes its artifact to
 * - `STAGECACHE_PARENT`: file holding the parent artifact (only with a parent)
 *
 * The bytes in `STAGECACHE_OUTPUT` become the artifact payload; a command that
 * writes nothing produces an empty payload.
 */
export class ShellStageRunner extends StageRunner {
  private readonly root: string
  private readonly shell: string | true
  private readonly env = hostEnv()

  constructor(options: ShellStageRunnerOptions = {}) {
    super()
    this.root = resolve(options.root ?? process.cwd())
    this.shell = options.shell ?? true
  }

  async check(): Promise<void> {
    try {
      await execa('exit 0', {shell: this.shell, env: this.env, extendEnv: false})
    } catch (error) {
      throw new RunnerUnavailableError('No shell available to run stage commands', {cause: error})
    }
  }

  async run(request: RunStageRequest, onLogLine: OnLogLine): Promise<RunStageResult> {
    const startedAt = new Date()
    const scratch = await mkdtemp(join(tmpdir(), 'stagecache-run-'))
    const outputPath = join(scratch, 'output')

    try {
      const env: Record<string, string> = {
        ...this.env,
        ...request.env,
        STAGECACHE_STAGE: request.stage,
        STAGECACHE_ROOT: this.root,
        STAGECACHE_OUTPUT: outputPath
      }

      if (request.parentArtifact) {
        const parentPath = join(scratch, 'parent')
        await writeFile(parentPath, request.parentArtifact.payload)
        env.STAGECACHE_PARENT = parentPath
      }

      const options: Options = {
        cwd: this.root,
        env,
        extendEnv: false,
        reject: false,
        timeout: request.timeoutSec ? request.timeoutSec * 1000 : undefined,
        cancelSignal: request.signal
      }

      const [file, args, shell] = typeof request.command === 'string'
        ? [request.command, [], this.shell] as const
        : [request.command[0], request.command.slice(1), false] as const
      if (file === undefined) {
        return {exitCode: 1, startedAt, finishedAt: new Date(), error: 'Empty command'}
      }

      const proc = execa(file, args, {...options, shell})

      const logsDone = Promise.allSettled([
        (async () => {
          for await (const line of proc.iterable({from: 'stdout'})) {
            onLogLine({stream: 'stdout', line: String(line)})
          }
        })(),
        (async () => {
          for await (const line of proc.iterable({from: 'stderr'})) {
            onLogLine({stream: 'stderr', line: String(line)})
          }
        })()
      ])

      const result = await proc
      await logsDone

      if (result.failed) {
        const exitCode = result.exitCode ?? 1
        return {
          exitCode,
          startedAt,
          finishedAt: new Date(),
          error: typeof result.shortMessage === 'string' ? result.shortMessage : `Command exited with code ${exitCode}`
        }
      }

      return {exitCode: 0, payload: await readOutput(outputPath), startedAt, finishedAt: new Date()}
    } finally {
      await rm(scratch, {recursive: true, force: true})
    }
  }
}

async function readOutput(path: string): Promise<Uint8Array> {
  try {
    return await readFile(path)
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return Buffer.alloc(0)
    }

    throw error
  }
}
