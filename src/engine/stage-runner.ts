import type {Artifact, InputDeclaration} from '../types.js'

/**
 * Log line from stage execution.
 */
export type LogLine = {
  /** Output stream (stdout or stderr) */
  stream: 'stdout' | 'stderr';
  /** Log line content */
  line: string;
}

/**
 * Callback for receiving real-time logs during stage execution.
 */
export type OnLogLine = (log: LogLine) => void

/**
 * Everything a runner needs to produce one stage's artifact.
 */
export type RunStageRequest = {
  /** Stage name */
  stage: string;
  command: string | string[];
  env?: Record<string, string>;
  /** Committed artifact of the parent stage, when the stage has one */
  parentArtifact?: Artifact;
  inputs: InputDeclaration[];
  timeoutSec?: number;
  /** Aborted when the build is cancelled */
  signal?: AbortSignal;
}

export type RunStageResult = {
  /** Zero means success */
  exitCode: number;
  /** Produced bytes (success only) */
  payload?: Uint8Array;
  startedAt: Date;
  finishedAt: Date;
  error?: string;
}

/**
 * Abstract interface for executing stage commands.
 *
 * Implementations:
 * - `ShellStageRunner`: runs commands through execa on the host
 *
 * The runner is responsible for:
 * - Making the parent artifact available to the command
 * - Streaming logs in real-time
 * - Collecting the produced payload
 * - Stopping when the request signal is aborted
 *
 * A runner reports command failure through `exitCode`; it throws only when it
 * cannot run at all.
 */
export abstract class StageRunner {
  /**
   * Verifies that the runner is available and functional.
   * @throws If the runner cannot execute commands
   */
  abstract check(): Promise<void>

  abstract run(request: RunStageRequest, onLogLine: OnLogLine): Promise<RunStageResult>
}
