export class StagecacheError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'StagecacheError'
  }

  get transient(): boolean {
    return false
  }
}

// -- Graph errors ------------------------------------------------------------

export class GraphError extends StagecacheError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'GraphError'
  }
}

export class ValidationError extends GraphError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class CycleDetectedError extends GraphError {
  constructor(
    readonly chain: string[],
    options?: {cause?: unknown}
  ) {
    super('CYCLE_DETECTED', `Parent chain forms a cycle: ${chain.join(' -> ')}`, options)
    this.name = 'CycleDetectedError'
  }
}

export class UnknownParentError extends GraphError {
  constructor(
    readonly stage: string,
    readonly parent: string,
    options?: {cause?: unknown}
  ) {
    super('UNKNOWN_PARENT', `Stage '${stage}' extends unknown stage '${parent}'`, options)
    this.name = 'UnknownParentError'
  }
}

// -- Input errors ------------------------------------------------------------

export class InputError extends StagecacheError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'InputError'
  }
}

export class UnreadableInputError extends InputError {
  constructor(
    readonly reference: string,
    options?: {cause?: unknown}
  ) {
    super('UNREADABLE_INPUT', `Cannot read input '${reference}'`, options)
    this.name = 'UnreadableInputError'
  }
}

// -- Cache errors ------------------------------------------------------------

export class CacheError extends StagecacheError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'CacheError'
  }
}

export class CacheMissError extends CacheError {
  constructor(
    readonly fingerprint: string,
    options?: {cause?: unknown}
  ) {
    super('CACHE_MISS', `No cache entry for ${fingerprint}`, options)
    this.name = 'CacheMissError'
  }
}

export class CacheCorruptionError extends CacheError {
  constructor(
    readonly fingerprint: string,
    reason: string,
    options?: {cause?: unknown}
  ) {
    super('CACHE_CORRUPTION', `Cache entry ${fingerprint} is corrupt: ${reason}`, options)
    this.name = 'CacheCorruptionError'
  }
}

export class InvalidFingerprintError extends CacheError {
  constructor(fingerprint: string, options?: {cause?: unknown}) {
    super('INVALID_FINGERPRINT', `Invalid fingerprint: ${fingerprint}. Expected 64 lowercase hex characters.`, options)
    this.name = 'InvalidFingerprintError'
  }
}

// -- Runner errors -----------------------------------------------------------

export class RunnerError extends StagecacheError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'RunnerError'
  }
}

export class RunnerUnavailableError extends RunnerError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('RUNNER_UNAVAILABLE', message, options)
    this.name = 'RunnerUnavailableError'
  }

  override get transient(): boolean {
    return true
  }
}

export class RunnerFailureError extends RunnerError {
  constructor(
    readonly stage: string,
    readonly exitCode: number | undefined,
    options?: {cause?: unknown}
  ) {
    super(
      'RUNNER_FAILURE',
      exitCode === undefined ? `Stage ${stage} failed` : `Stage ${stage} failed with exit code ${exitCode}`,
      options
    )
    this.name = 'RunnerFailureError'
  }
}

export class BuildCancelledError extends RunnerError {
  constructor(options?: {cause?: unknown}) {
    super('BUILD_CANCELLED', 'Build was cancelled', options)
    this.name = 'BuildCancelledError'
  }
}
