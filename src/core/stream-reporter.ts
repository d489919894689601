import type {PipelineEvent, Reporter} from './reporter.js'
import type {EventTransport, TransportMessage} from './transport.js'

/**
 * Reporter that wraps events into sequenced TransportMessages and publishes them.
 * Ignores STAGE_LOG events (high volume, not suitable for transport).
 *
 * Publishing is fire-and-forget; failures are collected and surfaced by flush().
 */
export class StreamReporter implements Reporter {
  private seq = 0
  private readonly pending = new Set<Promise<void>>()
  private readonly errors: unknown[] = []

  constructor(private readonly transport: EventTransport) {}

  emit(event: PipelineEvent): void {
    if (event.event === 'STAGE_LOG') {
      return
    }

    const message: TransportMessage = {
      seq: this.seq++,
      timestamp: new Date().toISOString(),
      version: 1,
      type: event.event,
      buildId: event.buildId,
      jobId: event.jobId,
      event
    }

    const publishing = this.transport.publish(message)
      .catch((error: unknown) => {
        this.errors.push(error)
      })
      .finally(() => {
        this.pending.delete(publishing)
      })
    this.pending.add(publishing)
  }

  /**
   * Waits for in-flight publishes, then flushes the transport.
   * @throws AggregateError when any publish failed
   */
  async flush(): Promise<void> {
    await Promise.all(this.pending)
    await this.transport.flush?.()
    if (this.errors.length > 0) {
      const errors = this.errors.splice(0)
      throw new AggregateError(errors, `${errors.length} event(s) could not be published`)
    }
  }
}

/**
 * Delegates emit() to multiple reporters.
 */
export class CompositeReporter implements Reporter {
  private readonly reporters: Reporter[]

  constructor(...reporters: Reporter[]) {
    this.reporters = reporters
  }

  emit(event: PipelineEvent): void {
    for (const reporter of this.reporters) {
      reporter.emit(event)
    }
  }
}
