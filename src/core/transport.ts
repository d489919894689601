import {createWriteStream} from 'node:fs'
import type {Writable} from 'node:stream'
import {finished} from 'node:stream/promises'
import type {PipelineEvent} from './reporter.js'

/** Envelope published for every non-log build event. */
export type TransportMessage = {
  /** Per-reporter sequence number, starting at 0 */
  seq: number;
  timestamp: string;
  version: 1;
  type: PipelineEvent['event'];
  buildId: string;
  jobId: string;
  event: PipelineEvent;
}

export type EventTransport = {
  publish(message: TransportMessage): Promise<void>;
  flush?(): Promise<void>;
}

export class InMemoryTransport implements EventTransport {
  readonly messages: TransportMessage[] = []

  async publish(message: TransportMessage): Promise<void> {
    this.messages.push(message)
  }

  clear(): void {
    this.messages.length = 0
  }
}

/**
 * Writes each message as one line of JSON to a writable stream.
 * flush() ends the stream; publishing after that rejects.
 */
export class NdjsonTransport implements EventTransport {
  /** Appends to `path`, creating it when missing. */
  static toFile(path: string): NdjsonTransport {
    return new NdjsonTransport(createWriteStream(path, {flags: 'a'}))
  }

  constructor(private readonly stream: Writable) {}

  async publish(message: TransportMessage): Promise<void> {
    if (this.stream.writableEnded) {
      throw new Error('Event stream is closed')
    }

    const line = JSON.stringify(message) + '\n'
    await new Promise<void>((resolve, reject) => {
      this.stream.write(line, error => {
        if (error) {
          reject(error)
        } else {
          resolve()
        }
      })
    })
  }

  async flush(): Promise<void> {
    if (this.stream.writableEnded) {
      return
    }

    this.stream.end()
    await finished(this.stream)
  }
}
