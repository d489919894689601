import {Buffer} from 'node:buffer'
import {CacheCorruptionError, CacheMissError, InvalidFingerprintError} from '../errors.js'
import type {Artifact} from '../types.js'
import {artifactDigest} from './fingerprint.js'
import {KeyedLock} from './keyed-lock.js'

/** Listing entry for a committed artifact. */
export type CacheEntryInfo = {
  fingerprint: string;
  stage: string;
  size: number;
  /** SHA-256 of the payload */
  digest: string;
  createdAt: string;
  /** Access-order signal */
  lastAccessedAt: string;
  /** Frequency signal: number of successful `get` calls */
  hits: number;
}

/**
 * Chooses entries to remove. Receives every entry; entries pinned by an
 * in-flight read are filtered out by the store afterwards.
 */
export type EvictionPolicy = {
  name: string;
  select(entries: CacheEntryInfo[], now: Date): string[];
}

export type PutResult = 'stored' | 'unchanged' | 'replaced'

export type PutOptions = {
  /** Overwrite an existing entry whose payload differs instead of failing. */
  replace?: boolean;
}

/**
 * Fingerprint → artifact mapping.
 *
 * A fingerprint maps to exactly one payload: committing a different payload
 * under an existing fingerprint is a `CacheCorruptionError`, unless the
 * caller asks to replace it (forced rebuilds).
 */
export type CacheStore = {
  has(fingerprint: string): Promise<boolean>;
  /** @throws CacheMissError when absent */
  get(fingerprint: string): Promise<Artifact>;
  /** Idempotent for byte-identical payloads. */
  put(fingerprint: string, artifact: Artifact, options?: PutOptions): Promise<PutResult>;
  /** @returns Removed fingerprints */
  evict(policy: EvictionPolicy): Promise<string[]>;
  /** Removes one entry. Returns false when absent or being read. */
  invalidate(fingerprint: string): Promise<boolean>;
  list(): Promise<CacheEntryInfo[]>;
}

const fingerprintPattern = /^[a-f\d]{64}$/

/**
 * Shared store semantics over a backing medium.
 *
 * Subclasses provide the storage primitives; this class owns validation,
 * the per-fingerprint lock (first writer wins, other fingerprints are never
 * blocked), read pins that keep eviction away from in-flight reads, and the
 * corruption check on conflicting writes.
 */
export abstract class BaseCacheStore implements CacheStore {
  private readonly locks = new KeyedLock()
  private readonly pins = new Map<string, number>()

  async has(fingerprint: string): Promise<boolean> {
    this.validateFingerprint(fingerprint)
    return this.hasEntry(fingerprint)
  }

  async get(fingerprint: string): Promise<Artifact> {
    this.validateFingerprint(fingerprint)
    await this.locks.withLock(fingerprint, async () => {
      this.pin(fingerprint)
    })

    try {
      const artifact = await this.readEntry(fingerprint)
      if (!artifact) {
        throw new CacheMissError(fingerprint)
      }

      await this.touchEntry(fingerprint, new Date())
      return artifact
    } finally {
      this.unpin(fingerprint)
    }
  }

  async put(fingerprint: string, artifact: Artifact, options: PutOptions = {}): Promise<PutResult> {
    this.validateFingerprint(fingerprint)
    return this.locks.withLock(fingerprint, async () => {
      const existing = await this.readEntry(fingerprint)
      if (existing) {
        if (!options.replace || Buffer.compare(existing.payload, artifact.payload) === 0) {
          return this.compare(fingerprint, existing, artifact)
        }

        await this.removeEntry(fingerprint)
      }

      const written = await this.writeEntry(fingerprint, artifact, artifactDigest(artifact.payload))
      if (written) {
        return existing ? 'replaced' : 'stored'
      }

      // Another process committed first
      const winner = await this.readEntry(fingerprint)
      if (!winner) {
        throw new CacheCorruptionError(fingerprint, 'entry disappeared while committing')
      }

      return this.compare(fingerprint, winner, artifact)
    })
  }

  async evict(policy: EvictionPolicy): Promise<string[]> {
    const entries = await this.listEntries()
    const removed: string[] = []
    for (const fingerprint of policy.select(entries, new Date())) {
      if (await this.invalidate(fingerprint)) {
        removed.push(fingerprint)
      }
    }

    return removed
  }

  async invalidate(fingerprint: string): Promise<boolean> {
    this.validateFingerprint(fingerprint)
    return this.locks.withLock(fingerprint, async () => {
      if (this.isPinned(fingerprint)) {
        return false
      }

      return this.removeEntry(fingerprint)
    })
  }

  async list(): Promise<CacheEntryInfo[]> {
    return this.listEntries()
  }

  isPinned(fingerprint: string): boolean {
    return (this.pins.get(fingerprint) ?? 0) > 0
  }

  protected abstract hasEntry(fingerprint: string): Promise<boolean>

  /** Returns undefined when absent. */
  protected abstract readEntry(fingerprint: string): Promise<Artifact | undefined>

  /** Returns false when an entry already exists (lost a commit race). */
  protected abstract writeEntry(fingerprint: string, artifact: Artifact, digest: string): Promise<boolean>

  /** Returns false when absent. */
  protected abstract removeEntry(fingerprint: string): Promise<boolean>

  protected abstract touchEntry(fingerprint: string, at: Date): Promise<void>

  protected abstract listEntries(): Promise<CacheEntryInfo[]>

  protected validateFingerprint(fingerprint: string): void {
    if (!fingerprintPattern.test(fingerprint)) {
      throw new InvalidFingerprintError(fingerprint)
    }
  }

  private compare(fingerprint: string, existing: Artifact, incoming: Artifact): PutResult {
    if (Buffer.compare(existing.payload, incoming.payload) === 0) {
      return 'unchanged'
    }

    throw new CacheCorruptionError(fingerprint, `stage '${incoming.meta.stage}' produced a payload that differs from the committed one`)
  }

  private pin(fingerprint: string): void {
    this.pins.set(fingerprint, (this.pins.get(fingerprint) ?? 0) + 1)
  }

  private unpin(fingerprint: string): void {
    const count = (this.pins.get(fingerprint) ?? 0) - 1
    if (count > 0) {
      this.pins.set(fingerprint, count)
    } else {
      this.pins.delete(fingerprint)
    }
  }
}
