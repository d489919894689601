import {Buffer} from 'node:buffer'
import type {Artifact} from '../types.js'
import {BaseCacheStore, type CacheEntryInfo} from './cache-store.js'

type MemoryEntry = {
  artifact: Artifact;
  digest: string;
  lastAccessedAt: string;
  hits: number;
}

/**
 * Process-local store. Payloads are copied on the way in and out so callers
 * can never mutate a committed artifact.
 */
export class MemoryCacheStore extends BaseCacheStore {
  private readonly entries = new Map<string, MemoryEntry>()

  get size(): number {
    return this.entries.size
  }

  protected async hasEntry(fingerprint: string): Promise<boolean> {
    return this.entries.has(fingerprint)
  }

  protected async readEntry(fingerprint: string): Promise<Artifact | undefined> {
    const entry = this.entries.get(fingerprint)
    return entry ? copyArtifact(entry.artifact) : undefined
  }

  protected async writeEntry(fingerprint: string, artifact: Artifact, digest: string): Promise<boolean> {
    if (this.entries.has(fingerprint)) {
      return false
    }

    this.entries.set(fingerprint, {
      artifact: {
        payload: Buffer.from(artifact.payload),
        meta: {...artifact.meta, size: artifact.payload.byteLength}
      },
      digest,
      lastAccessedAt: artifact.meta.createdAt,
      hits: 0
    })
    return true
  }

  protected async removeEntry(fingerprint: string): Promise<boolean> {
    return this.entries.delete(fingerprint)
  }

  protected async touchEntry(fingerprint: string, at: Date): Promise<void> {
    const entry = this.entries.get(fingerprint)
    if (entry) {
      entry.lastAccessedAt = at.toISOString()
      entry.hits++
    }
  }

  protected async listEntries(): Promise<CacheEntryInfo[]> {
    return [...this.entries].map(([fingerprint, entry]) => ({
      fingerprint,
      stage: entry.artifact.meta.stage,
      size: entry.artifact.meta.size,
      digest: entry.digest,
      createdAt: entry.artifact.meta.createdAt,
      lastAccessedAt: entry.lastAccessedAt,
      hits: entry.hits
    }))
  }
}

function copyArtifact(artifact: Artifact): Artifact {
  return {payload: Buffer.from(artifact.payload), meta: {...artifact.meta}}
}
