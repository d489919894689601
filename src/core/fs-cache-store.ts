import {randomUUID} from 'node:crypto'
import {access, mkdir, readdir, readFile, rename, rm, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import {CacheCorruptionError, CacheError} from '../errors.js'
import type {Artifact, ArtifactMeta} from '../types.js'
import {BaseCacheStore, type CacheEntryInfo} from './cache-store.js'
import {artifactDigest} from './fingerprint.js'
import {hasErrorCode} from './utils.js'

type EntryMeta = ArtifactMeta & {
  fingerprint: string;
  digest: string;
}

type EntryAccess = {
  lastAccessedAt: string;
  hits: number;
}

/**
 * Cache store backed by a directory.
 *
 * Layout:
 * - **objects/{fingerprint}/**: one committed entry
 *   - `payload.bin`: artifact bytes
 *   - `meta.json`: stage, size, createdAt, payload digest
 *   - `access.json`: lastAccessedAt and hit count
 * - **staging/**: entries being written or removed
 *
 * ## Entry Lifecycle
 *
 * 1. Files are written to `staging/{id}/`
 * 2. The directory is renamed to `objects/{fingerprint}/`. The rename fails
 *    when another process committed the same fingerprint first, in which case
 *    the staged copy is dropped and the payloads are compared.
 * 3. Removal renames the entry back into staging before deleting it, so a
 *    reader never sees a half-deleted entry.
 *
 * Payload digests are verified on every read.
 *
 * @example
 * ```typescript
 * const store = await FsCacheStore.open('.stagecache')
 * await store.put(fingerprint, artifact)
 * const cached = await store.get(fingerprint)
 * ```
 */
export class FsCacheStore extends BaseCacheStore {
  /**
   * Opens (creating if needed) a store rooted at `root`.
   * Leftover staging directories from interrupted writes are removed.
   */
  static async open(root: string): Promise<FsCacheStore> {
    await mkdir(join(root, 'objects'), {recursive: true})
    await mkdir(join(root, 'staging'), {recursive: true})
    const store = new FsCacheStore(root)
    await store.cleanupStaging()
    return store
  }

  private constructor(readonly root: string) {
    super()
  }

  /**
   * Returns the directory of a committed entry.
   * @throws InvalidFingerprintError for anything but a 64-char hex digest
   */
  entryPath(fingerprint: string): string {
    this.validateFingerprint(fingerprint)
    return join(this.root, 'objects', fingerprint)
  }

  async cleanupStaging(): Promise<void> {
    const stagingDir = join(this.root, 'staging')
    const entries = await readdir(stagingDir, {withFileTypes: true})
    for (const entry of entries) {
      await rm(join(stagingDir, entry.name), {recursive: true, force: true})
    }
  }

  protected async hasEntry(fingerprint: string): Promise<boolean> {
    try {
      await access(join(this.entryPath(fingerprint), 'meta.json'))
      return true
    } catch {
      return false
    }
  }

  protected async readEntry(fingerprint: string): Promise<Artifact | undefined> {
    const dir = this.entryPath(fingerprint)
    let meta: EntryMeta
    let payload: Uint8Array
    try {
      meta = JSON.parse(await readFile(join(dir, 'meta.json'), 'utf8')) as EntryMeta
      payload = await readFile(join(dir, 'payload.bin'))
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined
      }

      throw new CacheCorruptionError(fingerprint, 'entry files are unreadable', {cause: error})
    }

    if (meta.fingerprint !== fingerprint) {
      throw new CacheCorruptionError(fingerprint, `entry is recorded under ${meta.fingerprint}`)
    }

    if (payload.byteLength !== meta.size || artifactDigest(payload) !== meta.digest) {
      throw new CacheCorruptionError(fingerprint, 'payload does not match its recorded digest')
    }

    return {payload, meta: {stage: meta.stage, size: meta.size, createdAt: meta.createdAt}}
  }

  protected async writeEntry(fingerprint: string, artifact: Artifact, digest: string): Promise<boolean> {
    const target = this.entryPath(fingerprint)
    const staging = await this.prepareStaging()
    const meta: EntryMeta = {...artifact.meta, size: artifact.payload.byteLength, fingerprint, digest}
    const accessInfo: EntryAccess = {lastAccessedAt: artifact.meta.createdAt, hits: 0}

    try {
      await writeFile(join(staging, 'payload.bin'), artifact.payload)
      await writeFile(join(staging, 'meta.json'), JSON.stringify(meta, null, 2), 'utf8')
      await writeFile(join(staging, 'access.json'), JSON.stringify(accessInfo), 'utf8')
      await rename(staging, target)
      return true
    } catch (error) {
      await rm(staging, {recursive: true, force: true})
      if (hasErrorCode(error, 'ENOTEMPTY', 'EEXIST')) {
        return false
      }

      throw new CacheError('COMMIT_FAILED', `Failed to commit cache entry ${fingerprint}`, {cause: error})
    }
  }

  protected async removeEntry(fingerprint: string): Promise<boolean> {
    const doomed = join(this.root, 'staging', `rm-${randomUUID()}`)
    try {
      await rename(this.entryPath(fingerprint), doomed)
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return false
      }

      throw error
    }

    await rm(doomed, {recursive: true, force: true})
    return true
  }

  protected async touchEntry(fingerprint: string, at: Date): Promise<void> {
    const dir = this.entryPath(fingerprint)
    const current = await this.readAccess(dir)
    const next: EntryAccess = {lastAccessedAt: at.toISOString(), hits: (current?.hits ?? 0) + 1}
    const tmpPath = join(dir, `access-${randomUUID()}.tmp`)
    await writeFile(tmpPath, JSON.stringify(next), 'utf8')
    await rename(tmpPath, join(dir, 'access.json'))
  }

  protected async listEntries(): Promise<CacheEntryInfo[]> {
    const dirents = await readdir(join(this.root, 'objects'), {withFileTypes: true})
    const entries: CacheEntryInfo[] = []
    for (const dirent of dirents) {
      if (!dirent.isDirectory()) {
        continue
      }

      const dir = join(this.root, 'objects', dirent.name)
      let meta: EntryMeta
      try {
        meta = JSON.parse(await readFile(join(dir, 'meta.json'), 'utf8')) as EntryMeta
      } catch (error) {
        // Removed while listing
        if (hasErrorCode(error, 'ENOENT')) {
          continue
        }

        throw error
      }

      const accessInfo = await this.readAccess(dir)
      entries.push({
        fingerprint: dirent.name,
        stage: meta.stage,
        size: meta.size,
        digest: meta.digest,
        createdAt: meta.createdAt,
        lastAccessedAt: accessInfo?.lastAccessedAt ?? meta.createdAt,
        hits: accessInfo?.hits ?? 0
      })
    }

    return entries.sort((a, b) => a.fingerprint.localeCompare(b.fingerprint))
  }

  private async prepareStaging(): Promise<string> {
    const path = join(this.root, 'staging', randomUUID())
    await mkdir(path, {recursive: true})
    return path
  }

  private async readAccess(dir: string): Promise<EntryAccess | undefined> {
    try {
      return JSON.parse(await readFile(join(dir, 'access.json'), 'utf8')) as EntryAccess
    } catch (error) {
      if (hasErrorCode(error, 'ENOENT')) {
        return undefined
      }

      throw error
    }
  }
}
