import {Buffer} from 'node:buffer'
import {createHash, type Hash} from 'node:crypto'
import {ValidationError} from '../errors.js'
import type {FileAccess} from '../engine/file-access.js'
import type {Artifact, Stage} from '../types.js'

/** Parent fingerprint used for stages that extend nothing. */
export const rootFingerprint = '0'.repeat(64)

const formatVersion = 'stagecache/v1'

/** SHA-256 of an artifact payload, hex encoded. */
export function artifactDigest(payload: Uint8Array): string {
  return createHash('sha256').update(payload).digest('hex')
}

/**
 * Computes cache keys for stages.
 *
 * ## Fingerprint Algorithm
 *
 * ```
 * SHA256(version, parentFingerprint | root, JSON(command), JSON(sorted env)?, ...inputs in order)
 * ```
 *
 * Every part is written as a `tag:byteLength:` frame followed by its bytes, so
 * two different input lists never serialize to the same stream. Inputs hash
 * as follows:
 * - `text`: the literal value
 * - `file`: the reference, then the bytes returned by the file-access collaborator
 * - `parent`: the digest of the parent artifact's payload
 *
 * Input order is significant. Env keys are sorted.
 *
 * ## Cache Propagation
 *
 * The parent fingerprint is chained into every child, so changing any stage
 * invalidates all of its descendants.
 */
export class Fingerprinter {
  constructor(private readonly files: FileAccess) {}

  /**
   * @throws UnreadableInputError when a file input cannot be read
   * @throws ValidationError when a `parent` input has no parent artifact
   */
  async fingerprint(stage: Stage, parentFingerprint?: string, parentArtifact?: Artifact): Promise<string> {
    const hash = createHash('sha256')
    writeFrame(hash, 'version', formatVersion)
    writeFrame(hash, 'parent', parentFingerprint ?? rootFingerprint)
    writeFrame(hash, 'command', JSON.stringify(stage.command))

    if (stage.env) {
      const entries = Object.entries(stage.env).sort((a, b) => compareKeys(a[0], b[0]))
      writeFrame(hash, 'env', JSON.stringify(entries))
    }

    for (const input of stage.inputs) {
      switch (input.kind) {
        case 'text': {
          writeFrame(hash, 'text', input.value)
          break
        }

        case 'file': {
          const content = await this.files.readInput(input.value)
          writeFrame(hash, 'file', input.value)
          writeFrame(hash, 'content', content)
          break
        }

        case 'parent': {
          if (!parentArtifact) {
            throw new ValidationError(`Stage '${stage.name}' declares a parent input but no parent artifact is available`)
          }

          writeFrame(hash, 'artifact', artifactDigest(parentArtifact.payload))
          break
        }
      }
    }

    return hash.digest('hex')
  }
}

function writeFrame(hash: Hash, tag: string, data: string | Uint8Array): void {
  const bytes = typeof data === 'string' ? Buffer.from(data, 'utf8') : data
  hash.update(`${tag}:${bytes.byteLength}:`)
  hash.update(bytes)
}

function compareKeys(a: string, b: string): number {
  if (a < b) {
    return -1
  }

  return a > b ? 1 : 0
}
