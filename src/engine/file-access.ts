import {Buffer} from 'node:buffer'
import {createHash} from 'node:crypto'
import {readdir, readFile, realpath, stat} from 'node:fs/promises'
import {join, relative, resolve, sep} from 'node:path'
import {UnreadableInputError} from '../errors.js'

/**
 * Resolves file-reference inputs to bytes.
 */
export type FileAccess = {
  /**
   * @throws UnreadableInputError when the reference cannot be resolved
   */
  readInput(reference: string): Promise<Uint8Array>;
}

/**
 * Reads references relative to a root directory.
 *
 * A file resolves to its content. A directory resolves to a manifest: one
 * line per regular file, sorted by relative path, holding the JSON-quoted
 * path and the SHA-256 of its content. Symbolic links are followed; a link
 * back to an enclosing directory is listed once and a dangling link makes
 * the reference unreadable. References escaping the root are unreadable.
 */
export class LocalFileAccess implements FileAccess {
  readonly root: string

  constructor(root: string) {
    this.root = resolve(root)
  }

  async readInput(reference: string): Promise<Uint8Array> {
    const path = this.resolveReference(reference)

    try {
      const stats = await stat(path)
      if (stats.isDirectory()) {
        return await directoryManifest(path)
      }

      return await readFile(path)
    } catch (error) {
      throw new UnreadableInputError(reference, {cause: error})
    }
  }

  private resolveReference(reference: string): string {
    const resolved = resolve(this.root, reference)
    if (resolved !== this.root && !resolved.startsWith(this.root + sep)) {
      throw new UnreadableInputError(reference, {cause: new Error(`'${reference}' resolves outside ${this.root}`)})
    }

    return resolved
  }
}

async function directoryManifest(dirPath: string): Promise<Uint8Array> {
  const files = await listFiles(dirPath)
  const lines: string[] = []
  for (const file of files) {
    const content = await readFile(file)
    const digest = createHash('sha256').update(content).digest('hex')
    const path = relative(dirPath, file).split(sep).join('/')
    lines.push(`${JSON.stringify(path)}\t${digest}\n`)
  }

  return Buffer.from(lines.join(''), 'utf8')
}

async function listFiles(dirPath: string, ancestors: ReadonlySet<string> = new Set()): Promise<string[]> {
  const real = await realpath(dirPath)
  if (ancestors.has(real)) {
    return []
  }

  const enclosing = new Set([...ancestors, real])
  const entries = await readdir(dirPath, {withFileTypes: true})
  const files: string[] = []
  for (const entry of entries) {
    const fullPath = join(dirPath, entry.name)
    const target = entry.isSymbolicLink() ? await stat(fullPath) : entry
    if (target.isDirectory()) {
      files.push(...await listFiles(fullPath, enclosing))
    } else if (target.isFile()) {
      files.push(fullPath)
    }
  }

  return files.sort((a, b) => (a < b ? -1 : (a > b ? 1 : 0)))
}
