import process from 'node:process'
import {access, stat} from 'node:fs/promises'
import {join, resolve} from 'node:path'
import type {Command} from 'commander'
import {ValidationError} from '../errors.js'
import type {Reporter} from '../core/reporter.js'
import {Stagecache} from '../stagecache.js'
import type {StagecacheConfig} from '../types.js'
import {loadConfig} from './config.js'

export type GlobalOptions = {
  cacheDir?: string;
  json?: boolean;
}

export function getGlobalOptions(cmd: Command): GlobalOptions {
  return cmd.optsWithGlobals<GlobalOptions>()
}

export const buildFilenames = ['build.yml', 'build.yaml', 'build.json']

/** Resolves a build file argument: a file, or a directory holding one of `buildFilenames`. */
export async function resolveBuildFile(pathOrDir?: string): Promise<string> {
  const target = resolve(pathOrDir ?? process.cwd())

  try {
    const stats = await stat(target)
    if (stats.isFile()) {
      return target
    }
  } catch (error) {
    throw new ValidationError(`Path does not exist: ${target}`, {cause: error})
  }

  for (const filename of buildFilenames) {
    const candidate = join(target, filename)
    if (await exists(candidate)) {
      return candidate
    }
  }

  throw new ValidationError(
    `No build file found in ${target}. Expected one of: ${buildFilenames.join(', ')}`
  )
}

async function exists(path: string): Promise<boolean> {
  return access(path).then(() => true, () => false)
}

/** Splits a comma-separated option value, dropping empty items. */
export function parseList(value: string): string[] {
  return value.split(',').map(item => item.trim()).filter(item => item !== '')
}

/** Commander argument parser for positive integers. */
export function parsePositiveInt(value: string): number {
  const parsed = Number(value)
  if (!Number.isInteger(parsed) || parsed < 1) {
    throw new ValidationError(`Expected a positive integer, got '${value}'`)
  }

  return parsed
}

/** Commander argument parser for non-negative numbers. */
export function parseNonNegative(value: string): number {
  const parsed = Number(value)
  if (value.trim() === '' || !Number.isFinite(parsed) || parsed < 0) {
    throw new ValidationError(`Expected a non-negative number, got '${value}'`)
  }

  return parsed
}

/**
 * Opens the cache for a command. The cache directory comes from `--cache-dir`,
 * then `STAGECACHE_DIR`, then `.stagecache.yml`, then `./.stagecache`.
 */
export async function openStagecache(cmd: Command, reporter?: Reporter): Promise<{stagecache: Stagecache; config: StagecacheConfig}> {
  const {cacheDir} = getGlobalOptions(cmd)
  const config = await loadConfig(process.cwd())
  const stagecache = await Stagecache.open({
    cacheDir: cacheDir ?? process.env.STAGECACHE_DIR ?? config.cacheDir ?? './.stagecache',
    reporter,
    config
  })
  return {stagecache, config}
}
