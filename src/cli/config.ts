import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ValidationError} from '../errors.js'
import {hasErrorCode} from '../core/utils.js'
import type {EvictionConfig, StagecacheConfig} from '../types.js'

export const configFilename = '.stagecache.yml'

/**
 * Loads the project-level `.stagecache.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 * @throws ValidationError when a known key has the wrong shape
 */
export async function loadConfig(dir: string): Promise<StagecacheConfig> {
  let content: string
  try {
    content = await readFile(join(dir, configFilename), 'utf8')
  } catch (error: unknown) {
    if (hasErrorCode(error, 'ENOENT')) {
      return {}
    }

    throw error
  }

  const parsed: unknown = parseYaml(content)
  if (parsed === null || parsed === undefined) {
    return {}
  }

  return parseConfig(parsed)
}

export function parseConfig(raw: unknown): StagecacheConfig {
  if (!isRecord(raw)) {
    throw new ValidationError(`${configFilename} must contain a mapping`)
  }

  const config: StagecacheConfig = {}
  if (raw.cacheDir !== undefined) {
    if (typeof raw.cacheDir !== 'string' || raw.cacheDir === '') {
      throw new ValidationError('cacheDir must be a non-empty string')
    }

    config.cacheDir = raw.cacheDir
  }

  if (raw.mode !== undefined) {
    if (raw.mode !== 'sequential' && raw.mode !== 'parallel') {
      throw new ValidationError(`mode must be 'sequential' or 'parallel', got '${String(raw.mode)}'`)
    }

    config.mode = raw.mode
  }

  if (raw.concurrency !== undefined) {
    if (typeof raw.concurrency !== 'number' || !Number.isInteger(raw.concurrency) || raw.concurrency < 1) {
      throw new ValidationError('concurrency must be a positive integer')
    }

    config.concurrency = raw.concurrency
  }

  if (raw.failFast !== undefined) {
    if (typeof raw.failFast !== 'boolean') {
      throw new ValidationError('failFast must be a boolean')
    }

    config.failFast = raw.failFast
  }

  if (raw.eviction !== undefined) {
    config.eviction = parseEviction(raw.eviction)
  }

  return config
}

function parseEviction(raw: unknown): EvictionConfig {
  if (!isRecord(raw)) {
    throw new ValidationError('eviction must be a mapping')
  }

  const eviction: EvictionConfig = {}
  for (const key of ['maxEntries', 'maxBytes', 'maxAgeDays'] as const) {
    const value = raw[key]
    if (value === undefined) {
      continue
    }

    if (typeof value !== 'number' || !Number.isFinite(value) || value < 0) {
      throw new ValidationError(`eviction.${key} must be a non-negative number`)
    }

    eviction[key] = value
  }

  return eviction
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
