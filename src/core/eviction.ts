import {ValidationError} from '../errors.js'
import type {EvictionConfig} from '../types.js'
import type {CacheEntryInfo, EvictionPolicy} from './cache-store.js'

const dayMs = 24 * 60 * 60 * 1000

/** Least recently used first; ties broken by creation time, then fingerprint. */
function byLeastRecentlyUsed(a: CacheEntryInfo, b: CacheEntryInfo): number {
  return a.lastAccessedAt.localeCompare(b.lastAccessedAt)
    || a.createdAt.localeCompare(b.createdAt)
    || a.fingerprint.localeCompare(b.fingerprint)
}

/** Keep at most `maxEntries`, dropping the least recently used. */
export function lruPolicy({maxEntries}: {maxEntries: number}): EvictionPolicy {
  return {
    name: `lru(${maxEntries})`,
    select(entries) {
      const excess = entries.length - maxEntries
      if (excess <= 0) {
        return []
      }

      return [...entries].sort(byLeastRecentlyUsed).slice(0, excess).map(e => e.fingerprint)
    }
  }
}

/** Drop least recently used entries until the total payload size fits `maxBytes`. */
export function sizePolicy({maxBytes}: {maxBytes: number}): EvictionPolicy {
  return {
    name: `size(${maxBytes})`,
    select(entries) {
      let total = entries.reduce((sum, e) => sum + e.size, 0)
      const selected: string[] = []
      for (const entry of [...entries].sort(byLeastRecentlyUsed)) {
        if (total <= maxBytes) {
          break
        }

        selected.push(entry.fingerprint)
        total -= entry.size
      }

      return selected
    }
  }
}

/** Drop entries not accessed within `maxAgeMs`. */
export function maxAgePolicy({maxAgeMs}: {maxAgeMs: number}): EvictionPolicy {
  return {
    name: `max-age(${maxAgeMs}ms)`,
    select(entries, now) {
      const cutoff = now.getTime() - maxAgeMs
      return entries
        .filter(e => Date.parse(e.lastAccessedAt) < cutoff)
        .sort(byLeastRecentlyUsed)
        .map(e => e.fingerprint)
    }
  }
}

/** Select every entry. */
export function evictAll(): EvictionPolicy {
  return {
    name: 'all',
    select: entries => entries.map(e => e.fingerprint)
  }
}

/** Union of several policies, in the order they select. */
export function anyOf(...policies: EvictionPolicy[]): EvictionPolicy {
  return {
    name: policies.map(p => p.name).join('+'),
    select(entries, now) {
      const selected = new Set<string>()
      for (const policy of policies) {
        for (const fingerprint of policy.select(entries, now)) {
          selected.add(fingerprint)
        }
      }

      return [...selected]
    }
  }
}

/** Build a policy from configuration; undefined when nothing is bounded. */
export function policyFromConfig(config: EvictionConfig): EvictionPolicy | undefined {
  const policies: EvictionPolicy[] = []
  if (config.maxEntries !== undefined) {
    policies.push(lruPolicy({maxEntries: nonNegative('maxEntries', config.maxEntries)}))
  }

  if (config.maxBytes !== undefined) {
    policies.push(sizePolicy({maxBytes: nonNegative('maxBytes', config.maxBytes)}))
  }

  if (config.maxAgeDays !== undefined) {
    policies.push(maxAgePolicy({maxAgeMs: nonNegative('maxAgeDays', config.maxAgeDays) * dayMs}))
  }

  if (policies.length === 0) {
    return undefined
  }

  return policies.length === 1 ? policies[0] : anyOf(...policies)
}

function nonNegative(field: string, value: number): number {
  if (!Number.isFinite(value) || value < 0) {
    throw new ValidationError(`eviction.${field} must be a non-negative number`)
  }

  return value
}
