import chalk from 'chalk'
import type {Command} from 'commander'
import {policyFromConfig} from '../../core/eviction.js'
import {formatSize, shortFingerprint} from '../../core/utils.js'
import type {EvictionConfig} from '../../types.js'
import {getGlobalOptions, openStagecache, parseNonNegative} from '../utils.js'

export function registerCacheCommand(program: Command): void {
  const cache = program
    .command('cache')
    .description('Inspect and maintain the artifact cache')

  cache
    .command('list')
    .alias('ls')
    .description('List cache entries')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const {stagecache} = await openStagecache(cmd)
      const entries = await stagecache.entries()

      if (json) {
        console.log(JSON.stringify(entries, null, 2))
        return
      }

      if (entries.length === 0) {
        console.log(chalk.gray('Cache is empty.'))
        return
      }

      const rows = entries.map(e => ({
        fingerprint: shortFingerprint(e.fingerprint),
        stage: e.stage,
        size: formatSize(e.size),
        hits: String(e.hits),
        accessed: e.lastAccessedAt.replace('T', ' ').replace(/\.\d+Z$/, '')
      }))

      const stageWidth = Math.max('STAGE'.length, ...rows.map(r => r.stage.length))
      const sizeWidth = Math.max('SIZE'.length, ...rows.map(r => r.size.length))
      const hitsWidth = Math.max('HITS'.length, ...rows.map(r => r.hits.length))

      console.log(chalk.bold(
        `${'FINGERPRINT'.padEnd(12)}  ${'STAGE'.padEnd(stageWidth)}  ${'SIZE'.padStart(sizeWidth)}  ${'HITS'.padStart(hitsWidth)}  LAST ACCESSED`
      ))
      for (const row of rows) {
        console.log(`${chalk.cyan(row.fingerprint)}  ${row.stage.padEnd(stageWidth)}  ${row.size.padStart(sizeWidth)}  ${row.hits.padStart(hitsWidth)}  ${row.accessed}`)
      }

      const total = entries.reduce((sum, e) => sum + e.size, 0)
      console.log(chalk.gray(`\n${entries.length} entr${entries.length > 1 ? 'ies' : 'y'}, ${formatSize(total)}`))
    })

  cache
    .command('rm')
    .description('Remove cache entries by fingerprint (or unambiguous prefix)')
    .argument('<fingerprint...>', 'Fingerprints or prefixes of at least 4 characters')
    .action(async (references: string[], _options: Record<string, unknown>, cmd: Command) => {
      const {stagecache} = await openStagecache(cmd)
      const {removed, kept} = await stagecache.remove(references)
      for (const fingerprint of removed) {
        console.log(chalk.green(`Removed ${shortFingerprint(fingerprint)}`))
      }

      if (kept.length > 0) {
        console.log(chalk.yellow(`${kept.length} entr${kept.length > 1 ? 'ies were' : 'y was'} in use and kept`))
      }
    })

  cache
    .command('prune')
    .description('Evict entries beyond the given limits (default: eviction settings from .stagecache.yml)')
    .option('--max-entries <count>', 'Keep at most this many entries', parseNonNegative)
    .option('--max-bytes <bytes>', 'Keep the total payload size under this bound', parseNonNegative)
    .option('--max-age-days <days>', 'Evict entries not accessed within this many days', parseNonNegative)
    .action(async (options: EvictionConfig, cmd: Command) => {
      const {json} = getGlobalOptions(cmd)
      const {stagecache} = await openStagecache(cmd)
      const removed = await stagecache.prune(policyFromConfig(options))

      if (json) {
        console.log(JSON.stringify(removed))
        return
      }

      if (removed.length === 0) {
        console.log(chalk.gray('Nothing to prune.'))
        return
      }

      console.log(chalk.green(`Pruned ${removed.length} entr${removed.length > 1 ? 'ies' : 'y'}.`))
    })

  cache
    .command('clear')
    .description('Remove every cache entry')
    .action(async (_options: Record<string, unknown>, cmd: Command) => {
      const {stagecache} = await openStagecache(cmd)
      const removed = await stagecache.clear()

      if (removed.length === 0) {
        console.log(chalk.gray('Cache is already empty.'))
        return
      }

      console.log(chalk.green(`Removed ${removed.length} entr${removed.length > 1 ? 'ies' : 'y'}.`))
    })
}
