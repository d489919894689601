#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import chalk from 'chalk'
import {Command} from 'commander'
import {StagecacheError} from '../errors.js'
import {registerCacheCommand} from './commands/cache.js'
import {registerRunCommand} from './commands/run.js'

async function main() {
  const program = new Command()

  program
    .name('stagecache')
    .description('Staged builds with content-addressed caching')
    .version('0.1.0')
    .option('--cache-dir <path>', 'Cache directory (default: $STAGECACHE_DIR, .stagecache.yml or ./.stagecache)')
    .option('--json', 'Output structured JSON logs')

  registerRunCommand(program)
  registerCacheCommand(program)

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof StagecacheError) {
    console.error(chalk.red(error.message))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
