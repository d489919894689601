import process from 'node:process'
import type {Command} from 'commander'
import {BuildCancelledError, RunnerFailureError, ValidationError} from '../../errors.js'
import {ConsoleReporter, type Reporter} from '../../core/reporter.js'
import {CompositeReporter, StreamReporter} from '../../core/stream-reporter.js'
import {NdjsonTransport} from '../../core/transport.js'
import type {BuildOptions} from '../../core/pipeline-controller.js'
import type {BuildReport, ExecutionMode} from '../../types.js'
import {InteractiveReporter} from '../interactive-reporter.js'
import {getGlobalOptions, openStagecache, parseList, parsePositiveInt, resolveBuildFile} from '../utils.js'

export type RunCommandOptions = {
  target?: string;
  force?: string | boolean;
  concurrency?: number;
  mode?: string;
  failFast?: boolean;
  dryRun?: boolean;
  verbose?: boolean;
  events?: string;
}

export function registerRunCommand(program: Command): void {
  program
    .command('run')
    .description('Build every stage, reusing cached artifacts')
    .argument('[build]', 'Build file or directory (default: current directory)')
    .option('-t, --target <stages>', 'Build only these stages and their ancestors (comma-separated)')
    .option('-f, --force [stages]', 'Skip cache for all stages, or a comma-separated list (e.g. --force compile,package)')
    .option('-c, --concurrency <number>', 'Max stages running at once in parallel mode (default: CPU count)', parsePositiveInt)
    .option('-m, --mode <mode>', 'sequential or parallel')
    .option('--fail-fast', 'Start no further stage once one has failed')
    .option('--dry-run', 'Show what would run without running anything')
    .option('--verbose', 'Stream stage output in real-time (interactive mode)')
    .option('--events <file>', 'Append build events to this file as JSON lines')
    .action(async (buildArg: string | undefined, options: RunCommandOptions, cmd: Command) => {
      await runBuild(buildArg, options, cmd)
    })

  program
    .command('plan')
    .description('Fingerprint every stage and show which would run')
    .argument('[build]', 'Build file or directory (default: current directory)')
    .option('-t, --target <stages>', 'Plan only these stages and their ancestors (comma-separated)')
    .option('-f, --force [stages]', 'Treat all stages, or a comma-separated list, as uncached')
    .action(async (buildArg: string | undefined, options: RunCommandOptions, cmd: Command) => {
      await runBuild(buildArg, {...options, dryRun: true}, cmd)
    })
}

async function runBuild(buildArg: string | undefined, options: RunCommandOptions, cmd: Command): Promise<void> {
  const buildFile = await resolveBuildFile(buildArg)
  const {json} = getGlobalOptions(cmd)
  const display = json ? new ConsoleReporter() : new InteractiveReporter({verbose: options.verbose})
  const eventLog = options.events ? new StreamReporter(NdjsonTransport.toFile(options.events)) : undefined
  const reporter: Reporter = eventLog ? new CompositeReporter(display, eventLog) : display
  const {stagecache} = await openStagecache(cmd, reporter)
  const build = await stagecache.load(buildFile)

  const abort = new AbortController()
  const onSignal = () => {
    abort.abort(new BuildCancelledError())
  }

  process.once('SIGINT', onSignal)
  process.once('SIGTERM', onSignal)

  let report: BuildReport
  try {
    report = await stagecache.build(build, toBuildOptions(options, abort.signal))
  } finally {
    process.off('SIGINT', onSignal)
    process.off('SIGTERM', onSignal)
    await eventLog?.flush()
  }

  if (report.status === 'cancelled') {
    throw new BuildCancelledError()
  }

  if (report.status === 'failed') {
    const failed = report.results.find(r => r.stage === report.failedStage)
    throw new RunnerFailureError(report.failedStage ?? 'unknown', failed?.exitCode)
  }

  if (json) {
    console.log(options.dryRun ? 'Plan completed' : 'Build completed')
  }
}

export function toBuildOptions(options: RunCommandOptions, signal?: AbortSignal): BuildOptions {
  const force = options.force === true
    ? true
    : (typeof options.force === 'string' ? parseList(options.force) : undefined)

  return {
    targets: options.target ? parseList(options.target) : undefined,
    force,
    concurrency: options.concurrency,
    mode: options.mode === undefined ? undefined : parseMode(options.mode),
    failFast: options.failFast,
    dryRun: options.dryRun,
    signal
  }
}

function parseMode(mode: string): ExecutionMode {
  if (mode !== 'sequential' && mode !== 'parallel') {
    throw new ValidationError(`--mode must be 'sequential' or 'parallel', got '${mode}'`)
  }

  return mode
}
