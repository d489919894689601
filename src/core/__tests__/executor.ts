import {setImmediate} from 'node:timers/promises'
import test from 'ava'
import {CacheCorruptionError} from '../../errors.js'
import {Executor, type ExecuteOptions, type ExecutionSummary} from '../executor.js'
import {Fingerprinter} from '../fingerprint.js'
import {MemoryCacheStore} from '../memory-cache-store.js'
import {StageGraph} from '../stage-graph.js'
import type {BuildOutcome, StageDefinition} from '../../types.js'
import type {PipelineEvent} from '../reporter.js'
import {
  MemoryFileAccess,
  RacingStore,
  ScriptedRunner,
  deferred,
  eventNames,
  recordingReporter,
  text,
  type ScriptedBehavior
} from '../../__tests__/helpers.js'

const job = {buildId: 'app', jobId: 'job-1'}

type RunSetup = {
  behaviors?: Record<string, ScriptedBehavior>;
  files?: Map<string, string>;
  options?: ExecuteOptions;
}

async function run(store: MemoryCacheStore, definitions: StageDefinition[], setup: RunSetup = {}) {
  const runner = new ScriptedRunner(setup.behaviors)
  const {reporter, events} = recordingReporter()
  const executor = new Executor(store, new Fingerprinter(new MemoryFileAccess(setup.files)), runner, reporter)
  const summary = await executor.execute(StageGraph.build(definitions), job, setup.options)
  return {summary, runner, events}
}

function outcomes(summary: ExecutionSummary): Record<string, BuildOutcome> {
  return Object.fromEntries(summary.results.map(r => [r.stage, r.outcome]))
}

function chain(sourceHash: string): StageDefinition[] {
  return [
    {name: 'deps', command: 'install', inputs: [{kind: 'text', value: 'lock-1'}]},
    {name: 'compile', parent: 'deps', command: 'compile', inputs: [{kind: 'text', value: sourceHash}]},
    {name: 'package', parent: 'compile', command: 'package', inputs: [{kind: 'parent'}]}
  ]
}

async function until(condition: () => boolean): Promise<void> {
  while (!condition()) {
    await setImmediate()
  }
}

function skipReasons(events: PipelineEvent[]): Record<string, string> {
  const reasons: Record<string, string> = {}
  for (const event of events) {
    if (event.event === 'STAGE_SKIPPED') {
      reasons[event.stage] = event.reason
    }
  }

  return reasons
}

// -- Caching -----------------------------------------------------------------

test('first build runs every stage and commits its artifact', async t => {
  const store = new MemoryCacheStore()
  const {summary, runner} = await run(store, chain('src-1'))

  t.deepEqual(runner.stages, ['deps', 'compile', 'package'])
  t.deepEqual(outcomes(summary), {deps: 'built', compile: 'built', package: 'built'})
  t.is(store.size, 3)
  t.is(text(summary.artifacts.get('package')?.payload), 'package(compile(deps()))')
  t.deepEqual(summary.failed, [])
  t.deepEqual(summary.skipped, [])
  t.false(summary.cancelled)
})

test('children receive the parent artifact', async t => {
  const store = new MemoryCacheStore()
  const {runner} = await run(store, chain('src-1'))

  t.is(runner.calls[0].parentArtifact, undefined)
  t.is(text(runner.calls[1].parentArtifact?.payload), 'deps()')
  t.is(text(runner.calls[2].parentArtifact?.payload), 'compile(deps())')
})

test('an unchanged build is served entirely from the cache', async t => {
  const store = new MemoryCacheStore()
  const first = await run(store, chain('src-1'))
  const second = await run(store, chain('src-1'))

  t.deepEqual(second.runner.stages, [])
  t.deepEqual(outcomes(second.summary), {deps: 'cache-hit', compile: 'cache-hit', package: 'cache-hit'})
  t.deepEqual([...second.summary.fingerprints], [...first.summary.fingerprints])
  t.is(text(second.summary.artifacts.get('package')?.payload), 'package(compile(deps()))')
})

test('a changed input rebuilds the stage and its descendants only', async t => {
  const store = new MemoryCacheStore()
  const first = await run(store, chain('src-1'))
  const third = await run(store, chain('src-2'))

  t.deepEqual(third.runner.stages, ['compile', 'package'])
  t.deepEqual(outcomes(third.summary), {deps: 'cache-hit', compile: 'built', package: 'built'})
  t.is(third.summary.fingerprints.get('deps'), first.summary.fingerprints.get('deps'))
  t.not(third.summary.fingerprints.get('compile'), first.summary.fingerprints.get('compile'))
  t.not(third.summary.fingerprints.get('package'), first.summary.fingerprints.get('package'))
  t.is(store.size, 5)
})

test('a changed command leaves independent branches cached', async t => {
  const store = new MemoryCacheStore()
  const definitions = (compileCommand: string): StageDefinition[] => [
    {name: 'deps', command: 'install'},
    {name: 'docs', command: 'docs'},
    {name: 'compile', parent: 'deps', command: compileCommand},
    {name: 'lint', parent: 'deps', command: 'lint'}
  ]

  await run(store, definitions('tsc'))
  const {summary, runner} = await run(store, definitions('tsc --strict'))

  t.deepEqual(runner.stages, ['compile'])
  t.deepEqual(outcomes(summary), {deps: 'cache-hit', docs: 'cache-hit', compile: 'built', lint: 'cache-hit'})
})

test('a lookup racing an eviction counts as a miss', async t => {
  class RacingStore extends MemoryCacheStore {
    override async has(): Promise<boolean> {
      return true
    }
  }

  const store = new RacingStore()
  const {summary, runner} = await run(store, [{name: 'deps', command: 'install'}])

  t.deepEqual(runner.stages, ['deps'])
  t.deepEqual(outcomes(summary), {deps: 'built'})
})

// -- Events & transitions ----------------------------------------------------

test('a built stage reports starting then built', async t => {
  const store = new MemoryCacheStore()
  const {events, summary} = await run(store, [{name: 'deps', command: 'install'}], {
    behaviors: {deps: {logs: [{stream: 'stdout', line: 'added 3 packages'}]}}
  })

  t.deepEqual(eventNames(events, 'deps'), ['STAGE_STARTING', 'STAGE_LOG', 'STAGE_BUILT'])
  const log = events.find(e => e.event === 'STAGE_LOG')
  t.deepEqual(log, {...job, event: 'STAGE_LOG', stage: 'deps', stream: 'stdout', line: 'added 3 packages'})
  const built = events.find(e => e.event === 'STAGE_BUILT')
  t.is(built?.event === 'STAGE_BUILT' ? built.artifactSize : undefined, 'deps()'.length)
  t.is(summary.results[0].exitCode, 0)
})

test('a cached stage reports only cached', async t => {
  const store = new MemoryCacheStore()
  await run(store, [{name: 'deps', command: 'install'}])
  const {events} = await run(store, [{name: 'deps', command: 'install'}])

  t.deepEqual(eventNames(events), ['STAGE_CACHED'])
})

test('stages move through the lifecycle states', async t => {
  const store = new MemoryCacheStore()
  const transitions: string[] = []
  const options: ExecuteOptions = {
    onTransition(stage, from, to) {
      transitions.push(`${stage}:${from}>${to}`)
    }
  }

  await run(store, [{name: 'deps', command: 'install'}], {options})
  t.deepEqual(transitions, [
    'deps:pending>fingerprinting',
    'deps:fingerprinting>cache-check',
    'deps:cache-check>running',
    'deps:running>committing',
    'deps:committing>done'
  ])

  transitions.length = 0
  await run(store, [{name: 'deps', command: 'install'}], {options})
  t.deepEqual(transitions, [
    'deps:pending>fingerprinting',
    'deps:fingerprinting>cache-check',
    'deps:cache-check>done'
  ])
})

// -- Failures ----------------------------------------------------------------

test('a non-zero exit fails the stage and skips its descendants', async t => {
  const store = new MemoryCacheStore()
  const {summary, runner, events} = await run(store, [
    {name: 'deps', command: 'install'},
    {name: 'compile', parent: 'deps', command: 'compile'},
    {name: 'package', parent: 'compile', command: 'package'},
    {name: 'lint', parent: 'deps', command: 'lint'}
  ], {behaviors: {compile: {exitCode: 2}}})

  t.deepEqual(runner.stages, ['deps', 'compile', 'lint'])
  t.deepEqual(summary.failed, ['compile'])
  t.deepEqual(summary.skipped, ['package'])
  t.deepEqual(skipReasons(events), {package: 'dependency'})
  t.deepEqual(eventNames(events, 'package'), ['STAGE_SKIPPED'])

  const failed = summary.results.find(r => r.stage === 'compile')
  t.is(failed?.outcome, 'failed')
  t.is(failed?.exitCode, 2)
  t.is(failed?.error, 'Command exited with code 2')
  t.is(typeof failed?.fingerprint, 'string')
  t.deepEqual(outcomes(summary), {deps: 'built', compile: 'failed', lint: 'built'})
  t.is(store.size, 2)
})

test('a failed stage is not committed and runs again next time', async t => {
  const store = new MemoryCacheStore()
  await run(store, [{name: 'deps', command: 'install'}], {behaviors: {deps: {exitCode: 1}}})
  const {summary} = await run(store, [{name: 'deps', command: 'install'}])

  t.deepEqual(outcomes(summary), {deps: 'built'})
})

test('a runner exception fails the stage with its message', async t => {
  const store = new MemoryCacheStore()
  const {summary} = await run(store, [{name: 'deps', command: 'install'}], {
    behaviors: {deps: {throws: new Error('spawn sh ENOENT')}}
  })

  t.is(summary.results[0].outcome, 'failed')
  t.is(summary.results[0].error, 'spawn sh ENOENT')
  t.is(summary.results[0].exitCode, undefined)
})

test('an unreadable file input fails the stage before the runner', async t => {
  const store = new MemoryCacheStore()
  const transitions: string[] = []
  const {summary, runner} = await run(store, [
    {name: 'compile', command: 'tsc', inputs: [{kind: 'file', value: 'src/missing.ts'}]}
  ], {
    options: {
      onTransition(_stage, from, to) {
        transitions.push(`${from}>${to}`)
      }
    }
  })

  t.deepEqual(runner.stages, [])
  t.deepEqual(transitions, ['pending>fingerprinting', 'fingerprinting>failed'])
  t.is(summary.results[0].fingerprint, undefined)
  t.is(summary.results[0].error, 'Cannot read input \'src/missing.ts\'')
})

test('file inputs come from the file-access collaborator', async t => {
  const store = new MemoryCacheStore()
  const definitions: StageDefinition[] = [
    {name: 'compile', command: 'tsc', inputs: [{kind: 'file', value: 'src/main.ts'}]}
  ]

  const first = await run(store, definitions, {files: new Map([['src/main.ts', 'v1']])})
  const same = await run(store, definitions, {files: new Map([['src/main.ts', 'v1']])})
  const changed = await run(store, definitions, {files: new Map([['src/main.ts', 'v2']])})

  t.deepEqual(outcomes(first.summary), {compile: 'built'})
  t.deepEqual(outcomes(same.summary), {compile: 'cache-hit'})
  t.deepEqual(outcomes(changed.summary), {compile: 'built'})
})

test('fail-fast starts nothing after the first failure', async t => {
  const store = new MemoryCacheStore()
  const {summary, runner, events} = await run(store, [
    {name: 'lint', command: 'lint'},
    {name: 'docs', command: 'docs'}
  ], {behaviors: {lint: {exitCode: 1}}, options: {failFast: true}})

  t.deepEqual(runner.stages, ['lint'])
  t.deepEqual(summary.skipped, ['docs'])
  t.deepEqual(skipReasons(events), {docs: 'fail-fast'})
})

test('a conflicting commit aborts the execution', async t => {
  const store = new RacingStore('rival')

  await t.throwsAsync(
    async () => run(store, [{name: 'deps', command: 'install'}], {behaviors: {deps: {payload: 'mine'}}}),
    {instanceOf: CacheCorruptionError}
  )
})

test('a conflicting commit aborts a parallel execution', async t => {
  const store = new RacingStore('rival')

  await t.throwsAsync(
    async () => run(store, [{name: 'deps', command: 'install'}, {name: 'docs', command: 'docs'}], {
      behaviors: {deps: {payload: 'mine'}},
      options: {mode: 'parallel', concurrency: 1}
    }),
    {instanceOf: CacheCorruptionError}
  )
})

// -- Force & dry run ---------------------------------------------------------

test('force skips the cache lookup for every stage', async t => {
  const store = new MemoryCacheStore()
  await run(store, chain('src-1'))
  const {summary, runner} = await run(store, chain('src-1'), {options: {force: true}})

  t.deepEqual(runner.stages, ['deps', 'compile', 'package'])
  t.deepEqual(outcomes(summary), {deps: 'built', compile: 'built', package: 'built'})
  t.is(store.size, 3)
})

test('a forced rebuild with a different payload replaces the cached entry', async t => {
  const store = new MemoryCacheStore()
  const first = await run(store, [{name: 'deps', command: 'install'}], {behaviors: {deps: {payload: 'one'}}})
  const forced = await run(store, [{name: 'deps', command: 'install'}], {
    behaviors: {deps: {payload: 'two'}},
    options: {force: ['deps']}
  })

  t.deepEqual(outcomes(forced.summary), {deps: 'built'})
  t.is(text(forced.summary.artifacts.get('deps')?.payload), 'two')
  t.is(store.size, 1)

  const fingerprint = first.summary.results[0]?.fingerprint ?? ''
  t.is(forced.summary.results[0]?.fingerprint, fingerprint)
  t.is(text((await store.get(fingerprint)).payload), 'two')

  const again = await run(store, [{name: 'deps', command: 'install'}])
  t.deepEqual(outcomes(again.summary), {deps: 'cache-hit'})
  t.is(text(again.summary.artifacts.get('deps')?.payload), 'two')
})

test('force with names skips the lookup for those stages only', async t => {
  const store = new MemoryCacheStore()
  await run(store, chain('src-1'))
  const {summary, runner} = await run(store, chain('src-1'), {options: {force: ['compile']}})

  t.deepEqual(runner.stages, ['compile'])
  t.deepEqual(outcomes(summary), {deps: 'cache-hit', compile: 'built', package: 'cache-hit'})
})

test('a dry run reports what would run without running it', async t => {
  const store = new MemoryCacheStore()
  const {summary, runner, events} = await run(store, chain('src-1'), {options: {dryRun: true}})

  t.deepEqual(runner.stages, [])
  t.is(store.size, 0)
  t.deepEqual(summary.results, [])
  t.deepEqual(eventNames(events), ['STAGE_WOULD_RUN', 'STAGE_WOULD_RUN', 'STAGE_WOULD_RUN'])

  const [deps, compile] = events
  t.is(deps.event === 'STAGE_WOULD_RUN' ? deps.fingerprint?.length : undefined, 64)
  t.is(compile.event === 'STAGE_WOULD_RUN' ? compile.fingerprint : 'unexpected', undefined)
})

test('a dry run reports cache hits and the first changed stage', async t => {
  const store = new MemoryCacheStore()
  const built = await run(store, chain('src-1'))
  const {events, runner} = await run(store, chain('src-2'), {options: {dryRun: true}})

  t.deepEqual(runner.stages, [])
  t.deepEqual(eventNames(events), ['STAGE_CACHED', 'STAGE_WOULD_RUN', 'STAGE_WOULD_RUN'])
  const compile = events[1]
  t.true(compile.event === 'STAGE_WOULD_RUN' && compile.fingerprint !== undefined)
  t.not(compile.event === 'STAGE_WOULD_RUN' ? compile.fingerprint : undefined, built.summary.fingerprints.get('compile'))
})

// -- Parallel mode -----------------------------------------------------------

test('parallel mode runs at most concurrency stages at once', async t => {
  const store = new MemoryCacheStore()
  const behaviors = {a: {delayMs: 20}, b: {delayMs: 20}, c: {delayMs: 20}, d: {delayMs: 20}}
  const {summary, runner} = await run(store, [
    {name: 'a', command: 'a'},
    {name: 'b', command: 'b'},
    {name: 'c', command: 'c'},
    {name: 'd', command: 'd'}
  ], {behaviors, options: {mode: 'parallel', concurrency: 2}})

  t.is(runner.maxRunning, 2)
  t.deepEqual(outcomes(summary), {a: 'built', b: 'built', c: 'built', d: 'built'})
})

test('sequential mode runs one stage at a time', async t => {
  const store = new MemoryCacheStore()
  const {runner} = await run(store, [
    {name: 'a', command: 'a'},
    {name: 'b', command: 'b'}
  ], {behaviors: {a: {delayMs: 10}, b: {delayMs: 10}}})

  t.is(runner.maxRunning, 1)
})

test('parallel mode starts a child only after its parent is committed', async t => {
  const store = new MemoryCacheStore()
  const gate = deferred()
  const runner = new ScriptedRunner({deps: {gate: gate.promise}})
  const {reporter} = recordingReporter()
  const executor = new Executor(store, new Fingerprinter(new MemoryFileAccess()), runner, reporter)
  const graph = StageGraph.build([
    {name: 'deps', command: 'install'},
    {name: 'docs', command: 'docs'},
    {name: 'compile', parent: 'deps', command: 'compile'}
  ])

  const execution = executor.execute(graph, job, {mode: 'parallel', concurrency: 4})
  await until(() => runner.calls.length === 2 && runner.running === 1)
  t.deepEqual([...runner.stages].sort(), ['deps', 'docs'])

  gate.resolve()
  const summary = await execution
  t.deepEqual(runner.stages.slice(2), ['compile'])
  t.deepEqual(outcomes(summary), {deps: 'built', docs: 'built', compile: 'built'})
})

test('parallel mode keeps independent branches running after a failure', async t => {
  const store = new MemoryCacheStore()
  const {summary, events} = await run(store, [
    {name: 'deps', command: 'install'},
    {name: 'compile', parent: 'deps', command: 'compile'},
    {name: 'docs', command: 'docs'},
    {name: 'site', parent: 'docs', command: 'site'}
  ], {behaviors: {deps: {exitCode: 1}, docs: {delayMs: 10}}, options: {mode: 'parallel', concurrency: 4}})

  t.deepEqual(summary.failed, ['deps'])
  t.deepEqual(summary.skipped, ['compile'])
  t.deepEqual(skipReasons(events), {compile: 'dependency'})
  t.is(outcomes(summary).site, 'built')
})

// -- Cancellation ------------------------------------------------------------

test('an aborted signal skips every stage', async t => {
  const store = new MemoryCacheStore()
  const controller = new AbortController()
  controller.abort()
  const {summary, runner, events} = await run(store, chain('src-1'), {options: {signal: controller.signal}})

  t.deepEqual(runner.stages, [])
  t.true(summary.cancelled)
  t.deepEqual(summary.skipped, ['deps', 'compile', 'package'])
  t.deepEqual(skipReasons(events), {deps: 'cancelled', compile: 'cancelled', package: 'cancelled'})
})

test('cancelling mid-build keeps committed entries and skips the rest', async t => {
  const store = new MemoryCacheStore()
  const controller = new AbortController()
  const runner = new ScriptedRunner({deps: {gate: deferred().promise}})
  const {reporter, events} = recordingReporter()
  const executor = new Executor(store, new Fingerprinter(new MemoryFileAccess()), runner, reporter)
  const graph = StageGraph.build([
    {name: 'docs', command: 'docs'},
    {name: 'deps', command: 'install'},
    {name: 'compile', parent: 'deps', command: 'compile'}
  ])

  const execution = executor.execute(graph, job, {signal: controller.signal})
  await until(() => runner.calls.length === 2)
  controller.abort()
  const summary = await execution

  t.true(summary.cancelled)
  t.deepEqual(summary.failed, ['deps'])
  t.deepEqual(summary.skipped, ['compile'])
  t.deepEqual(skipReasons(events), {compile: 'cancelled'})
  t.is(summary.results.find(r => r.stage === 'deps')?.error, 'Command was canceled')

  const docsFingerprint = summary.fingerprints.get('docs')
  t.truthy(docsFingerprint)
  t.true(docsFingerprint !== undefined && await store.has(docsFingerprint))
  t.is(store.size, 1)
})
