import process from 'node:process'
import test from 'ava'
import type {LogLine, RunStageRequest} from '../stage-runner.js'
import {ShellStageRunner} from '../shell-runner.js'
import {artifact, createTmpDir, text} from '../../__tests__/helpers.js'

function request(stage: string, command: string | string[], extra: Partial<RunStageRequest> = {}): RunStageRequest {
  return {stage, command, inputs: [], ...extra}
}

async function runOnce(command: string | string[], extra: Partial<RunStageRequest> = {}) {
  const root = await createTmpDir()
  const runner = new ShellStageRunner({root})
  const logs: LogLine[] = []
  const result = await runner.run(request('compile', command, extra), log => {
    logs.push(log)
  })
  return {root, result, logs}
}

test('check succeeds when a shell is available', async t => {
  await t.notThrowsAsync(async () => new ShellStageRunner().check())
})

test('the output file becomes the payload', async t => {
  const {result} = await runOnce('printf built > "$STAGECACHE_OUTPUT"')

  t.is(result.exitCode, 0)
  t.is(text(result.payload), 'built')
  t.true(result.finishedAt >= result.startedAt)
})

test('a command that writes no output produces an empty payload', async t => {
  const {result} = await runOnce('true')

  t.is(result.exitCode, 0)
  t.is(result.payload?.byteLength, 0)
})

test('the parent artifact is available as a file', async t => {
  const {result} = await runOnce('{ cat "$STAGECACHE_PARENT"; printf +compiled; } > "$STAGECACHE_OUTPUT"', {
    parentArtifact: artifact('deps', 'deps()')
  })

  t.is(text(result.payload), 'deps()+compiled')
})

test('stage env and build variables reach the command', async t => {
  const {root, result} = await runOnce('printf "%s|%s|%s" "$MODE" "$STAGECACHE_STAGE" "$STAGECACHE_ROOT" > "$STAGECACHE_OUTPUT"', {
    env: {MODE: 'production'}
  })

  t.is(text(result.payload), `production|compile|${root}`)
})

test('host variables other than PATH and HOME are not passed on', async t => {
  process.env.STAGECACHE_TEST_TOKEN = 'test-secret'
  try {
    const {result} = await runOnce('printf "%s" "${STAGECACHE_TEST_TOKEN:-unset}" > "$STAGECACHE_OUTPUT"')
    t.is(text(result.payload), 'unset')
  } finally {
    delete process.env.STAGECACHE_TEST_TOKEN
  }
})

test('an argument list runs without a shell', async t => {
  const {result} = await runOnce(['sh', '-c', 'printf "%s" "$0" > "$STAGECACHE_OUTPUT"', 'argv-zero'])

  t.is(text(result.payload), 'argv-zero')
})

test('output lines are streamed per stream', async t => {
  const {logs} = await runOnce('echo one; echo two; echo warning >&2')

  t.deepEqual(logs.filter(l => l.stream === 'stdout').map(l => l.line), ['one', 'two'])
  t.deepEqual(logs.filter(l => l.stream === 'stderr').map(l => l.line), ['warning'])
})

test('a failing command reports its exit code and no payload', async t => {
  const {result, logs} = await runOnce('echo broken >&2; printf partial > "$STAGECACHE_OUTPUT"; exit 3')

  t.is(result.exitCode, 3)
  t.is(result.payload, undefined)
  t.is(typeof result.error, 'string')
  t.deepEqual(logs, [{stream: 'stderr', line: 'broken'}])
})

test('an aborted signal stops the command', async t => {
  const controller = new AbortController()
  controller.abort()
  const {result} = await runOnce('sleep 5', {signal: controller.signal})

  t.not(result.exitCode, 0)
  t.is(result.payload, undefined)
})

test('an empty argument list fails without running anything', async t => {
  const {result} = await runOnce([])

  t.is(result.exitCode, 1)
  t.is(result.error, 'Empty command')
  t.is(result.payload, undefined)
})
