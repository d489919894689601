import {mkdir, writeFile} from 'node:fs/promises'
import {join} from 'node:path'
import test from 'ava'
import {ValidationError} from '../../errors.js'
import {parseList, parseNonNegative, parsePositiveInt, resolveBuildFile} from '../utils.js'
import {createTmpDir} from '../../__tests__/helpers.js'

test('parseList splits and trims', t => {
  t.deepEqual(parseList('compile, package,,lint '), ['compile', 'package', 'lint'])
  t.deepEqual(parseList(''), [])
})

test('parsePositiveInt accepts positive integers only', t => {
  t.is(parsePositiveInt('4'), 4)
  t.throws(() => parsePositiveInt('0'), {instanceOf: ValidationError})
  t.throws(() => parsePositiveInt('2.5'), {instanceOf: ValidationError})
  t.throws(() => parsePositiveInt('many'), {instanceOf: ValidationError})
})

test('parseNonNegative accepts zero and decimals', t => {
  t.is(parseNonNegative('0'), 0)
  t.is(parseNonNegative('1.5'), 1.5)
  t.throws(() => parseNonNegative(''), {instanceOf: ValidationError})
  t.throws(() => parseNonNegative('-1'), {instanceOf: ValidationError})
})

test('resolveBuildFile returns a file argument as-is', async t => {
  const dir = await createTmpDir()
  const file = join(dir, 'release.yml')
  await writeFile(file, 'id: release')

  t.is(await resolveBuildFile(file), file)
})

test('resolveBuildFile looks for a build file in a directory', async t => {
  const dir = await createTmpDir()
  await writeFile(join(dir, 'build.json'), '{}')
  await writeFile(join(dir, 'build.yaml'), 'id: x')

  t.is(await resolveBuildFile(dir), join(dir, 'build.yaml'))
})

test('resolveBuildFile fails when no build file exists', async t => {
  const dir = await createTmpDir()
  await mkdir(join(dir, 'empty'))

  const error = await t.throwsAsync(async () => resolveBuildFile(join(dir, 'empty')), {instanceOf: ValidationError})
  t.is(error?.message, `No build file found in ${join(dir, 'empty')}. Expected one of: build.yml, build.yaml, build.json`)
  await t.throwsAsync(async () => resolveBuildFile(join(dir, 'missing')), {instanceOf: ValidationError})
})
