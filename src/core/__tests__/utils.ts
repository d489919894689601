import test from 'ava'
import {formatDuration, formatSize, hasErrorCode, shortFingerprint} from '../utils.js'

test('hasErrorCode matches system errors by code', t => {
  const error = Object.assign(new Error('no such file'), {code: 'ENOENT'})
  t.true(hasErrorCode(error, 'ENOENT'))
  t.true(hasErrorCode(error, 'EEXIST', 'ENOENT'))
  t.false(hasErrorCode(error, 'EEXIST'))
  t.false(hasErrorCode(new Error('plain'), 'ENOENT'))
  t.false(hasErrorCode({code: 'ENOENT'}, 'ENOENT'))
})

test('formatSize picks a unit', t => {
  t.is(formatSize(512), '512 B')
  t.is(formatSize(2048), '2.0 KB')
  t.is(formatSize(5 * 1024 * 1024), '5.0 MB')
  t.is(formatSize(3 * 1024 * 1024 * 1024), '3.0 GB')
  t.is(formatSize(2 * 1024 ** 4), '2.0 TB')
})

test('formatDuration picks a unit', t => {
  t.is(formatDuration(250), '250ms')
  t.is(formatDuration(1500), '1.5s')
  t.is(formatDuration(65_000), '1m 5s')
  t.is(formatDuration(7_260_000), '2h 1m')
})

test('shortFingerprint keeps the first 12 characters', t => {
  t.is(shortFingerprint('0123456789abcdef'.repeat(4)), '0123456789ab')
})
