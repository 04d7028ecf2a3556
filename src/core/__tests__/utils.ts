import test from 'ava'
import {ConfigurationError} from '../../errors.js'
import {dataDiskPath, deepFreeze, parseTimeout} from '../utils.js'

test('dataDiskPath: prefixes the mount point', t => {
  t.is(dataDiskPath('gs/bucket/file.txt'), '/mnt/data/gs/bucket/file.txt')
  t.is(dataDiskPath('gs/bucket/dir/'), '/mnt/data/gs/bucket/dir/')
})

test('parseTimeout: numbers are seconds', t => {
  t.is(parseTimeout(3600), '3600s')
})

test('parseTimeout: converts units to seconds', t => {
  t.is(parseTimeout('30s'), '30s')
  t.is(parseTimeout('90m'), '5400s')
  t.is(parseTimeout('12h'), '43200s')
  t.is(parseTimeout('7d'), '604800s')
})

test('parseTimeout: ignores surrounding whitespace', t => {
  t.is(parseTimeout(' 2h '), '7200s')
})

test('parseTimeout: rejects zero and negative durations', t => {
  const error = t.throws(() => parseTimeout('0s'), {instanceOf: ConfigurationError})
  t.is(error?.message, 'Invalid timeout: \'0s\' must be positive')
  t.throws(() => parseTimeout(0), {instanceOf: ConfigurationError})
  t.throws(() => parseTimeout(-5), {instanceOf: ConfigurationError})
})

test('parseTimeout: rejects malformed durations', t => {
  for (const value of ['1.5h', '10', 'h', '5w', '']) {
    t.throws(() => parseTimeout(value), {instanceOf: ConfigurationError}, value)
  }

  t.throws(() => parseTimeout(1.5), {instanceOf: ConfigurationError})
})

test('deepFreeze: freezes nested objects and arrays', t => {
  const value = deepFreeze({a: {b: [1, {c: 2}]}})
  t.true(Object.isFrozen(value))
  t.true(Object.isFrozen(value.a))
  t.true(Object.isFrozen(value.a.b))
  t.true(Object.isFrozen(value.a.b[1]))
})
