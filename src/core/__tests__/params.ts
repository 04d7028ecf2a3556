import test from 'ava'
import {NameValidationError, UriValidationError} from '../../errors.js'
import {createEnvParam, createFileParam, parseEnvArgs, splitPair} from '../params.js'

// ---------------------------------------------------------------------------
// splitPair
// ---------------------------------------------------------------------------

test('splitPair splits on the first separator only', t => {
  t.deepEqual(splitPair('A=b=c', '=', 1), ['A', 'b=c'])
})

test('splitPair leaves the nullable side undefined', t => {
  t.deepEqual(splitPair('NAME', '=', 1), ['NAME', undefined])
  t.deepEqual(splitPair('gs://bucket/x.txt', '=', 0), [undefined, 'gs://bucket/x.txt'])
})

test('splitPair keeps empty sides', t => {
  t.deepEqual(splitPair('NAME=', '=', 1), ['NAME', ''])
  t.deepEqual(splitPair('=value', '=', 1), ['', 'value'])
})

// ---------------------------------------------------------------------------
// environment parameters
// ---------------------------------------------------------------------------

test('parseEnvArgs reads names and values', t => {
  t.deepEqual(parseEnvArgs(['A=hello', 'B=x=y', 'EMPTY=', 'FLAG']), [
    {kind: 'env', name: 'A', value: 'hello'},
    {kind: 'env', name: 'B', value: 'x=y'},
    {kind: 'env', name: 'EMPTY', value: ''},
    {kind: 'env', name: 'FLAG'}
  ])
})

test('parseEnvArgs rejects invalid names', t => {
  const error = t.throws(() => parseEnvArgs(['1X=2']), {instanceOf: NameValidationError})
  t.is(error?.message, 'Invalid Environment variable: 1X')
  t.is(error?.paramType, 'Environment variable')
})

test('parseEnvArgs rejects a missing name', t => {
  t.throws(() => parseEnvArgs(['=value']), {instanceOf: NameValidationError})
})

test('createEnvParam omits an undefined value', t => {
  t.false('value' in createEnvParam('NAME'))
})

// ---------------------------------------------------------------------------
// file parameters
// ---------------------------------------------------------------------------

test('createFileParam normalizes the URI', t => {
  t.deepEqual(createFileParam('input', 'REF', 'gs://bucket/ref.fa', false), {
    kind: 'file',
    role: 'input',
    name: 'REF',
    value: 'gs://bucket/ref.fa',
    mountPath: 'gs/bucket/ref.fa',
    uri: {path: 'gs://bucket/', basename: 'ref.fa', recursive: false},
    recursive: false
  })
})

test('createFileParam keeps the raw value of recursive parameters', t => {
  const param = createFileParam('output', 'OUT', 'gs://bucket/results', true)
  t.is(param.value, 'gs://bucket/results')
  t.is(param.mountPath, 'gs/bucket/results/')
})

test('createFileParam declares a parameter without a value', t => {
  t.deepEqual(createFileParam('output', 'LATER', '', false), {
    kind: 'file',
    role: 'output',
    name: 'LATER',
    recursive: false
  })
  t.deepEqual(createFileParam('input', 'NONE', undefined, true), {
    kind: 'file',
    role: 'input',
    name: 'NONE',
    recursive: true
  })
})

test('createFileParam names the role in name errors', t => {
  const inputError = t.throws(() => createFileParam('input', 'my-file', 'gs://bucket/a.txt', false), {instanceOf: NameValidationError})
  t.is(inputError?.message, 'Invalid Input parameter: my-file')

  const outputError = t.throws(() => createFileParam('output', '9OUT', 'gs://bucket/a.txt', false), {instanceOf: NameValidationError})
  t.is(outputError?.message, 'Invalid Output parameter: 9OUT')
})

test('createFileParam checks the name before the URI', t => {
  t.throws(() => createFileParam('input', 'bad name', 'gs://bucket/a?.txt', false), {instanceOf: NameValidationError})
})

test('createFileParam rejects invalid URIs', t => {
  t.throws(() => createFileParam('input', 'IN', 'gs://bucket/dir/', false), {instanceOf: UriValidationError})
})

test('createFileParam accepts local paths with a local context', t => {
  const param = createFileParam('input', 'LOCAL', '/tmp/data.csv', false, {local: {home: '/home/tester', cwd: '/work'}})
  t.is(param.mountPath, 'file/tmp/data.csv')
  t.deepEqual(param.uri, {path: '/tmp/', basename: 'data.csv', recursive: false})
})
