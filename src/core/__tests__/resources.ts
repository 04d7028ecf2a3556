import test from 'ava'
import {ConfigurationError} from '../../errors.js'
import {DEFAULT_SCOPE} from '../constants.js'
import {createResourceSpec} from '../resources.js'

test('fills in defaults', t => {
  t.deepEqual(createResourceSpec({project: 'test-project', region: 'us-west1'}), {
    project: 'test-project',
    region: 'us-west1',
    machineType: 'n1-standard-2',
    diskSizeGb: 200,
    scopes: [DEFAULT_SCOPE]
  })
})

test('keeps explicit values', t => {
  const spec = createResourceSpec({
    project: 'test-project',
    region: 'europe-west1',
    machineType: 'n1-highmem-8',
    diskSizeGb: 500,
    serviceAccount: 'runner@test-project.iam.example',
    scopes: ['scope-a', 'scope-b']
  })
  t.is(spec.machineType, 'n1-highmem-8')
  t.is(spec.diskSizeGb, 500)
  t.is(spec.serviceAccount, 'runner@test-project.iam.example')
  t.deepEqual(spec.scopes, ['scope-a', 'scope-b'])
})

test('accepts a single scope string', t => {
  t.deepEqual(createResourceSpec({project: 'p', region: 'r', scopes: 'only-scope'}).scopes, ['only-scope'])
})

test('the result is frozen', t => {
  const spec = createResourceSpec({project: 'p', region: 'r'})
  t.true(Object.isFrozen(spec))
  t.true(Object.isFrozen(spec.scopes))
})

test('requires a project and a region', t => {
  const noProject = t.throws(() => createResourceSpec({region: 'r'}), {instanceOf: ConfigurationError})
  t.is(noProject?.message, 'Invalid resources: project is required')

  const noRegion = t.throws(() => createResourceSpec({project: 'p'}), {instanceOf: ConfigurationError})
  t.is(noRegion?.message, 'Invalid resources: region is required')
})

test('rejects an empty machine type', t => {
  t.throws(() => createResourceSpec({project: 'p', region: 'r', machineType: ''}), {instanceOf: ConfigurationError})
})

test('rejects disk sizes that are not positive integers', t => {
  const error = t.throws(() => createResourceSpec({project: 'p', region: 'r', diskSizeGb: 0}), {instanceOf: ConfigurationError})
  t.is(error?.message, 'Invalid resources: diskSizeGb must be a positive integer, got 0')
  t.throws(() => createResourceSpec({project: 'p', region: 'r', diskSizeGb: 1.5}), {instanceOf: ConfigurationError})
  t.throws(() => createResourceSpec({project: 'p', region: 'r', diskSizeGb: Number.NaN}), {instanceOf: ConfigurationError})
})

test('rejects empty scopes', t => {
  t.throws(() => createResourceSpec({project: 'p', region: 'r', scopes: []}), {instanceOf: ConfigurationError})
  t.throws(() => createResourceSpec({project: 'p', region: 'r', scopes: ''}), {instanceOf: ConfigurationError})
  t.throws(() => createResourceSpec({project: 'p', region: 'r', scopes: ['a', '']}), {instanceOf: ConfigurationError})
})
