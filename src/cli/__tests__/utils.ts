import {homedir} from 'node:os'
import test from 'ava'
import {Command} from 'commander'
import {ConfigurationError} from '../../errors.js'
import {addJobOptions, buildJob, collect, localContext, toJobOptions, type JobFlags} from '../utils.js'
import {createTmpDir, recordingReporter} from '../../__tests__/helpers.js'

const emptyFlags: JobFlags = {
  env: [],
  input: [],
  inputRecursive: [],
  output: [],
  outputRecursive: []
}

test('collect appends repeated values', t => {
  t.deepEqual(collect('b', ['a']), ['a', 'b'])
})

test('addJobOptions collects repeatable flags', t => {
  const command = addJobOptions(new Command('build'))
  command.parse(['--env', 'A=1', '--env', 'B=2', '--input-recursive', 'gs://bucket/dir/', '--disk-size', '50', '--allow-local'], {from: 'user'})

  const options = command.opts<JobFlags>()
  t.deepEqual(options.env, ['A=1', 'B=2'])
  t.deepEqual(options.inputRecursive, ['gs://bucket/dir/'])
  t.deepEqual(options.output, [])
  t.is(options.diskSize, 50)
  t.true(options.allowLocal)
})

test('toJobOptions maps flags to builder options', t => {
  const options = toJobOptions('job.yml', {
    ...emptyFlags,
    env: ['A=1'],
    output: ['gs://bucket/out.txt'],
    name: 'nightly',
    project: 'test-project',
    scopes: 'scope-a,scope-b',
    timeout: '2h'
  })

  t.is(options.jobFile, 'job.yml')
  t.is(options.name, 'nightly')
  t.deepEqual(options.params?.envs, ['A=1'])
  t.deepEqual(options.params?.outputs, ['gs://bucket/out.txt'])
  t.is(options.resources?.project, 'test-project')
  t.deepEqual(options.resources?.scopes, ['scope-a', 'scope-b'])
  t.is(options.timeout, '2h')
  t.deepEqual(options.steps, [])
})

test('--command help names the bash wrapper', t => {
  const option = addJobOptions(new Command('build')).options.find(option => option.long === '--command')
  t.is(option?.description, 'Command of the user step, run with /bin/bash -c')
})

test('toJobOptions turns --command into a bash step', t => {
  const options = toJobOptions(undefined, {...emptyFlags, image: 'debian:stable-slim', command: 'echo hi'})
  t.deepEqual(options.steps, [
    {name: 'user-command', image: 'debian:stable-slim', commands: ['/bin/bash', '-c', 'echo hi']}
  ])
})

test('toJobOptions turns --script into a script step named after the job', t => {
  const options = toJobOptions(undefined, {...emptyFlags, name: 'count', image: 'debian:stable-slim', script: 'wc -l'})
  t.deepEqual(options.steps, [{name: 'count', image: 'debian:stable-slim', script: 'wc -l'}])
})

test('toJobOptions slugifies the job name into a step name', t => {
  const options = toJobOptions(undefined, {...emptyFlags, name: 'My Job', image: 'debian:stable-slim', script: 'true'})
  t.deepEqual(options.steps, [{name: 'my-job', image: 'debian:stable-slim', script: 'true'}])
})

test('toJobOptions requires an image for --command and --script', t => {
  const error = t.throws(() => toJobOptions(undefined, {...emptyFlags, command: 'echo'}), {instanceOf: ConfigurationError})
  t.is(error?.message, '--command and --script require --image')
})

test('localContext is only set with --allow-local', t => {
  t.is(localContext(emptyFlags, '/work/project'), undefined)
  t.deepEqual(localContext({...emptyFlags, allowLocal: true}, '/work/project'), {home: homedir(), cwd: '/work/project'})
})

async function programIn(cwd: string): Promise<Command> {
  const program = new Command().option('--cwd <path>', 'Working directory', cwd)
  await program.parseAsync([], {from: 'user'})
  return program
}

test('buildJob builds the request described by the flags', async t => {
  const cwd = await createTmpDir()
  const {reporter, events} = recordingReporter()

  const result = await buildJob(undefined, {
    ...emptyFlags,
    project: 'test-project',
    region: 'us-west1',
    input: ['IN=gs://bucket/in.txt']
  }, await programIn(cwd), reporter)

  t.deepEqual(result?.request.pipeline.environment, {IN: '/mnt/data/gs/bucket/in.txt'})
  t.is(events.at(-1)?.event, 'REQUEST_READY')
})

test('buildJob reports flag errors', async t => {
  const cwd = await createTmpDir()
  const {reporter, events} = recordingReporter()

  const result = await buildJob(undefined, {
    ...emptyFlags,
    project: 'p',
    region: 'r',
    command: 'echo hi'
  }, await programIn(cwd), reporter)

  t.is(result, undefined)
  t.deepEqual(events, [
    {event: 'BUILD_FAILED', jobName: 'job', code: 'INVALID_CONFIGURATION', message: '--command and --script require --image'}
  ])
})

test('buildJob reports build errors once', async t => {
  const cwd = await createTmpDir()
  const {reporter, events} = recordingReporter()

  const result = await buildJob(undefined, {...emptyFlags, name: 'nightly', region: 'r'}, await programIn(cwd), reporter)

  t.is(result, undefined)
  t.deepEqual(events.map(event => event.event), ['JOB_LOADED', 'BUILD_FAILED'])
})
