import {resolve} from 'node:path'
import {buildActions} from '../actions/index.js'
import {SEVEN_DAYS} from '../core/constants.js'
import {JobParamsBuilder} from '../core/job-params.js'
import {createResourceSpec} from '../core/resources.js'
import type {LocalContext} from '../core/uri.js'
import {parseTimeout} from '../core/utils.js'
import {JobsubError} from '../errors.js'
import {createPipelineRequest} from '../request/pipeline-request.js'
import type {ActionSpec, JobParamArgs, JobParameterSet, RequestDocument, ResourceOptions, UserStep} from '../types.js'
import {loadConfig} from './config.js'
import {loadEnvFile} from './env-file.js'
import type {JobDefinition, JobLoader} from './job-loader.js'
import type {Reporter} from './reporter.js'

export type JobOptions = {
  /** Job file (JSON or YAML); the options below add to or override it. */
  jobFile?: string;
  name?: string;
  params?: JobParamArgs;
  /** Dotenv file whose entries become environment parameters. */
  envFile?: string;
  resources?: ResourceOptions;
  steps?: UserStep[];
  timeout?: string | number;
}

export type BuildResult = {
  job: JobDefinition;
  jobParams: JobParameterSet;
  actions: ActionSpec[];
  request: RequestDocument;
}

/**
 * Turns CLI input into a request document.
 *
 * ## Workflow
 *
 * 1. **Resolution**: merges `.jobsub.yml`, the job file and the flags.
 *    Resources: flags > job file > config. Parameters and steps: job file
 *    entries first, then the env file, then flags.
 * 2. **Parameters**: one JobParamsBuilder per build, so automatic names
 *    restart at `INPUT_0` / `OUTPUT_0`.
 * 3. **Actions**: localize, user steps, delocalize.
 * 4. **Request**: resources, actions and the merged environment.
 *
 * Every stage reports to the Reporter; failures are reported once, then
 * rethrown unchanged.
 */
export class JobBuilder {
  constructor(
    private readonly loader: JobLoader,
    private readonly reporter: Reporter,
    private readonly cwd: string,
    private readonly local?: LocalContext
  ) {}

  async run(options: JobOptions): Promise<BuildResult> {
    let job: JobDefinition
    try {
      job = await this.resolve(options)
    } catch (error: unknown) {
      this.reportFailure(options.name ?? 'job', error)
      throw error
    }

    return this.build(job)
  }

  async resolve(options: JobOptions): Promise<JobDefinition> {
    const config = await loadConfig(this.cwd)
    const fromFile = options.jobFile
      ? await this.loader.load(resolve(this.cwd, options.jobFile))
      : undefined
    const envFileArgs = options.envFile
      ? await loadEnvFile(resolve(this.cwd, options.envFile))
      : []

    const flags = options.params ?? {}
    const job: JobDefinition = {
      name: options.name ?? fromFile?.name ?? 'job',
      resources: mergeResourceOptions(options.resources ?? {}, fromFile?.resources ?? {}, config),
      params: {
        envs: [...(fromFile?.params.envs ?? []), ...envFileArgs, ...(flags.envs ?? [])],
        inputs: [...(fromFile?.params.inputs ?? []), ...(flags.inputs ?? [])],
        inputsRecursive: [...(fromFile?.params.inputsRecursive ?? []), ...(flags.inputsRecursive ?? [])],
        outputs: [...(fromFile?.params.outputs ?? []), ...(flags.outputs ?? [])],
        outputsRecursive: [...(fromFile?.params.outputsRecursive ?? []), ...(flags.outputsRecursive ?? [])]
      },
      steps: [...(fromFile?.steps ?? []), ...(options.steps ?? [])],
      timeout: options.timeout ?? fromFile?.timeout
    }

    this.reporter.emit({event: 'JOB_LOADED', jobName: job.name, source: options.jobFile})
    return job
  }

  build(job: JobDefinition): BuildResult {
    try {
      const resources = createResourceSpec(job.resources)
      const timeout = job.timeout === undefined ? SEVEN_DAYS : parseTimeout(job.timeout)

      const jobParams = new JobParamsBuilder({local: this.local}).build(job.params)
      this.reporter.emit({
        event: 'PARAMS_RESOLVED',
        jobName: job.name,
        counts: {
          envs: jobParams.envs.length,
          inputs: jobParams.inputs.length,
          recursiveInputs: jobParams.recursiveInputs.length,
          outputs: jobParams.outputs.length,
          recursiveOutputs: jobParams.recursiveOutputs.length
        }
      })

      const actions = buildActions(jobParams, job.steps)
      this.reporter.emit({event: 'ACTIONS_BUILT', jobName: job.name, actions: actions.map(action => action.name)})

      const request = createPipelineRequest(resources, jobParams, actions, timeout)
      this.reporter.emit({
        event: 'REQUEST_READY',
        jobName: job.name,
        projectId: request.pipeline.resources.projectId,
        environmentSize: Object.keys(request.pipeline.environment).length,
        timeout
      })

      return {job, jobParams, actions, request}
    } catch (error: unknown) {
      this.reportFailure(job.name, error)
      throw error
    }
  }

  /** Reports an error raised while preparing or building a job. */
  reportFailure(jobName: string, error: unknown): void {
    this.reporter.emit({
      event: 'BUILD_FAILED',
      jobName,
      code: error instanceof JobsubError ? error.code : 'UNKNOWN',
      message: error instanceof Error ? error.message : String(error)
    })
  }
}

/** Field-wise merge; the first layer that defines a field wins. */
export function mergeResourceOptions(...layers: ResourceOptions[]): ResourceOptions {
  const pick = <K extends keyof ResourceOptions>(key: K): ResourceOptions[K] =>
    layers.find(layer => layer[key] !== undefined)?.[key]

  return {
    project: pick('project'),
    region: pick('region'),
    machineType: pick('machineType'),
    diskSizeGb: pick('diskSizeGb'),
    serviceAccount: pick('serviceAccount'),
    scopes: pick('scopes')
  }
}
