import {readFile} from 'node:fs/promises'
import {basename, extname} from 'node:path'
import {deburr} from 'lodash-es'
import {parse as parseYaml} from 'yaml'
import {JobFileError} from '../errors.js'
import type {JobParamArgs, ResourceOptions, UserStep} from '../types.js'

/** A job as read from a file, before any validation of its parameters. */
export type JobDefinition = {
  name: string;
  resources: ResourceOptions;
  params: Required<JobParamArgs>;
  steps: UserStep[];
  timeout?: string | number;
}

type ParamList = string[] | Record<string, unknown>

type StepFileEntry = {
  id?: string;
  name?: string;
  image?: string;
  commands?: string[];
  script?: string;
  entrypoint?: string;
  env?: Record<string, unknown>;
  flags?: string[];
  timeout?: string | number;
}

type JobFile = {
  name?: string;
  project?: string;
  region?: string;
  machineType?: string;
  diskSizeGb?: number;
  serviceAccount?: string;
  scopes?: string | string[];
  env?: ParamList;
  inputs?: ParamList;
  inputsRecursive?: ParamList;
  outputs?: ParamList;
  outputsRecursive?: ParamList;
  steps?: StepFileEntry[];
  timeout?: string | number;
}

const PARAM_KEYS = ['env', 'inputs', 'inputsRecursive', 'outputs', 'outputsRecursive'] as const

export class JobLoader {
  async load(filePath: string): Promise<JobDefinition> {
    const content = await readFile(filePath, 'utf8')
    return this.parse(content, filePath)
  }

  parse(content: string, filePath: string): JobDefinition {
    let parsed: unknown
    try {
      parsed = parseJobFile(content, filePath)
    } catch (error: unknown) {
      throw new JobFileError(filePath, 'not valid JSON or YAML', {cause: error})
    }

    if (!isRecord(parsed)) {
      throw new JobFileError(filePath, 'a job file must contain an object')
    }

    const input = parsed as JobFile
    for (const key of PARAM_KEYS) {
      this.validateParamList(filePath, key, input[key])
    }

    if (input.timeout !== undefined && typeof input.timeout !== 'string' && typeof input.timeout !== 'number') {
      throw new JobFileError(filePath, 'timeout must be a duration string or a number of seconds')
    }

    if (input.steps !== undefined && !Array.isArray(input.steps)) {
      throw new JobFileError(filePath, 'steps must be an array')
    }

    return {
      name: input.name ?? basename(filePath, extname(filePath)),
      resources: {
        project: input.project,
        region: input.region,
        machineType: input.machineType,
        diskSizeGb: input.diskSizeGb,
        serviceAccount: input.serviceAccount,
        scopes: input.scopes
      },
      params: {
        envs: toPairs(input.env, 'env'),
        inputs: toPairs(input.inputs, 'file'),
        inputsRecursive: toPairs(input.inputsRecursive, 'file'),
        outputs: toPairs(input.outputs, 'file'),
        outputsRecursive: toPairs(input.outputsRecursive, 'file')
      },
      steps: (input.steps ?? []).map(step => this.resolveStep(filePath, step)),
      timeout: input.timeout
    }
  }

  private resolveStep(filePath: string, step: unknown): UserStep {
    if (!isRecord(step)) {
      throw new JobFileError(filePath, 'each step must be an object')
    }

    const entry = step as StepFileEntry
    if (entry.id !== undefined && typeof entry.id !== 'string') {
      throw new JobFileError(filePath, 'step id must be a string')
    }

    if (entry.name !== undefined && typeof entry.name !== 'string') {
      throw new JobFileError(filePath, 'step name must be a string')
    }

    if (!entry.id && !entry.name) {
      throw new JobFileError(filePath, 'at least one of "id" or "name" must be defined for each step')
    }

    const name = entry.id ?? slugify(entry.name ?? '')
    if (!entry.image || typeof entry.image !== 'string') {
      throw new JobFileError(filePath, `step ${name}: image is required`)
    }

    if (entry.commands !== undefined && !isStringList(entry.commands)) {
      throw new JobFileError(filePath, `step ${name}: commands must be an array of strings`)
    }

    if (entry.flags !== undefined && !isStringList(entry.flags)) {
      throw new JobFileError(filePath, `step ${name}: flags must be an array of strings`)
    }

    if (entry.script !== undefined && typeof entry.script !== 'string') {
      throw new JobFileError(filePath, `step ${name}: script must be a string`)
    }

    if (entry.entrypoint !== undefined && typeof entry.entrypoint !== 'string') {
      throw new JobFileError(filePath, `step ${name}: entrypoint must be a string`)
    }

    if (entry.timeout !== undefined && typeof entry.timeout !== 'string' && typeof entry.timeout !== 'number') {
      throw new JobFileError(filePath, `step ${name}: timeout must be a duration string or a number of seconds`)
    }

    if (entry.env !== undefined && !isRecord(entry.env)) {
      throw new JobFileError(filePath, `step ${name}: env must be a mapping`)
    }

    const userStep: UserStep = {name, image: entry.image}
    if (entry.commands !== undefined) {
      userStep.commands = entry.commands
    }

    if (entry.script !== undefined) {
      userStep.script = entry.script
    }

    if (entry.entrypoint !== undefined) {
      userStep.entrypoint = entry.entrypoint
    }

    if (entry.env !== undefined) {
      userStep.environment = Object.fromEntries(Object.entries(entry.env).map(([key, value]) => [key, String(value ?? '')]))
    }

    if (entry.flags !== undefined) {
      userStep.flags = entry.flags
    }

    if (entry.timeout !== undefined) {
      userStep.timeout = typeof entry.timeout === 'number' ? `${entry.timeout}s` : entry.timeout
    }

    return userStep
  }

  private validateParamList(filePath: string, key: string, value: unknown): void {
    if (value === undefined || value === null) {
      return
    }

    if (Array.isArray(value)) {
      if (value.some(item => typeof item !== 'string')) {
        throw new JobFileError(filePath, `${key} must be a list of strings`)
      }

      return
    }

    if (!isRecord(value)) {
      throw new JobFileError(filePath, `${key} must be a list or a mapping`)
    }

    for (const [name, item] of Object.entries(value)) {
      if (item !== null && typeof item === 'object') {
        throw new JobFileError(filePath, `${key}.${name} must be a scalar value`)
      }
    }
  }
}

/** Convert a free-form name into a valid identifier. */
export function slugify(name: string): string {
  return deburr(name)
    .toLowerCase()
    .replaceAll(/[^\w-]/g, '-')
    .replaceAll(/-{2,}/g, '-')
    .replace(/^-/, '')
    .replace(/-$/, '')
}

export function parseJobFile(content: string, filePath: string): unknown {
  const ext = extname(filePath).toLowerCase()
  if (ext === '.yaml' || ext === '.yml') {
    return parseYaml(content)
  }

  return JSON.parse(content)
}

/**
 * Flattens a parameter list into `name=value` flags. Mappings give every entry
 * a name; a null value declares the parameter without one, which is spelled
 * `NAME` for environment variables and `NAME=` for files.
 */
export function toPairs(list: ParamList | undefined | null, kind: 'env' | 'file'): string[] {
  if (!list) {
    return []
  }

  if (Array.isArray(list)) {
    return [...list]
  }

  return Object.entries(list).map(([name, value]) => {
    if (value === null || value === undefined) {
      return kind === 'env' ? name : `${name}=`
    }

    return `${name}=${String(value)}`
  })
}

function isStringList(value: unknown): value is string[] {
  return Array.isArray(value) && value.every(item => typeof item === 'string')
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value)
}
