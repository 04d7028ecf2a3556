import {CollisionError} from '../errors.js'
import type {EnvParam, FileParam, FileRole, JobParam, JobParamArgs, JobParameterSet} from '../types.js'
import {AUTO_PREFIX_INPUT, AUTO_PREFIX_OUTPUT} from './constants.js'
import {createFileParam, parseEnvArgs, splitPair} from './params.js'
import type {NormalizeOptions} from './uri.js'

/**
 * Assembles a JobParameterSet, failing with every duplicate name at once when
 * a name is used twice, whatever the classes involved.
 */
export function createJobParameterSet(params: {
  envs?: readonly EnvParam[];
  inputs?: readonly FileParam[];
  recursiveInputs?: readonly FileParam[];
  outputs?: readonly FileParam[];
  recursiveOutputs?: readonly FileParam[];
}): JobParameterSet {
  const jobParams: JobParameterSet = {
    envs: [...(params.envs ?? [])],
    inputs: [...(params.inputs ?? [])],
    recursiveInputs: [...(params.recursiveInputs ?? [])],
    outputs: [...(params.outputs ?? [])],
    recursiveOutputs: [...(params.recursiveOutputs ?? [])]
  }

  const duplicates = findDuplicateNames(allParams(jobParams))
  if (duplicates.length > 0) {
    throw new CollisionError(duplicates)
  }

  return jobParams
}

/** Every parameter of the set, in class order (env, inputs, outputs). */
export function allParams(jobParams: JobParameterSet): JobParam[] {
  return [
    ...jobParams.envs,
    ...jobParams.inputs,
    ...jobParams.recursiveInputs,
    ...jobParams.outputs,
    ...jobParams.recursiveOutputs
  ]
}

/** Names that occur more than once, each listed once, in encounter order. */
export function findDuplicateNames(params: Iterable<{name: string}>): string[] {
  const known = new Set<string>()
  const duplicates = new Set<string>()
  for (const {name} of params) {
    if (known.has(name)) {
      duplicates.add(name)
    } else {
      known.add(name)
    }
  }

  return [...duplicates]
}

/**
 * Turns raw flag values into a JobParameterSet.
 *
 * Unnamed file parameters get `INPUT_<n>` / `OUTPUT_<n>` names. The counters
 * belong to the builder, so use one builder per job.
 */
export class JobParamsBuilder {
  private inputIndex = 0
  private outputIndex = 0

  constructor(private readonly options: NormalizeOptions = {}) {}

  build(args: JobParamArgs): JobParameterSet {
    return createJobParameterSet({
      envs: parseEnvArgs(args.envs ?? []),
      inputs: this.parseFileArgs('input', args.inputs ?? [], false),
      recursiveInputs: this.parseFileArgs('input', args.inputsRecursive ?? [], true),
      outputs: this.parseFileArgs('output', args.outputs ?? [], false),
      recursiveOutputs: this.parseFileArgs('output', args.outputsRecursive ?? [], true)
    })
  }

  /** Parses `uri` or `name=uri` flags of one class. */
  parseFileArgs(role: FileRole, args: readonly string[], recursive: boolean): FileParam[] {
    return args.map(arg => {
      const [name, value] = splitPair(arg, '=', 0)
      return createFileParam(role, this.variableName(role, name), value, recursive, this.options)
    })
  }

  /** Returns `name`, or the next automatic name for `role` when it is empty. */
  variableName(role: FileRole, name?: string): string {
    if (name) {
      return name
    }

    if (role === 'input') {
      return `${AUTO_PREFIX_INPUT}${this.inputIndex++}`
    }

    return `${AUTO_PREFIX_OUTPUT}${this.outputIndex++}`
  }
}

export function argsToJobParams(args: JobParamArgs, options?: NormalizeOptions): JobParameterSet {
  return new JobParamsBuilder(options).build(args)
}
