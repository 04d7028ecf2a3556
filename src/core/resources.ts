import {ConfigurationError} from '../errors.js'
import type {ResourceOptions, ResourceSpec} from '../types.js'
import {DEFAULT_DISK_SIZE, DEFAULT_MACHINE_TYPE, DEFAULT_SCOPE} from './constants.js'

/**
 * Validates resource options and fills in defaults.
 * A single scope string is accepted in place of a list.
 */
export function createResourceSpec(options: ResourceOptions): ResourceSpec {
  const {project, region} = options
  if (!project) {
    throw new ConfigurationError('Invalid resources: project is required')
  }

  if (!region) {
    throw new ConfigurationError('Invalid resources: region is required')
  }

  const machineType = options.machineType ?? DEFAULT_MACHINE_TYPE
  if (!machineType) {
    throw new ConfigurationError('Invalid resources: machineType must not be empty')
  }

  const diskSizeGb = options.diskSizeGb ?? DEFAULT_DISK_SIZE
  if (!Number.isInteger(diskSizeGb) || diskSizeGb <= 0) {
    throw new ConfigurationError(`Invalid resources: diskSizeGb must be a positive integer, got ${diskSizeGb}`)
  }

  const scopes = typeof options.scopes === 'string' ? [options.scopes] : (options.scopes ?? [DEFAULT_SCOPE])
  if (scopes.length === 0 || scopes.some(scope => !scope)) {
    throw new ConfigurationError('Invalid resources: scopes must be a non-empty list of non-empty strings')
  }

  const spec: ResourceSpec = {
    project,
    region,
    machineType,
    diskSizeGb,
    ...(options.serviceAccount ? {serviceAccount: options.serviceAccount} : {}),
    scopes: Object.freeze([...scopes])
  }

  return Object.freeze(spec)
}
