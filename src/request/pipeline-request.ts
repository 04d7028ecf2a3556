import {DATA_DISK_NAME, JOB_LABELS, SEVEN_DAYS} from '../core/constants.js'
import {allParams, findDuplicateNames} from '../core/job-params.js'
import {dataDiskPath, deepFreeze} from '../core/utils.js'
import {CollisionError} from '../errors.js'
import type {ActionSpec, JobParameterSet, RequestDocument, RequestResources, ResourceSpec, VirtualMachineSpec} from '../types.js'

/**
 * Creates the request document for the pipelines service.
 *
 * Every parameter becomes a pipeline-level environment variable: file
 * parameters point at their location on the data disk, environment parameters
 * carry their value. Parameters declared without a value are left out.
 */
export function createPipelineRequest(
  resources: ResourceSpec,
  jobParams: JobParameterSet,
  actions: readonly ActionSpec[],
  timeout: string = SEVEN_DAYS
): RequestDocument {
  const request: RequestDocument = {
    pipeline: {
      actions: actions.map(action => structuredClone(action)),
      resources: createResources(resources),
      environment: createEnvironment(jobParams),
      timeout
    },
    labels: {...JOB_LABELS}
  }

  return deepFreeze(request)
}

export function createEnvironment(jobParams: JobParameterSet): Record<string, string> {
  const params = allParams(jobParams)
  const duplicates = findDuplicateNames(params)
  if (duplicates.length > 0) {
    throw new CollisionError(duplicates)
  }

  const environment: Record<string, string> = {}
  for (const param of params) {
    if (param.kind === 'file') {
      if (param.mountPath !== undefined) {
        environment[param.name] = dataDiskPath(param.mountPath)
      }
    } else if (param.value !== undefined) {
      environment[param.name] = param.value
    }
  }

  return environment
}

export function createResources(resources: ResourceSpec): RequestResources {
  const virtualMachine: VirtualMachineSpec = {
    machineType: resources.machineType,
    preemptible: false,
    disks: [
      {
        name: DATA_DISK_NAME,
        sizeGb: resources.diskSizeGb
      }
    ],
    serviceAccount: {
      scopes: [...resources.scopes],
      ...(resources.serviceAccount ? {email: resources.serviceAccount} : {})
    }
  }

  return {
    projectId: resources.project,
    regions: [resources.region],
    virtualMachine
  }
}
