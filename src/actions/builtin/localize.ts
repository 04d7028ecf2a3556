import {CLOUD_SDK_IMAGE} from '../../core/constants.js'
import {splitUri, uriString} from '../../core/uri.js'
import {dataDiskPath} from '../../core/utils.js'
import type {ActionSpec, FileParam, JobParameterSet} from '../../types.js'
import {createAction, LOCALIZE_ACTION_NAME} from '../action.js'
import {bashScript, shellQuote} from '../script.js'

/** Copies every input from remote storage onto the data disk. */
export function localizeAction(jobParams: JobParameterSet): ActionSpec {
  const commands = [
    ...jobParams.inputs.flatMap(param => copyCommands(param)),
    ...jobParams.recursiveInputs.flatMap(param => syncCommands(param))
  ]

  return createAction({
    name: LOCALIZE_ACTION_NAME,
    imageUri: CLOUD_SDK_IMAGE,
    commands: ['-c', bashScript(commands)]
  })
}

function copyCommands({uri, mountPath}: FileParam): string[] {
  if (!uri || !mountPath) {
    return []
  }

  const directory = dataDiskPath(splitUri(mountPath)[0])
  // Wildcards may match several objects: copy into the directory
  const destination = uri.basename.includes('*') ? directory : dataDiskPath(mountPath)
  return [
    `mkdir -p ${shellQuote(directory)}`,
    `gsutil -mq cp ${shellQuote(uriString(uri))} ${shellQuote(destination)}`
  ]
}

function syncCommands({uri, mountPath}: FileParam): string[] {
  if (!uri || !mountPath) {
    return []
  }

  const destination = dataDiskPath(mountPath)
  return [
    `mkdir -p ${shellQuote(destination)}`,
    `gsutil -mq rsync -r ${shellQuote(uriString(uri))} ${shellQuote(destination)}`
  ]
}
