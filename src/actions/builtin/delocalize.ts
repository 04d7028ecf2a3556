import {CLOUD_SDK_IMAGE} from '../../core/constants.js'
import {uriString} from '../../core/uri.js'
import {dataDiskPath} from '../../core/utils.js'
import type {ActionSpec, FileParam, JobParameterSet} from '../../types.js'
import {createAction, DELOCALIZE_ACTION_NAME} from '../action.js'
import {bashScript, shellQuote} from '../script.js'

/** Copies every output from the data disk back to remote storage. */
export function delocalizeAction(jobParams: JobParameterSet): ActionSpec {
  const commands = [
    ...jobParams.outputs.flatMap(param => copyCommands(param)),
    ...jobParams.recursiveOutputs.flatMap(param => syncCommands(param))
  ]

  return createAction({
    name: DELOCALIZE_ACTION_NAME,
    imageUri: CLOUD_SDK_IMAGE,
    commands: ['-c', bashScript(commands)]
  })
}

function copyCommands({uri, mountPath}: FileParam): string[] {
  if (!uri || !mountPath) {
    return []
  }

  const destination = uri.basename.includes('*') ? uri.path : uriString(uri)
  return [`gsutil -mq cp ${shellQuote(dataDiskPath(mountPath))} ${shellQuote(destination)}`]
}

function syncCommands({uri, mountPath}: FileParam): string[] {
  if (!uri || !mountPath) {
    return []
  }

  return [`gsutil -mq rsync -r ${shellQuote(dataDiskPath(mountPath))} ${shellQuote(uriString(uri))}`]
}
