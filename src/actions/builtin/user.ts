import {validateParamName} from '../../core/param-name.js'
import {parseTimeout} from '../../core/utils.js'
import {ConfigurationError} from '../../errors.js'
import type {ActionSpec, UserStep} from '../../types.js'
import {createAction} from '../action.js'
import {bashScript} from '../script.js'

/**
 * Converts a user step into an action.
 *
 * `commands` are passed through as given, with the image's entrypoint unless
 * one is set. A `script` runs under `/bin/bash -c` with the strict prologue.
 */
export function userAction(step: UserStep): ActionSpec {
  if (!step.image) {
    throw new ConfigurationError(`Invalid step ${step.name}: image is required`)
  }

  if ((step.commands === undefined) === (step.script === undefined)) {
    throw new ConfigurationError(`Invalid step ${step.name}: exactly one of commands or script is required`)
  }

  for (const name of Object.keys(step.environment ?? {})) {
    validateParamName(name, `environment variable of step ${step.name}`)
  }

  const timeout = step.timeout === undefined ? undefined : parseTimeout(step.timeout)

  if (step.script === undefined) {
    return createAction({
      name: step.name,
      imageUri: step.image,
      commands: step.commands ?? [],
      environment: step.environment,
      flags: step.flags,
      timeout,
      entrypoint: step.entrypoint ?? null
    })
  }

  return createAction({
    name: step.name,
    imageUri: step.image,
    commands: ['-c', bashScript([step.script])],
    environment: step.environment,
    flags: step.flags,
    timeout,
    entrypoint: step.entrypoint
  })
}
