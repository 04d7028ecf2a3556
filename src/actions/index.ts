import {ConfigurationError} from '../errors.js'
import type {ActionSpec, JobParameterSet, UserStep} from '../types.js'
import {DELOCALIZE_ACTION_NAME, LOCALIZE_ACTION_NAME} from './action.js'
import {delocalizeAction} from './builtin/delocalize.js'
import {localizeAction} from './builtin/localize.js'
import {userAction} from './builtin/user.js'

/**
 * Builds the execution plan: localization of every input, the user steps in
 * order, then delocalization of every output.
 */
export function buildActions(jobParams: JobParameterSet, userSteps: readonly UserStep[]): ActionSpec[] {
  validateStepNames(userSteps)

  return [
    localizeAction(jobParams),
    ...userSteps.map(step => userAction(step)),
    delocalizeAction(jobParams)
  ]
}

function validateStepNames(userSteps: readonly UserStep[]): void {
  const reserved = new Set([LOCALIZE_ACTION_NAME, DELOCALIZE_ACTION_NAME])
  const seen = new Set<string>()
  for (const step of userSteps) {
    if (!/^[\w-]+$/.test(step.name)) {
      throw new ConfigurationError(`Invalid step name: '${step.name}' must contain only alphanumeric characters, underscore, and hyphen`)
    }

    if (reserved.has(step.name)) {
      throw new ConfigurationError(`Invalid step name: '${step.name}' is reserved for a built-in action`)
    }

    if (seen.has(step.name)) {
      throw new ConfigurationError(`Duplicate step name: '${step.name}'`)
    }

    seen.add(step.name)
  }
}
