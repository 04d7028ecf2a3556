import {NameValidationError} from '../errors.js'
import type {ParameterName} from '../types.js'

// A word of underscores, digits and portable alphabetics, not starting with a digit
// (POSIX.1-2017, Base Definitions, 3.235 Name).
const PARAMETER_NAME_PATTERN = /^[A-Za-z_][A-Za-z\d_]*$/

export function isParameterName(name: string): boolean {
  return PARAMETER_NAME_PATTERN.test(name)
}

/**
 * Throws a NameValidationError unless `name` is usable as a shell variable.
 * `paramType` only feeds the message ("Input parameter", "Environment variable"…).
 */
export function validateParamName(name: string, paramType: string): ParameterName {
  if (!isParameterName(name)) {
    throw new NameValidationError(name, paramType)
  }

  return name
}
