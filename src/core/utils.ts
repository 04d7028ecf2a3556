import {ConfigurationError} from '../errors.js'
import {DATA_DISK_MOUNT} from './constants.js'

const DURATION_UNITS: Record<string, number> = {
  s: 1,
  m: 60,
  h: 60 * 60,
  d: 24 * 60 * 60
}

/** Absolute in-container path of a mount path. */
export function dataDiskPath(mountPath: string): string {
  return `${DATA_DISK_MOUNT}/${mountPath}`
}

/**
 * Converts a number of seconds or a `<n>s|m|h|d` string into the service's
 * `<seconds>s` duration format.
 */
export function parseTimeout(value: string | number): string {
  if (typeof value === 'number') {
    if (!Number.isInteger(value) || value <= 0) {
      throw new ConfigurationError(`Invalid timeout: ${value} must be a positive number of seconds`)
    }

    return `${value}s`
  }

  const match = /^(\d+)([smhd])$/.exec(value.trim())
  if (!match) {
    throw new ConfigurationError(`Invalid timeout: '${value}' (expected e.g. 3600s, 90m, 12h or 7d)`)
  }

  const seconds = Number(match[1]) * DURATION_UNITS[match[2]]
  if (seconds <= 0) {
    throw new ConfigurationError(`Invalid timeout: '${value}' must be positive`)
  }

  return `${seconds}s`
}

export function deepFreeze<T>(value: T): T {
  if (value !== null && typeof value === 'object') {
    for (const child of Object.values(value)) {
      deepFreeze(child)
    }

    Object.freeze(value)
  }

  return value
}
