import {readFile} from 'node:fs/promises'
import {join} from 'node:path'
import {parse as parseYaml} from 'yaml'
import {ConfigurationError} from '../errors.js'
import type {ResourceOptions} from '../types.js'

export const CONFIG_FILE_NAME = '.jobsub.yml'

/** Project-level defaults for the resources of every job. */
export type JobsubConfig = ResourceOptions

const CONFIG_KEYS = new Set(['project', 'region', 'machineType', 'diskSizeGb', 'serviceAccount', 'scopes'])

/**
 * Loads the project-level `.jobsub.yml` configuration from a directory.
 * Returns an empty config when the file does not exist.
 */
export async function loadConfig(dir: string): Promise<JobsubConfig> {
  let content: string
  try {
    content = await readFile(join(dir, CONFIG_FILE_NAME), 'utf8')
  } catch (error: unknown) {
    if ((error as NodeJS.ErrnoException).code === 'ENOENT') {
      return {}
    }

    throw error
  }

  const parsed = parseYaml(content) as unknown
  if (parsed === null || parsed === undefined) {
    return {}
  }

  if (typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw new ConfigurationError(`${CONFIG_FILE_NAME} must contain a mapping`)
  }

  for (const key of Object.keys(parsed)) {
    if (!CONFIG_KEYS.has(key)) {
      throw new ConfigurationError(`${CONFIG_FILE_NAME}: unknown key '${key}'`)
    }
  }

  return parsed as JobsubConfig
}
