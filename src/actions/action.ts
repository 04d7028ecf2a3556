import {DATA_DISK_MOUNT, DATA_DISK_NAME, DEBIAN_IMAGE, ONE_DAY} from '../core/constants.js'
import type {ActionSpec} from '../types.js'

export const LOCALIZE_ACTION_NAME = 'localize'
export const DELOCALIZE_ACTION_NAME = 'delocalize'

/** Fields an action may set; everything else gets the shared defaults. */
export type ActionDefinition = {
  name: string;
  imageUri?: string;
  commands: string[];
  environment?: Record<string, string>;
  flags?: string[];
  timeout?: string;
  /** Use `null` to keep the image's own entrypoint. */
  entrypoint?: string | null;
}

/**
 * Fills in the defaults every action shares: the data disk mounted read-write,
 * a one-day timeout and a bash entrypoint.
 */
export function createAction(definition: ActionDefinition): ActionSpec {
  const entrypoint = definition.entrypoint === undefined ? '/bin/bash' : definition.entrypoint
  const action: ActionSpec = {
    name: definition.name,
    imageUri: definition.imageUri ?? DEBIAN_IMAGE,
    commands: [...definition.commands],
    environment: {...definition.environment},
    flags: [...(definition.flags ?? [])],
    mounts: [
      {
        disk: DATA_DISK_NAME,
        path: DATA_DISK_MOUNT,
        readOnly: false
      }
    ],
    timeout: definition.timeout ?? ONE_DAY
  }

  return entrypoint === null ? action : {...action, entrypoint}
}
