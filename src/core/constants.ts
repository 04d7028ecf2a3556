export const DATA_DISK_NAME = 'jobsubdisk'
export const DATA_DISK_MOUNT = '/mnt/data'

// Durations, in the service's `<seconds>s` format
export const ONE_HOUR = '3600s'
export const TWO_HOURS = '7200s'
export const ONE_DAY = '86400s'
export const SEVEN_DAYS = '604800s'

export const DEFAULT_DISK_SIZE = 200
export const DEFAULT_SCOPE = 'https://www.googleapis.com/auth/cloud-platform'
export const DEFAULT_MACHINE_TYPE = 'n1-standard-2'

// Generic tags are cached on the service's VMs and load faster than pinned ones.
export const DEBIAN_IMAGE = 'debian:stable-slim'
export const CLOUD_SDK_IMAGE = 'google/cloud-sdk:slim'

export const AUTO_PREFIX_INPUT = 'INPUT_'
export const AUTO_PREFIX_OUTPUT = 'OUTPUT_'

export const JOB_LABELS: Readonly<Record<string, string>> = {jobsub: 'v1'}
