import {posix} from 'node:path'
import {UnsupportedProviderError, UriValidationError} from '../errors.js'
import type {UriReference} from '../types.js'

const GCS_PREFIX = 'gs://'
const GCS_MOUNT_PREFIX = 'gs/'
const LOCAL_MOUNT_PREFIX = 'file/'
const HOME_TOKEN = '_home_'
const CWD_TOKEN = '_cwd_'
const DOTDOT_TOKEN = '_dotdot_'
const RESERVED_SEGMENTS = new Set([HOME_TOKEN, CWD_TOKEN, DOTDOT_TOKEN])

export type FileProvider = 'gcs' | 'local'

/**
 * Host facts needed to expand local paths. Passing it enables the local
 * provider, which is otherwise rejected like any unsupported scheme.
 */
export type LocalContext = {
  /** Invoking user's home directory, substituted for `~/`. */
  home: string;
  /** Directory relative paths are resolved against. */
  cwd: string;
}

export type NormalizeOptions = {
  local?: LocalContext;
}

export type NormalizedUri = {
  uri: UriReference;
  /** Location relative to the data disk mount point. */
  mountPath: string;
}

type Rewrite = {
  /** Canonical external form of the reference. */
  normalized: string;
  mountPath: string;
}

/** Ensures directories end with exactly one `/`, which recursive copies rely on. */
export function directoryFmt(directory: string): string {
  return directory.replace(/\/+$/, '') + '/'
}

/** Splits at the last `/`, keeping the slash on the directory side. */
export function splitUri(uri: string): [path: string, basename: string] {
  const index = uri.lastIndexOf('/') + 1
  return [uri.slice(0, index), uri.slice(index)]
}

export function uriString(uri: UriReference): string {
  return uri.path + uri.basename
}

export function detectProvider(uri: string): FileProvider | undefined {
  if (uri.startsWith(GCS_PREFIX)) {
    return 'gcs'
  }

  if (uri.startsWith('file:')) {
    return 'local'
  }

  // Any other scheme://
  if (/^[A-Za-z][\w+.-]*:\/\//.test(uri)) {
    return undefined
  }

  return 'local'
}

/**
 * Validates a raw flag value and produces both its canonical reference and
 * its path under the data disk mount.
 *
 * Recursive references are coerced to directories first.
 */
export function normalizeUri(rawUri: string, recursive: boolean, options: NormalizeOptions = {}): NormalizedUri {
  const uri = recursive ? directoryFmt(rawUri) : rawUri

  validatePathsOrFail(uri, recursive)

  const provider = detectProvider(uri)
  let rewrite: Rewrite
  if (provider === 'gcs') {
    rewrite = rewriteGcsUri(uri)
  } else if (provider === 'local' && options.local) {
    rewrite = rewriteLocalUri(uri, options.local)
  } else {
    throw new UnsupportedProviderError(uri)
  }

  const [path, basename] = splitUri(rewrite.normalized)
  return {
    uri: {path, basename, recursive},
    mountPath: rewrite.mountPath
  }
}

export function validatePathsOrFail(uri: string, recursive: boolean): void {
  // Only plain `*` wildcards are handled; brackets or `?` would only work by accident.
  if (uri.includes('[') || uri.includes(']')) {
    throw new UriValidationError(uri, `Square bracket (character ranges) are not supported: ${uri}`)
  }

  if (uri.includes('?')) {
    throw new UriValidationError(uri, `Question mark wildcards are not supported: ${uri}`)
  }

  const [path, basename] = splitUri(uri)

  // Directory-level wildcards would need expansion into several parameters.
  if (path.includes('*')) {
    throw new UriValidationError(uri, `Path wildcard (*) are only supported for files: ${uri}`)
  }

  if (basename.includes('**')) {
    throw new UriValidationError(uri, `Recursive wildcards ("**") not supported: ${uri}`)
  }

  if (basename === '.' || basename === '..') {
    throw new UriValidationError(uri, `Path characters ".." and "." not supported for file names: ${uri}`)
  }

  if (!recursive && !basename) {
    throw new UriValidationError(uri, `Input or output values that are not recursive must reference a filename or wildcard: ${uri}`)
  }
}

/**
 * The remote URI is kept verbatim; its mount path swaps `gs://` for a `gs/`
 * segment so remote objects and local files never share a mount path.
 */
export function rewriteGcsUri(rawUri: string): Rewrite {
  const rest = rawUri.slice(GCS_PREFIX.length)
  const bucketEnd = rest.indexOf('/')
  if (bucketEnd <= 0) {
    throw new UriValidationError(rawUri, `Expected a bucket and object path: ${rawUri}`)
  }

  const [path] = splitUri(rest)
  if (path.split('/').some(segment => segment === '.' || segment === '..')) {
    throw new UriValidationError(rawUri, `Path segments ".." and "." not supported in remote paths: ${rawUri}`)
  }

  return {normalized: rawUri, mountPath: GCS_MOUNT_PREFIX + rest}
}

/**
 * Local paths are simplified for the external form, and rewritten under a
 * `file/` root for the mount path.
 *
 * Absolute paths keep their normalized location. Paths below the home
 * directory and paths relative to the working directory get their own
 * namespace, so they never share a mount path with an absolute one and the
 * invoker's home directory is not spelled out. Parent references that
 * survive normalization become `_dotdot_`:
 *
 *   /tmp/a/../B/f.txt    -> file/tmp/B/f.txt
 *   ~/localdata/*.bam    -> file/_home_/localdata/*.bam
 *   ./../upper_dir/      -> file/_cwd_/_dotdot_/upper_dir/
 */
export function rewriteLocalUri(rawUri: string, context: LocalContext): Rewrite {
  // The file name is never rewritten
  const [rawPath, filename] = splitUri(rawUri)
  const {root, rest} = localRoot(rawPath)

  if (rest.split('/').some(segment => RESERVED_SEGMENTS.has(segment))) {
    throw new UriValidationError(rawUri, `Path segments "${[...RESERVED_SEGMENTS].join('", "')}" are reserved: ${rawUri}`)
  }

  let base = '/'
  let segments: string[]
  if (root === 'absolute') {
    // Nothing goes above the root
    segments = splitSegments(posix.resolve('/', rest))
  } else {
    base = root === 'home' ? context.home : context.cwd
    segments = [
      root === 'home' ? HOME_TOKEN : CWD_TOKEN,
      ...splitSegments(posix.normalize(rest || '.')).map(segment => segment === '..' ? DOTDOT_TOKEN : segment)
    ]
  }

  return {
    normalized: directoryFmt(posix.resolve(base, rest)) + filename,
    mountPath: directoryFmt(LOCAL_MOUNT_PREFIX + segments.join('/')) + filename
  }
}

type LocalRoot = 'absolute' | 'home' | 'cwd'

/** Strips the prefix that anchors a local directory, keeping what follows it. */
function localRoot(rawPath: string): {root: LocalRoot; rest: string} {
  for (const prefix of ['file:///', 'file:/', '/']) {
    if (rawPath.startsWith(prefix)) {
      return {root: 'absolute', rest: rawPath.slice(prefix.length)}
    }
  }

  if (rawPath.startsWith('~/')) {
    return {root: 'home', rest: rawPath.slice(2)}
  }

  return {root: 'cwd', rest: rawPath}
}

function splitSegments(path: string): string[] {
  return path.split('/').filter(segment => segment !== '' && segment !== '.')
}
