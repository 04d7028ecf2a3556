import type {EnvParam, FileParam, FileRole} from '../types.js'
import {validateParamName} from './param-name.js'
import {normalizeUri, type NormalizeOptions} from './uri.js'

const PARAM_TYPES: Record<FileRole, string> = {
  input: 'Input parameter',
  output: 'Output parameter'
}

export function createEnvParam(name: string, value?: string): EnvParam {
  validateParamName(name, 'Environment variable')
  return value === undefined ? {kind: 'env', name} : {kind: 'env', name, value}
}

/**
 * Builds a file parameter, validating and rewriting `rawUri`.
 * An empty or missing `rawUri` declares the parameter without a value.
 */
export function createFileParam(
  role: FileRole,
  name: string,
  rawUri: string | undefined,
  recursive: boolean,
  options?: NormalizeOptions
): FileParam {
  validateParamName(name, PARAM_TYPES[role])

  if (!rawUri) {
    return {kind: 'file', role, name, recursive}
  }

  const {uri, mountPath} = normalizeUri(rawUri, recursive, options)
  return {kind: 'file', role, name, value: rawUri, mountPath, uri, recursive}
}

/**
 * Splits a string on the first `separator`. When the separator is absent, the
 * side at `nullableIndex` is left undefined.
 *
 *   splitPair('A=b=c', '=', 1) -> ['A', 'b=c']
 *   splitPair('gs://x', '=', 0) -> [undefined, 'gs://x']
 */
export function splitPair(pair: string, separator: string, nullableIndex: 0 | 1): [string | undefined, string | undefined] {
  const index = pair.indexOf(separator)
  if (index === -1) {
    return nullableIndex === 0 ? [undefined, pair] : [pair, undefined]
  }

  return [pair.slice(0, index), pair.slice(index + separator.length)]
}

/** Parses `key` or `key=value` flags into environment parameters. */
export function parseEnvArgs(args: readonly string[]): EnvParam[] {
  return args.map(arg => {
    const [name, value] = splitPair(arg, '=', 1)
    return createEnvParam(name ?? '', value)
  })
}
