/**
 * Library entry point.
 *
 * The core turns raw job parameters into a request document for a pipelines
 * service. Every function is synchronous and free of I/O.
 *
 * For CLI usage, see src/cli/index.ts
 *
 * @example
 * ```typescript
 * import {argsToJobParams, buildActions, createPipelineRequest, createResourceSpec} from 'jobsub'
 *
 * const jobParams = argsToJobParams({
 *   envs: ['MESSAGE=hello'],
 *   inputs: ['REFERENCE=gs://my-bucket/reference.fa'],
 *   outputsRecursive: ['RESULTS=gs://my-bucket/results/']
 * })
 * const actions = buildActions(jobParams, [{
 *   name: 'align',
 *   image: 'debian:stable-slim',
 *   script: 'wc -c "${REFERENCE}" > "${RESULTS}/size.txt"'
 * }])
 * const request = createPipelineRequest(
 *   createResourceSpec({project: 'my-project', region: 'us-west1'}),
 *   jobParams,
 *   actions
 * )
 * console.log(JSON.stringify(request, null, 2))
 * ```
 */

export {
  validateParamName,
  isParameterName
} from './core/param-name.js'

export {
  normalizeUri,
  validatePathsOrFail,
  rewriteGcsUri,
  rewriteLocalUri,
  detectProvider,
  directoryFmt,
  splitUri,
  uriString,
  type FileProvider,
  type LocalContext,
  type NormalizeOptions,
  type NormalizedUri
} from './core/uri.js'

export {
  createEnvParam,
  createFileParam,
  parseEnvArgs,
  splitPair
} from './core/params.js'

export {
  JobParamsBuilder,
  argsToJobParams,
  createJobParameterSet,
  allParams,
  findDuplicateNames
} from './core/job-params.js'

export {createResourceSpec} from './core/resources.js'
export {dataDiskPath, parseTimeout} from './core/utils.js'
export * from './core/constants.js'

export {buildActions} from './actions/index.js'
export {createAction, LOCALIZE_ACTION_NAME, DELOCALIZE_ACTION_NAME, type ActionDefinition} from './actions/action.js'
export {bashScript, shellQuote} from './actions/script.js'

export {createPipelineRequest, createEnvironment, createResources} from './request/pipeline-request.js'

export type * from './types.js'

export {
  JobsubError,
  ValidationError,
  NameValidationError,
  UriValidationError,
  UnsupportedProviderError,
  CollisionError,
  ConfigurationError,
  JobFileError
} from './errors.js'
