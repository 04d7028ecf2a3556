export class JobsubError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'JobsubError'
  }
}

// -- Validation errors -------------------------------------------------------

export class ValidationError extends JobsubError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'ValidationError'
  }
}

export class NameValidationError extends ValidationError {
  constructor(
    readonly paramName: string,
    readonly paramType: string,
    options?: {cause?: unknown}
  ) {
    super('INVALID_PARAMETER_NAME', `Invalid ${paramType}: ${paramName}`, options)
    this.name = 'NameValidationError'
  }
}

export class UriValidationError extends ValidationError {
  constructor(
    readonly uri: string,
    message: string,
    options?: {cause?: unknown; code?: string}
  ) {
    super(options?.code ?? 'INVALID_URI', message, options)
    this.name = 'UriValidationError'
  }
}

export class UnsupportedProviderError extends UriValidationError {
  constructor(uri: string, options?: {cause?: unknown}) {
    super(uri, `Unsupported file provider, expected a gs:// location: ${uri}`, {...options, code: 'UNSUPPORTED_PROVIDER'})
    this.name = 'UnsupportedProviderError'
  }
}

export class CollisionError extends ValidationError {
  constructor(
    readonly duplicates: string[],
    options?: {cause?: unknown}
  ) {
    super('DUPLICATE_PARAMETER_NAMES', `Bad job config; duplicate names found: ${duplicates.join(', ')}`, options)
    this.name = 'CollisionError'
  }
}

export class ConfigurationError extends ValidationError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('INVALID_CONFIGURATION', message, options)
    this.name = 'ConfigurationError'
  }
}

// -- Job file errors ---------------------------------------------------------

export class JobFileError extends JobsubError {
  constructor(
    readonly filePath: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super('JOB_FILE_INVALID', `${filePath}: ${message}`, options)
    this.name = 'JobFileError'
  }
}
