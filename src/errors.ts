export class ImgkilnError extends Error {
  constructor(
    readonly code: string,
    message: string,
    options?: {cause?: unknown}
  ) {
    super(message, options)
    this.name = 'ImgkilnError'
  }

  /** Exit code the CLI reports when this error ends a run. */
  get exitCode(): number {
    return 1
  }
}

// -- Input errors ------------------------------------------------------------

export class ValidationError extends ImgkilnError {
  constructor(message: string, options?: {cause?: unknown}) {
    super('VALIDATION_ERROR', message, options)
    this.name = 'ValidationError'
  }
}

export class InvalidImageReferenceError extends ValidationError {
  constructor(readonly reference: string, what = 'image', options?: {cause?: unknown}) {
    super(`Invalid ${what} reference: '${reference}'`, options)
    this.name = 'InvalidImageReferenceError'
  }
}

// -- Staging errors ----------------------------------------------------------

export class StagingError extends ImgkilnError {
  constructor(
    readonly destination: string,
    message: string,
    code = 'STAGING_FAILED',
    options?: {cause?: unknown}
  ) {
    super(code, message, options)
    this.name = 'StagingError'
  }
}

export class SourceNotFoundError extends StagingError {
  constructor(destination: string, readonly source: string, options?: {cause?: unknown}) {
    super(destination, `Required resource '${source}' for '${destination}' does not exist`, 'SOURCE_NOT_FOUND', options)
    this.name = 'SourceNotFoundError'
  }
}

export class SourceKindMismatchError extends StagingError {
  constructor(
    destination: string,
    readonly source: string,
    readonly expected: 'file' | 'directory',
    options?: {cause?: unknown}
  ) {
    super(destination, `Required resource '${source}' for '${destination}' is not a ${expected}`, 'SOURCE_KIND_MISMATCH', options)
    this.name = 'SourceKindMismatchError'
  }
}

export class RenderError extends StagingError {
  constructor(destination: string, message: string, code = 'RENDER_FAILED', options?: {cause?: unknown}) {
    super(destination, message, code, options)
    this.name = 'RenderError'
  }
}

// -- Build engine errors -----------------------------------------------------

export class BuildEngineError extends ImgkilnError {
  constructor(code: string, message: string, options?: {cause?: unknown}) {
    super(code, message, options)
    this.name = 'BuildEngineError'
  }
}

export class DockerNotAvailableError extends BuildEngineError {
  constructor(executable = 'docker', options?: {cause?: unknown}) {
    super('DOCKER_NOT_AVAILABLE', `Build engine '${executable}' not found. Please install Docker.`, options)
    this.name = 'DockerNotAvailableError'
  }
}

// -- Cleanup & interrupt -----------------------------------------------------

export class CleanupError extends ImgkilnError {
  constructor(readonly path: string, options?: {cause?: unknown}, message = `Could not remove '${path}'`) {
    super('CLEANUP_FAILED', message, options)
    this.name = 'CleanupError'
  }
}

export class UserInterruptError extends ImgkilnError {
  constructor(options?: {cause?: unknown}) {
    super('USER_INTERRUPT', 'Aborted by user', options)
    this.name = 'UserInterruptError'
  }

  override get exitCode(): number {
    return 130
  }
}
