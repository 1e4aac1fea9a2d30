/**
 * Base class for all errors raised by the captioning pipeline
 */
export class CaptionError extends Error {
  readonly code: string
  readonly details?: unknown

  constructor(message: string, code: string, details?: unknown) {
    super(message)
    this.name = 'CaptionError'
    this.code = code
    this.details = details

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor)
    }
  }
}

/**
 * Caller supplied an out-of-range or structurally invalid parameter.
 * Always fatal: it signals a usage error, not noisy data.
 */
export class InvalidConfigurationError extends CaptionError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIGURATION', details)
    this.name = 'InvalidConfigurationError'
  }
}

/**
 * Cue text can't be rendered safely in the target format.
 * Only raised when strict serialization is requested; otherwise the text is sanitized.
 */
export class SerializationError extends CaptionError {
  constructor(message: string, details?: unknown) {
    super(message, 'SERIALIZATION_ERROR', details)
    this.name = 'SerializationError'
  }
}
