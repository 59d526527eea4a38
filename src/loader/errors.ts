export type PhotoLoaderErrorCode =
  | 'RESOURCE_UNAVAILABLE'
  | 'DECODE_FAILURE'
  | 'DISPATCHER_STOPPED'

/**
 * Base class for loader errors. These travel through `error` events only;
 * a listener never sees one, it sees an absent image.
 */
export class PhotoLoaderError extends Error {
  readonly code: PhotoLoaderErrorCode
  readonly locator?: string

  constructor(
    message: string,
    code: PhotoLoaderErrorCode,
    options: { locator?: string; cause?: unknown } = {}
  ) {
    super(message, { cause: options.cause })
    this.name = 'PhotoLoaderError'
    this.code = code
    this.locator = options.locator
  }
}

export class ResourceUnavailableError extends PhotoLoaderError {
  constructor(locator: string, reason: string, cause?: unknown) {
    super(`Cannot open ${locator}: ${reason}`, 'RESOURCE_UNAVAILABLE', {
      locator,
      cause,
    })
    this.name = 'ResourceUnavailableError'
  }
}

export class DecodeFailureError extends PhotoLoaderError {
  constructor(hint: string, reason: string, cause?: unknown) {
    super(`Cannot decode ${hint}: ${reason}`, 'DECODE_FAILURE', {
      locator: hint,
      cause,
    })
    this.name = 'DecodeFailureError'
  }
}

export class DispatcherStoppedError extends PhotoLoaderError {
  constructor(locator: string) {
    super(`Dispatcher is stopped, not loading ${locator}`, 'DISPATCHER_STOPPED', {
      locator,
    })
    this.name = 'DispatcherStoppedError'
  }
}

export function toError(value: unknown): Error {
  return value instanceof Error ? value : new Error(String(value))
}
