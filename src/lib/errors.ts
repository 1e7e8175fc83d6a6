/**
 * Error hierarchy for the Grist client
 *
 * Converter failures are never wrapped: they reach the caller as thrown.
 */

/**
 * Base class for every error raised by the client itself
 */
export class GristApiError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }
}

/**
 * Invalid or conflicting configuration input
 */
export class ConfigurationError extends GristApiError {}

/**
 * A writing call was attempted while safe mode is on
 */
export class SafeModeError extends GristApiError {}

export type TransportFailureKind = 'invalid-url' | 'refused' | 'timeout' | 'unknown' | 'unreachable'

/**
 * No response was obtained from the server
 */
export class TransportError extends GristApiError {
  readonly kind: TransportFailureKind
  readonly url: string

  constructor(message: string, kind: TransportFailureKind, url: string, options?: { cause?: unknown }) {
    super(message, options)
    this.kind = kind
    this.url = url
  }
}

/**
 * A response was received with a status code >= 300 and raise-on-error is set.
 * The payload is the service's own error body.
 */
export class HttpError extends GristApiError {
  readonly payload: unknown
  readonly reason: string
  readonly status: number
  readonly url: string

  constructor(status: number, reason: string, url: string, payload: unknown) {
    super(`${status} ${reason} for url: ${url}`)
    this.status = status
    this.reason = reason
    this.url = url
    this.payload = payload
  }
}

/**
 * Walk an error cause chain looking for a Node system error code
 */
function findErrorCode(error: unknown): string | undefined {
  let current: unknown = error
  for (let depth = 0; depth < 5 && current instanceof Error; depth++) {
    if ('code' in current && typeof current.code === 'string') {
      return current.code
    }

    current = current.cause
  }

  return undefined
}

/**
 * Classify a failed fetch into a transport failure kind
 */
export function classifyTransportFailure(error: unknown): TransportFailureKind {
  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) {
    return 'timeout'
  }

  const code = findErrorCode(error)
  switch (code) {
    case 'ECONNREFUSED':
    case 'ECONNRESET': {
      return 'refused'
    }

    case 'ETIMEDOUT':
    case 'UND_ERR_CONNECT_TIMEOUT':
    case 'UND_ERR_HEADERS_TIMEOUT': {
      return 'timeout'
    }

    case 'EAI_AGAIN':
    case 'EHOSTUNREACH':
    case 'ENETUNREACH':
    case 'ENOTFOUND': {
      return 'unreachable'
    }

    case 'ERR_INVALID_URL': {
      return 'invalid-url'
    }

    default: {
      return 'unknown'
    }
  }
}
