/**
 * Typed failures surfaced by the bridge. Each carries the HTTP status the
 * Fastify error handler answers with and a stable machine-readable code.
 */

export abstract class BridgeError extends Error {
  abstract readonly code: string
  abstract readonly statusCode: number

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options)
    this.name = new.target.name
  }

  toJSON(): { error: string; code: string } {
    return { error: this.message, code: this.code }
  }
}

export class AuthenticationError extends BridgeError {
  readonly code = 'authentication_failed'
  readonly statusCode = 401
}

export class PermissionDeniedError extends BridgeError {
  readonly code = 'permission_denied'
  readonly statusCode = 403
}

/** The grant was present at the first check and gone at the second. */
export class PermissionRevokedError extends BridgeError {
  readonly code = 'permission_revoked'
  readonly statusCode = 403
}

export class NotFoundError extends BridgeError {
  readonly code = 'not_found'
  readonly statusCode = 404
}

export class UpstreamTimeoutError extends BridgeError {
  readonly code = 'upstream_timeout'
  readonly statusCode = 504
}

export class UpstreamExecutionError extends BridgeError {
  readonly code = 'upstream_error'
  readonly statusCode = 502
}

export class ConfigurationError extends BridgeError {
  readonly code = 'configuration_error'
  readonly statusCode = 500
}

export type UnknownGrantIds = {
  toolIds: string[]
  resourceIds: string[]
  promptIds: string[]
}

export class ValidationError extends BridgeError {
  readonly code = 'validation_failed'
  readonly statusCode = 422

  constructor(message: string, readonly unknownIds?: UnknownGrantIds) {
    super(message)
  }

  override toJSON(): { error: string; code: string; unknownIds?: UnknownGrantIds } {
    return this.unknownIds
      ? { error: this.message, code: this.code, unknownIds: this.unknownIds }
      : { error: this.message, code: this.code }
  }
}

/** The caller went away before the upstream answered. */
export class RequestCancelledError extends BridgeError {
  readonly code = 'request_cancelled'
  readonly statusCode = 499
}

export function isBridgeError(err: unknown): err is BridgeError {
  return err instanceof BridgeError
}
