export type SourceErrorKind = 'network' | 'malformed'

export class SourceError extends Error {
  readonly kind: SourceErrorKind
  readonly httpStatus?: number

  constructor(kind: SourceErrorKind, message: string, options: { httpStatus?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'SourceError'
    this.kind = kind
    this.httpStatus = options.httpStatus
  }
}

export class UnknownLevelError extends Error {
  readonly status: string

  constructor(status: string) {
    super(`Unknown alert level: ${status}`)
    this.name = 'UnknownLevelError'
    this.status = status
  }
}

export type DeliveryErrorKind = 'notFound' | 'otherHTTP'

export class DeliveryError extends Error {
  readonly kind: DeliveryErrorKind
  readonly httpStatus?: number

  constructor(kind: DeliveryErrorKind, message: string, options: { httpStatus?: number; cause?: unknown } = {}) {
    super(message, { cause: options.cause })
    this.name = 'DeliveryError'
    this.kind = kind
    this.httpStatus = options.httpStatus
  }
}

export class PersistenceError extends Error {
  readonly path: string

  constructor(message: string, path: string, cause?: unknown) {
    super(message, { cause })
    this.name = 'PersistenceError'
    this.path = path
  }
}
