import { InternalError } from '@lokalise/node-core'

export type CommonErrorParams = {
  message: string
  details?: Record<string, unknown>
  cause?: unknown
}

export class MessageTooLargeError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'MESSAGE_TOO_LARGE',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'MessageTooLargeError'
  }
}

export class UnsupportedAttributeTypeError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'UNSUPPORTED_ATTRIBUTE_TYPE',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'UnsupportedAttributeTypeError'
  }
}

export class InvalidDestinationIdentifierError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'INVALID_DESTINATION_IDENTIFIER',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'InvalidDestinationIdentifierError'
  }
}

export class MalformedPayloadError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'MALFORMED_PAYLOAD',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'MalformedPayloadError'
  }
}

export class MalformedReferenceMessageError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'MALFORMED_REFERENCE_MESSAGE',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'MalformedReferenceMessageError'
  }
}

export class MalformedReceiptHandleError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'MALFORMED_RECEIPT_HANDLE',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'MalformedReceiptHandleError'
  }
}

export class MalformedErrorMessageError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'MALFORMED_ERROR_MESSAGE',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'MalformedErrorMessageError'
  }
}

/**
 * Raised by blob store adapters when the underlying storage call fails.
 * The orchestrator never retries these and passes them through as they are.
 */
export class StoreIOError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'STORE_IO_ERROR',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'StoreIOError'
  }
}

/**
 * Raised by queue and topic adapters when the underlying service call fails.
 */
export class QueueIOError extends InternalError {
  constructor(params: CommonErrorParams) {
    super({
      message: params.message,
      errorCode: 'QUEUE_IO_ERROR',
      details: params.details,
      cause: params.cause,
    })
    this.name = 'QueueIOError'
  }
}

export type ClaimCheckError =
  | MessageTooLargeError
  | UnsupportedAttributeTypeError
  | InvalidDestinationIdentifierError
  | MalformedPayloadError
  | MalformedReferenceMessageError
  | MalformedReceiptHandleError
  | MalformedErrorMessageError
  | StoreIOError
  | QueueIOError

const CLAIM_CHECK_ERROR_NAMES = new Set([
  'MessageTooLargeError',
  'UnsupportedAttributeTypeError',
  'InvalidDestinationIdentifierError',
  'MalformedPayloadError',
  'MalformedReferenceMessageError',
  'MalformedReceiptHandleError',
  'MalformedErrorMessageError',
  'StoreIOError',
  'QueueIOError',
])

export function isClaimCheckError(err: unknown): err is ClaimCheckError {
  return err instanceof InternalError && CLAIM_CHECK_ERROR_NAMES.has(err.name)
}
