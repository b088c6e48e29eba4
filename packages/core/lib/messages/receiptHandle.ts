import { MalformedReceiptHandleError } from '../errors/claimCheckErrors.ts'

const RECEIPT_HANDLE_MARKER = 'hefty-message'
const RECEIPT_HANDLE_DELIMITER = '|'
const EXPECTED_TOKEN_COUNT = 4

export type UnwrappedReceiptHandle = {
  isOffloaded: boolean
  nativeHandle: string
  bucket: string
  key: string
}

/**
 * Packs the queue's handle together with the location of the offloaded payload, so that
 * deleting the message can also delete the stored object.
 */
export function wrapReceiptHandle(nativeHandle: string, bucket: string, key: string): string {
  for (const [field, value] of Object.entries({ nativeHandle, bucket, key })) {
    if (value.includes(RECEIPT_HANDLE_DELIMITER)) {
      throw new MalformedReceiptHandleError({
        message: `Receipt handle field ${field} must not contain '${RECEIPT_HANDLE_DELIMITER}'`,
        details: { field },
      })
    }
  }

  const composite = [RECEIPT_HANDLE_MARKER, nativeHandle, bucket, key].join(
    RECEIPT_HANDLE_DELIMITER,
  )
  return Buffer.from(composite, 'utf8').toString('base64')
}

/**
 * Handles that were not produced by `wrapReceiptHandle` come back unchanged as native handles.
 */
export function unwrapReceiptHandle(receiptHandle: string): UnwrappedReceiptHandle {
  const decoded = Buffer.from(receiptHandle, 'base64').toString('utf8')

  if (!decoded.startsWith(`${RECEIPT_HANDLE_MARKER}${RECEIPT_HANDLE_DELIMITER}`)) {
    return { isOffloaded: false, nativeHandle: receiptHandle, bucket: '', key: '' }
  }

  const tokens = decoded.split(RECEIPT_HANDLE_DELIMITER)
  const [, nativeHandle, bucket, key] = tokens
  if (
    tokens.length !== EXPECTED_TOKEN_COUNT ||
    nativeHandle === undefined ||
    bucket === undefined ||
    key === undefined
  ) {
    throw new MalformedReceiptHandleError({
      message: `Expected ${EXPECTED_TOKEN_COUNT} tokens in receipt handle but received ${tokens.length}`,
      details: { tokenCount: tokens.length },
    })
  }

  return { isOffloaded: true, nativeHandle, bucket, key }
}
