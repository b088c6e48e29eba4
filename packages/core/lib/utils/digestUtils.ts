import { createHash } from 'node:crypto'

import type { MessageAttributes } from '../types/messageTypes.ts'
import { encodeAttributeRecords } from './attributeRecordUtils.ts'

export function calculateDigest(bytes: Uint8Array): string {
  return createHash('md5').update(bytes).digest('hex')
}

export function calculateBodyDigest(body: string): string {
  return calculateDigest(Buffer.from(body, 'utf8'))
}

/**
 * MD5 over the attribute records in name order, the same value SQS returns as
 * `MD5OfMessageAttributes`. Empty string when there is nothing to digest.
 */
export function calculateAttributeDigest(attributes: MessageAttributes): string {
  if (Object.keys(attributes).length === 0) {
    return ''
  }
  return calculateDigest(encodeAttributeRecords(attributes))
}
