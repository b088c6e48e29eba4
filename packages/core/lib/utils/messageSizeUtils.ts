import { UnsupportedAttributeTypeError } from '../errors/claimCheckErrors.ts'
import type {
  AttributeValueKind,
  MessageAttributeValue,
  MessageAttributes,
} from '../types/messageTypes.ts'

export const DEFAULT_INLINE_LIMIT_BYTES = 262_144
export const DEFAULT_MAX_LIMIT_BYTES = 26_214_400

export type SizeClassification = 'SendInline' | 'SendOffloaded' | 'Reject'

export type SizeLimits = {
  inlineLimit: number
  maxLimit: number
  alwaysOffload: boolean
}

export function resolveAttributeValueKind(dataType: string): AttributeValueKind {
  if (dataType.startsWith('String') || dataType.startsWith('Number')) {
    return 'string'
  }
  if (dataType.startsWith('Binary')) {
    return 'binary'
  }

  throw new UnsupportedAttributeTypeError({
    message: `Encountered unexpected data type for message attribute: ${dataType}`,
    details: { dataType },
  })
}

export function resolveAttributeValueBytes(value: MessageAttributeValue): Uint8Array {
  if (resolveAttributeValueKind(value.dataType) === 'binary') {
    return value.binaryValue ?? new Uint8Array(0)
  }
  return Buffer.from(value.stringValue ?? '', 'utf8')
}

/**
 * Size of a message as the queue service accounts for it: body bytes plus, per attribute,
 * the bytes of its name, its data type and its value.
 */
export function calculateMessageSize(body: string, attributes: MessageAttributes = {}): number {
  let size = Buffer.byteLength(body, 'utf8')

  for (const [name, value] of Object.entries(attributes)) {
    size += Buffer.byteLength(name, 'utf8')
    size += Buffer.byteLength(value.dataType, 'utf8')
    size += resolveAttributeValueBytes(value).length
  }

  return size
}

export function classifyMessageSize(size: number, limits: SizeLimits): SizeClassification {
  if (size > limits.maxLimit) {
    return 'Reject'
  }
  if (!limits.alwaysOffload && size <= limits.inlineLimit) {
    return 'SendInline'
  }
  return 'SendOffloaded'
}
