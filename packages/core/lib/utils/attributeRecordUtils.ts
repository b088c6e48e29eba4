import type {
  AttributeValueKind,
  MessageAttributeValue,
  MessageAttributes,
} from '../types/messageTypes.ts'
import { resolveAttributeValueBytes, resolveAttributeValueKind } from './messageSizeUtils.ts'

const LENGTH_PREFIX_BYTES = 4

export const ATTRIBUTE_KIND_TAGS: Record<AttributeValueKind, number> = {
  string: 0x01,
  binary: 0x02,
}

/** Attribute entries in ascending byte order of their names */
export function sortAttributeEntries(
  attributes: MessageAttributes,
): [string, MessageAttributeValue][] {
  return Object.entries(attributes).sort(([a], [b]) =>
    Buffer.compare(Buffer.from(a, 'utf8'), Buffer.from(b, 'utf8')),
  )
}

function lengthPrefixed(bytes: Uint8Array): Buffer {
  const prefix = Buffer.alloc(LENGTH_PREFIX_BYTES)
  prefix.writeUInt32BE(bytes.length, 0)
  return Buffer.concat([prefix, bytes])
}

/**
 * Encodes attributes, sorted by name, as
 * `len(name) name len(dataType) dataType kind len(value) value` records with 4-byte
 * big-endian lengths. This is the input of the SQS attribute digest.
 */
export function encodeAttributeRecords(attributes: MessageAttributes): Buffer {
  const records: Buffer[] = []

  for (const [name, value] of sortAttributeEntries(attributes)) {
    const kind = resolveAttributeValueKind(value.dataType)
    records.push(
      lengthPrefixed(Buffer.from(name, 'utf8')),
      lengthPrefixed(Buffer.from(value.dataType, 'utf8')),
      Buffer.from([ATTRIBUTE_KIND_TAGS[kind]]),
      lengthPrefixed(resolveAttributeValueBytes(value)),
    )
  }

  return Buffer.concat(records)
}
