import { MalformedPayloadError } from '../errors/claimCheckErrors.ts'
import type {
  AttributeValueKind,
  MessageAttributeValue,
  QueueMessage,
} from '../types/messageTypes.ts'
import { ATTRIBUTE_KIND_TAGS, encodeAttributeRecords } from '../utils/attributeRecordUtils.ts'
import { resolveAttributeValueKind } from '../utils/messageSizeUtils.ts'

export const PAYLOAD_FORMAT_VERSION = 1

// version (1 byte), body length (4 bytes), attribute count (4 bytes)
const HEADER_BYTES = 9

export type SerializedPayload = {
  payload: Buffer
  /** Start of the body section */
  bodyOffset: number
  /** End of the body section and start of the attribute section */
  attributeOffset: number
}

/**
 * Lays out a message as header, body bytes and attribute records. The attribute section
 * is written in digest order, so `payload.subarray(attributeOffset)` hashes to the same
 * value as the queue's own attribute digest, and the body section hashes to the body digest.
 */
export function serializePayload(message: QueueMessage): SerializedPayload {
  const body = Buffer.from(message.body, 'utf8')
  const attributeSection = encodeAttributeRecords(message.attributes)

  const header = Buffer.alloc(HEADER_BYTES)
  header.writeUInt8(PAYLOAD_FORMAT_VERSION, 0)
  header.writeUInt32BE(body.length, 1)
  header.writeUInt32BE(Object.keys(message.attributes).length, 5)

  return {
    payload: Buffer.concat([header, body, attributeSection]),
    bodyOffset: HEADER_BYTES,
    attributeOffset: HEADER_BYTES + body.length,
  }
}

class PayloadReader {
  private readonly buffer: Buffer
  private offset = 0

  constructor(bytes: Uint8Array) {
    this.buffer = Buffer.from(bytes.buffer, bytes.byteOffset, bytes.byteLength)
  }

  get remaining(): number {
    return this.buffer.length - this.offset
  }

  readUInt8(field: string): number {
    this.ensureAvailable(1, field)
    const value = this.buffer.readUInt8(this.offset)
    this.offset += 1
    return value
  }

  readUInt32(field: string): number {
    this.ensureAvailable(4, field)
    const value = this.buffer.readUInt32BE(this.offset)
    this.offset += 4
    return value
  }

  readBytes(length: number, field: string): Buffer {
    this.ensureAvailable(length, field)
    const bytes = this.buffer.subarray(this.offset, this.offset + length)
    this.offset += length
    return bytes
  }

  readLengthPrefixed(field: string): Buffer {
    return this.readBytes(this.readUInt32(`${field} length`), field)
  }

  private ensureAvailable(length: number, field: string) {
    if (this.remaining < length) {
      throw new MalformedPayloadError({
        message: `Payload is truncated, cannot read ${field}`,
        details: { field, offset: this.offset, expectedBytes: length, remainingBytes: this.remaining },
      })
    }
  }
}

function resolveKindFromTag(tag: number): AttributeValueKind {
  if (tag === ATTRIBUTE_KIND_TAGS.string) return 'string'
  if (tag === ATTRIBUTE_KIND_TAGS.binary) return 'binary'

  throw new MalformedPayloadError({
    message: `Unknown attribute value kind tag: ${tag}`,
    details: { tag },
  })
}

function readAttribute(reader: PayloadReader): [string, MessageAttributeValue] {
  const name = reader.readLengthPrefixed('attribute name').toString('utf8')
  const dataType = reader.readLengthPrefixed('attribute data type').toString('utf8')
  const kind = resolveKindFromTag(reader.readUInt8('attribute value kind'))
  const value = reader.readLengthPrefixed('attribute value')

  let expectedKind: AttributeValueKind
  try {
    expectedKind = resolveAttributeValueKind(dataType)
  } catch (err) {
    throw new MalformedPayloadError({
      message: `Attribute ${name} has an unsupported data type: ${dataType}`,
      details: { name, dataType },
      cause: err,
    })
  }
  if (expectedKind !== kind) {
    throw new MalformedPayloadError({
      message: `Attribute ${name} is stored as ${kind} but its data type is ${dataType}`,
      details: { name, dataType, kind },
    })
  }

  if (kind === 'binary') {
    return [name, { dataType, binaryValue: new Uint8Array(value) }]
  }
  return [name, { dataType, stringValue: value.toString('utf8') }]
}

export function deserializePayload(bytes: Uint8Array): QueueMessage {
  const reader = new PayloadReader(bytes)

  const version = reader.readUInt8('format version')
  if (version !== PAYLOAD_FORMAT_VERSION) {
    throw new MalformedPayloadError({
      message: `Unsupported payload format version: ${version}`,
      details: { version, supportedVersion: PAYLOAD_FORMAT_VERSION },
    })
  }

  const bodyLength = reader.readUInt32('body length')
  const attributeCount = reader.readUInt32('attribute count')
  const body = reader.readBytes(bodyLength, 'body').toString('utf8')

  // names such as `__proto__` must become own keys, so no index assignment here
  const entries: [string, MessageAttributeValue][] = []
  const names = new Set<string>()
  for (let i = 0; i < attributeCount; i++) {
    const [name, value] = readAttribute(reader)
    if (names.has(name)) {
      throw new MalformedPayloadError({
        message: `Attribute ${name} appears more than once`,
        details: { name },
      })
    }
    names.add(name)
    entries.push([name, value])
  }

  if (reader.remaining > 0) {
    throw new MalformedPayloadError({
      message: `Payload has ${reader.remaining} unexpected trailing bytes`,
      details: { trailingBytes: reader.remaining, attributeCount },
    })
  }

  return { body, attributes: Object.fromEntries(entries) }
}
