import { randomUUID } from 'node:crypto'

import { z } from 'zod/v4'

import {
  InvalidDestinationIdentifierError,
  MalformedReferenceMessageError,
} from '../errors/claimCheckErrors.ts'

export const REFERENCE_MESSAGE_IDENTIFIER = 'd3131a62e0224688b77a506fd333dac4'

const REFERENCE_MESSAGE_PREFIX = `{"identifier":"${REFERENCE_MESSAGE_IDENTIFIER}",`

/**
 * Sent through the queue in place of an offloaded message. Key names and their order are
 * part of the wire format shared with other clients.
 */
export const REFERENCE_MESSAGE_SCHEMA = z.object({
  identifier: z.literal(REFERENCE_MESSAGE_IDENTIFIER),
  s3_region: z.string(),
  s3_bucket: z.string().min(1),
  s3_key: z.string().min(1),
  md5_digest_msg_body: z.string(),
  md5_digest_msg_attr: z.string(),
})

export type ReferenceMessage = z.output<typeof REFERENCE_MESSAGE_SCHEMA>

/**
 * How offloaded messages travel.
 * `direct` sends to a queue addressed by URL.
 * `pubSubEnvelope` publishes to a topic addressed by ARN and wraps the stored body the way
 * topic notifications wrap theirs.
 */
export type TransportEnvelope = { kind: 'direct' } | { kind: 'pubSubEnvelope' }

export const DIRECT_ENVELOPE: TransportEnvelope = { kind: 'direct' }
export const PUB_SUB_ENVELOPE: TransportEnvelope = { kind: 'pubSubEnvelope' }

export type ReferenceMessageParams = {
  destination: string
  bucket: string
  region: string
  bodyDigest: string
  attributeDigest: string
}

// https://sqs.us-west-2.amazonaws.com/123456789012/MyQueue
const QUEUE_URL_TOKEN_COUNT = 5
// arn:aws:sns:us-west-2:123456789012:MyTopic
const TOPIC_ARN_TOKEN_COUNT = 6

export function toReferenceMessageJson(reference: ReferenceMessage): string {
  return JSON.stringify({
    identifier: reference.identifier,
    s3_region: reference.s3_region,
    s3_bucket: reference.s3_bucket,
    s3_key: reference.s3_key,
    md5_digest_msg_body: reference.md5_digest_msg_body,
    md5_digest_msg_attr: reference.md5_digest_msg_attr,
  })
}

export function isReferenceMessage(text: string): boolean {
  return text.startsWith(REFERENCE_MESSAGE_PREFIX)
}

export function parseReferenceMessage(text: string): ReferenceMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new MalformedReferenceMessageError({
      message: 'Reference message is not valid JSON',
      cause: err,
    })
  }

  const result = REFERENCE_MESSAGE_SCHEMA.safeParse(parsed)
  if (!result.success) {
    throw new MalformedReferenceMessageError({
      message: 'Reference message does not match the expected format',
      details: { issues: result.error.issues.map((issue) => issue.message) },
    })
  }
  return result.data
}

export class ReferenceMessageCodec {
  private readonly envelope: TransportEnvelope

  constructor(envelope: TransportEnvelope = DIRECT_ENVELOPE) {
    this.envelope = envelope
  }

  /**
   * Builds the reference for a payload about to be stored. The object key is the
   * destination name followed by a random UUID, so concurrent sends never share a key.
   */
  buildReferenceMessage(params: ReferenceMessageParams): ReferenceMessage {
    const destinationName = this.resolveDestinationName(params.destination)

    return {
      identifier: REFERENCE_MESSAGE_IDENTIFIER,
      s3_region: params.region,
      s3_bucket: params.bucket,
      s3_key: `${destinationName}/${randomUUID()}`,
      md5_digest_msg_body: params.bodyDigest,
      md5_digest_msg_attr: params.attributeDigest,
    }
  }

  wrapPayloadBody(body: string): string {
    switch (this.envelope.kind) {
      case 'direct':
        return body
      case 'pubSubEnvelope':
        return JSON.stringify({ Message: body })
    }
  }

  resolveDestinationName(destination: string): string {
    switch (this.envelope.kind) {
      case 'direct':
        return extractToken(destination, '/', QUEUE_URL_TOKEN_COUNT, QUEUE_URL_TOKEN_COUNT - 1)
      case 'pubSubEnvelope':
        return extractToken(destination, ':', TOPIC_ARN_TOKEN_COUNT, TOPIC_ARN_TOKEN_COUNT - 1)
    }
  }
}

function extractToken(
  destination: string,
  separator: string,
  expectedTokenCount: number,
  index: number,
): string {
  const tokens = destination.split(separator)
  const token = tokens[index]
  if (tokens.length !== expectedTokenCount || !token) {
    throw new InvalidDestinationIdentifierError({
      message: `Expected ${expectedTokenCount} tokens when splitting ${destination} by '${separator}' but received ${tokens.length}`,
      details: { destination, separator, expectedTokenCount, tokenCount: tokens.length },
    })
  }
  return token
}
