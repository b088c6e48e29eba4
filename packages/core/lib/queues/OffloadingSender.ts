import { globalLogger } from '@lokalise/node-core'

import {
  type OffloadingOptions,
  type ResolvedOffloadingOptions,
  resolveOffloadingOptions,
} from '../config/offloadingConfig.ts'
import { MessageTooLargeError, StoreIOError } from '../errors/claimCheckErrors.ts'
import { buildErrorMessage, toErrorMessageJson } from '../messages/errorMessage.ts'
import {
  DIRECT_ENVELOPE,
  type ReferenceMessage,
  ReferenceMessageCodec,
  type TransportEnvelope,
  toReferenceMessageJson,
} from '../messages/referenceMessage.ts'
import { serializePayload } from '../payload-store/payloadCodec.ts'
import type { BlobStore, MessageSender, SendMessageResult } from '../types/collaboratorTypes.ts'
import type { Logger } from '../types/loggerTypes.ts'
import type { MessageAttributes, QueueMessage } from '../types/messageTypes.ts'
import { calculateDigest } from '../utils/digestUtils.ts'
import { calculateMessageSize, classifyMessageSize } from '../utils/messageSizeUtils.ts'

export const CLIENT_VERSION_ATTRIBUTE = 'hefty-client-version'
export const CLIENT_VERSION = 'v1.0'

export type OffloadingSenderDependencies<SendOptions extends object> = {
  sender: MessageSender<SendOptions>
  blobStore: BlobStore
  logger?: Logger
}

export type OffloadingSenderOptions = OffloadingOptions & {
  envelope?: TransportEnvelope
}

/**
 * Sends messages inline while they fit the queue, and through the blob store otherwise.
 * Offloaded messages are replaced by a reference message carrying the digests the queue
 * would have reported for the original message.
 */
export class OffloadingSender<SendOptions extends object = object> {
  protected readonly blobStore: BlobStore
  protected readonly logger: Logger
  protected readonly options: ResolvedOffloadingOptions
  protected readonly referenceMessageCodec: ReferenceMessageCodec
  private readonly sender: MessageSender<SendOptions>

  constructor(
    dependencies: OffloadingSenderDependencies<SendOptions>,
    options: OffloadingSenderOptions,
  ) {
    this.sender = dependencies.sender
    this.blobStore = dependencies.blobStore
    this.logger = dependencies.logger ?? globalLogger
    this.options = resolveOffloadingOptions(options)
    this.referenceMessageCodec = new ReferenceMessageCodec(options.envelope ?? DIRECT_ENVELOPE)
  }

  /** Fails when the configured bucket does not exist or is not accessible. */
  async init(): Promise<void> {
    const bucketExists = await this.blobStore.exists(this.options.bucket)
    if (!bucketExists) {
      throw new StoreIOError({
        message: `Bucket ${this.options.bucket} does not exist or is not accessible`,
        details: { bucket: this.options.bucket },
      })
    }
  }

  async sendMessage(
    destination: string,
    message: QueueMessage,
    options?: SendOptions,
  ): Promise<SendMessageResult> {
    // let the queue service reject empty bodies itself
    if (message.body.length === 0) {
      return this.sender.send(destination, message, options)
    }

    const size = calculateMessageSize(message.body, message.attributes)
    const classification = classifyMessageSize(size, this.options)

    if (classification === 'Reject') {
      throw new MessageTooLargeError({
        message: `Message size of ${size} bytes greater than allowed message size of ${this.options.maxLimit} bytes`,
        details: { destination, size, maxLimit: this.options.maxLimit },
      })
    }
    if (classification === 'SendInline') {
      return this.sender.send(destination, message, options)
    }

    return this.sendOffloaded(destination, message, size, options)
  }

  private async sendOffloaded(
    destination: string,
    message: QueueMessage,
    size: number,
    options?: SendOptions,
  ): Promise<SendMessageResult> {
    const serialized = serializePayload({
      body: this.referenceMessageCodec.wrapPayloadBody(message.body),
      attributes: message.attributes,
    })
    const { payload, bodyOffset, attributeOffset } = serialized

    const bodyDigest = calculateDigest(payload.subarray(bodyOffset, attributeOffset))
    const attributeDigest =
      Object.keys(message.attributes).length > 0
        ? calculateDigest(payload.subarray(attributeOffset))
        : ''

    const reference = this.referenceMessageCodec.buildReferenceMessage({
      destination,
      bucket: this.options.bucket,
      region: this.options.region,
      bodyDigest,
      attributeDigest,
    })

    this.logger.debug(
      { destination, size, bucket: reference.s3_bucket, key: reference.s3_key },
      'Offloading message payload',
    )
    await this.blobStore.put(reference.s3_bucket, reference.s3_key, payload)

    let result: SendMessageResult
    try {
      result = await this.sender.send(
        destination,
        { body: toReferenceMessageJson(reference), attributes: this.resolveMarkerAttributes() },
        options,
      )
    } catch (err) {
      this.logger.warn(
        { destination, bucket: reference.s3_bucket, key: reference.s3_key },
        'Sending reference message failed, offloaded payload is left in the bucket',
      )
      await this.reportOrphanedPayload(err, reference, options)
      throw err
    }

    return {
      ...result,
      bodyDigest,
      attributeDigest: attributeDigest || undefined,
    }
  }

  private resolveMarkerAttributes(): MessageAttributes {
    return {
      [CLIENT_VERSION_ATTRIBUTE]: { dataType: 'String', stringValue: CLIENT_VERSION },
    }
  }

  /**
   * The notice goes out with the options of the failed send, so a FIFO failure destination
   * receives the same message group.
   */
  private async reportOrphanedPayload(
    error: unknown,
    reference: ReferenceMessage,
    options?: SendOptions,
  ) {
    const notificationDestination = this.options.failureNotificationDestination
    if (!notificationDestination) {
      return
    }

    const errorMessage = buildErrorMessage(error, reference)
    try {
      await this.sender.send(
        notificationDestination,
        { body: toErrorMessageJson(errorMessage), attributes: {} },
        options,
      )
    } catch (notificationError) {
      this.logger.error(
        { destination: notificationDestination, error: notificationError },
        'Failed to report orphaned offloaded payload',
      )
    }
  }
}
