import { StoreIOError } from '../errors/claimCheckErrors.ts'
import { isReferenceMessage, parseReferenceMessage } from '../messages/referenceMessage.ts'
import { unwrapReceiptHandle, wrapReceiptHandle } from '../messages/receiptHandle.ts'
import { deserializePayload } from '../payload-store/payloadCodec.ts'
import type {
  BlobStore,
  QueueClient,
  ReceiveMessagesRequest,
  ReceivedMessage,
} from '../types/collaboratorTypes.ts'
import type { Logger } from '../types/loggerTypes.ts'
import {
  CLIENT_VERSION_ATTRIBUTE,
  OffloadingSender,
  type OffloadingSenderOptions,
} from './OffloadingSender.ts'

export type OffloadOrchestratorDependencies<SendOptions extends object> = {
  queueClient: QueueClient<SendOptions>
  blobStore: BlobStore
  logger?: Logger
}

/**
 * Offload-aware send, receive and delete on top of a queue client and a blob store.
 */
export class OffloadOrchestrator<
  SendOptions extends object = object,
> extends OffloadingSender<SendOptions> {
  private readonly queueClient: QueueClient<SendOptions>

  constructor(
    dependencies: OffloadOrchestratorDependencies<SendOptions>,
    options: OffloadingSenderOptions,
  ) {
    super(
      {
        sender: dependencies.queueClient,
        blobStore: dependencies.blobStore,
        logger: dependencies.logger,
      },
      options,
    )
    this.queueClient = dependencies.queueClient
  }

  /**
   * Receives messages and replaces every reference message with the payload it points to.
   * Substituted messages carry the original digests and a receipt handle that also locates
   * the stored payload.
   */
  async receiveMessages(
    source: string,
    request: ReceiveMessagesRequest = {},
  ): Promise<ReceivedMessage[]> {
    const attributeNames = new Set(request.attributeNames)
    attributeNames.add(CLIENT_VERSION_ATTRIBUTE)

    const messages = await this.queueClient.receive(source, {
      ...request,
      attributeNames: [...attributeNames],
    })

    return Promise.all(messages.map((message) => this.resolveReceivedMessage(message)))
  }

  /**
   * Deletes the stored payload first when the handle carries one, then the queue message.
   */
  async deleteMessage(source: string, receiptHandle: string): Promise<void> {
    const unwrapped = unwrapReceiptHandle(receiptHandle)

    if (unwrapped.isOffloaded) {
      await this.blobStore.delete(unwrapped.bucket, unwrapped.key)
      this.logger.debug(
        { source, bucket: unwrapped.bucket, key: unwrapped.key },
        'Deleted offloaded payload',
      )
    }

    await this.queueClient.delete(source, unwrapped.nativeHandle)
  }

  resolveNativeReceiptHandle(receiptHandle: string): string {
    return unwrapReceiptHandle(receiptHandle).nativeHandle
  }

  private async resolveReceivedMessage(message: ReceivedMessage): Promise<ReceivedMessage> {
    const isMarked = Object.hasOwn(message.attributes, CLIENT_VERSION_ATTRIBUTE)
    if (!isMarked && !isReferenceMessage(message.body)) {
      return message
    }

    const reference = parseReferenceMessage(message.body)
    const payload = await this.blobStore.get(reference.s3_bucket, reference.s3_key)
    if (payload === null) {
      throw new StoreIOError({
        message: `Offloaded payload ${reference.s3_key} was not found in bucket ${reference.s3_bucket}`,
        details: { bucket: reference.s3_bucket, key: reference.s3_key },
      })
    }

    const offloadedMessage = deserializePayload(payload)

    return {
      ...message,
      body: offloadedMessage.body,
      attributes: offloadedMessage.attributes,
      bodyDigest: reference.md5_digest_msg_body,
      attributeDigest: reference.md5_digest_msg_attr || undefined,
      receiptHandle: wrapReceiptHandle(message.receiptHandle, reference.s3_bucket, reference.s3_key),
    }
  }
}
