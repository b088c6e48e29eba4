import type {
  ChangeMessageVisibilityCommandInput,
  ChangeMessageVisibilityCommandOutput,
  GetQueueAttributesCommandInput,
  GetQueueAttributesCommandOutput,
  GetQueueUrlCommandInput,
  GetQueueUrlCommandOutput,
  SendMessageBatchCommandInput,
  SendMessageBatchCommandOutput,
} from '@aws-sdk/client-sqs'
import {
  type BlobStore,
  type Logger,
  OffloadOrchestrator,
  type OffloadingOptions,
  type QueueMessage,
  type ReceivedMessage,
  type ReceiveMessagesRequest,
  type SendMessageResult,
} from '@claim-check/core'

import { type SqsMessageOperations, SqsQueueClient, type SqsSendOptions } from './SqsQueueClient.ts'

/**
 * Every SQS operation the client uses, offloaded or forwarded. An `SQS` client from
 * `@aws-sdk/client-sqs` satisfies it.
 */
export type SqsClientOperations = SqsMessageOperations & {
  sendMessageBatch(input: SendMessageBatchCommandInput): Promise<SendMessageBatchCommandOutput>
  changeMessageVisibility(
    input: ChangeMessageVisibilityCommandInput,
  ): Promise<ChangeMessageVisibilityCommandOutput>
  getQueueUrl(input: GetQueueUrlCommandInput): Promise<GetQueueUrlCommandOutput>
  getQueueAttributes(input: GetQueueAttributesCommandInput): Promise<GetQueueAttributesCommandOutput>
}

export type HeftySqsClientDependencies = {
  sqs: SqsClientOperations
  blobStore: BlobStore
  logger?: Logger
}

/**
 * SQS client that moves messages too large for a queue into the blob store.
 * Batch sends are not offloaded and are forwarded as they are.
 */
export class HeftySqsClient {
  private readonly sqs: SqsClientOperations
  private readonly orchestrator: OffloadOrchestrator<SqsSendOptions>

  constructor(dependencies: HeftySqsClientDependencies, options: OffloadingOptions) {
    this.sqs = dependencies.sqs
    this.orchestrator = new OffloadOrchestrator<SqsSendOptions>(
      {
        queueClient: new SqsQueueClient({ sqs: dependencies.sqs }),
        blobStore: dependencies.blobStore,
        logger: dependencies.logger,
      },
      options,
    )
  }

  init(): Promise<void> {
    return this.orchestrator.init()
  }

  sendHeftyMessage(
    queueUrl: string,
    message: QueueMessage,
    options?: SqsSendOptions,
  ): Promise<SendMessageResult> {
    return this.orchestrator.sendMessage(queueUrl, message, options)
  }

  receiveHeftyMessages(
    queueUrl: string,
    request?: ReceiveMessagesRequest,
  ): Promise<ReceivedMessage[]> {
    return this.orchestrator.receiveMessages(queueUrl, request)
  }

  deleteHeftyMessage(queueUrl: string, receiptHandle: string): Promise<void> {
    return this.orchestrator.deleteMessage(queueUrl, receiptHandle)
  }

  sendMessageBatch(input: SendMessageBatchCommandInput): Promise<SendMessageBatchCommandOutput> {
    return this.sqs.sendMessageBatch(input)
  }

  /**
   * Accepts handles returned by `receiveHeftyMessages` as well as native ones.
   */
  changeMessageVisibility(
    input: ChangeMessageVisibilityCommandInput,
  ): Promise<ChangeMessageVisibilityCommandOutput> {
    return this.sqs.changeMessageVisibility({
      ...input,
      ReceiptHandle:
        input.ReceiptHandle === undefined
          ? undefined
          : this.orchestrator.resolveNativeReceiptHandle(input.ReceiptHandle),
    })
  }

  getQueueUrl(input: GetQueueUrlCommandInput): Promise<GetQueueUrlCommandOutput> {
    return this.sqs.getQueueUrl(input)
  }

  getQueueAttributes(input: GetQueueAttributesCommandInput): Promise<GetQueueAttributesCommandOutput> {
    return this.sqs.getQueueAttributes(input)
  }
}
