import type {
  GetTopicAttributesCommandInput,
  GetTopicAttributesCommandOutput,
  PublishBatchCommandInput,
  PublishBatchCommandOutput,
} from '@aws-sdk/client-sns'
import {
  type BlobStore,
  type Logger,
  OffloadingSender,
  type OffloadingOptions,
  PUB_SUB_ENVELOPE,
  type QueueMessage,
  type SendMessageResult,
} from '@claim-check/core'

import { type SnsPublishOperations, type SnsPublishOptions, SnsTopicClient } from './SnsTopicClient.ts'

/**
 * Every SNS operation the client uses, offloaded or forwarded. An `SNS` client from
 * `@aws-sdk/client-sns` satisfies it.
 */
export type SnsClientOperations = SnsPublishOperations & {
  publishBatch(input: PublishBatchCommandInput): Promise<PublishBatchCommandOutput>
  getTopicAttributes(input: GetTopicAttributesCommandInput): Promise<GetTopicAttributesCommandOutput>
}

export type HeftySnsClientDependencies = {
  sns: SnsClientOperations
  blobStore: BlobStore
  logger?: Logger
}

/**
 * SNS publisher that moves messages too large for a topic into the blob store.
 * Stored payload bodies are wrapped as `{"Message":<body>}`, the shape subscribers
 * read from SNS notifications.
 */
export class HeftySnsClient {
  private readonly sns: SnsClientOperations
  private readonly sender: OffloadingSender<SnsPublishOptions>

  constructor(dependencies: HeftySnsClientDependencies, options: OffloadingOptions) {
    this.sns = dependencies.sns
    this.sender = new OffloadingSender<SnsPublishOptions>(
      {
        sender: new SnsTopicClient({ sns: dependencies.sns }),
        blobStore: dependencies.blobStore,
        logger: dependencies.logger,
      },
      { ...options, envelope: PUB_SUB_ENVELOPE },
    )
  }

  init(): Promise<void> {
    return this.sender.init()
  }

  publishHeftyMessage(
    topicArn: string,
    message: QueueMessage,
    options?: SnsPublishOptions,
  ): Promise<SendMessageResult> {
    return this.sender.sendMessage(topicArn, message, options)
  }

  publishBatch(input: PublishBatchCommandInput): Promise<PublishBatchCommandOutput> {
    return this.sns.publishBatch(input)
  }

  getTopicAttributes(input: GetTopicAttributesCommandInput): Promise<GetTopicAttributesCommandOutput> {
    return this.sns.getTopicAttributes(input)
  }
}
