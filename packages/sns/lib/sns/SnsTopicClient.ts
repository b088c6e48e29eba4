import type { PublishCommandInput, PublishCommandOutput } from '@aws-sdk/client-sns'
import {
  type MessageSender,
  QueueIOError,
  type QueueMessage,
  type SendMessageResult,
} from '@claim-check/core'

import { toSnsMessageAttributes } from '../utils/messageAttributeUtils.ts'

/**
 * An `SNS` client from `@aws-sdk/client-sns` satisfies it.
 */
export type SnsPublishOperations = {
  publish(input: PublishCommandInput): Promise<PublishCommandOutput>
}

export type SnsPublishOptions = {
  subject?: string
  /** Required for FIFO topics */
  messageGroupId?: string
  messageDeduplicationId?: string
}

export type SnsTopicClientDependencies = {
  sns: SnsPublishOperations
}

export class SnsTopicClient implements MessageSender<SnsPublishOptions> {
  private readonly sns: SnsPublishOperations

  constructor({ sns }: SnsTopicClientDependencies) {
    this.sns = sns
  }

  async send(
    topicArn: string,
    message: QueueMessage,
    options: SnsPublishOptions = {},
  ): Promise<SendMessageResult> {
    let result: PublishCommandOutput
    try {
      result = await this.sns.publish({
        TopicArn: topicArn,
        Message: message.body,
        MessageAttributes: toSnsMessageAttributes(message.attributes),
        Subject: options.subject,
        MessageGroupId: options.messageGroupId,
        MessageDeduplicationId: options.messageDeduplicationId,
      })
    } catch (err) {
      throw new QueueIOError({
        message: `Unable to publish message to ${topicArn}`,
        details: { topicArn },
        cause: err,
      })
    }

    return {
      messageId: result.MessageId,
      sequenceNumber: result.SequenceNumber,
    }
  }
}
