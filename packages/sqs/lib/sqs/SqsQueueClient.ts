import type {
  DeleteMessageCommandInput,
  Message,
  ReceiveMessageCommandInput,
  ReceiveMessageCommandOutput,
  SendMessageCommandInput,
  SendMessageCommandOutput,
} from '@aws-sdk/client-sqs'
import {
  type QueueClient,
  QueueIOError,
  type QueueMessage,
  type ReceivedMessage,
  type ReceiveMessagesRequest,
  type SendMessageResult,
} from '@claim-check/core'

import {
  fromSqsMessageAttributes,
  toSqsMessageAttributes,
  toSystemAttributes,
} from '../utils/messageAttributeUtils.ts'

/**
 * The SQS operations needed to send, receive and delete. An `SQS` client from
 * `@aws-sdk/client-sqs` satisfies it.
 */
export type SqsMessageOperations = {
  sendMessage(input: SendMessageCommandInput): Promise<SendMessageCommandOutput>
  receiveMessage(input: ReceiveMessageCommandInput): Promise<ReceiveMessageCommandOutput>
  deleteMessage(input: DeleteMessageCommandInput): Promise<unknown>
}

export type SqsSendOptions = {
  /** Required for FIFO queues */
  messageGroupId?: string
  messageDeduplicationId?: string
  delaySeconds?: number
}

export type SqsQueueClientDependencies = {
  sqs: SqsMessageOperations
}

export class SqsQueueClient implements QueueClient<SqsSendOptions> {
  private readonly sqs: SqsMessageOperations

  constructor({ sqs }: SqsQueueClientDependencies) {
    this.sqs = sqs
  }

  async send(
    queueUrl: string,
    message: QueueMessage,
    options: SqsSendOptions = {},
  ): Promise<SendMessageResult> {
    let result: SendMessageCommandOutput
    try {
      result = await this.sqs.sendMessage({
        QueueUrl: queueUrl,
        MessageBody: message.body,
        MessageAttributes: toSqsMessageAttributes(message.attributes),
        MessageGroupId: options.messageGroupId,
        MessageDeduplicationId: options.messageDeduplicationId,
        DelaySeconds: options.delaySeconds,
      })
    } catch (err) {
      throw new QueueIOError({
        message: `Unable to send message to ${queueUrl}`,
        details: { queueUrl },
        cause: err,
      })
    }

    return {
      messageId: result.MessageId,
      sequenceNumber: result.SequenceNumber,
      bodyDigest: result.MD5OfMessageBody,
      attributeDigest: result.MD5OfMessageAttributes,
    }
  }

  async receive(queueUrl: string, request: ReceiveMessagesRequest): Promise<ReceivedMessage[]> {
    let result: ReceiveMessageCommandOutput
    try {
      result = await this.sqs.receiveMessage({
        QueueUrl: queueUrl,
        MaxNumberOfMessages: request.maxNumberOfMessages,
        WaitTimeSeconds: request.waitTimeSeconds,
        VisibilityTimeout: request.visibilityTimeout,
        MessageAttributeNames: request.attributeNames,
        MessageSystemAttributeNames: ['All'],
      })
    } catch (err) {
      throw new QueueIOError({
        message: `Unable to receive messages from ${queueUrl}`,
        details: { queueUrl },
        cause: err,
      })
    }

    return (result.Messages ?? []).map(toReceivedMessage)
  }

  async delete(queueUrl: string, receiptHandle: string): Promise<void> {
    try {
      await this.sqs.deleteMessage({ QueueUrl: queueUrl, ReceiptHandle: receiptHandle })
    } catch (err) {
      throw new QueueIOError({
        message: `Unable to delete message from ${queueUrl}`,
        details: { queueUrl },
        cause: err,
      })
    }
  }
}

function toReceivedMessage(message: Message): ReceivedMessage {
  return {
    messageId: message.MessageId,
    receiptHandle: message.ReceiptHandle ?? '',
    body: message.Body ?? '',
    attributes: fromSqsMessageAttributes(message.MessageAttributes),
    bodyDigest: message.MD5OfBody,
    attributeDigest: message.MD5OfMessageAttributes,
    systemAttributes: toSystemAttributes(message.Attributes),
  }
}
