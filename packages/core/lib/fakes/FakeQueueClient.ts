import { randomUUID } from 'node:crypto'

import { QueueIOError } from '../errors/claimCheckErrors.ts'
import type {
  QueueClient,
  ReceiveMessagesRequest,
  ReceivedMessage,
  SendMessageResult,
} from '../types/collaboratorTypes.ts'
import type { MessageAttributes, QueueMessage } from '../types/messageTypes.ts'
import { calculateAttributeDigest, calculateBodyDigest } from '../utils/digestUtils.ts'

type StoredMessage = {
  messageId: string
  receiptHandle: string
  message: QueueMessage
}

/**
 * In-memory queue reporting digests the way SQS does. Received messages only carry the
 * attributes that were asked for.
 */
export class FakeQueueClient implements QueueClient {
  private readonly queues = new Map<string, StoredMessage[]>()

  send(destination: string, message: QueueMessage): Promise<SendMessageResult> {
    const messageId = randomUUID()
    const queue = this.queues.get(destination) ?? []
    queue.push({ messageId, receiptHandle: randomUUID(), message })
    this.queues.set(destination, queue)

    return Promise.resolve({
      messageId,
      bodyDigest: calculateBodyDigest(message.body),
      attributeDigest: calculateAttributeDigest(message.attributes) || undefined,
    })
  }

  receive(source: string, request: ReceiveMessagesRequest): Promise<ReceivedMessage[]> {
    const queue = this.queues.get(source) ?? []
    const batch = queue.slice(0, request.maxNumberOfMessages ?? 1)

    return Promise.resolve(
      batch.map((stored) => {
        const attributes = filterAttributes(stored.message.attributes, request.attributeNames)
        return {
          messageId: stored.messageId,
          receiptHandle: stored.receiptHandle,
          body: stored.message.body,
          attributes,
          bodyDigest: calculateBodyDigest(stored.message.body),
          attributeDigest: calculateAttributeDigest(attributes) || undefined,
        }
      }),
    )
  }

  delete(source: string, receiptHandle: string): Promise<void> {
    const queue = this.queues.get(source) ?? []
    const index = queue.findIndex((stored) => stored.receiptHandle === receiptHandle)
    if (index === -1) {
      return Promise.reject(
        new QueueIOError({
          message: `Receipt handle ${receiptHandle} is not valid for ${source}`,
          details: { source, receiptHandle },
        }),
      )
    }
    queue.splice(index, 1)
    return Promise.resolve()
  }

  getMessages(source: string): QueueMessage[] {
    return (this.queues.get(source) ?? []).map((stored) => stored.message)
  }
}

function filterAttributes(
  attributes: MessageAttributes,
  attributeNames: string[] = [],
): MessageAttributes {
  if (attributeNames.includes('All')) {
    return { ...attributes }
  }
  return Object.fromEntries(
    Object.entries(attributes).filter(([name]) => attributeNames.includes(name)),
  )
}
