import type { MessageAttributes, QueueMessage } from './messageTypes.ts'

export type SendMessageResult = {
  messageId?: string
  sequenceNumber?: string
  bodyDigest?: string
  attributeDigest?: string
}

export interface MessageSender<SendOptions extends object = object> {
  send(destination: string, message: QueueMessage, options?: SendOptions): Promise<SendMessageResult>
}

export type ReceiveMessagesRequest = {
  maxNumberOfMessages?: number
  waitTimeSeconds?: number
  visibilityTimeout?: number
  /** Message attribute names to return, `All` returns every attribute */
  attributeNames?: string[]
}

export type ReceivedMessage = {
  messageId?: string
  receiptHandle: string
  body: string
  attributes: MessageAttributes
  bodyDigest?: string
  attributeDigest?: string
  systemAttributes?: Record<string, string>
}

export interface QueueClient<SendOptions extends object = object> extends MessageSender<SendOptions> {
  receive(source: string, request: ReceiveMessagesRequest): Promise<ReceivedMessage[]>
  delete(source: string, receiptHandle: string): Promise<void>
}

/**
 * Blob storage used for offloaded payloads. `container` is a bucket, `key` an object key.
 */
export interface BlobStore {
  put(container: string, key: string, payload: Uint8Array): Promise<void>

  /** Returns `null` when the object does not exist. */
  get(container: string, key: string): Promise<Uint8Array | null>

  delete(container: string, key: string): Promise<void>

  /** Checks the object when `key` is given, otherwise the container itself. */
  exists(container: string, key?: string): Promise<boolean>
}
