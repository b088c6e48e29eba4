import {
  CLIENT_VERSION,
  CLIENT_VERSION_ATTRIBUTE,
  FakeBlobStore,
  MessageTooLargeError,
  parseReferenceMessage,
  StoreIOError,
} from '@claim-check/core'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { HeftySqsClient } from '../../lib/sqs/HeftySqsClient.ts'
import { FakeSqs, TEST_QUEUE_URL_PREFIX } from '../fakes/FakeSqs.ts'

const QUEUE_URL = `${TEST_QUEUE_URL_PREFIX}/test-queue`
const TEST_BUCKET = 'test-bucket'
const OPTIONS = {
  bucket: TEST_BUCKET,
  region: 'eu-west-1',
  inlineLimit: 32,
  maxLimit: 64,
}

const LARGE_BODY = 'x'.repeat(40)
const LARGE_BODY_DIGEST = '2e5a5df30ebd8539445ba6e0f638b6f9'
const ATTRIBUTES = { k: { dataType: 'String', stringValue: 'v' } }
const ATTRIBUTES_DIGEST = '0a77b0642718c3d9dd47090567d11e0d'

describe('HeftySqsClient', () => {
  let sqs: FakeSqs
  let blobStore: FakeBlobStore
  let client: HeftySqsClient

  beforeEach(() => {
    sqs = new FakeSqs([QUEUE_URL])
    blobStore = new FakeBlobStore([TEST_BUCKET])
    client = new HeftySqsClient({ sqs, blobStore }, OPTIONS)
  })

  describe('init', () => {
    it('resolves when bucket exists', async () => {
      await expect(client.init()).resolves.toBeUndefined()
    })

    it('throws when bucket does not exist', async () => {
      const clientWithoutBucket = new HeftySqsClient(
        { sqs, blobStore: new FakeBlobStore() },
        OPTIONS,
      )

      await expect(clientWithoutBucket.init()).rejects.toThrow(StoreIOError)
    })
  })

  describe('sendHeftyMessage', () => {
    it('sends small messages inline', async () => {
      const result = await client.sendHeftyMessage(QUEUE_URL, { body: 'hello', attributes: {} })

      expect(result.bodyDigest).toBe('5d41402abc4b2a76b9719d911017c592')
      expect(sqs.getMessages(QUEUE_URL)[0]?.Body).toBe('hello')
      expect(blobStore.listKeys(TEST_BUCKET)).toEqual([])
    })

    it('offloads large messages and reports original digests', async () => {
      const result = await client.sendHeftyMessage(QUEUE_URL, {
        body: LARGE_BODY,
        attributes: ATTRIBUTES,
      })

      expect(result).toEqual({
        messageId: 'message-1',
        sequenceNumber: undefined,
        bodyDigest: LARGE_BODY_DIGEST,
        attributeDigest: ATTRIBUTES_DIGEST,
      })

      const [queued] = sqs.getMessages(QUEUE_URL)
      const reference = parseReferenceMessage(queued?.Body ?? '')
      expect(reference).toMatchObject({
        s3_region: 'eu-west-1',
        s3_bucket: TEST_BUCKET,
        md5_digest_msg_body: LARGE_BODY_DIGEST,
        md5_digest_msg_attr: ATTRIBUTES_DIGEST,
      })
      expect(reference.s3_key).toMatch(/^test-queue\/[0-9a-f-]{36}$/)
      expect(queued?.MessageAttributes).toEqual({
        [CLIENT_VERSION_ATTRIBUTE]: { DataType: 'String', StringValue: CLIENT_VERSION },
      })
      expect(blobStore.listKeys(TEST_BUCKET)).toEqual([reference.s3_key])
    })

    it('passes FIFO options to SQS', async () => {
      const sendSpy = vi.spyOn(sqs, 'sendMessage')

      await client.sendHeftyMessage(
        QUEUE_URL,
        { body: LARGE_BODY, attributes: {} },
        { messageGroupId: 'group-1', messageDeduplicationId: 'dedup-1' },
      )

      expect(sendSpy).toHaveBeenCalledWith(
        expect.objectContaining({
          MessageGroupId: 'group-1',
          MessageDeduplicationId: 'dedup-1',
        }),
      )
    })

    it('rejects messages over the maximum size', async () => {
      await expect(
        client.sendHeftyMessage(QUEUE_URL, { body: 'x'.repeat(65), attributes: {} }),
      ).rejects.toThrow(MessageTooLargeError)

      expect(sqs.getMessages(QUEUE_URL)).toEqual([])
      expect(blobStore.listKeys(TEST_BUCKET)).toEqual([])
    })
  })

  describe('receiveHeftyMessages', () => {
    it('returns inline messages as they are', async () => {
      await client.sendHeftyMessage(QUEUE_URL, { body: 'hello', attributes: ATTRIBUTES })

      const [message] = await client.receiveHeftyMessages(QUEUE_URL, { attributeNames: ['k'] })

      expect(message).toMatchObject({
        receiptHandle: 'rh-1',
        body: 'hello',
        attributes: ATTRIBUTES,
      })
    })

    it('restores offloaded messages', async () => {
      await client.sendHeftyMessage(QUEUE_URL, { body: LARGE_BODY, attributes: ATTRIBUTES })
      const [key] = blobStore.listKeys(TEST_BUCKET)

      const messages = await client.receiveHeftyMessages(QUEUE_URL, { attributeNames: ['k'] })

      expect(messages).toEqual([
        {
          messageId: 'message-1',
          receiptHandle: Buffer.from(`hefty-message|rh-1|${TEST_BUCKET}|${key}`).toString('base64'),
          body: LARGE_BODY,
          attributes: ATTRIBUTES,
          bodyDigest: LARGE_BODY_DIGEST,
          attributeDigest: ATTRIBUTES_DIGEST,
          systemAttributes: { ApproximateReceiveCount: '1' },
        },
      ])
    })
  })

  describe('deleteHeftyMessage', () => {
    it('deletes offloaded payload and queue message', async () => {
      await client.sendHeftyMessage(QUEUE_URL, { body: LARGE_BODY, attributes: {} })
      const [message] = await client.receiveHeftyMessages(QUEUE_URL)

      await client.deleteHeftyMessage(QUEUE_URL, message?.receiptHandle ?? '')

      expect(blobStore.listKeys(TEST_BUCKET)).toEqual([])
      expect(sqs.getMessages(QUEUE_URL)).toEqual([])
    })

    it('deletes inline messages by native handle', async () => {
      await client.sendHeftyMessage(QUEUE_URL, { body: 'hello', attributes: {} })

      await client.deleteHeftyMessage(QUEUE_URL, 'rh-1')

      expect(sqs.getMessages(QUEUE_URL)).toEqual([])
    })
  })

  describe('forwarded operations', () => {
    it('unwraps receipt handle when changing visibility', async () => {
      await client.sendHeftyMessage(QUEUE_URL, { body: LARGE_BODY, attributes: {} })
      const [message] = await client.receiveHeftyMessages(QUEUE_URL)

      await client.changeMessageVisibility({
        QueueUrl: QUEUE_URL,
        ReceiptHandle: message?.receiptHandle,
        VisibilityTimeout: 60,
      })

      expect(sqs.visibilityChanges).toEqual([
        { QueueUrl: QUEUE_URL, ReceiptHandle: 'rh-1', VisibilityTimeout: 60 },
      ])
    })

    it('sends batches without offloading', async () => {
      const result = await client.sendMessageBatch({
        QueueUrl: QUEUE_URL,
        Entries: [{ Id: '1', MessageBody: LARGE_BODY }],
      })

      expect(result.Successful).toEqual([
        { Id: '1', MessageId: 'message-1', MD5OfMessageBody: LARGE_BODY_DIGEST },
      ])
      expect(sqs.getMessages(QUEUE_URL)[0]?.Body).toBe(LARGE_BODY)
      expect(blobStore.listKeys(TEST_BUCKET)).toEqual([])
    })

    it('forwards queue lookups', async () => {
      await expect(client.getQueueUrl({ QueueName: 'test-queue' })).resolves.toMatchObject({
        QueueUrl: QUEUE_URL,
      })
      await expect(
        client.getQueueAttributes({ QueueUrl: QUEUE_URL, AttributeNames: ['All'] }),
      ).resolves.toMatchObject({
        Attributes: { ApproximateNumberOfMessages: '0' },
      })
    })
  })
})
