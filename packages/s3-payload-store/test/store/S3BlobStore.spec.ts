import { StoreIOError } from '@claim-check/core'
import { beforeEach, describe, expect, it, vi } from 'vitest'

import { S3BlobStore } from '../../lib/S3BlobStore.ts'
import { FakeS3 } from '../fakes/FakeS3.ts'

const TEST_BUCKET = 'test-bucket'
const PAYLOAD = new Uint8Array([1, 2, 3, 4])

describe('S3BlobStore', () => {
  let s3: FakeS3
  let store: S3BlobStore

  beforeEach(() => {
    s3 = new FakeS3([TEST_BUCKET])
    store = new S3BlobStore({ s3 })
  })

  describe('put', () => {
    it('stores the payload under the given key', async () => {
      const putSpy = vi.spyOn(s3, 'putObject')

      await store.put(TEST_BUCKET, 'test-queue/1', PAYLOAD)

      expect(s3.listKeys(TEST_BUCKET)).toEqual(['test-queue/1'])
      expect(putSpy).toHaveBeenCalledWith({
        Bucket: TEST_BUCKET,
        Key: 'test-queue/1',
        Body: PAYLOAD,
        ContentLength: 4,
      })
    })

    it('wraps s3 failures', async () => {
      await expect(store.put('non-existing-bucket', 'key', PAYLOAD)).rejects.toThrow(StoreIOError)
    })
  })

  describe('get', () => {
    it('retrieves previously stored payload', async () => {
      await store.put(TEST_BUCKET, 'test-queue/1', PAYLOAD)

      await expect(store.get(TEST_BUCKET, 'test-queue/1')).resolves.toEqual(PAYLOAD)
    })

    it('returns null if payload cannot be found', async () => {
      await expect(store.get(TEST_BUCKET, 'non-existing-key')).resolves.toBeNull()
    })

    it('returns null when s3 returns no body', async () => {
      vi.spyOn(s3, 'getObject').mockResolvedValueOnce({})

      await expect(store.get(TEST_BUCKET, 'test-queue/1')).resolves.toBeNull()
    })

    it('throws, if other than not-found error occurs', async () => {
      const result = store.get('non-existing-bucket', 'key')

      await expect(result).rejects.toThrow(StoreIOError)
      await expect(result).rejects.toMatchObject({
        details: { bucket: 'non-existing-bucket', key: 'key' },
      })
    })
  })

  describe('delete', () => {
    it('deletes previously stored payload', async () => {
      await store.put(TEST_BUCKET, 'test-queue/1', PAYLOAD)

      await store.delete(TEST_BUCKET, 'test-queue/1')

      expect(s3.listKeys(TEST_BUCKET)).toEqual([])
    })

    it('wraps s3 failures', async () => {
      await expect(store.delete('non-existing-bucket', 'key')).rejects.toThrow(StoreIOError)
    })
  })

  describe('exists', () => {
    it('checks buckets', async () => {
      await expect(store.exists(TEST_BUCKET)).resolves.toBe(true)
      await expect(store.exists('non-existing-bucket')).resolves.toBe(false)
    })

    it('checks objects', async () => {
      await store.put(TEST_BUCKET, 'test-queue/1', PAYLOAD)

      await expect(store.exists(TEST_BUCKET, 'test-queue/1')).resolves.toBe(true)
      await expect(store.exists(TEST_BUCKET, 'test-queue/2')).resolves.toBe(false)
    })

    it('wraps unexpected failures', async () => {
      vi.spyOn(s3, 'headBucket').mockRejectedValueOnce(new Error('Access Denied'))

      await expect(store.exists(TEST_BUCKET)).rejects.toThrow(StoreIOError)
    })
  })
})
