import type {
  DeleteObjectCommandInput,
  GetObjectCommandInput,
  HeadBucketCommandInput,
  HeadObjectCommandInput,
  PutObjectCommandInput,
} from '@aws-sdk/client-s3'
import { NoSuchBucket, NoSuchKey, NotFound } from '@aws-sdk/client-s3'
import { type BlobStore, StoreIOError } from '@claim-check/core'

/**
 * The S3 operations the store relies on. An `S3` client from `@aws-sdk/client-s3` satisfies it.
 */
export type S3ObjectClient = {
  putObject(input: PutObjectCommandInput): Promise<unknown>
  getObject(
    input: GetObjectCommandInput,
  ): Promise<{ Body?: { transformToByteArray(): Promise<Uint8Array> } }>
  deleteObject(input: DeleteObjectCommandInput): Promise<unknown>
  headObject(input: HeadObjectCommandInput): Promise<unknown>
  headBucket(input: HeadBucketCommandInput): Promise<unknown>
}

export type S3BlobStoreDependencies = {
  s3: S3ObjectClient
}

function isNotFoundError(err: unknown): boolean {
  return err instanceof NoSuchKey || err instanceof NotFound || err instanceof NoSuchBucket
}

export class S3BlobStore implements BlobStore {
  private readonly s3: S3ObjectClient

  constructor({ s3 }: S3BlobStoreDependencies) {
    this.s3 = s3
  }

  async put(bucket: string, key: string, payload: Uint8Array): Promise<void> {
    try {
      await this.s3.putObject({
        Bucket: bucket,
        Key: key,
        Body: payload,
        ContentLength: payload.length,
      })
    } catch (err) {
      throw new StoreIOError({
        message: `Unable to upload offloaded payload to s3://${bucket}/${key}`,
        details: { bucket, key },
        cause: err,
      })
    }
  }

  async get(bucket: string, key: string): Promise<Uint8Array | null> {
    try {
      const result = await this.s3.getObject({ Bucket: bucket, Key: key })
      return result.Body ? await result.Body.transformToByteArray() : null
    } catch (err) {
      if (err instanceof NoSuchKey) {
        return null
      }
      throw new StoreIOError({
        message: `Unable to download offloaded payload from s3://${bucket}/${key}`,
        details: { bucket, key },
        cause: err,
      })
    }
  }

  async delete(bucket: string, key: string): Promise<void> {
    try {
      await this.s3.deleteObject({ Bucket: bucket, Key: key })
    } catch (err) {
      throw new StoreIOError({
        message: `Unable to delete offloaded payload s3://${bucket}/${key}`,
        details: { bucket, key },
        cause: err,
      })
    }
  }

  async exists(bucket: string, key?: string): Promise<boolean> {
    try {
      if (key === undefined) {
        await this.s3.headBucket({ Bucket: bucket })
      } else {
        await this.s3.headObject({ Bucket: bucket, Key: key })
      }
      return true
    } catch (err) {
      if (isNotFoundError(err)) {
        return false
      }
      throw new StoreIOError({
        message: `Unable to check s3://${bucket}${key ? `/${key}` : ''}`,
        details: { bucket, key },
        cause: err,
      })
    }
  }
}
