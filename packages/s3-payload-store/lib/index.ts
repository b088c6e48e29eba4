export { S3BlobStore, type S3BlobStoreDependencies, type S3ObjectClient } from './S3BlobStore.ts'
