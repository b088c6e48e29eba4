export {
  type SqsMessageOperations,
  SqsQueueClient,
  type SqsQueueClientDependencies,
  type SqsSendOptions,
} from './sqs/SqsQueueClient.ts'
export {
  HeftySqsClient,
  type HeftySqsClientDependencies,
  type SqsClientOperations,
} from './sqs/HeftySqsClient.ts'
export {
  fromSqsMessageAttributes,
  toSqsMessageAttributes,
} from './utils/messageAttributeUtils.ts'
