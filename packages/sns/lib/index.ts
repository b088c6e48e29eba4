export {
  type SnsPublishOperations,
  type SnsPublishOptions,
  SnsTopicClient,
  type SnsTopicClientDependencies,
} from './sns/SnsTopicClient.ts'
export {
  HeftySnsClient,
  type HeftySnsClientDependencies,
  type SnsClientOperations,
} from './sns/HeftySnsClient.ts'
export { toSnsMessageAttributes } from './utils/messageAttributeUtils.ts'
