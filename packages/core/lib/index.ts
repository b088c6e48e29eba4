export {
  type ClaimCheckError,
  type CommonErrorParams,
  InvalidDestinationIdentifierError,
  isClaimCheckError,
  MalformedErrorMessageError,
  MalformedPayloadError,
  MalformedReceiptHandleError,
  MalformedReferenceMessageError,
  MessageTooLargeError,
  QueueIOError,
  StoreIOError,
  UnsupportedAttributeTypeError,
} from './errors/claimCheckErrors.ts'

export type {
  AttributeValueKind,
  MessageAttributeValue,
  MessageAttributes,
  QueueMessage,
} from './types/messageTypes.ts'
export type {
  BlobStore,
  MessageSender,
  QueueClient,
  ReceiveMessagesRequest,
  ReceivedMessage,
  SendMessageResult,
} from './types/collaboratorTypes.ts'
export type { LogFn, Logger } from './types/loggerTypes.ts'

export {
  calculateMessageSize,
  classifyMessageSize,
  DEFAULT_INLINE_LIMIT_BYTES,
  DEFAULT_MAX_LIMIT_BYTES,
  resolveAttributeValueKind,
  type SizeClassification,
  type SizeLimits,
} from './utils/messageSizeUtils.ts'
export {
  calculateAttributeDigest,
  calculateBodyDigest,
  calculateDigest,
} from './utils/digestUtils.ts'
export { encodeAttributeRecords } from './utils/attributeRecordUtils.ts'

export {
  deserializePayload,
  PAYLOAD_FORMAT_VERSION,
  type SerializedPayload,
  serializePayload,
} from './payload-store/payloadCodec.ts'

export {
  DIRECT_ENVELOPE,
  isReferenceMessage,
  PUB_SUB_ENVELOPE,
  parseReferenceMessage,
  REFERENCE_MESSAGE_IDENTIFIER,
  REFERENCE_MESSAGE_SCHEMA,
  type ReferenceMessage,
  ReferenceMessageCodec,
  type ReferenceMessageParams,
  type TransportEnvelope,
  toReferenceMessageJson,
} from './messages/referenceMessage.ts'
export {
  type UnwrappedReceiptHandle,
  unwrapReceiptHandle,
  wrapReceiptHandle,
} from './messages/receiptHandle.ts'
export {
  buildErrorMessage,
  ERROR_MESSAGE_IDENTIFIER,
  ERROR_MESSAGE_SCHEMA,
  type ErrorMessage,
  isErrorMessage,
  parseErrorMessage,
  toErrorMessageJson,
} from './messages/errorMessage.ts'

export {
  OFFLOADING_OPTIONS_SCHEMA,
  type OffloadingOptions,
  type ResolvedOffloadingOptions,
  resolveOffloadingConfig,
  resolveOffloadingOptions,
} from './config/offloadingConfig.ts'

export {
  CLIENT_VERSION,
  CLIENT_VERSION_ATTRIBUTE,
  OffloadingSender,
  type OffloadingSenderDependencies,
  type OffloadingSenderOptions,
} from './queues/OffloadingSender.ts'
export {
  OffloadOrchestrator,
  type OffloadOrchestratorDependencies,
} from './queues/OffloadOrchestrator.ts'

export { FakeBlobStore } from './fakes/FakeBlobStore.ts'
export { FakeQueueClient } from './fakes/FakeQueueClient.ts'
