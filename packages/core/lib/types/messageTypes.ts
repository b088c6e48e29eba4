export type MessageAttributeValue = {
  /** `String`, `Number` or `Binary`, optionally followed by a custom suffix such as `Number.int` */
  dataType: string
  stringValue?: string
  binaryValue?: Uint8Array
}

export type MessageAttributes = Record<string, MessageAttributeValue>

export type QueueMessage = {
  body: string
  attributes: MessageAttributes
}

export type AttributeValueKind = 'string' | 'binary'
