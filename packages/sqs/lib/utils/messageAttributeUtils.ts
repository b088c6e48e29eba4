import type { MessageAttributeValue as SqsMessageAttributeValue } from '@aws-sdk/client-sqs'
import type { MessageAttributes, MessageAttributeValue } from '@claim-check/core'

// Attribute maps are built with Object.fromEntries so that any valid SQS name,
// `__proto__` included, ends up as an own key.

export function toSqsMessageAttributes(
  attributes: MessageAttributes,
): Record<string, SqsMessageAttributeValue> | undefined {
  const entries = Object.entries(attributes)
  if (entries.length === 0) {
    return undefined
  }

  return Object.fromEntries(
    entries.map(([name, value]): [string, SqsMessageAttributeValue] => [
      name,
      {
        DataType: value.dataType,
        StringValue: value.stringValue,
        BinaryValue: value.binaryValue,
      },
    ]),
  )
}

/**
 * List values are not supported by SQS itself, so they are not carried over.
 */
export function fromSqsMessageAttributes(
  sqsAttributes: Record<string, SqsMessageAttributeValue> = {},
): MessageAttributes {
  return Object.fromEntries(
    Object.entries(sqsAttributes).map(([name, value]): [string, MessageAttributeValue] => {
      const attribute: MessageAttributeValue = { dataType: value.DataType ?? '' }
      if (value.StringValue !== undefined) {
        attribute.stringValue = value.StringValue
      }
      if (value.BinaryValue !== undefined) {
        attribute.binaryValue = value.BinaryValue
      }
      return [name, attribute]
    }),
  )
}

export function toSystemAttributes(
  attributes: Partial<Record<string, string>> = {},
): Record<string, string> | undefined {
  const systemAttributes = Object.fromEntries(
    Object.entries(attributes).filter(
      (entry): entry is [string, string] => entry[1] !== undefined,
    ),
  )
  return Object.keys(systemAttributes).length > 0 ? systemAttributes : undefined
}
