import type { MessageAttributeValue as SnsMessageAttributeValue } from '@aws-sdk/client-sns'
import type { MessageAttributes } from '@claim-check/core'

export function toSnsMessageAttributes(
  attributes: MessageAttributes,
): Record<string, SnsMessageAttributeValue> | undefined {
  const entries = Object.entries(attributes)
  if (entries.length === 0) {
    return undefined
  }

  return Object.fromEntries(
    entries.map(([name, value]) => [
      name,
      {
        DataType: value.dataType,
        StringValue: value.stringValue,
        BinaryValue: value.binaryValue,
      },
    ]),
  )
}
