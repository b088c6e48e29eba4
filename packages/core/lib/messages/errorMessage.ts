import { z } from 'zod/v4'

import { MalformedErrorMessageError } from '../errors/claimCheckErrors.ts'
import {
  REFERENCE_MESSAGE_SCHEMA,
  type ReferenceMessage,
  toReferenceMessageJson,
} from './referenceMessage.ts'

export const ERROR_MESSAGE_IDENTIFIER = 'b58c8bae78504da3a2e32cceeb77d342'

const ERROR_MESSAGE_PREFIX = `{"identifier":"${ERROR_MESSAGE_IDENTIFIER}",`
// tab-indented form written by other clients of the same format
const INDENTED_ERROR_MESSAGE_PREFIX = `{\n\t"identifier": "${ERROR_MESSAGE_IDENTIFIER}",`

export const ERROR_MESSAGE_SCHEMA = z.object({
  identifier: z.literal(ERROR_MESSAGE_IDENTIFIER),
  error: z.string(),
  reference_msg: REFERENCE_MESSAGE_SCHEMA.nullable(),
})

/**
 * Failure report for paths where the caller cannot receive the error directly.
 * `reference_msg` points at the stored payload when one was written.
 */
export type ErrorMessage = z.output<typeof ERROR_MESSAGE_SCHEMA>

export function buildErrorMessage(error: unknown, reference?: ReferenceMessage): ErrorMessage {
  return {
    identifier: ERROR_MESSAGE_IDENTIFIER,
    error: error instanceof Error ? error.message : String(error),
    reference_msg: reference ?? null,
  }
}

export function toErrorMessageJson(message: ErrorMessage): string {
  const reference = message.reference_msg ? toReferenceMessageJson(message.reference_msg) : 'null'
  return `${ERROR_MESSAGE_PREFIX}"error":${JSON.stringify(message.error)},"reference_msg":${reference}}`
}

export function isErrorMessage(text: string): boolean {
  return text.startsWith(ERROR_MESSAGE_PREFIX) || text.startsWith(INDENTED_ERROR_MESSAGE_PREFIX)
}

export function parseErrorMessage(text: string): ErrorMessage {
  let parsed: unknown
  try {
    parsed = JSON.parse(text)
  } catch (err) {
    throw new MalformedErrorMessageError({
      message: 'Error message is not valid JSON',
      cause: err,
    })
  }

  const result = ERROR_MESSAGE_SCHEMA.safeParse(parsed)
  if (!result.success) {
    throw new MalformedErrorMessageError({
      message: 'Error message does not match the expected format',
      details: { issues: result.error.issues.map((issue) => issue.message) },
    })
  }
  return result.data
}
