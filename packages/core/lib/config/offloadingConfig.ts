import { ConfigScope } from '@lokalise/node-core'
import { z } from 'zod/v4'

import { DEFAULT_INLINE_LIMIT_BYTES, DEFAULT_MAX_LIMIT_BYTES } from '../utils/messageSizeUtils.ts'

export const OFFLOADING_OPTIONS_SCHEMA = z
  .object({
    /** Bucket receiving offloaded payloads */
    bucket: z.string().min(1),
    /** Region of the bucket, recorded in reference messages */
    region: z.string().min(1),
    /** Messages up to this size in bytes are sent inline */
    inlineLimit: z.number().int().positive().default(DEFAULT_INLINE_LIMIT_BYTES),
    /** Messages above this size in bytes are rejected */
    maxLimit: z.number().int().positive().default(DEFAULT_MAX_LIMIT_BYTES),
    /** Offload every message regardless of its size */
    alwaysOffload: z.boolean().default(false),
    /** Queue or topic receiving error messages about payloads orphaned by a failed send */
    failureNotificationDestination: z.string().min(1).optional(),
  })
  .refine((options) => options.inlineLimit <= options.maxLimit, {
    message: 'inlineLimit must not exceed maxLimit',
    path: ['inlineLimit'],
  })

export type OffloadingOptions = z.input<typeof OFFLOADING_OPTIONS_SCHEMA>
export type ResolvedOffloadingOptions = z.output<typeof OFFLOADING_OPTIONS_SCHEMA>

export function resolveOffloadingOptions(options: OffloadingOptions): ResolvedOffloadingOptions {
  return OFFLOADING_OPTIONS_SCHEMA.parse(options)
}

/**
 * Reads offloading options from environment variables.
 */
export function resolveOffloadingConfig(
  configScope: ConfigScope = new ConfigScope(),
): ResolvedOffloadingOptions {
  const failureNotificationDestination = configScope.getOptional(
    'CLAIM_CHECK_FAILURE_DESTINATION',
    '',
  )

  return resolveOffloadingOptions({
    bucket: configScope.getMandatory('CLAIM_CHECK_BUCKET'),
    region: configScope.getMandatory('AWS_REGION'),
    inlineLimit: configScope.getOptionalInteger(
      'CLAIM_CHECK_INLINE_LIMIT',
      DEFAULT_INLINE_LIMIT_BYTES,
    ),
    maxLimit: configScope.getOptionalInteger('CLAIM_CHECK_MAX_LIMIT', DEFAULT_MAX_LIMIT_BYTES),
    alwaysOffload: configScope.getOptionalBoolean('CLAIM_CHECK_ALWAYS_OFFLOAD', false),
    failureNotificationDestination: failureNotificationDestination || undefined,
  })
}
