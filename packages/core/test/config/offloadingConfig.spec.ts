import { ConfigScope } from '@lokalise/node-core'
import { describe, expect, it } from 'vitest'

import {
  resolveOffloadingConfig,
  resolveOffloadingOptions,
} from '../../lib/config/offloadingConfig.ts'

describe('offloadingConfig', () => {
  describe('resolveOffloadingOptions', () => {
    it('applies defaults', () => {
      expect(resolveOffloadingOptions({ bucket: 'test-bucket', region: 'eu-west-1' })).toEqual({
        bucket: 'test-bucket',
        region: 'eu-west-1',
        inlineLimit: 262_144,
        maxLimit: 26_214_400,
        alwaysOffload: false,
      })
    })

    it('rejects an inline limit above the max limit', () => {
      expect(() =>
        resolveOffloadingOptions({
          bucket: 'test-bucket',
          region: 'eu-west-1',
          inlineLimit: 2000,
          maxLimit: 1000,
        }),
      ).toThrow(/inlineLimit must not exceed maxLimit/)
    })

    it('rejects an empty bucket', () => {
      expect(() => resolveOffloadingOptions({ bucket: '', region: 'eu-west-1' })).toThrow()
    })
  })

  describe('resolveOffloadingConfig', () => {
    it('reads options from the environment', () => {
      const configScope = new ConfigScope({
        CLAIM_CHECK_BUCKET: 'test-bucket',
        AWS_REGION: 'eu-west-1',
        CLAIM_CHECK_INLINE_LIMIT: '1024',
        CLAIM_CHECK_MAX_LIMIT: '4096',
        CLAIM_CHECK_ALWAYS_OFFLOAD: 'true',
        CLAIM_CHECK_FAILURE_DESTINATION: 'https://sqs.eu-west-1.amazonaws.com/000000000000/errors',
      })

      expect(resolveOffloadingConfig(configScope)).toEqual({
        bucket: 'test-bucket',
        region: 'eu-west-1',
        inlineLimit: 1024,
        maxLimit: 4096,
        alwaysOffload: true,
        failureNotificationDestination: 'https://sqs.eu-west-1.amazonaws.com/000000000000/errors',
      })
    })

    it('falls back to defaults for optional variables', () => {
      const configScope = new ConfigScope({
        CLAIM_CHECK_BUCKET: 'test-bucket',
        AWS_REGION: 'eu-west-1',
      })

      expect(resolveOffloadingConfig(configScope)).toEqual({
        bucket: 'test-bucket',
        region: 'eu-west-1',
        inlineLimit: 262_144,
        maxLimit: 26_214_400,
        alwaysOffload: false,
      })
    })

    it('requires the bucket', () => {
      const configScope = new ConfigScope({ AWS_REGION: 'eu-west-1' })

      expect(() => resolveOffloadingConfig(configScope)).toThrow()
    })
  })
})
