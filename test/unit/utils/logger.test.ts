import { createServiceLogger, filename, redactUrl } from '@utils/logger.js'
import { describe, expect, it } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'

describe('logger', () => {
  describe('createServiceLogger', () => {
    it('should prefix messages with the upper-cased service name', () => {
      const parent = createMockLogger()

      createServiceLogger(parent, 'scan')

      expect(parent.child).toHaveBeenCalledWith(
        {},
        { msgPrefix: '[SCAN] ' },
      )
    })
  })

  describe('redactUrl', () => {
    it('should hide Plex tokens in query strings', () => {
      expect(
        redactUrl('/library/sections?X-Plex-Token=test-token&type=1'),
      ).toBe('/library/sections?X-Plex-Token=[REDACTED]&type=1')
    })

    it('should hide api keys and tokens', () => {
      expect(redactUrl('/hook?apiKey=test-secret&token=test-token')).toBe(
        '/hook?apiKey=[REDACTED]&token=[REDACTED]',
      )
    })

    it('should leave other urls alone', () => {
      expect(redactUrl('/api/status')).toBe('/api/status')
    })
  })

  describe('filename', () => {
    it('should name the active file', () => {
      expect(filename(null)).toBe('arrbridge-current.log')
    })

    it('should date rotated files and add the index', () => {
      const time = new Date(2024, 4, 1, 12)

      expect(filename(time)).toBe('arrbridge-2024-05-01.log')
      expect(filename(time.getTime(), 2)).toBe('arrbridge-2024-05-01-2.log')
    })
  })
})
