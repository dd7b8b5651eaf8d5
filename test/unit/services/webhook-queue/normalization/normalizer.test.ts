import { normalizeWebhook } from '@services/webhook-queue/normalization/normalizer.js'
import { describe, expect, it } from 'vitest'
import {
  radarrPayload,
  readarrPayload,
  sonarrPayload,
} from '../../../../mocks/arr-payloads.js'

const receivedAt = new Date('2024-05-01T12:00:00.000Z')

describe('normalizeWebhook', () => {
  describe('sonarr', () => {
    it('should produce one event per imported episode', () => {
      const result = normalizeWebhook(sonarrPayload(), 'sonarr', receivedAt)

      expect(result).toEqual({
        status: 'accepted',
        events: [
          {
            source: 'sonarr',
            mediaKey: 'sonarr:42',
            mediaType: 'episode',
            title: 'Show 42',
            year: 2021,
            posterUrl: 'https://images.example.test/show-42/poster.jpg',
            fanartUrl: 'https://images.example.test/show-42/fanart.jpg',
            episode: {
              season: 1,
              number: 1,
              title: 'Pilot',
              airDate: '2021-03-01',
              overview: 'The first one.',
            },
            quality: 'WEBDL-1080p',
            tags: ['1 - alice', 'kids'],
            isUpgrade: false,
            receivedAt: '2024-05-01T12:00:00.000Z',
          },
        ],
      })
    })

    it('should split a multi-episode import into separate events', () => {
      const result = normalizeWebhook(
        sonarrPayload([
          { seasonNumber: 2, episodeNumber: 3 },
          { seasonNumber: 2, episodeNumber: 4 },
        ]),
        'sonarr',
        receivedAt,
      )

      expect(result.status).toBe('accepted')
      if (result.status !== 'accepted') return
      expect(result.events.map((event) => event.episode)).toEqual([
        {
          season: 2,
          number: 3,
          title: undefined,
          airDate: undefined,
          overview: undefined,
        },
        {
          season: 2,
          number: 4,
          title: undefined,
          airDate: undefined,
          overview: undefined,
        },
      ])
      expect(new Set(result.events.map((event) => event.mediaKey))).toEqual(
        new Set(['sonarr:42']),
      )
    })

    it('should accept specials in season 0', () => {
      const result = normalizeWebhook(
        sonarrPayload([{ seasonNumber: 0, episodeNumber: 1 }]),
        'sonarr',
        receivedAt,
      )

      expect(result.status).toBe('accepted')
    })

    it('should convert numeric tag ids to strings', () => {
      const payload = sonarrPayload()
      const result = normalizeWebhook(
        { ...payload, series: { ...payload.series, tags: [3, 'kids'] } },
        'sonarr',
        receivedAt,
      )

      expect(result.status).toBe('accepted')
      if (result.status !== 'accepted') return
      expect(result.events[0]?.tags).toEqual(['3', 'kids'])
    })

    it('should reject a payload without a series title', () => {
      const payload = sonarrPayload()
      const result = normalizeWebhook(
        { ...payload, series: { ...payload.series, title: '  ' } },
        'sonarr',
        receivedAt,
      )

      expect(result.status).toBe('rejected')
      if (result.status !== 'rejected') return
      expect(result.error.kind).toBe('MalformedPayload')
      expect(result.error.source).toBe('sonarr')
      expect(result.error.message).toContain('series.title')
    })

    it('should reject an import with no episodes', () => {
      const result = normalizeWebhook(sonarrPayload([]), 'sonarr', receivedAt)

      expect(result.status).toBe('rejected')
      if (result.status !== 'rejected') return
      expect(result.error.message).toContain('episodes')
    })
  })

  describe('radarr', () => {
    it('should normalize a movie import', () => {
      const result = normalizeWebhook(radarrPayload(), 'radarr', receivedAt)

      expect(result.status).toBe('accepted')
      if (result.status !== 'accepted') return
      expect(result.events).toHaveLength(1)
      expect(result.events[0]).toMatchObject({
        source: 'radarr',
        mediaKey: 'radarr:7',
        mediaType: 'movie',
        title: 'Movie Seven',
        year: 2019,
        quality: 'Bluray-2160p',
        tags: ['bob'],
        isUpgrade: true,
      })
    })

    it('should drop local MediaCover paths', () => {
      const result = normalizeWebhook(radarrPayload(), 'radarr', receivedAt)

      if (result.status !== 'accepted') {
        throw new Error(`expected accepted, got ${result.status}`)
      }
      expect(result.events[0]?.posterUrl).toBeUndefined()
    })

    it('should treat year 0 as unknown', () => {
      const payload = radarrPayload()
      const result = normalizeWebhook(
        { ...payload, movie: { ...payload.movie, year: 0 } },
        'radarr',
        receivedAt,
      )

      if (result.status !== 'accepted') {
        throw new Error(`expected accepted, got ${result.status}`)
      }
      expect(result.events[0]?.year).toBeUndefined()
    })
  })

  describe('readarr', () => {
    it('should normalize a book import', () => {
      const result = normalizeWebhook(readarrPayload(), 'readarr', receivedAt)

      expect(result.status).toBe('accepted')
      if (result.status !== 'accepted') return
      expect(result.events[0]).toMatchObject({
        source: 'readarr',
        mediaKey: 'readarr:31',
        mediaType: 'book',
        title: 'A Long Story',
        year: 2018,
        author: 'Jane Writer',
        posterUrl: 'https://images.example.test/book-31/cover.jpg',
        quality: 'EPUB',
        tags: ['alice'],
        isUpgrade: false,
      })
    })
  })

  describe('envelope', () => {
    it('should ignore test events', () => {
      expect(
        normalizeWebhook({ eventType: 'Test' }, 'radarr', receivedAt),
      ).toEqual({ status: 'ignored', reason: 'Test event' })
    })

    it('should ignore events other than imports', () => {
      expect(
        normalizeWebhook(
          sonarrPayload(undefined, { eventType: 'Grab' }),
          'sonarr',
          receivedAt,
        ),
      ).toEqual({ status: 'ignored', reason: 'Unsupported event type: Grab' })
    })

    it('should ignore an import event type belonging to another source', () => {
      expect(
        normalizeWebhook(
          radarrPayload({ eventType: 'EpisodeImport' }),
          'radarr',
          receivedAt,
        ),
      ).toEqual({
        status: 'ignored',
        reason: 'Unsupported event type: EpisodeImport',
      })
    })

    it('should reject a body without an event type', () => {
      expect(normalizeWebhook({}, 'readarr', receivedAt)).toEqual({
        status: 'rejected',
        error: {
          kind: 'MalformedPayload',
          source: 'readarr',
          message: expect.stringMatching(/^eventType: /),
        },
      })
    })

    it('should reject a body that is not an object', () => {
      const result = normalizeWebhook('not json', 'sonarr', receivedAt)

      expect(result.status).toBe('rejected')
      if (result.status !== 'rejected') return
      expect(result.error.message).toMatch(/^\(root\): /)
    })
  })
})
