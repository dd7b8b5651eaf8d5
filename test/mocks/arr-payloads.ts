import type {
  RadarrImportPayloadSchema,
  ReadarrImportPayloadSchema,
  SonarrImportPayloadSchema,
} from '@root/schemas/webhooks/arr-payload.schema.js'
import type { z } from 'zod'

type SonarrPayload = z.input<typeof SonarrImportPayloadSchema>
type SonarrEpisode = SonarrPayload['episodes'][number]
type RadarrPayload = z.input<typeof RadarrImportPayloadSchema>
type ReadarrPayload = z.input<typeof ReadarrImportPayloadSchema>

/**
 * Sonarr "Download" webhook for series 42 with the given episodes
 */
export function sonarrPayload(
  episodes: SonarrEpisode[] = [
    {
      seasonNumber: 1,
      episodeNumber: 1,
      title: 'Pilot',
      overview: 'The first one.',
      airDate: '2021-03-01',
    },
  ],
  overrides: Partial<SonarrPayload> = {},
): SonarrPayload {
  return {
    eventType: 'Download',
    isUpgrade: false,
    series: {
      id: 42,
      title: 'Show 42',
      year: 2021,
      tags: ['1 - alice', 'kids'],
      images: [
        {
          coverType: 'poster',
          url: '/MediaCover/42/poster.jpg',
          remoteUrl: 'https://images.example.test/show-42/poster.jpg',
        },
        {
          coverType: 'fanart',
          url: 'https://images.example.test/show-42/fanart.jpg',
        },
      ],
    },
    episodes,
    episodeFile: { quality: 'WEBDL-1080p' },
    ...overrides,
  }
}

export function radarrPayload(
  overrides: Partial<RadarrPayload> = {},
): RadarrPayload {
  return {
    eventType: 'Download',
    isUpgrade: true,
    movie: {
      id: 7,
      title: 'Movie Seven',
      year: 2019,
      tags: ['bob'],
      images: [{ coverType: 'poster', url: '/MediaCover/7/poster.jpg' }],
    },
    movieFile: { quality: 'Bluray-2160p' },
    ...overrides,
  }
}

export function readarrPayload(
  overrides: Partial<ReadarrPayload> = {},
): ReadarrPayload {
  return {
    eventType: 'Download',
    author: { id: 3, name: 'Jane Writer', tags: ['alice'] },
    book: {
      id: 31,
      title: 'A Long Story',
      releaseDate: '2018-06-15T00:00:00Z',
      images: [
        {
          coverType: 'poster',
          remoteUrl: 'https://images.example.test/book-31/cover.jpg',
        },
      ],
    },
    bookFiles: [{ quality: 'EPUB' }],
    ...overrides,
  }
}
