import type { MediaEvent } from '@root/types/media-event.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'

/**
 * A Sonarr episode import for series 42, received at 2024-05-01 12:00 UTC
 */
export function createEpisodeEvent(
  season: number,
  number: number,
  overrides: Partial<MediaEvent> = {},
): MediaEvent {
  return {
    source: 'sonarr',
    mediaKey: 'sonarr:42',
    mediaType: 'episode',
    title: 'Show 42',
    year: 2021,
    episode: { season, number, title: `Episode ${number}` },
    quality: 'WEBDL-1080p',
    tags: ['1 - alice'],
    isUpgrade: false,
    receivedAt: '2024-05-01T12:00:00.000Z',
    ...overrides,
  }
}

export function createMovieEvent(overrides: Partial<MediaEvent> = {}): MediaEvent {
  return {
    source: 'radarr',
    mediaKey: 'radarr:7',
    mediaType: 'movie',
    title: 'Movie Seven',
    year: 2019,
    quality: 'Bluray-2160p',
    tags: ['bob'],
    isUpgrade: false,
    receivedAt: '2024-05-01T12:00:00.000Z',
    ...overrides,
  }
}

export function createAggregate(
  overrides: Partial<BatchAggregate> = {},
): BatchAggregate {
  return {
    kind: 'single',
    mediaKey: 'radarr:7',
    source: 'radarr',
    mediaType: 'movie',
    title: 'Movie Seven',
    year: 2019,
    tags: ['bob'],
    quality: 'Bluray-2160p',
    isUpgrade: false,
    episodes: [],
    episodeCount: 0,
    eventCount: 1,
    firstSeenAt: '2024-05-01T12:00:00.000Z',
    lastSeenAt: '2024-05-01T12:00:00.000Z',
    ...overrides,
  }
}
