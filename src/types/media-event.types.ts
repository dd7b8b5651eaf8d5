export type ArrSource = 'sonarr' | 'radarr' | 'readarr'

export type MediaType = 'episode' | 'movie' | 'book'

export interface EpisodeDetails {
  season: number
  number: number
  title?: string
  airDate?: string
  overview?: string
}

/**
 * One notification-worthy import reported by an *Arr webhook,
 * normalized across sources.
 */
export interface MediaEvent {
  source: ArrSource
  mediaKey: string
  mediaType: MediaType
  title: string
  year?: number
  author?: string
  posterUrl?: string
  fanartUrl?: string
  episode?: EpisodeDetails
  quality?: string
  tags: string[]
  isUpgrade: boolean
  receivedAt: string
}

export type NormalizationErrorKind = 'MalformedPayload'

export interface NormalizationError {
  kind: NormalizationErrorKind
  source: ArrSource
  message: string
}

export type NormalizeResult =
  | { status: 'accepted'; events: MediaEvent[] }
  | { status: 'ignored'; reason: string }
  | { status: 'rejected'; error: NormalizationError }
