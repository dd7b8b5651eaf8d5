import type {
  ArrSource,
  EpisodeDetails,
  MediaType,
} from '@root/types/media-event.types.js'

export interface PendingBatch {
  mediaKey: string
  source: ArrSource
  mediaType: MediaType
  title: string
  year?: number
  author?: string
  posterUrl?: string
  fanartUrl?: string
  tags: string[]
  quality?: string
  /** True only while every event in the batch is an upgrade */
  isUpgrade: boolean
  /** Arrival order, unique by season/number */
  episodes: EpisodeDetails[]
  eventCount: number
  firstSeenAt: Date
  lastSeenAt: Date
  /** Bumped on every reschedule; a firing timer must still match it */
  generation: number
  timeoutId?: NodeJS.Timeout
}

export type PendingBatchQueue = Map<string, PendingBatch>

/**
 * Immutable view of a batch handed to the flush consumers.
 */
export interface BatchAggregate {
  kind: 'single' | 'batch'
  mediaKey: string
  source: ArrSource
  mediaType: MediaType
  title: string
  year?: number
  author?: string
  posterUrl?: string
  fanartUrl?: string
  tags: string[]
  quality?: string
  isUpgrade: boolean
  /** Sorted by season, then episode number */
  episodes: EpisodeDetails[]
  episodeCount: number
  eventCount: number
  firstSeenAt: string
  lastSeenAt: string
}

export interface PendingBatchSummary {
  mediaKey: string
  source: ArrSource
  title: string
  episodeCount: number
  eventCount: number
  firstSeenAt: string
  lastSeenAt: string
}
