/**
 * Queue Manager
 *
 * Manages the in-memory map of pending batches, one per media key.
 */

import type { EpisodeDetails, MediaEvent } from '@root/types/media-event.types.js'
import type {
  PendingBatch,
  PendingBatchQueue,
  PendingBatchSummary,
} from '@root/types/webhook.types.js'
import type { FastifyBaseLogger } from 'fastify'
import {
  clearFlushTimeout,
  createFlushTimeout,
  resetFlushTimeout,
  type TimeoutManagerDeps,
} from './timeout-manager.js'

export interface QueueManagerDeps {
  logger: FastifyBaseLogger
}

export interface EventQueueDeps extends TimeoutManagerDeps {
  queue: PendingBatchQueue
}

export type EpisodeMergeResult = 'added' | 'updated' | 'none'

export interface IngestOutcome {
  isNewBatch: boolean
  episodeMerge: EpisodeMergeResult
  episodeCount: number
}

/**
 * Build a new batch whose display metadata comes from its first event
 */
export function createBatch(event: MediaEvent): PendingBatch {
  const receivedAt = new Date(event.receivedAt)
  return {
    mediaKey: event.mediaKey,
    source: event.source,
    mediaType: event.mediaType,
    title: event.title,
    year: event.year,
    author: event.author,
    posterUrl: event.posterUrl,
    fanartUrl: event.fanartUrl,
    tags: [...event.tags],
    quality: event.quality,
    isUpgrade: event.isUpgrade,
    episodes: event.episode ? [{ ...event.episode }] : [],
    eventCount: 1,
    firstSeenAt: receivedAt,
    lastSeenAt: receivedAt,
    generation: 0,
  }
}

/**
 * Merge an episode into the batch. A re-delivered episode fills in fields
 * it was missing instead of being appended again.
 */
export function mergeEpisode(
  batch: PendingBatch,
  episode: EpisodeDetails,
): EpisodeMergeResult {
  const existing = batch.episodes.find(
    (queued) =>
      queued.season === episode.season && queued.number === episode.number,
  )

  if (!existing) {
    batch.episodes.push({ ...episode })
    return 'added'
  }

  existing.title = episode.title ?? existing.title
  existing.overview = episode.overview ?? existing.overview
  existing.airDate = episode.airDate ?? existing.airDate
  return 'updated'
}

/**
 * Apply a later event for the same media key to its batch
 */
export function mergeEvent(
  batch: PendingBatch,
  event: MediaEvent,
): EpisodeMergeResult {
  batch.eventCount += 1
  batch.lastSeenAt = new Date(event.receivedAt)
  batch.quality = event.quality ?? batch.quality
  batch.isUpgrade &&= event.isUpgrade
  batch.year ??= event.year
  batch.posterUrl ??= event.posterUrl
  batch.fanartUrl ??= event.fanartUrl

  for (const tag of event.tags) {
    if (!batch.tags.includes(tag)) {
      batch.tags.push(tag)
    }
  }

  return event.episode ? mergeEpisode(batch, event.episode) : 'none'
}

/**
 * Accept an event into the queue.
 *
 * Creates the batch and its timer on first sight of a media key, otherwise
 * merges and restarts the debounce window. Runs synchronously, so the
 * merge and the reschedule cannot interleave with another event.
 */
export function ingestEvent(
  event: MediaEvent,
  deps: EventQueueDeps,
): IngestOutcome {
  const { logger, queue } = deps
  const existing = queue.get(event.mediaKey)

  if (!existing) {
    const batch = createBatch(event)
    batch.timeoutId = createFlushTimeout(batch, deps)
    queue.set(event.mediaKey, batch)

    logger.debug(
      { mediaKey: event.mediaKey, title: event.title },
      'Started new pending batch',
    )
    return {
      isNewBatch: true,
      episodeMerge: event.episode ? 'added' : 'none',
      episodeCount: batch.episodes.length,
    }
  }

  const episodeMerge = mergeEvent(existing, event)
  resetFlushTimeout(existing, deps)

  logger.debug(
    {
      mediaKey: event.mediaKey,
      episodeMerge,
      episodeCount: existing.episodes.length,
      eventCount: existing.eventCount,
      generation: existing.generation,
    },
    episodeMerge === 'updated'
      ? 'Episode already queued, updated metadata'
      : 'Added event to pending batch',
  )
  return {
    isNewBatch: false,
    episodeMerge,
    episodeCount: existing.episodes.length,
  }
}

/**
 * Clear all pending timeouts in the queue
 */
export function clearAllTimeouts(
  queue: PendingBatchQueue,
  deps: QueueManagerDeps,
): void {
  const { logger } = deps

  for (const [mediaKey, batch] of queue) {
    if (batch.timeoutId) {
      clearFlushTimeout(batch)
      logger.debug({ mediaKey }, 'Cleared batch timeout')
    }
  }
}

/**
 * Dashboard view of the pending batches, oldest first
 */
export function summarizeQueue(
  queue: PendingBatchQueue,
): PendingBatchSummary[] {
  return [...queue.values()]
    .map((batch) => ({
      mediaKey: batch.mediaKey,
      source: batch.source,
      title: batch.title,
      episodeCount: batch.episodes.length,
      eventCount: batch.eventCount,
      firstSeenAt: batch.firstSeenAt.toISOString(),
      lastSeenAt: batch.lastSeenAt.toISOString(),
    }))
    .sort((a, b) => a.firstSeenAt.localeCompare(b.firstSeenAt))
}
