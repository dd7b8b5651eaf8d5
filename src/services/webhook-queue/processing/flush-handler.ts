/**
 * Flush Handler
 *
 * Finalizes a batch whose debounce window elapsed and fans it out to the
 * notification and scan consumers.
 */

import type { EpisodeDetails } from '@root/types/media-event.types.js'
import type { NotificationRecord } from '@root/types/notification.types.js'
import type { ScanRequest } from '@root/types/scan.types.js'
import type {
  BatchAggregate,
  PendingBatch,
  PendingBatchQueue,
} from '@root/types/webhook.types.js'
import type { FastifyBaseLogger } from 'fastify'
import { clearFlushTimeout } from '../batching/timeout-manager.js'

export interface FlushConsumers {
  notify: (aggregate: BatchAggregate) => Promise<NotificationRecord>
  scan: (aggregate: BatchAggregate) => Promise<ScanRequest | null>
}

export interface FlushDeps {
  logger: FastifyBaseLogger
  queue: PendingBatchQueue
  consumers: FlushConsumers
}

export interface FlushOutcome {
  aggregate: BatchAggregate
  notification: NotificationRecord | null
  scan: ScanRequest | null
}

export function compareEpisodes(a: EpisodeDetails, b: EpisodeDetails): number {
  return a.season - b.season || a.number - b.number
}

/**
 * Snapshot a batch into the immutable view handed to consumers
 */
export function buildAggregate(batch: PendingBatch): BatchAggregate {
  const episodes = batch.episodes
    .map((episode) => ({ ...episode }))
    .sort(compareEpisodes)

  return {
    kind: episodes.length > 1 ? 'batch' : 'single',
    mediaKey: batch.mediaKey,
    source: batch.source,
    mediaType: batch.mediaType,
    title: batch.title,
    year: batch.year,
    author: batch.author,
    posterUrl: batch.posterUrl,
    fanartUrl: batch.fanartUrl,
    tags: [...batch.tags],
    quality: batch.quality,
    isUpgrade: batch.isUpgrade,
    episodes,
    episodeCount: episodes.length,
    eventCount: batch.eventCount,
    firstSeenAt: batch.firstSeenAt.toISOString(),
    lastSeenAt: batch.lastSeenAt.toISOString(),
  }
}

/**
 * Run both consumers on the same aggregate. Neither can cancel or fail
 * the other.
 */
export async function dispatchAggregate(
  aggregate: BatchAggregate,
  deps: Pick<FlushDeps, 'logger' | 'consumers'>,
): Promise<FlushOutcome> {
  const { logger, consumers } = deps

  const [notifyResult, scanResult] = await Promise.allSettled([
    consumers.notify(aggregate),
    consumers.scan(aggregate),
  ])

  if (notifyResult.status === 'rejected') {
    logger.error(
      { error: notifyResult.reason, mediaKey: aggregate.mediaKey },
      'Notification consumer failed for flushed batch',
    )
  }
  if (scanResult.status === 'rejected') {
    logger.error(
      { error: scanResult.reason, mediaKey: aggregate.mediaKey },
      'Scan consumer failed for flushed batch',
    )
  }

  return {
    aggregate,
    notification:
      notifyResult.status === 'fulfilled' ? notifyResult.value : null,
    scan: scanResult.status === 'fulfilled' ? scanResult.value : null,
  }
}

/**
 * Flush the batch if the firing timer still owns it.
 *
 * Returns null for a stale timer: the batch was rescheduled, already
 * flushed, or replaced by a newer batch for the same key.
 */
export async function flushBatch(
  batch: PendingBatch,
  generation: number,
  deps: FlushDeps,
): Promise<FlushOutcome | null> {
  const { logger, queue } = deps
  const current = queue.get(batch.mediaKey)

  if (current !== batch || batch.generation !== generation) {
    logger.debug(
      {
        mediaKey: batch.mediaKey,
        timerGeneration: generation,
        currentGeneration: current?.generation ?? null,
      },
      'Stale flush timer fired, ignoring',
    )
    return null
  }

  // Remove first so an event arriving during dispatch starts a new batch
  clearFlushTimeout(batch)
  queue.delete(batch.mediaKey)

  const aggregate = buildAggregate(batch)
  logger.info(
    {
      mediaKey: aggregate.mediaKey,
      title: aggregate.title,
      kind: aggregate.kind,
      episodeCount: aggregate.episodeCount,
      eventCount: aggregate.eventCount,
    },
    'Flushing pending batch',
  )

  return dispatchAggregate(aggregate, deps)
}
