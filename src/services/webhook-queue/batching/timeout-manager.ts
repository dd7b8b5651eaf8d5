/**
 * Timeout Manager
 *
 * Owns the per-batch flush timers. A timer carries the generation it was
 * created for; rescheduling bumps the generation so a timer that slips
 * through cancellation can be told apart from the current one.
 */

import type { PendingBatch } from '@root/types/webhook.types.js'
import type { FastifyBaseLogger } from 'fastify'

export interface TimeoutManagerDeps {
  logger: FastifyBaseLogger
  debounceMs: number
  onTimeout: (batch: PendingBatch, generation: number) => Promise<void>
}

/**
 * Create the flush timer for the batch's current generation
 */
export function createFlushTimeout(
  batch: PendingBatch,
  deps: TimeoutManagerDeps,
): NodeJS.Timeout {
  const { logger, debounceMs, onTimeout } = deps
  const generation = batch.generation

  return setTimeout(() => {
    logger.info(
      {
        mediaKey: batch.mediaKey,
        title: batch.title,
        waitMs: debounceMs,
        episodeCount: batch.episodes.length,
        eventCount: batch.eventCount,
      },
      'Debounce window elapsed, flushing batch',
    )
    void onTimeout(batch, generation).catch((error) => {
      logger.error(
        { error, mediaKey: batch.mediaKey },
        'Batch flush processing failed',
      )
    })
  }, debounceMs)
}

/**
 * Cancel the batch's pending flush timer, if any
 */
export function clearFlushTimeout(batch: PendingBatch): void {
  if (batch.timeoutId) {
    clearTimeout(batch.timeoutId)
    batch.timeoutId = undefined
  }
}

/**
 * Cancel the current timer and start a fresh one for a new generation
 */
export function resetFlushTimeout(
  batch: PendingBatch,
  deps: TimeoutManagerDeps,
): void {
  clearFlushTimeout(batch)
  batch.generation += 1
  batch.timeoutId = createFlushTimeout(batch, deps)
}
