/**
 * Webhook Queue Service
 *
 * Orchestrates normalization, debounced batching and flushing of
 * Sonarr/Radarr/Readarr import webhooks.
 */

import type {
  ArrSource,
  MediaEvent,
  NormalizeResult,
} from '@root/types/media-event.types.js'
import type {
  PendingBatch,
  PendingBatchQueue,
  PendingBatchSummary,
} from '@root/types/webhook.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  clearAllTimeouts,
  clearFlushTimeout,
  type EventQueueDeps,
  type IngestOutcome,
  ingestEvent,
  type QueueManagerDeps,
  summarizeQueue,
  type TimeoutManagerDeps,
} from './webhook-queue/batching/index.js'
import { normalizeWebhook } from './webhook-queue/normalization/index.js'
import {
  buildAggregate,
  dispatchAggregate,
  type FlushDeps,
  type FlushOutcome,
  flushBatch,
} from './webhook-queue/processing/index.js'

export interface WebhookQueueConfig {
  debounceSeconds: number
}

export class WebhookQueueService {
  private readonly log: FastifyBaseLogger
  private readonly _queue: PendingBatchQueue = new Map()
  private readonly _config: WebhookQueueConfig
  private _isRunning = true

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
    config?: Partial<WebhookQueueConfig>,
  ) {
    this.log = createServiceLogger(baseLog, 'WEBHOOK_QUEUE')
    this._config = {
      debounceSeconds: config?.debounceSeconds ?? 60,
    }
  }

  /**
   * Get the pending batch map
   */
  get queue(): PendingBatchQueue {
    return this._queue
  }

  /**
   * Get the configuration
   */
  get config(): WebhookQueueConfig {
    return this._config
  }

  get pendingCount(): number {
    return this._queue.size
  }

  private get queueManagerDeps(): QueueManagerDeps {
    return { logger: this.log }
  }

  private get timeoutManagerDeps(): TimeoutManagerDeps {
    return {
      logger: this.log,
      debounceMs: this._config.debounceSeconds * 1000,
      onTimeout: async (batch, generation) => {
        await this.flushBatch(batch, generation)
      },
    }
  }

  private get eventQueueDeps(): EventQueueDeps {
    return {
      ...this.timeoutManagerDeps,
      queue: this._queue,
    }
  }

  private get flushDeps(): FlushDeps {
    return {
      logger: this.log,
      queue: this._queue,
      consumers: {
        notify: (aggregate) =>
          this.fastify.notificationDispatcher.onFlush(aggregate),
        scan: (aggregate) => this.fastify.scanCoordinator.onFlush(aggregate),
      },
    }
  }

  /**
   * Normalize a raw webhook body and queue whatever it yields.
   * Malformed and ignored payloads are logged and dropped.
   */
  handleWebhook(payload: unknown, source: ArrSource): NormalizeResult {
    const result = normalizeWebhook(payload, source)

    switch (result.status) {
      case 'rejected':
        this.log.warn(
          {
            source,
            kind: result.error.kind,
            reason: result.error.message,
          },
          'Dropping malformed webhook payload',
        )
        break
      case 'ignored':
        this.log.debug({ source, reason: result.reason }, 'Webhook ignored')
        break
      case 'accepted':
        for (const event of result.events) {
          this.ingest(event)
        }
        break
    }

    return result
  }

  /**
   * Add an event to its media key's batch, starting or restarting the
   * debounce window.
   */
  ingest(event: MediaEvent): IngestOutcome | null {
    if (!this._isRunning) {
      this.log.warn(
        { mediaKey: event.mediaKey },
        'Webhook queue is shut down, dropping event',
      )
      return null
    }
    return ingestEvent(event, this.eventQueueDeps)
  }

  /**
   * Summaries of the batches still waiting for their window to elapse
   */
  getPendingBatches(): PendingBatchSummary[] {
    return summarizeQueue(this._queue)
  }

  private async flushBatch(
    batch: PendingBatch,
    generation: number,
  ): Promise<FlushOutcome | null> {
    return flushBatch(batch, generation, this.flushDeps)
  }

  /**
   * Flush every pending batch now, ignoring the remaining window.
   * Used on shutdown so buffered imports still get announced.
   */
  async flushAll(): Promise<FlushOutcome[]> {
    const batches = [...this._queue.values()]
    for (const batch of batches) {
      clearFlushTimeout(batch)
      this._queue.delete(batch.mediaKey)
    }

    if (batches.length > 0) {
      this.log.info(
        { count: batches.length },
        'Flushing pending batches before shutdown',
      )
    }

    return Promise.all(
      batches.map((batch) =>
        dispatchAggregate(buildAggregate(batch), this.flushDeps),
      ),
    )
  }

  /**
   * Stop accepting events, then flush what is buffered. Events arriving
   * during the flush are dropped.
   */
  async drain(): Promise<FlushOutcome[]> {
    this._isRunning = false
    return this.flushAll()
  }

  /**
   * Clear all pending timeouts on shutdown
   */
  shutdown(): void {
    this._isRunning = false
    clearAllTimeouts(this._queue, this.queueManagerDeps)
    this._queue.clear()
    this.log.debug('Webhook queue shutdown complete')
  }
}
