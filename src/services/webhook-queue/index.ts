/**
 * Webhook Queue Module
 *
 * Re-exports from submodules for webhook queue functionality.
 */

// Batching
export {
  clearAllTimeouts,
  clearFlushTimeout,
  createBatch,
  createFlushTimeout,
  type EpisodeMergeResult,
  type EventQueueDeps,
  type IngestOutcome,
  ingestEvent,
  mergeEpisode,
  mergeEvent,
  type QueueManagerDeps,
  resetFlushTimeout,
  summarizeQueue,
  type TimeoutManagerDeps,
} from './batching/index.js'

// Normalization
export { normalizeWebhook, SOURCE_PARSERS } from './normalization/index.js'

// Processing
export {
  buildAggregate,
  compareEpisodes,
  dispatchAggregate,
  type FlushConsumers,
  type FlushDeps,
  type FlushOutcome,
  flushBatch,
} from './processing/index.js'
