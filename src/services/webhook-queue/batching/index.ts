/**
 * Batching Module
 *
 * Short-term in-memory batching of media events.
 * Coalesces bursts for one media key into a single flush.
 */

export {
  clearAllTimeouts,
  createBatch,
  type EpisodeMergeResult,
  type EventQueueDeps,
  type IngestOutcome,
  ingestEvent,
  mergeEpisode,
  mergeEvent,
  type QueueManagerDeps,
  summarizeQueue,
} from './queue-manager.js'

export {
  clearFlushTimeout,
  createFlushTimeout,
  resetFlushTimeout,
  type TimeoutManagerDeps,
} from './timeout-manager.js'
