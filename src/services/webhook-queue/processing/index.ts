/**
 * Processing Module
 *
 * Turns elapsed batches into notification and scan work.
 */

export {
  buildAggregate,
  compareEpisodes,
  dispatchAggregate,
  type FlushConsumers,
  type FlushDeps,
  type FlushOutcome,
  flushBatch,
} from './flush-handler.js'
