/**
 * Normalization Module
 *
 * Per-source parsing of *Arr webhook bodies into MediaEvents.
 */

export { normalizeYear, pickImageUrl, yearFromDate } from './images.js'
export { normalizeWebhook } from './normalizer.js'
export {
  formatIssues,
  type ParseOutcome,
  SOURCE_PARSERS,
  type SourceParser,
} from './source-parsers.js'
