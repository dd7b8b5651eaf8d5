/**
 * Event Normalizer
 *
 * Turns a raw *Arr webhook body into MediaEvents. Pure: no logging, no
 * state. The caller decides what to do with ignored and rejected payloads.
 */

import { ArrEnvelopeSchema } from '@root/schemas/webhooks/arr-payload.schema.js'
import type {
  ArrSource,
  NormalizeResult,
} from '@root/types/media-event.types.js'
import { formatIssues, SOURCE_PARSERS } from './source-parsers.js'

export function normalizeWebhook(
  payload: unknown,
  source: ArrSource,
  receivedAt: Date = new Date(),
): NormalizeResult {
  const envelope = ArrEnvelopeSchema.safeParse(payload)
  if (!envelope.success) {
    return {
      status: 'rejected',
      error: {
        kind: 'MalformedPayload',
        source,
        message: formatIssues(envelope.error),
      },
    }
  }

  const { eventType } = envelope.data
  if (eventType === 'Test') {
    return { status: 'ignored', reason: 'Test event' }
  }

  const parser = SOURCE_PARSERS[source]
  if (!parser.importEventTypes.has(eventType)) {
    return { status: 'ignored', reason: `Unsupported event type: ${eventType}` }
  }

  const parsed = parser.parse(payload, receivedAt.toISOString())
  if (!parsed.success) {
    return {
      status: 'rejected',
      error: { kind: 'MalformedPayload', source, message: parsed.issues },
    }
  }

  return { status: 'accepted', events: parsed.events }
}
