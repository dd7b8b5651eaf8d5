import { z } from 'zod'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'

export const ArrSourceSchema = z.enum(['sonarr', 'radarr', 'readarr'])

export const WebhookParamsSchema = z.object({
  source: ArrSourceSchema,
})

// Payload shape is checked by the normalizer so malformed bodies are
// acknowledged instead of rejected
export const WebhookBodySchema = z.unknown()

export const WebhookResponseSchema = z.object({
  success: z.boolean(),
})

export type WebhookParams = z.infer<typeof WebhookParamsSchema>
export type WebhookResponse = z.infer<typeof WebhookResponseSchema>

export { ErrorSchema }
