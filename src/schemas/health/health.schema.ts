import { z } from 'zod'

export const HealthCheckResponseSchema = z.object({
  status: z.enum(['healthy', 'degraded']),
  timestamp: z.string().datetime(),
  checks: z.object({
    plex: z.enum(['ok', 'failed']),
    discord: z.enum(['ok', 'failed']),
  }),
})

export type HealthCheckResponse = z.infer<typeof HealthCheckResponseSchema>
