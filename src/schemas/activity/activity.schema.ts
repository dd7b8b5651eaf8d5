import { z } from 'zod'
import { ArrSourceSchema } from '@root/schemas/webhooks/webhook.schema.js'

const MediaTypeSchema = z.enum(['episode', 'movie', 'book'])

export const EpisodeSchema = z.object({
  season: z.number(),
  number: z.number(),
  title: z.string().optional(),
  airDate: z.string().optional(),
  overview: z.string().optional(),
})

export const NotificationRecordSchema = z.object({
  id: z.string(),
  source: ArrSourceSchema,
  mediaKey: z.string(),
  mediaType: MediaTypeSchema,
  title: z.string(),
  year: z.number().optional(),
  posterUrl: z.string().optional(),
  fanartUrl: z.string().optional(),
  quality: z.string().optional(),
  isUpgrade: z.boolean(),
  episodeCount: z.number(),
  episodes: z.array(EpisodeSchema),
  channelId: z.string().nullable(),
  delivered: z.boolean(),
  error: z.string().optional(),
  mentionedUserIds: z.array(z.string()),
  timestamp: z.string(),
})

const HoursSchema = z.coerce.number().int().positive().max(24 * 7).default(24)

export const NotificationsQuerySchema = z.object({
  hours: HoursSchema,
  userId: z.string().regex(/^\d+$/).optional(),
})

export const NotificationsResponseSchema = z.object({
  notifications: z.array(NotificationRecordSchema),
})

export const UserNotificationsQuerySchema = z.object({
  hours: HoursSchema,
})

export const UserNotificationsResponseSchema = z.object({
  users: z.array(
    z.object({
      discordUserId: z.string(),
      plexUsernames: z.array(z.string()),
      notificationCount: z.number(),
      lastNotificationAt: z.string(),
    }),
  ),
})

export const ScanStatusSchema = z.enum(['pending', 'completed', 'failed'])

export const ScanRequestSchema = z.object({
  scanId: z.string(),
  libraryName: z.string().nullable(),
  itemKey: z.string().nullable(),
  status: ScanStatusSchema,
  trigger: z.enum(['webhook', 'manual']),
  mediaTitles: z.array(z.string()),
  message: z.string().optional(),
  timestamp: z.string(),
  completedAt: z.string().nullable(),
})

export const ScansQuerySchema = z.object({
  status: ScanStatusSchema.optional(),
})

export const ScansResponseSchema = z.object({
  scans: z.array(ScanRequestSchema),
})

export const PlexLibrarySchema = z.object({
  key: z.string(),
  title: z.string(),
  type: z.string(),
})

export const StatusResponseSchema = z.object({
  plexConnected: z.boolean(),
  plexVersion: z.string().nullable(),
  discordConnected: z.boolean(),
  libraries: z.array(PlexLibrarySchema),
  lastCheckedAt: z.string().nullable(),
  pendingBatches: z.number(),
  pendingScans: z.number(),
  debounceSeconds: z.number(),
})

export const QueueResponseSchema = z.object({
  batches: z.array(
    z.object({
      mediaKey: z.string(),
      source: ArrSourceSchema,
      title: z.string(),
      episodeCount: z.number(),
      eventCount: z.number(),
      firstSeenAt: z.string(),
      lastSeenAt: z.string(),
    }),
  ),
})

export type NotificationsQuery = z.infer<typeof NotificationsQuerySchema>
export type NotificationsResponse = z.infer<typeof NotificationsResponseSchema>
export type UserNotificationsResponse = z.infer<
  typeof UserNotificationsResponseSchema
>
export type ScansQuery = z.infer<typeof ScansQuerySchema>
export type ScansResponse = z.infer<typeof ScansResponseSchema>
export type StatusResponse = z.infer<typeof StatusResponseSchema>
export type QueueResponse = z.infer<typeof QueueResponseSchema>
