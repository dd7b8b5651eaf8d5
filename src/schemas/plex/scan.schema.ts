import { z } from 'zod'
import {
  PlexLibrarySchema,
  ScanRequestSchema,
} from '@root/schemas/activity/activity.schema.js'
import { ErrorSchema } from '@root/schemas/common/error.schema.js'

export const ScanLibraryBodySchema = z.object({
  library: z.string().trim().min(1),
})

export const ScanItemBodySchema = z.object({
  itemKey: z.string().trim().regex(/^\d+$/, 'itemKey must be a Plex rating key'),
})

export const ScanResponseSchema = z.object({
  scan: ScanRequestSchema,
})

export const ScanAllResponseSchema = z.object({
  results: z.array(
    z.object({
      library: z.string(),
      success: z.boolean(),
      message: z.string().optional(),
    }),
  ),
})

export const LibrariesResponseSchema = z.object({
  libraries: z.array(PlexLibrarySchema),
})

export const ActivitiesResponseSchema = z.object({
  activities: z.array(
    z.object({
      uuid: z.string(),
      type: z.string(),
      title: z.string(),
      subtitle: z.string().optional(),
      progress: z.number().optional(),
      cancellable: z.boolean().optional(),
    }),
  ),
})

export type ScanLibraryBody = z.infer<typeof ScanLibraryBodySchema>
export type ScanItemBody = z.infer<typeof ScanItemBodySchema>
export type ScanResponse = z.infer<typeof ScanResponseSchema>
export type ScanAllResponse = z.infer<typeof ScanAllResponseSchema>
export type LibrariesResponse = z.infer<typeof LibrariesResponseSchema>
export type ActivitiesResponse = z.infer<typeof ActivitiesResponseSchema>

export { ErrorSchema }
