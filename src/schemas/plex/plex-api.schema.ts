import { z } from 'zod'

/**
 * Response shapes of the Plex Media Server endpoints used for scanning.
 * Only the fields the service reads are declared.
 */
export const PlexSectionsResponseSchema = z.object({
  MediaContainer: z.object({
    size: z.number().optional(),
    Directory: z
      .array(
        z.object({
          key: z.union([z.string(), z.number()]).transform(String),
          title: z.string(),
          type: z.string(),
        }),
      )
      .default([]),
  }),
})

export const PlexActivitiesResponseSchema = z.object({
  MediaContainer: z.object({
    size: z.number().optional(),
    Activity: z
      .array(
        z.object({
          uuid: z.string(),
          type: z.string(),
          title: z.string(),
          subtitle: z.string().optional(),
          progress: z.number().optional(),
          cancellable: z.boolean().optional(),
        }),
      )
      .default([]),
  }),
})

export const PlexIdentityResponseSchema = z.object({
  MediaContainer: z.object({
    machineIdentifier: z.string(),
    version: z.string(),
  }),
})
