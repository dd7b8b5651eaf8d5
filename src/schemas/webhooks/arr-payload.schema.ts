import { z } from 'zod'

const ArrImageSchema = z.object({
  coverType: z.string(),
  url: z.string().optional(),
  remoteUrl: z.string().optional(),
})

// Sonarr v4 sends tag labels, older releases send tag ids
const ArrTagsSchema = z
  .array(z.union([z.string(), z.number()]))
  .transform((arr) => arr.map((v) => String(v)))
  .optional()

const QualityFileSchema = z.object({
  quality: z.string().optional(),
})

export const ArrEnvelopeSchema = z.object({
  eventType: z.string(),
  isUpgrade: z.boolean().optional(),
})

export const SonarrEpisodeSchema = z.object({
  seasonNumber: z.number().int().nonnegative(),
  episodeNumber: z.number().int().positive(),
  title: z.string().optional(),
  overview: z.string().optional(),
  airDate: z.string().optional(),
  airDateUtc: z.string().optional(),
})

export const SonarrImportPayloadSchema = ArrEnvelopeSchema.extend({
  series: z.object({
    id: z.number().int(),
    title: z.string().trim().min(1),
    year: z.number().int().optional(),
    images: z.array(ArrImageSchema).optional(),
    tags: ArrTagsSchema,
  }),
  episodes: z.array(SonarrEpisodeSchema).min(1),
  episodeFile: QualityFileSchema.optional(),
})

export const RadarrImportPayloadSchema = ArrEnvelopeSchema.extend({
  movie: z.object({
    id: z.number().int(),
    title: z.string().trim().min(1),
    year: z.number().int().optional(),
    images: z.array(ArrImageSchema).optional(),
    tags: ArrTagsSchema,
  }),
  movieFile: QualityFileSchema.optional(),
})

export const ReadarrImportPayloadSchema = ArrEnvelopeSchema.extend({
  author: z.object({
    id: z.number().int().optional(),
    name: z.string().optional(),
    tags: ArrTagsSchema,
  }),
  book: z.object({
    id: z.number().int(),
    title: z.string().trim().min(1),
    releaseDate: z.string().optional(),
    images: z.array(ArrImageSchema).optional(),
  }),
  bookFiles: z.array(QualityFileSchema).optional(),
})

export type ArrImage = z.infer<typeof ArrImageSchema>
export type SonarrImportPayload = z.infer<typeof SonarrImportPayloadSchema>
export type RadarrImportPayload = z.infer<typeof RadarrImportPayloadSchema>
export type ReadarrImportPayload = z.infer<typeof ReadarrImportPayloadSchema>
