/**
 * Per-source webhook parsers.
 *
 * Each entry validates one *Arr payload shape and maps it onto MediaEvent.
 */

import {
  RadarrImportPayloadSchema,
  ReadarrImportPayloadSchema,
  SonarrImportPayloadSchema,
} from '@root/schemas/webhooks/arr-payload.schema.js'
import type { ArrSource, MediaEvent } from '@root/types/media-event.types.js'
import type { ZodError } from 'zod'
import { normalizeYear, pickImageUrl, yearFromDate } from './images.js'

export type ParseOutcome =
  | { success: true; events: MediaEvent[] }
  | { success: false; issues: string }

export interface SourceParser {
  importEventTypes: ReadonlySet<string>
  parse: (payload: unknown, receivedAt: string) => ParseOutcome
}

export function formatIssues(error: ZodError): string {
  return error.issues
    .map(
      (issue) =>
        `${issue.path.map(String).join('.') || '(root)'}: ${issue.message}`,
    )
    .join('; ')
}

const sonarrParser: SourceParser = {
  importEventTypes: new Set(['Download', 'EpisodeImport']),
  parse(payload, receivedAt) {
    const result = SonarrImportPayloadSchema.safeParse(payload)
    if (!result.success) {
      return { success: false, issues: formatIssues(result.error) }
    }
    const { series, episodes, episodeFile, isUpgrade } = result.data

    return {
      success: true,
      events: episodes.map((episode): MediaEvent => ({
        source: 'sonarr',
        mediaKey: `sonarr:${series.id}`,
        mediaType: 'episode',
        title: series.title,
        year: normalizeYear(series.year),
        posterUrl: pickImageUrl(series.images, 'poster'),
        fanartUrl: pickImageUrl(series.images, 'fanart'),
        episode: {
          season: episode.seasonNumber,
          number: episode.episodeNumber,
          title: episode.title,
          airDate: episode.airDate ?? episode.airDateUtc,
          overview: episode.overview,
        },
        quality: episodeFile?.quality,
        tags: series.tags ?? [],
        isUpgrade: isUpgrade ?? false,
        receivedAt,
      })),
    }
  },
}

const radarrParser: SourceParser = {
  importEventTypes: new Set(['Download', 'MovieFileImport']),
  parse(payload, receivedAt) {
    const result = RadarrImportPayloadSchema.safeParse(payload)
    if (!result.success) {
      return { success: false, issues: formatIssues(result.error) }
    }
    const { movie, movieFile, isUpgrade } = result.data

    return {
      success: true,
      events: [
        {
          source: 'radarr',
          mediaKey: `radarr:${movie.id}`,
          mediaType: 'movie',
          title: movie.title,
          year: normalizeYear(movie.year),
          posterUrl: pickImageUrl(movie.images, 'poster'),
          fanartUrl: pickImageUrl(movie.images, 'fanart'),
          quality: movieFile?.quality,
          tags: movie.tags ?? [],
          isUpgrade: isUpgrade ?? false,
          receivedAt,
        },
      ],
    }
  },
}

const readarrParser: SourceParser = {
  importEventTypes: new Set(['Download', 'BookFileImport']),
  parse(payload, receivedAt) {
    const result = ReadarrImportPayloadSchema.safeParse(payload)
    if (!result.success) {
      return { success: false, issues: formatIssues(result.error) }
    }
    const { author, book, bookFiles, isUpgrade } = result.data

    return {
      success: true,
      events: [
        {
          source: 'readarr',
          mediaKey: `readarr:${book.id}`,
          mediaType: 'book',
          title: book.title,
          year: yearFromDate(book.releaseDate),
          author: author.name,
          posterUrl: pickImageUrl(book.images, 'poster'),
          quality: bookFiles?.[0]?.quality,
          tags: author.tags ?? [],
          isUpgrade: isUpgrade ?? false,
          receivedAt,
        },
      ],
    }
  },
}

export const SOURCE_PARSERS: Record<ArrSource, SourceParser> = {
  sonarr: sonarrParser,
  radarr: radarrParser,
  readarr: readarrParser,
}
