/**
 * Scan Target Resolver
 *
 * Decides which Plex library a flushed batch should scan.
 */

import type { Config } from '@root/types/config.types.js'
import type { MediaType } from '@root/types/media-event.types.js'
import type { PlexLibrary } from '@root/types/plex-server.types.js'
import type { FastifyBaseLogger } from 'fastify'

export type ScanTargetConfig = Pick<
  Config,
  'plexLibraryName' | 'plexShowLibrary' | 'plexMovieLibrary' | 'plexBookLibrary'
>

/** Plex section type holding each kind of media */
export const SECTION_TYPE_BY_MEDIA: Record<MediaType, string> = {
  episode: 'show',
  movie: 'movie',
  book: 'artist',
}

const LIBRARY_KEY_BY_MEDIA = {
  episode: 'plexShowLibrary',
  movie: 'plexMovieLibrary',
  book: 'plexBookLibrary',
} as const satisfies Record<MediaType, keyof ScanTargetConfig>

/**
 * Library name from config alone: the pinned library, then the one set
 * for the media type. Null when neither is set.
 */
export function resolveConfiguredLibrary(
  mediaType: MediaType,
  config: ScanTargetConfig,
): string | null {
  const pinned = config.plexLibraryName.trim()
  if (pinned) return pinned
  const perType = config[LIBRARY_KEY_BY_MEDIA[mediaType]].trim()
  return perType || null
}

/**
 * Falls back to the only Plex section of the matching type. Anything
 * else (none, several, Plex unreachable) yields null, meaning scan all.
 */
export async function resolveScanTarget(
  mediaType: MediaType,
  config: ScanTargetConfig,
  listLibraries: () => Promise<PlexLibrary[]>,
  log: FastifyBaseLogger,
): Promise<string | null> {
  const configured = resolveConfiguredLibrary(mediaType, config)
  if (configured) return configured

  const sectionType = SECTION_TYPE_BY_MEDIA[mediaType]
  try {
    const matches = (await listLibraries()).filter(
      (library) => library.type === sectionType,
    )
    if (matches.length === 1) {
      return matches[0].title
    }
    log.debug(
      { sectionType, matches: matches.length },
      'No single library for media type, scanning all libraries',
    )
  } catch (error) {
    log.warn(
      { error, sectionType },
      'Could not list Plex libraries to pick a scan target',
    )
  }
  return null
}
