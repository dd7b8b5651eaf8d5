/**
 * Plex Server Service
 *
 * Talks to the configured Plex Media Server: lists libraries, triggers
 * section and item scans, and reads server activities and identity.
 * Connection details are read from config on every call so a changed
 * URL or token takes effect without a restart.
 */

import {
  fetchActivities,
  fetchIdentity,
  fetchLibraries,
  refreshItem,
  refreshSection,
} from '@services/plex-server/library/index.js'
import type {
  PlexActivity,
  PlexConnection,
  PlexIdentity,
  PlexLibrary,
} from '@root/types/plex-server.types.js'
import type { LibraryScanResult } from '@root/types/scan.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'

/**
 * The library-scan collaborator the scan coordinator depends on
 */
export interface LibraryScanner {
  listLibraries(): Promise<PlexLibrary[]>
  /** null scans every library */
  scanLibrary(libraryName: string | null): Promise<void>
  /** Scans every library, reporting each section separately */
  scanEachLibrary(): Promise<LibraryScanResult[]>
  scanItem(itemKey: string): Promise<void>
}

/**
 * Error text naming the libraries that failed, or null when all succeeded
 */
export function describeScanFailures(
  results: LibraryScanResult[],
): string | null {
  const failed = results.filter((result) => !result.success)
  if (failed.length === 0) return null
  return `Failed to scan ${failed.length} of ${results.length} libraries: ${failed
    .map((result) => result.library)
    .join(', ')}`
}

export class PlexServerService implements LibraryScanner {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'PLEX_SERVER')
  }

  get isConfigured(): boolean {
    const { plexServerUrl, plexToken } = this.fastify.config
    return Boolean(plexServerUrl && plexToken)
  }

  private get connection(): PlexConnection {
    const { plexServerUrl, plexToken } = this.fastify.config
    if (!plexServerUrl || !plexToken) {
      throw new Error('Plex server is not configured')
    }
    return { serverUrl: plexServerUrl, token: plexToken }
  }

  async listLibraries(): Promise<PlexLibrary[]> {
    return fetchLibraries(this.connection, this.log)
  }

  /**
   * Finds a section by title, exact match first, then case-insensitive
   */
  async findLibrary(libraryName: string): Promise<PlexLibrary | undefined> {
    const libraries = await this.listLibraries()
    const lowered = libraryName.toLowerCase()
    return (
      libraries.find((library) => library.title === libraryName) ??
      libraries.find((library) => library.title.toLowerCase() === lowered)
    )
  }

  /**
   * Scan one library by title, or every library when `libraryName` is null.
   * Scanning all libraries tries each section and throws once at the end
   * naming the ones that failed.
   */
  async scanLibrary(libraryName: string | null): Promise<void> {
    const connection = this.connection

    if (libraryName !== null) {
      const library = await this.findLibrary(libraryName)
      if (!library) {
        throw new Error(`Plex library "${libraryName}" not found`)
      }
      await refreshSection(library.key, connection, this.log)
      this.log.info({ library: library.title }, 'Plex library scan started')
      return
    }

    const failure = describeScanFailures(await this.scanEachLibrary())
    if (failure) {
      throw new Error(failure)
    }
  }

  /**
   * Requests a scan of every section, one at a time, and reports each
   * outcome instead of stopping at the first failure.
   */
  async scanEachLibrary(): Promise<LibraryScanResult[]> {
    const connection = this.connection
    const libraries = await fetchLibraries(connection, this.log)
    const results: LibraryScanResult[] = []

    for (const library of libraries) {
      try {
        await refreshSection(library.key, connection, this.log)
        results.push({
          library: library.title,
          success: true,
          message: 'Scan started',
        })
      } catch (error) {
        const message = error instanceof Error ? error.message : String(error)
        this.log.warn(
          { library: library.title, error },
          'Failed to start Plex library scan',
        )
        results.push({ library: library.title, success: false, message })
      }
    }

    this.log.info(
      {
        total: results.length,
        failed: results.filter((result) => !result.success).length,
      },
      'Requested scan of all Plex libraries',
    )
    return results
  }

  async scanItem(itemKey: string): Promise<void> {
    await refreshItem(itemKey, this.connection, this.log)
    this.log.info({ itemKey }, 'Plex item refresh started')
  }

  async getActivities(): Promise<PlexActivity[]> {
    return fetchActivities(this.connection)
  }

  async getIdentity(): Promise<PlexIdentity> {
    return fetchIdentity(this.connection)
  }
}
