/**
 * Library Operations Module
 *
 * Thin wrappers over the Plex Media Server endpoints used for library
 * scanning and status. Unlike lookups elsewhere these throw on failure:
 * callers record the error on the scan request.
 */

import {
  PlexActivitiesResponseSchema,
  PlexIdentityResponseSchema,
  PlexSectionsResponseSchema,
} from '@root/schemas/plex/plex-api.schema.js'
import type {
  PlexActivity,
  PlexConnection,
  PlexIdentity,
  PlexLibrary,
} from '@root/types/plex-server.types.js'
import { PLEX_CLIENT_IDENTIFIER, USER_AGENT } from '@utils/version.js'
import type { FastifyBaseLogger } from 'fastify'

const PLEX_API_TIMEOUT = 30000 // 30 seconds

export class PlexApiError extends Error {
  constructor(
    message: string,
    readonly status?: number,
  ) {
    super(message)
    this.name = 'PlexApiError'
  }
}

async function plexRequest(
  path: string,
  connection: PlexConnection,
  method: 'GET' | 'PUT' = 'GET',
): Promise<Response> {
  const url = new URL(path, connection.serverUrl)

  let response: Response
  try {
    response = await fetch(url.toString(), {
      method,
      headers: {
        Accept: 'application/json',
        'User-Agent': USER_AGENT,
        'X-Plex-Token': connection.token,
        'X-Plex-Client-Identifier': PLEX_CLIENT_IDENTIFIER,
      },
      signal: AbortSignal.timeout(PLEX_API_TIMEOUT),
    })
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error)
    throw new PlexApiError(`Plex request ${method} ${path} failed: ${reason}`)
  }

  if (!response.ok) {
    throw new PlexApiError(
      `Plex request ${method} ${path} failed: ${response.status} ${response.statusText}`,
      response.status,
    )
  }
  return response
}

/**
 * Lists the library sections of the server
 */
export async function fetchLibraries(
  connection: PlexConnection,
  log: FastifyBaseLogger,
): Promise<PlexLibrary[]> {
  const response = await plexRequest('/library/sections', connection)
  const data = PlexSectionsResponseSchema.parse(await response.json())
  const libraries = data.MediaContainer.Directory.map(
    ({ key, title, type }) => ({ key, title, type }),
  )
  log.debug({ count: libraries.length }, 'Fetched Plex library sections')
  return libraries
}

/**
 * Asks Plex to scan one library section for new files.
 * Plex answers immediately; the scan itself runs on the server.
 */
export async function refreshSection(
  sectionKey: string,
  connection: PlexConnection,
  log: FastifyBaseLogger,
): Promise<void> {
  await plexRequest(
    `/library/sections/${encodeURIComponent(sectionKey)}/refresh`,
    connection,
  )
  log.debug({ sectionKey }, 'Plex section refresh requested')
}

/**
 * Refreshes a single metadata item (show, season, movie, album)
 */
export async function refreshItem(
  itemKey: string,
  connection: PlexConnection,
  log: FastifyBaseLogger,
): Promise<void> {
  await plexRequest(
    `/library/metadata/${encodeURIComponent(itemKey)}/refresh`,
    connection,
    'PUT',
  )
  log.debug({ itemKey }, 'Plex item refresh requested')
}

export async function fetchActivities(
  connection: PlexConnection,
): Promise<PlexActivity[]> {
  const response = await plexRequest('/activities', connection)
  const data = PlexActivitiesResponseSchema.parse(await response.json())
  return data.MediaContainer.Activity
}

export async function fetchIdentity(
  connection: PlexConnection,
): Promise<PlexIdentity> {
  const response = await plexRequest('/identity', connection)
  const data = PlexIdentityResponseSchema.parse(await response.json())
  return {
    machineIdentifier: data.MediaContainer.machineIdentifier,
    version: data.MediaContainer.version,
  }
}
