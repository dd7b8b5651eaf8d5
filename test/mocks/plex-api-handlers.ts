import { HttpResponse, http } from 'msw'

/**
 * Default MSW handlers for the Plex Media Server endpoints the bridge uses.
 *
 * The fake server has three libraries: one of each section type that
 * scan targeting looks for.
 */

export const PLEX_TEST_URL = 'http://localhost:32400'

export const plexTestLibraries = [
  { key: '1', title: 'Movies', type: 'movie' },
  { key: '2', title: 'TV Shows', type: 'show' },
  { key: '3', title: 'Audiobooks', type: 'artist' },
]

export const plexSectionsHandler = http.get(
  `${PLEX_TEST_URL}/library/sections`,
  () =>
    HttpResponse.json({
      MediaContainer: {
        size: plexTestLibraries.length,
        Directory: plexTestLibraries.map((library) => ({
          ...library,
          // Plex sends extra fields the service ignores
          agent: 'tv.plex.agents.none',
          scanner: 'Plex Scanner',
        })),
      },
    }),
)

export const plexSectionRefreshHandler = http.get(
  `${PLEX_TEST_URL}/library/sections/:key/refresh`,
  () => new HttpResponse(null, { status: 200 }),
)

export const plexItemRefreshHandler = http.put(
  `${PLEX_TEST_URL}/library/metadata/:key/refresh`,
  () => new HttpResponse(null, { status: 200 }),
)

export const plexActivitiesHandler = http.get(
  `${PLEX_TEST_URL}/activities`,
  () =>
    HttpResponse.json({
      MediaContainer: {
        size: 1,
        Activity: [
          {
            uuid: 'activity-1',
            type: 'library.update.section',
            title: 'Scanning TV Shows',
            subtitle: 'Show 42',
            progress: 50,
            cancellable: true,
          },
        ],
      },
    }),
)

export const plexIdentityHandler = http.get(`${PLEX_TEST_URL}/identity`, () =>
  HttpResponse.json({
    MediaContainer: {
      size: 0,
      machineIdentifier: 'test-machine-id',
      version: '1.40.0.0000',
    },
  }),
)

export const plexApiHandlers = [
  plexSectionsHandler,
  plexSectionRefreshHandler,
  plexItemRefreshHandler,
  plexActivitiesHandler,
  plexIdentityHandler,
]
