import type { ErrorResponse } from '@root/schemas/common/error.schema.js'
import type { ScansResponse } from '@schemas/activity/activity.schema.js'
import type {
  ActivitiesResponse,
  LibrariesResponse,
  ScanAllResponse,
  ScanResponse,
} from '@schemas/plex/scan.schema.js'
import { HttpResponse, http } from 'msw'
import { describe, expect, it } from 'vitest'
import { build } from '../../../../helpers/app.js'
import {
  PLEX_TEST_URL,
  plexTestLibraries,
} from '../../../../mocks/plex-api-handlers.js'
import { server } from '../../../../setup/msw-setup.js'

describe('Plex Routes', () => {
  describe('GET /api/plex/libraries', () => {
    it('should list the library sections', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/api/plex/libraries',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<LibrariesResponse>()).toEqual({
        libraries: plexTestLibraries,
      })
    })

    it('should answer 503 when Plex fails', async (ctx) => {
      const app = await build(ctx)
      server.use(
        http.get(
          `${PLEX_TEST_URL}/library/sections`,
          () => new HttpResponse(null, { status: 500 }),
        ),
      )

      const response = await app.inject({
        method: 'GET',
        url: '/api/plex/libraries',
      })

      expect(response.statusCode).toBe(503)
      expect(response.json<ErrorResponse>().message).toBe(
        'Unable to reach the Plex server',
      )
    })
  })

  describe('GET /api/plex/activities', () => {
    it('should list running server activities', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'GET',
        url: '/api/plex/activities',
      })

      expect(response.statusCode).toBe(200)
      const { activities } = response.json<ActivitiesResponse>()
      expect(activities.map((activity) => activity.title)).toEqual([
        'Scanning TV Shows',
      ])
    })
  })

  describe('POST /api/plex/scan', () => {
    it('should scan the library and record it', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan',
        payload: { library: 'tv shows' },
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<ScanResponse>().scan).toMatchObject({
        libraryName: 'TV Shows',
        trigger: 'manual',
        status: 'completed',
      })

      const scans = await app.inject({ method: 'GET', url: '/api/scans' })
      expect(scans.json<ScansResponse>().scans).toHaveLength(1)
    })

    it('should answer 404 for an unknown library', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan',
        payload: { library: 'Music' },
      })

      expect(response.statusCode).toBe(404)
      expect(response.json<ErrorResponse>().message).toBe(
        'Plex library "Music" not found',
      )
    })

    it('should require a library name', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan',
        payload: {},
      })

      expect(response.statusCode).toBe(400)
    })
  })

  describe('POST /api/plex/scan/all', () => {
    it('should report the outcome for every library', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan/all',
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<ScanAllResponse>().results).toEqual([
        { library: 'Movies', success: true, message: 'Scan started' },
        { library: 'TV Shows', success: true, message: 'Scan started' },
        { library: 'Audiobooks', success: true, message: 'Scan started' },
      ])
    })
  })

  describe('POST /api/plex/scan/item', () => {
    it('should refresh the item', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan/item',
        payload: { itemKey: '1234' },
      })

      expect(response.statusCode).toBe(200)
      expect(response.json<ScanResponse>().scan).toMatchObject({
        libraryName: null,
        itemKey: '1234',
        status: 'completed',
      })
    })

    it('should reject a key that is not a rating key', async (ctx) => {
      const app = await build(ctx)

      const response = await app.inject({
        method: 'POST',
        url: '/api/plex/scan/item',
        payload: { itemKey: '../1234' },
      })

      expect(response.statusCode).toBe(400)
    })
  })
})
