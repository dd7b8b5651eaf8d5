import { ActivityStore } from '@services/activity-store.service.js'
import { ScanCoordinatorService } from '@services/scan-coordinator.service.js'
import type { Config } from '@root/types/config.types.js'
import type { LibraryScanner } from '@utils/plex-server.js'
import type { FastifyInstance } from 'fastify'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../mocks/logger.js'
import { createAggregate } from '../../mocks/media-events.js'
import { plexTestLibraries } from '../../mocks/plex-api-handlers.js'

describe('ScanCoordinatorService', () => {
  let store: ActivityStore
  let config: Partial<Config>
  let coordinator: ScanCoordinatorService
  const scanner = {
    listLibraries: vi.fn<LibraryScanner['listLibraries']>(),
    scanLibrary: vi.fn<LibraryScanner['scanLibrary']>(),
    scanEachLibrary: vi.fn<LibraryScanner['scanEachLibrary']>(),
    scanItem: vi.fn<LibraryScanner['scanItem']>(),
  } satisfies LibraryScanner

  beforeEach(() => {
    vi.clearAllMocks()
    scanner.listLibraries.mockResolvedValue(plexTestLibraries)
    scanner.scanLibrary.mockResolvedValue(undefined)
    scanner.scanItem.mockResolvedValue(undefined)

    store = new ActivityStore(createMockLogger())
    config = {
      scanOnImport: true,
      plexLibraryName: '',
      plexShowLibrary: '',
      plexMovieLibrary: '',
      plexBookLibrary: '',
    }
    const mockFastify = {
      config,
      activityStore: store,
    } as unknown as FastifyInstance

    coordinator = new ScanCoordinatorService(
      createMockLogger(),
      mockFastify,
      scanner,
    )
  })

  describe('onFlush', () => {
    it('should scan the library holding the media type', async () => {
      const scan = await coordinator.onFlush(createAggregate())

      expect(scanner.scanLibrary).toHaveBeenCalledWith('Movies')
      expect(scan).toMatchObject({
        libraryName: 'Movies',
        itemKey: null,
        status: 'completed',
        trigger: 'webhook',
        mediaTitles: ['Movie Seven'],
      })
    })

    it('should use the library from config when set', async () => {
      config.plexMovieLibrary = 'Films'

      await coordinator.onFlush(createAggregate())

      expect(scanner.listLibraries).not.toHaveBeenCalled()
      expect(scanner.scanLibrary).toHaveBeenCalledWith('Films')
    })

    it('should skip scanning when scan on import is off', async () => {
      config.scanOnImport = false

      expect(await coordinator.onFlush(createAggregate())).toBeNull()
      expect(scanner.scanLibrary).not.toHaveBeenCalled()
      expect(store.listScans()).toEqual([])
    })

    it('should record a failed scan instead of rejecting', async () => {
      scanner.scanLibrary.mockRejectedValue(
        new Error('Plex request GET /library/sections/1/refresh failed: 500'),
      )

      const scan = await coordinator.onFlush(createAggregate())

      expect(scan?.status).toBe('failed')
      expect(scan?.message).toBe(
        'Plex request GET /library/sections/1/refresh failed: 500',
      )
    })

    it('should share one scan between flushes for the same library', async () => {
      let release = (): void => {}
      scanner.scanLibrary.mockImplementation(
        () =>
          new Promise<void>((resolve) => {
            release = resolve
          }),
      )

      const first = coordinator.onFlush(createAggregate())
      const second = coordinator.onFlush(
        createAggregate({ mediaKey: 'radarr:8', title: 'Movie Eight' }),
      )
      await vi.waitFor(() => {
        expect(store.getScan(store.listScans()[0]?.scanId ?? '')?.mediaTitles)
          .toEqual(['Movie Seven', 'Movie Eight'])
      })
      expect(coordinator.pendingCount).toBe(1)

      release()
      const [firstScan, secondScan] = await Promise.all([first, second])

      expect(scanner.scanLibrary).toHaveBeenCalledTimes(1)
      expect(firstScan?.scanId).toBe(secondScan?.scanId)
      expect(coordinator.pendingCount).toBe(0)
    })
  })

  describe('manual scans', () => {
    it('should scan a library by name', async () => {
      const scan = await coordinator.scanLibrary('TV Shows')

      expect(scanner.scanLibrary).toHaveBeenCalledWith('TV Shows')
      expect(scan).toMatchObject({
        libraryName: 'TV Shows',
        trigger: 'manual',
        status: 'completed',
        mediaTitles: [],
      })
    })

    it('should refresh a single item', async () => {
      const scan = await coordinator.scanItem('1234')

      expect(scanner.scanItem).toHaveBeenCalledWith('1234')
      expect(scan).toMatchObject({
        libraryName: null,
        itemKey: '1234',
        status: 'completed',
      })
    })

    it('should report each library and record one failed scan', async () => {
      const results = [
        { library: 'Movies', success: true, message: 'Scan started' },
        { library: 'TV Shows', success: false, message: 'timeout' },
        { library: 'Audiobooks', success: true, message: 'Scan started' },
      ]
      scanner.scanEachLibrary.mockResolvedValue(results)

      expect(await coordinator.scanAllLibraries()).toEqual(results)

      const [scan] = store.listScans()
      expect(store.listScans()).toHaveLength(1)
      expect(scan?.status).toBe('failed')
      expect(scan?.message).toBe('Failed to scan 1 of 3 libraries: TV Shows')
    })

    it('should return no results when the libraries cannot be listed', async () => {
      scanner.scanEachLibrary.mockRejectedValue(
        new Error('Plex server is not configured'),
      )

      expect(await coordinator.scanAllLibraries()).toEqual([])
      expect(store.listScans()[0]?.message).toBe(
        'Plex server is not configured',
      )
    })
  })
})
