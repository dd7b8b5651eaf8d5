import type { PlexLibrary } from '@root/types/plex-server.types.js'

export interface StatusSnapshot {
  plexConnected: boolean
  plexVersion: string | null
  discordConnected: boolean
  libraries: PlexLibrary[]
  lastCheckedAt: string | null
}
