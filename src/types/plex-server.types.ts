/**
 * Plex library section as returned by /library/sections, reduced to
 * what scan targeting needs.
 */
export interface PlexLibrary {
  key: string
  title: string
  /** Plex section type: "movie", "show", "artist", "photo" */
  type: string
}

export interface PlexActivity {
  uuid: string
  type: string
  title: string
  subtitle?: string
  progress?: number
  cancellable?: boolean
}

export interface PlexIdentity {
  machineIdentifier: string
  version: string
}

export interface PlexConnection {
  serverUrl: string
  token: string
}
