export type LogLevel =
  | 'fatal'
  | 'error'
  | 'warn'
  | 'info'
  | 'debug'
  | 'trace'
  | 'silent'

/** Plex username (or any tag fragment) to Discord user id */
export type UserMappings = Record<string, string>

export interface Config {
  // System Config
  baseUrl: string
  port: number
  logLevel: LogLevel
  closeGraceDelay: number
  rateLimitMax: number
  // Webhook batching
  debounceSeconds: number
  scanOnImport: boolean
  // Plex Config
  plexServerUrl: string
  plexToken: string
  plexLibraryName: string
  plexShowLibrary: string
  plexMovieLibrary: string
  plexBookLibrary: string
  // Discord Config
  discordBotToken: string
  discordDefaultChannelId: string
  discordSonarrChannelId: string
  discordRadarrChannelId: string
  discordReadarrChannelId: string
  discordDmNotifications: boolean
  userMappings: UserMappings
  // Activity history
  activityRetentionHours: number
  activityPruneIntervalSeconds: number
  statusRefreshIntervalSeconds: number
}

export interface RawConfig extends Omit<Config, 'userMappings'> {
  userMappings: string
}
