import type {
  ArrSource,
  EpisodeDetails,
  MediaType,
} from '@root/types/media-event.types.js'

export interface NotificationRecord {
  id: string
  source: ArrSource
  mediaKey: string
  mediaType: MediaType
  title: string
  year?: number
  posterUrl?: string
  fanartUrl?: string
  quality?: string
  isUpgrade: boolean
  episodeCount: number
  episodes: EpisodeDetails[]
  channelId: string | null
  delivered: boolean
  error?: string
  mentionedUserIds: string[]
  timestamp: string
}

export interface UserNotificationCount {
  discordUserId: string
  notificationCount: number
  lastNotificationAt: string
}
