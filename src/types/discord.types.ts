export interface DiscordEmbed {
  title?: string
  description?: string
  url?: string
  color?: number
  timestamp?: string
  footer?: {
    text: string
    icon_url?: string
  }
  thumbnail?: {
    url: string
  }
  image?: {
    url: string
  }
  author?: {
    name: string
    icon_url?: string
  }
  fields?: Array<{
    name: string
    value: string
    inline?: boolean
  }>
}

/**
 * A fully rendered outbound Discord message.
 */
export interface DiscordMessage {
  content?: string
  embeds: DiscordEmbed[]
}

export type BotStatus = 'stopped' | 'starting' | 'running' | 'stopping'
