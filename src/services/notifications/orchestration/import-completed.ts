/**
 * Import Completed Notification Orchestration
 *
 * Turns one flushed batch into a Discord message: picks the channel for
 * the source, mentions users tagged on the media, delivers, and records
 * the outcome. Delivery failures end up on the record, never thrown.
 */

import { randomUUID } from 'node:crypto'
import type { Config, UserMappings } from '@root/types/config.types.js'
import type { ArrSource } from '@root/types/media-event.types.js'
import type { NotificationRecord } from '@root/types/notification.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'
import type { FastifyBaseLogger } from 'fastify'
import type { MessageSender } from '../discord-bot/bot.service.js'
import { createImportMessage } from '../templates/discord-embeds.js'

// ============================================================================
// Types
// ============================================================================

export type NotificationRoutingConfig = Pick<
  Config,
  | 'discordDefaultChannelId'
  | 'discordSonarrChannelId'
  | 'discordRadarrChannelId'
  | 'discordReadarrChannelId'
  | 'discordDmNotifications'
  | 'userMappings'
>

export interface ImportCompletedDeps {
  logger: FastifyBaseLogger
  sender: MessageSender
  config: NotificationRoutingConfig
  recordNotification: (record: NotificationRecord) => void
}

// ============================================================================
// Routing
// ============================================================================

const SOURCE_CHANNEL_KEYS = {
  sonarr: 'discordSonarrChannelId',
  radarr: 'discordRadarrChannelId',
  readarr: 'discordReadarrChannelId',
} as const satisfies Record<ArrSource, keyof NotificationRoutingConfig>

/**
 * The source's own channel, else the default channel, else null
 */
export function resolveChannelId(
  source: ArrSource,
  config: NotificationRoutingConfig,
): string | null {
  const sourceChannel = config[SOURCE_CHANNEL_KEYS[source]].trim()
  if (sourceChannel) return sourceChannel
  const defaultChannel = config.discordDefaultChannelId.trim()
  return defaultChannel || null
}

/**
 * Discord ids of users whose mapped name appears inside one of the tags,
 * compared case-insensitively. Tags like "12 - alice" match "Alice".
 */
export function resolveMentionedUsers(
  tags: string[],
  userMappings: UserMappings,
): string[] {
  if (tags.length === 0) return []

  const normalizedTags = tags.map((tag) => tag.toLowerCase())
  const mentioned = new Set<string>()

  for (const [username, discordId] of Object.entries(userMappings)) {
    const normalizedName = username.trim().toLowerCase()
    if (!normalizedName || !discordId) continue
    if (normalizedTags.some((tag) => tag.includes(normalizedName))) {
      mentioned.add(discordId)
    }
  }

  return [...mentioned]
}

// ============================================================================
// Delivery
// ============================================================================

/**
 * Renders, delivers and records the notification for one flushed batch.
 */
export async function sendImportCompleted(
  aggregate: BatchAggregate,
  deps: ImportCompletedDeps,
): Promise<NotificationRecord> {
  const { logger, sender, config, recordNotification } = deps

  const mentionedUserIds = resolveMentionedUsers(
    aggregate.tags,
    config.userMappings,
  )
  const message = createImportMessage(aggregate, mentionedUserIds)
  const channelId = resolveChannelId(aggregate.source, config)

  let delivered = false
  let error: string | undefined

  if (channelId) {
    try {
      await sender.sendChannelMessage(channelId, message)
      delivered = true
      logger.info(
        {
          mediaKey: aggregate.mediaKey,
          channelId,
          episodeCount: aggregate.episodeCount,
        },
        `Sent import notification for "${aggregate.title}"`,
      )
    } catch (err) {
      error = err instanceof Error ? err.message : String(err)
      logger.error(
        { error: err, mediaKey: aggregate.mediaKey, channelId },
        'Failed to deliver import notification',
      )
    }
  } else {
    error = `No Discord channel configured for ${aggregate.source}`
    logger.warn({ mediaKey: aggregate.mediaKey }, error)
  }

  if (config.discordDmNotifications) {
    for (const userId of mentionedUserIds) {
      await sender.sendDirectMessage(userId, message)
    }
  }

  const record: NotificationRecord = {
    id: randomUUID(),
    source: aggregate.source,
    mediaKey: aggregate.mediaKey,
    mediaType: aggregate.mediaType,
    title: aggregate.title,
    year: aggregate.year,
    posterUrl: aggregate.posterUrl,
    fanartUrl: aggregate.fanartUrl,
    quality: aggregate.quality,
    isUpgrade: aggregate.isUpgrade,
    episodeCount: aggregate.episodeCount,
    episodes: aggregate.episodes,
    channelId,
    delivered,
    error,
    mentionedUserIds,
    timestamp: new Date().toISOString(),
  }

  recordNotification(record)
  return record
}
