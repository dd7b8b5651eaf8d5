/**
 * Discord Embed Templates
 *
 * Pure functions for building Discord embed payloads.
 * These create consistent formatting across all Discord notifications.
 */

import type {
  DiscordEmbed,
  DiscordMessage,
} from '@root/types/discord.types.js'
import type {
  ArrSource,
  EpisodeDetails,
} from '@root/types/media-event.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'

/** Embed accent color per source */
export const SOURCE_COLORS: Record<ArrSource, number> = {
  sonarr: 0x5dadeb,
  radarr: 0xffc230,
  readarr: 0xd0312d,
}

export const SOURCE_NAMES: Record<ArrSource, string> = {
  sonarr: 'Sonarr',
  radarr: 'Radarr',
  readarr: 'Readarr',
}

/** Episodes listed by name in a batch notification */
export const EPISODE_PREVIEW_LIMIT = 3

const TITLE_LIMIT = 256
const FIELD_VALUE_LIMIT = 1024

export function truncate(value: string, limit: number): string {
  return value.length > limit ? `${value.slice(0, limit - 3)}...` : value
}

/**
 * "S01E02 - Title", or just "S01E02" when the episode has no title
 */
export function formatEpisodeLabel(episode: EpisodeDetails): string {
  const season = episode.season.toString().padStart(2, '0')
  const number = episode.number.toString().padStart(2, '0')
  const label = `S${season}E${number}`
  return episode.title ? `${label} - ${episode.title}` : label
}

export function formatMediaTitle(title: string, year?: number): string {
  return truncate(year ? `${title} (${year})` : title, TITLE_LIMIT)
}

function describeEpisodes(
  aggregate: BatchAggregate,
): Pick<DiscordEmbed, 'description' | 'fields'> {
  const fields: NonNullable<DiscordEmbed['fields']> = []

  if (aggregate.kind === 'batch') {
    const preview = aggregate.episodes
      .slice(0, EPISODE_PREVIEW_LIMIT)
      .map(formatEpisodeLabel)
    const remaining = aggregate.episodeCount - preview.length
    if (remaining > 0) {
      preview.push(`+${remaining} more`)
    }
    fields.push({
      name: 'Episodes',
      value: truncate(preview.join('\n'), FIELD_VALUE_LIMIT),
      inline: false,
    })
    return {
      description: `${aggregate.episodeCount} episodes ${
        aggregate.isUpgrade ? 'upgraded' : 'imported'
      }`,
      fields,
    }
  }

  const description = aggregate.isUpgrade
    ? 'Episode upgraded'
    : 'New episode imported'
  const [episode] = aggregate.episodes
  if (!episode) {
    return { description, fields }
  }

  fields.push({
    name: 'Episode',
    value: truncate(formatEpisodeLabel(episode), FIELD_VALUE_LIMIT),
    inline: false,
  })
  if (episode.overview) {
    fields.push({
      name: 'Overview',
      value: truncate(episode.overview, FIELD_VALUE_LIMIT),
      inline: false,
    })
  }
  if (episode.airDate) {
    fields.push({ name: 'Air Date', value: episode.airDate, inline: true })
  }
  return { description, fields }
}

/**
 * Builds the embed announcing one flushed batch
 */
export function createImportEmbed(aggregate: BatchAggregate): DiscordEmbed {
  let description: string
  let fields: NonNullable<DiscordEmbed['fields']> = []

  switch (aggregate.mediaType) {
    case 'episode': {
      const described = describeEpisodes(aggregate)
      description = described.description ?? ''
      fields = described.fields ?? []
      break
    }
    case 'movie':
      description = aggregate.isUpgrade
        ? 'Movie upgraded'
        : 'New movie imported'
      break
    case 'book': {
      const byAuthor = aggregate.author ? ` by ${aggregate.author}` : ''
      description = aggregate.isUpgrade
        ? `Book${byAuthor} upgraded`
        : `New book${byAuthor} imported`
      break
    }
  }

  if (aggregate.quality) {
    fields.push({ name: 'Quality', value: aggregate.quality, inline: true })
  }

  const embed: DiscordEmbed = {
    title: formatMediaTitle(aggregate.title, aggregate.year),
    description,
    color: SOURCE_COLORS[aggregate.source],
    timestamp: aggregate.lastSeenAt,
    footer: { text: SOURCE_NAMES[aggregate.source] },
    fields,
  }

  if (aggregate.posterUrl) {
    embed.thumbnail = { url: aggregate.posterUrl }
  }
  if (aggregate.fanartUrl) {
    embed.image = { url: aggregate.fanartUrl }
  }

  return embed
}

/**
 * The full message: the embed plus a mention line when users are tagged
 */
export function createImportMessage(
  aggregate: BatchAggregate,
  mentionedUserIds: string[],
): DiscordMessage {
  const message: DiscordMessage = { embeds: [createImportEmbed(aggregate)] }
  if (mentionedUserIds.length > 0) {
    message.content = mentionedUserIds.map((id) => `<@${id}>`).join(' ')
  }
  return message
}
