/**
 * Discord Channel Messages
 *
 * Posts a rendered message to a guild text channel through the bot client.
 * Failures are thrown so the caller can record them.
 */

import type { BotStatus, DiscordMessage } from '@root/types/discord.types.js'
import type { Client } from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'

export interface DiscordChannelDeps {
  log: FastifyBaseLogger
  botClient: Client | null
  botStatus: BotStatus
}

export async function sendChannelMessage(
  channelId: string,
  message: DiscordMessage,
  deps: DiscordChannelDeps,
): Promise<void> {
  const { log, botClient, botStatus } = deps

  if (!botClient || botStatus !== 'running') {
    throw new Error('Discord bot is not connected')
  }

  const channel = await botClient.channels.fetch(channelId)
  if (!channel) {
    throw new Error(`Discord channel ${channelId} not found`)
  }
  if (!channel.isSendable()) {
    throw new Error(`Discord channel ${channelId} does not accept messages`)
  }

  // Only users named in the message may be pinged
  const mentionIds = [...(message.content ?? '').matchAll(/<@(\d+)>/g)].map(
    (match) => match[1],
  )

  await channel.send({
    content: message.content,
    embeds: message.embeds,
    allowedMentions: { users: mentionIds },
  })
  log.debug({ channelId }, 'Discord channel message sent')
}
