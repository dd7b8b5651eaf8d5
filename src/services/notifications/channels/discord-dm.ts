/**
 * Discord Direct Message Channel
 *
 * Functions for sending direct messages via the Discord bot.
 * Requires an active bot client to send DMs.
 */

import type { BotStatus, DiscordMessage } from '@root/types/discord.types.js'
import type { Client } from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'

export interface DiscordDmDeps {
  log: FastifyBaseLogger
  botClient: Client | null
  botStatus: BotStatus
}

/**
 * Sends a direct message to a Discord user.
 *
 * @param discordId - The Discord user ID to message
 * @returns true if the message was sent successfully
 */
export async function sendDirectMessage(
  discordId: string,
  message: DiscordMessage,
  deps: DiscordDmDeps,
): Promise<boolean> {
  const { log, botClient, botStatus } = deps

  if (!botClient || botStatus !== 'running') {
    log.warn('Bot client not available for sending direct message')
    return false
  }

  try {
    const user = await botClient.users.fetch(discordId)
    await user.send({ content: message.content, embeds: message.embeds })

    log.info(
      { discordId, username: user.username },
      'Discord direct message sent',
    )
    return true
  } catch (error) {
    log.error({ error, discordId }, 'Failed to send direct message')
    return false
  }
}
