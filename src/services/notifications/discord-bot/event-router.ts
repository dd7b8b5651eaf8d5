/**
 * Discord Event Router
 *
 * Wires gateway lifecycle events on the bot client to status callbacks.
 * The bot only sends messages, so no interactions are routed.
 */

import { type Client, Events } from 'discord.js'
import type { FastifyBaseLogger } from 'fastify'

export interface EventRouterDeps {
  log: FastifyBaseLogger
  onBotReady: () => void
  onDisconnect: () => void
  onResume: () => void
}

/**
 * Sets up all event handlers on the Discord bot client.
 */
export function setupBotEventHandlers(
  client: Client,
  deps: EventRouterDeps,
): void {
  const { log, onBotReady, onDisconnect, onResume } = deps

  client.once(Events.ClientReady, (readyClient) => {
    onBotReady()
    log.info({ botUsername: readyClient.user.username }, 'Discord bot is ready')
  })

  client.on(Events.ShardDisconnect, (event, shardId) => {
    onDisconnect()
    log.warn({ shardId, code: event.code }, 'Discord gateway disconnected')
  })

  client.on(Events.ShardResume, (shardId) => {
    onResume()
    log.info({ shardId }, 'Discord gateway connection resumed')
  })

  client.on(Events.Error, (error) => {
    log.error({ error }, 'Discord bot error occurred')
  })
}
