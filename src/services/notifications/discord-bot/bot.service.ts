/**
 * Discord Bot Service
 *
 * Manages the Discord bot lifecycle (start, stop, status).
 * Sends channel messages and DMs through the bot client.
 */

import type { BotStatus, DiscordMessage } from '@root/types/discord.types.js'
import { createServiceLogger } from '@utils/logger.js'
import { Client, GatewayIntentBits } from 'discord.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import {
  type DiscordChannelDeps,
  sendChannelMessage,
} from '../channels/discord-channel.js'
import {
  type DiscordDmDeps,
  sendDirectMessage,
} from '../channels/discord-dm.js'
import { setupBotEventHandlers } from './event-router.js'

/**
 * The messaging collaborator the notification dispatcher depends on
 */
export interface MessageSender {
  isConnected(): boolean
  /** Rejects with the Discord error when the message could not be posted */
  sendChannelMessage(channelId: string, message: DiscordMessage): Promise<void>
  sendDirectMessage(userId: string, message: DiscordMessage): Promise<boolean>
}

export class DiscordBotService implements MessageSender {
  private readonly log: FastifyBaseLogger
  private botClient: Client | null = null
  private botStatus: BotStatus = 'stopped'
  private gatewayConnected = false

  constructor(
    readonly baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
  ) {
    this.log = createServiceLogger(baseLog, 'DISCORD')
    this.log.debug('Initializing Discord bot service')
  }

  /**
   * Check if Discord bot config is present.
   */
  get hasBotConfig(): boolean {
    return Boolean(this.fastify.config.discordBotToken)
  }

  private get botToken(): string {
    const { discordBotToken } = this.fastify.config
    if (!discordBotToken) {
      const error = new Error(
        'Missing required Discord bot config: discordBotToken',
      )
      this.log.error({ error }, 'Missing required Discord bot config')
      throw error
    }
    return discordBotToken
  }

  private get sendDeps(): DiscordChannelDeps & DiscordDmDeps {
    return {
      log: this.log,
      botClient: this.botClient,
      botStatus: this.botStatus,
    }
  }

  /**
   * Starts the Discord bot.
   */
  async startBot(): Promise<boolean> {
    if (this.botStatus !== 'stopped') {
      this.log.warn(`Cannot start bot: current status is ${this.botStatus}`)
      return false
    }

    try {
      const token = this.botToken
      this.botStatus = 'starting'
      this.log.debug('Initializing Discord bot client')

      this.botClient = new Client({
        intents: [GatewayIntentBits.Guilds, GatewayIntentBits.DirectMessages],
      })

      setupBotEventHandlers(this.botClient, {
        log: this.log,
        onBotReady: () => {
          this.botStatus = 'running'
          this.gatewayConnected = true
        },
        onDisconnect: () => {
          this.gatewayConnected = false
        },
        onResume: () => {
          this.gatewayConnected = true
        },
      })

      await this.botClient.login(token)
      this.log.info('Discord bot started successfully')
      return true
    } catch (error) {
      this.log.error({ error }, 'Failed to start Discord bot')
      this.botStatus = 'stopped'
      this.botClient = null
      return false
    }
  }

  /**
   * Stops the Discord bot.
   */
  async stopBot(): Promise<boolean> {
    if (this.botStatus !== 'running' && this.botStatus !== 'starting') {
      this.log.debug(`Cannot stop bot: current status is ${this.botStatus}`)
      return false
    }

    try {
      this.log.info('Stopping Discord bot')
      this.botStatus = 'stopping'

      if (this.botClient) {
        await this.botClient.destroy()
        this.botClient = null
      }

      this.log.info('Discord bot stopped successfully')
      return true
    } catch (error) {
      this.log.error({ error }, 'Error stopping Discord bot')
      this.botClient = null
      return false
    } finally {
      this.botStatus = 'stopped'
      this.gatewayConnected = false
    }
  }

  isConnected(): boolean {
    return this.botStatus === 'running' && this.gatewayConnected
  }

  async sendChannelMessage(
    channelId: string,
    message: DiscordMessage,
  ): Promise<void> {
    await sendChannelMessage(channelId, message, this.sendDeps)
  }

  /**
   * Sends a direct message to a Discord user.
   * Requires the bot to be running.
   */
  async sendDirectMessage(
    discordId: string,
    message: DiscordMessage,
  ): Promise<boolean> {
    return sendDirectMessage(discordId, message, this.sendDeps)
  }
}
