import { DiscordBotService } from '@services/notifications/discord-bot/bot.service.js'
import type { FastifyInstance } from 'fastify'
import fp from 'fastify-plugin'

declare module 'fastify' {
  interface FastifyInstance {
    discord: DiscordBotService
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    const discord = new DiscordBotService(fastify.log, fastify)
    fastify.decorate('discord', discord)

    // Login happens once the server is ready so a slow gateway never
    // delays startup
    fastify.addHook('onReady', async () => {
      if (!discord.hasBotConfig) {
        fastify.log.info(
          'Discord bot token not configured - notifications will not be delivered',
        )
        return
      }
      const started = await discord.startBot()
      if (!started) {
        fastify.log.warn('Discord bot failed to start')
      }
    })

    fastify.addHook('onClose', async () => {
      await discord.stopBot()
    })
  },
  {
    name: 'discord-bot',
    dependencies: ['config'],
  },
)
