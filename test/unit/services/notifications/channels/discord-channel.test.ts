import { sendChannelMessage } from '@services/notifications/channels/discord-channel.js'
import { sendDirectMessage } from '@services/notifications/channels/discord-dm.js'
import type { DiscordMessage } from '@root/types/discord.types.js'
import type { Client } from 'discord.js'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'

const message: DiscordMessage = {
  content: '<@200000000000000001> <@200000000000000002>',
  embeds: [{ title: 'Movie Seven (2019)' }],
}

describe('discord channels', () => {
  const send = vi.fn()
  const isSendable = vi.fn()
  const fetchChannel = vi.fn()
  const fetchUser = vi.fn()
  let botClient: Client

  beforeEach(() => {
    vi.clearAllMocks()
    send.mockResolvedValue(undefined)
    isSendable.mockReturnValue(true)
    fetchChannel.mockResolvedValue({ isSendable, send })
    fetchUser.mockResolvedValue({ username: 'alice', send })
    botClient = {
      channels: { fetch: fetchChannel },
      users: { fetch: fetchUser },
    } as unknown as Client
  })

  describe('sendChannelMessage', () => {
    it('should post the embeds and allow only the mentioned users', async () => {
      await sendChannelMessage('100000000000000001', message, {
        log: createMockLogger(),
        botClient,
        botStatus: 'running',
      })

      expect(fetchChannel).toHaveBeenCalledWith('100000000000000001')
      expect(send).toHaveBeenCalledWith({
        content: '<@200000000000000001> <@200000000000000002>',
        embeds: [{ title: 'Movie Seven (2019)' }],
        allowedMentions: {
          users: ['200000000000000001', '200000000000000002'],
        },
      })
    })

    it('should throw when the bot is not running', async () => {
      await expect(
        sendChannelMessage('100000000000000001', message, {
          log: createMockLogger(),
          botClient,
          botStatus: 'starting',
        }),
      ).rejects.toThrow('Discord bot is not connected')
      expect(fetchChannel).not.toHaveBeenCalled()
    })

    it('should throw for an unknown channel', async () => {
      fetchChannel.mockResolvedValue(null)

      await expect(
        sendChannelMessage('100000000000000009', message, {
          log: createMockLogger(),
          botClient,
          botStatus: 'running',
        }),
      ).rejects.toThrow('Discord channel 100000000000000009 not found')
    })

    it('should throw for a channel that takes no messages', async () => {
      isSendable.mockReturnValue(false)

      await expect(
        sendChannelMessage('100000000000000001', message, {
          log: createMockLogger(),
          botClient,
          botStatus: 'running',
        }),
      ).rejects.toThrow(
        'Discord channel 100000000000000001 does not accept messages',
      )
      expect(send).not.toHaveBeenCalled()
    })
  })

  describe('sendDirectMessage', () => {
    it('should message the user', async () => {
      const sent = await sendDirectMessage('200000000000000001', message, {
        log: createMockLogger(),
        botClient,
        botStatus: 'running',
      })

      expect(sent).toBe(true)
      expect(fetchUser).toHaveBeenCalledWith('200000000000000001')
      expect(send).toHaveBeenCalledWith({
        content: message.content,
        embeds: message.embeds,
      })
    })

    it('should return false when the user cannot be reached', async () => {
      const log = createMockLogger()
      const error = new Error('Cannot send messages to this user')
      send.mockRejectedValue(error)

      const sent = await sendDirectMessage('200000000000000001', message, {
        log,
        botClient,
        botStatus: 'running',
      })

      expect(sent).toBe(false)
      expect(log.error).toHaveBeenCalledWith(
        { error, discordId: '200000000000000001' },
        'Failed to send direct message',
      )
    })

    it('should return false without a running bot', async () => {
      expect(
        await sendDirectMessage('200000000000000001', message, {
          log: createMockLogger(),
          botClient: null,
          botStatus: 'stopped',
        }),
      ).toBe(false)
    })
  })
})
