import type { MessageSender } from '@services/notifications/discord-bot/bot.service.js'
import {
  type ImportCompletedDeps,
  type NotificationRoutingConfig,
  resolveChannelId,
  resolveMentionedUsers,
  sendImportCompleted,
} from '@services/notifications/orchestration/import-completed.js'
import { beforeEach, describe, expect, it, vi } from 'vitest'
import { createMockLogger } from '../../../../mocks/logger.js'
import { createAggregate } from '../../../../mocks/media-events.js'

const routing: NotificationRoutingConfig = {
  discordDefaultChannelId: '100000000000000001',
  discordSonarrChannelId: '',
  discordRadarrChannelId: '100000000000000002',
  discordReadarrChannelId: '',
  discordDmNotifications: false,
  userMappings: {
    alice: '200000000000000001',
    bob: '200000000000000002',
  },
}

describe('import-completed', () => {
  describe('resolveChannelId', () => {
    it('should prefer the channel set for the source', () => {
      expect(resolveChannelId('radarr', routing)).toBe('100000000000000002')
    })

    it('should fall back to the default channel', () => {
      expect(resolveChannelId('sonarr', routing)).toBe('100000000000000001')
    })

    it('should return null when no channel is set', () => {
      expect(
        resolveChannelId('readarr', {
          ...routing,
          discordDefaultChannelId: '  ',
        }),
      ).toBeNull()
    })
  })

  describe('resolveMentionedUsers', () => {
    it('should match mapped names inside tags regardless of case', () => {
      expect(
        resolveMentionedUsers(['12 - Alice', 'kids'], routing.userMappings),
      ).toEqual(['200000000000000001'])
    })

    it('should mention each user once in mapping order', () => {
      expect(
        resolveMentionedUsers(
          ['bob', 'alice', 'alice-and-bob'],
          routing.userMappings,
        ),
      ).toEqual(['200000000000000001', '200000000000000002'])
    })

    it('should mention a shared id once', () => {
      expect(
        resolveMentionedUsers(['alice', 'al'], {
          alice: '200000000000000001',
          al: '200000000000000001',
        }),
      ).toEqual(['200000000000000001'])
    })

    it('should ignore blank names and untagged media', () => {
      expect(resolveMentionedUsers(['kids'], { ' ': '1' })).toEqual([])
      expect(resolveMentionedUsers([], routing.userMappings)).toEqual([])
    })
  })

  describe('sendImportCompleted', () => {
    const sender = {
      isConnected: vi.fn<MessageSender['isConnected']>(),
      sendChannelMessage: vi.fn<MessageSender['sendChannelMessage']>(),
      sendDirectMessage: vi.fn<MessageSender['sendDirectMessage']>(),
    } satisfies MessageSender
    let deps: ImportCompletedDeps
    const recordNotification = vi.fn<ImportCompletedDeps['recordNotification']>()

    beforeEach(() => {
      vi.clearAllMocks()
      sender.isConnected.mockReturnValue(true)
      sender.sendChannelMessage.mockResolvedValue(undefined)
      sender.sendDirectMessage.mockResolvedValue(true)
      deps = {
        logger: createMockLogger(),
        sender,
        config: routing,
        recordNotification,
      }
    })

    it('should post to the source channel and record the delivery', async () => {
      const record = await sendImportCompleted(createAggregate(), deps)

      expect(sender.sendChannelMessage).toHaveBeenCalledTimes(1)
      expect(sender.sendChannelMessage.mock.calls[0]?.[0]).toBe(
        '100000000000000002',
      )
      const message = sender.sendChannelMessage.mock.calls[0]?.[1]
      expect(message?.content).toBe('<@200000000000000002>')
      expect(message?.embeds[0]?.title).toBe('Movie Seven (2019)')

      expect(record).toMatchObject({
        source: 'radarr',
        mediaKey: 'radarr:7',
        mediaType: 'movie',
        title: 'Movie Seven',
        channelId: '100000000000000002',
        delivered: true,
        mentionedUserIds: ['200000000000000002'],
      })
      expect(record.error).toBeUndefined()
      expect(recordNotification).toHaveBeenCalledWith(record)
    })

    it('should record whether the import was an upgrade', async () => {
      const record = await sendImportCompleted(
        createAggregate({ isUpgrade: true }),
        deps,
      )

      expect(record.isUpgrade).toBe(true)
      const message = sender.sendChannelMessage.mock.calls[0]?.[1]
      expect(message?.embeds[0]?.description).toBe('Movie upgraded')
    })

    it('should record the error when Discord rejects the message', async () => {
      sender.sendChannelMessage.mockRejectedValue(
        new Error('Discord channel 100000000000000002 not found'),
      )

      const record = await sendImportCompleted(createAggregate(), deps)

      expect(record.delivered).toBe(false)
      expect(record.error).toBe('Discord channel 100000000000000002 not found')
      expect(recordNotification).toHaveBeenCalledWith(record)
    })

    it('should record a missing channel without sending', async () => {
      deps.config = { ...routing, discordDefaultChannelId: '' }

      const record = await sendImportCompleted(
        createAggregate({ source: 'readarr', mediaType: 'book' }),
        deps,
      )

      expect(sender.sendChannelMessage).not.toHaveBeenCalled()
      expect(record.channelId).toBeNull()
      expect(record.delivered).toBe(false)
      expect(record.error).toBe('No Discord channel configured for readarr')
    })

    it('should direct message mentioned users when enabled', async () => {
      deps.config = { ...routing, discordDmNotifications: true }

      await sendImportCompleted(
        createAggregate({ tags: ['alice', 'bob'] }),
        deps,
      )

      expect(
        sender.sendDirectMessage.mock.calls.map(([userId]) => userId),
      ).toEqual(['200000000000000001', '200000000000000002'])
    })

    it('should not direct message when disabled', async () => {
      await sendImportCompleted(createAggregate({ tags: ['alice'] }), deps)

      expect(sender.sendDirectMessage).not.toHaveBeenCalled()
    })
  })
})
