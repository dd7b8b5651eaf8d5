/**
 * Notification Dispatcher Service
 *
 * Flush consumer that announces each imported batch on Discord and keeps
 * a record of the attempt in the activity store.
 */

import type { NotificationRecord } from '@root/types/notification.types.js'
import type { BatchAggregate } from '@root/types/webhook.types.js'
import { createServiceLogger } from '@utils/logger.js'
import type { FastifyBaseLogger, FastifyInstance } from 'fastify'
import type { MessageSender } from './notifications/discord-bot/bot.service.js'
import {
  type ImportCompletedDeps,
  sendImportCompleted,
} from './notifications/orchestration/index.js'

export class NotificationDispatcherService {
  private readonly log: FastifyBaseLogger

  constructor(
    baseLog: FastifyBaseLogger,
    private readonly fastify: FastifyInstance,
    private readonly sender: MessageSender = fastify.discord,
  ) {
    this.log = createServiceLogger(baseLog, 'NOTIFICATIONS')
  }

  // Read per flush so routing follows the current config
  private get importCompletedDeps(): ImportCompletedDeps {
    return {
      logger: this.log,
      sender: this.sender,
      config: this.fastify.config,
      recordNotification: (record) =>
        this.fastify.activityStore.recordNotification(record),
    }
  }

  async onFlush(aggregate: BatchAggregate): Promise<NotificationRecord> {
    return sendImportCompleted(aggregate, this.importCompletedDeps)
  }
}
