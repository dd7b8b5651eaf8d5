import {
  NotificationsQuerySchema,
  NotificationsResponseSchema,
  UserNotificationsQuerySchema,
  UserNotificationsResponseSchema,
} from '@schemas/activity/activity.schema.js'
import type { FastifyPluginAsyncZodOpenApi } from 'fastify-zod-openapi'

const plugin: FastifyPluginAsyncZodOpenApi = async (fastify) => {
  fastify.get(
    '/notifications',
    {
      schema: {
        summary: 'List recent notifications',
        operationId: 'listNotifications',
        description:
          'Notifications sent (or attempted) within the last `hours`, newest first. `userId` keeps only those that mentioned that Discord user.',
        querystring: NotificationsQuerySchema,
        response: {
          200: NotificationsResponseSchema,
        },
        tags: ['Activity'],
      },
    },
    async (request) => {
      const { hours, userId } = request.query
      return {
        notifications: fastify.activityStore.listNotifications({
          hours,
          userId,
        }),
      }
    },
  )

  fastify.get(
    '/notifications/users',
    {
      schema: {
        summary: 'Count notifications per user',
        operationId: 'countNotificationsByUser',
        description:
          'How many notifications mentioned each Discord user within the last `hours`, with the Plex usernames mapped to them',
        querystring: UserNotificationsQuerySchema,
        response: {
          200: UserNotificationsResponseSchema,
        },
        tags: ['Activity'],
      },
    },
    async (request) => {
      const { userMappings } = fastify.config
      const users = fastify.activityStore
        .countNotificationsByUser(request.query.hours)
        .map((count) => ({
          ...count,
          plexUsernames: Object.keys(userMappings).filter(
            (plexUsername) =>
              userMappings[plexUsername] === count.discordUserId,
          ),
        }))
      return { users }
    },
  )
}

export default plugin
