import fp from 'fastify-plugin'
import env from '@fastify/env'
import type { FastifyInstance } from 'fastify'
import { z } from 'zod'
import type {
  Config,
  RawConfig,
  UserMappings,
} from '@root/types/config.types.js'

const UserMappingsSchema = z.record(z.string(), z.string())

const schema = {
  type: 'object',
  required: ['port'],
  properties: {
    baseUrl: {
      type: 'string',
      default: 'http://localhost',
    },
    port: {
      type: 'number',
      default: 5000,
    },
    logLevel: {
      type: 'string',
      enum: ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'],
      default: 'info',
    },
    closeGraceDelay: {
      type: 'number',
      default: 10000,
    },
    rateLimitMax: {
      type: 'number',
      default: 500,
    },
    // Webhook batching
    debounceSeconds: {
      type: 'number',
      minimum: 0,
      default: 60,
    },
    scanOnImport: {
      type: 'boolean',
      default: true,
    },
    // Plex
    plexServerUrl: {
      type: 'string',
      default: 'http://localhost:32400',
    },
    plexToken: {
      type: 'string',
      default: '',
    },
    plexLibraryName: {
      type: 'string',
      default: '',
    },
    plexShowLibrary: {
      type: 'string',
      default: '',
    },
    plexMovieLibrary: {
      type: 'string',
      default: '',
    },
    plexBookLibrary: {
      type: 'string',
      default: '',
    },
    // Discord
    discordBotToken: {
      type: 'string',
      default: '',
    },
    discordDefaultChannelId: {
      type: 'string',
      default: '',
    },
    discordSonarrChannelId: {
      type: 'string',
      default: '',
    },
    discordRadarrChannelId: {
      type: 'string',
      default: '',
    },
    discordReadarrChannelId: {
      type: 'string',
      default: '',
    },
    discordDmNotifications: {
      type: 'boolean',
      default: false,
    },
    // JSON object of Plex username to Discord user id
    userMappings: {
      type: 'string',
      default: '{}',
    },
    // Activity history
    activityRetentionHours: {
      type: 'number',
      minimum: 1,
      default: 24,
    },
    activityPruneIntervalSeconds: {
      type: 'number',
      minimum: 1,
      default: 300,
    },
    statusRefreshIntervalSeconds: {
      type: 'number',
      minimum: 5,
      default: 60,
    },
  },
}

declare module 'fastify' {
  interface FastifyInstance {
    rawConfig: RawConfig
    config: Config
  }
}

export default fp(
  async (fastify: FastifyInstance) => {
    await fastify.register(env, {
      confKey: 'rawConfig',
      schema,
      dotenv: {
        path: './.env',
        debug: process.env.NODE_ENV === 'development',
      },
      data: process.env,
    })

    const rawConfig = fastify.rawConfig

    // Helper function to safely parse JSON with error handling
    const safeJsonParse = <T>(
      value: string | undefined,
      parser: z.ZodType<T>,
      defaultValue: T,
      fieldName: string,
    ): T => {
      if (!value) return defaultValue
      try {
        const result = parser.safeParse(JSON.parse(value))
        if (result.success) return result.data
        fastify.log.warn(
          { issues: result.error.issues },
          `Invalid ${fieldName} config, using default`,
        )
      } catch (error) {
        fastify.log.warn(
          { error },
          `Failed to parse ${fieldName} config, using default`,
        )
      }
      return defaultValue
    }

    const userMappings: UserMappings = safeJsonParse(
      rawConfig.userMappings,
      UserMappingsSchema,
      {},
      'userMappings',
    )

    fastify.decorate('config', { ...rawConfig, userMappings })
  },
  {
    name: 'config',
  },
)
