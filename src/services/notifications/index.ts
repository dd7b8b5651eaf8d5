/**
 * Notification Service Module
 *
 * Discord rendering, routing and delivery for import notifications.
 */

// Channels
export {
  type DiscordChannelDeps,
  type DiscordDmDeps,
  sendChannelMessage,
  sendDirectMessage,
} from './channels/index.js'
// Discord Bot
export { DiscordBotService, type MessageSender } from './discord-bot/index.js'
// Orchestration
export {
  type ImportCompletedDeps,
  type NotificationRoutingConfig,
  resolveChannelId,
  resolveMentionedUsers,
  sendImportCompleted,
} from './orchestration/index.js'
// Templates
export {
  createImportEmbed,
  createImportMessage,
  EPISODE_PREVIEW_LIMIT,
  formatEpisodeLabel,
  formatMediaTitle,
  SOURCE_COLORS,
  SOURCE_NAMES,
  truncate,
} from './templates/discord-embeds.js'
