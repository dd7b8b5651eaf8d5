/**
 * Notification Orchestration Module
 *
 * Re-exports orchestration functions for different notification types.
 */

export {
  type ImportCompletedDeps,
  type NotificationRoutingConfig,
  resolveChannelId,
  resolveMentionedUsers,
  sendImportCompleted,
} from './import-completed.js'
