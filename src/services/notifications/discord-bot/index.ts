export { DiscordBotService, type MessageSender } from './bot.service.js'
export { type EventRouterDeps, setupBotEventHandlers } from './event-router.js'
