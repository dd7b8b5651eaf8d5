export {
  type DiscordChannelDeps,
  sendChannelMessage,
} from './discord-channel.js'
export { type DiscordDmDeps, sendDirectMessage } from './discord-dm.js'
