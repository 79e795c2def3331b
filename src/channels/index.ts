export type { ChatChannel, ChatGateway, ChatMessage, MentionHandler } from './channel.js';
export { ChannelError } from './channel.js';
export { DiscordGateway } from './discord.js';
export type { DiscordConfig } from './discord.js';
