export { RestClient } from './client.ts';
export { DiscordAPIError, HTTPError } from 'discord.js';
export type * from './types.ts';
export * from './message.ts';
export * from './channel.ts';
export * from './guild.ts';
export * from './scheduled-event.ts';
export * from './user.ts';
export * from './role.ts';
export * from './sticker.ts';
export * from './webhook.ts';
export * from './poll.ts';
export * from './permissions.ts';
export * from './embed.ts';
export * from './error.ts';
