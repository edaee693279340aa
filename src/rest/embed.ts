import { Routes, type APIEmbed, type APIMessage } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';

export const DEFAULT_EMBED_COLOR = 0x3498db;

export function sendEmbedMessage(
  client: RestClient,
  token: string,
  channelId: string,
  title: string,
  description: string,
  color: number = DEFAULT_EMBED_COLOR,
): Promise<APIMessage> {
  const embed: APIEmbed = { title, description, color };
  return client.post<APIMessage>(Routes.channelMessages(channelId), { token, body: { embeds: [embed] } });
}
