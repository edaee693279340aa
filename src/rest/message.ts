import { Routes, type APIMessage } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';

export function sendMessage(client: RestClient, token: string, channelId: string, content: string): Promise<APIMessage> {
  return client.post<APIMessage>(Routes.channelMessages(channelId), { token, body: { content } });
}

export function editMessage(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  newContent: string,
): Promise<APIMessage> {
  return client.patch<APIMessage>(Routes.channelMessage(channelId, messageId), { token, body: { content: newContent } });
}

export async function deleteMessage(client: RestClient, token: string, channelId: string, messageId: string): Promise<void> {
  await client.delete(Routes.channelMessage(channelId, messageId), { token });
}

export async function pinMessage(client: RestClient, token: string, channelId: string, messageId: string): Promise<void> {
  await client.put(Routes.channelPin(channelId, messageId), { token });
}

export async function unpinMessage(client: RestClient, token: string, channelId: string, messageId: string): Promise<void> {
  await client.delete(Routes.channelPin(channelId, messageId), { token });
}
