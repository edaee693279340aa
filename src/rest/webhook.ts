/**
 * Webhook 엔드포인트.
 * `*WithToken` 및 execute 계열은 URL의 webhook 토큰으로 인증하므로 Authorization 헤더를 보내지 않는다.
 */

import { Routes, type APIMessage, type APIWebhook } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export function createWebhook(client: RestClient, token: string, channelId: string, webhookSettings: JsonObject): Promise<APIWebhook> {
  return client.post<APIWebhook>(Routes.channelWebhooks(channelId), { token, body: webhookSettings });
}

export function getChannelWebhooks(client: RestClient, token: string, channelId: string): Promise<APIWebhook[]> {
  return client.get<APIWebhook[]>(Routes.channelWebhooks(channelId), { token });
}

export function getGuildWebhooks(client: RestClient, token: string, guildId: string): Promise<APIWebhook[]> {
  return client.get<APIWebhook[]>(Routes.guildWebhooks(guildId), { token });
}

export function getWebhook(client: RestClient, token: string, webhookId: string): Promise<APIWebhook> {
  return client.get<APIWebhook>(Routes.webhook(webhookId), { token });
}

export function getWebhookWithToken(client: RestClient, webhookId: string, webhookToken: string): Promise<APIWebhook> {
  return client.get<APIWebhook>(Routes.webhook(webhookId, webhookToken));
}

export function modifyWebhook(client: RestClient, token: string, webhookId: string, settings: JsonObject): Promise<APIWebhook> {
  return client.patch<APIWebhook>(Routes.webhook(webhookId), { token, body: settings });
}

export function modifyWebhookWithToken(
  client: RestClient,
  webhookId: string,
  webhookToken: string,
  settings: JsonObject,
): Promise<APIWebhook> {
  return client.patch<APIWebhook>(Routes.webhook(webhookId, webhookToken), { body: settings });
}

export async function deleteWebhook(client: RestClient, token: string, webhookId: string): Promise<void> {
  await client.delete(Routes.webhook(webhookId), { token });
}

export async function deleteWebhookWithToken(client: RestClient, webhookId: string, webhookToken: string): Promise<void> {
  await client.delete(Routes.webhook(webhookId, webhookToken));
}

export async function executeWebhook(client: RestClient, webhookId: string, webhookToken: string, payload: JsonObject): Promise<void> {
  await client.post(Routes.webhook(webhookId, webhookToken), { body: payload });
}

export async function executeSlackCompatibleWebhook(
  client: RestClient,
  webhookId: string,
  webhookToken: string,
  payload: JsonObject,
): Promise<void> {
  await client.post(Routes.webhookPlatform(webhookId, webhookToken, 'slack'), { body: payload });
}

export async function executeGithubCompatibleWebhook(
  client: RestClient,
  webhookId: string,
  webhookToken: string,
  payload: JsonObject,
): Promise<void> {
  await client.post(Routes.webhookPlatform(webhookId, webhookToken, 'github'), { body: payload });
}

export function getWebhookMessage(client: RestClient, webhookId: string, webhookToken: string, messageId: string): Promise<APIMessage> {
  return client.get<APIMessage>(Routes.webhookMessage(webhookId, webhookToken, messageId));
}

export function editWebhookMessage(
  client: RestClient,
  webhookId: string,
  webhookToken: string,
  messageId: string,
  newContent: JsonObject,
): Promise<APIMessage> {
  return client.patch<APIMessage>(Routes.webhookMessage(webhookId, webhookToken, messageId), { body: newContent });
}

export async function deleteWebhookMessage(client: RestClient, webhookId: string, webhookToken: string, messageId: string): Promise<void> {
  await client.delete(Routes.webhookMessage(webhookId, webhookToken, messageId));
}
