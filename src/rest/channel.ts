/**
 * Channel / reaction / thread endpoints.
 * Message create/edit/delete/pin live in message.ts.
 */

import {
  Routes,
  type APIChannel,
  type APIFollowedChannel,
  type APIInvite,
  type APIMessage,
  type APIThreadList,
  type APIThreadMember,
  type APIUser,
} from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export type ArchivedThreadList = APIThreadList & { has_more: boolean };

/** Reaction emoji go into the path percent-encoded: unicode, or custom as `name:id` */
function encodeEmoji(emoji: string): string {
  return encodeURIComponent(emoji);
}

export function fetchChannelInfo(client: RestClient, token: string, channelId: string): Promise<APIChannel> {
  return client.get<APIChannel>(Routes.channel(channelId), { token });
}

export async function modifyChannel(client: RestClient, token: string, channelId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.channel(channelId), { token, body: settings });
}

export async function deleteChannel(client: RestClient, token: string, channelId: string): Promise<void> {
  await client.delete(Routes.channel(channelId), { token });
}

export function getChannelMessages(client: RestClient, token: string, channelId: string): Promise<APIMessage[]> {
  return client.get<APIMessage[]>(Routes.channelMessages(channelId), { token });
}

export function getChannelMessage(client: RestClient, token: string, channelId: string, messageId: string): Promise<APIMessage> {
  return client.get<APIMessage>(Routes.channelMessage(channelId, messageId), { token });
}

export async function crosspostMessage(client: RestClient, token: string, channelId: string, messageId: string): Promise<void> {
  await client.post(Routes.channelMessageCrosspost(channelId, messageId), { token });
}

// ── Reactions ─────────────────────────────────────

export async function createReaction(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  emoji: string,
): Promise<void> {
  await client.put(Routes.channelMessageOwnReaction(channelId, messageId, encodeEmoji(emoji)), { token });
}

export async function deleteOwnReaction(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  emoji: string,
): Promise<void> {
  await client.delete(Routes.channelMessageOwnReaction(channelId, messageId, encodeEmoji(emoji)), { token });
}

export async function deleteUserReaction(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  emoji: string,
  userId: string,
): Promise<void> {
  await client.delete(Routes.channelMessageUserReaction(channelId, messageId, encodeEmoji(emoji), userId), { token });
}

export function getReactions(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  emoji: string,
): Promise<APIUser[]> {
  return client.get<APIUser[]>(Routes.channelMessageReaction(channelId, messageId, encodeEmoji(emoji)), { token });
}

export async function deleteAllReactions(client: RestClient, token: string, channelId: string, messageId: string): Promise<void> {
  await client.delete(Routes.channelMessageAllReactions(channelId, messageId), { token });
}

export async function deleteAllReactionsForEmoji(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  emoji: string,
): Promise<void> {
  await client.delete(Routes.channelMessageReaction(channelId, messageId, encodeEmoji(emoji)), { token });
}

// ── Messages (bulk) / permissions / invites ───────

export async function bulkDeleteMessages(client: RestClient, token: string, channelId: string, messageIds: string[]): Promise<void> {
  await client.post(Routes.channelBulkDelete(channelId), { token, body: { messages: messageIds } });
}

export async function editChannelPermissions(
  client: RestClient,
  token: string,
  channelId: string,
  overwriteId: string,
  permissions: JsonObject,
): Promise<void> {
  await client.put(Routes.channelPermission(channelId, overwriteId), { token, body: permissions });
}

export async function deleteChannelPermission(client: RestClient, token: string, channelId: string, overwriteId: string): Promise<void> {
  await client.delete(Routes.channelPermission(channelId, overwriteId), { token });
}

export function getChannelInvites(client: RestClient, token: string, channelId: string): Promise<APIInvite[]> {
  return client.get<APIInvite[]>(Routes.channelInvites(channelId), { token });
}

export function createChannelInvite(client: RestClient, token: string, channelId: string, inviteSettings: JsonObject): Promise<APIInvite> {
  return client.post<APIInvite>(Routes.channelInvites(channelId), { token, body: inviteSettings });
}

export function followAnnouncementChannel(
  client: RestClient,
  token: string,
  channelId: string,
  webhookChannelId: string,
): Promise<APIFollowedChannel> {
  return client.post<APIFollowedChannel>(Routes.channelFollowers(channelId), {
    token,
    body: { webhook_channel_id: webhookChannelId },
  });
}

export async function triggerTypingIndicator(client: RestClient, token: string, channelId: string): Promise<void> {
  await client.post(Routes.channelTyping(channelId), { token });
}

export function getPinnedMessages(client: RestClient, token: string, channelId: string): Promise<APIMessage[]> {
  return client.get<APIMessage[]>(Routes.channelPins(channelId), { token });
}

// ── Group DM ──────────────────────────────────────

export async function groupDmAddRecipient(
  client: RestClient,
  token: string,
  channelId: string,
  userId: string,
  accessToken: string,
  nick: string,
): Promise<void> {
  await client.put(Routes.channelRecipient(channelId, userId), {
    token,
    body: { access_token: accessToken, nick },
  });
}

export async function groupDmRemoveRecipient(client: RestClient, token: string, channelId: string, userId: string): Promise<void> {
  await client.delete(Routes.channelRecipient(channelId, userId), { token });
}

// ── Threads ───────────────────────────────────────

export function startThreadFromMessage(
  client: RestClient,
  token: string,
  channelId: string,
  messageId: string,
  threadSettings: JsonObject,
): Promise<APIChannel> {
  return client.post<APIChannel>(Routes.threads(channelId, messageId), { token, body: threadSettings });
}

export function startThreadWithoutMessage(
  client: RestClient,
  token: string,
  channelId: string,
  threadSettings: JsonObject,
): Promise<APIChannel> {
  return client.post<APIChannel>(Routes.threads(channelId), { token, body: threadSettings });
}

export async function joinThread(client: RestClient, token: string, channelId: string): Promise<void> {
  await client.put(Routes.threadMembers(channelId, '@me'), { token });
}

export async function addThreadMember(client: RestClient, token: string, channelId: string, userId: string): Promise<void> {
  await client.put(Routes.threadMembers(channelId, userId), { token });
}

export async function removeThreadMember(client: RestClient, token: string, channelId: string, userId: string): Promise<void> {
  await client.delete(Routes.threadMembers(channelId, userId), { token });
}

export function getThreadMember(client: RestClient, token: string, channelId: string, userId: string): Promise<APIThreadMember> {
  return client.get<APIThreadMember>(Routes.threadMembers(channelId, userId), { token });
}

export function listThreadMembers(client: RestClient, token: string, channelId: string): Promise<APIThreadMember[]> {
  return client.get<APIThreadMember[]>(Routes.threadMembers(channelId), { token });
}

export function listPublicArchivedThreads(client: RestClient, token: string, channelId: string): Promise<ArchivedThreadList> {
  return client.get<ArchivedThreadList>(Routes.channelThreads(channelId, 'public'), { token });
}

export function listPrivateArchivedThreads(client: RestClient, token: string, channelId: string): Promise<ArchivedThreadList> {
  return client.get<ArchivedThreadList>(Routes.channelThreads(channelId, 'private'), { token });
}

export function listJoinedPrivateArchivedThreads(client: RestClient, token: string, channelId: string): Promise<ArchivedThreadList> {
  return client.get<ArchivedThreadList>(Routes.channelJoinedArchivedThreads(channelId), { token });
}
