import {
  Routes,
  type APIBan,
  type APIChannel,
  type APIGuild,
  type APIGuildIntegration,
  type APIGuildMember,
  type APIGuildOnboarding,
  type APIGuildPreview,
  type APIGuildWelcomeScreen,
  type APIGuildWidget,
  type APIGuildWidgetSettings,
  type APIInvite,
  type APIRole,
  type APIThreadList,
  type APIVoiceRegion,
} from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export type GuildVanityUrl = { code: string | null; uses: number };
export type GuildPruneResult = { pruned: number | null };

export function createGuild(client: RestClient, token: string, guildSettings: JsonObject): Promise<APIGuild> {
  return client.post<APIGuild>(Routes.guilds(), { token, body: guildSettings });
}

export function getGuild(client: RestClient, token: string, guildId: string): Promise<APIGuild> {
  return client.get<APIGuild>(Routes.guild(guildId), { token });
}

export function getGuildPreview(client: RestClient, token: string, guildId: string): Promise<APIGuildPreview> {
  return client.get<APIGuildPreview>(Routes.guildPreview(guildId), { token });
}

export async function modifyGuild(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guild(guildId), { token, body: settings });
}

export async function deleteGuild(client: RestClient, token: string, guildId: string): Promise<void> {
  await client.delete(Routes.guild(guildId), { token });
}

// ── Channels / threads ────────────────────────────

export function getGuildChannels(client: RestClient, token: string, guildId: string): Promise<APIChannel[]> {
  return client.get<APIChannel[]>(Routes.guildChannels(guildId), { token });
}

export function createGuildChannel(client: RestClient, token: string, guildId: string, channelSettings: JsonObject): Promise<APIChannel> {
  return client.post<APIChannel>(Routes.guildChannels(guildId), { token, body: channelSettings });
}

/** positions: `[{ id, position, ... }]` */
export async function modifyGuildChannelPositions(client: RestClient, token: string, guildId: string, positions: JsonObject[]): Promise<void> {
  await client.patch(Routes.guildChannels(guildId), { token, body: positions });
}

export function listActiveGuildThreads(client: RestClient, token: string, guildId: string): Promise<APIThreadList> {
  return client.get<APIThreadList>(Routes.guildActiveThreads(guildId), { token });
}

// ── Members ───────────────────────────────────────

export function getGuildMember(client: RestClient, token: string, guildId: string, userId: string): Promise<APIGuildMember> {
  return client.get<APIGuildMember>(Routes.guildMember(guildId, userId), { token });
}

export function listGuildMembers(client: RestClient, token: string, guildId: string): Promise<APIGuildMember[]> {
  return client.get<APIGuildMember[]>(Routes.guildMembers(guildId), { token });
}

export function searchGuildMembers(client: RestClient, token: string, guildId: string, query: string): Promise<APIGuildMember[]> {
  return client.get<APIGuildMember[]>(Routes.guildMembersSearch(guildId), { token, query: { query } });
}

/** Needs an OAuth2 access_token for the user in memberSettings. Resolves undefined when already a member (204). */
export function addGuildMember(
  client: RestClient,
  token: string,
  guildId: string,
  userId: string,
  memberSettings: JsonObject,
): Promise<APIGuildMember | undefined> {
  return client.put<APIGuildMember | undefined>(Routes.guildMember(guildId, userId), { token, body: memberSettings });
}

export async function modifyGuildMember(client: RestClient, token: string, guildId: string, userId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildMember(guildId, userId), { token, body: settings });
}

export async function modifyCurrentMember(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildMember(guildId, '@me'), { token, body: settings });
}

export async function modifyCurrentUserNick(client: RestClient, token: string, guildId: string, nick: string): Promise<void> {
  await client.patch(Routes.guildCurrentMemberNickname(guildId), { token, body: { nick } });
}

export async function addGuildMemberRole(client: RestClient, token: string, guildId: string, userId: string, roleId: string): Promise<void> {
  await client.put(Routes.guildMemberRole(guildId, userId, roleId), { token });
}

export async function removeGuildMemberRole(client: RestClient, token: string, guildId: string, userId: string, roleId: string): Promise<void> {
  await client.delete(Routes.guildMemberRole(guildId, userId, roleId), { token });
}

export async function removeGuildMember(client: RestClient, token: string, guildId: string, userId: string): Promise<void> {
  await client.delete(Routes.guildMember(guildId, userId), { token });
}

// ── Bans ──────────────────────────────────────────

export function getGuildBans(client: RestClient, token: string, guildId: string): Promise<APIBan[]> {
  return client.get<APIBan[]>(Routes.guildBans(guildId), { token });
}

export function getGuildBan(client: RestClient, token: string, guildId: string, userId: string): Promise<APIBan> {
  return client.get<APIBan>(Routes.guildBan(guildId, userId), { token });
}

export async function createGuildBan(client: RestClient, token: string, guildId: string, userId: string, banSettings: JsonObject): Promise<void> {
  await client.put(Routes.guildBan(guildId, userId), { token, body: banSettings });
}

export async function removeGuildBan(client: RestClient, token: string, guildId: string, userId: string): Promise<void> {
  await client.delete(Routes.guildBan(guildId, userId), { token });
}

export async function bulkGuildBan(client: RestClient, token: string, guildId: string, userIds: string[]): Promise<void> {
  await client.post(Routes.guildBulkBan(guildId), { token, body: { user_ids: userIds } });
}

// ── Roles ─────────────────────────────────────────

export function getGuildRoles(client: RestClient, token: string, guildId: string): Promise<APIRole[]> {
  return client.get<APIRole[]>(Routes.guildRoles(guildId), { token });
}

export function createGuildRole(client: RestClient, token: string, guildId: string, roleSettings: JsonObject): Promise<APIRole> {
  return client.post<APIRole>(Routes.guildRoles(guildId), { token, body: roleSettings });
}

export async function modifyGuildRolePositions(client: RestClient, token: string, guildId: string, positions: JsonObject[]): Promise<void> {
  await client.patch(Routes.guildRoles(guildId), { token, body: positions });
}

export async function modifyGuildRole(client: RestClient, token: string, guildId: string, roleId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildRole(guildId, roleId), { token, body: settings });
}

export async function modifyGuildMfaLevel(client: RestClient, token: string, guildId: string, level: number): Promise<void> {
  await client.post(Routes.guildMFA(guildId), { token, body: { level } });
}

export async function deleteGuildRole(client: RestClient, token: string, guildId: string, roleId: string): Promise<void> {
  await client.delete(Routes.guildRole(guildId, roleId), { token });
}

// ── Prune / regions / invites / integrations ──────

export function getGuildPruneCount(client: RestClient, token: string, guildId: string, days: number): Promise<GuildPruneResult> {
  return client.get<GuildPruneResult>(Routes.guildPrune(guildId), { token, query: { days } });
}

export function beginGuildPrune(client: RestClient, token: string, guildId: string, days: number): Promise<GuildPruneResult> {
  return client.post<GuildPruneResult>(Routes.guildPrune(guildId), { token, body: { days } });
}

export function getGuildVoiceRegions(client: RestClient, token: string, guildId: string): Promise<APIVoiceRegion[]> {
  return client.get<APIVoiceRegion[]>(Routes.guildVoiceRegions(guildId), { token });
}

export function getGuildInvites(client: RestClient, token: string, guildId: string): Promise<APIInvite[]> {
  return client.get<APIInvite[]>(Routes.guildInvites(guildId), { token });
}

export function getGuildIntegrations(client: RestClient, token: string, guildId: string): Promise<APIGuildIntegration[]> {
  return client.get<APIGuildIntegration[]>(Routes.guildIntegrations(guildId), { token });
}

export async function deleteGuildIntegration(client: RestClient, token: string, guildId: string, integrationId: string): Promise<void> {
  await client.delete(Routes.guildIntegration(guildId, integrationId), { token });
}

// ── Widget / vanity / welcome screen / onboarding ─

export function getGuildWidgetSettings(client: RestClient, token: string, guildId: string): Promise<APIGuildWidgetSettings> {
  return client.get<APIGuildWidgetSettings>(Routes.guildWidgetSettings(guildId), { token });
}

export async function modifyGuildWidgetSettings(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildWidgetSettings(guildId), { token, body: settings });
}

export function getGuildWidget(client: RestClient, token: string, guildId: string): Promise<APIGuildWidget> {
  return client.get<APIGuildWidget>(Routes.guildWidgetJSON(guildId), { token });
}

export function getGuildVanityUrl(client: RestClient, token: string, guildId: string): Promise<GuildVanityUrl> {
  return client.get<GuildVanityUrl>(Routes.guildVanityUrl(guildId), { token });
}

/** PNG bytes */
export function getGuildWidgetImage(client: RestClient, token: string, guildId: string): Promise<ArrayBuffer> {
  return client.requestBinary('GET', Routes.guildWidgetImage(guildId), { token });
}

export function getGuildWelcomeScreen(client: RestClient, token: string, guildId: string): Promise<APIGuildWelcomeScreen> {
  return client.get<APIGuildWelcomeScreen>(Routes.guildWelcomeScreen(guildId), { token });
}

export async function modifyGuildWelcomeScreen(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildWelcomeScreen(guildId), { token, body: settings });
}

export function getGuildOnboarding(client: RestClient, token: string, guildId: string): Promise<APIGuildOnboarding> {
  return client.get<APIGuildOnboarding>(Routes.guildOnboarding(guildId), { token });
}

export async function modifyGuildOnboarding(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.put(Routes.guildOnboarding(guildId), { token, body: settings });
}

// ── Voice state ───────────────────────────────────

export async function modifyCurrentUserVoiceState(client: RestClient, token: string, guildId: string, settings: JsonObject): Promise<void> {
  await client.patch(Routes.guildVoiceState(guildId, '@me'), { token, body: settings });
}

export async function modifyUserVoiceState(
  client: RestClient,
  token: string,
  guildId: string,
  userId: string,
  settings: JsonObject,
): Promise<void> {
  await client.patch(Routes.guildVoiceState(guildId, userId), { token, body: settings });
}
