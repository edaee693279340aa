import {
  Routes,
  type APIApplicationRoleConnection,
  type APIConnection,
  type APIDMChannel,
  type APIGroupDMChannel,
  type APIGuildMember,
  type APIUser,
  type RESTAPIPartialCurrentUserGuild,
} from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export function getCurrentUser(client: RestClient, token: string): Promise<APIUser> {
  return client.get<APIUser>(Routes.user('@me'), { token });
}

export function getUser(client: RestClient, token: string, userId: string): Promise<APIUser> {
  return client.get<APIUser>(Routes.user(userId), { token });
}

export function modifyCurrentUser(client: RestClient, token: string, settings: JsonObject): Promise<APIUser> {
  return client.patch<APIUser>(Routes.user('@me'), { token, body: settings });
}

export function getCurrentUserGuilds(client: RestClient, token: string): Promise<RESTAPIPartialCurrentUserGuild[]> {
  return client.get<RESTAPIPartialCurrentUserGuild[]>(Routes.userGuilds(), { token });
}

export function getCurrentUserGuildMember(client: RestClient, token: string, guildId: string): Promise<APIGuildMember> {
  return client.get<APIGuildMember>(Routes.userGuildMember(guildId), { token });
}

export async function leaveGuild(client: RestClient, token: string, guildId: string): Promise<void> {
  await client.delete(Routes.userGuild(guildId), { token });
}

export function createDm(client: RestClient, token: string, recipientId: string): Promise<APIDMChannel> {
  return client.post<APIDMChannel>(Routes.userChannels(), { token, body: { recipient_id: recipientId } });
}

/** nicks: user id → nickname */
export function createGroupDm(
  client: RestClient,
  token: string,
  accessTokens: string[],
  nicks: Record<string, string>,
): Promise<APIGroupDMChannel> {
  return client.post<APIGroupDMChannel>(Routes.userChannels(), {
    token,
    body: { access_tokens: accessTokens, nicks },
  });
}

export function getCurrentUserConnections(client: RestClient, token: string): Promise<APIConnection[]> {
  return client.get<APIConnection[]>(Routes.userConnections(), { token });
}

export function getCurrentUserApplicationRoleConnection(
  client: RestClient,
  token: string,
  applicationId: string,
): Promise<APIApplicationRoleConnection> {
  return client.get<APIApplicationRoleConnection>(Routes.userApplicationRoleConnection(applicationId), { token });
}

export function updateCurrentUserApplicationRoleConnection(
  client: RestClient,
  token: string,
  applicationId: string,
  roleConnection: JsonObject,
): Promise<APIApplicationRoleConnection> {
  return client.put<APIApplicationRoleConnection>(Routes.userApplicationRoleConnection(applicationId), {
    token,
    body: roleConnection,
  });
}

export async function kickUser(client: RestClient, token: string, guildId: string, userId: string, reason?: string): Promise<void> {
  await client.delete(Routes.guildMember(guildId, userId), { token, reason });
}

export async function banUser(
  client: RestClient,
  token: string,
  guildId: string,
  userId: string,
  deleteMessageDays: number,
  reason: string,
): Promise<void> {
  await client.put(Routes.guildBan(guildId, userId), {
    token,
    body: { delete_message_days: deleteMessageDays, reason },
  });
}
