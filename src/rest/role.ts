import { Routes, type APIRole } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';

export async function addRole(client: RestClient, token: string, guildId: string, userId: string, roleId: string): Promise<void> {
  await client.put(Routes.guildMemberRole(guildId, userId, roleId), { token });
}

export async function removeRole(client: RestClient, token: string, guildId: string, userId: string, roleId: string): Promise<void> {
  await client.delete(Routes.guildMemberRole(guildId, userId, roleId), { token });
}

/**
 * GET /guilds/{id}/roles/{id} 는 없으므로 역할 목록에서 찾는다.
 * 없으면 null.
 */
export async function fetchRoleInfo(client: RestClient, token: string, guildId: string, roleId: string): Promise<APIRole | null> {
  const roles = await client.get<APIRole[]>(Routes.guildRoles(guildId), { token });
  return roles.find((role) => role.id === roleId) ?? null;
}
