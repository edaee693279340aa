import { Routes, type APIGuildMember } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';

type MemberWithPermissions = APIGuildMember & { permissions?: string };

/**
 * Looks the member up and tests `permission` against its `permissions` field.
 * Plain guild-member responses carry no such field, so the result is false there.
 */
export async function checkPermission(
  client: RestClient,
  token: string,
  guildId: string,
  userId: string,
  permission: string,
): Promise<boolean> {
  const member = await client.get<MemberWithPermissions>(Routes.guildMember(guildId, userId), { token });
  if (typeof member.permissions !== 'string') return false;
  return member.permissions.includes(permission);
}
