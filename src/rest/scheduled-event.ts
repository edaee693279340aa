import {
  Routes,
  type APIGuildScheduledEvent,
  type APIGuildScheduledEventUser,
} from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export function listScheduledEvents(client: RestClient, token: string, guildId: string): Promise<APIGuildScheduledEvent[]> {
  return client.get<APIGuildScheduledEvent[]>(Routes.guildScheduledEvents(guildId), { token });
}

export function createScheduledEvent(
  client: RestClient,
  token: string,
  guildId: string,
  eventSettings: JsonObject,
): Promise<APIGuildScheduledEvent> {
  return client.post<APIGuildScheduledEvent>(Routes.guildScheduledEvents(guildId), { token, body: eventSettings });
}

export function getScheduledEvent(client: RestClient, token: string, guildId: string, eventId: string): Promise<APIGuildScheduledEvent> {
  return client.get<APIGuildScheduledEvent>(Routes.guildScheduledEvent(guildId, eventId), { token });
}

export function modifyScheduledEvent(
  client: RestClient,
  token: string,
  guildId: string,
  eventId: string,
  eventSettings: JsonObject,
): Promise<APIGuildScheduledEvent> {
  return client.patch<APIGuildScheduledEvent>(Routes.guildScheduledEvent(guildId, eventId), { token, body: eventSettings });
}

export async function deleteScheduledEvent(client: RestClient, token: string, guildId: string, eventId: string): Promise<void> {
  await client.delete(Routes.guildScheduledEvent(guildId, eventId), { token });
}

export function getScheduledEventUsers(
  client: RestClient,
  token: string,
  guildId: string,
  eventId: string,
): Promise<APIGuildScheduledEventUser[]> {
  return client.get<APIGuildScheduledEventUser[]>(Routes.guildScheduledEventUsers(guildId, eventId), { token });
}

/** status: numeric GuildScheduledEventStatus (2 = active, 3 = completed, 4 = canceled) */
export function updateScheduledEventStatus(
  client: RestClient,
  token: string,
  guildId: string,
  eventId: string,
  status: number,
): Promise<APIGuildScheduledEvent> {
  return client.patch<APIGuildScheduledEvent>(Routes.guildScheduledEvent(guildId, eventId), { token, body: { status } });
}
