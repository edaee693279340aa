import { Routes, type APISticker, type APIStickerPack } from 'discord-api-types/v10';
import type { RestClient } from './client.ts';
import type { JsonObject } from './types.ts';

export type StickerPackList = { sticker_packs: APIStickerPack[] };

export function getSticker(client: RestClient, token: string, stickerId: string): Promise<APISticker> {
  return client.get<APISticker>(Routes.sticker(stickerId), { token });
}

export function listStickerPacks(client: RestClient, token: string): Promise<StickerPackList> {
  return client.get<StickerPackList>(Routes.stickerPacks(), { token });
}

export function listGuildStickers(client: RestClient, token: string, guildId: string): Promise<APISticker[]> {
  return client.get<APISticker[]>(Routes.guildStickers(guildId), { token });
}

export function getGuildSticker(client: RestClient, token: string, guildId: string, stickerId: string): Promise<APISticker> {
  return client.get<APISticker>(Routes.guildSticker(guildId, stickerId), { token });
}

// Sent as JSON; the file itself must already be referenced by the payload.
export function createGuildSticker(client: RestClient, token: string, guildId: string, stickerData: JsonObject): Promise<APISticker> {
  return client.post<APISticker>(Routes.guildStickers(guildId), { token, body: stickerData });
}

export function modifyGuildSticker(
  client: RestClient,
  token: string,
  guildId: string,
  stickerId: string,
  stickerData: JsonObject,
): Promise<APISticker> {
  return client.patch<APISticker>(Routes.guildSticker(guildId, stickerId), { token, body: stickerData });
}

export async function deleteGuildSticker(client: RestClient, token: string, guildId: string, stickerId: string): Promise<void> {
  await client.delete(Routes.guildSticker(guildId, stickerId), { token });
}
