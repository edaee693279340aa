import type { RestClient } from './client.ts';
import { sendMessage } from './message.ts';

/** 채널에 `Error: <message>` 형태로 에러를 알린다 */
export async function sendErrorMessage(client: RestClient, token: string, channelId: string, errorMessage: string): Promise<void> {
  await sendMessage(client, token, channelId, `Error: ${errorMessage}`);
}
