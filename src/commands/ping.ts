import type { CommandHandler } from '../command/registry.ts';
import type { RestClient } from '../rest/client.ts';
import { sendMessage } from '../rest/message.ts';

export class Ping implements CommandHandler {
  async execute(client: RestClient, token: string, channelId: string): Promise<void> {
    await sendMessage(client, token, channelId, 'Pong!');
  }
}
