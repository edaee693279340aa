import type { CommandHandler } from '../command/registry.ts';
import type { RestClient } from '../rest/client.ts';
import { sendMessage } from '../rest/message.ts';

export class Echo implements CommandHandler {
  async execute(client: RestClient, token: string, channelId: string, args: string): Promise<void> {
    const text = args.trim();
    await sendMessage(client, token, channelId, text || 'Usage: !echo <text>');
  }
}
