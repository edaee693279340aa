import type { CommandHandler } from '../command/registry.ts';
import type { RestClient } from '../rest/client.ts';
import { sendEmbedMessage } from '../rest/embed.ts';
import { sendMessage } from '../rest/message.ts';

/** `!embed <title> | <description>` */
export class Embed implements CommandHandler {
  async execute(client: RestClient, token: string, channelId: string, args: string): Promise<void> {
    const sep = args.indexOf('|');
    const title = (sep === -1 ? args : args.slice(0, sep)).trim();
    const description = sep === -1 ? '' : args.slice(sep + 1).trim();
    if (!title) {
      await sendMessage(client, token, channelId, 'Usage: !embed <title> | <description>');
      return;
    }
    await sendEmbedMessage(client, token, channelId, title, description);
  }
}
