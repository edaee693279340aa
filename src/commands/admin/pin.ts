import { parseArguments } from '../../command/arguments.ts';
import type { CommandHandler } from '../../command/registry.ts';
import type { RestClient } from '../../rest/client.ts';
import { pinMessage, sendMessage } from '../../rest/message.ts';

/** `!pin <messageId>`: pins a message in the channel the command came from */
export class Pin implements CommandHandler {
  async execute(client: RestClient, token: string, channelId: string, args: string): Promise<void> {
    const [messageId] = parseArguments(args);
    if (!messageId) {
      await sendMessage(client, token, channelId, 'Usage: !pin <messageId>');
      return;
    }
    await pinMessage(client, token, channelId, messageId);
  }
}
