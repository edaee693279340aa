/**
 * GatewayHost - discord.js 게이트웨이 위의 호스트 루프
 * messageCreate → CommandRegistry.dispatch(rest, token, channelId, content)
 * REST 호출은 핸들러가 RestClient(discord.js REST 래퍼)로 직접 한다.
 */

import { Client, Events, GatewayIntentBits, type Message } from 'discord.js';
import type { CommandRegistry } from '../command/registry.ts';
import type { RestClient } from '../rest/client.ts';
import { sendErrorMessage } from '../rest/error.ts';
import type { GatewayHostConfig, IncomingMessage, MessageFilter } from './types.ts';

const DEFAULT_INTENTS = [
  GatewayIntentBits.Guilds,
  GatewayIntentBits.GuildMessages,
  GatewayIntentBits.MessageContent,
  GatewayIntentBits.DirectMessages,
];

export function toIncomingMessage(msg: Message): IncomingMessage {
  return {
    id: msg.id,
    content: msg.content,
    author: {
      id: msg.author.id,
      bot: msg.author.bot,
    },
    channelId: msg.channelId,
    parentChannelId: msg.channel.isThread() ? msg.channel.parentId : null,
  };
}

/** Bot authors never; owner/channel restrictions only when configured */
export function shouldDispatch(msg: IncomingMessage, filter: MessageFilter): boolean {
  if (msg.author.bot) return false;
  if (filter.ownerId && msg.author.id !== filter.ownerId) return false;
  if (filter.channelId) {
    const allowed = msg.channelId === filter.channelId || msg.parentChannelId === filter.channelId;
    if (!allowed) return false;
  }
  return true;
}

export class GatewayHost {
  private client: Client;
  private config: GatewayHostConfig;
  private registry: CommandRegistry;
  private rest: RestClient;

  constructor(config: GatewayHostConfig, registry: CommandRegistry, rest: RestClient) {
    this.config = config;
    this.registry = registry;
    this.rest = rest;
    this.client = new Client({ intents: config.intents ?? DEFAULT_INTENTS });

    this.client.on(Events.MessageCreate, (msg: Message) => {
      const data = toIncomingMessage(msg);
      if (!shouldDispatch(data, this.config)) return;
      this.handleMessage(data).catch((err) =>
        console.error('[Gateway] failed to report command error:', err),
      );
    });
  }

  /** Dispatch one message; a failing command is logged (and optionally reported), never rethrown */
  async handleMessage(msg: IncomingMessage): Promise<void> {
    try {
      await this.registry.dispatch(this.rest, this.config.token, msg.channelId, msg.content);
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[Gateway] command failed in ${msg.channelId}: ${message}`);
      if (this.config.reportErrors) {
        await sendErrorMessage(this.rest, this.config.token, msg.channelId, message);
      }
    }
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.client.once(Events.ClientReady, (ready) => {
        console.log(`[Gateway] Client ready as ${ready.user.tag}`);
        resolve();
      });
      this.client.login(this.config.token).catch(reject);
    });
  }

  async disconnect(): Promise<void> {
    await this.client.destroy();
  }

  get isReady(): boolean {
    return this.client.isReady();
  }
}
