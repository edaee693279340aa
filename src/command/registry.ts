import type { RestClient } from '../rest/client.ts';

/**
 * 채팅 명령 하나의 동작.
 * 상태 없이 레지스트리와 진행 중인 모든 dispatch가 같은 인스턴스를 공유한다.
 * 실패는 reject로 알린다 (프로세스를 죽이지 않는다).
 */
export interface CommandHandler {
  execute(client: RestClient, token: string, channelId: string, args: string): Promise<void>;
}

/** Zero-arg constructor shape used by the directory loader and generated modules */
export type CommandHandlerClass = new () => CommandHandler;

export type ParsedCommand = {
  name: string;
  args: string;
};

/**
 * Split raw text at the first whitespace character.
 * `"!echo hello world"` → `{ name: '!echo', args: 'hello world' }`; no remainder → `args: ''`.
 */
export function parseCommand(raw: string): ParsedCommand {
  const match = /\s/.exec(raw);
  if (!match) return { name: raw, args: '' };
  return {
    name: raw.slice(0, match.index),
    args: raw.slice(match.index + 1),
  };
}

export class CommandRegistry {
  private commands = new Map<string, CommandHandler>();

  /** Insert or replace. Last registration for a name wins. */
  register(name: string, handler: CommandHandler): void {
    this.commands.set(name, handler);
  }

  resolve(name: string): CommandHandler | null {
    return this.commands.get(name) ?? null;
  }

  has(name: string): boolean {
    return this.commands.has(name);
  }

  names(): string[] {
    return Array.from(this.commands.keys());
  }

  get size(): number {
    return this.commands.size;
  }

  /**
   * Route one inbound message to its handler.
   * A message that names no registered command is logged and resolves.
   * Handler errors reach the caller unchanged.
   */
  async dispatch(client: RestClient, token: string, channelId: string, raw: string): Promise<void> {
    const { name, args } = parseCommand(raw);
    // lookup happens before the first await, so a concurrent register() is seen whole or not at all
    const handler = this.commands.get(name);
    if (!handler) {
      console.log(`[CommandRegistry] Command not found: ${name}`);
      return;
    }
    await handler.execute(client, token, channelId, args);
  }
}
