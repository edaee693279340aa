import { afterEach, describe, expect, test, vi } from 'vitest';
import { RestClient } from '../rest/client.ts';
import { CommandRegistry, parseCommand, type CommandHandler } from './registry.ts';

type Call = { channelId: string; args: string; token: string };

function recordingHandler(calls: Call[]): CommandHandler {
  return {
    async execute(_client, token, channelId, args) {
      calls.push({ channelId, args, token });
    },
  };
}

function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

const client = new RestClient({ makeRequest: async () => new Response(null, { status: 204 }) });

afterEach(() => {
  vi.restoreAllMocks();
});

describe('parseCommand', () => {
  test('splits at the first whitespace only', () => {
    expect(parseCommand('!echo hello world')).toEqual({ name: '!echo', args: 'hello world' });
  });

  test('bare command has empty args', () => {
    expect(parseCommand('!ping')).toEqual({ name: '!ping', args: '' });
  });

  test('trailing space gives empty args', () => {
    expect(parseCommand('!ping ')).toEqual({ name: '!ping', args: '' });
  });

  test('splits on tabs and newlines too', () => {
    expect(parseCommand('!echo\tline one\nline two')).toEqual({ name: '!echo', args: 'line one\nline two' });
  });

  test('keeps extra spacing after the separator', () => {
    expect(parseCommand('!echo  spaced')).toEqual({ name: '!echo', args: ' spaced' });
  });
});

describe('CommandRegistry', () => {
  test('register and resolve by name', () => {
    const reg = new CommandRegistry();
    const handler = recordingHandler([]);
    reg.register('!ping', handler);
    expect(reg.resolve('!ping')).toBe(handler);
    expect(reg.has('!ping')).toBe(true);
    expect(reg.size).toBe(1);
  });

  test('resolve returns null for unknown', () => {
    const reg = new CommandRegistry();
    reg.register('!ping', recordingHandler([]));
    expect(reg.resolve('!pong')).toBeNull();
  });

  test('names lists every registered command', () => {
    const reg = new CommandRegistry();
    reg.register('!ping', recordingHandler([]));
    reg.register('!echo', recordingHandler([]));
    reg.register('!pin', recordingHandler([]));
    expect(reg.names()).toEqual(['!ping', '!echo', '!pin']);
  });

  test('dispatch passes the argument remainder exactly', async () => {
    const calls: Call[] = [];
    const reg = new CommandRegistry();
    reg.register('!echo', recordingHandler(calls));

    await reg.dispatch(client, 'test-token', 'channel-1', '!echo hello world');

    expect(calls).toEqual([{ channelId: 'channel-1', args: 'hello world', token: 'test-token' }]);
  });

  test('dispatch of a bare command passes empty args', async () => {
    const calls: Call[] = [];
    const reg = new CommandRegistry();
    reg.register('!ping', recordingHandler(calls));

    await reg.dispatch(client, 'test-token', 'channel-1', '!ping');

    expect(calls).toHaveLength(1);
    expect(calls[0]?.args).toBe('');
  });

  test('re-registering replaces the previous handler', async () => {
    const first: Call[] = [];
    const second: Call[] = [];
    const reg = new CommandRegistry();
    reg.register('!ping', recordingHandler(first));
    reg.register('!ping', recordingHandler(second));

    await reg.dispatch(client, 'test-token', 'c1', '!ping');

    expect(first).toHaveLength(0);
    expect(second).toHaveLength(1);
    expect(reg.size).toBe(1);
  });

  test('unknown command resolves without invoking anything and logs once', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    const calls: Call[] = [];
    const reg = new CommandRegistry();
    reg.register('!ping', recordingHandler(calls));

    await expect(reg.dispatch(client, 'test-token', 'c1', '!pong')).resolves.toBeUndefined();

    expect(calls).toHaveLength(0);
    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[CommandRegistry] Command not found: !pong');
  });

  test('plain chat text is not an error', async () => {
    vi.spyOn(console, 'log').mockImplementation(() => {});
    const reg = new CommandRegistry();
    await expect(reg.dispatch(client, 'test-token', 'c1', 'hello there')).resolves.toBeUndefined();
  });

  test('handler errors propagate unchanged', async () => {
    const failure = new Error('boom');
    const reg = new CommandRegistry();
    reg.register('!fail', {
      async execute() {
        throw failure;
      },
    });

    await expect(reg.dispatch(client, 'test-token', 'c1', '!fail now')).rejects.toBe(failure);
  });

  test('handler receives the shared client instance', async () => {
    let received: RestClient | null = null;
    const reg = new CommandRegistry();
    reg.register('!who', {
      async execute(c) {
        received = c;
      },
    });

    await reg.dispatch(client, 'test-token', 'c1', '!who');
    expect(received).toBe(client);
  });

  test('concurrent dispatches keep their own arguments', async () => {
    const seen: string[] = [];
    const reg = new CommandRegistry();
    reg.register('!slow', {
      async execute(_c, _t, channelId, args) {
        await sleep(20);
        seen.push(`${channelId}:${args}`);
      },
    });
    reg.register('!fast', {
      async execute(_c, _t, channelId, args) {
        seen.push(`${channelId}:${args}`);
      },
    });

    await Promise.all([
      reg.dispatch(client, 'test-token', 'c1', '!slow first args'),
      reg.dispatch(client, 'test-token', 'c2', '!fast second args'),
    ]);

    expect(seen).toEqual(['c2:second args', 'c1:first args']);
  });

  test('ping / ping extra / pong scenario', async () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    let count = 0;
    const reg = new CommandRegistry();
    reg.register('!ping', {
      async execute() {
        count += 1;
      },
    });

    await expect(reg.dispatch(client, 'test-token', 'c1', '!ping')).resolves.toBeUndefined();
    await expect(reg.dispatch(client, 'test-token', 'c1', '!ping extra')).resolves.toBeUndefined();
    await expect(reg.dispatch(client, 'test-token', 'c1', '!pong')).resolves.toBeUndefined();

    expect(count).toBe(2);
    const notFound = log.mock.calls.filter(([line]) => String(line).includes('Command not found'));
    expect(notFound).toEqual([['[CommandRegistry] Command not found: !pong']]);
  });
});
