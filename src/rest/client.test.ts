import { DiscordAPIError, HTTPError } from 'discord.js';
import { describe, expect, test } from 'vitest';
import { RestClient } from './client.ts';
import { emptyResponse, header, jsonResponse, recordingClient } from './fake-transport.ts';

describe('RestClient', () => {
  test('requests go to the versioned Discord API URL', async () => {
    const { client, calls } = recordingClient();
    await client.get('/channels/1/messages', { token: 'test-token' });
    expect(calls[0]?.url).toBe('https://discord.com/api/v9/channels/1/messages');
  });

  test('apiVersion and baseUrl are configurable; trailing slashes dropped', async () => {
    const { client, calls } = recordingClient(emptyResponse, { apiVersion: 10, baseUrl: 'http://localhost:8080/api/' });
    await client.get('/users/@me', { token: 'test-token' });
    expect(calls[0]?.url).toBe('http://localhost:8080/api/v10/users/@me');
  });

  test('query skips undefined and null values', async () => {
    const { client, calls } = recordingClient();
    await client.get('/x', { query: { after: undefined, limit: 25, around: null } });
    expect(calls[0]?.url).toBe('https://discord.com/api/v9/x?limit=25');
  });

  test('an all-empty query adds no question mark', async () => {
    const { client, calls } = recordingClient();
    await client.get('/x', { query: { after: undefined } });
    expect(calls[0]?.url).toBe('https://discord.com/api/v9/x');
  });

  test('sends bearer auth and a JSON body', async () => {
    const { client, calls } = recordingClient(() => jsonResponse({ id: '10' }));

    const result = await client.post<{ id: string }>('/channels/1/messages', { token: 'test-token', body: { content: 'hi' } });

    expect(result).toEqual({ id: '10' });
    expect(calls).toHaveLength(1);
    expect(calls[0]?.method).toBe('POST');
    expect(calls[0]?.body).toEqual({ content: 'hi' });
    expect(header(calls[0], 'Authorization')).toBe('Bearer test-token');
    expect(header(calls[0], 'Content-Type')).toBe('application/json');
  });

  test('Bot prefix when configured', async () => {
    const { client, calls } = recordingClient(emptyResponse, { authPrefix: 'Bot' });
    await client.delete('/channels/1', { token: 'test-token' });
    expect(header(calls[0], 'Authorization')).toBe('Bot test-token');
  });

  test('each call carries its own token', async () => {
    const { client, calls } = recordingClient();
    await client.get('/users/@me', { token: 'token-a' });
    await client.get('/users/@me', { token: 'token-b' });
    expect(calls.map((c) => header(c, 'Authorization'))).toEqual(['Bearer token-a', 'Bearer token-b']);
  });

  test('no token, no Authorization header; no body, no Content-Type', async () => {
    const { client, calls } = recordingClient();
    await client.get('/webhooks/1/abc');
    expect(header(calls[0], 'Authorization')).toBeNull();
    expect(header(calls[0], 'Content-Type')).toBeNull();
    expect(calls[0]?.body).toBeUndefined();
  });

  test('audit log reason is URI-encoded into its header', async () => {
    const { client, calls } = recordingClient();
    await client.delete('/guilds/1/members/2', { token: 'test-token', reason: 'spam bot' });
    expect(header(calls[0], 'X-Audit-Log-Reason')).toBe('spam%20bot');
  });

  test('204 resolves undefined', async () => {
    const { client } = recordingClient();
    await expect(client.put('/channels/1/pins/2', { token: 'test-token' })).resolves.toBeUndefined();
  });

  test('4xx throws DiscordAPIError with status, code and the raw error', async () => {
    const { client } = recordingClient(() => jsonResponse({ message: 'Missing Permissions', code: 50013 }, 403));

    const err = await client.get('/guilds/1', { token: 'test-token' }).catch((e: unknown) => e);

    expect(err).toBeInstanceOf(DiscordAPIError);
    expect(err).toMatchObject({
      status: 403,
      code: 50013,
      url: 'https://discord.com/api/v9/guilds/1',
      rawError: { message: 'Missing Permissions', code: 50013 },
    });
  });

  test('5xx throws HTTPError without retrying', async () => {
    const { client, calls } = recordingClient(() => new Response('upstream down', { status: 502 }));

    const err = await client.get('/gateway').catch((e: unknown) => e);

    expect(err).toBeInstanceOf(HTTPError);
    expect(err).toMatchObject({ status: 502 });
    expect(calls).toHaveLength(1);
  });

  test('malformed JSON on success surfaces the parse error', async () => {
    const { client } = recordingClient(() => new Response('{not json', { status: 200 }));
    await expect(client.get('/users/@me', { token: 'test-token' })).rejects.toBeInstanceOf(SyntaxError);
  });

  test('transport failures reject the call', async () => {
    const client = new RestClient({
      makeRequest: async () => {
        throw new TypeError('fetch failed');
      },
    });
    await expect(client.get('/users/@me')).rejects.toThrow('fetch failed');
  });

  test('requestBinary returns raw bytes', async () => {
    const { client } = recordingClient(() => new Response(new Uint8Array([0x89, 0x50, 0x4e, 0x47]), { status: 200 }));
    const bytes = await client.requestBinary('GET', '/guilds/1/widget.png');
    expect(Array.from(new Uint8Array(bytes))).toEqual([0x89, 0x50, 0x4e, 0x47]);
  });
});
