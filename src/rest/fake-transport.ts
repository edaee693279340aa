import { RestClient } from './client.ts';
import type { RestClientOptions } from './types.ts';

/** One HTTP call as discord.js REST handed it to `makeRequest` */
export type RecordedRequest = {
  method: string;
  url: string;
  body: unknown;
  headers: Record<string, string>;
};

export function emptyResponse(): Response {
  return new Response(null, { status: 204 });
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { 'Content-Type': 'application/json' } });
}

/** Case-insensitive header lookup; null when absent */
export function header(req: RecordedRequest | undefined, name: string): string | null {
  if (!req) return null;
  const wanted = name.toLowerCase();
  for (const [key, value] of Object.entries(req.headers)) {
    if (key.toLowerCase() === wanted) return value;
  }
  return null;
}

function plainHeaders(headers: unknown): Record<string, string> {
  const out: Record<string, string> = {};
  if (typeof headers !== 'object' || headers === null) return out;
  for (const [key, value] of Object.entries(headers)) {
    if (typeof value === 'string') out[key] = value;
  }
  return out;
}

/** RestClient whose requests are recorded in-process instead of sent */
export function recordingClient(
  respond: (req: RecordedRequest) => Response | Promise<Response> = emptyResponse,
  options: Omit<RestClientOptions, 'makeRequest'> = {},
): { client: RestClient; calls: RecordedRequest[] } {
  const calls: RecordedRequest[] = [];
  const client = new RestClient({
    ...options,
    makeRequest: async (url, init) => {
      const req: RecordedRequest = {
        method: init.method ?? 'GET',
        url,
        body: typeof init.body === 'string' ? JSON.parse(init.body) : undefined,
        headers: plainHeaders(init.headers),
      };
      calls.push(req);
      return respond(req);
    },
  });
  return { client, calls };
}
