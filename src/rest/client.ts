/**
 * RestClient - discord.js REST 위의 얇은 래퍼
 * 요청 1번 = 작업 1번. 재시도 없음 (rate-limit 대기는 REST 큐가 한다).
 * 토큰은 보관하지 않고 호출마다 받는다 (여러 핸들러가 하나의 클라이언트를 공유).
 */

import { REST, RequestMethod, type RESTOptions, type RouteLike } from 'discord.js';
import { RouteBases } from 'discord-api-types/v10';
import type { AuthPrefix, HttpMethod, QueryValue, RequestOptions, RestClientOptions } from './types.ts';

const DEFAULT_API_VERSION = 9;

const METHODS: Record<HttpMethod, RequestMethod> = {
  GET: RequestMethod.Get,
  POST: RequestMethod.Post,
  PUT: RequestMethod.Put,
  PATCH: RequestMethod.Patch,
  DELETE: RequestMethod.Delete,
};

export class RestClient {
  readonly apiVersion: number;
  readonly authPrefix: AuthPrefix;
  private readonly rest: REST;

  constructor(options: RestClientOptions = {}) {
    this.apiVersion = options.apiVersion ?? DEFAULT_API_VERSION;
    this.authPrefix = options.authPrefix ?? 'Bearer';

    const restOptions: Partial<RESTOptions> = {
      api: (options.baseUrl ?? RouteBases.api).replace(/\/+$/, ''),
      version: String(this.apiVersion),
      authPrefix: this.authPrefix,
      retries: 0,
    };
    if (options.userAgentAppendix) restOptions.userAgentAppendix = options.userAgentAppendix;
    if (options.makeRequest) restOptions.makeRequest = options.makeRequest;
    this.rest = new REST(restOptions);
  }

  /** Parsed JSON body, or undefined for an empty one (204) */
  async request<T = unknown>(method: HttpMethod, route: RouteLike, options: RequestOptions = {}): Promise<T> {
    const res = await this.send(method, route, options);
    const text = await res.text();
    if (!text) {
      return undefined as T;
    }
    return JSON.parse(text) as T;
  }

  /** For endpoints that answer with an image rather than JSON */
  async requestBinary(method: HttpMethod, route: RouteLike, options: RequestOptions = {}): Promise<ArrayBuffer> {
    const res = await this.send(method, route, options);
    return res.arrayBuffer();
  }

  get<T = unknown>(route: RouteLike, options?: RequestOptions): Promise<T> {
    return this.request<T>('GET', route, options);
  }

  post<T = unknown>(route: RouteLike, options?: RequestOptions): Promise<T> {
    return this.request<T>('POST', route, options);
  }

  put<T = unknown>(route: RouteLike, options?: RequestOptions): Promise<T> {
    return this.request<T>('PUT', route, options);
  }

  patch<T = unknown>(route: RouteLike, options?: RequestOptions): Promise<T> {
    return this.request<T>('PATCH', route, options);
  }

  delete<T = unknown>(route: RouteLike, options?: RequestOptions): Promise<T> {
    return this.request<T>('DELETE', route, options);
  }

  // 토큰이 호출마다 다르므로 REST의 setToken 대신 헤더를 직접 넣는다.
  // 4xx → DiscordAPIError, 5xx → HTTPError (둘 다 discord.js REST가 던짐)
  private send(method: HttpMethod, route: RouteLike, options: RequestOptions) {
    const headers: Record<string, string> = {};
    if (options.token) {
      headers.Authorization = `${this.authPrefix} ${options.token}`;
    }
    return this.rest.queueRequest({
      fullRoute: route,
      method: METHODS[method],
      auth: false,
      headers,
      body: options.body,
      query: buildQuery(options.query),
      reason: options.reason,
    });
  }
}

function buildQuery(query?: Record<string, QueryValue>): URLSearchParams | undefined {
  if (!query) return undefined;
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(query)) {
    if (value === undefined || value === null) continue;
    params.append(key, String(value));
  }
  return params.toString() ? params : undefined;
}
