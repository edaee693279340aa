/**
 * REST 레이어 공통 타입
 */

import type { RESTOptions } from 'discord.js';

export type HttpMethod = 'GET' | 'POST' | 'PUT' | 'PATCH' | 'DELETE';

/** 'Bearer' (OAuth2) 또는 'Bot' (봇 토큰) */
export type AuthPrefix = 'Bearer' | 'Bot';

export type QueryValue = string | number | boolean | undefined | null;

export interface RestClientOptions {
  /** API version segment (default: 9) */
  apiVersion?: number;
  authPrefix?: AuthPrefix;
  /** Base URL without the version segment (default: https://discord.com/api) */
  baseUrl?: string;
  /** Appended to the discord.js User-Agent */
  userAgentAppendix?: string;
  /** Replaces the HTTP call made by discord.js REST; used by tests */
  makeRequest?: RESTOptions['makeRequest'];
}

export interface RequestOptions {
  /** Omit for token-in-URL webhook routes */
  token?: string;
  body?: unknown;
  query?: Record<string, QueryValue>;
  /** Sent as X-Audit-Log-Reason */
  reason?: string;
}

/** Loose JSON body for endpoints whose settings payload is passed through untouched */
export type JsonObject = Record<string, unknown>;
