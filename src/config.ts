import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import dotenv from 'dotenv';
import YAML from 'yaml';
import type { AuthPrefix } from './rest/types.ts';

export const DEFAULT_SETTINGS_PATH = './discord-dispatch.yaml';
export const DEFAULT_COMMANDS_DIR = './src/commands';

/** discord-dispatch.yaml (전부 선택 항목) */
export type Settings = {
  commandsDir: string;
  apiVersion: number;
  authPrefix: AuthPrefix;
  /** Only dispatch messages from this channel (and its threads) */
  channelId?: string;
  /** Only dispatch messages from this user */
  ownerId?: string;
  /** Post `Error: ...` back to the channel when a command fails */
  reportErrors: boolean;
};

export type BotConfig = Settings & {
  token: string;
};

const DEFAULT_SETTINGS: Settings = {
  commandsDir: DEFAULT_COMMANDS_DIR,
  apiVersion: 9,
  authPrefix: 'Bearer',
  reportErrors: false,
};

let envLoaded = false;

/** Load `.env` into process.env once. A missing file is fine. */
export function loadEnv(path?: string): void {
  if (envLoaded) return;
  envLoaded = true;
  dotenv.config(path ? { path } : undefined);
}

export function requireEnv(key: string): string {
  const val = process.env[key];
  if (!val) throw new Error(`Missing required environment variable: ${key}`);
  return val;
}

function optionalEnv(key: string): string | undefined {
  const val = process.env[key]?.trim();
  return val ? val : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/** Pick known keys out of parsed YAML; wrong-typed values fall back to defaults */
export function parseSettings(raw: unknown): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS };
  if (!isRecord(raw)) return settings;

  if (typeof raw.commandsDir === 'string' && raw.commandsDir.trim()) {
    settings.commandsDir = raw.commandsDir.trim();
  }
  if (typeof raw.apiVersion === 'number' && Number.isInteger(raw.apiVersion) && raw.apiVersion > 0) {
    settings.apiVersion = raw.apiVersion;
  }
  if (raw.authPrefix === 'Bearer' || raw.authPrefix === 'Bot') {
    settings.authPrefix = raw.authPrefix;
  }
  // snowflake는 YAML에서 숫자로 읽히면 정밀도가 깨지므로 문자열만 받는다
  if (typeof raw.channelId === 'string' && raw.channelId.trim()) {
    settings.channelId = raw.channelId.trim();
  }
  if (typeof raw.ownerId === 'string' && raw.ownerId.trim()) {
    settings.ownerId = raw.ownerId.trim();
  }
  if (typeof raw.reportErrors === 'boolean') {
    settings.reportErrors = raw.reportErrors;
  }
  return settings;
}

/**
 * Load discord-dispatch.yaml → Settings
 * Missing or unreadable file → defaults.
 */
export function loadSettings(path: string = process.env.DISCORD_DISPATCH_SETTINGS ?? DEFAULT_SETTINGS_PATH): Settings {
  const resolved = resolve(path);
  if (!existsSync(resolved)) {
    console.warn(`[Config] settings file not found: ${resolved} (using defaults)`);
    return { ...DEFAULT_SETTINGS };
  }

  try {
    const content = readFileSync(resolved, 'utf8');
    return parseSettings(YAML.parse(content));
  } catch (error) {
    console.error(`[Config] Failed to load settings from ${resolved}:`, error);
    return { ...DEFAULT_SETTINGS };
  }
}

/**
 * Everything the bot needs at startup.
 * DISCORD_TOKEN is required; DISCORD_CHANNEL_ID / DISCORD_OWNER_ID / DISCORD_COMMANDS_DIR override the file.
 */
export function loadBotConfig(settingsPath?: string): BotConfig {
  loadEnv();
  const token = requireEnv('DISCORD_TOKEN');
  const settings = loadSettings(settingsPath);
  return {
    ...settings,
    token,
    commandsDir: optionalEnv('DISCORD_COMMANDS_DIR') ?? settings.commandsDir,
    channelId: optionalEnv('DISCORD_CHANNEL_ID') ?? settings.channelId,
    ownerId: optionalEnv('DISCORD_OWNER_ID') ?? settings.ownerId,
  };
}
