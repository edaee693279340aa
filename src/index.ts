/**
 * discord-dispatch: Discord REST client + prefix-command router
 *
 * One function per REST endpoint, a registry that routes `!command args`
 * text to handler objects, and a loader/codegen pair that fills the
 * registry from a directory of handler files.
 */

export * from './command/index.ts';
export * from './rest/index.ts';
export * from './discord/index.ts';
export { loadEnv, requireEnv, loadSettings, parseSettings, loadBotConfig } from './config.ts';
export type { Settings, BotConfig } from './config.ts';
