#!/usr/bin/env tsx
/**
 * discord-dispatch CLI
 *
 * Usage:
 *   discord-dispatch start                 Connect to the gateway and dispatch commands
 *   discord-dispatch codegen [dir] [out]   Write the command registration module
 *   discord-dispatch list [dir]            Show discovered commands
 *   discord-dispatch help                  Show help
 */

import { resolve } from 'node:path';
import { pathToFileURL } from 'node:url';
import { writeRegistrationModule } from './command/codegen.ts';
import { loadCommands, qualifiedName, scanCommandDir } from './command/loader.ts';
import { CommandRegistry } from './command/registry.ts';
import { DEFAULT_COMMANDS_DIR, loadBotConfig } from './config.ts';
import { GatewayHost } from './discord/gateway.ts';
import { RestClient } from './rest/client.ts';

export const DEFAULT_CODEGEN_OUT = './src/generated/commands.ts';
const REGISTRY_MODULE = './src/command/registry.ts';

export type CLICommand =
  | { kind: 'start' }
  | { kind: 'codegen'; dir: string; out: string }
  | { kind: 'list'; dir: string }
  | { kind: 'help' };

const HELP = `discord-dispatch: Discord prefix-command router

Commands:
  discord-dispatch start                 Connect to the gateway and dispatch !commands
  discord-dispatch codegen [dir] [out]   Write a registration module for every command in dir
  discord-dispatch list [dir]            Show discovered commands
  discord-dispatch help                  Show this help message

Defaults:
  dir  ${DEFAULT_COMMANDS_DIR}
  out  ${DEFAULT_CODEGEN_OUT}

Environment:
  DISCORD_TOKEN (required for start), DISCORD_CHANNEL_ID, DISCORD_OWNER_ID,
  DISCORD_COMMANDS_DIR, DISCORD_DISPATCH_SETTINGS

Settings (discord-dispatch.yaml):
  authPrefix defaults to Bearer (OAuth2 tokens). With a bot token set
  "authPrefix: Bot", or every REST call answers 401.
`;

/** Parse process.argv into a typed command. Throws on invalid input. */
export function parseArgs(argv: string[]): CLICommand {
  // argv: [node, script, ...args]
  const args = argv.slice(2);

  if (args.length === 0 || args[0] === 'help' || args[0] === '--help' || args[0] === '-h') {
    return { kind: 'help' };
  }

  const [cmd, first, second, ...extra] = args;
  if (extra.length > 0) {
    throw new Error(`Too many arguments for ${cmd}. Run "discord-dispatch help" for usage.`);
  }

  switch (cmd) {
    case 'start':
      if (first) throw new Error('start takes no arguments');
      return { kind: 'start' };
    case 'codegen':
      return { kind: 'codegen', dir: first ?? DEFAULT_COMMANDS_DIR, out: second ?? DEFAULT_CODEGEN_OUT };
    case 'list':
      if (second) throw new Error('Usage: discord-dispatch list [dir]');
      return { kind: 'list', dir: first ?? DEFAULT_COMMANDS_DIR };
    default:
      throw new Error(`Unknown command: ${cmd}. Run "discord-dispatch help" for usage.`);
  }
}

async function start(): Promise<void> {
  const config = loadBotConfig();
  const rest = new RestClient({ apiVersion: config.apiVersion, authPrefix: config.authPrefix });
  const registry = new CommandRegistry();
  await loadCommands(registry, config.commandsDir);

  const host = new GatewayHost(
    {
      token: config.token,
      channelId: config.channelId,
      ownerId: config.ownerId,
      reportErrors: config.reportErrors,
    },
    registry,
    rest,
  );

  const shutdown = () => {
    console.log('[CLI] Shutting down...');
    host.disconnect()
      .catch((err) => console.error('[CLI] disconnect failed:', err))
      .finally(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);

  await host.connect();
  console.log(`[CLI] Listening for ${registry.size} command(s): ${registry.names().join(', ') || '(none)'}`);
}

/** Execute a parsed CLI command. */
export async function runCommand(cmd: CLICommand): Promise<void> {
  switch (cmd.kind) {
    case 'help':
      console.log(HELP);
      break;

    case 'start':
      await start();
      break;

    case 'codegen':
      writeRegistrationModule(cmd.dir, cmd.out, REGISTRY_MODULE);
      break;

    case 'list': {
      const entries = scanCommandDir(cmd.dir);
      if (entries.length === 0) {
        console.log(`No commands in ${resolve(cmd.dir)}`);
        return;
      }
      for (const entry of entries) {
        console.log(`${entry.name} -> ${qualifiedName(entry)}`);
      }
      break;
    }
  }
}

// ─── Main entry point ─────────────────────────────
const entry = process.argv[1];
if (entry && import.meta.url === pathToFileURL(resolve(entry)).href) {
  try {
    const cmd = parseArgs(process.argv);
    await runCommand(cmd);
  } catch (err) {
    console.error(err instanceof Error ? err.message : String(err));
    process.exitCode = 1;
  }
}
