/**
 * Command directory scan and runtime registration.
 *
 * Convention: every source file under the command directory exports a handler
 * class named after the file with its first letter upper-cased
 * (`ping.ts` → `Ping`, registered as `!ping`). Sub-directories become
 * namespaces (`admin/pin.ts` → `admin.Pin`, still registered as `!pin`).
 * `index.*` files mark a namespace root and are not commands.
 */

import { existsSync, readdirSync } from 'node:fs';
import { join, relative, resolve, sep } from 'node:path';
import { pathToFileURL } from 'node:url';
import type { CommandHandler, CommandHandlerClass, CommandRegistry } from './registry.ts';

export type CommandEntry = {
  /** Registry key, e.g. `!ping` */
  name: string;
  /** Expected export, e.g. `Ping` */
  exportName: string;
  /** Directory segments below the command root, e.g. `['admin']` */
  namespace: string[];
  /** Absolute path of the source file */
  file: string;
};

export type ModuleImporter = (file: string) => Promise<Record<string, unknown>>;

export type LoadCommandsOptions = {
  importModule?: ModuleImporter;
};

const SOURCE_EXTENSIONS = ['.ts', '.mts', '.js', '.mjs'];
const NAMESPACE_ROOT = 'index';
const SKIPPED_DIRS = new Set(['__tests__', '__fixtures__', 'node_modules']);
const IDENTIFIER = /^[A-Za-z_$][A-Za-z0-9_$]*$/;
// 네임스페이스 객체 리터럴의 키로 쓸 수 없는 이름
const RESERVED_NAMESPACES = new Set(['__proto__']);

export function capitalizeFirst(value: string): string {
  const [first, ...rest] = Array.from(value);
  if (first === undefined) return '';
  return first.toUpperCase() + rest.join('');
}

/** `ping.ts` → `ping`; null for files that are not command sources */
function commandBaseName(fileName: string): string | null {
  if (fileName.endsWith('.d.ts') || fileName.endsWith('.d.mts')) return null;
  const ext = SOURCE_EXTENSIONS.find((e) => fileName.endsWith(e));
  if (!ext) return null;
  const base = fileName.slice(0, -ext.length);
  if (base === NAMESPACE_ROOT) return null;
  if (base.endsWith('.test') || base.endsWith('.spec')) return null;
  return base;
}

/**
 * Discover every command source below `dir`, sorted by path.
 * A missing directory means zero commands, not an error.
 */
export function scanCommandDir(dir: string): CommandEntry[] {
  const root = resolve(dir);
  if (!existsSync(root)) return [];
  const entries: CommandEntry[] = [];
  walk(root, [], entries);
  return entries;
}

function walk(path: string, namespace: string[], out: CommandEntry[]): void {
  const children = readdirSync(path, { withFileTypes: true })
    .sort((a, b) => (a.name < b.name ? -1 : a.name > b.name ? 1 : 0));
  const classNames = new Set<string>();
  for (const child of children) {
    const base = child.isFile() ? commandBaseName(child.name) : null;
    if (base !== null) classNames.add(capitalizeFirst(base));
  }

  for (const child of children) {
    const childPath = join(path, child.name);

    if (child.isDirectory()) {
      if (child.name.startsWith('.') || SKIPPED_DIRS.has(child.name)) continue;
      if (!IDENTIFIER.test(child.name) || RESERVED_NAMESPACES.has(child.name)) {
        throw new Error(`Command namespace "${childPath}" is not a valid identifier`);
      }
      if (classNames.has(child.name)) {
        throw new Error(`Command namespace "${childPath}" has the same name as the command class ${child.name} beside it`);
      }
      walk(childPath, [...namespace, child.name], out);
      continue;
    }

    if (!child.isFile()) continue;
    const base = commandBaseName(child.name);
    if (base === null) continue;

    const exportName = capitalizeFirst(base);
    if (!IDENTIFIER.test(exportName)) {
      throw new Error(`Command file "${childPath}" does not map to a valid export name (got "${exportName}")`);
    }
    out.push({ name: `!${base}`, exportName, namespace, file: childPath });
  }
}

/** `admin.Pin`, for listings and error messages */
export function qualifiedName(entry: CommandEntry): string {
  return [...entry.namespace, entry.exportName].join('.');
}

function isHandlerClass(value: unknown): value is CommandHandlerClass {
  return typeof value === 'function';
}

function isCommandHandler(value: unknown): value is CommandHandler {
  return typeof value === 'object'
    && value !== null
    && 'execute' in value
    && typeof value.execute === 'function';
}

const defaultImporter: ModuleImporter = (file) => import(pathToFileURL(file).href);

/**
 * Runtime discovery: import each command module and register one shared instance.
 * A module that does not export the derived class name fails the whole load.
 */
export async function loadCommands(
  registry: CommandRegistry,
  dir: string,
  options: LoadCommandsOptions = {},
): Promise<CommandEntry[]> {
  const importModule = options.importModule ?? defaultImporter;
  const entries = scanCommandDir(dir);
  if (entries.length === 0) {
    console.log(`[CommandLoader] No commands found in ${resolve(dir)}`);
    return entries;
  }

  const seen = new Map<string, CommandEntry>();
  for (const entry of entries) {
    const mod = await importModule(entry.file);
    const exported = mod[entry.exportName];
    if (!isHandlerClass(exported)) {
      throw new Error(`${displayPath(entry.file)} must export a command class named "${entry.exportName}"`);
    }
    const instance: unknown = new exported();
    if (!isCommandHandler(instance)) {
      throw new Error(`${qualifiedName(entry)} in ${displayPath(entry.file)} has no execute() method`);
    }

    const previous = seen.get(entry.name);
    if (previous) {
      console.warn(`[CommandLoader] ${entry.name}: ${qualifiedName(entry)} replaces ${qualifiedName(previous)}`);
    }
    seen.set(entry.name, entry);
    registry.register(entry.name, instance);
  }

  console.log(`[CommandLoader] Registered ${entries.length} command(s) from ${resolve(dir)}`);
  return entries;
}

function displayPath(file: string): string {
  const rel = relative(process.cwd(), file);
  return rel.startsWith('..') ? file : rel.split(sep).join('/');
}
