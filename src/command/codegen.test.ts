import { existsSync, mkdirSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { dirname, join, resolve } from 'node:path';
import { fileURLToPath, pathToFileURL } from 'node:url';
import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';
import { renderRegistrationModule, writeRegistrationModule } from './codegen.ts';
import { loadCommands, scanCommandDir } from './loader.ts';
import { CommandRegistry } from './registry.ts';

const REGISTRY_MODULE = resolve(dirname(fileURLToPath(import.meta.url)), 'registry.ts');

let root: string;

function writeFile(rel: string, content = ''): void {
  const path = join(root, rel);
  mkdirSync(dirname(path), { recursive: true });
  writeFileSync(path, content, 'utf8');
}

beforeEach(() => {
  root = mkdtempSync(join(tmpdir(), 'discord-dispatch-codegen-'));
  vi.spyOn(console, 'log').mockImplementation(() => {});
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('renderRegistrationModule', () => {
  test('one register call per command, namespaces preserved', () => {
    writeFile('commands/ping.ts');
    writeFile('commands/mod/deep.ts');
    const entries = scanCommandDir(join(root, 'commands'));

    const source = renderRegistrationModule(entries, join(root, 'generated', 'commands.ts'), '../command/registry.ts');

    expect(source).toBe([
      '// Generated by `discord-dispatch codegen`. Do not edit.',
      "import type { CommandRegistry } from '../command/registry.ts';",
      "import { Deep as cmd$mod$Deep } from '../commands/mod/deep.ts';",
      "import { Ping as cmd$Ping } from '../commands/ping.ts';",
      '',
      'const ns$mod = {',
      '  Deep: cmd$mod$Deep,',
      '};',
      '',
      'export function registerCommands(registry: CommandRegistry): void {',
      "  registry.register('!deep', new ns$mod.Deep());",
      "  registry.register('!ping', new cmd$Ping());",
      '}',
      '',
    ].join('\n'));
  });

  test('deeper directories nest namespace objects', () => {
    writeFile('commands/a/b/x.ts');
    const entries = scanCommandDir(join(root, 'commands'));

    const source = renderRegistrationModule(entries, join(root, 'commands.ts'), './registry.ts');

    expect(source).toContain([
      'const ns$a = {',
      '  b: {',
      '    X: cmd$a$b$X,',
      '  },',
      '};',
    ].join('\n'));
    expect(source).toContain("import { X as cmd$a$b$X } from './commands/a/b/x.ts';");
    expect(source).toContain("  registry.register('!x', new ns$a.b.X());");
  });

  test('directory names that are reserved words or module bindings stay namespaced', () => {
    writeFile('commands/new/alpha.ts');
    writeFile('commands/registry/beta.ts');
    const entries = scanCommandDir(join(root, 'commands'));

    const source = renderRegistrationModule(entries, join(root, 'commands.ts'), './registry.ts');

    expect(source).toContain('const ns$new = {\n  Alpha: cmd$new$Alpha,\n};');
    expect(source).toContain('const ns$registry = {\n  Beta: cmd$registry$Beta,\n};');
    expect(source).toContain("  registry.register('!alpha', new ns$new.Alpha());");
    expect(source).toContain("  registry.register('!beta', new ns$registry.Beta());");
  });

  test('same file base with two extensions gets distinct import aliases', () => {
    writeFile('commands/ping.mjs');
    writeFile('commands/ping.ts');
    const entries = scanCommandDir(join(root, 'commands'));

    const source = renderRegistrationModule(entries, join(root, 'commands.ts'), './registry.ts');

    expect(source).toContain("import { Ping as cmd$Ping } from './commands/ping.mjs';");
    expect(source).toContain("import { Ping as cmd$Ping$2 } from './commands/ping.ts';");
    expect(source).toContain("  registry.register('!ping', new cmd$Ping$2());");
  });

  test('no commands still yields a usable module', () => {
    const source = renderRegistrationModule([], join(root, 'commands.ts'), './registry.ts');
    expect(source).toBe([
      '// Generated by `discord-dispatch codegen`. Do not edit.',
      "import type { CommandRegistry } from './registry.ts';",
      '',
      'export function registerCommands(_registry: CommandRegistry): void {}',
      '',
    ].join('\n'));
  });
});

describe('writeRegistrationModule', () => {
  test('missing command directory writes an empty registration', () => {
    const out = join(root, 'out', 'commands.ts');
    const entries = writeRegistrationModule(join(root, 'missing'), out, REGISTRY_MODULE);

    expect(entries).toEqual([]);
    expect(existsSync(out)).toBe(true);
    expect(readFileSync(out, 'utf8')).toContain('export function registerCommands(_registry: CommandRegistry): void {}');
  });

  test('generated module registers working handlers', async () => {
    const handler = (name: string) => `export class ${name} {\n  async execute() {}\n}\n`;
    writeFile('commands/ping.mjs', handler('Ping'));
    writeFile('commands/mod/deep.mjs', handler('Deep'));
    const out = join(root, 'generated', 'commands.ts');

    writeRegistrationModule(join(root, 'commands'), out, REGISTRY_MODULE);
    const generated: unknown = await import(pathToFileURL(out).href);
    const registry = new CommandRegistry();
    if (typeof generated !== 'object' || generated === null || !('registerCommands' in generated)) {
      throw new Error('generated module has no registerCommands export');
    }
    const { registerCommands } = generated;
    if (typeof registerCommands !== 'function') throw new Error('registerCommands is not a function');
    registerCommands(registry);

    expect(registry.names()).toEqual(['!deep', '!ping']);
    expect(registry.resolve('!deep')?.constructor.name).toBe('Deep');
  });

  test('generated module registers the same tree runtime discovery does', async () => {
    const handler = (name: string) => `export class ${name} {\n  async execute() {}\n}\n`;
    writeFile('commands/commandRegistry.mjs', handler('CommandRegistry'));
    writeFile('commands/new/alpha.mjs', handler('Alpha'));
    writeFile('commands/registry/beta.mjs', handler('Beta'));
    const out = join(root, 'generated', 'commands.ts');

    writeRegistrationModule(join(root, 'commands'), out, REGISTRY_MODULE);
    const generated: unknown = await import(pathToFileURL(out).href);
    if (typeof generated !== 'object' || generated === null || !('registerCommands' in generated)) {
      throw new Error('generated module has no registerCommands export');
    }
    const { registerCommands } = generated;
    if (typeof registerCommands !== 'function') throw new Error('registerCommands is not a function');
    const fromCodegen = new CommandRegistry();
    registerCommands(fromCodegen);
    const fromLoader = new CommandRegistry();
    await loadCommands(fromLoader, join(root, 'commands'));

    expect(fromCodegen.names()).toEqual(['!commandRegistry', '!alpha', '!beta']);
    expect(fromCodegen.names()).toEqual(fromLoader.names());
    expect(fromCodegen.resolve('!beta')?.constructor.name).toBe('Beta');
    expect(fromCodegen.resolve('!commandRegistry')?.constructor.name).toBe('CommandRegistry');
  });
});
