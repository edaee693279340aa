/**
 * Build-time registration module generator.
 * Emits a TypeScript module whose `registerCommands(registry)` holds one
 * `registry.register('!name', new ns$dir.Name())` per discovered command.
 * Handler imports are bound as `cmd$...` and namespace objects as `ns$<dir>`:
 * no directory or file name becomes a bare module-scope binding.
 */

import { mkdirSync, writeFileSync } from 'node:fs';
import { dirname, relative, resolve, sep } from 'node:path';
import { scanCommandDir, type CommandEntry } from './loader.ts';

type NamespaceNode = {
  children: Map<string, NamespaceNode>;
  /** exportName → import alias */
  classes: Map<string, string>;
};

function emptyNode(): NamespaceNode {
  return { children: new Map(), classes: new Map() };
}

function importSpecifier(fromDir: string, file: string): string {
  const rel = relative(fromDir, file).split(sep).join('/');
  return rel.startsWith('.') ? rel : `./${rel}`;
}

const IMPORT_PREFIX = 'cmd$';
const NAMESPACE_PREFIX = 'ns$';

function importAlias(entry: CommandEntry, used: Set<string>): string {
  const base = IMPORT_PREFIX + [...entry.namespace, entry.exportName].join('$');
  let alias = base;
  for (let n = 2; used.has(alias); n++) {
    alias = `${base}$${n}`;
  }
  used.add(alias);
  return alias;
}

/** Expression that reaches the handler class from inside `registerCommands` */
function constructorPath(entry: CommandEntry, alias: string): string {
  const [top, ...rest] = entry.namespace;
  if (top === undefined) return alias;
  return [NAMESPACE_PREFIX + top, ...rest, entry.exportName].join('.');
}

function renderNode(node: NamespaceNode, depth: number): string {
  const pad = '  '.repeat(depth + 1);
  const lines: string[] = [];
  for (const [name, child] of node.children) {
    lines.push(`${pad}${name}: ${renderNode(child, depth + 1)},`);
  }
  for (const [exportName, alias] of node.classes) {
    lines.push(`${pad}${exportName}: ${alias},`);
  }
  return `{\n${lines.join('\n')}\n${'  '.repeat(depth)}}`;
}

/**
 * @param outFile where the module will be written; import paths are relative to it
 * @param registryImport specifier of the module exporting `CommandRegistry`, relative to outFile
 */
export function renderRegistrationModule(entries: CommandEntry[], outFile: string, registryImport: string): string {
  const outDir = dirname(resolve(outFile));
  const out: string[] = [
    '// Generated by `discord-dispatch codegen`. Do not edit.',
    `import type { CommandRegistry } from '${registryImport}';`,
  ];

  const root = emptyNode();
  const used = new Set<string>();
  const registrations: string[] = [];
  for (const entry of entries) {
    const alias = importAlias(entry, used);
    registrations.push(`  registry.register('${entry.name}', new ${constructorPath(entry, alias)}());`);
    out.push(`import { ${entry.exportName} as ${alias} } from '${importSpecifier(outDir, entry.file)}';`);

    let node = root;
    for (const segment of entry.namespace) {
      let next = node.children.get(segment);
      if (!next) {
        next = emptyNode();
        node.children.set(segment, next);
      }
      node = next;
    }
    node.classes.set(entry.exportName, alias);
  }

  if (root.children.size > 0) out.push('');
  for (const [name, child] of root.children) {
    out.push(`const ${NAMESPACE_PREFIX}${name} = ${renderNode(child, 0)};`);
  }

  out.push('');
  if (entries.length === 0) {
    out.push('export function registerCommands(_registry: CommandRegistry): void {}');
    return `${out.join('\n')}\n`;
  }

  out.push('export function registerCommands(registry: CommandRegistry): void {');
  out.push(...registrations);
  out.push('}');
  return `${out.join('\n')}\n`;
}

/** Scan `commandsDir` and write the registration module. Returns what was registered. */
export function writeRegistrationModule(commandsDir: string, outFile: string, registryModule: string): CommandEntry[] {
  const entries = scanCommandDir(commandsDir);
  const target = resolve(outFile);
  const registryImport = importSpecifier(dirname(target), resolve(registryModule));
  mkdirSync(dirname(target), { recursive: true });
  writeFileSync(target, renderRegistrationModule(entries, target, registryImport), 'utf8');
  console.log(`[Codegen] Wrote ${entries.length} registration(s) to ${target}`);
  return entries;
}
