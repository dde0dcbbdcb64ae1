import * as fs from 'fs-extra';
import * as path from 'path';
import { CONFIG_FILE, CONFIG_VERSION, DEFAULT_MAPPINGS, configSchema } from './constants';
import { ConfigurationError, errorMessage } from './errors';
import { Configuration, MappingDefinition, MappingEntry } from './types';

export interface TargetOverride {
  name: string;
  target: string;
}

/**
 * Read-only, ordered view of the mapping entries. Iteration order is the
 * declaration order, which is also the order entries are linked in.
 */
export class MappingTable {
  private readonly byName: ReadonlyMap<string, MappingEntry>;

  constructor(entries: readonly MappingEntry[]) {
    const byName = new Map<string, MappingEntry>();
    for (const entry of entries) {
      if (byName.has(entry.name)) {
        throw new ConfigurationError(`Duplicate mapping name: ${entry.name}`);
      }
      byName.set(entry.name, Object.freeze({ ...entry }));
    }
    this.byName = byName;
    Object.freeze(this);
  }

  get size(): number {
    return this.byName.size;
  }

  names(): string[] {
    return [...this.byName.keys()];
  }

  entries(): MappingEntry[] {
    return [...this.byName.values()];
  }

  has(name: string): boolean {
    return this.byName.has(name);
  }

  get(name: string): MappingEntry | undefined {
    return this.byName.get(name);
  }
}

export function expandHome(target: string, homeDir: string): string {
  if (target === '~') return homeDir;
  if (target.startsWith('~/')) return path.join(homeDir, target.slice(2));
  return path.resolve(homeDir, target);
}

/** Parses a `name:path` override as given to `--map`. */
export function parseTargetOverride(value: string): TargetOverride {
  const separator = value.indexOf(':');
  const name = separator === -1 ? '' : value.slice(0, separator).trim();
  const target = separator === -1 ? '' : value.slice(separator + 1).trim();
  if (!name || !target) {
    throw new ConfigurationError(`Invalid mapping '${value}', expected <dotfile>:<path>`);
  }
  return { name, target };
}

export interface BuildOptions {
  definitions?: readonly MappingDefinition[];
  dotfilesDir: string;
  homeDir: string;
  configRoot: string;
  overrides?: readonly TargetOverride[];
}

export function buildMappingTable(options: BuildOptions): MappingTable {
  const definitions = options.definitions ?? DEFAULT_MAPPINGS;
  const entries: MappingEntry[] = definitions.map((definition) => ({
    name: definition.name,
    source: path.resolve(options.dotfilesDir, definition.source),
    target: definition.root === 'config'
      ? path.resolve(options.configRoot, definition.target)
      : expandHome(definition.target, options.homeDir)
  }));

  for (const override of options.overrides ?? []) {
    const index = entries.findIndex((entry) => entry.name === override.name);
    if (index === -1) {
      throw new ConfigurationError(`Cannot map unknown dotfile: ${override.name}`);
    }
    entries[index] = { ...entries[index], target: expandHome(override.target, options.homeDir) };
  }

  return new MappingTable(entries);
}

/**
 * Mapping definitions for a dotfiles tree: the tree's own `dotlinks.json`
 * when present, otherwise the built-in table.
 */
export async function loadDefinitions(dotfilesDir: string): Promise<readonly MappingDefinition[]> {
  const configPath = path.join(dotfilesDir, CONFIG_FILE);

  if (!await fs.pathExists(configPath)) {
    return DEFAULT_MAPPINGS;
  }

  let configData: unknown;
  try {
    configData = await fs.readJson(configPath);
  } catch (error) {
    throw new ConfigurationError(`Failed to load configuration: ${errorMessage(error)}`);
  }

  const { error, value } = configSchema.validate(configData);
  if (error) {
    throw new ConfigurationError(`Configuration validation failed: ${error.message}`);
  }
  return value.mappings;
}

/** Writes the built-in table to `dotlinks.json`. Returns false if one exists. */
export async function writeDefaultConfig(dotfilesDir: string): Promise<boolean> {
  const configPath = path.join(dotfilesDir, CONFIG_FILE);
  if (await fs.pathExists(configPath)) {
    return false;
  }

  const config: Configuration = {
    version: CONFIG_VERSION,
    mappings: DEFAULT_MAPPINGS.map((definition) => ({ ...definition }))
  };
  await fs.ensureDir(dotfilesDir);
  await fs.writeJson(configPath, config, { spaces: 2 });
  return true;
}
