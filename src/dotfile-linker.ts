import * as fs from 'fs-extra';
import * as path from 'path';
import { BACKUP_SUFFIX } from './constants';
import { CollisionError, errorMessage } from './errors';
import { Logger, createLogger } from './logger';
import { MappingTable } from './mapping-table';
import { Collision, LinkOutcome, LinkReport, LinkStatus, MappingEntry, PlannedLink } from './types';

export interface SelectionOptions {
  all?: boolean;
  include?: readonly string[];
  exclude?: Iterable<string>;
}

type SymlinkKind = 'file' | 'junction';

// Errors from Node's own fs come from another realm under Jest, so
// `instanceof Error` is not reliable here.
function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return typeof error === 'object' && error !== null && 'code' in error;
}

async function lstatIfExists(target: string): Promise<fs.Stats | null> {
  try {
    return await fs.lstat(target);
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') return null;
    throw error;
  }
}

async function linkKind(source: string): Promise<SymlinkKind> {
  const stat = await fs.stat(source);
  // The type is only read on Windows.
  return stat.isDirectory() ? 'junction' : 'file';
}

export function backupPathFor(target: string): string {
  return `${target}${BACKUP_SUFFIX}`;
}

export class DotfileLinker {
  constructor(
    private readonly table: MappingTable,
    private readonly logger: Logger = createLogger()
  ) {}

  /**
   * Names to act on, in table order. Unknown names in `include` are
   * dropped with a warning; unknown names in `exclude` are ignored.
   */
  resolveSelection(options: SelectionOptions): string[] {
    const exclude = new Set(options.exclude ?? []);

    if (options.all) {
      return this.table.names().filter((name) => !exclude.has(name));
    }

    const include = new Set<string>();
    for (const name of options.include ?? []) {
      if (!this.table.has(name)) {
        this.logger.warn(`Ignoring unknown dotfile: ${name}`);
        continue;
      }
      include.add(name);
    }
    return this.table.names().filter((name) => include.has(name) && !exclude.has(name));
  }

  findCollisions(selection: readonly string[]): Collision[] {
    const byTarget = new Map<string, string[]>();
    for (const entry of this.selectedEntries(selection)) {
      const target = path.resolve(entry.target);
      const names = byTarget.get(target) ?? [];
      names.push(entry.name);
      byTarget.set(target, names);
    }

    const collisions: Collision[] = [];
    for (const [target, names] of byTarget) {
      if (names.length > 1) collisions.push({ target, names });
    }
    return collisions;
  }

  /** Throws CollisionError when two selected entries share a target. */
  validateNoCollisions(selection: readonly string[]): void {
    const collisions = this.findCollisions(selection);
    if (collisions.length > 0) {
      throw new CollisionError(collisions);
    }
  }

  /**
   * Links every selected entry. Collisions abort before anything is
   * touched; a failing entry is logged and the rest still run.
   */
  async apply(selection: readonly string[]): Promise<LinkReport> {
    this.validateNoCollisions(selection);

    const outcomes: LinkOutcome[] = [];
    for (const entry of this.selectedEntries(selection)) {
      outcomes.push(await this.linkEntry(entry));
    }

    return {
      outcomes,
      linked: outcomes.filter((outcome) => outcome.status === 'linked').length,
      skipped: outcomes.filter((outcome) => outcome.status === 'skipped').length,
      failed: outcomes.filter((outcome) => outcome.status === 'failed').length
    };
  }

  /** What `apply` would do, without touching the filesystem. */
  async plan(selection: readonly string[]): Promise<PlannedLink[]> {
    this.validateNoCollisions(selection);

    const planned: PlannedLink[] = [];
    for (const entry of this.selectedEntries(selection)) {
      const base = { name: entry.name, source: entry.source, target: entry.target };
      if (!await fs.pathExists(entry.source)) {
        planned.push({ ...base, action: 'skip-missing-source' });
        continue;
      }

      const existing = await lstatIfExists(entry.target);
      if (!existing) {
        planned.push({ ...base, action: 'create' });
      } else if (existing.isSymbolicLink()) {
        planned.push({ ...base, action: 'replace-symlink' });
      } else {
        planned.push({ ...base, action: 'backup-and-link', backup: backupPathFor(entry.target) });
      }
    }
    return planned;
  }

  async status(): Promise<LinkStatus[]> {
    const statuses: LinkStatus[] = [];
    for (const entry of this.table.entries()) {
      const base = {
        name: entry.name,
        source: entry.source,
        target: entry.target,
        sourceExists: await fs.pathExists(entry.source)
      };

      const existing = await lstatIfExists(entry.target);
      if (!existing) {
        statuses.push({ ...base, status: 'missing' });
        continue;
      }

      if (existing.isSymbolicLink()) {
        const link = await fs.readlink(entry.target);
        const resolved = path.resolve(path.dirname(entry.target), link);
        if (resolved === path.resolve(entry.source)) {
          statuses.push({ ...base, status: 'linked' });
        } else {
          statuses.push({ ...base, status: 'conflict', reason: `Symlink points elsewhere: ${resolved}` });
        }
        continue;
      }

      const kind = existing.isDirectory() ? 'directory' : existing.isFile() ? 'file' : 'path';
      statuses.push({ ...base, status: 'conflict', reason: `Target exists and is not a symlink (${kind})` });
    }
    return statuses;
  }

  private selectedEntries(selection: readonly string[]): MappingEntry[] {
    const selected = new Set(selection);
    return this.table.entries().filter((entry) => selected.has(entry.name));
  }

  private async linkEntry(entry: MappingEntry): Promise<LinkOutcome> {
    const { name, source, target } = entry;

    if (!await fs.pathExists(source)) {
      this.logger.warn(`Source ${source} does not exist`);
      return { status: 'skipped', name, source, target, reason: 'Source does not exist' };
    }

    try {
      await fs.ensureDir(path.dirname(target));

      let replaced = false;
      let backup: string | undefined;
      const existing = await lstatIfExists(target);
      if (existing?.isSymbolicLink()) {
        await fs.unlink(target);
        replaced = true;
      } else if (existing) {
        backup = backupPathFor(target);
        this.logger.info(`Backing up existing ${target} to ${backup}`);
        await fs.move(target, backup, { overwrite: true });
      }

      await fs.symlink(source, target, await linkKind(source));
      this.logger.success(`Created symlink: ${target} -> ${source}`);
      return { status: 'linked', name, source, target, replaced, backup };
    } catch (error) {
      const message = errorMessage(error);
      this.logger.error(`Error creating symlink ${target}: ${message}`);
      return { status: 'failed', name, source, target, error: message };
    }
  }
}

export default DotfileLinker;
