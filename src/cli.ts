#!/usr/bin/env node

import { Command } from 'commander';
import chalk from 'chalk';
import inquirer from 'inquirer';
import { CONFIG_FILE, VERSION } from './constants';
import { DotfileLinker } from './dotfile-linker';
import { errorMessage } from './errors';
import { Logger, createLogger } from './logger';
import { MappingTable, buildMappingTable, loadDefinitions, parseTargetOverride, writeDefaultConfig } from './mapping-table';
import { isVerbose, resolveSettings } from './settings';
import { LinkStatus, PlannedLink, Settings } from './types';

type GlobalOptions = {
  dotfilesDir?: string;
  map: string[];
  verbose?: boolean;
};

type LinkOptions = GlobalOptions & {
  all?: boolean;
  limit?: string;
  exclude?: string;
  dryRun?: boolean;
};

export interface ProgramOptions {
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
}

interface Context {
  logger: Logger;
  settings: Settings;
  table: MappingTable;
  linker: DotfileLinker;
}

export function parseList(value: string | undefined): string[] {
  if (!value) return [];
  return value.split(',').map((item) => item.trim()).filter(Boolean);
}

function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

async function createContext(options: GlobalOptions, runtime: ProgramOptions): Promise<Context> {
  const logger = createLogger({ verbose: isVerbose(options.verbose, runtime.env) });
  const settings = resolveSettings({ dotfilesDir: options.dotfilesDir, env: runtime.env, homeDir: runtime.homeDir, logger });
  logger.debug(`Dotfiles directory: ${settings.dotfilesDir}`);
  logger.debug(`Config directory: ${settings.configRoot} (${settings.platform})`);

  const table = buildMappingTable({
    definitions: await loadDefinitions(settings.dotfilesDir),
    dotfilesDir: settings.dotfilesDir,
    homeDir: settings.homeDir,
    configRoot: settings.configRoot,
    overrides: options.map.map(parseTargetOverride)
  });
  return { logger, settings, table, linker: new DotfileLinker(table, logger) };
}

function fail(error: unknown): never {
  console.error(chalk.red('Error:'), errorMessage(error));
  process.exit(1);
}

function describePlan(item: PlannedLink): string {
  switch (item.action) {
    case 'create':
      return `Would link ${item.target} -> ${item.source}`;
    case 'replace-symlink':
      return `Would replace symlink ${item.target} -> ${item.source}`;
    case 'backup-and-link':
      return `Would back up ${item.target} to ${item.backup} and link -> ${item.source}`;
    case 'skip-missing-source':
      return `Would skip ${item.name}: source ${item.source} does not exist`;
  }
}

function describeStatus(item: LinkStatus): string {
  const icon = item.status === 'linked'
    ? chalk.green('✓')
    : item.status === 'missing'
      ? chalk.yellow('•')
      : chalk.red('⚠');
  const reason = item.reason ? chalk.gray(` (${item.reason})`) : '';
  const source = item.sourceExists ? '' : chalk.yellow(' [source missing]');
  return `  ${icon} ${item.name}: ${item.target}${reason}${source}`;
}

async function linkSelection(context: Context, selection: string[], dryRun: boolean): Promise<void> {
  if (selection.length === 0) {
    context.logger.warn('No dotfiles selected');
    return;
  }

  if (dryRun) {
    for (const item of await context.linker.plan(selection)) {
      console.log(describePlan(item));
    }
    return;
  }

  const report = await context.linker.apply(selection);
  context.logger.info(`Linked ${report.linked}, skipped ${report.skipped}, failed ${report.failed}`);
}

export function createProgram(runtime: ProgramOptions = {}): Command {
  const program = new Command();

  program
    .name('dotlinks')
    .description('Symlink dotfiles into the places programs look for them')
    .version(VERSION)
    .option('-d, --dotfiles-dir <dir>', 'Dotfiles directory (default: $DOTFILES_DIR or the current directory)')
    .option('-m, --map <name:path>', 'Override the target of a dotfile (repeatable)', collect, [])
    .option('-v, --verbose', 'Print debug output');

  program
    .command('link', { isDefault: true })
    .description('Symlink all or some dotfiles')
    .option('-a, --all', 'Symlink all dotfiles')
    .option('-l, --limit <names>', 'Comma-separated list of specific dotfiles to symlink')
    .option('-e, --exclude <names>', 'Comma-separated list of dotfiles to exclude')
    .option('--dry-run', 'Show what would change without touching anything')
    .action(async (_options: LinkOptions, command: Command) => {
      const options = command.optsWithGlobals<LinkOptions>();
      if (!options.all && !options.limit) {
        command.outputHelp();
        process.exit(1);
      }

      try {
        const context = await createContext(options, runtime);
        const selection = context.linker.resolveSelection({
          all: options.all,
          include: parseList(options.limit),
          exclude: parseList(options.exclude)
        });
        await linkSelection(context, selection, !!options.dryRun);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('list')
    .description('List known dotfiles and where they are linked')
    .action(async (_options: GlobalOptions, command: Command) => {
      try {
        const { table } = await createContext(command.optsWithGlobals<GlobalOptions>(), runtime);
        for (const entry of table.entries()) {
          console.log(`${chalk.cyan(entry.name)}: ${entry.target} -> ${entry.source}`);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('status')
    .description('Show which dotfiles are linked')
    .action(async (_options: GlobalOptions, command: Command) => {
      try {
        const { linker } = await createContext(command.optsWithGlobals<GlobalOptions>(), runtime);
        const statuses = await linker.status();
        console.log(chalk.bold('\nDotfile Status\n'));
        for (const item of statuses) {
          console.log(describeStatus(item));
        }
        const linked = statuses.filter((item) => item.status === 'linked').length;
        console.log(`\n${linked}/${statuses.length} linked`);
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('pick')
    .description('Choose dotfiles to symlink interactively')
    .action(async (_options: GlobalOptions, command: Command) => {
      try {
        const context = await createContext(command.optsWithGlobals<GlobalOptions>(), runtime);
        const { selected } = await inquirer.prompt<{ selected: string[] }>([
          {
            type: 'checkbox',
            name: 'selected',
            message: 'Select dotfiles to link:',
            choices: context.table.entries().map((entry) => ({
              name: `${entry.name} (${entry.target})`,
              value: entry.name
            }))
          }
        ]);

        if (selected.length === 0) {
          context.logger.warn('No dotfiles selected');
          return;
        }

        const { confirm } = await inquirer.prompt<{ confirm: boolean }>([
          {
            type: 'confirm',
            name: 'confirm',
            message: `Link ${selected.join(', ')}?`,
            default: true
          }
        ]);

        if (confirm) {
          await linkSelection(context, context.linker.resolveSelection({ include: selected }), false);
        }
      } catch (error) {
        fail(error);
      }
    });

  program
    .command('init')
    .description(`Write the built-in mappings to ${CONFIG_FILE}`)
    .action(async (_options: GlobalOptions, command: Command) => {
      const logger = createLogger();
      try {
        const { dotfilesDir } = resolveSettings({
          dotfilesDir: command.optsWithGlobals<GlobalOptions>().dotfilesDir,
          env: runtime.env,
          homeDir: runtime.homeDir,
          logger
        });
        if (await writeDefaultConfig(dotfilesDir)) {
          logger.success(`Created ${CONFIG_FILE} in ${dotfilesDir}`);
        } else {
          logger.warn(`${CONFIG_FILE} already exists in ${dotfilesDir}, already initialized`);
        }
      } catch (error) {
        fail(error);
      }
    });

  return program;
}

if (require.main === module) {
  createProgram().parseAsync(process.argv).catch(fail);
}
