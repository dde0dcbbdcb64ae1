import * as os from 'os';
import * as path from 'path';
import { DEBUG_ENV, DOTFILES_DIR_ENV } from './constants';
import { Logger } from './logger';
import { detectPlatform, resolveConfigRoot } from './platform';
import { Settings } from './types';

export interface SettingsOptions {
  dotfilesDir?: string;
  env?: NodeJS.ProcessEnv;
  homeDir?: string;
  platformName?: string;
  logger: Logger;
}

export function resolveSettings(options: SettingsOptions): Settings {
  const env = options.env ?? process.env;
  const homeDir = options.homeDir ?? os.homedir();
  const platformName = options.platformName ?? os.platform();
  const platform = detectPlatform(platformName);

  const settings: Settings = {
    dotfilesDir: path.resolve(options.dotfilesDir || env[DOTFILES_DIR_ENV] || process.cwd()),
    homeDir,
    configRoot: resolveConfigRoot({ env, platform, platformName, homeDir, logger: options.logger }),
    platform
  };
  return Object.freeze(settings);
}

export function isVerbose(flag: boolean | undefined, env: NodeJS.ProcessEnv = process.env): boolean {
  return !!flag || !!env[DEBUG_ENV];
}
