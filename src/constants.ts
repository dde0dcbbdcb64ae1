import Joi from 'joi';
import { Configuration, MappingDefinition } from './types';

export const VERSION = '1.0.0';
export const CONFIG_FILE = 'dotlinks.json';
export const CONFIG_VERSION = '1.0.0';
export const BACKUP_SUFFIX = '.backup';

export const CONFIG_DIR_ENV = 'CONFIG_DIR';
export const DOTFILES_DIR_ENV = 'DOTFILES_DIR';
export const DEBUG_ENV = 'DOTLINKS_DEBUG';

// nvim-plugins and nvim-no-plugins are alternatives and share a target.
export const DEFAULT_MAPPINGS: readonly MappingDefinition[] = [
  { name: 'bashrc', source: 'bashrc', target: '.bashrc', root: 'home' },
  { name: 'bash_aliases', source: 'bash_aliases', target: '.bash_aliases', root: 'home' },
  { name: 'bash_env', source: 'bash_env', target: '.bash_env', root: 'home' },
  { name: 'npmrc', source: 'npmrc', target: '.npmrc', root: 'home' },
  { name: 'git', source: 'git/config', target: '.git/config', root: 'home' },
  { name: 'tmux', source: 'tmux/tmux.conf', target: 'tmux/tmux.conf', root: 'home' },
  {
    name: 'nvim-plugins',
    source: 'nvim-plugins',
    target: 'nvim',
    root: 'config',
    description: 'Neovim with plugins'
  },
  {
    name: 'nvim-no-plugins',
    source: 'nvim-no-plugins',
    target: 'nvim',
    root: 'config',
    description: 'Neovim without plugins'
  },
  { name: 'vscode', source: 'vscode/settings.json', target: 'Code/User/settings.json', root: 'config' },
  { name: 'cursor', source: 'cursor/settings.json', target: 'Cursor/User/settings.json', root: 'config' }
];

export const configSchema = Joi.object<Configuration>({
  version: Joi.string().required(),
  mappings: Joi.array().items(
    Joi.object({
      name: Joi.string().required(),
      source: Joi.string().required(),
      target: Joi.string().required(),
      root: Joi.string().valid('home', 'config').default('home'),
      description: Joi.string().optional()
    })
  ).required()
}).required();
