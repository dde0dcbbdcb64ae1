// __tests__/mapping-table.test.ts

import * as fs from 'fs-extra';
import * as os from 'os';
import * as path from 'path';
import { CONFIG_FILE, DEFAULT_MAPPINGS } from '../src/constants';
import { ConfigurationError } from '../src/errors';
import {
  MappingTable,
  buildMappingTable,
  expandHome,
  loadDefinitions,
  parseTargetOverride,
  writeDefaultConfig
} from '../src/mapping-table';

describe('mapping table', () => {
  const dotfilesDir = '/srv/dotfiles';
  const homeDir = '/home/tester';
  const configRoot = '/home/tester/.config';

  describe('buildMappingTable', () => {
    it('should resolve the built-in entries against their roots', () => {
      const table = buildMappingTable({ dotfilesDir, homeDir, configRoot });

      expect(table.size).toBe(10);
      expect(table.get('tmux')).toEqual({
        name: 'tmux',
        source: '/srv/dotfiles/tmux/tmux.conf',
        target: '/home/tester/tmux/tmux.conf'
      });
      expect(table.get('git')?.target).toBe('/home/tester/.git/config');
      expect(table.get('vscode')?.target).toBe('/home/tester/.config/Code/User/settings.json');
      expect(table.get('nvim-plugins')?.source).toBe('/srv/dotfiles/nvim-plugins');
    });

    it('should keep declaration order', () => {
      const table = buildMappingTable({ dotfilesDir, homeDir, configRoot });

      expect(table.names()).toEqual(DEFAULT_MAPPINGS.map((definition) => definition.name));
      expect(table.names()[0]).toBe('bashrc');
      expect(table.names()[9]).toBe('cursor');
    });

    it('should freeze the table and its entries', () => {
      const table = buildMappingTable({ dotfilesDir, homeDir, configRoot });

      expect(Object.isFrozen(table)).toBe(true);
      expect(Object.isFrozen(table.get('bashrc'))).toBe(true);
    });

    it('should apply target overrides', () => {
      const table = buildMappingTable({
        dotfilesDir,
        homeDir,
        configRoot,
        overrides: [
          { name: 'tmux', target: '~/.tmux.conf' },
          { name: 'npmrc', target: '/etc/npmrc' },
          { name: 'git', target: 'work/.gitconfig' }
        ]
      });

      expect(table.get('tmux')?.target).toBe('/home/tester/.tmux.conf');
      expect(table.get('npmrc')?.target).toBe('/etc/npmrc');
      expect(table.get('git')?.target).toBe('/home/tester/work/.gitconfig');
      expect(table.get('tmux')?.source).toBe('/srv/dotfiles/tmux/tmux.conf');
    });

    it('should expand a leading tilde in home-rooted definitions', () => {
      const table = buildMappingTable({
        definitions: [
          { name: 'zsh', source: 'zshrc', target: '~/.zshrc', root: 'home' },
          { name: 'profile', source: 'profile', target: '~', root: 'home' }
        ],
        dotfilesDir,
        homeDir,
        configRoot
      });

      expect(table.get('zsh')?.target).toBe('/home/tester/.zshrc');
      expect(table.get('profile')?.target).toBe('/home/tester');
    });

    it('should reject an override for an unknown dotfile', () => {
      expect(() => buildMappingTable({
        dotfilesDir,
        homeDir,
        configRoot,
        overrides: [{ name: 'emacs', target: '~/.emacs' }]
      })).toThrow('Cannot map unknown dotfile: emacs');
    });

    it('should reject duplicate names', () => {
      expect(() => buildMappingTable({
        dotfilesDir,
        homeDir,
        configRoot,
        definitions: [
          { name: 'vim', source: 'vimrc', target: '.vimrc', root: 'home' },
          { name: 'vim', source: 'vimrc2', target: '.vimrc2', root: 'home' }
        ]
      })).toThrow(ConfigurationError);
    });
  });

  describe('MappingTable', () => {
    it('should report unknown names as absent', () => {
      const table = new MappingTable([{ name: 'a', source: '/a', target: '/b' }]);

      expect(table.has('a')).toBe(true);
      expect(table.has('b')).toBe(false);
      expect(table.get('b')).toBeUndefined();
    });
  });

  describe('parseTargetOverride', () => {
    it('should split on the first colon', () => {
      expect(parseTargetOverride('tmux:~/.tmux.conf')).toEqual({ name: 'tmux', target: '~/.tmux.conf' });
      expect(parseTargetOverride(' git : C:/git/config ')).toEqual({ name: 'git', target: 'C:/git/config' });
    });

    it.each(['tmux', ':~/.tmux.conf', 'tmux:', ''])('should reject %p', (value) => {
      expect(() => parseTargetOverride(value)).toThrow(ConfigurationError);
    });
  });

  describe('expandHome', () => {
    it('should expand a leading tilde and resolve relative paths from home', () => {
      expect(expandHome('~', homeDir)).toBe('/home/tester');
      expect(expandHome('~/.bashrc', homeDir)).toBe('/home/tester/.bashrc');
      expect(expandHome('.bashrc', homeDir)).toBe('/home/tester/.bashrc');
      expect(expandHome('/etc/bashrc', homeDir)).toBe('/etc/bashrc');
    });
  });

  describe('configuration file', () => {
    let root: string;

    beforeEach(async () => {
      root = await fs.mkdtemp(path.join(os.tmpdir(), 'dotlinks-config-'));
    });

    afterEach(async () => {
      await fs.remove(root);
    });

    it('should fall back to the built-in mappings without a file', async () => {
      expect(await loadDefinitions(root)).toBe(DEFAULT_MAPPINGS);
    });

    it('should load and default mappings from the file', async () => {
      await fs.writeJson(path.join(root, CONFIG_FILE), {
        version: '1.0.0',
        mappings: [
          { name: 'zsh', source: 'zshrc', target: '.zshrc' },
          { name: 'kitty', source: 'kitty.conf', target: 'kitty/kitty.conf', root: 'config' }
        ]
      });

      expect(await loadDefinitions(root)).toEqual([
        { name: 'zsh', source: 'zshrc', target: '.zshrc', root: 'home' },
        { name: 'kitty', source: 'kitty.conf', target: 'kitty/kitty.conf', root: 'config' }
      ]);
    });

    it('should resolve tilde targets from the file against the home directory', async () => {
      await fs.writeJson(path.join(root, CONFIG_FILE), {
        version: '1.0.0',
        mappings: [{ name: 'zsh', source: 'zshrc', target: '~/.zshrc' }]
      });

      const table = buildMappingTable({
        definitions: await loadDefinitions(root),
        dotfilesDir: root,
        homeDir,
        configRoot
      });

      expect(table.get('zsh')?.target).toBe('/home/tester/.zshrc');
    });

    it('should reject a file that fails validation', async () => {
      await fs.writeJson(path.join(root, CONFIG_FILE), { mappings: [] });

      await expect(loadDefinitions(root)).rejects.toThrow(
        'Configuration validation failed: "version" is required'
      );
    });

    it('should reject an unknown target root', async () => {
      await fs.writeJson(path.join(root, CONFIG_FILE), {
        version: '1.0.0',
        mappings: [{ name: 'zsh', source: 'zshrc', target: '.zshrc', root: 'etc' }]
      });

      await expect(loadDefinitions(root)).rejects.toBeInstanceOf(ConfigurationError);
    });

    it('should reject malformed JSON', async () => {
      await fs.writeFile(path.join(root, CONFIG_FILE), '{ "version": ');

      await expect(loadDefinitions(root)).rejects.toThrow(/^Failed to load configuration: /);
    });

    it('should write the built-in mappings once', async () => {
      expect(await writeDefaultConfig(root)).toBe(true);
      expect(await writeDefaultConfig(root)).toBe(false);

      const config = await fs.readJson(path.join(root, CONFIG_FILE));
      expect(config.version).toBe('1.0.0');
      expect(config.mappings).toHaveLength(10);
      expect(await loadDefinitions(root)).toEqual(DEFAULT_MAPPINGS);
    });
  });
});
