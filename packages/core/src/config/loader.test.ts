import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'fs';
import path from 'path';
import os from 'os';
import yaml from 'js-yaml';
import { ConfigError } from '@benchkit/shared';
import { ConfigLoader } from './loader';

describe('ConfigLoader', () => {
  let tmpDir: string;
  let home: string;
  let cwd: string;

  const write = (file: string, value: unknown) => {
    fs.mkdirSync(path.dirname(file), { recursive: true });
    fs.writeFileSync(file, yaml.dump(value));
  };

  beforeEach(() => {
    tmpDir = fs.mkdtempSync(path.join(os.tmpdir(), 'config-loader-'));
    home = path.join(tmpDir, 'home');
    cwd = path.join(tmpDir, 'project');
    fs.mkdirSync(home);
    fs.mkdirSync(cwd);
  });

  afterEach(() => {
    fs.rmSync(tmpDir, { recursive: true, force: true });
  });

  describe('load', () => {
    it('should load defaults when no files exist', () => {
      const config = ConfigLoader.load({ cwd, homeDir: home });
      expect(config.outDir).toBe('out');
      expect(config.tasksRoot).toBe('tasks');
      expect(config.sandbox).toEqual({ binary: 'docker' });
      expect(config.git.timeoutSec).toBe(120);
      expect(config.tools.timeouts).toEqual({ list_files: 30, read_file: 10, search: 60, apply_patch: 10 });
      expect(config.tools.runTimeoutSec).toBe(60);
    });

    it('should load user config', () => {
      write(path.join(home, '.benchkit', 'config.yaml'), { sandbox: { binary: 'podman' } });
      const config = ConfigLoader.load({ cwd, homeDir: home });
      expect(config.sandbox.binary).toBe('podman');
      expect(config.git.timeoutSec).toBe(120);
    });

    it('should respect precedence: flags > explicit > repo > user', () => {
      const explicit = path.join(tmpDir, 'explicit.yaml');
      write(path.join(home, '.benchkit', 'config.yaml'), { outDir: 'user', tasksRoot: 'user-tasks' });
      write(path.join(cwd, '.benchkit.yaml'), { outDir: 'repo', git: { timeoutSec: 30 } });
      write(explicit, { outDir: 'explicit' });

      const config = ConfigLoader.load({
        cwd,
        homeDir: home,
        configPath: explicit,
        flags: { outDir: 'flag' },
      });

      expect(config.outDir).toBe('flag');
      expect(config.tasksRoot).toBe('user-tasks');
      expect(config.git.timeoutSec).toBe(30);
    });

    it('should merge nested objects key by key', () => {
      write(path.join(cwd, '.benchkit.yaml'), { tools: { timeouts: { search: 5 } } });
      const config = ConfigLoader.load({ cwd, homeDir: home, flags: { tools: { runTimeoutSec: 15 } } });
      expect(config.tools.timeouts.search).toBe(5);
      expect(config.tools.timeouts.read_file).toBe(10);
      expect(config.tools.runTimeoutSec).toBe(15);
    });

    it('should fail if explicit config file is missing', () => {
      expect(() => ConfigLoader.load({ cwd, homeDir: home, configPath: '/missing.yaml' })).toThrow(
        /Config file not found/,
      );
    });

    it('should report every invalid field', () => {
      write(path.join(cwd, '.benchkit.yaml'), { git: { timeoutSec: -1 }, logging: { level: 'loud' } });
      try {
        ConfigLoader.load({ cwd, homeDir: home });
        expect.unreachable();
      } catch (err) {
        expect(err).toBeInstanceOf(ConfigError);
        const message = err instanceof Error ? err.message : '';
        expect(message.split('\n')[0]).toBe('Configuration validation failed:');
        expect(message).toContain('- git.timeoutSec:');
        expect(message).toContain('- logging.level:');
      }
    });

    it('should reject malformed YAML', () => {
      fs.writeFileSync(path.join(cwd, '.benchkit.yaml'), 'outDir: [unclosed');
      expect(() => ConfigLoader.load({ cwd, homeDir: home })).toThrow(ConfigError);
    });
  });

  describe('mergeConfigs', () => {
    it('replaces arrays instead of merging them', () => {
      expect(ConfigLoader.mergeConfigs({ a: [1, 2], b: { c: 1 } }, { a: [3], b: { d: 2 } })).toEqual({
        a: [3],
        b: { c: 1, d: 2 },
      });
    });
  });
});
