import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { ConfigLoader } from './loader';
import { ConfigError } from '../errors';

describe('ConfigLoader', () => {
  let homeDir: string;
  let repoDir: string;

  beforeEach(() => {
    homeDir = fs.mkdtempSync(path.join(os.tmpdir(), 'histree-home-'));
    repoDir = fs.mkdtempSync(path.join(os.tmpdir(), 'histree-repo-'));
  });

  afterEach(() => {
    fs.rmSync(homeDir, { recursive: true, force: true });
    fs.rmSync(repoDir, { recursive: true, force: true });
  });

  it('returns defaults when no config files exist', () => {
    const config = ConfigLoader.load({ cwd: repoDir, homeDir });

    expect(config).toEqual({
      configVersion: 1,
      scan: { glob: '**/*', batchSize: 50, queueCapacity: 256 },
      cache: { dir: '.histree/cache' },
      lazy: { mode: 'auto', fileThreshold: 10000 },
      view: { sortKey: 'commitCount', depth: 2, limit: 50 },
    });
  });

  it('applies precedence flags > explicit > repo > user', () => {
    fs.mkdirSync(path.join(homeDir, '.histree'));
    fs.writeFileSync(
      path.join(homeDir, '.histree', 'config.yaml'),
      'scan:\n  batchSize: 10\n  glob: "**/*.md"\nview:\n  depth: 4\n',
    );
    fs.writeFileSync(path.join(repoDir, '.histree.yaml'), 'scan:\n  batchSize: 20\n');
    const explicitPath = path.join(repoDir, 'explicit.yaml');
    fs.writeFileSync(explicitPath, 'lazy:\n  mode: "on"\nscan:\n  queueCapacity: 8\n');

    const config = ConfigLoader.load({
      cwd: repoDir,
      homeDir,
      configPath: explicitPath,
      flags: { scan: { glob: 'src/**', batchSize: undefined } },
    });

    expect(config.scan).toEqual({ glob: 'src/**', batchSize: 20, queueCapacity: 8 });
    expect(config.lazy.mode).toBe('on');
    expect(config.view.depth).toBe(4);
  });

  it('throws ConfigError for a missing explicit config file', () => {
    expect(() =>
      ConfigLoader.load({ cwd: repoDir, homeDir, configPath: path.join(repoDir, 'nope.yaml') }),
    ).toThrow(ConfigError);
  });

  it('throws ConfigError for invalid YAML', () => {
    fs.writeFileSync(path.join(repoDir, '.histree.yaml'), 'scan: [unclosed');
    expect(() => ConfigLoader.load({ cwd: repoDir, homeDir })).toThrow(/Error parsing YAML file/);
  });

  it('throws ConfigError listing schema violations', () => {
    fs.writeFileSync(path.join(repoDir, '.histree.yaml'), 'view:\n  sortKey: size\n');
    expect(() => ConfigLoader.load({ cwd: repoDir, homeDir })).toThrow(
      /Configuration validation failed:\n- view\.sortKey:/,
    );
  });

  it('rejects a YAML file that is not a mapping', () => {
    fs.writeFileSync(path.join(repoDir, '.histree.yaml'), '- a\n- b\n');
    expect(() => ConfigLoader.load({ cwd: repoDir, homeDir })).toThrow(
      'Config file must contain a mapping',
    );
  });

  describe('mergeConfigs', () => {
    it('merges nested objects and replaces arrays', () => {
      const merged = ConfigLoader.mergeConfigs(
        { a: { b: 1, c: [1, 2] }, d: 'x' },
        { a: { c: [3] }, d: undefined },
      );
      expect(merged).toEqual({ a: { b: 1, c: [3] }, d: 'x' });
    });
  });
});
