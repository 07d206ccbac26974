import { mkdtemp, writeFile } from 'node:fs/promises';
import os from 'node:os';
import path from 'node:path';

import { describe, expect, it } from 'vitest';

import {
  ConfigError,
  loadPlaybackConfig,
  parsePlaybackConfig,
  toSchedulerOptions
} from '../../src/config/playback-config.js';

describe('playback config', () => {
  it('parses known keys', () => {
    const config = parsePlaybackConfig(['tempo: 96', 'volume: 0.5', 'loop: true', 'tick_interval_ms: 5'].join('\n'));

    expect(config).toEqual({ tempo: 96, volume: 0.5, loop: true, tick_interval_ms: 5 });
    expect(toSchedulerOptions(config)).toEqual({ tempo: 96, volume: 0.5, loop: true, tickIntervalMs: 5 });
  });

  it('treats an empty document as defaults', () => {
    expect(parsePlaybackConfig('')).toEqual({});
  });

  it('reports range violations with the offending key', () => {
    expect(() => parsePlaybackConfig('tempo: 400', 'playback.yaml')).toThrow(
      'Config error in playback.yaml: tempo: Number must be less than or equal to 300'
    );
  });

  it('rejects unknown keys', () => {
    try {
      parsePlaybackConfig('speed: 2');
      expect.unreachable();
    } catch (error) {
      expect(error).toBeInstanceOf(ConfigError);
      if (error instanceof ConfigError) {
        expect(error.issues).toEqual(["root: Unrecognized key(s) in object: 'speed'"]);
        expect(error.filePath).toBeUndefined();
      }
    }
  });

  it('wraps YAML syntax errors', () => {
    expect(() => parsePlaybackConfig('tempo: [96')).toThrow(ConfigError);
  });

  it('loads a config file from disk', async () => {
    const tempDir = await mkdtemp(path.join(os.tmpdir(), 'playback-config-'));
    const filePath = path.join(tempDir, 'playback.yaml');
    await writeFile(filePath, 'loop: false\nvolume: 1\n', 'utf8');

    await expect(loadPlaybackConfig(filePath)).resolves.toEqual({ loop: false, volume: 1 });
  });
});
