import { readFile } from 'node:fs/promises';
import { parse as parseYaml } from 'yaml';
import { z } from 'zod';

import type { SchedulerOptions } from '../playback/scheduler.js';

export const PlaybackConfigSchema = z
  .object({
    tempo: z.number().min(30).max(300).optional(),
    volume: z.number().min(0).max(1).optional(),
    loop: z.boolean().optional(),
    tick_interval_ms: z.number().positive().max(1000).optional()
  })
  .strict();

export type PlaybackConfig = z.infer<typeof PlaybackConfigSchema>;

/** Malformed or invalid playback configuration. */
export class ConfigError extends Error {
  readonly filePath?: string;
  readonly issues: string[];

  constructor(message: string, issues: string[] = [], filePath?: string) {
    super(filePath ? `Config error in ${filePath}: ${message}` : `Config error: ${message}`);
    this.name = 'ConfigError';
    this.filePath = filePath;
    this.issues = issues;
  }
}

/**
 * Parse playback settings from YAML text.
 * An empty document yields the defaults.
 */
export function parsePlaybackConfig(yamlText: string, filePath?: string): PlaybackConfig {
  let raw: unknown;
  try {
    raw = parseYaml(yamlText);
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : 'YAML is not parseable', [], filePath);
  }

  const result = PlaybackConfigSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.') || 'root'}: ${issue.message}`);
    throw new ConfigError(issues.join('; '), issues, filePath);
  }

  return result.data;
}

export async function loadPlaybackConfig(filePath: string): Promise<PlaybackConfig> {
  return parsePlaybackConfig(await readFile(filePath, 'utf8'), filePath);
}

/** Map config keys onto scheduler options. */
export function toSchedulerOptions(config: PlaybackConfig): SchedulerOptions {
  return {
    tempo: config.tempo,
    volume: config.volume,
    loop: config.loop,
    tickIntervalMs: config.tick_interval_ms
  };
}
