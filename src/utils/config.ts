/**
 * Configuration
 *
 * Layers, lowest precedence first:
 *   1. DEFAULT_CONFIG
 *   2. JSON file ($HIGHLIGHT_REEL_CONFIG or ./highlight-reel.config.json)
 *   3. Environment variables (FFMPEG_PATH, FFPROBE_PATH, HIGHLIGHT_REEL_CONCURRENCY, HIGHLIGHT_REEL_DEBUG)
 *   4. Overrides passed by the caller
 */

import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { z } from 'zod';
import { ConfigError } from './errors';
import { isTruthyFlag } from './logger';

export const CONFIG_FILENAME = 'highlight-reel.config.json';

const MAX_DEFAULT_CONCURRENCY = 8;

/** Largest delay setTimeout honours; anything above fires after 1ms */
export const MAX_JOB_TIMEOUT_MS = 2_147_483_647;

export function defaultConcurrency(): number {
  return Math.min(MAX_DEFAULT_CONCURRENCY, Math.max(1, os.availableParallelism() - 1));
}

export const configSchema = z
  .object({
    ffmpegPath: z.string().min(1).nullable(),
    ffprobePath: z.string().min(1).nullable(),
    concurrency: z.number().int().min(1),
    jobTimeoutMs: z.number().int().positive().max(MAX_JOB_TIMEOUT_MS),
    gapSpeed: z.number().positive(),
    resolution: z.enum(['source', '720p', '1080p']),
    frameRate: z.number().positive().max(240),
    concatMode: z.enum(['copy', 'reencode']),
    duplicateLabelPolicy: z.enum(['suffix', 'keep-first', 'keep-last']),
    chapters: z
      .object({
        minSpacingSeconds: z.number().nonnegative(),
        leadingLabel: z.string().nullable(),
        defaultLabel: z.string().min(1),
      })
      .strict(),
    debug: z.boolean(),
  })
  .strict();

export type HighlightReelConfig = z.infer<typeof configSchema>;

export type ChapterConfig = HighlightReelConfig['chapters'];

export type ConfigOverrides = Partial<Omit<HighlightReelConfig, 'chapters'>> & {
  chapters?: Partial<ChapterConfig>;
};

export function defaultConfig(): HighlightReelConfig {
  return {
    ffmpegPath: null,
    ffprobePath: null,
    concurrency: defaultConcurrency(),
    jobTimeoutMs: 30 * 60 * 1000,
    gapSpeed: 3.0,
    resolution: '1080p',
    frameRate: 60,
    concatMode: 'copy',
    duplicateLabelPolicy: 'suffix',
    chapters: {
      minSpacingSeconds: 10,
      leadingLabel: null,
      defaultLabel: 'Chapter',
    },
    debug: false,
  };
}

type PlainObject = Record<string, unknown>;

function isPlainObject(value: unknown): value is PlainObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

export function deepMerge(base: PlainObject, incoming: PlainObject): PlainObject {
  const merged: PlainObject = { ...base };
  for (const [key, value] of Object.entries(incoming)) {
    if (value === undefined) continue;
    const current = merged[key];
    merged[key] = isPlainObject(value) && isPlainObject(current) ? deepMerge(current, value) : value;
  }
  return merged;
}

export function configPath(env: NodeJS.ProcessEnv = process.env, cwd = process.cwd()): string {
  const override = env.HIGHLIGHT_REEL_CONFIG;
  return override ? path.resolve(cwd, override) : path.join(cwd, CONFIG_FILENAME);
}

function readConfigFile(filePath: string): PlainObject {
  if (!fs.existsSync(filePath)) return {};
  let parsed: unknown;
  try {
    parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
  } catch (e) {
    throw new ConfigError(
      `Could not parse ${filePath}: ${e instanceof Error ? e.message : String(e)}`
    );
  }
  if (!isPlainObject(parsed)) {
    throw new ConfigError(`${filePath} must contain a JSON object`);
  }
  return parsed;
}

function envLayer(env: NodeJS.ProcessEnv): PlainObject {
  const layer: PlainObject = {};
  if (env.FFMPEG_PATH) layer.ffmpegPath = env.FFMPEG_PATH;
  if (env.FFPROBE_PATH) layer.ffprobePath = env.FFPROBE_PATH;
  if (env.HIGHLIGHT_REEL_CONCURRENCY) {
    const n = Number(env.HIGHLIGHT_REEL_CONCURRENCY);
    if (!Number.isInteger(n)) {
      throw new ConfigError('must be an integer', 'HIGHLIGHT_REEL_CONCURRENCY');
    }
    layer.concurrency = n;
  }
  if (env.HIGHLIGHT_REEL_DEBUG !== undefined) layer.debug = isTruthyFlag(env.HIGHLIGHT_REEL_DEBUG);
  return layer;
}

export interface LoadConfigOptions {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  overrides?: ConfigOverrides;
}

export function loadConfig(options: LoadConfigOptions = {}): HighlightReelConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let merged: PlainObject = { ...defaultConfig() };
  merged = deepMerge(merged, readConfigFile(configPath(env, cwd)));
  merged = deepMerge(merged, envLayer(env));
  if (options.overrides) merged = deepMerge(merged, { ...options.overrides });

  const result = configSchema.safeParse(merged);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new ConfigError(issue.message, issue.path.join('.') || undefined);
  }
  return result.data;
}
