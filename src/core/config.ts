/**
 * Config loader — reads data/config.yaml, overlays the environment,
 * validates everything with zod and fills in defaults.
 *
 * The file is optional: with no config at all the relay still starts
 * (and warns at startup if there is no API key).
 */

import { readFileSync, existsSync } from 'node:fs';
import { join } from 'node:path';
import YAML from 'yaml';
import { z } from 'zod';
import type { RelayConfig, Valves } from '../types/index.js';

export const DEFAULT_BASE_URL = 'https://api.anthropic.com/v1/messages';

export const ValvesSchema = z.object({
  apiKey: z.string().default(''),
  maxImages: z.number().int().nonnegative().default(5),
  maxImageSizeMb: z.number().nonnegative().default(100),
  defaultMaxTokens: z.number().int().positive().default(4096),
  defaultTemperature: z.number().min(0).max(1).default(0.8),
  defaultTopK: z.number().int().nonnegative().default(40),
  defaultTopP: z.number().min(0).max(1).default(0.9),
  baseUrl: z.string().url().default(DEFAULT_BASE_URL),
  timeout: z.number().nonnegative().default(600),
});

/** Runtime valve changes: any subset, no unknown keys, no defaults filled in */
export const ValvesUpdateSchema = ValvesSchema.partial().strict();

export const RelayConfigSchema = z.object({
  server: z
    .object({
      port: z.number().int().min(0).max(65535).default(9099),
      host: z.string().default('0.0.0.0'),
      token: z.string().optional(),
    })
    .default({}),
  valves: ValvesSchema.default({}),
});

/** Valves with every default applied */
export function defaultValves(overrides: Partial<Valves> = {}): Valves {
  return ValvesSchema.parse(overrides);
}

/**
 * Load config from the data directory.
 * Throws if the file exists but is not valid — a broken config
 * should stop the process, not silently fall back to defaults.
 */
export function loadConfig(
  dataDir: string,
  env: NodeJS.ProcessEnv = process.env
): RelayConfig {
  const configPath = join(dataDir, 'config.yaml');

  const raw: unknown = existsSync(configPath)
    ? YAML.parse(readFileSync(configPath, 'utf-8'))
    : {};

  const file = isRecord(raw) ? raw : {};
  const valves = isRecord(file.valves) ? file.valves : {};

  const merged = {
    ...file,
    valves: {
      ...valves,
      ...(env.ANTHROPIC_API_KEY ? { apiKey: env.ANTHROPIC_API_KEY } : {}),
    },
  };

  const parsed = RelayConfigSchema.safeParse(merged);
  if (!parsed.success) {
    throw new Error(`Invalid config at ${configPath}: ${formatIssues(parsed.error)}`);
  }
  return parsed.data;
}

export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
    .join('; ');
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
