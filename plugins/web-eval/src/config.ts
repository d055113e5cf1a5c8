/**
 * Runtime configuration, read from the environment (and the plugin's .env,
 * which the entry points load through dotenv before calling loadConfig).
 */

import { basename, dirname, join, resolve } from 'path';
import { fileURLToPath } from 'url';
import { z } from 'zod';

const __dirname = dirname(fileURLToPath(import.meta.url));

// src/ when run from sources, dist/src/ once built
export const PLUGIN_ROOT =
  basename(dirname(__dirname)) === 'dist'
    ? resolve(__dirname, '..', '..')
    : resolve(__dirname, '..');

export const DASHBOARD_HTML_PATH = join(PLUGIN_ROOT, 'static', 'dashboard.html');
export const MCP_SERVER_ENTRY = join(PLUGIN_ROOT, 'dist', 'src', 'mcp-server.js');

export const DEFAULT_BACKEND_URL = 'https://operative-backend.onrender.com';
export const DEFAULT_MODEL = 'claude-3-5-sonnet-20240620';
export const DEFAULT_LOG_PORT = 5009;

export interface Config {
  apiKey?: string;
  backendUrl: string;
  logPort: number;
  openDashboard: boolean;
  headless: boolean;
  maxSteps: number;
  model: string;
  chromePath?: string;
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const TRUTHY = new Set(['true', '1', 'yes']);

function blankToUndefined(value: unknown): unknown {
  return typeof value === 'string' && value.trim() === '' ? undefined : value;
}

function envString() {
  return z.preprocess(blankToUndefined, z.string().trim().optional());
}

function envBoolean(fallback: boolean) {
  return z
    .preprocess(
      (value) => blankToUndefined(typeof value === 'string' ? value.trim().toLowerCase() : value),
      z.enum(['true', 'false', '1', '0', 'yes', 'no']).optional(),
    )
    .transform((value) => (value === undefined ? fallback : TRUTHY.has(value)));
}

function envInt(fallback: number, min: number, max: number) {
  return z
    .preprocess(blankToUndefined, z.coerce.number().int().min(min).max(max).optional())
    .transform((value) => value ?? fallback);
}

const EnvSchema = z.object({
  OPERATIVE_API_KEY: envString(),
  OPERATIVE_BACKEND_URL: z
    .preprocess(blankToUndefined, z.string().trim().url().optional())
    .transform((value) => (value ?? DEFAULT_BACKEND_URL).replace(/\/+$/, '')),
  WEB_EVAL_LOG_PORT: envInt(DEFAULT_LOG_PORT, 0, 65_535),
  WEB_EVAL_OPEN_DASHBOARD: envBoolean(true),
  WEB_EVAL_HEADLESS: envBoolean(false),
  WEB_EVAL_MAX_STEPS: envInt(25, 1, 500),
  WEB_EVAL_MODEL: envString(),
  CHROME_PATH: envString(),
});

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const problems = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${problems}`);
  }

  const vars = parsed.data;
  return {
    apiKey: vars.OPERATIVE_API_KEY,
    backendUrl: vars.OPERATIVE_BACKEND_URL,
    logPort: vars.WEB_EVAL_LOG_PORT,
    openDashboard: vars.WEB_EVAL_OPEN_DASHBOARD,
    headless: vars.WEB_EVAL_HEADLESS,
    maxSteps: vars.WEB_EVAL_MAX_STEPS,
    model: vars.WEB_EVAL_MODEL ?? DEFAULT_MODEL,
    chromePath: vars.CHROME_PATH,
  };
}
