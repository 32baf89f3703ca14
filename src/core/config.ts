/**
 * Server Config
 * Defaults, then an optional JSON file, then TASKBOARD_* environment variables.
 *
 * The JSON file is `taskboard.config.json` in the working directory unless
 * TASKBOARD_CONFIG points elsewhere. Unusable values fall back to defaults.
 */

import * as fs from 'fs';
import * as path from 'path';

export type ServerConfig = {
  /** Port the HTTP server listens on. */
  port: number;
  host: string;
  /** SQLite file path, or ":memory:". */
  dbPath: string;
  /** Allowed CORS origins; ["*"] allows any. */
  corsOrigins: string[];
  /** Log one line per request via Hono's logger middleware. */
  logRequests: boolean;
};

export const CONFIG_FILE_NAME = 'taskboard.config.json';

export function defaultServerConfig(cwd: string = process.cwd()): ServerConfig {
  return {
    port: 8000,
    host: '127.0.0.1',
    dbPath: path.join(cwd, 'data', 'taskboard.sqlite'),
    corsOrigins: ['*'],
    logRequests: true
  };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function asNonEmptyString(value: unknown): string | null {
  if (typeof value !== 'string') return null;
  const s = value.trim();
  return s.length > 0 ? s : null;
}

function asPort(value: unknown): number | null {
  const n = typeof value === 'number'
    ? Math.trunc(value)
    : typeof value === 'string' && /^\d+$/.test(value.trim())
      ? parseInt(value, 10)
      : NaN;
  return Number.isInteger(n) && n > 0 && n < 65536 ? n : null;
}

function asBoolean(value: unknown): boolean | null {
  if (typeof value === 'boolean') return value;
  if (typeof value !== 'string') return null;
  const v = value.trim().toLowerCase();
  if (v === 'true' || v === '1' || v === 'yes') return true;
  if (v === 'false' || v === '0' || v === 'no') return false;
  return null;
}

function asOriginList(value: unknown): string[] | null {
  const items = Array.isArray(value)
    ? value
    : typeof value === 'string'
      ? value.split(',')
      : null;
  if (!items) return null;

  const origins = items
    .map(asNonEmptyString)
    .filter((origin): origin is string => origin !== null);
  return origins.length > 0 ? origins : null;
}

/**
 * Overlay recognised keys from `source` onto `base`. Relative db paths are
 * resolved against `baseDir`.
 */
export function mergeServerConfig(base: ServerConfig, source: Record<string, unknown>, baseDir: string): ServerConfig {
  const dbPath = asNonEmptyString(source.dbPath);
  return {
    port: asPort(source.port) ?? base.port,
    host: asNonEmptyString(source.host) ?? base.host,
    dbPath: dbPath === null
      ? base.dbPath
      : dbPath === ':memory:' || path.isAbsolute(dbPath)
        ? dbPath
        : path.resolve(baseDir, dbPath),
    corsOrigins: asOriginList(source.corsOrigins) ?? base.corsOrigins,
    logRequests: asBoolean(source.logRequests) ?? base.logRequests
  };
}

export function readConfigFile(configPath: string): Record<string, unknown> | null {
  if (!fs.existsSync(configPath)) return null;

  try {
    const raw: unknown = JSON.parse(fs.readFileSync(configPath, 'utf8'));
    return isRecord(raw) ? raw : null;
  } catch (error) {
    console.warn(`[config] ignoring unreadable ${configPath}:`, error instanceof Error ? error.message : String(error));
    return null;
  }
}

export function loadServerConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): ServerConfig {
  let config = defaultServerConfig(cwd);

  const configPath = env.TASKBOARD_CONFIG
    ? path.resolve(cwd, env.TASKBOARD_CONFIG)
    : path.join(cwd, CONFIG_FILE_NAME);
  const fromFile = readConfigFile(configPath);
  if (fromFile) {
    config = mergeServerConfig(config, fromFile, path.dirname(configPath));
  }

  return mergeServerConfig(config, {
    port: env.TASKBOARD_PORT,
    host: env.TASKBOARD_HOST,
    dbPath: env.TASKBOARD_DB_PATH,
    corsOrigins: env.TASKBOARD_CORS_ORIGINS,
    logRequests: env.TASKBOARD_LOG_REQUESTS
  }, cwd);
}
