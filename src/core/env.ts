import { ConfigurationError } from './errors.js';
import { DEFAULT_LAUNCH_CONTEXT_FIELDS, DEFAULT_PORT } from './config.js';
import { isLogLevel, type LogLevel } from '../utils/logger.js';
import { parseAbsoluteUrl, trimTrailingSlash } from '../utils/url.js';

/**
 * Proxy settings read from the environment.
 */
export interface ProxyEnvConfig {
  /** Identity provider authority (`SMART_PROXY_AUTHORITY`) */
  authority: string;
  /** Client id written into token responses (`SMART_PROXY_CLIENT_ID`) */
  clientId?: string;
  /** Whether the proxy routes are mounted (`SMART_PROXY_ENABLED`, default true) */
  enabled: boolean;
  /** Listening port (`PORT`, default 4000) */
  port: number;
  /** Externally visible origin (`SMART_PROXY_BASE_URL`, default http://localhost:{port}) */
  baseUrl: string;
  /** Mount path of the proxy routes (`SMART_PROXY_BASE_PATH`, default root) */
  basePath: string;
  /** Origins allowed to call the proxy from a browser (`SMART_PROXY_CORS_ORIGINS`) */
  corsOrigins: string[];
  /** Launch context keys copied into token responses (`SMART_PROXY_LAUNCH_FIELDS`) */
  launchContextFields: string[];
  /** Minimum log level (`LOG_LEVEL`, default info) */
  logLevel: LogLevel;
}

type Env = Record<string, string | undefined>;

function readList(value: string | undefined): string[] | undefined {
  if (!value?.trim()) {
    return undefined;
  }
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item !== '');
}

function readBoolean(name: string, value: string | undefined, fallback: boolean): boolean {
  if (value === undefined || value.trim() === '') {
    return fallback;
  }
  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'on'].includes(normalized)) return true;
  if (['false', '0', 'no', 'off'].includes(normalized)) return false;
  throw new ConfigurationError(`${name} must be a boolean, got "${value}"`);
}

function readPort(value: string | undefined): number {
  if (value === undefined || value.trim() === '') {
    return DEFAULT_PORT;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    throw new ConfigurationError(`PORT must be an integer between 0 and 65535, got "${value}"`);
  }
  return port;
}

/**
 * Normalize a mount path: `''` and `'/'` mean the root, anything else must
 * start with `/` and loses trailing slashes.
 */
export function normalizeBasePath(value: string | undefined): string {
  const path = trimTrailingSlash(value?.trim() ?? '');
  if (path !== '' && !path.startsWith('/')) {
    throw new ConfigurationError(`SMART_PROXY_BASE_PATH must start with "/", got "${value}"`);
  }
  return path;
}

/**
 * Load the proxy configuration from environment variables.
 *
 * @throws ConfigurationError when a variable is missing or malformed
 */
export function loadProxyConfig(env: Env = process.env): ProxyEnvConfig {
  const authority = env['SMART_PROXY_AUTHORITY']?.trim();
  if (!authority) {
    throw new ConfigurationError('SMART_PROXY_AUTHORITY is required');
  }
  if (!parseAbsoluteUrl(authority)) {
    throw new ConfigurationError(`SMART_PROXY_AUTHORITY must be an absolute URL, got "${authority}"`);
  }

  const port = readPort(env['PORT']);

  const baseUrl = trimTrailingSlash(env['SMART_PROXY_BASE_URL']?.trim() || `http://localhost:${port}`);
  if (!parseAbsoluteUrl(baseUrl)) {
    throw new ConfigurationError(`SMART_PROXY_BASE_URL must be an absolute URL, got "${baseUrl}"`);
  }

  const logLevel = env['LOG_LEVEL']?.trim().toLowerCase() || 'info';
  if (!isLogLevel(logLevel)) {
    throw new ConfigurationError(`LOG_LEVEL must be one of debug, info, warn, error, got "${logLevel}"`);
  }

  return {
    authority,
    clientId: env['SMART_PROXY_CLIENT_ID']?.trim() || undefined,
    enabled: readBoolean('SMART_PROXY_ENABLED', env['SMART_PROXY_ENABLED'], true),
    port,
    baseUrl,
    basePath: normalizeBasePath(env['SMART_PROXY_BASE_PATH']),
    corsOrigins: readList(env['SMART_PROXY_CORS_ORIGINS']) ?? [],
    launchContextFields: readList(env['SMART_PROXY_LAUNCH_FIELDS']) ?? [...DEFAULT_LAUNCH_CONTEXT_FIELDS],
    logLevel,
  };
}
