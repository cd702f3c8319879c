import { join } from 'node:path';
import { homedir } from 'node:os';
import type { AuthConfig, CodeChallengeMethod } from '../types/tokens.js';
import { ConfigurationError } from './errors.js';

export const DEFAULT_REDIRECT_URI = 'http://localhost:2525/callback';
export const DEFAULT_LOGIN_TIMEOUT_MS = 300_000; // 5 minutes
// Largest delay setTimeout honours; anything above fires almost at once.
export const MAX_LOGIN_TIMEOUT_MS = 2_147_483_647;

export interface ServerConfig {
  auth: AuthConfig;
  cacheEnabled: boolean;
  configDir: string;
  loginTimeoutMs: number;
  /** Set from MAL_ACCESS_TOKEN: use this token as-is, with no cache and no refresh. */
  accessToken?: string;
}

/**
 * Returns the config directory for mal-mcp.
 * Respects MAL_CONFIG_DIR, then XDG_CONFIG_HOME, falls back to ~/.config/mal-mcp.
 * The directory is created by the token cache on its first write.
 */
export function getConfigDir(): string {
  const explicit = process.env['MAL_CONFIG_DIR'];
  const configDir = explicit
    ? explicit
    : join(process.env['XDG_CONFIG_HOME'] || join(homedir(), '.config'), 'mal-mcp');
  return configDir;
}

/**
 * Checks that a redirect URI can be served by the local callback listener.
 * Returns a problem description, or null when the URI is usable.
 */
export function checkRedirectUri(redirectUri: string): string | null {
  let url: URL;
  try {
    url = new URL(redirectUri);
  } catch {
    return `"${redirectUri}" is not a valid URL`;
  }
  if (url.protocol !== 'http:') {
    return `"${redirectUri}" must use http:// (the callback listener does not serve TLS)`;
  }
  if (!url.hostname) {
    return `"${redirectUri}" has no host`;
  }
  return null;
}

/**
 * Loads auth configuration from environment variables.
 * Throws a ConfigurationError naming every missing or invalid variable.
 */
export function loadAuthConfig(): AuthConfig {
  const clientId = process.env['MAL_CLIENT_ID']?.trim();
  const clientSecret = process.env['MAL_CLIENT_SECRET']?.trim();
  const redirectUri = process.env['MAL_REDIRECT_URI']?.trim() || DEFAULT_REDIRECT_URI;
  const method = process.env['MAL_PKCE_METHOD']?.trim() || 'S256';

  const problems: string[] = [];
  if (!clientId) problems.push('MAL_CLIENT_ID is not set');

  const redirectProblem = checkRedirectUri(redirectUri);
  if (redirectProblem) problems.push(`MAL_REDIRECT_URI: ${redirectProblem}`);

  if (method !== 'S256' && method !== 'plain') {
    problems.push(`MAL_PKCE_METHOD must be "S256" or "plain", got "${method}"`);
  }

  if (!clientId || problems.length > 0) {
    throw new ConfigurationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const codeChallengeMethod: CodeChallengeMethod = method === 'plain' ? 'plain' : 'S256';
  const config: AuthConfig = { clientId, redirectUri, codeChallengeMethod };
  if (clientSecret) {
    config.clientSecret = clientSecret;
  }
  return config;
}

function parseCacheFlag(raw: string | undefined): boolean {
  if (raw === undefined) return true;
  return !['false', '0', 'off', 'no'].includes(raw.trim().toLowerCase());
}

function parseTimeout(raw: string | undefined): number {
  if (raw === undefined || raw.trim() === '') return DEFAULT_LOGIN_TIMEOUT_MS;
  const value = Number(raw);
  if (!Number.isInteger(value) || value <= 0) {
    throw new ConfigurationError(
      `Invalid configuration: MAL_LOGIN_TIMEOUT_MS must be a positive integer, got "${raw}"`,
    );
  }
  if (value > MAX_LOGIN_TIMEOUT_MS) {
    throw new ConfigurationError(
      `Invalid configuration: MAL_LOGIN_TIMEOUT_MS must be at most ${MAX_LOGIN_TIMEOUT_MS}, got "${raw}"`,
    );
  }
  return value;
}

/**
 * Loads everything the MCP server needs from the environment.
 */
export function loadServerConfig(): ServerConfig {
  const auth = loadAuthConfig();
  const loginTimeoutMs = parseTimeout(process.env['MAL_LOGIN_TIMEOUT_MS']);
  const accessToken = process.env['MAL_ACCESS_TOKEN']?.trim();
  // A supplied access token is never written to disk.
  const cacheEnabled = !accessToken && parseCacheFlag(process.env['MAL_TOKEN_CACHE']);
  const config: ServerConfig = {
    auth,
    cacheEnabled,
    configDir: cacheEnabled ? getConfigDir() : '',
    loginTimeoutMs,
  };
  if (accessToken) {
    config.accessToken = accessToken;
  }
  return config;
}
