#!/usr/bin/env node

import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { AuthFlow } from './lib/auth.js';
import { loadServerConfig, type ServerConfig } from './lib/config.js';
import { errorMessage } from './lib/errors.js';
import { FileTokenCache } from './lib/token-cache.js';
import { createServer } from './server.js';

function printUsage(error: unknown): void {
  process.stderr.write(`Configuration error: ${errorMessage(error)}\n`);
  process.stderr.write('\nRequired environment variables:\n');
  process.stderr.write('  MAL_CLIENT_ID          - MyAnimeList API client ID\n');
  process.stderr.write('\nOptional:\n');
  process.stderr.write('  MAL_CLIENT_SECRET      - client secret (confidential clients only)\n');
  process.stderr.write(
    '  MAL_REDIRECT_URI       - registered redirect URI (default http://localhost:2525/callback)\n',
  );
  process.stderr.write('  MAL_PKCE_METHOD        - S256 (default) or plain\n');
  process.stderr.write('  MAL_TOKEN_CACHE        - set to false to keep tokens in memory only\n');
  process.stderr.write(
    '  MAL_CONFIG_DIR         - token cache directory (default ~/.config/mal-mcp)\n',
  );
  process.stderr.write('  MAL_LOGIN_TIMEOUT_MS   - how long to wait for the sign-in redirect\n');
  process.stderr.write(
    '  MAL_ACCESS_TOKEN       - use this access token as-is (no cache, no refresh)\n',
  );
}

async function main(): Promise<void> {
  // Validate env vars at startup
  let config: ServerConfig;
  try {
    config = loadServerConfig();
  } catch (error) {
    printUsage(error);
    process.exit(1);
  }

  const auth = config.accessToken
    ? AuthFlow.fromAccessToken(config.auth, config.accessToken, {
        loginTimeoutMs: config.loginTimeoutMs,
      })
    : await AuthFlow.initialize(config.auth, {
        cacheEnabled: config.cacheEnabled,
        cache: config.cacheEnabled ? new FileTokenCache(config.configDir) : undefined,
        loginTimeoutMs: config.loginTimeoutMs,
      });
  process.stderr.write(`mal-mcp ready (session: ${auth.status})\n`);

  const server = createServer(auth);
  const transport = new StdioServerTransport();
  await server.connect(transport);
}

main().catch((error: unknown) => {
  process.stderr.write(`mal-mcp failed to start: ${errorMessage(error)}\n`);
  process.exit(1);
});
