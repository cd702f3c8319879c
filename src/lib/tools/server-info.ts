import { readFileSync } from 'node:fs';
import { join } from 'node:path';

export const serverInfoToolDefinition = {
  name: 'mal_server_info',
  description:
    'Returns mal-mcp server metadata: version, available tools, and runtime info. Useful for debugging.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

function getVersion(): string {
  try {
    const pkgPath = join(__dirname, '..', '..', '..', 'package.json');
    const pkg = JSON.parse(readFileSync(pkgPath, 'utf-8')) as { version?: string };
    return pkg.version ?? 'unknown';
  } catch {
    return 'unknown';
  }
}

export function executeServerInfo(toolNames: readonly string[]): string {
  const version = getVersion();
  const lines: string[] = [];

  lines.push(`# mal-mcp v${version}`);
  lines.push('');
  lines.push(`Node: ${process.version}`);
  lines.push(`Platform: ${process.platform} ${process.arch}`);
  lines.push('');
  lines.push(`## Tools (${toolNames.length})`);
  for (const name of toolNames) {
    lines.push(`- ${name}`);
  }
  lines.push('');
  lines.push('## Environment');
  lines.push(`MAL_CLIENT_ID: ${process.env['MAL_CLIENT_ID'] ? 'set' : 'not set'}`);
  lines.push(`MAL_CLIENT_SECRET: ${process.env['MAL_CLIENT_SECRET'] ? 'set' : 'not set'}`);
  lines.push(`MAL_REDIRECT_URI: ${process.env['MAL_REDIRECT_URI'] || 'default'}`);
  lines.push(`MAL_PKCE_METHOD: ${process.env['MAL_PKCE_METHOD'] || 'S256'}`);
  lines.push(`MAL_TOKEN_CACHE: ${process.env['MAL_TOKEN_CACHE'] || 'enabled'}`);
  lines.push(`MAL_CONFIG_DIR: ${process.env['MAL_CONFIG_DIR'] || 'default'}`);
  lines.push(`MAL_LOGIN_TIMEOUT_MS: ${process.env['MAL_LOGIN_TIMEOUT_MS'] || 'default (300000)'}`);

  return lines.join('\n');
}
