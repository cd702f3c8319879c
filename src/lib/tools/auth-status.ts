import { z } from 'zod';
import type { TokenSet } from '../../types/tokens.js';
import type { AuthFlow } from '../auth.js';
import { getMyUserInfo } from '../anime.js';
import { openBrowser } from '../browser.js';
import { AuthRequiredError, ExchangeError, errorMessage } from '../errors.js';
import { parseArgs } from './args.js';

export const authStatusToolDefinition = {
  name: 'mal_auth_status',
  description:
    'Check MyAnimeList connection status. If not connected, opens browser to sign in. ' +
    'Pass sign_out to forget the stored session.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      sign_out: { type: 'boolean', description: 'Sign out and delete cached tokens' },
    },
  },
};

const authStatusArgsSchema = z.object({
  sign_out: z.boolean().optional(),
});

export interface AuthStatusOptions {
  openUrl?: (url: string) => void;
}

interface UserLookup {
  userName: string | null;
  /** MAL answered 401: the token is no good, whatever its expiry says. */
  rejected: boolean;
}

/**
 * Fetches the user name for the status display.
 * The name is null if the fetch fails.
 */
async function lookUpUser(token: string): Promise<UserLookup> {
  const result = await getMyUserInfo(token);
  if (!result.ok) {
    return { userName: null, rejected: result.error.status === 401 };
  }
  return { userName: result.data.name, rejected: false };
}

function formatJustConnected(userName: string | null): string {
  const lines = ['Status: Connected ✓ (just signed in)'];
  if (userName) {
    lines.push(`User: ${userName}`);
  }
  return lines.join('\n');
}

function formatConnectedStatus(
  tokens: TokenSet,
  userName: string | null,
  cachingEnabled: boolean,
): string {
  const lines = ['Status: Connected ✓'];
  if (userName) {
    lines.push(`User: ${userName}`);
  }
  lines.push(`Token expires: ${tokens.expires_at}`);
  lines.push(`Token cache: ${cachingEnabled ? 'enabled' : 'disabled'}`);
  return lines.join('\n');
}

function formatFixedTokenStatus(userName: string | null): string {
  const lines = ['Status: Connected ✓'];
  if (userName) {
    lines.push(`User: ${userName}`);
  }
  lines.push('Token: supplied by MAL_ACCESS_TOKEN (not refreshed)');
  lines.push('Token cache: disabled');
  return lines.join('\n');
}

function formatError(message: string): string {
  return [
    'Status: Not connected',
    `Error: ${message}`,
    'Action: Run mal_auth_status again to sign in.',
  ].join('\n');
}

/**
 * Check MyAnimeList connection status.
 * Handles the full lifecycle: no tokens, expired tokens, valid tokens.
 * Runs the sign-in when there is no usable session.
 */
export async function executeAuthStatus(
  auth: AuthFlow,
  args: unknown,
  options: AuthStatusOptions = {},
): Promise<string> {
  const openUrl = options.openUrl ?? openBrowser;
  try {
    const { sign_out } = parseArgs(authStatusArgsSchema, args);
    if (sign_out) {
      await auth.logout();
      return 'Status: Signed out\nRun mal_auth_status again to sign in.';
    }

    if (auth.usingFixedToken) {
      const user = await lookUpUser(await auth.getAccessToken());
      if (!user.rejected) {
        return formatFixedTokenStatus(user.userName);
      }
      process.stderr.write('MyAnimeList rejected the supplied access token.\n');
      await auth.logout();
    } else if (auth.currentTokens) {
      try {
        const tokens = await auth.ensureFresh();
        const user = await lookUpUser(tokens.access_token);
        if (!user.rejected) {
          return formatConnectedStatus(tokens, user.userName, auth.cachingEnabled);
        }
        process.stderr.write('MyAnimeList rejected the stored session.\n');
        await auth.logout();
      } catch (error) {
        if (!(error instanceof ExchangeError || error instanceof AuthRequiredError)) {
          throw error;
        }
        process.stderr.write(`Session could not be refreshed: ${error.message}\n`);
      }
    }

    process.stderr.write('Not connected. Starting MyAnimeList sign-in...\n');
    const { authUrl, challenge } = auth.beginLogin();
    process.stderr.write(`If no browser opens, visit:\n${authUrl}\n`);

    const tokens = await auth.completeLogin(challenge, { onListening: () => openUrl(authUrl) });
    const { userName } = await lookUpUser(tokens.access_token);
    return formatJustConnected(userName);
  } catch (error) {
    return formatError(errorMessage(error));
  }
}
