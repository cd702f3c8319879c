import { createServer } from 'node:net';
import { createServer as createHttpServer, type Server, type ServerResponse } from 'node:http';
import { DEFAULT_LOGIN_TIMEOUT_MS, MAX_LOGIN_TIMEOUT_MS } from './config.js';
import { CallbackError, errorMessage } from './errors.js';

export interface CallbackWaitOptions {
  timeoutMs?: number;
  signal?: AbortSignal;
  /** Called with the callback URL once the listener is bound. */
  onListening?: (url: string) => void;
}

export interface CallbackWait {
  /** Resolves with the authorization code. */
  promise: Promise<string>;
  server: Server;
}

function escapeHtml(text: string): string {
  return text
    .replace(/&/g, '&amp;')
    .replace(/</g, '&lt;')
    .replace(/>/g, '&gt;')
    .replace(/"/g, '&quot;')
    .replace(/'/g, '&#x27;');
}

function page(title: string, message: string): string {
  return `<!DOCTYPE html><html><body style="font-family:sans-serif;text-align:center;padding:40px"><h1>${title}</h1><p>${message}</p></body></html>`;
}

// The listener goes away once the wait settles, so the socket is not kept alive.
function respond(res: ServerResponse, status: number, html: string): void {
  res.writeHead(status, { 'Content-Type': 'text/html', Connection: 'close' });
  res.end(html);
}

/**
 * Finds an available port by binding to port 0 and reading the assigned port.
 * @internal Exported for testing only.
 */
export function findAvailablePort(): Promise<number> {
  return new Promise((resolve, reject) => {
    const srv = createServer();
    srv.listen(0, () => {
      const addr = srv.address();
      if (addr && typeof addr === 'object') {
        const port = addr.port;
        srv.close(() => resolve(port));
      } else {
        srv.close(() => reject(new Error('Could not determine port')));
      }
    });
    srv.on('error', reject);
  });
}

/**
 * Starts an HTTP server on the redirect URI's host and port and waits for the
 * OAuth callback on its path. Requests to other paths get a 404 and the wait
 * goes on. The first request on the callback path settles the wait, and the
 * server is closed whichever way it settles.
 */
export function waitForAuthCallback(
  redirectUri: string,
  expectedState: string,
  options: CallbackWaitOptions = {},
): CallbackWait {
  const redirect = new URL(redirectUri);
  const port = redirect.port ? Number(redirect.port) : 80;
  const hostname = redirect.hostname.replace(/^\[|\]$/g, '');
  const callbackPath = redirect.pathname || '/';
  const timeoutMs = Math.min(options.timeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS, MAX_LOGIN_TIMEOUT_MS);

  const httpServer: Server = createHttpServer();

  const promise = new Promise<string>((resolve, reject) => {
    let settled = false;

    const finish = (outcome: { code: string } | { error: CallbackError }): void => {
      if (settled) return;
      settled = true;
      clearTimeout(timeout);
      options.signal?.removeEventListener('abort', onAbort);
      httpServer.close();
      httpServer.closeIdleConnections();
      if ('code' in outcome) {
        resolve(outcome.code);
      } else {
        reject(outcome.error);
      }
    };

    const timeout = setTimeout(() => {
      finish({
        error: new CallbackError(
          'timeout',
          `Login timed out after ${Math.round(timeoutMs / 1000)} seconds. Please try again.`,
        ),
      });
    }, timeoutMs);

    const onAbort = (): void => {
      finish({ error: new CallbackError('cancelled', 'Login was cancelled') });
    };

    if (options.signal?.aborted) {
      onAbort();
      return;
    }
    options.signal?.addEventListener('abort', onAbort, { once: true });

    httpServer.on('request', (req, res) => {
      const url = new URL(req.url ?? '/', redirect.origin);
      if (settled || req.method !== 'GET' || url.pathname !== callbackPath) {
        res.writeHead(404);
        res.end('Not found');
        return;
      }

      const error = url.searchParams.get('error');
      const callbackState = url.searchParams.get('state');
      const callbackCode = url.searchParams.get('code');

      if (error) {
        const errorDesc = url.searchParams.get('error_description') || error;
        respond(res, 400, page('Sign-in failed', escapeHtml(errorDesc)));
        finish({
          error: new CallbackError('denied', `MyAnimeList sign-in failed: ${errorDesc}`, {
            providerError: error,
          }),
        });
        return;
      }

      if (callbackState !== expectedState) {
        respond(res, 400, page('Error', 'State mismatch. Please start the sign-in again.'));
        finish({
          error: new CallbackError('state_mismatch', 'State mismatch in OAuth callback'),
        });
        return;
      }

      if (!callbackCode) {
        respond(res, 400, page('Error', 'No authorization code received.'));
        finish({
          error: new CallbackError('malformed', 'No authorization code in callback'),
        });
        return;
      }

      respond(res, 200, page("You're logged in!", 'You can now close this window.'));
      finish({ code: callbackCode });
    });

    httpServer.on('error', (err) => {
      finish({
        error: new CallbackError(
          'listen_failed',
          `Could not listen on ${redirect.host}: ${errorMessage(err)}`,
          { cause: err },
        ),
      });
    });

    httpServer.listen(port, hostname, () => {
      if (settled) {
        // settled while the hostname was still resolving
        httpServer.close();
        return;
      }
      options.onListening?.(redirect.toString());
    });
  });

  return { promise, server: httpServer };
}
