import { z } from 'zod';
import type { AuthConfig, AuthStatus, PkceChallenge, TokenSet } from '../types/tokens.js';
import { checkRedirectUri, DEFAULT_LOGIN_TIMEOUT_MS, getConfigDir } from './config.js';
import { waitForAuthCallback, type CallbackWaitOptions } from './callback-server.js';
import {
  AuthRequiredError,
  CacheError,
  ConfigurationError,
  ExchangeError,
  errorMessage,
} from './errors.js';
import { createPkceChallenge } from './pkce.js';
import { FileTokenCache, type TokenCache } from './token-cache.js';

export const AUTHORIZE_URL = 'https://myanimelist.net/v1/oauth2/authorize';
export const TOKEN_URL = 'https://myanimelist.net/v1/oauth2/token';
export const EXPIRY_BUFFER_MS = 60_000; // 1 minute
export const MAX_EXPIRES_IN_SECONDS = 315_360_000; // 10 years

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

type GrantType = 'authorization_code' | 'refresh_token';

/** A TokenSet as issued; refresh responses may leave out the refresh token. */
export type IssuedTokens = Omit<TokenSet, 'refresh_token'> & { refresh_token?: string };

const tokenResponseSchema = z.object({
  access_token: z.string().min(1),
  refresh_token: z.string().min(1).optional(),
  expires_in: z.number().int().positive().max(MAX_EXPIRES_IN_SECONDS),
  token_type: z.string().refine((value) => value.toLowerCase() === 'bearer', {
    message: 'Unsupported token_type',
  }),
});

export interface AuthFlowOptions {
  /** Token cache to use. Defaults to tokens.json in the config directory. */
  cache?: TokenCache;
  /** When false no cache is read or written. Defaults to true. */
  cacheEnabled?: boolean;
  fetch?: FetchLike;
  now?: () => number;
  loginTimeoutMs?: number;
  /** Receives cache failures; the flow carries on without persistence. */
  onCacheError?: (error: CacheError) => void;
  /** Receives a failed refresh of cached tokens during initialize(). */
  onRefreshError?: (error: ExchangeError) => void;
}

export type LoginOptions = CallbackWaitOptions;

export interface LoginStart {
  authUrl: string;
  challenge: PkceChallenge;
}

/**
 * Returns true if the token expires within the 60 s safety buffer.
 */
export function isTokenExpired(tokens: TokenSet, now: number = Date.now()): boolean {
  const expiresAt = new Date(tokens.expires_at).getTime();
  return expiresAt < now + EXPIRY_BUFFER_MS;
}

function reportCacheError(error: CacheError): void {
  process.stderr.write(`Token cache error (${error.operation} ${error.path}): ${error.message}\n`);
}

function reportRefreshError(error: ExchangeError): void {
  process.stderr.write(`Cached session could not be refreshed: ${error.message}\n`);
}

function toCacheError(err: unknown, operation: 'read' | 'write' | 'delete'): CacheError {
  if (err instanceof CacheError) {
    return err;
  }
  return new CacheError(operation, 'token cache', errorMessage(err), { cause: err });
}

/**
 * Posts a grant to the MyAnimeList token endpoint and turns the response into a TokenSet.
 * @internal Exported for testing only.
 */
export async function requestTokens(
  fetchImpl: FetchLike,
  config: AuthConfig,
  grantType: GrantType,
  params: Record<string, string>,
  now: number,
): Promise<IssuedTokens> {
  const body = new URLSearchParams({
    client_id: config.clientId,
    grant_type: grantType,
    ...params,
  });
  if (config.clientSecret) {
    body.set('client_secret', config.clientSecret);
  }
  const action = grantType === 'authorization_code' ? 'Token exchange' : 'Token refresh';

  let response: Response;
  try {
    response = await fetchImpl(TOKEN_URL, {
      method: 'POST',
      headers: { 'Content-Type': 'application/x-www-form-urlencoded' },
      body: body.toString(),
    });
  } catch (err) {
    throw new ExchangeError(grantType, 0, `${action} failed: ${errorMessage(err)}`, {
      cause: err,
    });
  }

  let text: string;
  try {
    text = await response.text();
  } catch (err) {
    throw new ExchangeError(
      grantType,
      response.status,
      `${action} failed: could not read the response body (${errorMessage(err)})`,
      { cause: err },
    );
  }
  if (!response.ok) {
    throw new ExchangeError(
      grantType,
      response.status,
      `${action} failed (${response.status}): ${text}`,
    );
  }

  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    throw new ExchangeError(grantType, response.status, `${action} returned invalid JSON`, {
      cause: err,
    });
  }

  const parsed = tokenResponseSchema.safeParse(json);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => issue.path.join('.')).join(', ');
    throw new ExchangeError(
      grantType,
      response.status,
      `${action} returned an unexpected body (${fields})`,
    );
  }

  const data = parsed.data;
  const tokens: IssuedTokens = {
    access_token: data.access_token,
    expires_at: new Date(now + data.expires_in * 1000).toISOString(),
    token_type: 'Bearer',
  };
  if (data.refresh_token) {
    tokens.refresh_token = data.refresh_token;
  }
  return tokens;
}

/**
 * OAuth2 Authorization Code + PKCE session for one MyAnimeList client.
 *
 * The session moves between `unauthorized`, `awaiting_callback`, `authorized`
 * and `refresh_pending`. At most one refresh exchange is in flight at a time;
 * concurrent `ensureFresh()` callers share it.
 */
export class AuthFlow {
  private tokens: TokenSet | null = null;
  private refreshing: Promise<TokenSet> | null = null;
  private fixedAccessToken: string | null = null;
  // state -> deadline of each login that has been started and not yet finished
  private readonly pendingLogins = new Map<string, number>();

  private readonly cache: TokenCache | null;
  private readonly fetchImpl: FetchLike;
  private readonly now: () => number;
  private readonly loginTimeoutMs: number;
  private readonly onCacheError: (error: CacheError) => void;

  constructor(
    public readonly config: AuthConfig,
    options: AuthFlowOptions = {},
  ) {
    if (!config.clientId.trim()) {
      throw new ConfigurationError('A MyAnimeList client ID is required');
    }
    const redirectProblem = checkRedirectUri(config.redirectUri);
    if (redirectProblem) {
      throw new ConfigurationError(`Invalid redirect URI: ${redirectProblem}`);
    }

    const cacheEnabled = options.cacheEnabled ?? true;
    this.cache = cacheEnabled ? (options.cache ?? new FileTokenCache(getConfigDir())) : null;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.now = options.now ?? Date.now;
    this.loginTimeoutMs = options.loginTimeoutMs ?? DEFAULT_LOGIN_TIMEOUT_MS;
    this.onCacheError = options.onCacheError ?? reportCacheError;
  }

  /**
   * Creates the flow and restores a cached session when caching is on.
   * An expired cached session gets one refresh attempt; if that fails the
   * flow starts unauthorized and the cache file is left untouched.
   */
  static async initialize(config: AuthConfig, options: AuthFlowOptions = {}): Promise<AuthFlow> {
    const flow = new AuthFlow(config, options);
    await flow.restore(options.onRefreshError ?? reportRefreshError);
    return flow;
  }

  /**
   * Creates a flow around an access token obtained elsewhere. Nothing is
   * cached and the token is never refreshed; once the API rejects it the
   * caller should logout() and sign in normally.
   */
  static fromAccessToken(
    config: AuthConfig,
    accessToken: string,
    options: Omit<AuthFlowOptions, 'cache' | 'cacheEnabled'> = {},
  ): AuthFlow {
    const token = accessToken.trim();
    if (!token) {
      throw new ConfigurationError('An access token is required');
    }
    const flow = new AuthFlow(config, { ...options, cacheEnabled: false });
    flow.fixedAccessToken = token;
    return flow;
  }

  get status(): AuthStatus {
    if (this.refreshing) return 'refresh_pending';
    if (this.tokens || this.fixedAccessToken) return 'authorized';
    if (this.hasPendingLogin()) return 'awaiting_callback';
    return 'unauthorized';
  }

  /** True while the session is a supplied access token that can't be refreshed. */
  get usingFixedToken(): boolean {
    return this.fixedAccessToken !== null;
  }

  get cachingEnabled(): boolean {
    return this.cache !== null;
  }

  /** The current session, without refreshing it. */
  get currentTokens(): TokenSet | null {
    return this.tokens;
  }

  private hasPendingLogin(): boolean {
    const now = this.now();
    for (const [state, deadline] of this.pendingLogins) {
      if (deadline > now) return true;
      this.pendingLogins.delete(state);
    }
    return false;
  }

  private async restore(onRefreshError: (error: ExchangeError) => void): Promise<void> {
    if (!this.cache) return;

    let cached: TokenSet | null;
    try {
      cached = await this.cache.load();
    } catch (err) {
      this.onCacheError(toCacheError(err, 'read'));
      return;
    }
    if (!cached) return;

    this.tokens = cached;
    if (!isTokenExpired(cached, this.now())) return;

    try {
      await this.ensureFresh();
    } catch (err) {
      if (err instanceof ExchangeError) {
        onRefreshError(err);
        return;
      }
      throw err;
    }
  }

  /**
   * Generates a fresh PKCE challenge and the authorization URL to show the user.
   * Keep the challenge and pass it to completeLogin().
   */
  beginLogin(): LoginStart {
    const challenge = createPkceChallenge(this.config.codeChallengeMethod);

    const authUrl = new URL(AUTHORIZE_URL);
    authUrl.searchParams.set('response_type', 'code');
    authUrl.searchParams.set('client_id', this.config.clientId);
    authUrl.searchParams.set('redirect_uri', this.config.redirectUri);
    authUrl.searchParams.set('code_challenge', challenge.codeChallenge);
    authUrl.searchParams.set('code_challenge_method', challenge.codeChallengeMethod);
    authUrl.searchParams.set('state', challenge.state);

    this.pendingLogins.set(challenge.state, this.now() + this.loginTimeoutMs);
    return { authUrl: authUrl.toString(), challenge };
  }

  /**
   * Listens for the redirect, exchanges the code for tokens and, when caching
   * is on, persists them. Rejects with CallbackError for anything wrong with
   * the redirect and ExchangeError for token endpoint failures.
   */
  async completeLogin(challenge: PkceChallenge, options: LoginOptions = {}): Promise<TokenSet> {
    const timeoutMs = options.timeoutMs ?? this.loginTimeoutMs;
    this.pendingLogins.set(challenge.state, this.now() + timeoutMs);
    try {
      const { promise } = waitForAuthCallback(this.config.redirectUri, challenge.state, {
        ...options,
        timeoutMs,
      });
      const code = await promise;

      const response = await requestTokens(
        this.fetchImpl,
        this.config,
        'authorization_code',
        {
          code,
          code_verifier: challenge.codeVerifier,
          redirect_uri: this.config.redirectUri,
        },
        this.now(),
      );
      if (!response.refresh_token) {
        throw new ExchangeError(
          'authorization_code',
          200,
          'Token exchange returned no refresh_token',
        );
      }

      const tokens: TokenSet = { ...response, refresh_token: response.refresh_token };
      this.tokens = tokens;
      this.fixedAccessToken = null;
      await this.persist(tokens);
      return tokens;
    } finally {
      this.pendingLogins.delete(challenge.state);
    }
  }

  /**
   * Returns the current TokenSet, refreshing it first when it expires within
   * a minute. A failed refresh drops the in-memory session and leaves the
   * cache file as it was.
   */
  ensureFresh(): Promise<TokenSet> {
    if (this.refreshing) {
      return this.refreshing;
    }

    const tokens = this.tokens;
    if (!tokens) {
      return Promise.reject(new AuthRequiredError());
    }
    if (!isTokenExpired(tokens, this.now())) {
      return Promise.resolve(tokens);
    }

    const refreshing = this.refresh(tokens);
    this.refreshing = refreshing;
    const clear = (): void => {
      if (this.refreshing === refreshing) {
        this.refreshing = null;
      }
    };
    return refreshing.then(
      (fresh) => {
        clear();
        return fresh;
      },
      (err: unknown) => {
        clear();
        throw err;
      },
    );
  }

  /** Main entry point for API calls. */
  async getAccessToken(): Promise<string> {
    if (this.fixedAccessToken) {
      return this.fixedAccessToken;
    }
    const tokens = await this.ensureFresh();
    return tokens.access_token;
  }

  /** Forgets the session and removes it from the cache. */
  async logout(): Promise<void> {
    this.tokens = null;
    this.fixedAccessToken = null;
    if (!this.cache) return;
    try {
      await this.cache.clear();
    } catch (err) {
      this.onCacheError(toCacheError(err, 'delete'));
    }
  }

  private async refresh(tokens: TokenSet): Promise<TokenSet> {
    let response: IssuedTokens;
    try {
      response = await requestTokens(
        this.fetchImpl,
        this.config,
        'refresh_token',
        { refresh_token: tokens.refresh_token },
        this.now(),
      );
    } catch (err) {
      if (this.tokens === tokens) {
        this.tokens = null;
      }
      throw err;
    }

    const fresh: TokenSet = {
      ...response,
      refresh_token: response.refresh_token ?? tokens.refresh_token,
    };
    this.tokens = fresh;
    await this.persist(fresh);
    return fresh;
  }

  private async persist(tokens: TokenSet): Promise<void> {
    if (!this.cache) return;
    try {
      await this.cache.save(tokens);
    } catch (err) {
      this.onCacheError(toCacheError(err, 'write'));
    }
  }
}
