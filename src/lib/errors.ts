/**
 * Error kinds raised by the auth flow. Callers tell them apart with
 * `instanceof` or the `name` property; none of them is retried internally.
 */

export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

export type CallbackErrorReason =
  | 'denied'
  | 'malformed'
  | 'state_mismatch'
  | 'timeout'
  | 'cancelled'
  | 'listen_failed';

/**
 * The redirect never arrived, arrived without a usable code,
 * or the provider reported that the user declined.
 */
export class CallbackError extends Error {
  public readonly reason: CallbackErrorReason;
  /** The provider's `error` parameter, when there was one. */
  public readonly providerError?: string;

  constructor(
    reason: CallbackErrorReason,
    message: string,
    options?: { providerError?: string; cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CallbackError';
    this.reason = reason;
    if (options?.providerError) {
      this.providerError = options.providerError;
    }
  }
}

/**
 * The token endpoint failed, answered with a non-2xx status or returned a body
 * that is not a token response. `status` is 0 for transport failures.
 */
export class ExchangeError extends Error {
  public readonly status: number;
  public readonly grantType: 'authorization_code' | 'refresh_token';

  constructor(
    grantType: 'authorization_code' | 'refresh_token',
    status: number,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'ExchangeError';
    this.grantType = grantType;
    this.status = status;
  }
}

/** Reading or writing the token cache failed. Never fatal to a login. */
export class CacheError extends Error {
  public readonly path: string;
  public readonly operation: 'read' | 'write' | 'delete';

  constructor(
    operation: 'read' | 'write' | 'delete',
    path: string,
    message: string,
    options?: { cause?: unknown },
  ) {
    super(message, options?.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'CacheError';
    this.operation = operation;
    this.path = path;
  }
}

/** There is no usable session; the user has to log in again. */
export class AuthRequiredError extends Error {
  constructor(message = 'Not signed in to MyAnimeList. Run mal_auth_status to sign in.') {
    super(message);
    this.name = 'AuthRequiredError';
  }
}

/**
 * MyAnimeList answered an API call with an error. A 401 means the access
 * token was rejected and the session has to be replaced.
 */
export class MalApiError extends Error {
  public readonly status: number;

  constructor(status: number, message: string) {
    super(message);
    this.name = 'MalApiError';
    this.status = status;
  }

  get sessionRejected(): boolean {
    return this.status === 401;
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** A tool was called with arguments that don't match its input schema. */
export class InvalidArgumentsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidArgumentsError';
  }
}
