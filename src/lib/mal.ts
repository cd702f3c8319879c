export const API_BASE_URL = 'https://api.myanimelist.net/v2';

export interface MalError {
  status: number;
  message: string;
}

export type MalResult<T> = { ok: true; data: T } | { ok: false; error: MalError };

export type QueryValue = string | number | boolean | undefined;

export interface MalFetchOptions {
  method?: 'GET' | 'PATCH' | 'DELETE';
  query?: Record<string, QueryValue>;
  /** Sent as application/x-www-form-urlencoded. */
  form?: Record<string, QueryValue>;
  /** Message used for a 404 instead of the generic one. */
  notFoundMessage?: string;
}

function toParams(values: Record<string, QueryValue>): URLSearchParams {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(values)) {
    if (value !== undefined) {
      params.set(key, String(value));
    }
  }
  return params;
}

export function buildUrl(path: string, query?: Record<string, QueryValue>): string {
  const qs = query ? toParams(query).toString() : '';
  return `${API_BASE_URL}${path}${qs ? `?${qs}` : ''}`;
}

/**
 * Pulls the `message`/`error` pair out of a MAL error body, or returns the raw text.
 */
function describeErrorBody(text: string): string {
  try {
    const body: unknown = JSON.parse(text);
    if (body && typeof body === 'object') {
      const message = 'message' in body && typeof body.message === 'string' ? body.message : '';
      const error = 'error' in body && typeof body.error === 'string' ? body.error : '';
      if (message || error) {
        return message && error ? `${error}: ${message}` : message || error;
      }
    }
  } catch {
    // not JSON, use the text as-is
  }
  return text;
}

/**
 * Thin fetch wrapper for MyAnimeList API v2 calls.
 * Translates HTTP errors into typed MalError results.
 */
export async function malFetch<T>(
  path: string,
  token: string,
  options?: MalFetchOptions,
): Promise<MalResult<T>> {
  const headers: Record<string, string> = {
    Authorization: `Bearer ${token}`,
    Accept: 'application/json',
  };

  const init: RequestInit = { method: options?.method ?? 'GET', headers };
  if (options?.form) {
    headers['Content-Type'] = 'application/x-www-form-urlencoded';
    init.body = toParams(options.form).toString();
  }

  let response: Response;
  try {
    response = await fetch(buildUrl(path, options?.query), init);
  } catch (err) {
    return {
      ok: false,
      error: {
        status: 0,
        message: `Network error: ${err instanceof Error ? err.message : String(err)}`,
      },
    };
  }

  if (response.ok) {
    const text = await response.text();
    try {
      const data = (text ? JSON.parse(text) : null) as T;
      return { ok: true, data };
    } catch {
      return {
        ok: false,
        error: {
          status: response.status,
          message: 'MyAnimeList returned a response that is not JSON',
        },
      };
    }
  }

  const status = response.status;
  let message: string;

  switch (status) {
    case 401:
      message = 'MyAnimeList token expired. Use mal_auth_status to reconnect.';
      break;
    case 403:
      message = 'MyAnimeList refused the request. Check the client ID and its permissions.';
      break;
    case 404:
      message = options?.notFoundMessage ?? 'Resource not found on MyAnimeList.';
      break;
    default: {
      const text = await response.text();
      message = `MyAnimeList API error (${status}): ${describeErrorBody(text)}`;
      break;
    }
  }

  return { ok: false, error: { status, message } };
}
