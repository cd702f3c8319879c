import { jest } from '@jest/globals';
import { buildUrl, malFetch } from '../lib/mal.js';

// Save original fetch
const originalFetch = globalThis.fetch;

afterEach(() => {
  globalThis.fetch = originalFetch;
});

function mockFetch(body: string | null, status = 200): jest.Mock<typeof fetch> {
  const mock = jest
    .fn<typeof fetch>()
    .mockImplementation(async () => new Response(body, { status }));
  globalThis.fetch = mock;
  return mock;
}

describe('buildUrl', () => {
  it('prefixes the API base URL', () => {
    expect(buildUrl('/anime/1')).toBe('https://api.myanimelist.net/v2/anime/1');
  });

  it('skips undefined query values', () => {
    expect(buildUrl('/anime', { q: 'frieren', limit: 10, offset: undefined })).toBe(
      'https://api.myanimelist.net/v2/anime?q=frieren&limit=10',
    );
  });
});

describe('malFetch', () => {
  it('returns ok with data on successful response', async () => {
    const mock = mockFetch(JSON.stringify({ id: 1, title: 'Test Show' }));

    const result = await malFetch<{ id: number; title: string }>('/anime/1', 'test-token', {
      query: { fields: 'title' },
    });

    expect(result).toEqual({ ok: true, data: { id: 1, title: 'Test Show' } });
    expect(mock).toHaveBeenCalledWith(
      'https://api.myanimelist.net/v2/anime/1?fields=title',
      expect.objectContaining({
        method: 'GET',
        headers: {
          Authorization: 'Bearer test-token',
          Accept: 'application/json',
        },
      }),
    );
  });

  it('sends a form body for PATCH requests', async () => {
    const mock = mockFetch(JSON.stringify({ status: 'watching' }));

    await malFetch('/anime/1/my_list_status', 'test-token', {
      method: 'PATCH',
      form: { status: 'watching', score: 8, tags: undefined },
    });

    expect(mock).toHaveBeenCalledWith(
      'https://api.myanimelist.net/v2/anime/1/my_list_status',
      {
        method: 'PATCH',
        headers: {
          Authorization: 'Bearer test-token',
          Accept: 'application/json',
          'Content-Type': 'application/x-www-form-urlencoded',
        },
        body: 'status=watching&score=8',
      },
    );
  });

  it('returns null data for an empty body', async () => {
    mockFetch(null);

    const result = await malFetch('/anime/1/my_list_status', 'test-token', { method: 'DELETE' });

    expect(result).toEqual({ ok: true, data: null });
  });

  it('returns an error when a successful body is not JSON', async () => {
    mockFetch('<html>maintenance</html>');

    const result = await malFetch('/anime/1', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: { status: 200, message: 'MyAnimeList returned a response that is not JSON' },
    });
  });

  it('returns 401 error with reconnect message', async () => {
    mockFetch('{"error":"invalid_token"}', 401);

    const result = await malFetch('/users/@me', 'expired-token');

    expect(result).toEqual({
      ok: false,
      error: {
        status: 401,
        message: 'MyAnimeList token expired. Use mal_auth_status to reconnect.',
      },
    });
  });

  it('returns 403 error with permissions message', async () => {
    mockFetch('', 403);

    const result = await malFetch('/users/@me', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: {
        status: 403,
        message: 'MyAnimeList refused the request. Check the client ID and its permissions.',
      },
    });
  });

  it('returns the generic 404 message', async () => {
    mockFetch('{"error":"not_found"}', 404);

    const result = await malFetch('/anime/999999', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: { status: 404, message: 'Resource not found on MyAnimeList.' },
    });
  });

  it('uses the caller-provided 404 message', async () => {
    mockFetch('{"error":"not_found"}', 404);

    const result = await malFetch('/anime/999999', 'test-token', {
      notFoundMessage: 'Anime 999999 not found.',
    });

    expect(result).toEqual({
      ok: false,
      error: { status: 404, message: 'Anime 999999 not found.' },
    });
  });

  it('combines error and message from a JSON error body', async () => {
    mockFetch('{"error":"bad_request","message":"invalid q"}', 400);

    const result = await malFetch('/anime', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: { status: 400, message: 'MyAnimeList API error (400): bad_request: invalid q' },
    });
  });

  it('falls back to the raw body text', async () => {
    mockFetch('Service Unavailable', 503);

    const result = await malFetch('/anime', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: { status: 503, message: 'MyAnimeList API error (503): Service Unavailable' },
    });
  });

  it('returns a network error with status 0', async () => {
    globalThis.fetch = jest.fn<typeof fetch>().mockRejectedValue(new TypeError('fetch failed'));

    const result = await malFetch('/anime', 'test-token');

    expect(result).toEqual({
      ok: false,
      error: { status: 0, message: 'Network error: fetch failed' },
    });
  });
});
