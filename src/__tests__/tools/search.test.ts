import { InvalidArgumentsError, MalApiError } from '../../lib/errors.js';
import { executeSearch } from '../../lib/tools/search.js';
import { mockMalResponse, requestedUrl, restoreFetch } from '../helpers/fetch.js';

describe('executeSearch', () => {
  afterEach(() => {
    restoreFetch();
  });

  it('lists matching anime', async () => {
    const mock = mockMalResponse({
      data: [
        { node: { id: 101, title: 'Test Show' } },
        { node: { id: 102, title: 'Test Show 2' } },
      ],
      paging: {},
    });

    const result = await executeSearch('test-token', { query: '  test show ' });

    expect(result).toBe(
      '# Results for "test show"\n\n- Test Show (ID 101)\n- Test Show 2 (ID 102)',
    );
    expect(requestedUrl(mock)).toBe('https://api.myanimelist.net/v2/anime?q=test+show&limit=10');
  });

  it('passes a custom limit', async () => {
    const mock = mockMalResponse({ data: [] });

    await executeSearch('test-token', { query: 'test show', limit: 3 });

    expect(requestedUrl(mock)).toBe('https://api.myanimelist.net/v2/anime?q=test+show&limit=3');
  });

  it('says so when nothing matches', async () => {
    mockMalResponse({ data: [] });

    const result = await executeSearch('test-token', { query: 'zzzz' });

    expect(result).toBe('No anime found for "zzzz".');
  });

  it('rejects a query shorter than 3 characters', async () => {
    const search = executeSearch('test-token', { query: 'ab' });

    await expect(search).rejects.toBeInstanceOf(InvalidArgumentsError);
    await expect(search).rejects.toThrow(
      'Invalid arguments: query: must be at least 3 characters',
    );
  });

  it('throws the API error', async () => {
    mockMalResponse({ error: 'invalid_token' }, 401);

    const search = executeSearch('expired-token', { query: 'test show' });

    await expect(search).rejects.toBeInstanceOf(MalApiError);
    await expect(search).rejects.toHaveProperty('sessionRejected', true);
    await expect(search).rejects.toMatchObject({
      status: 401,
      message: 'MyAnimeList token expired. Use mal_auth_status to reconnect.',
    });
  });
});
