import {
  executeAnimeList,
  executeDeleteListItem,
  executeUpdateListStatus,
} from '../../lib/tools/anime-list.js';
import { mockMalResponse, requestedUrl, restoreFetch } from '../helpers/fetch.js';

afterEach(() => {
  restoreFetch();
});

describe('executeAnimeList', () => {
  it('lists entries with their list status', async () => {
    const mock = mockMalResponse({
      data: [
        {
          node: { id: 1, title: 'Test Show' },
          list_status: { status: 'watching', score: 0, num_episodes_watched: 3 },
        },
      ],
    });

    const result = await executeAnimeList('test-token', {});

    expect(result).toBe('# Your anime list\n\n- Test Show (ID 1) | watching, 3 episodes watched');
    expect(requestedUrl(mock)).toBe(
      'https://api.myanimelist.net/v2/users/@me/animelist?fields=list_status&limit=1000',
    );
  });

  it('filters by status', async () => {
    const mock = mockMalResponse({
      data: [
        {
          node: { id: 2, title: 'Later' },
          list_status: { status: 'plan_to_watch', num_episodes_watched: 0 },
        },
      ],
    });

    const result = await executeAnimeList('test-token', {
      status: 'plan_to_watch',
      sort: 'anime_title',
      limit: 50,
    });

    expect(result).toBe(
      '# Your anime list (plan to watch)\n\n- Later (ID 2) | plan to watch, 0 episodes watched',
    );
    expect(requestedUrl(mock)).toBe(
      'https://api.myanimelist.net/v2/users/@me/animelist' +
        '?fields=list_status&status=plan_to_watch&sort=anime_title&limit=50',
    );
  });

  it('says so when the list is empty', async () => {
    mockMalResponse({ data: [] });

    await expect(executeAnimeList('test-token', {})).resolves.toBe('Your anime list is empty.');
  });
});

describe('executeUpdateListStatus', () => {
  it('sends the given fields and echoes the new status', async () => {
    const mock = mockMalResponse({
      status: 'watching',
      score: 0,
      num_episodes_watched: 5,
      is_rewatching: false,
      updated_at: '2026-01-01T00:00:00+00:00',
    });

    const result = await executeUpdateListStatus('test-token', {
      anime_id: 21,
      status: 'watching',
      num_watched_episodes: 5,
    });

    expect(result).toBe('Updated anime 21: watching, 5 episodes watched');
    expect(mock).toHaveBeenCalledWith(
      'https://api.myanimelist.net/v2/anime/21/my_list_status',
      expect.objectContaining({
        method: 'PATCH',
        body: 'status=watching&num_watched_episodes=5',
      }),
    );
  });

  it('needs at least one field besides anime_id', async () => {
    await expect(executeUpdateListStatus('test-token', { anime_id: 21 })).rejects.toThrow(
      'Invalid arguments: arguments: give at least one field to update',
    );
  });

  it('rejects a score above 10', async () => {
    await expect(
      executeUpdateListStatus('test-token', { anime_id: 21, score: 11 }),
    ).rejects.toThrow(/^Invalid arguments: score: /);
  });
});

describe('executeDeleteListItem', () => {
  it('confirms the removal', async () => {
    const mock = mockMalResponse([]);

    const result = await executeDeleteListItem('test-token', { anime_id: 21 });

    expect(result).toBe('Removed anime 21 from your list.');
    expect(mock).toHaveBeenCalledWith(
      'https://api.myanimelist.net/v2/anime/21/my_list_status',
      expect.objectContaining({ method: 'DELETE' }),
    );
  });

  it('explains an anime that is not on the list', async () => {
    mockMalResponse({ error: 'not_found' }, 404);

    await expect(executeDeleteListItem('test-token', { anime_id: 21 })).rejects.toMatchObject({
      name: 'MalApiError',
      status: 404,
      message: 'Anime 21 is not on your list.',
    });
  });
});
