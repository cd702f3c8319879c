import type {
  AnimeDetails,
  AnimeList,
  ForumBoards,
  ForumTopics,
  ListStatus,
  ListStatusUpdate,
  RankingType,
  Season,
  TopicDetails,
  User,
  WatchStatus,
} from '../types/anime.js';
import { malFetch, type MalResult } from './mal.js';

export const ANIME_FIELDS = [
  'id',
  'title',
  'main_picture',
  'alternative_titles',
  'start_date',
  'end_date',
  'synopsis',
  'mean',
  'rank',
  'popularity',
  'num_list_users',
  'num_scoring_users',
  'nsfw',
  'genres',
  'created_at',
  'updated_at',
  'media_type',
  'status',
  'my_list_status',
  'num_episodes',
  'start_season',
  'broadcast',
  'source',
  'average_episode_duration',
  'rating',
  'studios',
  'pictures',
  'background',
  'related_anime',
  'recommendations',
  'statistics',
] as const;

export type AnimeField = (typeof ANIME_FIELDS)[number];

export const MAX_LIMIT = 100;
export const MAX_USER_LIST_LIMIT = 1000;

export function clampLimit(limit: number | undefined, max: number = MAX_LIMIT): number {
  if (limit === undefined || !Number.isFinite(limit)) return max;
  return Math.min(max, Math.max(1, Math.trunc(limit)));
}

export interface PageOptions {
  limit?: number;
  offset?: number;
}

export function searchAnime(
  token: string,
  query: string,
  options: PageOptions = {},
): Promise<MalResult<AnimeList>> {
  return malFetch<AnimeList>('/anime', token, {
    query: { q: query, limit: clampLimit(options.limit), offset: options.offset },
  });
}

/**
 * Fetches one anime. Requests every field unless `fields` narrows it down.
 */
export function getAnimeDetails(
  token: string,
  id: number,
  fields: readonly AnimeField[] = ANIME_FIELDS,
): Promise<MalResult<AnimeDetails>> {
  return malFetch<AnimeDetails>(`/anime/${id}`, token, {
    query: { fields: fields.join(',') },
    notFoundMessage: `Anime ${id} not found.`,
  });
}

export function getAnimeRanking(
  token: string,
  rankingType: RankingType,
  options: PageOptions = {},
): Promise<MalResult<AnimeList>> {
  return malFetch<AnimeList>('/anime/ranking', token, {
    query: {
      ranking_type: rankingType,
      limit: clampLimit(options.limit),
      offset: options.offset,
    },
  });
}

export type SeasonalSort = 'anime_score' | 'anime_num_list_users';

export function getSeasonalAnime(
  token: string,
  year: number,
  season: Season,
  options: PageOptions & { sort?: SeasonalSort } = {},
): Promise<MalResult<AnimeList>> {
  return malFetch<AnimeList>(`/anime/season/${year}/${season}`, token, {
    query: { limit: clampLimit(options.limit), offset: options.offset, sort: options.sort },
  });
}

/** Can return an empty list if the user has no suggestions. */
export function getSuggestedAnime(
  token: string,
  options: PageOptions = {},
): Promise<MalResult<AnimeList>> {
  return malFetch<AnimeList>('/anime/suggestions', token, {
    query: { limit: clampLimit(options.limit), offset: options.offset },
  });
}

export type UserListSort = 'list_score' | 'list_updated_at' | 'anime_title' | 'anime_start_date';

export interface UserListOptions extends PageOptions {
  status?: WatchStatus;
  sort?: UserListSort;
}

export function getUserAnimeList(
  token: string,
  options: UserListOptions = {},
): Promise<MalResult<AnimeList>> {
  return malFetch<AnimeList>('/users/@me/animelist', token, {
    query: {
      fields: 'list_status',
      status: options.status,
      sort: options.sort,
      limit: clampLimit(options.limit, MAX_USER_LIST_LIMIT),
      offset: options.offset,
    },
  });
}

/**
 * Adds an anime to the user's list, or updates the entry if it already exists.
 */
export function updateAnimeListStatus(
  token: string,
  id: number,
  update: ListStatusUpdate,
): Promise<MalResult<ListStatus>> {
  return malFetch<ListStatus>(`/anime/${id}/my_list_status`, token, {
    method: 'PATCH',
    form: {
      status: update.status,
      is_rewatching: update.is_rewatching,
      score: update.score,
      num_watched_episodes: update.num_watched_episodes,
      priority: update.priority,
      num_times_rewatched: update.num_times_rewatched,
      rewatch_value: update.rewatch_value,
      tags: update.tags?.join(','),
      comments: update.comments,
    },
    notFoundMessage: `Anime ${id} not found.`,
  });
}

/** MAL answers 404 when the anime isn't on the list. */
export async function deleteAnimeListItem(token: string, id: number): Promise<MalResult<null>> {
  const result = await malFetch<unknown>(`/anime/${id}/my_list_status`, token, {
    method: 'DELETE',
    notFoundMessage: `Anime ${id} is not on your list.`,
  });
  return result.ok ? { ok: true, data: null } : result;
}

export function getForumBoards(token: string): Promise<MalResult<ForumBoards>> {
  return malFetch<ForumBoards>('/forum/boards', token);
}

export function getForumTopicDetail(
  token: string,
  topicId: number,
  options: PageOptions = {},
): Promise<MalResult<TopicDetails>> {
  return malFetch<TopicDetails>(`/forum/topic/${topicId}`, token, {
    query: { limit: clampLimit(options.limit), offset: options.offset },
    notFoundMessage: `Forum topic ${topicId} not found.`,
  });
}

export interface ForumTopicQuery extends PageOptions {
  boardId?: number;
  subboardId?: number;
  query?: string;
  topicUserName?: string;
  userName?: string;
}

export function getForumTopics(
  token: string,
  query: ForumTopicQuery,
): Promise<MalResult<ForumTopics>> {
  return malFetch<ForumTopics>('/forum/topics', token, {
    query: {
      board_id: query.boardId,
      subboard_id: query.subboardId,
      q: query.query,
      topic_user_name: query.topicUserName,
      user_name: query.userName,
      limit: clampLimit(query.limit),
      offset: query.offset,
    },
  });
}

export function getMyUserInfo(token: string): Promise<MalResult<User>> {
  return malFetch<User>('/users/@me', token, { query: { fields: 'anime_statistics' } });
}
