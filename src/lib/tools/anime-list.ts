import { z } from 'zod';
import { WATCH_STATUSES, type ListStatusUpdate } from '../../types/anime.js';
import {
  deleteAnimeListItem,
  getUserAnimeList,
  MAX_USER_LIST_LIMIT,
  updateAnimeListStatus,
} from '../anime.js';
import { MalApiError } from '../errors.js';
import { idSchema, limitSchema, parseArgs } from './args.js';
import { formatAnimeList, formatListStatus, humanize } from './format.js';

const USER_LIST_SORTS = [
  'list_score',
  'list_updated_at',
  'anime_title',
  'anime_start_date',
] as const;

export const animeListToolDefinition = {
  name: 'mal_anime_list',
  description: "Read the signed-in user's anime list, optionally filtered by watch status.",
  inputSchema: {
    type: 'object' as const,
    properties: {
      status: { type: 'string', enum: [...WATCH_STATUSES], description: 'Only this status' },
      sort: { type: 'string', enum: [...USER_LIST_SORTS], description: 'Sort order' },
      limit: { type: 'integer', description: 'Number of entries (1-1000, default 100)' },
    },
  },
};

export const updateListStatusToolDefinition = {
  name: 'mal_update_list_status',
  description:
    "Add an anime to the signed-in user's list or update its entry (status, score, episodes).",
  inputSchema: {
    type: 'object' as const,
    properties: {
      anime_id: { type: 'integer', description: 'MyAnimeList anime ID' },
      status: { type: 'string', enum: [...WATCH_STATUSES] },
      score: { type: 'integer', description: 'Score 0-10 (0 clears it)' },
      num_watched_episodes: { type: 'integer', description: 'Episodes watched' },
      is_rewatching: { type: 'boolean' },
      priority: { type: 'integer', description: 'Priority 0-2' },
      num_times_rewatched: { type: 'integer' },
      rewatch_value: { type: 'integer', description: 'Rewatch value 0-5' },
      tags: { type: 'array', items: { type: 'string' } },
      comments: { type: 'string' },
    },
    required: ['anime_id'],
  },
};

export const deleteListItemToolDefinition = {
  name: 'mal_delete_list_item',
  description: "Remove an anime from the signed-in user's list.",
  inputSchema: {
    type: 'object' as const,
    properties: {
      anime_id: { type: 'integer', description: 'MyAnimeList anime ID' },
    },
    required: ['anime_id'],
  },
};

const animeListArgsSchema = z.object({
  status: z.enum(WATCH_STATUSES).optional(),
  sort: z.enum(USER_LIST_SORTS).optional(),
  limit: limitSchema(MAX_USER_LIST_LIMIT),
});

const updateArgsSchema = z
  .object({
    anime_id: idSchema,
    status: z.enum(WATCH_STATUSES).optional(),
    score: z.number().int().min(0).max(10).optional(),
    num_watched_episodes: z.number().int().min(0).optional(),
    is_rewatching: z.boolean().optional(),
    priority: z.number().int().min(0).max(2).optional(),
    num_times_rewatched: z.number().int().min(0).optional(),
    rewatch_value: z.number().int().min(0).max(5).optional(),
    tags: z.array(z.string()).optional(),
    comments: z.string().optional(),
  })
  .refine((args) => Object.keys(args).some((key) => key !== 'anime_id'), {
    message: 'give at least one field to update',
  });

const deleteArgsSchema = z.object({ anime_id: idSchema });

export async function executeAnimeList(token: string, args: unknown): Promise<string> {
  const { status, sort, limit } = parseArgs(animeListArgsSchema, args);
  const result = await getUserAnimeList(token, { status, sort, limit });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  const heading = status ? `Your anime list (${humanize(status)})` : 'Your anime list';
  return formatAnimeList(heading, result.data, 'Your anime list is empty.');
}

export async function executeUpdateListStatus(token: string, args: unknown): Promise<string> {
  const { anime_id, ...fields } = parseArgs(updateArgsSchema, args);
  const update: ListStatusUpdate = fields;
  const result = await updateAnimeListStatus(token, anime_id, update);

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return `Updated anime ${anime_id}: ${formatListStatus(result.data)}`;
}

export async function executeDeleteListItem(token: string, args: unknown): Promise<string> {
  const { anime_id } = parseArgs(deleteArgsSchema, args);
  const result = await deleteAnimeListItem(token, anime_id);

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return `Removed anime ${anime_id} from your list.`;
}
