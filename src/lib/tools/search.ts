import { z } from 'zod';
import { searchAnime, MAX_LIMIT } from '../anime.js';
import { MalApiError } from '../errors.js';
import { limitSchema, parseArgs } from './args.js';
import { formatAnimeList } from './format.js';

export const searchToolDefinition = {
  name: 'mal_anime_search',
  description: 'Search MyAnimeList for anime by title. Returns titles with their MAL IDs.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      query: { type: 'string', description: 'Title to search for (at least 3 characters)' },
      limit: { type: 'integer', description: 'Number of results (1-100, default 10)' },
    },
    required: ['query'],
  },
};

const searchArgsSchema = z.object({
  query: z.string().trim().min(3, 'must be at least 3 characters'),
  limit: limitSchema(MAX_LIMIT),
});

/**
 * Searches anime by title and lists the matches.
 */
export async function executeSearch(token: string, args: unknown): Promise<string> {
  const { query, limit } = parseArgs(searchArgsSchema, args);
  const result = await searchAnime(token, query, { limit: limit ?? 10 });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatAnimeList(`Results for "${query}"`, result.data, `No anime found for "${query}".`);
}
