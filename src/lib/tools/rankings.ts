import { z } from 'zod';
import { RANKING_TYPES, SEASONS, type Season } from '../../types/anime.js';
import { getAnimeRanking, getSeasonalAnime, getSuggestedAnime, MAX_LIMIT } from '../anime.js';
import { MalApiError } from '../errors.js';
import { limitSchema, parseArgs } from './args.js';
import { formatAnimeList, humanize } from './format.js';

const DEFAULT_COUNT = 10;

export const rankingToolDefinition = {
  name: 'mal_anime_ranking',
  description:
    'Top anime on MyAnimeList by ranking type (overall, airing, upcoming, popularity, ...).',
  inputSchema: {
    type: 'object' as const,
    properties: {
      ranking_type: {
        type: 'string',
        enum: [...RANKING_TYPES],
        description: 'Ranking to fetch (default "all")',
      },
      limit: { type: 'integer', description: 'Number of results (1-100, default 10)' },
    },
  },
};

export const seasonalToolDefinition = {
  name: 'mal_seasonal_anime',
  description: 'Anime airing in a given season. Defaults to the current season.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      year: { type: 'integer', description: 'Year, e.g. 2024 (default: current year)' },
      season: {
        type: 'string',
        enum: [...SEASONS],
        description: 'Season (default: current season)',
      },
      sort: {
        type: 'string',
        enum: ['anime_score', 'anime_num_list_users'],
        description: 'Sort order',
      },
      limit: { type: 'integer', description: 'Number of results (1-100, default 10)' },
    },
  },
};

export const suggestionsToolDefinition = {
  name: 'mal_suggested_anime',
  description: 'Anime MyAnimeList suggests for the signed-in user.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      limit: { type: 'integer', description: 'Number of results (1-100, default 10)' },
    },
  },
};

const rankingArgsSchema = z.object({
  ranking_type: z.enum(RANKING_TYPES).optional(),
  limit: limitSchema(MAX_LIMIT),
});

const seasonalArgsSchema = z.object({
  year: z.number().int().min(1917).max(2100).optional(),
  season: z.enum(SEASONS).optional(),
  sort: z.enum(['anime_score', 'anime_num_list_users']).optional(),
  limit: limitSchema(MAX_LIMIT),
});

const suggestionsArgsSchema = z.object({
  limit: limitSchema(MAX_LIMIT),
});

/**
 * Maps a date to its anime season: Jan-Mar winter, Apr-Jun spring,
 * Jul-Sep summer, Oct-Dec fall.
 */
export function seasonOf(date: Date): { year: number; season: Season } {
  const season: Season = SEASONS[Math.floor(date.getMonth() / 3)] ?? 'winter';
  return { year: date.getFullYear(), season };
}

export async function executeRanking(token: string, args: unknown): Promise<string> {
  const { ranking_type, limit } = parseArgs(rankingArgsSchema, args);
  const rankingType = ranking_type ?? 'all';
  const result = await getAnimeRanking(token, rankingType, { limit: limit ?? DEFAULT_COUNT });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatAnimeList(
    `Top anime (${humanize(rankingType)})`,
    result.data,
    'No ranked anime returned.',
  );
}

export async function executeSeasonal(
  token: string,
  args: unknown,
  today: Date = new Date(),
): Promise<string> {
  const parsed = parseArgs(seasonalArgsSchema, args);
  const current = seasonOf(today);
  const year = parsed.year ?? current.year;
  const season = parsed.season ?? current.season;

  const result = await getSeasonalAnime(token, year, season, {
    limit: parsed.limit ?? DEFAULT_COUNT,
    sort: parsed.sort,
  });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatAnimeList(
    `${season[0]?.toUpperCase() ?? ''}${season.slice(1)} ${year} anime`,
    result.data,
    `No anime found for ${season} ${year}.`,
  );
}

export async function executeSuggestions(token: string, args: unknown): Promise<string> {
  const { limit } = parseArgs(suggestionsArgsSchema, args);
  const result = await getSuggestedAnime(token, { limit: limit ?? DEFAULT_COUNT });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatAnimeList(
    'Suggested for you',
    result.data,
    'MyAnimeList has no suggestions for you yet.',
  );
}
