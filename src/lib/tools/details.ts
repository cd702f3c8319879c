import { z } from 'zod';
import type { AnimeDetails } from '../../types/anime.js';
import { ANIME_FIELDS, getAnimeDetails } from '../anime.js';
import { MalApiError } from '../errors.js';
import { idSchema, parseArgs } from './args.js';
import { formatListStatus, humanize } from './format.js';

export const detailsToolDefinition = {
  name: 'mal_anime_details',
  description:
    'Fetch details for one anime by MAL ID: dates, score, rank, genres, studios, synopsis and ' +
    'your list status.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      anime_id: { type: 'integer', description: 'MyAnimeList anime ID' },
      fields: {
        type: 'array',
        items: { type: 'string', enum: [...ANIME_FIELDS] },
        description: 'Only request these fields (default: all)',
      },
    },
    required: ['anime_id'],
  },
};

const detailsArgsSchema = z.object({
  anime_id: idSchema,
  fields: z.array(z.enum(ANIME_FIELDS)).min(1).optional(),
});

function formatDetails(anime: AnimeDetails): string {
  const lines: string[] = [`# ${anime.title} (ID ${anime.id})`];

  if (anime.alternative_titles?.en && anime.alternative_titles.en !== anime.title) {
    lines.push(`English title: ${anime.alternative_titles.en}`);
  }
  if (anime.media_type || anime.num_episodes !== undefined) {
    const episodes = anime.num_episodes ? `${anime.num_episodes} episodes` : 'episodes unknown';
    lines.push(`Type: ${anime.media_type ? humanize(anime.media_type) : 'unknown'}, ${episodes}`);
  }
  if (anime.status) {
    lines.push(`Status: ${humanize(anime.status)}`);
  }
  if (anime.start_date || anime.end_date) {
    lines.push(`Aired: ${anime.start_date ?? '?'} to ${anime.end_date ?? '?'}`);
  }
  if (anime.start_season) {
    lines.push(`Season: ${anime.start_season.season} ${anime.start_season.year}`);
  }
  if (anime.mean !== undefined) {
    lines.push(`Score: ${anime.mean}`);
  }
  if (anime.rank !== undefined) {
    lines.push(`Rank: #${anime.rank}`);
  }
  if (anime.popularity !== undefined) {
    lines.push(`Popularity: #${anime.popularity}`);
  }
  if (anime.genres?.length) {
    lines.push(`Genres: ${anime.genres.map((g) => g.name).join(', ')}`);
  }
  if (anime.studios?.length) {
    lines.push(`Studios: ${anime.studios.map((s) => s.name).join(', ')}`);
  }
  if (anime.my_list_status) {
    lines.push(`Your list: ${formatListStatus(anime.my_list_status)}`);
  }
  if (anime.synopsis) {
    lines.push('', anime.synopsis);
  }

  return lines.join('\n');
}

/**
 * Fetches a single anime and renders the fields MAL returned.
 * Fields MAL leaves out are skipped rather than shown as zero.
 */
export async function executeDetails(token: string, args: unknown): Promise<string> {
  const { anime_id, fields } = parseArgs(detailsArgsSchema, args);
  const result = await getAnimeDetails(token, anime_id, fields);

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatDetails(result.data);
}
