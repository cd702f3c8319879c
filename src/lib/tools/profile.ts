import { getMyUserInfo } from '../anime.js';
import { MalApiError } from '../errors.js';

export const profileToolDefinition = {
  name: 'mal_profile',
  description:
    "Fetch the signed-in user's MyAnimeList profile (name, location, join date, anime statistics)",
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

/**
 * Fetches the authenticated user's MyAnimeList profile and returns
 * a human-readable summary.
 */
export async function executeProfile(token: string): Promise<string> {
  const result = await getMyUserInfo(token);

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  const u = result.data;
  const lines = [
    `Name: ${u.name}`,
    `Location: ${u.location || 'N/A'}`,
    `Joined: ${u.joined_at || 'N/A'}`,
  ];

  const stats = u.anime_statistics;
  if (stats) {
    lines.push(
      `Watching: ${stats.num_items_watching ?? 0}`,
      `Completed: ${stats.num_items_completed ?? 0}`,
      `On hold: ${stats.num_items_on_hold ?? 0}`,
      `Dropped: ${stats.num_items_dropped ?? 0}`,
      `Plan to watch: ${stats.num_items_plan_to_watch ?? 0}`,
      `Episodes watched: ${stats.num_episodes ?? 0}`,
      `Days watched: ${stats.num_days_watched ?? 0}`,
      `Mean score: ${stats.mean_score ?? 'N/A'}`,
    );
  }
  return lines.join('\n');
}
