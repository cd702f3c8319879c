import type { AnimeList, AnimeListEntry, ListStatus } from '../../types/anime.js';

export function humanize(value: string): string {
  return value.replace(/_/g, ' ');
}

/**
 * Formats a list status as "watching, score 8, 12 episodes watched".
 */
export function formatListStatus(status: ListStatus): string {
  const parts = [humanize(status.status ?? 'unknown status')];
  if (status.score) {
    parts.push(`score ${status.score}`);
  }
  parts.push(`${status.num_episodes_watched ?? 0} episodes watched`);
  if (status.is_rewatching) {
    parts.push('rewatching');
  }
  return parts.join(', ');
}

export function formatAnimeEntry(entry: AnimeListEntry): string {
  const rank = entry.ranking ? `#${entry.ranking.rank} ` : '';
  let line = `- ${rank}${entry.node.title} (ID ${entry.node.id})`;
  if (entry.list_status) {
    line += ` | ${formatListStatus(entry.list_status)}`;
  }
  return line;
}

export function formatAnimeList(heading: string, list: AnimeList, emptyMessage: string): string {
  if (list.data.length === 0) {
    return emptyMessage;
  }
  return [`# ${heading}`, '', ...list.data.map(formatAnimeEntry)].join('\n');
}
