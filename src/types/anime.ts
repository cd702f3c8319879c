export interface Picture {
  medium: string;
  large?: string;
}

export interface Paging {
  previous?: string;
  next?: string;
}

export interface AnimeNode {
  id: number;
  title: string;
  main_picture?: Picture;
}

export const WATCH_STATUSES = [
  'watching',
  'completed',
  'on_hold',
  'dropped',
  'plan_to_watch',
] as const;

export type WatchStatus = (typeof WATCH_STATUSES)[number];

export interface ListStatus {
  status?: WatchStatus;
  score?: number;
  num_episodes_watched?: number;
  is_rewatching?: boolean;
  start_date?: string;
  finish_date?: string;
  priority?: number;
  num_times_rewatched?: number;
  rewatch_value?: number;
  tags?: string[];
  comments?: string;
  updated_at?: string;
}

export interface ListStatusUpdate {
  status?: WatchStatus;
  is_rewatching?: boolean;
  score?: number;
  num_watched_episodes?: number;
  priority?: number;
  num_times_rewatched?: number;
  rewatch_value?: number;
  tags?: string[];
  comments?: string;
}

export interface AnimeListEntry {
  node: AnimeNode;
  list_status?: ListStatus;
  ranking?: { rank: number; previous_rank?: number };
}

export interface AnimeList {
  data: AnimeListEntry[];
  paging?: Paging;
  season?: { year: number; season: Season };
}

export interface Genre {
  id: number;
  name: string;
}

export interface Studio {
  id: number;
  name: string;
}

export const SEASONS = ['winter', 'spring', 'summer', 'fall'] as const;

export type Season = (typeof SEASONS)[number];

export const RANKING_TYPES = [
  'all',
  'airing',
  'upcoming',
  'tv',
  'ova',
  'movie',
  'special',
  'bypopularity',
  'favorite',
] as const;

export type RankingType = (typeof RANKING_TYPES)[number];

export interface RelatedAnime {
  node: AnimeNode;
  relation_type: string;
  relation_type_formatted: string;
}

export interface AnimeDetails extends AnimeNode {
  alternative_titles?: { synonyms?: string[]; en?: string; ja?: string };
  start_date?: string;
  end_date?: string;
  synopsis?: string;
  mean?: number;
  rank?: number;
  popularity?: number;
  num_list_users?: number;
  num_scoring_users?: number;
  nsfw?: string;
  genres?: Genre[];
  created_at?: string;
  updated_at?: string;
  media_type?: string;
  status?: string;
  my_list_status?: ListStatus;
  num_episodes?: number;
  start_season?: { year: number; season: Season };
  broadcast?: { day_of_the_week: string; start_time?: string };
  source?: string;
  average_episode_duration?: number;
  rating?: string;
  studios?: Studio[];
  background?: string;
  related_anime?: RelatedAnime[];
  recommendations?: Array<{ node: AnimeNode; num_recommendations: number }>;
  statistics?: {
    num_list_users: number;
    status: Record<string, string | number>;
  };
}

export interface AnimeStatistics {
  num_items_watching?: number;
  num_items_completed?: number;
  num_items_on_hold?: number;
  num_items_dropped?: number;
  num_items_plan_to_watch?: number;
  num_items?: number;
  num_days_watched?: number;
  num_episodes?: number;
  mean_score?: number;
}

export interface User {
  id: number;
  name: string;
  picture?: string;
  gender?: string;
  birthday?: string;
  location?: string;
  joined_at?: string;
  time_zone?: string;
  is_supporter?: boolean;
  anime_statistics?: AnimeStatistics;
}

export interface ForumSubboard {
  id: number;
  title: string;
}

export interface ForumBoard {
  id: number;
  title: string;
  description?: string;
  subboards?: ForumSubboard[];
}

export interface ForumBoards {
  categories: Array<{ title: string; boards: ForumBoard[] }>;
}

export interface ForumUser {
  id: number;
  name: string;
}

export interface ForumTopic {
  id: number;
  title: string;
  created_at: string;
  created_by?: ForumUser;
  number_of_posts: number;
  last_post_created_at?: string;
  last_post_created_by?: ForumUser;
  is_locked?: boolean;
}

export interface ForumTopics {
  data: ForumTopic[];
  paging?: Paging;
}

export interface ForumPost {
  id: number;
  number: number;
  created_at: string;
  created_by: ForumUser & { forum_avator?: string };
  body: string;
  signature?: string;
}

export interface TopicDetails {
  data: {
    title: string;
    posts: ForumPost[];
    poll?: {
      id: number;
      question: string;
      closed: boolean;
      options: Array<{ id: number; text: string; votes: number }>;
    } | null;
  };
  paging?: Paging;
}
