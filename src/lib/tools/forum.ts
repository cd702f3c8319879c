import { z } from 'zod';
import type { ForumBoards, ForumTopics, TopicDetails } from '../../types/anime.js';
import { getForumBoards, getForumTopicDetail, getForumTopics, MAX_LIMIT } from '../anime.js';
import { MalApiError } from '../errors.js';
import { idSchema, limitSchema, parseArgs } from './args.js';

const DEFAULT_COUNT = 20;
const POST_PREVIEW_CHARS = 500;

export const forumBoardsToolDefinition = {
  name: 'mal_forum_boards',
  description: 'List the MyAnimeList forum boards and their sub-boards, with IDs.',
  inputSchema: {
    type: 'object' as const,
    properties: {},
  },
};

export const forumTopicsToolDefinition = {
  name: 'mal_forum_topics',
  description:
    'Search MyAnimeList forum topics by board, sub-board, keyword or author. ' +
    'Give at least one filter.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      board_id: { type: 'integer', description: 'Board ID (from mal_forum_boards)' },
      subboard_id: { type: 'integer', description: 'Sub-board ID' },
      query: { type: 'string', description: 'Keyword' },
      topic_user_name: { type: 'string', description: 'User who started the topic' },
      user_name: { type: 'string', description: 'User who posted in the topic' },
      limit: { type: 'integer', description: 'Number of topics (1-100, default 20)' },
    },
  },
};

export const forumTopicToolDefinition = {
  name: 'mal_forum_topic',
  description: 'Read the posts of one MyAnimeList forum topic.',
  inputSchema: {
    type: 'object' as const,
    properties: {
      topic_id: { type: 'integer', description: 'Topic ID (from mal_forum_topics)' },
      limit: { type: 'integer', description: 'Number of posts (1-100, default 20)' },
    },
    required: ['topic_id'],
  },
};

const topicsArgsSchema = z
  .object({
    board_id: idSchema.optional(),
    subboard_id: idSchema.optional(),
    query: z.string().trim().min(1).optional(),
    topic_user_name: z.string().trim().min(1).optional(),
    user_name: z.string().trim().min(1).optional(),
    limit: limitSchema(MAX_LIMIT),
  })
  .refine(
    (args) =>
      args.board_id !== undefined ||
      args.subboard_id !== undefined ||
      args.query !== undefined ||
      args.topic_user_name !== undefined ||
      args.user_name !== undefined,
    { message: 'give at least one of board_id, subboard_id, query, topic_user_name, user_name' },
  );

const topicArgsSchema = z.object({
  topic_id: idSchema,
  limit: limitSchema(MAX_LIMIT),
});

function formatBoards(boards: ForumBoards): string {
  const lines: string[] = ['# MyAnimeList forum boards'];
  for (const category of boards.categories) {
    lines.push('', `## ${category.title}`);
    for (const board of category.boards) {
      lines.push(`- ${board.title} (board ${board.id})`);
      for (const sub of board.subboards ?? []) {
        lines.push(`  - ${sub.title} (sub-board ${sub.id})`);
      }
    }
  }
  return lines.join('\n');
}

function formatTopics(topics: ForumTopics): string {
  if (topics.data.length === 0) {
    return 'No forum topics found.';
  }
  const lines = ['# Forum topics', ''];
  for (const topic of topics.data) {
    const author = topic.created_by ? ` by ${topic.created_by.name}` : '';
    const locked = topic.is_locked ? ' [locked]' : '';
    lines.push(
      `- ${topic.title} (topic ${topic.id})${author}, ${topic.number_of_posts} posts${locked}`,
    );
  }
  return lines.join('\n');
}

function formatTopic(detail: TopicDetails): string {
  const lines = [`# ${detail.data.title}`];

  const poll = detail.data.poll;
  if (poll) {
    lines.push('', `Poll: ${poll.question}${poll.closed ? ' (closed)' : ''}`);
    for (const option of poll.options) {
      lines.push(`- ${option.text}: ${option.votes} votes`);
    }
  }

  for (const post of detail.data.posts) {
    const body =
      post.body.length > POST_PREVIEW_CHARS
        ? `${post.body.slice(0, POST_PREVIEW_CHARS)}...`
        : post.body;
    lines.push('', `## #${post.number} ${post.created_by.name} (${post.created_at})`, body);
  }

  return lines.join('\n');
}

export async function executeForumBoards(token: string): Promise<string> {
  const result = await getForumBoards(token);

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatBoards(result.data);
}

export async function executeForumTopics(token: string, args: unknown): Promise<string> {
  const parsed = parseArgs(topicsArgsSchema, args);
  const result = await getForumTopics(token, {
    boardId: parsed.board_id,
    subboardId: parsed.subboard_id,
    query: parsed.query,
    topicUserName: parsed.topic_user_name,
    userName: parsed.user_name,
    limit: parsed.limit ?? DEFAULT_COUNT,
  });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatTopics(result.data);
}

export async function executeForumTopic(token: string, args: unknown): Promise<string> {
  const { topic_id, limit } = parseArgs(topicArgsSchema, args);
  const result = await getForumTopicDetail(token, topic_id, { limit: limit ?? DEFAULT_COUNT });

  if (!result.ok) {
    throw new MalApiError(result.error.status, result.error.message);
  }

  return formatTopic(result.data);
}
