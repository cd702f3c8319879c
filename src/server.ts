import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { ListToolsRequestSchema, CallToolRequestSchema } from '@modelcontextprotocol/sdk/types.js';
import type { AuthFlow } from './lib/auth.js';
import {
  AuthRequiredError,
  ExchangeError,
  InvalidArgumentsError,
  MalApiError,
} from './lib/errors.js';
import { authStatusToolDefinition, executeAuthStatus } from './lib/tools/auth-status.js';
import type { AuthStatusOptions } from './lib/tools/auth-status.js';
import { searchToolDefinition, executeSearch } from './lib/tools/search.js';
import { detailsToolDefinition, executeDetails } from './lib/tools/details.js';
import {
  rankingToolDefinition,
  seasonalToolDefinition,
  suggestionsToolDefinition,
  executeRanking,
  executeSeasonal,
  executeSuggestions,
} from './lib/tools/rankings.js';
import {
  animeListToolDefinition,
  updateListStatusToolDefinition,
  deleteListItemToolDefinition,
  executeAnimeList,
  executeUpdateListStatus,
  executeDeleteListItem,
} from './lib/tools/anime-list.js';
import {
  forumBoardsToolDefinition,
  forumTopicsToolDefinition,
  forumTopicToolDefinition,
  executeForumBoards,
  executeForumTopics,
  executeForumTopic,
} from './lib/tools/forum.js';
import { profileToolDefinition, executeProfile } from './lib/tools/profile.js';
import { serverInfoToolDefinition, executeServerInfo } from './lib/tools/server-info.js';

export const SERVER_NAME = 'mal-mcp';
export const SERVER_VERSION = '0.1.0';

type ToolHandler = (token: string, args: unknown) => Promise<string>;

export type ToolResult = {
  content: Array<{ type: 'text'; text: string }>;
  isError?: boolean;
};

export const TOOL_DEFINITIONS = [
  authStatusToolDefinition,
  searchToolDefinition,
  detailsToolDefinition,
  rankingToolDefinition,
  seasonalToolDefinition,
  suggestionsToolDefinition,
  animeListToolDefinition,
  updateListStatusToolDefinition,
  deleteListItemToolDefinition,
  forumBoardsToolDefinition,
  forumTopicsToolDefinition,
  forumTopicToolDefinition,
  profileToolDefinition,
  serverInfoToolDefinition,
];

export const TOOL_NAMES: readonly string[] = TOOL_DEFINITIONS.map((tool) => tool.name);

// Tools that need a valid access token
const AUTHENTICATED_TOOLS = new Map<string, ToolHandler>([
  [searchToolDefinition.name, executeSearch],
  [detailsToolDefinition.name, executeDetails],
  [rankingToolDefinition.name, executeRanking],
  [seasonalToolDefinition.name, executeSeasonal],
  [suggestionsToolDefinition.name, executeSuggestions],
  [animeListToolDefinition.name, executeAnimeList],
  [updateListStatusToolDefinition.name, executeUpdateListStatus],
  [deleteListItemToolDefinition.name, executeDeleteListItem],
  [forumBoardsToolDefinition.name, executeForumBoards],
  [forumTopicsToolDefinition.name, executeForumTopics],
  [forumTopicToolDefinition.name, executeForumTopic],
  [profileToolDefinition.name, executeProfile],
]);

function text(value: string, isError = false): ToolResult {
  const result: ToolResult = { content: [{ type: 'text', text: value }] };
  if (isError) {
    result.isError = true;
  }
  return result;
}

/**
 * Runs one tool call. Errors never escape: they come back as isError results.
 */
export async function callTool(
  auth: AuthFlow,
  name: string,
  args: unknown,
  options: AuthStatusOptions = {},
): Promise<ToolResult> {
  try {
    // auth_status handles its own auth
    if (name === authStatusToolDefinition.name) {
      return text(await executeAuthStatus(auth, args, options));
    }
    if (name === serverInfoToolDefinition.name) {
      return text(executeServerInfo(TOOL_NAMES));
    }

    const handler = AUTHENTICATED_TOOLS.get(name);
    if (!handler) {
      return text(`Unknown tool: ${name}`, true);
    }

    const token = await auth.getAccessToken();
    return text(await handler(token, args));
  } catch (error) {
    if (error instanceof InvalidArgumentsError) {
      return text(`Error: ${error.message}`, true);
    }
    if (error instanceof MalApiError && !error.sessionRejected) {
      return text(`Error: ${error.message}`, true);
    }
    const message = error instanceof Error ? error.message : String(error);
    const tip =
      error instanceof AuthRequiredError ||
      error instanceof ExchangeError ||
      error instanceof MalApiError
        ? 'Tip: Run mal_auth_status to sign in again.'
        : 'Tip: Use mal_auth_status to check or fix your connection.';
    return text(`Error: ${message}\n\n${tip}`, true);
  }
}

export function createServer(auth: AuthFlow): Server {
  const server = new Server(
    { name: SERVER_NAME, version: SERVER_VERSION },
    { capabilities: { tools: {} } },
  );

  server.setRequestHandler(ListToolsRequestSchema, async () => ({
    tools: TOOL_DEFINITIONS,
  }));

  server.setRequestHandler(CallToolRequestSchema, async (request) => {
    const { name, arguments: args = {} } = request.params;
    return callTool(auth, name, args);
  });

  return server;
}
