/**
 * PR Comment Collector MCP Server
 *
 * Exposes PR enumeration, single-PR comment lookup and comment accumulation
 * as MCP tools over stdio, backed by the Azure CLI.
 */

import { Server } from '@modelcontextprotocol/sdk/server/index.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import {
  CallToolRequestSchema,
  ErrorCode,
  ListToolsRequestSchema,
  McpError,
  type Tool
} from '@modelcontextprotocol/sdk/types.js';

import { ZodError } from 'zod';
import { AzureDevOpsClient, StructuredError } from './azure/client.js';
import type { CollectorClient, PullRequestSource } from './azure/types.js';
import type { CollectorConfig } from './config.js';
import type { CompiledFilterRules } from './filters/system-comments.js';
import { logger } from './logging.js';
import { prCollectComments, CollectInputSchema } from './tools/collect.js';
import { prComments, CommentsInputSchema } from './tools/comments.js';
import { prUserPRs, UserPRsInputSchema } from './tools/user-prs.js';
import { VERSION } from './version.js';

export const TOOLS: Tool[] = [
  {
    name: 'pr_user_prs',
    description: 'List IDs of active and completed pull requests created by a user (exact display name)',
    inputSchema: {
      type: 'object',
      properties: {
        repository: { type: 'string', description: 'Repository name' },
        user: { type: 'string', description: 'Creator display name, matched exactly' },
        statuses: {
          type: 'array',
          items: { type: 'string', enum: ['active', 'completed', 'abandoned'] },
          description: 'Statuses to include (default: active, completed)'
        },
        maxResults: { type: 'number', description: 'Page size (default: 10000)' },
        output: { type: 'string', description: 'Also write the ID list to this file' }
      },
      required: ['repository', 'user']
    }
  },
  {
    name: 'pr_comments',
    description: 'Get reviewer comments of one pull request with system comments filtered out',
    inputSchema: {
      type: 'object',
      properties: {
        repository: { type: 'string', description: 'Repository name' },
        pr: { type: 'number', description: 'Pull request ID' }
      },
      required: ['repository', 'pr']
    }
  },
  {
    name: 'pr_collect_comments',
    description: "Append reviewer comments from all of a user's PRs to a JSON file (existing entries are kept)",
    inputSchema: {
      type: 'object',
      properties: {
        repository: { type: 'string', description: 'Repository name' },
        user: { type: 'string', description: 'Creator display name, matched exactly' },
        output: { type: 'string', description: 'Output JSON file (default: pr_comments.json)' },
        prIdsFile: { type: 'string', description: 'Read PR IDs from this file instead of querying' },
        keepPrIdsFile: { type: 'boolean', description: 'Keep prIdsFile after the run (default: false)' },
        dedupe: { type: 'boolean', description: 'Skip comments already in the file (default: false)' },
        failFast: { type: 'boolean', description: 'Abort on the first failing PR (default: false)' }
      },
      required: ['repository', 'user']
    }
  }
];

export type ToolResult = {
  content: { type: 'text'; text: string }[];
};

/**
 * Run one tool call, mapping validation and collector failures to McpError
 */
export async function callTool(
  name: string,
  args: unknown,
  source: PullRequestSource,
  rules: CompiledFilterRules
): Promise<ToolResult> {
  try {
    let result: unknown;
    switch (name) {
      case 'pr_user_prs':
        result = await prUserPRs(UserPRsInputSchema.parse(args), source);
        break;

      case 'pr_comments':
        result = await prComments(CommentsInputSchema.parse(args), source, rules);
        break;

      case 'pr_collect_comments':
        result = await prCollectComments(CollectInputSchema.parse(args), source, rules);
        break;

      default:
        throw new McpError(ErrorCode.MethodNotFound, `Unknown tool: ${name}`);
    }

    return {
      content: [{ type: 'text', text: JSON.stringify(result, null, 2) }]
    };
  } catch (error) {
    if (error instanceof ZodError) {
      throw new McpError(ErrorCode.InvalidRequest, `Validation error: ${error.message}`);
    }

    if (error instanceof McpError) {
      throw error;
    }

    if (error instanceof StructuredError) {
      logger.error(error.message, error.toJSON().error);
      throw new McpError(
        error.kind === 'config' ? ErrorCode.InvalidRequest : ErrorCode.InternalError,
        error.userAction ? `${error.message} (${error.userAction})` : error.message
      );
    }

    const errorMessage = error instanceof Error ? error.message : String(error);
    throw new McpError(ErrorCode.InternalError, `Tool execution failed: ${errorMessage}`);
  }
}

export class PRCommentsMCPServer {
  private server: Server;
  private client: CollectorClient;

  constructor(
    config: CollectorConfig,
    private readonly rules: CompiledFilterRules,
    client?: CollectorClient
  ) {
    this.server = new Server(
      {
        name: 'pr-comment-collector',
        version: VERSION,
      },
      {
        capabilities: {
          tools: {},
          logging: {},
        },
      }
    );

    this.client = client ?? new AzureDevOpsClient(config);
    this.setupToolHandlers();
    this.setupErrorHandling();
  }

  private setupErrorHandling(): void {
    this.server.onerror = (error) => {
      console.error('[MCP Error]', error);
    };

    process.on('SIGINT', () => {
      this.server.close().then(
        () => process.exit(0),
        (error: unknown) => {
          console.error('[MCP Error] close failed', error);
          process.exit(1);
        }
      );
    });
  }

  private setupToolHandlers(): void {
    this.server.setRequestHandler(ListToolsRequestSchema, async () => ({ tools: TOOLS }));

    this.server.setRequestHandler(CallToolRequestSchema, async (request) =>
      callTool(request.params.name, request.params.arguments, this.client, this.rules)
    );
  }

  async run(): Promise<void> {
    // Fails with auth/prerequisite errors before any transport is opened
    this.client.checkPrerequisites();

    const transport = new StdioServerTransport();
    await this.server.connect(transport);
    logger.initialize(this.server);
    console.error('PR comment collector MCP server running on stdio');
  }
}
