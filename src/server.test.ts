/**
 * Unit tests for the MCP tool definitions and dispatch
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { ErrorCode } from '@modelcontextprotocol/sdk/types.js';
import { StdioServerTransport } from '@modelcontextprotocol/sdk/server/stdio.js';
import { PRCommentsMCPServer, TOOLS, callTool } from './server.js';
import { StructuredError } from './azure/client.js';
import type { CollectorClient } from './azure/types.js';
import { compileFilterRules } from './filters/system-comments.js';
import { logger } from './logging.js';
import { FakePullRequestSource, rawComment } from './testing/fake-source.js';

vi.mock('@modelcontextprotocol/sdk/server/stdio.js', () => ({
  StdioServerTransport: vi.fn()
}));

class FakeClient extends FakePullRequestSource implements CollectorClient {
  prerequisiteError: Error | null = null;

  checkPrerequisites(): void {
    if (this.prerequisiteError) throw this.prerequisiteError;
  }
}

const rules = compileFilterRules();
let source: FakePullRequestSource;

beforeEach(() => {
  source = new FakePullRequestSource();
  vi.spyOn(logger, 'info').mockImplementation(() => {});
  vi.spyOn(logger, 'error').mockImplementation(() => {});
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('TOOLS', () => {
  it('exposes enumeration, lookup and collection', () => {
    expect(TOOLS.map(t => t.name)).toEqual(['pr_user_prs', 'pr_comments', 'pr_collect_comments']);
  });

  it('requires repository on every tool', () => {
    for (const tool of TOOLS) {
      expect(tool.inputSchema.required).toContain('repository');
    }
  });

  it('requires the user where PRs are enumerated', () => {
    const byName = new Map(TOOLS.map(t => [t.name, t]));
    expect(byName.get('pr_user_prs')?.inputSchema.required).toEqual(['repository', 'user']);
    expect(byName.get('pr_collect_comments')?.inputSchema.required).toEqual(['repository', 'user']);
    expect(byName.get('pr_comments')?.inputSchema.required).toEqual(['repository', 'pr']);
  });
});

describe('callTool', () => {
  it('returns the comments of one PR as JSON text', async () => {
    source.comments.set(7, [
      rawComment({ content: 'Keep' }),
      rawComment({ commentType: 'system', content: 'Policy updated' })
    ]);

    const result = await callTool('pr_comments', { repository: 'web-app', pr: 7 }, source, rules);

    expect(result.content).toHaveLength(1);
    expect(JSON.parse(result.content[0].text)).toEqual({
      repository: 'web-app',
      pr: 7,
      count: 1,
      comments: [{ reviewer_name: 'Alex Reviewer', comment: 'Keep', date: '2024-03-01T10:00:00.000Z' }]
    });
  });

  it('maps invalid arguments to InvalidRequest', async () => {
    await expect(callTool('pr_comments', { repository: 'web-app', pr: 'seven' }, source, rules))
      .rejects.toMatchObject({ code: ErrorCode.InvalidRequest });
    expect(source.commentCalls).toEqual([]);
  });

  it('maps config failures to InvalidRequest with the remediation step', async () => {
    source.comments.set(7, new StructuredError('config', 'Missing project', false, 'Set AZURE_DEVOPS_PROJECT'));

    const call = callTool('pr_comments', { repository: 'web-app', pr: 7 }, source, rules);

    await expect(call).rejects.toMatchObject({ code: ErrorCode.InvalidRequest });
    await expect(call).rejects.toThrow('Missing project (Set AZURE_DEVOPS_PROJECT)');
  });

  it('maps query failures to InternalError', async () => {
    source.comments.set(7, new StructuredError('query', 'az CLI failed: socket hang up', true));

    const call = callTool('pr_comments', { repository: 'web-app', pr: 7 }, source, rules);

    await expect(call).rejects.toMatchObject({ code: ErrorCode.InternalError });
    await expect(call).rejects.toThrow('az CLI failed: socket hang up');
    expect(logger.error).toHaveBeenCalledWith('az CLI failed: socket hang up', expect.objectContaining({ kind: 'query' }));
  });

  it('maps unexpected errors to InternalError', async () => {
    source.comments.set(7, new Error('boom'));

    await expect(callTool('pr_comments', { repository: 'web-app', pr: 7 }, source, rules))
      .rejects.toThrow('Tool execution failed: boom');
  });

  it('rejects unknown tools', async () => {
    await expect(callTool('pr_merge', {}, source, rules))
      .rejects.toMatchObject({ code: ErrorCode.MethodNotFound });
  });
});

describe('PRCommentsMCPServer.run', () => {
  it('checks prerequisites before opening the transport', async () => {
    const client = new FakeClient();
    client.prerequisiteError = new StructuredError('auth', 'Not authenticated with Azure', false, 'Run: az login');
    const config = { organization: 'https://dev.azure.com/ORG', project: 'PRJ', timeoutMs: 60000, retries: 0, retryDelayMs: 1000 };

    await expect(new PRCommentsMCPServer(config, rules, client).run()).rejects.toMatchObject({ kind: 'auth' });
    expect(StdioServerTransport).not.toHaveBeenCalled();
  });
});
