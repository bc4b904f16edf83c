/**
 * Azure DevOps Client - az CLI wrapper with per-call timeout and bounded retry
 */

import { spawnSync } from 'child_process';
import { randomUUID } from 'crypto';
import type {
  PullRequestResponse,
  PullRequestSource,
  PullRequestStatus,
  PullRequestSummary,
  RawComment,
  RepositoryResponse,
  ThreadListResponse
} from './types.js';
import { logger } from '../logging.js';

// ============================================================================
// Structured Error
// ============================================================================

export type ErrorKind = 'auth' | 'query' | 'io' | 'config' | 'prerequisite';

export class StructuredError extends Error {
  readonly kind: ErrorKind;
  readonly retryable: boolean;
  readonly userAction: string | null;
  readonly correlationId: string;

  constructor(kind: ErrorKind, message: string, retryable: boolean, userAction: string | null = null) {
    super(message);
    this.name = 'StructuredError';
    this.kind = kind;
    this.retryable = retryable;
    this.userAction = userAction;
    this.correlationId = randomUUID();
  }

  toJSON() {
    return {
      success: false,
      error: {
        kind: this.kind,
        message: this.message,
        retryable: this.retryable,
        user_action: this.userAction,
        correlation_id: this.correlationId
      }
    };
  }
}

const LOGIN_ACTION = 'Run: az login (and az devops login for PAT-based setups)';

/** Application ID of Azure DevOps, used as the token resource for `az rest` */
export const AZURE_DEVOPS_RESOURCE_ID = '499b84ac-1321-427f-aa17-267ca6975798';

export const THREADS_API_VERSION = '7.0';

// ============================================================================
// Retry Policy
// ============================================================================

export interface RetryOptions {
  retries: number;
  retryDelayMs: number;
}

/**
 * Exponential backoff for retryable query failures. Auth failures never retry.
 */
export class RetryPolicy {
  constructor(private readonly options: RetryOptions) {}

  async execute<T>(label: string, fn: () => Promise<T>, attempt = 0): Promise<T> {
    try {
      return await fn();
    } catch (e) {
      if (!(e instanceof StructuredError) || !e.retryable || attempt >= this.options.retries) {
        throw e;
      }
      const delay = this.options.retryDelayMs * 2 ** attempt;
      logger.warning(`${label} failed (${e.message}), retrying in ${delay}ms (attempt ${attempt + 1}/${this.options.retries})`);
      await this.sleep(delay);
      return this.execute(label, fn, attempt + 1);
    }
  }

  private sleep(ms: number): Promise<void> {
    return new Promise(resolve => setTimeout(resolve, ms));
  }
}

// ============================================================================
// Azure DevOps Client
// ============================================================================

export interface AzureClientOptions extends RetryOptions {
  /** Organization URL, e.g. https://dev.azure.com/contoso */
  organization: string;
  project: string;
  timeoutMs: number;
}

export class AzureDevOpsClient implements PullRequestSource {
  private readonly retryPolicy: RetryPolicy;
  private readonly repositoryIds = new Map<string, string>();

  constructor(private readonly options: AzureClientOptions) {
    this.retryPolicy = new RetryPolicy(options);
  }

  /**
   * Check prerequisites (az CLI installed and logged in)
   */
  checkPrerequisites(): void {
    const version = spawnSync('az', ['--version'], {
      encoding: 'utf-8',
      timeout: this.options.timeoutMs,
      windowsHide: true
    });
    if (version.error || version.status !== 0) {
      throw new StructuredError(
        'prerequisite',
        'Azure CLI (az) not found',
        false,
        'Install from: https://learn.microsoft.com/cli/azure/install-azure-cli, then run: az extension add --name azure-devops'
      );
    }

    const account = spawnSync('az', ['account', 'show', '--output', 'json'], {
      encoding: 'utf-8',
      timeout: this.options.timeoutMs,
      windowsHide: true
    });
    if (account.error || account.status !== 0) {
      throw new StructuredError('auth', 'Not authenticated with Azure', false, LOGIN_ACTION);
    }
  }

  async listPullRequests(
    repository: string,
    user: string,
    statuses: readonly PullRequestStatus[],
    maxResults: number
  ): Promise<PullRequestSummary[]> {
    const args = [
      'repos', 'pr', 'list',
      '--repository', repository,
      '--project', this.options.project,
      '--org', this.options.organization,
      '--creator', user,
      '--status', statuses.length === 1 ? statuses[0] : 'all',
      '--top', String(maxResults),
      '--output', 'json'
    ];

    const data = await this.run<PullRequestResponse[]>(`List PRs in ${repository}`, args);
    if (!Array.isArray(data)) {
      throw new StructuredError('query', 'Unexpected response from az repos pr list', false);
    }

    const summaries: PullRequestSummary[] = [];
    for (const pr of data) {
      if (typeof pr.pullRequestId !== 'number') continue;
      summaries.push({
        id: pr.pullRequestId,
        status: pr.status ?? '',
        isDraft: pr.isDraft === true,
        creator: pr.createdBy?.displayName ?? null,
        title: pr.title ?? ''
      });
    }
    return summaries;
  }

  async listComments(repository: string, prId: number): Promise<RawComment[]> {
    const repositoryId = await this.getRepositoryId(repository);
    const uri = buildThreadsUrl(this.options.organization, this.options.project, repositoryId, prId);

    const data = await this.run<ThreadListResponse>(`Fetch threads for PR ${prId}`, [
      'rest',
      '--resource', AZURE_DEVOPS_RESOURCE_ID,
      '--uri', uri,
      '--method', 'GET'
    ]);

    return flattenThreads(data);
  }

  /**
   * Resolve repository name to its GUID, once per repository
   */
  async getRepositoryId(repository: string): Promise<string> {
    const cached = this.repositoryIds.get(repository);
    if (cached) return cached;

    const data = await this.run<RepositoryResponse>(`Resolve repository ${repository}`, [
      'repos', 'show',
      '--repository', repository,
      '--project', this.options.project,
      '--org', this.options.organization,
      '--output', 'json'
    ]);

    if (!data || typeof data.id !== 'string' || data.id === '') {
      throw new StructuredError('query', `Repository ${repository} has no id in az response`, false);
    }
    this.repositoryIds.set(repository, data.id);
    return data.id;
  }

  private run<T>(label: string, args: string[]): Promise<T> {
    return this.retryPolicy.execute(label, async () => this.executeAz<T>(args));
  }

  /**
   * Internal az execution
   */
  private executeAz<T>(args: string[]): T {
    const result = spawnSync('az', args, {
      encoding: 'utf-8',
      maxBuffer: 64 * 1024 * 1024,
      timeout: this.options.timeoutMs,
      windowsHide: true
    });

    if (result.error) {
      const code = 'code' in result.error ? result.error.code : undefined;
      if (code === 'ETIMEDOUT') {
        throw new StructuredError('query', `az ${args[0]} timed out after ${this.options.timeoutMs}ms`, true);
      }
      if (code === 'ENOENT') {
        throw new StructuredError('prerequisite', 'Azure CLI (az) not found', false,
          'Install from: https://learn.microsoft.com/cli/azure/install-azure-cli');
      }
      throw new StructuredError('query', `az CLI error: ${result.error.message}`, true);
    }

    if (result.status !== 0) {
      throw classifyFailure(result.stderr || '');
    }

    try {
      return JSON.parse(result.stdout) as T;
    } catch (e) {
      throw new StructuredError(
        'query',
        `Failed to parse az response: ${e instanceof Error ? e.message : String(e)}`,
        false
      );
    }
  }
}

/**
 * Map az stderr to an error kind
 */
export function classifyFailure(stderr: string): StructuredError {
  const text = stderr.trim();

  if (text.includes('TF401019') || /\b404\b/.test(text) || /does not exist/i.test(text)) {
    return new StructuredError('query', `Not found: ${text.slice(0, 500)}`, false);
  }
  if (
    /az login/i.test(text) ||
    /az devops login/i.test(text) ||
    text.includes('TF400813') ||
    /\b401\b/.test(text) ||
    /not authorized/i.test(text)
  ) {
    return new StructuredError('auth', 'Authentication failed', false, LOGIN_ACTION);
  }
  if (/\b403\b/.test(text) || /permission/i.test(text)) {
    return new StructuredError('query', `Permission denied: ${text.slice(0, 500)}`, false);
  }

  return new StructuredError('query', `az CLI failed: ${text.slice(0, 500)}`, true);
}

export function buildThreadsUrl(organization: string, project: string, repositoryId: string, prId: number): string {
  return `${organization}/${encodeURIComponent(project)}/_apis/git/repositories/${repositoryId}` +
    `/pullRequests/${prId}/threads?api-version=${THREADS_API_VERSION}`;
}

/**
 * Flatten thread list into comments, thread order then comment order.
 * Entries that are not objects are skipped.
 */
export function flattenThreads(data: ThreadListResponse | null | undefined): RawComment[] {
  const comments: RawComment[] = [];
  const threads = data && Array.isArray(data.value) ? data.value : [];
  for (const thread of threads) {
    if (typeof thread !== 'object' || thread === null) continue;
    const entries = Array.isArray(thread.comments) ? thread.comments : [];
    for (const comment of entries) {
      if (typeof comment !== 'object' || comment === null) continue;
      comments.push({
        threadId: thread.id ?? null,
        commentId: comment.id ?? null,
        author: comment.author?.displayName || 'Unknown',
        content: comment.content ?? '',
        date: comment.publishedDate ?? '',
        commentType: comment.commentType ?? '',
        isDeleted: comment.isDeleted === true
      });
    }
  }
  return comments;
}
