/**
 * Azure DevOps API Types
 */

export type PullRequestStatus = 'active' | 'completed' | 'abandoned';

export const PULL_REQUEST_STATUSES: readonly PullRequestStatus[] = ['active', 'completed', 'abandoned'];

export interface IdentityRef {
  displayName?: string;
  uniqueName?: string;
  id?: string;
}

/** Entry of `az repos pr list --output json` */
export interface PullRequestResponse {
  pullRequestId?: number;
  status?: string;
  isDraft?: boolean;
  title?: string;
  createdBy?: IdentityRef | null;
}

/** Output of `az repos show --output json` */
export interface RepositoryResponse {
  id?: string;
  name?: string;
}

export interface ThreadCommentResponse {
  id?: number;
  author?: IdentityRef | null;
  content?: string | null;
  publishedDate?: string;
  commentType?: string;
  isDeleted?: boolean;
}

export interface ThreadResponse {
  id?: number;
  comments?: (ThreadCommentResponse | null)[] | null;
}

/** Body of GET .../pullRequests/{id}/threads */
export interface ThreadListResponse {
  value?: (ThreadResponse | null)[];
  count?: number;
}

// ============================================================================
// Normalized shapes handed to the collector
// ============================================================================

export interface PullRequestSummary {
  id: number;
  status: string;
  isDraft: boolean;
  creator: string | null;
  title: string;
}

export interface RawComment {
  threadId: number | null;
  commentId: number | null;
  author: string;
  content: string;
  date: string;
  commentType: string;
  isDeleted: boolean;
}

/**
 * Query interface over the hosted service. The collector depends on this,
 * never on the CLI transport.
 */
export interface PullRequestSource {
  listPullRequests(
    repository: string,
    user: string,
    statuses: readonly PullRequestStatus[],
    maxResults: number
  ): Promise<PullRequestSummary[]>;
  listComments(repository: string, prId: number): Promise<RawComment[]>;
}

/** A source that can also verify the az CLI is installed and logged in */
export interface CollectorClient extends PullRequestSource {
  checkPrerequisites(): void;
}
