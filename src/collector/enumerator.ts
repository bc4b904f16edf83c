/**
 * PR Enumerator - list a user's pull request IDs in one repository
 */

import type { PullRequestSource, PullRequestStatus } from '../azure/types.js';
import { logger } from '../logging.js';

export const DEFAULT_STATUSES: readonly PullRequestStatus[] = ['active', 'completed'];

/** One page big enough for a repository's whole history */
export const DEFAULT_MAX_RESULTS = 10000;

export interface EnumerateOptions {
  repository: string;
  /** Display name, matched exactly */
  user: string;
  statuses?: readonly PullRequestStatus[];
  maxResults?: number;
}

/**
 * Return PR IDs in the order the service lists them. Drafts and statuses
 * outside `statuses` are dropped. Remote failures propagate; an empty
 * result is a success.
 */
export async function enumeratePullRequests(
  source: PullRequestSource,
  options: EnumerateOptions
): Promise<number[]> {
  const statuses = options.statuses ?? DEFAULT_STATUSES;
  const maxResults = options.maxResults ?? DEFAULT_MAX_RESULTS;
  const wanted = new Set<string>(statuses);

  const pullRequests = await source.listPullRequests(options.repository, options.user, statuses, maxResults);

  const ids: number[] = [];
  const seen = new Set<number>();
  for (const pr of pullRequests) {
    if (!wanted.has(pr.status)) continue;
    if (pr.isDraft) continue;
    // The CLI resolves --creator loosely; require the exact display name
    if (pr.creator !== null && pr.creator !== options.user) continue;
    if (seen.has(pr.id)) continue;
    seen.add(pr.id);
    ids.push(pr.id);
  }

  if (ids.length === 0) {
    logger.info(`No pull requests found for user "${options.user}" in ${options.repository}`);
  } else {
    logger.debug(`Enumerated ${ids.length} of ${pullRequests.length} listed PRs`, { statuses });
  }

  return ids;
}
