/**
 * pr_user_prs tool - List a user's active and completed PR IDs
 */

import { z } from 'zod';
import type { PullRequestSource } from '../azure/types.js';
import { DEFAULT_MAX_RESULTS, DEFAULT_STATUSES, enumeratePullRequests } from '../collector/enumerator.js';
import { writePullRequestIds } from '../collector/store.js';

export const DEFAULT_PR_IDS_FILE = 'user_prs.json';

export const UserPRsInputSchema = z.object({
  repository: z.string().min(1, 'Repository name is required'),
  user: z.string().min(1, 'User display name is required'),
  statuses: z.array(z.enum(['active', 'completed', 'abandoned'])).min(1).optional().default([...DEFAULT_STATUSES]),
  maxResults: z.number().int().min(1).max(100000).optional().default(DEFAULT_MAX_RESULTS),
  /** Also write the ID list to this file */
  output: z.string().min(1).optional()
});

export type UserPRsInput = z.input<typeof UserPRsInputSchema>;

export interface UserPRsOutput {
  repository: string;
  user: string;
  count: number;
  pullRequestIds: number[];
  output: string | null;
}

/**
 * Enumerate PR IDs; the list is written only after the query succeeded
 */
export async function prUserPRs(
  input: UserPRsInput,
  source: PullRequestSource
): Promise<UserPRsOutput> {
  const { repository, user, statuses, maxResults, output } = UserPRsInputSchema.parse(input);

  const pullRequestIds = await enumeratePullRequests(source, { repository, user, statuses, maxResults });

  if (output) {
    await writePullRequestIds(output, pullRequestIds);
  }

  return {
    repository,
    user,
    count: pullRequestIds.length,
    pullRequestIds,
    output: output ?? null
  };
}
