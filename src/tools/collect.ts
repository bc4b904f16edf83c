/**
 * pr_collect_comments tool - Enumerate a user's PRs and accumulate their
 * reviewer comments into the output file
 */

import { z } from 'zod';
import type { PullRequestSource } from '../azure/types.js';
import { accumulateComments, type AccumulateResult } from '../collector/accumulator.js';
import { enumeratePullRequests } from '../collector/enumerator.js';
import { readPullRequestIds, removeArtifact } from '../collector/store.js';
import type { CompiledFilterRules } from '../filters/system-comments.js';
import { logger } from '../logging.js';

export const DEFAULT_OUTPUT_FILE = 'pr_comments.json';

export const CollectInputSchema = z.object({
  repository: z.string().min(1, 'Repository name is required'),
  user: z.string().min(1, 'User display name is required'),
  output: z.string().min(1).optional().default(DEFAULT_OUTPUT_FILE),
  /** Read IDs from a file written by pr_user_prs instead of querying */
  prIdsFile: z.string().min(1).optional(),
  /** Keep prIdsFile after a successful run (it is deleted by default) */
  keepPrIdsFile: z.boolean().optional().default(false),
  dedupe: z.boolean().optional().default(false),
  failFast: z.boolean().optional().default(false)
});

export type CollectInput = z.input<typeof CollectInputSchema>;

export interface CollectOutput extends AccumulateResult {
  repository: string;
  user: string;
}

export async function prCollectComments(
  input: CollectInput,
  source: PullRequestSource,
  rules?: CompiledFilterRules
): Promise<CollectOutput> {
  const { repository, user, output, prIdsFile, keepPrIdsFile, dedupe, failFast } = CollectInputSchema.parse(input);

  let prIds: number[];
  if (prIdsFile) {
    logger.info(`Reading PR IDs from ${prIdsFile}...`);
    prIds = await readPullRequestIds(prIdsFile);
  } else {
    logger.info(`Fetching PRs for user: ${user}...`);
    prIds = await enumeratePullRequests(source, { repository, user });
  }

  const result = await accumulateComments(source, prIds, { repository, output, rules, dedupe, failFast });

  if (prIdsFile && !keepPrIdsFile) {
    await removeArtifact(prIdsFile);
  }

  return { repository, user, ...result };
}
