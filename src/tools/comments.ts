/**
 * pr_comments tool - Reviewer comments of a single PR, nothing persisted
 */

import { z } from 'zod';
import type { PullRequestSource } from '../azure/types.js';
import { fetchPullRequestComments } from '../collector/accumulator.js';
import type { CommentRecord } from '../collector/store.js';
import type { CompiledFilterRules } from '../filters/system-comments.js';

export const CommentsInputSchema = z.object({
  repository: z.string().min(1, 'Repository name is required'),
  pr: z.number().int().positive('PR number must be positive')
});

export type CommentsInput = z.input<typeof CommentsInputSchema>;

export interface CommentsOutput {
  repository: string;
  pr: number;
  count: number;
  comments: CommentRecord[];
}

export async function prComments(
  input: CommentsInput,
  source: PullRequestSource,
  rules?: CompiledFilterRules
): Promise<CommentsOutput> {
  const { repository, pr } = CommentsInputSchema.parse(input);
  const comments = await fetchPullRequestComments(source, repository, pr, rules);
  return { repository, pr, count: comments.length, comments };
}
