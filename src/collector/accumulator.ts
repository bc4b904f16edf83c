/**
 * Comment Accumulator
 *
 * Fetches comment threads PR by PR, drops system comments and appends the
 * reviewer comments to the output collection. The file is written once, at
 * the end, so an aborted run leaves prior content as it was.
 */

import { StructuredError } from '../azure/client.js';
import type { PullRequestSource, RawComment } from '../azure/types.js';
import { compileFilterRules, filterHumanComments, type CompiledFilterRules } from '../filters/system-comments.js';
import { logger } from '../logging.js';
import {
  appendRecords,
  readOutputCollection,
  writeOutputCollection,
  type CommentRecord
} from './store.js';

export interface AccumulateOptions {
  repository: string;
  output: string;
  rules?: CompiledFilterRules;
  /** Skip records already present by (reviewer_name, comment, date) */
  dedupe?: boolean;
  /** Abort on the first failing PR instead of skipping it */
  failFast?: boolean;
}

export interface PullRequestFailure {
  id: number;
  kind: string;
  message: string;
}

export interface AccumulateResult {
  output: string;
  pullRequests: number;
  processed: number;
  failures: PullRequestFailure[];
  newComments: number;
  skippedDuplicates: number;
  totalComments: number;
  written: boolean;
}

const ISO_DATE_TIME = /^(\d{4}-\d{2}-\d{2})T(\d{2}:\d{2}:\d{2})(?:\.(\d+))?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Normalize an ISO-8601 date-time to UTC with at least millisecond digits.
 * Fractional digits beyond milliseconds are kept (Azure DevOps sends seven);
 * anything that is not a full date-time with a zone passes through verbatim.
 */
export function normalizeDate(value: string): string {
  const match = ISO_DATE_TIME.exec(value);
  if (!match) return value;

  const [, day, clock, fraction = '', zone] = match;
  const time = Date.parse(`${day}T${clock}${zone}`);
  if (Number.isNaN(time)) return value;

  const seconds = new Date(time).toISOString().slice(0, 19);
  return `${seconds}.${fraction.padEnd(3, '0')}Z`;
}

export function toCommentRecord(comment: RawComment): CommentRecord {
  return {
    reviewer_name: comment.author,
    comment: comment.content,
    date: normalizeDate(comment.date)
  };
}

/**
 * Fetch one PR's reviewer comments as records
 */
export async function fetchPullRequestComments(
  source: PullRequestSource,
  repository: string,
  prId: number,
  rules: CompiledFilterRules = compileFilterRules()
): Promise<CommentRecord[]> {
  const raw = await source.listComments(repository, prId);
  const kept = filterHumanComments(raw, rules);
  logger.debug(`PR ${prId}: kept ${kept.length} of ${raw.length} comments`);
  return kept.map(toCommentRecord);
}

export async function accumulateComments(
  source: PullRequestSource,
  prIds: readonly number[],
  options: AccumulateOptions
): Promise<AccumulateResult> {
  const rules = options.rules ?? compileFilterRules();

  // Read before fetching so an unreadable output fails fast, untouched
  const existing = await readOutputCollection(options.output);

  logger.info(`Found ${prIds.length} PRs to process`);

  const fresh: CommentRecord[] = [];
  const failures: PullRequestFailure[] = [];
  let processed = 0;

  for (const [index, prId] of prIds.entries()) {
    logger.info(`Processing PR ${prId} (${index + 1}/${prIds.length})...`);
    try {
      fresh.push(...await fetchPullRequestComments(source, options.repository, prId, rules));
      processed++;
    } catch (e) {
      if (options.failFast || !(e instanceof StructuredError) || e.kind === 'auth') {
        throw e;
      }
      logger.warning(`Failed to get comments for PR ${prId}: ${e.message}`);
      failures.push({ id: prId, kind: e.kind, message: e.message });
    }
  }

  const merged = appendRecords(existing.entries, fresh, options.dedupe ?? false);
  if (merged.skippedDuplicates > 0) {
    logger.info(`Skipped ${merged.skippedDuplicates} comments already in ${options.output}`);
  }

  // Nothing new: leave an existing file byte-for-byte as it is
  const written = merged.appended.length > 0 || !existing.exists;
  if (written) {
    await writeOutputCollection(options.output, merged.entries);
  }

  logger.info(`Successfully saved ${merged.appended.length} new comments to ${options.output}`);
  logger.info(`Total comments in file: ${merged.entries.length}`);
  if (failures.length > 0) {
    logger.warning(`${failures.length} PRs could not be read: ${failures.map(f => f.id).join(', ')}`);
  }

  return {
    output: options.output,
    pullRequests: prIds.length,
    processed,
    failures,
    newComments: merged.appended.length,
    skippedDuplicates: merged.skippedDuplicates,
    totalComments: merged.entries.length,
    written
  };
}
