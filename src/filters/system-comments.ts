/**
 * System Comment Filter
 *
 * Decides which raw PR comments are platform-generated (policy notices,
 * vote changes, status updates) rather than typed by a reviewer. The rule
 * set is data so it can follow the service's conventions without code edits.
 */

import { readFile } from 'fs/promises';
import { z, ZodError } from 'zod';
import { StructuredError } from '../azure/client.js';
import type { RawComment } from '../azure/types.js';
import { logger } from '../logging.js';

export const FilterRulesSchema = z.object({
  /** Comment types dropped outright (Azure DevOps marks platform notices as "system") */
  excludeCommentTypes: z.array(z.string()).default(['system']),
  /** Regex sources matched against the author display name */
  excludeAuthorPatterns: z.array(z.string()).default([]),
  /** Regex sources matched against the comment body */
  excludeContentPatterns: z.array(z.string()).default([]),
  skipEmpty: z.boolean().default(true),
  skipDeleted: z.boolean().default(true)
}).strict();

export type FilterRules = z.output<typeof FilterRulesSchema>;

/**
 * Rule set with regexes compiled once
 */
export interface CompiledFilterRules {
  excludeCommentTypes: Set<string>;
  excludeAuthorPatterns: RegExp[];
  excludeContentPatterns: RegExp[];
  skipEmpty: boolean;
  skipDeleted: boolean;
}

export const DEFAULT_FILTER_RULES: FilterRules = FilterRulesSchema.parse({});

function compilePattern(source: string, field: string): RegExp {
  try {
    return new RegExp(source);
  } catch (e) {
    throw new StructuredError(
      'config',
      `Invalid regex in ${field}: ${source} (${e instanceof Error ? e.message : String(e)})`,
      false,
      'Fix the pattern in the rules file'
    );
  }
}

export function compileFilterRules(rules: FilterRules = DEFAULT_FILTER_RULES): CompiledFilterRules {
  return {
    excludeCommentTypes: new Set(rules.excludeCommentTypes.map(t => t.toLowerCase())),
    excludeAuthorPatterns: rules.excludeAuthorPatterns.map(p => compilePattern(p, 'excludeAuthorPatterns')),
    excludeContentPatterns: rules.excludeContentPatterns.map(p => compilePattern(p, 'excludeContentPatterns')),
    skipEmpty: rules.skipEmpty,
    skipDeleted: rules.skipDeleted
  };
}

/**
 * True when the comment should not be treated as a reviewer's comment
 */
export function isSystemComment(comment: RawComment, rules: CompiledFilterRules): boolean {
  if (rules.skipDeleted && comment.isDeleted) return true;
  if (rules.skipEmpty && comment.content.trim() === '') return true;
  if (rules.excludeCommentTypes.has(comment.commentType.toLowerCase())) return true;
  if (rules.excludeAuthorPatterns.some(p => p.test(comment.author))) return true;
  if (rules.excludeContentPatterns.some(p => p.test(comment.content))) return true;
  return false;
}

/**
 * Keep reviewer comments, preserving order
 */
export function filterHumanComments(comments: RawComment[], rules: CompiledFilterRules): RawComment[] {
  return comments.filter(c => !isSystemComment(c, rules));
}

/**
 * Parse a rules object, filling defaults for missing fields
 */
export function parseFilterRules(input: unknown): FilterRules {
  try {
    return FilterRulesSchema.parse(input);
  } catch (e) {
    if (e instanceof ZodError) {
      throw new StructuredError(
        'config',
        `Invalid filter rules: ${e.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join('; ')}`,
        false,
        'Fix the rules file'
      );
    }
    throw e;
  }
}

/**
 * Load rules from a JSON file (explicit path, then PR_COMMENTS_RULES), or the defaults
 */
export async function loadFilterRules(
  path?: string,
  env: NodeJS.ProcessEnv = process.env
): Promise<CompiledFilterRules> {
  const rulesPath = path || env.PR_COMMENTS_RULES;
  if (!rulesPath) {
    return compileFilterRules(DEFAULT_FILTER_RULES);
  }

  let text: string;
  try {
    text = await readFile(rulesPath, 'utf-8');
  } catch (e) {
    throw new StructuredError(
      'io',
      `Cannot read rules file ${rulesPath}: ${e instanceof Error ? e.message : String(e)}`,
      false
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new StructuredError(
      'config',
      `Rules file ${rulesPath} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`,
      false,
      'Fix the rules file'
    );
  }

  const rules = parseFilterRules(parsed);
  logger.debug(`Loaded filter rules from ${rulesPath}`, rules);
  return compileFilterRules(rules);
}
