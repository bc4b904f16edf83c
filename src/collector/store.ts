/**
 * Output collection and PR-ID artifact persistence
 */

import path from 'path';
import { readFile, writeFile, mkdir, rename, rm } from 'fs/promises';
import { StructuredError } from '../azure/client.js';
import { logger } from '../logging.js';

export interface CommentRecord {
  reviewer_name: string;
  comment: string;
  date: string;
}

/**
 * Entries already on disk. Kept as parsed JSON so records written by other
 * tools (or older versions) survive a rewrite unchanged.
 */
export type StoredEntry = unknown;

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function isMissingFile(e: unknown): boolean {
  return e instanceof Error && 'code' in e && e.code === 'ENOENT';
}

/**
 * Read the existing collection; a missing file is an empty collection
 */
export async function readOutputCollection(filePath: string): Promise<{ entries: StoredEntry[]; exists: boolean }> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (e) {
    if (isMissingFile(e)) {
      return { entries: [], exists: false };
    }
    throw new StructuredError('io', `Cannot read ${filePath}: ${describe(e)}`, false);
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (e) {
    throw new StructuredError(
      'io',
      `${filePath} is not valid JSON: ${describe(e)}`,
      false,
      'Repair or move the file; it is left untouched'
    );
  }

  if (!Array.isArray(parsed)) {
    throw new StructuredError(
      'io',
      `${filePath} does not contain a JSON array`,
      false,
      'Repair or move the file; it is left untouched'
    );
  }

  return { entries: parsed, exists: true };
}

/**
 * Write the full collection atomically via temp file
 */
export async function writeOutputCollection(filePath: string, entries: readonly StoredEntry[]): Promise<void> {
  await writeJsonAtomic(filePath, `${JSON.stringify(entries, null, 2)}\n`);
}

async function writeJsonAtomic(filePath: string, data: string): Promise<void> {
  const tempPath = `${filePath}.tmp`;
  try {
    await mkdir(path.dirname(path.resolve(filePath)), { recursive: true });
    await writeFile(tempPath, data, 'utf-8');
    await rename(tempPath, filePath);
  } catch (e) {
    await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
      logger.warning(`Could not remove ${tempPath}: ${describe(cleanupError)}`);
    });
    throw new StructuredError('io', `Cannot write ${filePath}: ${describe(e)}`, false);
  }
}

// ============================================================================
// Merge
// ============================================================================

function isCommentRecord(value: unknown): value is CommentRecord {
  if (typeof value !== 'object' || value === null) return false;
  return 'reviewer_name' in value && typeof value.reviewer_name === 'string' &&
    'comment' in value && typeof value.comment === 'string' &&
    'date' in value && typeof value.date === 'string';
}

export function recordKey(record: CommentRecord): string {
  return JSON.stringify([record.reviewer_name, record.comment, record.date]);
}

export interface AppendResult {
  entries: StoredEntry[];
  appended: CommentRecord[];
  skippedDuplicates: number;
}

/**
 * Append new records after the existing entries. Existing entries are never
 * modified or reordered. With dedupe, a record whose
 * (reviewer_name, comment, date) is already present is skipped.
 */
export function appendRecords(
  existing: readonly StoredEntry[],
  incoming: readonly CommentRecord[],
  dedupe = false
): AppendResult {
  if (!dedupe) {
    return { entries: [...existing, ...incoming], appended: [...incoming], skippedDuplicates: 0 };
  }

  const seen = new Set<string>();
  for (const entry of existing) {
    if (isCommentRecord(entry)) seen.add(recordKey(entry));
  }

  const appended: CommentRecord[] = [];
  let skippedDuplicates = 0;
  for (const record of incoming) {
    const key = recordKey(record);
    if (seen.has(key)) {
      skippedDuplicates++;
      continue;
    }
    seen.add(key);
    appended.push(record);
  }

  return { entries: [...existing, ...appended], appended, skippedDuplicates };
}

// ============================================================================
// PR-ID artifact
// ============================================================================

export async function writePullRequestIds(filePath: string, ids: readonly number[]): Promise<void> {
  await writeJsonAtomic(filePath, `${JSON.stringify(ids)}\n`);
}

/**
 * Parse a PR-ID list: a JSON array of integers, or one "<id>," per line
 */
export function parsePullRequestIds(text: string): number[] {
  const trimmed = text.trim();
  if (trimmed === '') return [];

  let values: unknown[];
  if (trimmed.startsWith('[')) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(trimmed);
    } catch (e) {
      throw new StructuredError('io', `PR-ID list is not valid JSON: ${describe(e)}`, false);
    }
    if (!Array.isArray(parsed)) {
      throw new StructuredError('io', 'PR-ID list is not an array', false);
    }
    values = parsed;
  } else {
    values = trimmed
      .split(/\r?\n/)
      .map(line => line.trim().replace(/,$/, '').trim())
      .filter(line => line !== '');
  }

  return values.map(value => {
    const id = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
    if (typeof id !== 'number' || !Number.isSafeInteger(id) || id <= 0) {
      throw new StructuredError('io', `Invalid PR id in list: ${JSON.stringify(value)}`, false);
    }
    return id;
  });
}

export async function readPullRequestIds(filePath: string): Promise<number[]> {
  let text: string;
  try {
    text = await readFile(filePath, 'utf-8');
  } catch (e) {
    throw new StructuredError('io', `Cannot read PR-ID list ${filePath}: ${describe(e)}`, false);
  }
  return parsePullRequestIds(text);
}

/**
 * Delete a transient artifact. Failure is logged, never thrown: the data
 * it fed has already been written.
 */
export async function removeArtifact(filePath: string): Promise<boolean> {
  try {
    await rm(filePath);
    logger.info(`Deleted temporary file: ${filePath}`);
    return true;
  } catch (e) {
    logger.warning(`Could not delete ${filePath}: ${describe(e)}`);
    return false;
  }
}
