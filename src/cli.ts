/**
 * Command line front end
 *
 *   pr-comments prs      --repository <name> --user "<display name>" [--output user_prs.json]
 *   pr-comments comments --repository <name> --user "<display name>" [--output pr_comments.json]
 *   pr-comments serve
 *
 * Exit codes: 0 success, 1 runtime failure, 2 usage error.
 */

import { parseArgs } from 'util';
import { ZodError } from 'zod';
import { AzureDevOpsClient, StructuredError } from './azure/client.js';
import type { CollectorClient } from './azure/types.js';
import { resolveConfig, type CollectorConfig } from './config.js';
import { loadFilterRules, type CompiledFilterRules } from './filters/system-comments.js';
import { logger } from './logging.js';
import { PRCommentsMCPServer } from './server.js';
import { DEFAULT_OUTPUT_FILE, prCollectComments } from './tools/collect.js';
import { DEFAULT_PR_IDS_FILE, prUserPRs } from './tools/user-prs.js';
import { VERSION } from './version.js';

export const EXIT_OK = 0;
export const EXIT_FAILURE = 1;
export const EXIT_USAGE = 2;

export const USAGE = `Usage: pr-comments <command> [options]

Commands:
  prs        Write the IDs of a user's active and completed PRs to a file
  comments   Append reviewer comments from a user's PRs to a JSON file
  serve      Run as an MCP server on stdio

Options:
  --repository <name>        Repository name (prs, comments)
  --user <display name>      PR creator display name, exact match (prs, comments)
  --output <path>            prs: ${DEFAULT_PR_IDS_FILE}, comments: ${DEFAULT_OUTPUT_FILE}
  --pr-ids <path>            comments: read PR IDs from a file written by "prs"
  --keep-pr-ids              comments: do not delete the --pr-ids file afterwards
  --dedupe                   comments: skip comments already in the output file
  --fail-fast                comments: abort on the first PR that cannot be read
  --rules <path>             System-comment filter rules (JSON), or PR_COMMENTS_RULES
  --organization <url|name>  Azure DevOps organization, or AZURE_DEVOPS_ORG
  --project <name>           Azure DevOps project, or AZURE_DEVOPS_PROJECT
  --timeout <ms>             Per-call timeout for az (default 60000)
  --retries <n>              Retries for transient query failures (default 0)
  -h, --help                 Show this help
  -v, --version              Show version
`;

const OPTIONS = {
  repository: { type: 'string' },
  user: { type: 'string' },
  output: { type: 'string' },
  'pr-ids': { type: 'string' },
  'keep-pr-ids': { type: 'boolean' },
  dedupe: { type: 'boolean' },
  'fail-fast': { type: 'boolean' },
  rules: { type: 'string' },
  organization: { type: 'string' },
  project: { type: 'string' },
  timeout: { type: 'string' },
  retries: { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' }
} as const;

export type Command = 'prs' | 'comments' | 'serve';

const COMMANDS: readonly Command[] = ['prs', 'comments', 'serve'];

export class UsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'UsageError';
  }
}

export interface CliOptions {
  command: Command | null;
  help: boolean;
  version: boolean;
  repository?: string;
  user?: string;
  output?: string;
  prIds?: string;
  keepPrIds: boolean;
  dedupe: boolean;
  failFast: boolean;
  rules?: string;
  organization?: string;
  project?: string;
  timeout?: string;
  retries?: string;
}

function isCommand(value: string): value is Command {
  return (COMMANDS as readonly string[]).includes(value);
}

function parseRawArgs(argv: string[]) {
  try {
    return parseArgs({ args: argv, options: OPTIONS, allowPositionals: true, strict: true });
  } catch (e) {
    throw new UsageError(e instanceof Error ? e.message : String(e));
  }
}

export function parseCliArgs(argv: string[]): CliOptions {
  const { values, positionals } = parseRawArgs(argv);
  if (positionals.length > 1) {
    throw new UsageError(`Unexpected argument: ${positionals[1]}`);
  }

  const name = positionals[0];
  if (name !== undefined && !isCommand(name)) {
    throw new UsageError(`Unknown command: ${name}`);
  }

  const options: CliOptions = {
    command: name ?? null,
    help: values.help ?? false,
    version: values.version ?? false,
    repository: values.repository,
    user: values.user,
    output: values.output,
    prIds: values['pr-ids'],
    keepPrIds: values['keep-pr-ids'] ?? false,
    dedupe: values.dedupe ?? false,
    failFast: values['fail-fast'] ?? false,
    rules: values.rules,
    organization: values.organization,
    project: values.project,
    timeout: values.timeout,
    retries: values.retries
  };

  if (options.command === 'prs') {
    rejectCommentsOnlyOptions(options);
  }
  return options;
}

const COMMENTS_ONLY_OPTIONS: ReadonlyArray<[keyof CliOptions, string]> = [
  ['prIds', '--pr-ids'],
  ['keepPrIds', '--keep-pr-ids'],
  ['dedupe', '--dedupe'],
  ['failFast', '--fail-fast'],
  ['rules', '--rules']
];

function rejectCommentsOnlyOptions(options: CliOptions): void {
  for (const [key, flag] of COMMENTS_ONLY_OPTIONS) {
    if (options[key] !== undefined && options[key] !== false) {
      throw new UsageError(`Option ${flag} only applies to the comments command`);
    }
  }
}

export type { CollectorClient };

export interface CliDeps {
  createClient(config: CollectorConfig): CollectorClient;
  startServer(config: CollectorConfig, rules: CompiledFilterRules): Promise<void>;
  print(text: string): void;
}

export const defaultDeps: CliDeps = {
  createClient: config => new AzureDevOpsClient(config),
  startServer: (config, rules) => new PRCommentsMCPServer(config, rules).run(),
  print: text => process.stdout.write(text)
};

function requireOption(value: string | undefined, flag: string): string {
  if (!value || value.trim() === '') {
    throw new UsageError(`Missing required option ${flag}`);
  }
  return value;
}

function resolveCliConfig(options: CliOptions): CollectorConfig {
  return resolveConfig({
    organization: options.organization,
    project: options.project,
    timeoutMs: options.timeout,
    retries: options.retries
  });
}

async function execute(options: CliOptions, command: Command, deps: CliDeps): Promise<void> {
  if (command === 'serve') {
    const config = resolveCliConfig(options);
    await deps.startServer(config, await loadFilterRules(options.rules));
    return;
  }

  const repository = requireOption(options.repository, '--repository');
  const user = requireOption(options.user, '--user');
  const config = resolveCliConfig(options);
  const rules = command === 'comments' ? await loadFilterRules(options.rules) : undefined;

  const client = deps.createClient(config);
  client.checkPrerequisites();

  if (command === 'prs') {
    const output = options.output ?? DEFAULT_PR_IDS_FILE;
    logger.info(`Fetching PRs for user: ${user}...`);
    const result = await prUserPRs({ repository, user, output }, client);
    logger.info(`Wrote ${result.count} PR IDs to ${output}`);
    return;
  }

  const result = await prCollectComments(
    {
      repository,
      user,
      output: options.output ?? DEFAULT_OUTPUT_FILE,
      prIdsFile: options.prIds,
      keepPrIdsFile: options.keepPrIds,
      dedupe: options.dedupe,
      failFast: options.failFast
    },
    client,
    rules
  );

  if (result.pullRequests > 0 && result.failures.length === result.pullRequests) {
    throw new StructuredError('query', `None of the ${result.pullRequests} PRs could be read`, false);
  }
}

/**
 * Run the CLI and return the exit code
 */
export async function runCli(argv: string[], deps: CliDeps = defaultDeps): Promise<number> {
  try {
    const options = parseCliArgs(argv);

    if (options.version) {
      deps.print(`pr-comment-collector v${VERSION}\n`);
      return EXIT_OK;
    }
    if (options.help) {
      deps.print(USAGE);
      return EXIT_OK;
    }
    if (!options.command) {
      throw new UsageError('Missing command');
    }

    await execute(options, options.command, deps);
    return EXIT_OK;
  } catch (e) {
    if (e instanceof UsageError || e instanceof ZodError) {
      console.error(`Error: ${e.message}`);
      console.error('Run "pr-comments --help" for usage.');
      return EXIT_USAGE;
    }
    if (e instanceof StructuredError) {
      logger.error(e.message);
      if (e.userAction) {
        console.error(`   Action: ${e.userAction}`);
      }
      return EXIT_FAILURE;
    }
    logger.error(`Unexpected error: ${e instanceof Error ? e.message : String(e)}`);
    return EXIT_FAILURE;
  }
}
