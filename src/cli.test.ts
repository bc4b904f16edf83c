/**
 * Unit tests for the command line front end
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import { mkdtemp, readFile, rm } from 'fs/promises';
import { tmpdir } from 'os';
import path from 'path';
import { EXIT_FAILURE, EXIT_OK, EXIT_USAGE, USAGE, parseCliArgs, runCli, type CliDeps, type CollectorClient } from './cli.js';
import { StructuredError } from './azure/client.js';
import { FakePullRequestSource, pullRequest, rawComment } from './testing/fake-source.js';
import { VERSION } from './version.js';

class FakeClient extends FakePullRequestSource implements CollectorClient {
  prerequisiteError: Error | null = null;

  checkPrerequisites(): void {
    if (this.prerequisiteError) throw this.prerequisiteError;
  }
}

const CONNECTION = ['--organization', 'ORG', '--project', 'PRJ'];

let dir: string;
let client: FakeClient;
let printed: string[];
let stderr: string[];
let deps: CliDeps;

beforeEach(async () => {
  dir = await mkdtemp(path.join(tmpdir(), 'pr-cli-'));
  client = new FakeClient();
  printed = [];
  stderr = [];
  deps = {
    createClient: vi.fn(() => client),
    startServer: vi.fn(async () => {}),
    print: text => { printed.push(text); }
  };
  vi.spyOn(console, 'error').mockImplementation((...args: unknown[]) => {
    stderr.push(args.map(String).join(' '));
  });
});

afterEach(async () => {
  await rm(dir, { recursive: true, force: true });
  vi.restoreAllMocks();
});

describe('parseCliArgs', () => {
  it('parses a comments invocation', () => {
    const options = parseCliArgs([
      'comments', '--repository', 'web-app', '--user', 'Jane Doe', '--output', 'out.json', '--dedupe', '--fail-fast'
    ]);

    expect(options).toMatchObject({
      command: 'comments',
      repository: 'web-app',
      user: 'Jane Doe',
      output: 'out.json',
      dedupe: true,
      failFast: true,
      keepPrIds: false
    });
  });

  it('accepts no command for --help', () => {
    expect(parseCliArgs(['-h'])).toMatchObject({ command: null, help: true });
  });

  it('rejects unknown commands and options', () => {
    expect(() => parseCliArgs(['export'])).toThrow('Unknown command: export');
    expect(() => parseCliArgs(['prs', '--verbose'])).toThrow(/verbose/);
    expect(() => parseCliArgs(['prs', 'extra'])).toThrow('Unexpected argument: extra');
  });

  it('rejects comments-only options on prs', () => {
    expect(() => parseCliArgs(['prs', '--dedupe'])).toThrow('Option --dedupe only applies to the comments command');
    expect(() => parseCliArgs(['prs', '--pr-ids', 'ids.json'])).toThrow('Option --pr-ids only applies to the comments command');
    expect(() => parseCliArgs(['prs', '--rules', 'rules.json'])).toThrow('Option --rules only applies to the comments command');
  });
});

describe('runCli', () => {
  it('prints the version', async () => {
    expect(await runCli(['--version'], deps)).toBe(EXIT_OK);
    expect(printed).toEqual([`pr-comment-collector v${VERSION}\n`]);
  });

  it('prints usage', async () => {
    expect(await runCli(['--help'], deps)).toBe(EXIT_OK);
    expect(printed).toEqual([USAGE]);
  });

  it('exits with a usage error without a command', async () => {
    expect(await runCli([], deps)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Error: Missing command');
  });

  it('exits with a usage error when --user is missing', async () => {
    expect(await runCli(['prs', '--repository', 'web-app', ...CONNECTION], deps)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Error: Missing required option --user');
    expect(deps.createClient).not.toHaveBeenCalled();
  });

  it('fails when no organization is configured', async () => {
    vi.stubEnv('AZURE_DEVOPS_ORG', '');
    vi.stubEnv('AZURE_DEVOPS_PROJECT', '');
    try {
      expect(await runCli(['prs', '--repository', 'web-app', '--user', 'Jane Doe'], deps)).toBe(EXIT_FAILURE);
    } finally {
      vi.unstubAllEnvs();
    }
  });

  it('writes the PR-ID list for prs', async () => {
    client.pullRequests = [pullRequest(12891), pullRequest(12078)];
    const output = path.join(dir, 'ids.json');

    const code = await runCli(['prs', '--repository', 'web-app', '--user', 'Jane Doe', '--output', output, ...CONNECTION], deps);

    expect(code).toBe(EXIT_OK);
    expect(await readFile(output, 'utf-8')).toBe('[12891,12078]\n');
    expect(deps.createClient).toHaveBeenCalledWith({
      organization: 'https://dev.azure.com/ORG',
      project: 'PRJ',
      timeoutMs: 60000,
      retries: 0,
      retryDelayMs: 1000
    });
  });

  it('collects comments end to end', async () => {
    client.pullRequests = [pullRequest(12891), pullRequest(12078)];
    client.comments.set(12891, [
      rawComment({ content: 'one' }),
      rawComment({ content: 'two' }),
      rawComment({ content: 'three' }),
      rawComment({ commentType: 'system', content: 'Policy updated' })
    ]);
    const output = path.join(dir, 'pr_comments.json');

    const code = await runCli(['comments', '--repository', 'web-app', '--user', 'Jane Doe', '--output', output, ...CONNECTION], deps);

    expect(code).toBe(EXIT_OK);
    const stored: unknown = JSON.parse(await readFile(output, 'utf-8'));
    expect(Array.isArray(stored) && stored.map(r => r.comment)).toEqual(['one', 'two', 'three']);
    expect(stderr).toContain('[INFO] Found 2 PRs to process');
    expect(stderr).toContain(`[INFO] Successfully saved 3 new comments to ${output}`);
    expect(printed).toEqual([]);
  });

  it('exits with a usage error for a comments-only option on prs', async () => {
    expect(await runCli(['prs', '--repository', 'web-app', '--user', 'Jane Doe', '--fail-fast', ...CONNECTION], deps)).toBe(EXIT_USAGE);
    expect(stderr[0]).toBe('Error: Option --fail-fast only applies to the comments command');
    expect(deps.createClient).not.toHaveBeenCalled();
  });

  it('fails when no PR could be read', async () => {
    client.pullRequests = [pullRequest(1), pullRequest(2)];
    client.comments.set(1, new StructuredError('query', 'az CLI failed: timeout', true));
    client.comments.set(2, new StructuredError('query', 'az CLI failed: timeout', true));
    const output = path.join(dir, 'pr_comments.json');

    const code = await runCli(['comments', '--repository', 'web-app', '--user', 'Jane Doe', '--output', output, ...CONNECTION], deps);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr).toContain('[ERROR] None of the 2 PRs could be read');
  });

  it('succeeds when only some PRs fail', async () => {
    client.pullRequests = [pullRequest(1), pullRequest(2)];
    client.comments.set(1, new StructuredError('query', 'az CLI failed: timeout', true));
    client.comments.set(2, [rawComment()]);
    const output = path.join(dir, 'pr_comments.json');

    const code = await runCli(['comments', '--repository', 'web-app', '--user', 'Jane Doe', '--output', output, ...CONNECTION], deps);

    expect(code).toBe(EXIT_OK);
  });

  it('reports auth failures with the remediation step', async () => {
    client.prerequisiteError = new StructuredError('auth', 'Not authenticated with Azure', false, 'Run: az login');

    const code = await runCli(['comments', '--repository', 'web-app', '--user', 'Jane Doe', ...CONNECTION], deps);

    expect(code).toBe(EXIT_FAILURE);
    expect(stderr).toEqual(['[ERROR] Not authenticated with Azure', '   Action: Run: az login']);
  });

  it('starts the MCP server for serve', async () => {
    expect(await runCli(['serve', ...CONNECTION], deps)).toBe(EXIT_OK);
    expect(deps.startServer).toHaveBeenCalledTimes(1);
    expect(deps.createClient).not.toHaveBeenCalled();
  });
});
