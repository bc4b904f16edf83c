/**
 * Connection settings for the Azure DevOps client
 *
 * Precedence: explicit override (CLI flag / tool input) > environment > default.
 */

import { z, ZodError } from 'zod';
import { StructuredError } from './azure/client.js';

export const DEFAULT_TIMEOUT_MS = 60_000;
export const DEFAULT_RETRY_DELAY_MS = 1_000;

const ConfigSchema = z.object({
  organization: z.string({ required_error: 'organization is required (--organization or AZURE_DEVOPS_ORG)' })
    .trim()
    .min(1, 'organization is required (--organization or AZURE_DEVOPS_ORG)'),
  project: z.string({ required_error: 'project is required (--project or AZURE_DEVOPS_PROJECT)' })
    .trim()
    .min(1, 'project is required (--project or AZURE_DEVOPS_PROJECT)'),
  timeoutMs: z.coerce.number().int().positive().default(DEFAULT_TIMEOUT_MS),
  retries: z.coerce.number().int().min(0).max(10).default(0),
  retryDelayMs: z.coerce.number().int().min(0).default(DEFAULT_RETRY_DELAY_MS)
});

export type CollectorConfig = z.output<typeof ConfigSchema>;

export interface ConfigOverrides {
  organization?: string;
  project?: string;
  timeoutMs?: number | string;
  retries?: number | string;
  retryDelayMs?: number | string;
}

/**
 * Accept a bare organization name or a full URL
 */
export function normalizeOrganization(value: string): string {
  const trimmed = value.trim();
  if (/^https?:\/\//i.test(trimmed)) {
    return trimmed.replace(/\/+$/, '');
  }
  return `https://dev.azure.com/${encodeURIComponent(trimmed)}`;
}

function pick(...values: Array<string | number | undefined>): string | number | undefined {
  return values.find(v => v !== undefined && v !== '');
}

export function resolveConfig(
  overrides: ConfigOverrides = {},
  env: NodeJS.ProcessEnv = process.env
): CollectorConfig {
  try {
    const config = ConfigSchema.parse({
      organization: pick(overrides.organization, env.AZURE_DEVOPS_ORG),
      project: pick(overrides.project, env.AZURE_DEVOPS_PROJECT),
      timeoutMs: pick(overrides.timeoutMs, env.PR_COMMENTS_TIMEOUT_MS),
      retries: pick(overrides.retries, env.PR_COMMENTS_RETRIES),
      retryDelayMs: pick(overrides.retryDelayMs, env.PR_COMMENTS_RETRY_DELAY_MS)
    });
    return { ...config, organization: normalizeOrganization(config.organization) };
  } catch (e) {
    if (e instanceof ZodError) {
      throw new StructuredError(
        'config',
        `Invalid configuration: ${e.issues.map(i => `${i.path.join('.')}: ${i.message}`).join('; ')}`,
        false,
        'Pass --organization/--project or set AZURE_DEVOPS_ORG/AZURE_DEVOPS_PROJECT'
      );
    }
    throw e;
  }
}
