/**
 * Configuration Module
 *
 * Resolves runtime settings from explicit overrides, environment variables
 * and defaults (in that order of precedence), validated with zod.
 *
 * Environment variables:
 * - LEADS_DATABASE_URL / LEADS_DATABASE_AUTH_TOKEN
 * - LEADS_HTTP_TIMEOUT_MS, LEADS_NAV_TIMEOUT_MS
 * - LEADS_PAGE_DELAY_MS, LEADS_MAX_PAGES
 * - LEADS_SCRIPTED_FETCH (auto | off)
 * - LEADS_HEADLESS, LEADS_BROWSER_PATH
 * - LEADS_WORKERS
 */

import { z } from 'zod';

/**
 * Raised for malformed configuration or invalid caller input
 */
export class ConfigurationError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}: ${issues.join('; ')}` : message);
    this.name = 'ConfigurationError';
    this.issues = issues;
  }
}

export type ScriptedFetchMode = 'auto' | 'off';

export interface LeadDiscoveryConfig {
  databaseUrl: string;
  databaseAuthToken?: string;
  httpTimeoutMs: number;
  navigationTimeoutMs: number;
  pageDelayMs: number;
  maxPages: number;
  scriptedFetch: ScriptedFetchMode;
  headless: boolean;
  browserExecutablePath?: string;
  workers: number;
}

export const DEFAULT_CONFIG: LeadDiscoveryConfig = {
  databaseUrl: 'file:leads.db',
  httpTimeoutMs: 20000,
  navigationTimeoutMs: 60000,
  pageDelayMs: 2000,
  maxPages: 3,
  scriptedFetch: 'auto',
  headless: true,
  workers: 2,
};

const booleanFromEnv = z
  .union([z.boolean(), z.enum(['true', 'false', '1', '0'])])
  .transform((value) => value === true || value === 'true' || value === '1');

const ConfigSchema = z.object({
  databaseUrl: z.string().min(1),
  databaseAuthToken: z.string().min(1).optional(),
  httpTimeoutMs: z.coerce.number().int().positive(),
  navigationTimeoutMs: z.coerce.number().int().positive(),
  pageDelayMs: z.coerce.number().int().nonnegative(),
  maxPages: z.coerce.number().int().min(1).max(50),
  scriptedFetch: z.enum(['auto', 'off']),
  headless: booleanFromEnv,
  browserExecutablePath: z.string().min(1).optional(),
  workers: z.coerce.number().int().min(1).max(32),
});

/**
 * Map of config keys to the environment variables that feed them
 */
const ENV_KEYS: Record<keyof LeadDiscoveryConfig, string> = {
  databaseUrl: 'LEADS_DATABASE_URL',
  databaseAuthToken: 'LEADS_DATABASE_AUTH_TOKEN',
  httpTimeoutMs: 'LEADS_HTTP_TIMEOUT_MS',
  navigationTimeoutMs: 'LEADS_NAV_TIMEOUT_MS',
  pageDelayMs: 'LEADS_PAGE_DELAY_MS',
  maxPages: 'LEADS_MAX_PAGES',
  scriptedFetch: 'LEADS_SCRIPTED_FETCH',
  headless: 'LEADS_HEADLESS',
  browserExecutablePath: 'LEADS_BROWSER_PATH',
  workers: 'LEADS_WORKERS',
};

/**
 * Resolve configuration
 *
 * @param overrides - Explicit values; these win over the environment
 * @param env - Environment to read (defaults to process.env)
 * @throws ConfigurationError listing every invalid key
 */
export function resolveConfig(
  overrides: Partial<LeadDiscoveryConfig> = {},
  env: NodeJS.ProcessEnv = process.env
): LeadDiscoveryConfig {
  const merged: Record<string, unknown> = { ...DEFAULT_CONFIG };

  for (const [key, envName] of Object.entries(ENV_KEYS)) {
    const value = env[envName];
    if (value !== undefined && value.trim() !== '') {
      merged[key] = value.trim();
    }
  }

  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(merged);
  if (!parsed.success) {
    const issues = parsed.error.errors.map((e) => {
      const key = e.path.join('.');
      const envName = Object.entries(ENV_KEYS).find(([name]) => name === key)?.[1];
      return `${envName ? `${key} (${envName})` : key}: ${e.message}`;
    });
    throw new ConfigurationError('Invalid configuration', issues);
  }

  const config: LeadDiscoveryConfig = {
    databaseUrl: parsed.data.databaseUrl,
    httpTimeoutMs: parsed.data.httpTimeoutMs,
    navigationTimeoutMs: parsed.data.navigationTimeoutMs,
    pageDelayMs: parsed.data.pageDelayMs,
    maxPages: parsed.data.maxPages,
    scriptedFetch: parsed.data.scriptedFetch,
    headless: parsed.data.headless,
    workers: parsed.data.workers,
  };
  if (parsed.data.databaseAuthToken) config.databaseAuthToken = parsed.data.databaseAuthToken;
  if (parsed.data.browserExecutablePath) {
    config.browserExecutablePath = parsed.data.browserExecutablePath;
  }

  return config;
}
