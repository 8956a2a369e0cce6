/**
 * Indicators Module - Target Product Discovery
 *
 * A target indicator describes a competing product (name, customer
 * subdomain pattern, keywords, link patterns). Checks confirm whether a
 * company uses it; confirmed matches become discovery leads that flow
 * into the same store as scraped reviews.
 *
 * Features:
 * - Built-in defaults, zod-validated JSON load/save
 * - Keyword check with surrounding-text evidence
 * - Link check over anchors, then raw page source
 * - Subdomain probing (HEAD, then GET) through an injected HTTP client
 *
 * Independent of the built-in pain-tag vocabulary.
 */

import type { AxiosInstance } from 'axios';
import * as cheerio from 'cheerio';
import { promises as fs } from 'fs';
import { z } from 'zod';
import { scoreLead } from '../classifier/index.js';
import { ConfigurationError } from '../config/index.js';
import { createHttpClient } from '../fetcher/index.js';
import { defaultLogger, errorMessage } from '../logger/index.js';
import type { Logger, ReviewRecord } from '../types/index.js';

// ============================================================================
// Schema & Types
// ============================================================================

export const TargetIndicatorSchema = z.object({
  name: z.string().trim().min(1),
  subdomainPattern: z
    .string()
    .trim()
    .min(1)
    .nullish()
    .transform((value) => value ?? undefined),
  keywords: z.array(z.string().min(1)).default([]),
  linkPatterns: z.array(z.string().min(1)).default([]),
});

export const TargetIndicatorListSchema = z.array(TargetIndicatorSchema);

export type TargetIndicator = z.infer<typeof TargetIndicatorSchema>;

export type IndicatorMethod = 'subdomain' | 'link' | 'keyword';

export interface IndicatorMatch {
  method: IndicatorMethod;
  evidence: string;
}

export interface IndicatorResult {
  found: boolean;
  evidence: string | null;
  method: IndicatorMethod | null;
}

export const DEFAULT_INDICATORS: readonly TargetIndicator[] = [
  {
    name: 'Avionté',
    subdomainPattern: '*.myavionte.com',
    keywords: ['avionte', 'avionté', 'myavionte'],
    linkPatterns: ['avionte.com', 'myavionte.com', 'avionté.com'],
  },
  {
    name: 'Mindscope',
    subdomainPattern: '*.mindscope.com',
    keywords: ['mindscope'],
    linkPatterns: ['mindscope.com'],
  },
  {
    name: 'Bullhorn',
    subdomainPattern: '*.bullhorn.com',
    keywords: ['bullhorn'],
    linkPatterns: ['bullhorn.com'],
  },
];

/** Characters of context kept on each side of a keyword hit */
const KEYWORD_CONTEXT = 50;
const DEFAULT_PROBE_TIMEOUT_MS = 5000;
const DEFAULT_PAGE_TIMEOUT_MS = 10000;

// ============================================================================
// Load / Save
// ============================================================================

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

/**
 * Parse and validate indicator JSON
 *
 * @throws ConfigurationError listing every schema issue
 */
export function parseIndicators(json: string, source = 'indicators'): TargetIndicator[] {
  let data: unknown;
  try {
    data = JSON.parse(json);
  } catch (error) {
    throw new ConfigurationError(`Malformed indicator file ${source}`, [errorMessage(error)]);
  }

  const parsed = TargetIndicatorListSchema.safeParse(data);
  if (!parsed.success) {
    throw new ConfigurationError(
      `Invalid indicator file ${source}`,
      parsed.error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`)
    );
  }
  return parsed.data;
}

/**
 * Load indicators from a JSON file; the defaults when the file does not exist
 */
export async function loadIndicators(filePath: string): Promise<TargetIndicator[]> {
  let json: string;
  try {
    json = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    if (isMissingFile(error)) {
      return DEFAULT_INDICATORS.map((indicator) => ({ ...indicator }));
    }
    throw error;
  }
  return parseIndicators(json, filePath);
}

/**
 * Validate and write indicators as JSON
 */
export async function saveIndicators(
  indicators: readonly TargetIndicator[],
  filePath: string
): Promise<void> {
  const validated = TargetIndicatorListSchema.parse(indicators);
  await fs.writeFile(filePath, `${JSON.stringify(validated, null, 2)}\n`, 'utf8');
}

/**
 * Case-insensitive lookup by name
 */
export function findIndicator(
  name: string,
  indicators: readonly TargetIndicator[] = DEFAULT_INDICATORS
): TargetIndicator | undefined {
  const wanted = name.toLowerCase();
  return indicators.find((indicator) => indicator.name.toLowerCase() === wanted);
}

// ============================================================================
// Checks
// ============================================================================

/**
 * First keyword present in the text, with up to 50 characters of context each side
 */
export function checkKeywords(text: string, indicator: TargetIndicator): IndicatorMatch | null {
  const lowered = text.toLowerCase();
  for (const keyword of indicator.keywords) {
    const index = lowered.indexOf(keyword.toLowerCase());
    if (index === -1) continue;

    const start = Math.max(0, index - KEYWORD_CONTEXT);
    const end = Math.min(text.length, index + keyword.length + KEYWORD_CONTEXT);
    return { method: 'keyword', evidence: text.slice(start, end).trim() };
  }
  return null;
}

/**
 * First link pattern found in an anchor href, else anywhere in the page source
 */
export function checkLinks(html: string, indicator: TargetIndicator): IndicatorMatch | null {
  if (indicator.linkPatterns.length === 0) return null;

  const $ = cheerio.load(html);
  for (const anchor of $('a[href]').toArray()) {
    const href = ($(anchor).attr('href') ?? '').toLowerCase();
    const pattern = indicator.linkPatterns.find((candidate) =>
      href.includes(candidate.toLowerCase())
    );
    if (pattern !== undefined) {
      const linkText = $(anchor).text().trim().slice(0, 50);
      return { method: 'link', evidence: `Link found: ${href} (${linkText})` };
    }
  }

  const source = html.toLowerCase();
  const pattern = indicator.linkPatterns.find((candidate) =>
    source.includes(candidate.toLowerCase())
  );
  return pattern === undefined
    ? null
    : { method: 'link', evidence: `Reference found in page source: ${pattern}` };
}

/**
 * Bare domain of a company website: no scheme, no www., no path
 */
export function normalizeDomain(companyDomain: string): string {
  const host = companyDomain
    .trim()
    .replace(/^https?:\/\//i, '')
    .replace(/^www\./i, '')
    .split('/')[0];
  return (host ?? '').toLowerCase();
}

/**
 * Candidate customer hosts for a company under an indicator's subdomain pattern
 */
export function subdomainCandidates(companyDomain: string, subdomainPattern: string): string[] {
  const domain = normalizeDomain(companyDomain);
  const company = domain.split('.')[0] ?? '';
  const base = subdomainPattern.replace('*.', '').replace('*', '');
  if (company === '' || base === '') return [];

  const variations = [
    company,
    company.replace(/\s+/g, ''),
    company.replace(/-/g, ''),
    company.replace(/_/g, ''),
  ];
  return [...new Set(variations.filter((variation) => variation.length > 0))].map(
    (variation) => `${variation}.${base}`
  );
}

export interface ProbeOptions {
  http?: AxiosInstance;
  timeoutMs?: number;
  logger?: Logger;
}

/**
 * Probe candidate subdomains; the first one answering 200 (HEAD, then GET) confirms use
 */
export async function probeSubdomain(
  companyDomain: string,
  indicator: TargetIndicator,
  options: ProbeOptions = {}
): Promise<IndicatorMatch | null> {
  if (!indicator.subdomainPattern) return null;

  const http = options.http ?? createHttpClient();
  const timeout = options.timeoutMs ?? DEFAULT_PROBE_TIMEOUT_MS;
  const logger = options.logger ?? defaultLogger;

  for (const host of subdomainCandidates(companyDomain, indicator.subdomainPattern)) {
    const url = `https://${host}`;
    try {
      const head = await http.head(url, { timeout });
      if (head.status === 200) {
        return { method: 'subdomain', evidence: url };
      }
      const get = await http.get<unknown>(url, { timeout });
      if (get.status === 200) {
        return { method: 'subdomain', evidence: url };
      }
    } catch (error) {
      logger.debug('Subdomain probe failed', { url, error: errorMessage(error) });
    }
  }
  return null;
}

export interface CompanyCheckOptions extends ProbeOptions {
  indicators?: readonly TargetIndicator[];
  checkSubdomain?: boolean;
  checkLinks?: boolean;
  checkKeywords?: boolean;
  pageTimeoutMs?: number;
}

/**
 * Check a company's website against every indicator
 *
 * Per indicator: subdomain probe, then links, then keywords (each only
 * if the previous found nothing). The homepage is fetched at most once.
 */
export async function checkCompany(
  companyDomain: string,
  options: CompanyCheckOptions = {}
): Promise<Record<string, IndicatorResult>> {
  const indicators = options.indicators ?? DEFAULT_INDICATORS;
  const http = options.http ?? createHttpClient();
  const logger = options.logger ?? defaultLogger;
  const useSubdomain = options.checkSubdomain ?? true;
  const useLinks = options.checkLinks ?? true;
  const useKeywords = options.checkKeywords ?? false;

  const results: Record<string, IndicatorResult> = {};
  const domain = normalizeDomain(companyDomain);
  if (domain === '') return results;

  const pageTimeout = options.pageTimeoutMs ?? DEFAULT_PAGE_TIMEOUT_MS;
  let homepage: Promise<string | null> | undefined;
  const loadHomepage = (): Promise<string | null> => {
    homepage ??= http
      .get<unknown>(`https://${domain}`, { timeout: pageTimeout })
      .then((response) =>
        response.status === 200 && typeof response.data === 'string' ? response.data : null
      )
      .catch((error: unknown) => {
        logger.debug('Homepage fetch failed', { domain, error: errorMessage(error) });
        return null;
      });
    return homepage;
  };

  for (const indicator of indicators) {
    let match: IndicatorMatch | null = null;

    if (useSubdomain) {
      match = await probeSubdomain(domain, indicator, { ...options, http, logger });
    }
    if (match === null && useLinks && indicator.linkPatterns.length > 0) {
      const html = await loadHomepage();
      match = html === null ? null : checkLinks(html, indicator);
    }
    if (match === null && useKeywords && indicator.keywords.length > 0) {
      const html = await loadHomepage();
      match = html === null ? null : checkKeywords(cheerio.load(html).root().text(), indicator);
    }

    results[indicator.name] = {
      found: match !== null,
      evidence: match?.evidence ?? null,
      method: match?.method ?? null,
    };
  }

  return results;
}

// ============================================================================
// Discovery Records
// ============================================================================

export interface DiscoveredCompany {
  companyName: string;
  indicatorName: string;
  evidence: string;
  website?: string;
  /** Where the company was found, used when there is no website */
  source?: string;
  capturedAt?: string;
}

/**
 * Turn a confirmed indicator match into a lead record
 */
export function indicatorMatchToRecord(discovered: DiscoveredCompany): ReviewRecord {
  const record: ReviewRecord = {
    companyName: discovered.companyName,
    reviewerName: 'Discovery',
    title: `${discovered.indicatorName} User: ${discovered.companyName}`.slice(0, 100),
    body: `Company discovered using ${discovered.indicatorName}. Evidence: ${discovered.evidence}`.slice(
      0,
      500
    ),
    rating: null,
    painTags: ['discovery', discovered.indicatorName.toLowerCase()],
    sourceUrl: discovered.website ?? `discovery:${discovered.source ?? 'manual'}`,
    capturedAt: discovered.capturedAt ?? new Date().toISOString(),
    leadScore: 0,
    status: 'new',
    notes: '',
  };
  record.leadScore = scoreLead(record);
  return record;
}
