/**
 * Crawler Module - Crawl Controller
 *
 * The sole entry point the UI/CLI layers call: given review-page URLs,
 * fetch and parse each one (with pagination) and return every record
 * recovered plus a per-URL error list.
 *
 * Features:
 * - Denylisted hosts rejected with zero fetch attempts
 * - Auth-gated hosts skipped as a logged no-op
 * - `?page=N` pagination on known hosts, stopping at the first empty page
 * - First-page failures recorded per URL; later-page failures end that URL
 * - Fixed inter-page delay, cooperative cancellation between pages
 *
 * Never throws for per-URL problems. Only invalid arguments raise.
 *
 * Usage:
 * ```typescript
 * const { records, errors } = await crawl(urls, { fetcher, maxPages: 3 });
 * ```
 */

import { ConfigurationError } from '../config/index.js';
import { sleep as defaultSleep, type PageFetcher } from '../fetcher/index.js';
import {
  RECOMMENDED_SITES,
  buildPageSequence,
  extractHostname,
  isAuthGated,
  isDenylisted,
} from '../hosts/index.js';
import { defaultLogger, defaultMetrics, errorMessage } from '../logger/index.js';
import { parseReviews } from '../parser/index.js';
import type {
  CrawlError,
  CrawlOutput,
  Logger,
  Metrics,
  ReviewRecord,
  Sleep,
} from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface CrawlOptions {
  fetcher: PageFetcher;
  /** Pages per URL, including the first (default: 3) */
  maxPages?: number;
  /** Delay after each fetched page (default: 2000) */
  pageDelayMs?: number;
  /** Checked before every page; an aborted signal ends the crawl */
  signal?: AbortSignal;
  /** Skip plain HTTP for every page */
  forceScripted?: boolean;
  /** Page parser (default: parseReviews) */
  parse?: (html: string, sourceUrl: string) => ReviewRecord[];
  sleep?: Sleep;
  logger?: Logger;
  metrics?: Metrics;
}

export const DEFAULT_MAX_PAGES = 3;
export const DEFAULT_PAGE_DELAY_MS = 2000;

// ============================================================================
// Messages
// ============================================================================

/**
 * Error text for a host whose terms forbid automated collection
 */
export function denylistMessage(url: string): string {
  const host = extractHostname(url);
  return (
    `${host} prohibits automated scraping in its terms of service. ` +
    `Use ${RECOMMENDED_SITES.slice(0, -1).join(', ')} or ${RECOMMENDED_SITES.at(-1) ?? ''} instead.`
  );
}

// ============================================================================
// Crawl
// ============================================================================

/**
 * Crawl review pages
 *
 * URLs are processed sequentially in the order given.
 *
 * @throws ConfigurationError for a non-integer or non-positive maxPages
 */
export async function crawl(urls: readonly string[], options: CrawlOptions): Promise<CrawlOutput> {
  const maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  if (!Number.isInteger(maxPages) || maxPages < 1) {
    throw new ConfigurationError('Invalid crawl options', [
      `maxPages: expected a positive integer, got ${maxPages}`,
    ]);
  }

  const logger = options.logger ?? defaultLogger;
  const metrics = options.metrics ?? defaultMetrics;
  const sleep = options.sleep ?? defaultSleep;
  const pageDelayMs = options.pageDelayMs ?? DEFAULT_PAGE_DELAY_MS;
  const parse =
    options.parse ??
    ((html: string, sourceUrl: string) => parseReviews(html, sourceUrl, { logger }));

  const startedAt = new Date().toISOString();
  const records: ReviewRecord[] = [];
  const errors: CrawlError[] = [];
  let pagesFetched = 0;

  const recordError = (error: CrawlError): void => {
    errors.push(error);
    metrics.increment('crawler.errors', { kind: error.kind });
    logger.warn('Crawl error', { url: error.url, kind: error.kind, error: error.message });
  };

  logger.info('Starting crawl', { urls: urls.length, maxPages });

  urlLoop: for (const url of urls) {
    if (options.signal?.aborted) {
      recordError({ url, kind: 'cancelled', message: 'Crawl cancelled before this URL started' });
      break;
    }

    if (isDenylisted(url)) {
      metrics.increment('crawler.url.rejected', { reason: 'denylisted' });
      recordError({ url, kind: 'denied', message: denylistMessage(url) });
      continue;
    }

    if (isAuthGated(url)) {
      metrics.increment('crawler.url.rejected', { reason: 'auth_gated' });
      logger.info('Skipping login-gated host', { url, host: extractHostname(url) });
      continue;
    }

    metrics.increment('crawler.url.started', { host: extractHostname(url) });
    const pages = buildPageSequence(url, maxPages);

    for (const [index, pageUrl] of pages.entries()) {
      const isFirstPage = index === 0;

      if (options.signal?.aborted) {
        recordError({ url, kind: 'cancelled', message: `Crawl cancelled before ${pageUrl}` });
        break urlLoop;
      }

      const result = await options.fetcher.fetch(
        pageUrl,
        options.forceScripted ? { forceScripted: true } : {}
      );

      if (!result.success) {
        if (isFirstPage) {
          recordError({ url, kind: result.error.kind, message: result.error.message });
        } else {
          logger.warn('Pagination page failed, stopping this URL', {
            url: pageUrl,
            kind: result.error.kind,
            error: result.error.message,
          });
        }
        break;
      }

      pagesFetched++;
      metrics.increment('crawler.page.fetched', { via: result.via });

      let pageRecords: ReviewRecord[];
      try {
        pageRecords = parse(result.html, pageUrl);
      } catch (error) {
        if (isFirstPage) {
          recordError({
            url,
            kind: 'parse',
            message: `Failed to parse ${pageUrl}: ${errorMessage(error)}`,
          });
        } else {
          logger.warn('Pagination page could not be parsed, stopping this URL', {
            url: pageUrl,
            error: errorMessage(error),
          });
        }
        break;
      }

      records.push(...pageRecords);
      logger.info('Parsed page', { url: pageUrl, records: pageRecords.length });

      if (pageRecords.length === 0 && !isFirstPage) {
        logger.info('No reviews on page, stopping pagination', { url: pageUrl });
        break;
      }

      await sleep(pageDelayMs);
    }
  }

  metrics.gauge('crawler.records', records.length);
  logger.info('Crawl complete', {
    records: records.length,
    errors: errors.length,
    pagesFetched,
  });

  return {
    records,
    errors,
    meta: {
      startedAt,
      completedAt: new Date().toISOString(),
      urlsRequested: urls.length,
      pagesFetched,
    },
  };
}
