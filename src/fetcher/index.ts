/**
 * Fetcher Module - Fetch Orchestrator
 *
 * Retrieves review-page HTML by plain HTTP or through a scripted browser,
 * escalating between the two.
 *
 * Decision policy:
 * 1. Forced or scripting-required hosts go to the scripted browser first;
 *    if it is unavailable, fall through to plain HTTP
 * 2. Otherwise plain HTTP with browser-like headers and a 20s timeout
 * 3. HTTP 403 escalates to the scripted browser if available, else `blocked`
 * 4. Any other HTTP/network failure escalates once as a last resort
 *
 * Failures come back as a typed FetchResult, never as exceptions.
 * unwrapFetchResult() converts to a thrown FetchError for callers that want one.
 *
 * Usage:
 * ```typescript
 * const fetcher = new FetchOrchestrator({ session: pool.slot(0) });
 * const result = await fetcher.fetch('https://www.g2.com/products/acme/reviews');
 * if (result.success) parseReviews(result.html, result.url);
 * ```
 */

import axios, { type AxiosInstance } from 'axios';
import { errors as playwrightErrors } from 'playwright-core';
import type { LeadDiscoveryConfig, ScriptedFetchMode } from '../config/index.js';
import { extractHostname, matchHost, refererFor, requiresScripting } from '../hosts/index.js';
import { defaultLogger, defaultMetrics, errorMessage } from '../logger/index.js';
import {
  BROWSER_USER_AGENT,
  SessionUnavailableError,
  type BrowserPage,
  type BrowserSession,
  type NavigationWait,
} from '../session-pool/index.js';
import type {
  FetchFailure,
  FetchFailureKind,
  FetchResult,
  Logger,
  Metrics,
  Sleep,
} from '../types/index.js';

// ============================================================================
// Type Definitions
// ============================================================================

export interface FetchOptions {
  /** Skip plain HTTP and go to the scripted browser first */
  forceScripted?: boolean;
}

/**
 * Anything that can turn a URL into a FetchResult
 */
export interface PageFetcher {
  fetch(url: string, options?: FetchOptions): Promise<FetchResult>;
}

/**
 * Source of the worker's browser session (a SessionSlot in production)
 */
export interface SessionSource {
  acquire(): Promise<BrowserSession>;
}

export interface FetchOrchestratorOptions {
  /** HTTP client (default: createHttpClient(timeoutMs)) */
  http?: AxiosInstance;
  /** Worker-owned browser session; null or absent disables scripted fetch */
  session?: SessionSource | null;
  /** Plain HTTP timeout (default: 20000) */
  timeoutMs?: number;
  /** Per-attempt navigation timeout (default: 60000) */
  navigationTimeoutMs?: number;
  scriptedFetch?: ScriptedFetchMode;
  sleep?: Sleep;
  logger?: Logger;
  metrics?: Metrics;
}

/**
 * Thrown form of a FetchFailure
 */
export class FetchError extends Error {
  readonly kind: FetchFailureKind;
  readonly url: string;
  readonly status?: number;

  constructor(failure: FetchFailure) {
    super(failure.message);
    this.name = 'FetchError';
    this.kind = failure.kind;
    this.url = failure.url;
    if (failure.status !== undefined) {
      this.status = failure.status;
    }
  }
}

// ============================================================================
// Constants
// ============================================================================

export const DEFAULT_HTTP_TIMEOUT_MS = 20000;
export const DEFAULT_NAVIGATION_TIMEOUT_MS = 60000;

export const BROWSER_HEADERS: Readonly<Record<string, string>> = {
  'User-Agent': BROWSER_USER_AGENT,
  Accept:
    'text/html,application/xhtml+xml,application/xml;q=0.9,image/avif,image/webp,image/apng,*/*;q=0.8',
  'Accept-Language': 'en-US,en;q=0.9',
  'Accept-Encoding': 'gzip, deflate, br',
  DNT: '1',
  Connection: 'keep-alive',
  'Upgrade-Insecure-Requests': '1',
  'Sec-Fetch-Dest': 'document',
  'Sec-Fetch-Mode': 'navigate',
  'Sec-Fetch-Site': 'none',
  'Sec-Fetch-User': '?1',
  'Cache-Control': 'max-age=0',
};

/** Navigation strategies, each tried when the previous one fails */
export const NAVIGATION_WAITS: readonly NavigationWait[] = ['domcontentloaded', 'load', 'commit'];

export const CHALLENGE_MARKERS = ['cf-browser-verification', 'challenge-platform', 'Just a moment'];
/** Pages smaller than this are treated as a possible challenge interstitial */
export const CHALLENGE_MIN_BYTES = 10000;
/** The challenge is considered passed once the page grows past this */
export const CHALLENGE_PASSED_BYTES = 50000;
export const CHALLENGE_MAX_WAIT_MS = 30000;
export const CHALLENGE_POLL_MS = 2000;
export const CHALLENGE_SETTLE_MS = 3000;
export const INTERACTIVE_WAIT_MS = 3000;

export const REVIEW_ELEMENT_SELECTOR = 'div[class*="review"], article[class*="review"]';
export const REVIEW_ELEMENT_TIMEOUT_MS = 10000;
export const LOAD_MORE_SELECTOR =
  'button:has-text("Load more"), button:has-text("Show more"), a:has-text("Load more")';
const LOAD_MORE_CLICK_TIMEOUT_MS = 5000;
const LOAD_MORE_SETTLE_MS = 2000;

/**
 * Host-specific scrolling used to trigger lazy-loaded reviews
 */
export interface ScrollPlan {
  /** Scroll targets as fractions of the document height */
  steps: readonly number[];
  delayMs: number;
  /** Wait for a review element before scrolling */
  waitForReviews: boolean;
  /** Click a "Load more" control after each step */
  clickLoadMore: boolean;
}

const SCROLL_PLANS: ReadonlyArray<readonly [string, ScrollPlan]> = [
  ['getapp.com', { steps: [1, 1, 1, 1, 1], delayMs: 2000, waitForReviews: true, clickLoadMore: true }],
  ['g2.com', { steps: [1, 1, 1, 1], delayMs: 2000, waitForReviews: false, clickLoadMore: false }],
  ['trustradius.com', { steps: [1, 1, 1, 1], delayMs: 2000, waitForReviews: false, clickLoadMore: false }],
];

export const GENERIC_SCROLL_PLAN: ScrollPlan = {
  steps: [0, 0.25, 0.5, 0.75, 1],
  delayMs: 1500,
  waitForReviews: false,
  clickLoadMore: false,
};

/** Bottom, top, bottom: catches lazy loaders keyed on scroll direction */
export const FINAL_SCROLL_CYCLE: ReadonlyArray<readonly [number, number]> = [
  [1, 3000],
  [0, 1000],
  [1, 2000],
];

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Promise-based delay
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Scroll plan for a URL's host
 */
export function scrollPlanFor(url: string): ScrollPlan {
  const domain = matchHost(url, SCROLL_PLANS.map(([host]) => host));
  const plan = SCROLL_PLANS.find(([host]) => host === domain);
  return plan ? plan[1] : GENERIC_SCROLL_PLAN;
}

/**
 * Whether page content looks like a bot-challenge interstitial
 */
export function isChallengePage(html: string): boolean {
  return (
    CHALLENGE_MARKERS.some((marker) => html.includes(marker)) ||
    Buffer.byteLength(html, 'utf8') < CHALLENGE_MIN_BYTES
  );
}

function challengePassed(html: string): boolean {
  return (
    Buffer.byteLength(html, 'utf8') > CHALLENGE_PASSED_BYTES &&
    !CHALLENGE_MARKERS.some((marker) => html.includes(marker))
  );
}

/**
 * Create the plain-HTTP client
 *
 * Every status resolves; the orchestrator classifies it.
 */
export function createHttpClient(timeoutMs: number = DEFAULT_HTTP_TIMEOUT_MS): AxiosInstance {
  return axios.create({
    timeout: timeoutMs,
    headers: { ...BROWSER_HEADERS },
    maxRedirects: 10,
    responseType: 'text',
    validateStatus: () => true,
  });
}

function failure(kind: FetchFailureKind, url: string, message: string, status?: number): FetchResult {
  const error: FetchFailure = { kind, url, message };
  if (status !== undefined) {
    error.status = status;
  }
  return { success: false, error };
}

function isTimeoutError(error: unknown): boolean {
  if (error instanceof playwrightErrors.TimeoutError) return true;
  if (axios.isAxiosError(error)) {
    return error.code === 'ECONNABORTED' || error.code === 'ETIMEDOUT';
  }
  return /timeout .*exceeded|timed out/i.test(errorMessage(error));
}

/**
 * Failure kind for an error raised during a scripted fetch
 */
export function scriptedFailureKind(error: unknown): FetchFailureKind {
  if (error instanceof SessionUnavailableError) return 'unavailable';
  if (isTimeoutError(error)) return 'timeout';
  return 'network';
}

/**
 * Convert a FetchResult into its HTML, throwing FetchError on failure
 */
export function unwrapFetchResult(result: FetchResult): string {
  if (!result.success) {
    throw new FetchError(result.error);
  }
  return result.html;
}

// ============================================================================
// Fetch Orchestrator
// ============================================================================

export class FetchOrchestrator implements PageFetcher {
  private readonly http: AxiosInstance;
  private readonly session: SessionSource | null;
  private readonly navigationTimeoutMs: number;
  private readonly scriptingEnabled: boolean;
  private readonly sleep: Sleep;
  private readonly logger: Logger;
  private readonly metrics: Metrics;

  constructor(options: FetchOrchestratorOptions = {}) {
    this.http = options.http ?? createHttpClient(options.timeoutMs ?? DEFAULT_HTTP_TIMEOUT_MS);
    this.session = options.session ?? null;
    this.navigationTimeoutMs = options.navigationTimeoutMs ?? DEFAULT_NAVIGATION_TIMEOUT_MS;
    this.scriptingEnabled = this.session !== null && options.scriptedFetch !== 'off';
    this.sleep = options.sleep ?? sleep;
    this.logger = options.logger ?? defaultLogger;
    this.metrics = options.metrics ?? defaultMetrics;
  }

  /**
   * Fetch a page's HTML
   */
  async fetch(url: string, options: FetchOptions = {}): Promise<FetchResult> {
    const startTime = Date.now();
    const result = await this.resolve(url, options.forceScripted ?? false);

    this.metrics.timing('fetcher.duration', Date.now() - startTime, {
      via: result.success ? result.via : 'failed',
    });
    if (!result.success) {
      this.logger.warn('Fetch failed', {
        url,
        kind: result.error.kind,
        error: result.error.message,
      });
    }
    return result;
  }

  private async resolve(url: string, forceScripted: boolean): Promise<FetchResult> {
    let scriptedTried = false;

    if (forceScripted || requiresScripting(url)) {
      if (this.scriptingEnabled) {
        const scripted = await this.fetchScripted(url);
        if (scripted.success || scripted.error.kind !== 'unavailable') {
          return scripted;
        }
        scriptedTried = true;
        this.logger.warn('Scripted fetch unavailable, trying plain HTTP', { url });
      } else {
        this.logger.debug('Scripted fetch disabled, using plain HTTP', { url });
      }
    }

    const viaHttp = await this.fetchHttp(url);
    if (viaHttp.success) {
      return viaHttp;
    }

    const httpError = viaHttp.error;
    if (!this.scriptingEnabled || scriptedTried) {
      return this.finalHttpFailure(httpError);
    }

    this.metrics.increment('fetcher.escalated', {
      reason: httpError.kind === 'blocked' ? 'blocked' : 'failure',
    });
    this.logger.info('Escalating to scripted fetch', { url, kind: httpError.kind });

    const scripted = await this.fetchScripted(url);
    if (scripted.success || scripted.error.kind !== 'unavailable') {
      return scripted;
    }
    return this.finalHttpFailure(httpError);
  }

  private finalHttpFailure(error: FetchFailure): FetchResult {
    if (error.kind !== 'blocked') {
      return { success: false, error };
    }
    const host = extractHostname(error.url);
    return failure(
      'blocked',
      error.url,
      `${host} is blocking automated requests (403 Forbidden) and scripted fetch is unavailable`,
      403
    );
  }

  // ==========================================================================
  // Plain HTTP
  // ==========================================================================

  private async fetchHttp(url: string): Promise<FetchResult> {
    const host = extractHostname(url);
    this.metrics.increment('fetcher.http.attempt', { host });

    const headers: Record<string, string> = {};
    const referer = refererFor(url);
    if (referer) {
      headers['Referer'] = referer;
    }

    try {
      const response = await this.http.get<unknown>(url, { headers });
      this.metrics.increment('fetcher.http.status', { status: String(response.status) });

      if (response.status === 403) {
        return failure('blocked', url, `${host} returned 403 Forbidden`, 403);
      }
      if (response.status < 200 || response.status >= 300) {
        return failure('http', url, `HTTP ${response.status} from ${host}`, response.status);
      }

      const html = typeof response.data === 'string' ? response.data : String(response.data ?? '');
      this.logger.debug('Fetched with plain HTTP', { url, bytes: html.length });
      return { success: true, html, via: 'http', url };
    } catch (error) {
      if (isTimeoutError(error)) {
        return failure('timeout', url, `Timed out fetching ${url}: ${errorMessage(error)}`);
      }
      return failure('network', url, `Network error fetching ${url}: ${errorMessage(error)}`);
    }
  }

  // ==========================================================================
  // Scripted Browser
  // ==========================================================================

  private async fetchScripted(url: string): Promise<FetchResult> {
    this.metrics.increment('fetcher.scripted.attempt', { host: extractHostname(url) });
    if (this.session === null) {
      return failure('unavailable', url, 'Scripted fetch is not configured');
    }

    let page: BrowserPage;
    try {
      const session = await this.session.acquire();
      page = await session.newPage();
    } catch (error) {
      return failure(scriptedFailureKind(error), url, errorMessage(error));
    }

    try {
      await this.navigate(page, url);
      await this.waitOutChallenge(page, url);
      await this.sleep(INTERACTIVE_WAIT_MS);
      await this.scrollForContent(page, url);

      const html = await page.content();
      this.logger.debug('Fetched with scripted browser', { url, bytes: html.length });
      return { success: true, html, via: 'scripted', url };
    } catch (error) {
      const kind = scriptedFailureKind(error);
      return failure(kind, url, `Scripted fetch of ${url} failed: ${errorMessage(error)}`);
    } finally {
      await this.closePage(page, url);
    }
  }

  private async navigate(page: BrowserPage, url: string): Promise<void> {
    const lastIndex = NAVIGATION_WAITS.length - 1;
    for (const [index, waitUntil] of NAVIGATION_WAITS.entries()) {
      try {
        await page.goto(url, { waitUntil, timeoutMs: this.navigationTimeoutMs });
        return;
      } catch (error) {
        if (index === lastIndex) {
          throw error;
        }
        this.logger.warn('Navigation attempt failed, relaxing wait condition', {
          url,
          waitUntil,
          error: errorMessage(error),
        });
      }
    }
  }

  /**
   * Poll a suspected challenge page until it clears or the wait runs out.
   * Proceeds with whatever is loaded either way.
   */
  private async waitOutChallenge(page: BrowserPage, url: string): Promise<void> {
    if (!isChallengePage(await page.content())) {
      return;
    }

    this.logger.info('Bot challenge suspected, waiting', { url });
    let waited = 0;
    while (waited < CHALLENGE_MAX_WAIT_MS) {
      await this.sleep(CHALLENGE_POLL_MS);
      waited += CHALLENGE_POLL_MS;
      if (challengePassed(await page.content())) {
        this.logger.info('Challenge cleared', { url, waitedMs: waited });
        break;
      }
    }
    await this.sleep(CHALLENGE_SETTLE_MS);
  }

  private async scrollForContent(page: BrowserPage, url: string): Promise<void> {
    const plan = scrollPlanFor(url);

    if (plan.waitForReviews) {
      const found = await page.waitForSelector(REVIEW_ELEMENT_SELECTOR, REVIEW_ELEMENT_TIMEOUT_MS);
      if (!found) {
        this.logger.debug('Review elements did not appear, scrolling anyway', { url });
      }
    }

    for (const step of plan.steps) {
      await page.scrollTo(step);
      await this.sleep(plan.delayMs);
      if (plan.clickLoadMore) {
        await this.clickLoadMore(page, url);
      }
    }

    for (const [position, delayMs] of FINAL_SCROLL_CYCLE) {
      await page.scrollTo(position);
      await this.sleep(delayMs);
    }
  }

  private async clickLoadMore(page: BrowserPage, url: string): Promise<void> {
    try {
      if (await page.clickFirst(LOAD_MORE_SELECTOR, LOAD_MORE_CLICK_TIMEOUT_MS)) {
        await this.sleep(LOAD_MORE_SETTLE_MS);
      }
    } catch (error) {
      this.logger.debug('Load-more click failed', { url, error: errorMessage(error) });
    }
  }

  private async closePage(page: BrowserPage, url: string): Promise<void> {
    try {
      await page.close();
    } catch (error) {
      this.logger.warn('Failed to close page', { url, error: errorMessage(error) });
    }
  }
}

/**
 * Build an orchestrator from resolved configuration
 */
export function createFetcher(
  config: Pick<LeadDiscoveryConfig, 'httpTimeoutMs' | 'navigationTimeoutMs' | 'scriptedFetch'>,
  deps: Pick<FetchOrchestratorOptions, 'session' | 'http' | 'sleep' | 'logger' | 'metrics'> = {}
): FetchOrchestrator {
  return new FetchOrchestrator({
    ...deps,
    timeoutMs: config.httpTimeoutMs,
    navigationTimeoutMs: config.navigationTimeoutMs,
    scriptedFetch: config.scriptedFetch,
  });
}
